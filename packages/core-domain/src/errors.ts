export class ConfigurationError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "ConfigurationError";
  }
}
