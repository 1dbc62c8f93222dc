/**
 * Falhas de transporte: conectividade, auth, permissão, not-found.
 * O core não se recupera delas; o item afetado é pulado e logado.
 */
export class TransportError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "TransportError";
  }
}

export class NetworkError extends TransportError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "NetworkError";
  }
}

export class RemoteNotFoundError extends TransportError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "RemoteNotFoundError";
  }
}

export class RemoteRateLimitedError extends TransportError {
  constructor(message: string, public retryAfterSeconds?: number, cause?: unknown) {
    super(message, cause);
    this.name = "RemoteRateLimitedError";
  }
}

export class RemoteServerError extends TransportError {
  constructor(message: string, public statusCode?: number, cause?: unknown) {
    super(message, cause);
    this.name = "RemoteServerError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
