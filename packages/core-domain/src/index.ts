export * from "./entities/entry";
export * from "./value-objects/remote-path";
export * from "./value-objects/sanitization-rules";
export * from "./services/sanitize-name";
export * from "./errors";
