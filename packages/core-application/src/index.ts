// Public API of the core-application package: ports, the traversal service,
// configuration and the store adapters. Test doubles under testing/ are not
// exported.

// Ports (interfaces)
export * from "./ports/logger";
export * from "./ports/remote-file-store";
export * from "./ports/retry-policy";

// Application
export * from "./application/errors";
export * from "./application/config";
export * from "./application/with-retry";
export * from "./application/default-network-retry-policy";

// Services
export * from "./services/tree-rewriter";
export * from "./services/sanitize-service";

// Adapters
export * from "./adapters/console-logger";
export * from "./adapters/mounted-folder-file-store";
export * from "./adapters/webdav-file-store";
export * from "./adapters/google-auth";
export * from "./adapters/google-drive-client";
export * from "./adapters/google-drive-file-store";
export * from "./adapters/file-store-factory";
