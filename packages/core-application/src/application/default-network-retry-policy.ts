import type { RetryPolicy } from "../ports/retry-policy";
import { NetworkError, RemoteRateLimitedError, RemoteServerError } from "./errors";

export function defaultNetworkRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: 4,
    baseDelayMs: 500,
    maxDelayMs: 8000,
    jitterRatio: 0.2,
    // not-found / permissão não melhoram tentando de novo
    shouldRetry: (err) =>
      err instanceof NetworkError ||
      err instanceof RemoteRateLimitedError ||
      err instanceof RemoteServerError,
    ...overrides,
  };
}
