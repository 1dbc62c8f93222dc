import type { RetryObserver, RetryPolicy, Sleeper } from "../ports/retry-policy";
import { RemoteRateLimitedError } from "./errors";

export function computeDelayMs(policy: RetryPolicy, attempt: number, err: unknown, random = Math.random): number {
  if (err instanceof RemoteRateLimitedError && err.retryAfterSeconds !== undefined) {
    return Math.min(err.retryAfterSeconds * 1000, policy.maxDelayMs);
  }

  const exp = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  const jitter = exp * policy.jitterRatio * (random() * 2 - 1);
  return Math.max(0, Math.round(exp + jitter));
}

/**
 * Executa fn até dar certo ou a política desistir.
 * O último erro é relançado como veio.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  sleep: Sleeper,
  onRetry?: RetryObserver
): Promise<T> {
  const startedAt = Date.now();
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      return await fn();
    } catch (err) {
      if (attempt >= policy.maxAttempts || !policy.shouldRetry(err)) throw err;

      const nextDelayMs = computeDelayMs(policy, attempt, err);
      onRetry?.({ attempt, startedAt, lastError: err, nextDelayMs });
      await sleep(nextDelayMs);
    }
  }
}
