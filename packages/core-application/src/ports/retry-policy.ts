export type RetryContext = {
  attempt: number;
  startedAt: number;
  lastError: unknown;
  nextDelayMs: number;
};

export type RetryPolicy = {
  maxAttempts: number;            // ex: 4
  baseDelayMs: number;            // ex: 500
  maxDelayMs: number;             // ex: 8000
  jitterRatio: number;            // ex: 0.2 (20%)
  shouldRetry: (err: unknown) => boolean;
};

export type Sleeper = (ms: number) => Promise<void>;

export type RetryObserver = (ctx: RetryContext) => void;
