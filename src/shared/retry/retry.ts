export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryContext = {
  attempt: number;
  maxAttempts: number;
  error: unknown;
};

export type RetryOptions = {
  retries: number;          // max attempts after initial try (e.g. 5 means up to 6 total tries)
  minDelayMs: number;       // base delay for backoff
  maxDelayMs: number;       // max delay cap
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: RetryContext & { delayMs: number }) => void;
  onGiveUp?: (ctx: RetryContext) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  sleepFn?: (ms: number) => Promise<void>;
};

export const sleep = (ms: number): Promise<void> => new Promise((r) => setTimeout(r, ms));

export const computeBackoffMs = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "randomFn" | "jitterRatio">,
  customDelayMs?: number
): number => {
  const { minDelayMs, maxDelayMs, randomFn = Math.random, jitterRatio = 0.2 } = opts;
  const backoff = customDelayMs != null
    ? Math.min(maxDelayMs, customDelayMs)
    : Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));
  // small jitter to avoid thundering herd
  const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
  const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
  return backoff + Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp, sleepFn = sleep } = opts;

  let attempt = 0;
  const maxAttempts = retries + 1;
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      if (attempt >= retries || !normalized.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const waitMs = computeBackoffMs(attempt, opts, customDelayMs);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleepFn(waitMs);
      attempt += 1;
    }
  }
};
