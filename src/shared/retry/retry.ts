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
  retries: number;          // extra attempts after the first one (2 means up to 3 tries)
  minDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: RetryContext & { delayMs: number }) => void;
  onGiveUp?: (ctx: RetryContext & { retryable: boolean }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

/**
 * Exponential backoff capped at `maxDelayMs`. A finite, non-negative
 * `requestedDelayMs` (e.g. from Retry-After) replaces the exponential step.
 */
export const computeBackoffMs = (
  attemptIndex: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "jitterRatio" | "randomFn">,
  requestedDelayMs?: number
): number => {
  const { minDelayMs, maxDelayMs, jitterRatio = 0.2, randomFn = Math.random } = opts;
  const base =
    typeof requestedDelayMs === "number" && Number.isFinite(requestedDelayMs) && requestedDelayMs >= 0
      ? Math.min(maxDelayMs, requestedDelayMs)
      : Math.min(maxDelayMs, minDelayMs * Math.pow(2, attemptIndex));
  const jitter = Math.floor(base * clamp01(jitterRatio) * clamp01(randomFn()));
  return base + jitter;
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp, sleep = defaultSleep } = opts;
  const maxAttempts = retries + 1;

  for (let attemptIndex = 0; ; attemptIndex += 1) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized = typeof decision === "boolean" ? { retry: decision, delayMs: undefined } : decision;

      if (!normalized.retry || attemptIndex >= retries) {
        onGiveUp?.({ attempt: attemptIndex + 1, maxAttempts, error: err, retryable: normalized.retry });
        throw err;
      }

      const delayMs = computeBackoffMs(attemptIndex, opts, normalized.delayMs);
      onRetry?.({ attempt: attemptIndex + 1, maxAttempts, delayMs, error: err });
      await sleep(delayMs);
    }
  }
};
