type BackoffOptions = {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  jitter?: boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

const wait = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const computeDelay = (
  attempt: number,
  { initialDelayMs = 500, maxDelayMs = 8_000, factor = 2, jitter = true, random = Math.random }: BackoffOptions = {},
): number => {
  const cappedDelay = Math.min(initialDelayMs * factor ** (attempt - 1), maxDelayMs);

  // Full jitter keeps at least half of the nominal delay.
  return jitter
    ? Math.round(cappedDelay / 2 + random() * (cappedDelay / 2))
    : Math.round(cappedDelay);
};

export const exponentialBackoff = async <T>(
  action: (attempt: number) => Promise<T>,
  options: BackoffOptions = {},
): Promise<T> => {
  const { maxAttempts = 3, onRetry, shouldRetry, sleep = wait } = options;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await action(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || (shouldRetry && !shouldRetry(error, attempt))) {
        throw error;
      }

      const delay = computeDelay(attempt, options);
      if (onRetry) {
        try {
          onRetry(error, attempt, delay);
        } catch (hookError) {
          console.warn('Retry hook threw an error.', hookError);
        }
      }

      await sleep(delay);
    }
  }
};

export type { BackoffOptions };
