export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * FIFO async mutex. Waiters are served in arrival order.
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

export type RetryOptions = {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
};

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 2000,
  backoffFactor: 2,
};

export class RetryExhaustedError extends Error {
  constructor(public readonly attempts: number, public readonly lastError: unknown) {
    super(lastError instanceof Error ? lastError.message : String(lastError), { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Runs `fn` with exponential backoff. Resolves with the value and the number of
 * attempts used; rejects with RetryExhaustedError once attempts run out, or with
 * the original error when `retryIf` refuses it.
 */
export const retry = async <T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<{ value: T; attempts: number }> => {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
  let delay = opts.initialDelayMs;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return { value: await fn(attempt), attempts: attempt };
    } catch (error) {
      lastError = error;
      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }
      if (attempt === maxAttempts) break;
      opts.onRetry?.(error, attempt);
      if (delay > 0) {
        await sleep(delay);
      }
      delay = Math.min(delay * opts.backoffFactor, opts.maxDelayMs);
    }
  }

  throw new RetryExhaustedError(maxAttempts, lastError);
};
