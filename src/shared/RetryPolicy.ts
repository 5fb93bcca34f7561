function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  /** 總嘗試次數（含第一次），至少 1 */
  maxAttempts: number;
  baseDelayMs: number;
  /** 單次等待上限 */
  maxDelayMs?: number;
  isRetryable: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
  /** 測試時可注入，避免真的等待 */
  sleep?: (ms: number) => Promise<void>;
}

/** 錯誤在用盡嘗試次數後拋出時附帶的嘗試資訊 */
export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(
      `Gave up after ${attempts} attempt(s): ${lastError instanceof Error ? lastError.message : String(lastError)}`,
      { cause: lastError },
    );
    this.name = 'RetryExhaustedError';
  }
}

/**
 * 帶指數退避和 jitter 的重試策略
 *
 * - 不可重試的錯誤立即原樣拋出
 * - 可重試的錯誤用盡 maxAttempts 後拋出 RetryExhaustedError
 */
export async function withRetry<T>(
  operation: (attempt: number) => T | Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
  const sleep = opts.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (!opts.isRetryable(err)) throw err;
      lastError = err;
      if (attempt === maxAttempts) break;

      const backoff = opts.baseDelayMs * Math.pow(2, attempt - 1) + Math.random() * opts.baseDelayMs;
      const delay = Math.min(backoff, opts.maxDelayMs ?? Number.POSITIVE_INFINITY);
      opts.onRetry?.(attempt, err, delay);
      await sleep(delay);
    }
  }

  throw new RetryExhaustedError(maxAttempts, lastError);
}
