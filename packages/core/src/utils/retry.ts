export interface RetryPolicy {
  /** Total attempts including the first */
  attempts: number;
  isRetryable(err: unknown): boolean;
}

export type RetryContext = {
  /** 1-based */
  attempt: number;
};

/**
 * Run `fn` until it succeeds, the error is not retryable, or attempts run out.
 * The last error is rethrown unchanged.
 */
export async function withRetries<T>(fn: (ctx: RetryContext) => Promise<T>, policy: RetryPolicy): Promise<T> {
  const attempts = Math.max(1, policy.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn({ attempt });
    } catch (err) {
      if (attempt >= attempts || !policy.isRetryable(err)) {
        throw err;
      }
    }
  }
}
