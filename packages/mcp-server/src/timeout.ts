/** A tool call that outlived its time budget */
export class TimeoutError extends Error {
  constructor(
    readonly tool: string,
    readonly timeoutMs: number
  ) {
    super(`Tool '${tool}' timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race a tool call against its budget. A missing, zero or non-finite
 * budget leaves the call unbounded.
 */
export async function withTimeout<T>(promise: Promise<T>, tool: string, timeoutMs: number | undefined): Promise<T> {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(tool, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}
