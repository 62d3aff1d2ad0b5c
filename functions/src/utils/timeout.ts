export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Race `operation` against a timer. The timer is cleared once the race settles.
 * A result that only arrives after the budget is spent, as with a synchronous
 * operation that blocks the timer, still rejects with a TimeoutError.
 */
export async function withTimeout<T>(
  operation: () => Promise<T>,
  timeoutMs: number,
  label = 'operation',
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const startedAt = Date.now();

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    const result = await Promise.race([operation(), timeout]);
    if (Date.now() - startedAt > timeoutMs) {
      throw new TimeoutError(label, timeoutMs);
    }
    return result;
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
