export class TimeoutError extends Error {
  timeoutMs: number;

  constructor(timeoutMs: number, message = `timed out after ${timeoutMs}ms`) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Settles with `promise`, or rejects with a TimeoutError once `timeoutMs`
 * elapses first. A non-positive or non-finite budget disables the timer.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs)), timeoutMs);
    timer.unref?.();
  });

  return Promise.race([promise, timeout]).finally(() => {
    clearTimeout(timer);
  });
}

/** Outer budget for an operation that enforces `timeoutMs` itself. No limit stays no limit. */
export function withGrace(timeoutMs: number, graceMs: number): number {
  return timeoutMs > 0 ? timeoutMs + graceMs : timeoutMs;
}
