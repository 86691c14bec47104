/**
 * Deadline helper for provider calls.
 */

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Runs `task` with a deadline. When the deadline passes, the signal handed
 * to the task is aborted and the returned promise rejects with TimeoutError,
 * whether or not the task honours the signal.
 *
 * @example
 * ```typescript
 * const response = await withTimeout(
 *   (signal) => client.complete(messages, { signal }),
 *   8000,
 *   'Director decision'
 * );
 * ```
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
