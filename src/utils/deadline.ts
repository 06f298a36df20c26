import { AppError } from './errors.js';

export interface DeadlineOptions {
  /** Appended to the timeout message, e.g. to warn that a write may still land. */
  note?: string;
}

/**
 * Race `work` against a timer. The timer is always cleared; a late result
 * from `work` is dropped, though the work itself is not cancelled.
 */
export async function withDeadline<T>(
  work: Promise<T>,
  timeoutMs: number,
  label: string,
  options: DeadlineOptions = {}
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const message = options.note
    ? `${label} timed out after ${timeoutMs}ms; ${options.note}`
    : `${label} timed out after ${timeoutMs}ms`;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(AppError.upstreamFailure(message, { timeoutMs }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
