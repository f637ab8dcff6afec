/**
 * Error taxonomy
 *
 * Transient errors may succeed on a later run (backend hiccups, rate limits,
 * timeouts). Permanent errors will not (bad config, missing prior state,
 * repository over limits). Quality errors mean an agent produced output that
 * fell below a configured floor where the pipeline cannot continue.
 */

export type ErrorCode = 'TRANSIENT' | 'PERMANENT' | 'QUALITY' | 'TIMEOUT';

export class WikiforgeError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class TransientError extends WikiforgeError {
  constructor(message: string, options?: { cause?: unknown }, code: ErrorCode = 'TRANSIENT') {
    super(message, code, options);
  }
}

export class PermanentError extends WikiforgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PERMANENT', options);
  }
}

export class QualityError extends WikiforgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'QUALITY', options);
  }
}

export class TimeoutError extends TransientError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, undefined, 'TIMEOUT');
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Race a promise against a wall-clock timer.
 *
 * The underlying work is not cancelled; anything it already persisted stays.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return work;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
