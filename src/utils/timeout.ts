// src/utils/timeout.ts

export class TimeoutError extends Error {
  constructor(message: string, public timeoutMs: number) {
    super(`Timeout: ${message} (${timeoutMs}ms)`);
    this.name = 'TimeoutError';
  }
}

/** Rejects with TimeoutError unless `promise` settles within `timeoutMs`. */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(errorMessage, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
