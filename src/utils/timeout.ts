// src/utils/timeout.ts
import { logger } from '../core/logger';

/**
 * Wraps a promise with a timeout. The timer is cleared once the promise
 * settles so nothing is left pending.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      logger.warn('Operation timed out', { timeoutMs, errorMessage });
      reject(new Error(`Timeout: ${errorMessage} (${timeoutMs}ms)`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
