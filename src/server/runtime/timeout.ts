import { TimeoutError } from '../../types/index.js';

/** Longest delay `setTimeout` honours; larger values fire after 1 ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Race `body()` against a deadline. When the deadline wins the body keeps
 * running unobserved; callers cancel its token so cooperative handlers stop.
 */
export async function withTimeout<T>(
  body: () => Promise<T>,
  timeoutMs: number,
  operationName?: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(timeoutMs, operationName));
    }, timeoutMs);
  });

  try {
    return await Promise.race([body(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
