import { RouteTimeoutError } from '../services/errors';

/**
 * Rejects with RouteTimeoutError when `work` has not settled after
 * `timeoutMs`. The work itself keeps running; only the caller stops waiting.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new RouteTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
