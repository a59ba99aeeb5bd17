import { TimeoutError } from "./errors.js";

/**
 * Race `work` against a timer. The timer is cleared either way; the losing
 * promise is left to settle on its own.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(`${label} timed out after ${String(timeoutMs)}ms`, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, expiry]);
  } finally {
    clearTimeout(timer);
  }
}
