import { TimeoutError } from './errors.js';

/**
 * Runs `operation` with an abort signal that fires after `timeoutMs`. The
 * returned promise rejects with `TimeoutError` on expiry even if the operation
 * ignores the signal. The timer is always cleared.
 */
export async function withTimeout<T>(
  operationName: string,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(operationName, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), expiry]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
