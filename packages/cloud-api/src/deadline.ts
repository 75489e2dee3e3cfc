import { FetchTimeoutError } from '@cloudctl/shared';

export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

/**
 * Runs `operation` with an abort signal that fires after `timeoutMs`.
 * Rejects with FetchTimeoutError at the deadline even when the operation
 * ignores its signal.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  name: string,
  operation: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new FetchTimeoutError(name, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
