import { CollectTimeoutError } from "@diffscribe/model";

/**
 * Run `work` with an abort signal that fires after `timeoutMs`. When the
 * deadline passes first the returned promise rejects with
 * CollectTimeoutError, whatever `work` does afterwards.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const expired = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new CollectTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    // race() subscribes to both, so a late rejection from `work` is handled
    return await Promise.race([work(controller.signal), expired]);
  } finally {
    clearTimeout(timeoutId);
  }
}
