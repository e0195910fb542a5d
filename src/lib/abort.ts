import { QuotaCancelledError } from './errors';

/**
 * Runs one store round trip bounded by the caller's signal and an optional
 * timeout. The underlying request is not withdrawn on cancel; only the
 * caller stops waiting for it.
 */
export function withCancellation<T>(
  work: () => Promise<T>,
  signal?: AbortSignal,
  timeoutMs?: number,
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new QuotaCancelledError(signal.reason));
  }
  if (!signal && timeoutMs === undefined) {
    return work();
  }

  return new Promise<T>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;
    let settled = false;

    const finish = () => {
      settled = true;
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
    const onAbort = () => {
      if (settled) return;
      finish();
      reject(new QuotaCancelledError(signal?.reason));
    };

    signal?.addEventListener('abort', onAbort, { once: true });
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        if (settled) return;
        finish();
        reject(new QuotaCancelledError(new Error(`store round trip timed out after ${timeoutMs}ms`)));
      }, timeoutMs);
    }

    work().then(
      (value) => {
        if (settled) return;
        finish();
        resolve(value);
      },
      (error: unknown) => {
        if (settled) return;
        finish();
        reject(error);
      },
    );
  });
}
