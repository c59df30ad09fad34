/**
 * Abort signal plumbing for store calls
 */

/**
 * Run a store operation under an optional AbortSignal.
 * Rejects with the signal's reason if it is already aborted or aborts before the operation settles.
 * An operation that has started keeps running after the abort; only its result is dropped.
 */
export function withSignal<T>(signal: AbortSignal | undefined, run: () => Promise<T>): Promise<T> {
  if (!signal) return run();
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });

    run().then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
