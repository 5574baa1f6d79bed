/**
 * Coalesces concurrent calls for the same key into one underlying operation.
 *
 * The first caller for a key starts the operation; everyone arriving while it
 * is pending attaches to the same promise. A caller's AbortSignal only ends
 * that caller's wait - the shared operation keeps running for the others.
 */
export class SingleFlight<T> {
  private inFlight: Map<string, Promise<T>> = new Map();

  run(key: string, operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let pending = this.inFlight.get(key);

    if (!pending) {
      pending = operation().finally(() => {
        this.inFlight.delete(key);
      });
      this.inFlight.set(key, pending);
    }

    return signal ? detachable(pending, signal) : pending;
  }

  isInFlight(key: string): boolean {
    return this.inFlight.has(key);
  }
}

function detachable<T>(shared: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    // Keep the shared promise observed even though this caller leaves
    shared.catch(() => undefined);
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });

    shared.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
