/**
 * Abort signal plumbing shared by the single-shot and streaming paths.
 */

/** A controller whose signal follows every source signal */
export interface LinkedAbort {
  readonly signal: AbortSignal;
  /** Aborts the linked signal directly */
  abort(reason?: unknown): void;
  /** Detaches from the source signals */
  dispose(): void;
}

/**
 * Links several optional signals into one.
 *
 * The result aborts as soon as any source aborts, with that source's reason.
 */
export function linkSignals(...sources: Array<AbortSignal | undefined>): LinkedAbort {
  const controller = new AbortController();
  const detach: Array<() => void> = [];

  for (const source of sources) {
    if (!source) continue;
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = (): void => controller.abort(source.reason);
    source.addEventListener('abort', onAbort, { once: true });
    detach.push(() => source.removeEventListener('abort', onAbort));
  }

  return {
    signal: controller.signal,
    abort(reason?: unknown): void {
      controller.abort(reason);
    },
    dispose(): void {
      for (const fn of detach.splice(0)) fn();
    },
  };
}

/**
 * Starts a timer that aborts the returned signal after `ms`.
 */
export function startTimeout(ms: number): { signal: AbortSignal; clear(): void } {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), ms);
  return {
    signal: controller.signal,
    clear(): void {
      clearTimeout(timeoutId);
    },
  };
}

/**
 * Reads the next chunk, rejecting early with the signal's reason on abort.
 */
export function readWithAbort<T>(
  reader: ReadableStreamDefaultReader<T>,
  signal: AbortSignal
): Promise<ReadableStreamReadResult<T>> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    reader.read().then(
      result => {
        signal.removeEventListener('abort', onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Settles with `promise`, or rejects with the signal's reason if it aborts first.
 */
export function withAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
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
