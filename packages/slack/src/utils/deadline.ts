import { OperationCancelledError, ThreadSageError } from '../types/errors.js';

export interface Deadline {
  /** Aborts when the timer fires or the parent signal aborts */
  signal: AbortSignal;
  /** True once the timer (not the parent) caused the abort */
  readonly timedOut: boolean;
  dispose(): void;
}

/**
 * Combine an optional caller signal with a timeout into one AbortSignal.
 * Always call dispose() so the timer and listener are released.
 */
export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let timedOut = false;

  const onParentAbort = () => controller.abort(parent?.reason);

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new Error(`Deadline of ${timeoutMs}ms exceeded`));
  }, timeoutMs);

  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    get timedOut() {
      return timedOut;
    },
    dispose() {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Settle with the promise, or reject as soon as the signal aborts.
 * The losing promise keeps running but its result is ignored.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal, onAbort: () => ThreadSageError): Promise<T> {
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(onAbort());
  }

  return new Promise<T>((resolve, reject) => {
    const abort = () => reject(onAbort());
    signal.addEventListener('abort', abort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', abort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', abort);
        reject(error);
      }
    );
  });
}

export function throwIfCancelled(signal: AbortSignal | undefined, what: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(`${what} cancelled`);
  }
}
