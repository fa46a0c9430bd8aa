/**
 * Helpers for deadlines and cancellable waits built on AbortSignal.
 */

export class DeadlineExceeded extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = 'DeadlineExceeded';
  }
}

export class OperationAborted extends Error {
  constructor(reason?: unknown) {
    super(reason instanceof Error ? reason.message : 'Operation aborted');
    this.name = 'OperationAborted';
  }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new OperationAborted(signal.reason);
}

/**
 * Sleep for the given number of milliseconds, rejecting early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new OperationAborted());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with the promise, or reject as soon as the signal aborts.
 * The underlying promise keeps running; only this caller stops waiting.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(abortReason(signal));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
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

export interface Deadline {
  readonly signal: AbortSignal;
  /** Stop the timer and detach from the parent signal */
  dispose(): void;
}

/**
 * Combine a caller signal with a timeout into one signal
 */
export function createDeadline(parent?: AbortSignal, timeoutMs?: number): Deadline {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer = timeoutMs !== undefined && timeoutMs > 0 && !controller.signal.aborted
    ? setTimeout(() => controller.abort(new DeadlineExceeded(timeoutMs)), timeoutMs)
    : undefined;

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer !== undefined) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  };
}
