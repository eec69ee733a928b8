export const abortReason = (signal: AbortSignal): Error =>
  signal.reason instanceof Error ? signal.reason : new Error(String(signal.reason ?? 'aborted'));

/**
 * Single-assignment slot handed to a caller that has to wait. Settling twice is a
 * no-op; an abort removes the waiter from its owner through `onAbort` and rejects
 * with the signal's reason.
 */
export class Waiter<T> {
  readonly promise: Promise<T>;
  private resolveFn: (value: T) => void = () => {};
  private rejectFn: (reason: unknown) => void = () => {};
  private detach: () => void = () => {};
  private done = false;

  constructor(signal?: AbortSignal, onAbort?: () => void) {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolveFn = resolve;
      this.rejectFn = reject;
    });

    if (!signal) return;
    const listener = () => {
      onAbort?.();
      this.reject(abortReason(signal));
    };
    signal.addEventListener('abort', listener, { once: true });
    this.detach = () => signal.removeEventListener('abort', listener);
  }

  get settled() {
    return this.done;
  }

  resolve(value: T) {
    if (this.done) return;
    this.done = true;
    this.detach();
    this.resolveFn(value);
  }

  reject(reason: unknown) {
    if (this.done) return;
    this.done = true;
    this.detach();
    this.rejectFn(reason);
  }
}

export const removeWaiter = <T>(list: T[], item: T) => {
  const index = list.indexOf(item);
  if (index >= 0) list.splice(index, 1);
};

export const raceSignal = <T>(promise: Promise<T>, signal: AbortSignal): Promise<T> => {
  if (signal.aborted) return Promise.reject(abortReason(signal));
  const waiter = new Waiter<T>(signal);
  void promise.then(
    (value) => waiter.resolve(value),
    (error: unknown) => waiter.reject(error),
  );
  return waiter.promise;
};
