// packages/core/src/engine/cancellation.ts — Cooperative cancellation for runs and fork branches

export class CancellationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CancellationError';
  }
}

export class CancellationToken {
  private cancelled = false;
  private reason = 'Operation was cancelled';
  private callbacks = new Set<() => void>();
  private readonly controller = new AbortController();

  /** Signal cancellation. Idempotent; the first reason sticks. */
  cancel(reason?: string): void {
    if (this.cancelled) return;
    this.cancelled = true;
    if (reason) this.reason = reason;
    this.controller.abort(new CancellationError(this.reason));
    for (const cb of [...this.callbacks]) cb();
    this.callbacks.clear();
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** Aborts together with this token; hand it to clients that accept a signal. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Throw if already cancelled. Call before starting expensive work. */
  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new CancellationError(this.reason);
    }
  }

  /**
   * Register a callback to run on cancellation.
   * If already cancelled, the callback fires immediately.
   */
  onCancel(callback: () => void): void {
    if (this.cancelled) {
      callback();
      return;
    }
    this.callbacks.add(callback);
  }

  offCancel(callback: () => void): void {
    this.callbacks.delete(callback);
  }

  /**
   * Settle with `promise`, or reject with CancellationError as soon as the token
   * is cancelled. The abandoned promise is left to settle on its own.
   */
  race<T>(promise: Promise<T>): Promise<T> {
    if (this.cancelled) {
      promise.catch(() => undefined);
      return Promise.reject(new CancellationError(this.reason));
    }
    return new Promise<T>((resolve, reject) => {
      const onCancel = () => reject(new CancellationError(this.reason));
      this.callbacks.add(onCancel);
      promise.then(
        (value) => {
          this.callbacks.delete(onCancel);
          resolve(value);
        },
        (error: unknown) => {
          this.callbacks.delete(onCancel);
          reject(error);
        },
      );
    });
  }

  /** A token that is cancelled whenever this one is, but can also be cancelled alone. */
  child(): CancellationToken {
    const child = new CancellationToken();
    const forward = () => child.cancel(this.reason);
    this.onCancel(forward);
    child.onCancel(() => this.offCancel(forward));
    return child;
  }
}
