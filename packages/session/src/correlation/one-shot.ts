import { CancelledError, type CancellationReason } from '@dedbg/core';

/**
 * Result channel that settles exactly once. The first of `resolve`, `fail`
 * and `cancel` wins; later calls return `false` and change nothing.
 */
export class OneShot<T> {
  public readonly promise: Promise<T>;
  private settled = false;
  private settleListeners: (() => void)[] = [];
  private readonly resolvePromise: (value: T) => void;
  private readonly rejectPromise: (error: Error) => void;

  public constructor() {
    let resolvePromise: (value: T) => void = () => {};
    let rejectPromise: (error: Error) => void = () => {};
    this.promise = new Promise<T>((resolve, reject) => {
      resolvePromise = resolve;
      rejectPromise = reject;
    });
    this.resolvePromise = resolvePromise;
    this.rejectPromise = rejectPromise;
  }

  public get isSettled(): boolean {
    return this.settled;
  }

  public resolve(value: T): boolean {
    if (!this.markSettled()) {
      return false;
    }
    this.resolvePromise(value);
    return true;
  }

  public fail(error: Error): boolean {
    if (!this.markSettled()) {
      return false;
    }
    this.rejectPromise(error);
    return true;
  }

  public cancel(reason: CancellationReason): boolean {
    return this.fail(new CancelledError(reason));
  }

  /**
   * Runs once the channel settles, synchronously before the promise
   * continuations.
   */
  public onSettled(listener: () => void): void {
    if (this.settled) {
      listener();
      return;
    }
    this.settleListeners.push(listener);
  }

  private markSettled(): boolean {
    if (this.settled) {
      return false;
    }
    this.settled = true;
    for (const listener of this.settleListeners.splice(0)) {
      listener();
    }
    return true;
  }
}
