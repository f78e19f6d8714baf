import { CancelledError, type CancellationReason } from '../errors/index.js';

type CancelListener = (reason: CancellationReason) => void;

/**
 * Hierarchical cancellation built on AbortController.
 *
 * A scope is cancelled explicitly, by its parent, by a linked external
 * signal or by its own timeout. Cancelling a scope cancels every descendant
 * with the same reason; cancelling a child never touches the parent.
 *
 * The session owns the root scope, each physical connection owns a child of
 * it, and each request owns a child of its connection scope.
 * @example
 * ```typescript
 * const session = CancellationScope.root();
 * const connection = session.createChild();
 * const request = connection.withTimeout(5000);
 *
 * request.onCancel((reason) => console.log('cancelled:', reason));
 * connection.cancel('disconnected'); // logs "cancelled: disconnected"
 * ```
 * @public
 */
export class CancellationScope {
  private readonly controller = new AbortController();
  private readonly detachers: (() => void)[] = [];
  private readonly listeners = new Set<CancelListener>();
  private timer: NodeJS.Timeout | null = null;
  private cancelReason: CancellationReason | null = null;

  private constructor() {}

  /**
   * Creates a scope with no parent.
   */
  public static root(): CancellationScope {
    return new CancellationScope();
  }

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public get isCancelled(): boolean {
    return this.cancelReason !== null;
  }

  public get reason(): CancellationReason | null {
    return this.cancelReason;
  }

  /**
   * Creates a child that is cancelled whenever this scope is.
   */
  public createChild(): CancellationScope {
    const child = new CancellationScope();
    child.attachTo(this);
    return child;
  }

  /**
   * Creates a child that is additionally cancelled, with reason `aborted`,
   * when the external signal fires.
   * @param signal - Caller-supplied signal
   */
  public linkedWith(signal: AbortSignal): CancellationScope {
    const child = this.createChild();
    if (signal.aborted) {
      child.cancel('aborted');
      return child;
    }

    const onAbort = (): void => child.cancel('aborted');
    signal.addEventListener('abort', onAbort, { once: true });
    child.detachers.push(() => signal.removeEventListener('abort', onAbort));
    return child;
  }

  /**
   * Creates a child that cancels itself with reason `timeout` after `ms`.
   * @param ms - Timeout in milliseconds
   */
  public withTimeout(ms: number): CancellationScope {
    const child = this.createChild();
    if (!child.isCancelled) {
      child.timer = setTimeout(() => child.cancel('timeout'), ms);
    }
    return child;
  }

  /**
   * Registers a cancellation listener. Runs synchronously when the scope is
   * already cancelled.
   * @returns Function removing the listener
   */
  public onCancel(listener: CancelListener): () => void {
    if (this.cancelReason !== null) {
      listener(this.cancelReason);
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Cancels this scope and its descendants. Later calls are no-ops.
   */
  public cancel(reason: CancellationReason): void {
    if (this.cancelReason !== null) {
      return;
    }
    this.cancelReason = reason;
    this.release();

    const listeners = [...this.listeners];
    this.listeners.clear();
    this.controller.abort(new CancelledError(reason));
    for (const listener of listeners) {
      listener(reason);
    }
  }

  /**
   * Detaches the scope from its parent, external signal and timer without
   * cancelling it. Used once the work bound to the scope has completed.
   */
  public dispose(): void {
    this.release();
    this.listeners.clear();
  }

  private attachTo(parent: CancellationScope): void {
    if (parent.cancelReason !== null) {
      this.cancel(parent.cancelReason);
      return;
    }
    const onParentCancel = (reason: CancellationReason): void => {
      this.cancel(reason);
    };
    const detach = parent.onCancel(onParentCancel);
    this.detachers.push(detach);
  }

  private release(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    for (const detach of this.detachers.splice(0)) {
      detach();
    }
  }
}
