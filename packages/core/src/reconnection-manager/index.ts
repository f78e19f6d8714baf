import {
  ConnectionState,
  type ConnectionStateChange,
  type ReconnectionConfig,
} from '../types/index.js';

/**
 * Tracks connection state transitions and spaces out reconnection attempts
 * with exponential backoff and jitter.
 *
 * Retries are unlimited: the debug session keeps trying until it is disposed.
 * The retry count resets on every successful connection.
 * @example
 * ```typescript
 * const manager = new ReconnectionManager({
 *   initialDelayMs: 1000,
 *   maxDelayMs: 30000,
 * });
 *
 * manager.onStateChange((event) => {
 *   console.log(`Connection: ${event.from} -> ${event.to}`);
 * });
 *
 * manager.onConnecting();
 * try {
 *   await connectToServer();
 *   manager.onConnected();
 * } catch (error) {
 *   manager.onDisconnected(error as Error);
 *   await manager.waitBeforeRetry(signal);
 * }
 * ```
 * @public
 */
export class ReconnectionManager {
  private retryCount = 0;
  private currentState = ConnectionState.Disconnected;
  private retryTimeout?: NodeJS.Timeout;
  private config: {
    initialDelay: number;
    maxDelay: number;
    backoffMultiplier: number;
    jitter: number;
  };
  private stateChangeHandlers: ((event: ConnectionStateChange) => void)[] = [];

  public constructor(config: ReconnectionConfig = {}) {
    this.config = {
      initialDelay: config.initialDelayMs ?? 1000,
      maxDelay: config.maxDelayMs ?? 30000,
      backoffMultiplier: config.backoffMultiplier ?? 2,
      jitter: config.jitter ?? 0.25,
    };
  }

  public get state(): ConnectionState {
    return this.currentState;
  }

  public get currentRetryCount(): number {
    return this.retryCount;
  }

  private setState(newState: ConnectionState, error?: Error, nextRetryDelay?: number): void {
    const from = this.currentState;
    if (from === ConnectionState.Disposed) {
      return;
    }
    this.currentState = newState;

    const event: ConnectionStateChange = {
      from,
      to: newState,
      retryCount: this.retryCount,
      error,
      nextRetryDelay,
    };

    this.stateChangeHandlers.forEach((handler) => handler(event));
  }

  /**
   * Computes the delay before the next retry.
   * @internal
   */
  public calculateNextDelay(): number {
    const baseDelay = Math.min(
      this.config.initialDelay * Math.pow(this.config.backoffMultiplier, this.retryCount),
      this.config.maxDelay,
    );

    // Add jitter: ±25% by default
    const jitterAmount = baseDelay * this.config.jitter;
    const jitter = (Math.random() - 0.5) * 2 * jitterAmount;

    return Math.max(0, Math.round(baseDelay + jitter));
  }

  /**
   * Signals that a connection attempt is starting.
   * @public
   */
  public onConnecting(): void {
    this.setState(ConnectionState.Connecting);
  }

  /**
   * Signals that the connection is open. Resets the retry count.
   * @public
   */
  public onConnected(): void {
    this.retryCount = 0;
    this.setState(ConnectionState.Open);
  }

  /**
   * Signals that a connection attempt failed or an open connection was lost.
   * @param error - Optional error describing the disconnection
   * @public
   */
  public onDisconnected(error?: Error): void {
    this.setState(ConnectionState.Disconnected, error);
  }

  /**
   * Terminal transition. No further state changes are reported.
   * @public
   */
  public onDisposed(): void {
    this.setState(ConnectionState.Disposed);
  }

  /**
   * Waits the backoff delay before the next attempt and counts the retry.
   * @param signal - Aborts the wait early
   * @returns `false` when the wait was aborted
   * @public
   */
  public async waitBeforeRetry(signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) {
      return false;
    }

    // Calculate delay BEFORE incrementing retry count so first attempt uses backoff^0
    const nextDelay = this.calculateNextDelay();
    this.retryCount++;
    this.setState(ConnectionState.Disconnected, undefined, nextDelay);

    return new Promise<boolean>((resolve) => {
      const onAbort = (): void => {
        clearTimeout(this.retryTimeout);
        resolve(false);
      };
      this.retryTimeout = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve(true);
      }, nextDelay);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Registers a state change handler.
   * @param handler - Callback invoked on each state transition
   * @public
   */
  public onStateChange(handler: (event: ConnectionStateChange) => void): void {
    this.stateChangeHandlers.push(handler);
  }
}
