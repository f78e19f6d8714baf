/**
 * Why a wait was cancelled.
 * - `aborted`: the caller's own signal fired
 * - `timeout`: the session default timeout elapsed
 * - `disconnected`: the owning connection was torn down
 * - `disposed`: the session was disposed
 */
export type CancellationReason = 'aborted' | 'timeout' | 'disconnected' | 'disposed';

/**
 * Outcome of a cancelled wait. Distinct from both transport errors and
 * remote faults.
 */
export class CancelledError extends Error {
  public readonly reason: CancellationReason;

  public constructor(reason: CancellationReason, message?: string) {
    super(message ?? `Operation cancelled (${reason})`);
    this.name = 'CancelledError';
    this.reason = reason;

    Object.setPrototypeOf(this, CancelledError.prototype);
  }
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}
