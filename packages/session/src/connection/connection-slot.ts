import type { CancellationScope } from '@dedbg/core';
import type { DebugConnection } from './types.js';

/**
 * The open connection together with the scope every request on it is bound to.
 */
export interface ConnectionHandle {
  readonly connection: DebugConnection;
  readonly scope: CancellationScope;
}

/**
 * Holds at most one connection handle. Only the lifecycle loop writes it,
 * by compare-and-set; senders read a snapshot.
 */
export class ConnectionSlot {
  private current: ConnectionHandle | null = null;

  public get snapshot(): ConnectionHandle | null {
    return this.current;
  }

  /** @returns `false` when another handle is installed */
  public install(handle: ConnectionHandle): boolean {
    if (this.current !== null) {
      return false;
    }
    this.current = handle;
    return true;
  }

  /** @returns `false` when `expected` is no longer the installed handle */
  public release(expected: ConnectionHandle): boolean {
    if (this.current !== expected) {
      return false;
    }
    this.current = null;
    return true;
  }
}
