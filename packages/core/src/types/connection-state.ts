/**
 * States of a session's connection lifecycle loop.
 */
export enum ConnectionState {
  Disconnected = 'disconnected',
  Connecting = 'connecting',
  Open = 'open',
  Disposed = 'disposed',
}

export interface ConnectionStateChange {
  from: ConnectionState;
  to: ConnectionState;
  retryCount: number;
  nextRetryDelay?: number;
  error?: Error;
}

export interface ReconnectionConfig {
  /** Delay before the first retry (default: 1000) */
  initialDelayMs?: number;
  /** Upper bound of the retry delay (default: 30000) */
  maxDelayMs?: number;
  /** Growth factor between retries (default: 2) */
  backoffMultiplier?: number;
  /** Random spread as a fraction of the delay (default: 0.25) */
  jitter?: number;
}
