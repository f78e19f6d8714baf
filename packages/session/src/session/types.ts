import type { Logger } from '@dedbg/core';
import type { DebugSessionConfigInput } from '../config/index.js';
import type { CredentialProvider, DebugConnector } from '../connection/index.js';

/**
 * Lifecycle hooks of a session. Every hook is optional; a throwing hook is
 * logged and does not stop the connection loop.
 * @public
 */
export interface SessionObserver {
  onConnectionEstablished?(): void;
  onConnectionLost?(): void;
  /**
   * A connect attempt failed. Repeats of the same transport failure are
   * suppressed unless the hook returns `true`.
   */
  onConnectionFailure?(error: Error): boolean | void;
  onCommunicationFault?(error: Error): void;
}

export interface CurrentNodeChangedEvent {
  previous: string | null;
  current: string;
}

/**
 * Events published by {@link DebugSession}.
 * @public
 */
export interface DebugSessionEvents {
  currentNodeChanged: CurrentNodeChangedEvent;
  connectionEstablished: undefined;
  connectionLost: undefined;
  connectionFailure: Error;
  communicationFault: Error;
}

export interface DebugSessionOptions {
  config: DebugSessionConfigInput;
  observer?: SessionObserver;
  credentials?: CredentialProvider;
  /** Defaults to the `ws` connector */
  connector?: DebugConnector;
  logger?: Logger;
}

export interface RequestOptions {
  /** Cancels the wait for the reply with reason `aborted` */
  signal?: AbortSignal;
}
