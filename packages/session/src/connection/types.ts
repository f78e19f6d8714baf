/**
 * Username and password sent as HTTP Basic authorization on the handshake.
 * @public
 */
export interface Credentials {
  username: string;
  password: string;
}

/**
 * Supplies credentials before each connect attempt. Returns `undefined` for
 * an anonymous connection.
 * @public
 */
export type CredentialProvider = (
  url: string,
) => Credentials | undefined | Promise<Credentials | undefined>;

/**
 * One received frame. Text frames may be fragments of a larger message;
 * `final` marks the last fragment.
 */
export type InboundFrame =
  | { kind: 'text'; data: string; final: boolean }
  | { kind: 'binary' };

/**
 * One physical, open connection to a debug server.
 */
export interface DebugConnection {
  readonly isOpen: boolean;
  /**
   * Writes one message.
   * @throws SessionError when the connection is not open or the write fails
   */
  send(text: string): Promise<void>;
  /**
   * Received frames in order. Ends when the connection closes or the signal
   * fires; throws on transport failures.
   */
  frames(signal: AbortSignal): AsyncIterable<InboundFrame>;
  /** Starts a graceful close handshake. */
  close(code: number, reason: string): void;
  /** Drops the connection immediately. */
  terminate(): void;
}

export interface ConnectOptions {
  subProtocol: string;
  credentials?: Credentials;
  /** Largest accepted message in bytes */
  maxPayload: number;
  handshakeTimeoutMs: number;
  /** Aborts the attempt */
  signal: AbortSignal;
}

/**
 * Opens connections. The session owns one connector for its lifetime and
 * asks it for a fresh connection on every attempt.
 * @public
 */
export interface DebugConnector {
  /**
   * @throws SessionError with code `connection_failed` when the attempt fails
   * @throws CancelledError when the signal fires first
   */
  connect(url: string, options: ConnectOptions): Promise<DebugConnection>;
}
