/**
 * Session-specific error codes for the failures a debug session can surface.
 */
export enum SessionErrorCode {
  DISCONNECTED = 'disconnected',
  CONNECTION_FAILED = 'connection_failed',
  PROTOCOL_ERROR = 'protocol_error',
  MESSAGE_TOO_LARGE = 'message_too_large',
  INVALID_URL = 'invalid_url',
  INVALID_CONFIG = 'invalid_config',
  SEND_FAILED = 'send_failed',
}

/**
 * Reads the native error code of a socket-level failure (`ECONNREFUSED`,
 * `ENOTFOUND`, ...), if the error carries one.
 * @internal
 */
function nativeCode(error: Error | undefined): string | undefined {
  if (!error || !('code' in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === 'string' || typeof code === 'number'
    ? String(code)
    : undefined;
}

/**
 * Error class for session and transport failures.
 *
 * `signature` identifies a failure for deduplication: two failures with the
 * same signature are reported only once in a row by the connection loop.
 */
export class SessionError extends Error {
  public readonly code: SessionErrorCode;
  public readonly signature: string;
  public readonly cause?: Error;

  public constructor(
    message: string,
    code: SessionErrorCode,
    cause?: Error,
    signature?: string,
  ) {
    super(message);
    this.name = 'SessionError';
    this.code = code;
    this.cause = cause;
    this.signature =
      signature ?? `${code}:${nativeCode(cause) ?? cause?.message ?? message}`;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, SessionError.prototype);
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   * @returns JSON object containing error details
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      signature: this.signature,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  public static disconnected(): SessionError {
    return new SessionError(
      'Debug session is disconnected',
      SessionErrorCode.DISCONNECTED,
    );
  }

  public static connectionFailed(url: string, c?: Error): SessionError {
    const detail = c ? `: ${c.message}` : '';
    return new SessionError(
      `Failed to connect to ${url}${detail}`,
      SessionErrorCode.CONNECTION_FAILED,
      c,
    );
  }

  public static connectionReset(code: number, reason: string): SessionError {
    const suffix = reason ? `: ${reason}` : '';
    return new SessionError(
      `Connection closed with code ${code}${suffix}`,
      SessionErrorCode.CONNECTION_FAILED,
      undefined,
      `${SessionErrorCode.CONNECTION_FAILED}:close-${code}`,
    );
  }

  public static connectionError(c: Error): SessionError {
    return new SessionError(
      `Connection error: ${c.message}`,
      SessionErrorCode.CONNECTION_FAILED,
      c,
    );
  }

  public static protocolError(m: string, c?: Error): SessionError {
    return new SessionError(
      `Protocol error: ${m}`,
      SessionErrorCode.PROTOCOL_ERROR,
      c,
    );
  }

  public static messageTooLarge(limit: number): SessionError {
    return new SessionError(
      `Message exceeds the receive buffer of ${limit} bytes`,
      SessionErrorCode.MESSAGE_TOO_LARGE,
    );
  }

  public static invalidUrl(u: string, c?: Error): SessionError {
    return new SessionError(
      `Invalid URL: ${u}`,
      SessionErrorCode.INVALID_URL,
      c,
    );
  }

  public static invalidConfig(m: string, c?: Error): SessionError {
    return new SessionError(
      `Invalid session configuration: ${m}`,
      SessionErrorCode.INVALID_CONFIG,
      c,
    );
  }

  public static sendFailed(c: Error): SessionError {
    return new SessionError(
      `Send failed: ${c.message}`,
      SessionErrorCode.SEND_FAILED,
      c,
    );
  }
}
