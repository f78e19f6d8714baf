/**
 * A failure reported by the debug server as a reply, not as a transport error.
 *
 * `stack` is replaced by the server's stack trace when one was sent.
 */
export class RemoteFault extends Error {
  public readonly exceptionType: string;
  public readonly remoteStackTrace?: string;

  public constructor(
    message: string,
    exceptionType: string,
    remoteStackTrace?: string,
  ) {
    super(message);
    this.name = 'RemoteFault';
    this.exceptionType = exceptionType;
    this.remoteStackTrace = remoteStackTrace;
    if (remoteStackTrace !== undefined) {
      this.stack = remoteStackTrace;
    }

    Object.setPrototypeOf(this, RemoteFault.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      exceptionType: this.exceptionType,
      remoteStackTrace: this.remoteStackTrace,
    };
  }
}
