/**
 * WebSocket connector for the dedbg protocol.
 *
 * Opens one `ws` connection per attempt with the configured sub-protocol,
 * HTTP Basic credentials on the handshake and a receive limit. Incoming
 * messages are bridged into a {@link FrameQueue} consumed by the lifecycle
 * loop.
 * @public
 */

import WebSocket from 'ws';
import { CancelledError, SessionError, createLogger, type Logger } from '@dedbg/core';
import { FrameQueue } from './frame-queue.js';
import type {
  ConnectOptions,
  Credentials,
  DebugConnection,
  DebugConnector,
  InboundFrame,
} from './types.js';

/** ws error code for a message above `maxPayload` */
const MESSAGE_LENGTH_ERROR = 'WS_ERR_UNSUPPORTED_MESSAGE_LENGTH';

/** Close codes that end the stream without a failure */
const NORMAL_CLOSE_CODES: ReadonlySet<number> = new Set([1000, 1001]);

export function basicAuthorization(credentials: Credentials): string {
  const token = Buffer.from(`${credentials.username}:${credentials.password}`, 'utf8');
  return `Basic ${token.toString('base64')}`;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function cancelledBy(signal: AbortSignal): CancelledError {
  const reason: unknown = signal.reason;
  return reason instanceof CancelledError ? reason : new CancelledError('aborted');
}

/**
 * A connected `ws` socket.
 * @internal
 */
class WebSocketDebugConnection implements DebugConnection {
  private readonly queue = new FrameQueue<InboundFrame>();
  private closeRequested = false;

  public constructor(
    private readonly ws: WebSocket,
    private readonly maxPayload: number,
    private readonly logger: Logger,
  ) {
    ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      this.queue.push(
        isBinary ? { kind: 'binary' } : { kind: 'text', data: rawDataToString(data), final: true },
      );
    });
    ws.on('close', (code: number, reason: Buffer) => this.handleClose(code, reason));
    ws.on('error', (error: Error) => this.handleError(error));
  }

  public get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  public send(text: string): Promise<void> {
    if (!this.isOpen) {
      return Promise.reject(SessionError.disconnected());
    }
    return new Promise<void>((resolve, reject) => {
      this.ws.send(text, (error?: Error) => {
        if (error) {
          reject(SessionError.sendFailed(error));
        } else {
          resolve();
        }
      });
    });
  }

  public frames(signal: AbortSignal): AsyncIterable<InboundFrame> {
    return this.queue.iterate(signal);
  }

  public close(code: number, reason: string): void {
    this.closeRequested = true;
    this.logger.debug({ code, reason }, 'closing connection');
    this.ws.close(code, reason);
  }

  public terminate(): void {
    this.closeRequested = true;
    this.ws.terminate();
    this.queue.end();
  }

  private handleClose(code: number, reason: Buffer): void {
    const text = reason.toString('utf8');
    this.logger.debug({ code, reason: text }, 'connection closed');
    if (this.closeRequested || NORMAL_CLOSE_CODES.has(code)) {
      this.queue.end();
    } else {
      this.queue.fail(SessionError.connectionReset(code, text));
    }
  }

  private handleError(error: Error): void {
    this.logger.debug({ err: error }, 'connection error');
    this.queue.fail(
      errorCode(error) === MESSAGE_LENGTH_ERROR
        ? SessionError.messageTooLarge(this.maxPayload)
        : SessionError.connectionError(error),
    );
  }
}

/**
 * Connector backed by the `ws` package.
 * @example
 * ```typescript
 * const connector = new WebSocketConnector();
 * const connection = await connector.connect('ws://localhost:8080/dbg', {
 *   subProtocol: 'dedbg',
 *   maxPayload: 1 << 20,
 *   handshakeTimeoutMs: 30000,
 *   signal: AbortSignal.timeout(60000),
 * });
 * ```
 * @public
 */
export class WebSocketConnector implements DebugConnector {
  private readonly logger: Logger;

  public constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('session:websocket');
  }

  public connect(url: string, options: ConnectOptions): Promise<DebugConnection> {
    const { signal } = options;
    if (signal.aborted) {
      return Promise.reject(cancelledBy(signal));
    }

    return new Promise<DebugConnection>((resolve, reject) => {
      const headers: Record<string, string> = {};
      if (options.credentials) {
        headers.Authorization = basicAuthorization(options.credentials);
      }

      this.logger.info({ url, headers }, 'connecting');
      const ws = new WebSocket(url, [options.subProtocol], {
        headers,
        maxPayload: options.maxPayload,
        handshakeTimeout: options.handshakeTimeoutMs,
      });

      const cleanup = (): void => {
        signal.removeEventListener('abort', onAbort);
        ws.removeListener('open', onOpen);
        ws.removeListener('error', onError);
        // terminate() during the handshake emits one more error
        ws.on('error', onLateError);
      };
      const onLateError = (error: Error): void => {
        this.logger.debug({ url, err: error }, 'error after connect attempt ended');
      };
      const onOpen = (): void => {
        cleanup();
        ws.removeListener('error', onLateError);
        this.logger.info({ url, protocol: ws.protocol }, 'connected');
        resolve(new WebSocketDebugConnection(ws, options.maxPayload, this.logger));
      };
      const onError = (error: Error): void => {
        cleanup();
        this.logger.warn({ url, err: error }, 'connect failed');
        ws.terminate();
        reject(SessionError.connectionFailed(url, error));
      };
      const onAbort = (): void => {
        cleanup();
        ws.terminate();
        reject(cancelledBy(signal));
      };

      ws.once('open', onOpen);
      ws.once('error', onError);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
