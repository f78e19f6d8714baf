import {
  CancelledError,
  ReconnectionManager,
  SessionError,
  SessionErrorCode,
  createLogger,
  type CancellationScope,
  type Logger,
} from '@dedbg/core';
import type { DebugSessionConfig } from '../config/index.js';
import type { RequestCorrelator } from '../correlation/index.js';
import {
  ROOT_NODE_PATH,
  createUseEnvelope,
  parseDocument,
  type XmlElement,
} from '../protocol/index.js';
import { ConnectionSlot, type ConnectionHandle } from './connection-slot.js';
import { MessageAssembler } from './message-assembler.js';
import type { CredentialProvider, DebugConnection, DebugConnector } from './types.js';

export const CLOSE_NORMAL = 1000;
export const CLOSE_MESSAGE_TOO_BIG = 1009;

/**
 * Callbacks from the lifecycle loop into the session that owns it.
 */
export interface EngineHost {
  readonly currentNodePath: string | null;
  setCurrentNodePath(nodePath: string): void;
  connectionEstablished(): void;
  connectionLost(): void;
  /** @returns `true` when the failure was handled and should be reported again */
  connectionFailure(error: Error): boolean;
  communicationFault(error: Error): void;
}

export interface ConnectionEngineOptions {
  config: DebugSessionConfig;
  connector: DebugConnector;
  correlator: RequestCorrelator;
  host: EngineHost;
  /** Root scope of the session; cancelling it ends the loop */
  scope: CancellationScope;
  credentials?: CredentialProvider;
  logger?: Logger;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function isTransportFailure(error: Error): error is SessionError {
  return error instanceof SessionError && error.code === SessionErrorCode.CONNECTION_FAILED;
}

function isMessageTooLarge(error: unknown): error is SessionError {
  return error instanceof SessionError && error.code === SessionErrorCode.MESSAGE_TOO_LARGE;
}

/**
 * Background loop keeping one connection open: connect, restore the used
 * node, read replies, tear down and start over until disposed.
 */
export class ConnectionEngine {
  private readonly slot = new ConnectionSlot();
  private readonly reconnection: ReconnectionManager;
  private readonly logger: Logger;
  private loop: Promise<void> | null = null;
  private disposal: Promise<void> | null = null;
  private disposing = false;
  private lastFailureSignature: string | null = null;

  public constructor(private readonly options: ConnectionEngineOptions) {
    this.logger = options.logger ?? createLogger('session:engine');
    this.reconnection = new ReconnectionManager(options.config.reconnect);
    this.reconnection.onStateChange((event) => {
      this.logger.debug(
        {
          from: event.from,
          to: event.to,
          retryCount: event.retryCount,
          nextRetryDelay: event.nextRetryDelay,
        },
        'connection state changed',
      );
    });
  }

  /**
   * The installed connection, `null` while disconnected.
   */
  public get current(): ConnectionHandle | null {
    const handle = this.slot.snapshot;
    return handle && handle.connection.isOpen ? handle : null;
  }

  public start(): void {
    if (this.loop || this.disposing) {
      return;
    }
    this.loop = this.run().catch((error: unknown) => {
      const failure = toError(error);
      this.logger.error({ err: failure }, 'connection loop crashed');
      this.options.host.communicationFault(failure);
    });
  }

  /**
   * Closes the connection, cancels all outstanding work and waits for the
   * loop to end. Safe to call more than once.
   */
  public dispose(): Promise<void> {
    if (!this.disposal) {
      this.disposal = this.shutdown();
    }
    return this.disposal;
  }

  private async shutdown(): Promise<void> {
    this.disposing = true;

    const handle = this.slot.snapshot;
    if (handle && handle.connection.isOpen) {
      try {
        handle.connection.close(CLOSE_NORMAL, 'Done');
      } catch (error) {
        this.logger.warn({ err: toError(error) }, 'graceful close failed');
      }
    }

    this.options.scope.cancel('disposed');
    await this.loop;
    this.reconnection.onDisposed();
    this.logger.info('session disposed');
  }

  private async run(): Promise<void> {
    const { scope } = this.options;
    while (!this.disposing && !scope.isCancelled) {
      const connection = await this.connect();
      if (connection) {
        await this.serve(connection);
        continue;
      }
      if (!(await this.reconnection.waitBeforeRetry(scope.signal))) {
        break;
      }
    }
  }

  private async connect(): Promise<DebugConnection | null> {
    const { config, connector, credentials, scope } = this.options;
    this.reconnection.onConnecting();
    this.logger.info(
      { url: config.url, attempt: this.reconnection.currentRetryCount + 1 },
      'connecting',
    );

    try {
      const connection = await connector.connect(config.url, {
        subProtocol: config.subProtocol,
        credentials: credentials ? await credentials(config.url) : undefined,
        maxPayload: config.maxMessageBytes,
        handshakeTimeoutMs: config.connectTimeoutMs,
        signal: scope.signal,
      });
      if (this.disposing) {
        connection.terminate();
        return null;
      }
      this.lastFailureSignature = null;
      return connection;
    } catch (error) {
      if (this.disposing || scope.isCancelled || error instanceof CancelledError) {
        return null;
      }
      const failure = toError(error);
      this.reconnection.onDisconnected(failure);
      this.reportConnectionFailure(failure);
      return null;
    }
  }

  private reportConnectionFailure(failure: Error): void {
    if (!isTransportFailure(failure)) {
      this.lastFailureSignature = null;
      this.options.host.connectionFailure(failure);
      return;
    }

    if (failure.signature === this.lastFailureSignature) {
      this.logger.debug({ signature: failure.signature }, 'repeated connect failure');
      return;
    }
    if (!this.options.host.connectionFailure(failure)) {
      this.lastFailureSignature = failure.signature;
    }
  }

  private async serve(connection: DebugConnection): Promise<void> {
    const handle: ConnectionHandle = {
      connection,
      scope: this.options.scope.createChild(),
    };
    if (!this.slot.install(handle)) {
      this.logger.error('connection slot already taken');
      connection.terminate();
      handle.scope.cancel('disconnected');
      return;
    }
    this.reconnection.onConnected();
    this.options.host.connectionEstablished();

    try {
      await this.restoreNodePath(connection);
      await this.receive(connection, handle.scope.signal);
    } catch (error) {
      if (isMessageTooLarge(error)) {
        this.closeMessageTooBig(connection);
      } else if (!this.disposing && !(error instanceof CancelledError)) {
        const failure = toError(error);
        this.lastFailureSignature = failure instanceof SessionError ? failure.signature : null;
        this.options.host.communicationFault(failure);
      }
    }

    this.teardown(handle);
  }

  /**
   * Oversized replies end the connection without a fault, whether the
   * reassembly buffer or the transport noticed first.
   */
  private closeMessageTooBig(connection: DebugConnection): void {
    this.logger.warn({ capacity: this.options.config.maxMessageBytes }, 'message too big');
    if (connection.isOpen) {
      connection.close(CLOSE_MESSAGE_TOO_BIG, 'Message too big.');
    }
  }

  private teardown(handle: ConnectionHandle): void {
    if (!this.disposing) {
      this.options.host.connectionLost();
      this.reconnection.onDisconnected();
    }
    handle.scope.cancel(this.disposing ? 'disposed' : 'disconnected');
    this.slot.release(handle);
    if (handle.connection.isOpen) {
      handle.connection.terminate();
    }
    this.logger.debug({ disposing: this.disposing }, 'connection torn down');
  }

  private async restoreNodePath(connection: DebugConnection): Promise<void> {
    const { host, correlator } = this.options;
    const nodePath = host.currentNodePath;
    if (nodePath && nodePath !== ROOT_NODE_PATH) {
      const token = await correlator.post(createUseEnvelope(nodePath), (text) =>
        connection.send(text),
      );
      correlator.expectUseReply(token);
      this.logger.debug({ token, nodePath }, 'restoring used node');
    } else {
      host.setCurrentNodePath(ROOT_NODE_PATH);
    }
  }

  private async receive(connection: DebugConnection, signal: AbortSignal): Promise<void> {
    const assembler = new MessageAssembler(this.options.config.maxMessageBytes);

    for await (const frame of connection.frames(signal)) {
      if (frame.kind === 'binary') {
        continue;
      }

      const text = assembler.append(frame.data, frame.final);
      if (text === null) {
        continue;
      }

      let reply: XmlElement;
      try {
        reply = parseDocument(text);
      } catch (error) {
        this.lastFailureSignature = null;
        this.options.host.communicationFault(toError(error));
        continue;
      }
      this.logger.debug({ tag: reply.name, bytes: text.length }, 'reply received');
      this.options.correlator.dispatch(reply);
    }
  }
}
