import Emittery from 'emittery';
import {
  CancellationScope,
  RemoteFault,
  SessionError,
  createLogger,
  type Logger,
} from '@dedbg/core';
import { resolveSessionConfig, type DebugSessionConfig } from '../config/index.js';
import {
  ConnectionEngine,
  WebSocketConnector,
  type EngineHost,
} from '../connection/index.js';
import { RequestCorrelator } from '../correlation/index.js';
import { parseReturn, type ClientValue } from '../marshalling/index.js';
import {
  ROOT_NODE_PATH,
  createExecuteEnvelope,
  createListEnvelope,
  createMemberEnvelope,
  createUseEnvelope,
  usePathFromReply,
  type XmlElement,
} from '../protocol/index.js';
import { NodePathState } from './node-path-state.js';
import type {
  DebugSessionEvents,
  DebugSessionOptions,
  RequestOptions,
  SessionObserver,
} from './types.js';

/**
 * Client session for a dedbg debug server.
 *
 * Keeps one WebSocket connection open in the background, reconnecting after
 * failures, and restores the used node on every new connection. Requests are
 * only accepted while connected.
 * @example
 * ```typescript
 * const session = new DebugSession({ config: { url: 'ws://localhost:8080/dbg' } });
 * session.start();
 * await session.once('connectionEstablished');
 *
 * await session.use('/app');
 * const [result] = await session.execute('return 1 + 1');
 * console.log(result.name, formatClientValue(result)); // $0 2
 *
 * await session.dispose();
 * ```
 * @public
 */
export class DebugSession {
  private readonly config: DebugSessionConfig;
  private readonly logger: Logger;
  private readonly events = new Emittery<DebugSessionEvents>();
  private readonly nodePath = new NodePathState();
  private readonly scope = CancellationScope.root();
  private readonly observer: SessionObserver;
  private readonly correlator: RequestCorrelator;
  private readonly engine: ConnectionEngine;
  private timeoutMs: number;
  private disposed = false;

  /**
   * @throws SessionError with code `invalid_config` or `invalid_url`
   */
  public constructor(options: DebugSessionOptions) {
    this.config = resolveSessionConfig(options.config);
    this.logger = options.logger ?? createLogger('session');
    this.observer = options.observer ?? {};
    this.timeoutMs = this.config.defaultTimeoutMs;

    this.nodePath.onChange((previous, current) => {
      this.logger.debug({ previous, current }, 'current node changed');
      this.events
        .emit('currentNodeChanged', { previous, current })
        .catch((error: unknown) => this.logListenerFailure('currentNodeChanged', error));
    });

    this.correlator = new RequestCorrelator({
      onUseReply: (nodePath) => {
        this.nodePath.set(nodePath);
      },
      logger: this.logger.child({ component: 'correlator' }),
    });

    this.engine = new ConnectionEngine({
      config: this.config,
      connector:
        options.connector ??
        new WebSocketConnector(this.logger.child({ component: 'websocket' })),
      correlator: this.correlator,
      host: this.createHost(),
      scope: this.scope,
      credentials: options.credentials,
      logger: this.logger.child({ component: 'engine' }),
    });
  }

  public get url(): string {
    return this.config.url;
  }

  public get isConnected(): boolean {
    return this.engine.current !== null;
  }

  public get currentNodePath(): string | null {
    return this.nodePath.current;
  }

  /**
   * Timeout applied to requests made without a signal; `0` waits forever.
   */
  public get defaultTimeoutMs(): number {
    return this.timeoutMs;
  }

  public set defaultTimeoutMs(value: number) {
    this.timeoutMs = Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
  }

  public get pendingRequests(): number {
    return this.correlator.pendingCount;
  }

  /**
   * Starts the background connection loop. Calling it again has no effect.
   */
  public start(): void {
    if (this.disposed) {
      throw SessionError.disconnected();
    }
    this.engine.start();
  }

  /**
   * Closes the connection, cancels every outstanding request and waits for
   * the connection loop to end. No hook or event fires afterwards.
   */
  public async dispose(): Promise<void> {
    this.disposed = true;
    await this.engine.dispose();
    this.events.clearListeners();
  }

  /**
   * Sends a raw envelope and resolves with the raw reply.
   * @throws SessionError `disconnected` synchronously while no connection is open
   */
  public send(message: XmlElement, options: RequestOptions = {}): Promise<XmlElement> {
    const handle = this.disposed ? null : this.engine.current;
    if (!handle) {
      throw SessionError.disconnected();
    }
    const scope = this.requestScope(handle.scope, options.signal);
    return this.correlator.request(message, (text) => handle.connection.send(text), scope);
  }

  /**
   * Selects the node later commands run against.
   * @returns The node path the server switched to
   */
  public use(nodePath: string, options: RequestOptions = {}): Promise<string> {
    return this.send(createUseEnvelope(nodePath), options).then(
      (reply) => {
        const current = usePathFromReply(reply);
        this.nodePath.set(current);
        return current;
      },
      (error: unknown) => {
        if (error instanceof RemoteFault) {
          this.nodePath.set(ROOT_NODE_PATH);
        }
        throw error;
      },
    );
  }

  public execute(command: string, options: RequestOptions = {}): Promise<ClientValue[]> {
    return this.send(createExecuteEnvelope(command), options).then((reply) => parseReturn(reply));
  }

  public listMembers(options: RequestOptions = {}): Promise<ClientValue[]> {
    return this.send(createMemberEnvelope(), options).then((reply) => parseReturn(reply));
  }

  /**
   * Lists the node tree below the current node.
   * @returns The raw reply
   */
  public list(recursive = false, options: RequestOptions = {}): Promise<XmlElement> {
    return this.send(createListEnvelope(recursive), options);
  }

  public on<Name extends keyof DebugSessionEvents>(
    eventName: Name,
    listener: (data: DebugSessionEvents[Name]) => void | Promise<void>,
  ) {
    return this.events.on(eventName, listener);
  }

  public once<Name extends keyof DebugSessionEvents>(eventName: Name) {
    return this.events.once(eventName);
  }

  private requestScope(parent: CancellationScope, signal?: AbortSignal): CancellationScope {
    if (signal) {
      return parent.linkedWith(signal);
    }
    if (this.timeoutMs > 0) {
      return parent.withTimeout(this.timeoutMs);
    }
    return parent.createChild();
  }

  private createHost(): EngineHost {
    const nodePath = this.nodePath;
    return {
      get currentNodePath() {
        return nodePath.current;
      },
      setCurrentNodePath: (value) => {
        nodePath.set(value);
      },
      connectionEstablished: () => {
        this.callObserver('onConnectionEstablished', () =>
          this.observer.onConnectionEstablished?.(),
        );
        this.events
          .emit('connectionEstablished')
          .catch((error: unknown) => this.logListenerFailure('connectionEstablished', error));
      },
      connectionLost: () => {
        this.callObserver('onConnectionLost', () => this.observer.onConnectionLost?.());
        this.events
          .emit('connectionLost')
          .catch((error: unknown) => this.logListenerFailure('connectionLost', error));
      },
      connectionFailure: (error) => {
        this.logger.warn({ err: error }, 'connection failure');
        let handled = false;
        this.callObserver('onConnectionFailure', () => {
          handled = this.observer.onConnectionFailure?.(error) === true;
        });
        this.events
          .emit('connectionFailure', error)
          .catch((failure: unknown) => this.logListenerFailure('connectionFailure', failure));
        return handled;
      },
      communicationFault: (error) => {
        this.logger.warn({ err: error }, 'communication fault');
        this.callObserver('onCommunicationFault', () =>
          this.observer.onCommunicationFault?.(error),
        );
        this.events
          .emit('communicationFault', error)
          .catch((failure: unknown) => this.logListenerFailure('communicationFault', failure));
      },
    };
  }

  private callObserver(hook: keyof SessionObserver, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger.error({ err: error, hook }, 'session observer threw');
    }
  }

  private logListenerFailure(eventName: keyof DebugSessionEvents, error: unknown): void {
    this.logger.error({ err: error, event: eventName }, 'event listener failed');
  }
}
