import {
  CancelledError,
  SessionError,
  createLogger,
  type CancellationScope,
  type Logger,
} from '@dedbg/core';
import {
  NOTIFICATION_TOKEN,
  ROOT_NODE_PATH,
  isExceptionReply,
  readToken,
  remoteFaultFromReply,
  serializeDocument,
  stampToken,
  usePathFromReply,
  type XmlElement,
} from '../protocol/index.js';
import { OneShot } from './one-shot.js';
import { TokenSource } from './token-source.js';

/**
 * Writes one serialized document to the current connection.
 */
export type Transmit = (text: string) => Promise<void>;

export interface RequestCorrelatorOptions {
  /** Receives the node path reported by the reply to the in-flight `use` */
  onUseReply: (nodePath: string) => void;
  logger?: Logger;
  tokens?: TokenSource;
}

/**
 * Matches replies to outstanding requests by token.
 *
 * Each request is bound to a cancellation scope which the correlator owns
 * from the call on: the scope is disposed when the request settles and
 * cancelling it settles the request with a {@link CancelledError}.
 */
export class RequestCorrelator {
  private readonly pending = new Map<number, OneShot<XmlElement>>();
  private readonly tokens: TokenSource;
  private readonly logger: Logger;
  private readonly onUseReply: (nodePath: string) => void;
  private useToken: number | null = null;

  public constructor(options: RequestCorrelatorOptions) {
    this.onUseReply = options.onUseReply;
    this.logger = options.logger ?? createLogger('session:correlator');
    this.tokens = options.tokens ?? new TokenSource();
  }

  public get pendingCount(): number {
    return this.pending.size;
  }

  public get inFlightUseToken(): number | null {
    return this.useToken;
  }

  /**
   * Sends a request and resolves with its reply.
   *
   * Registration and transmission start synchronously. A failed transmission
   * removes the registration before the returned promise rejects.
   */
  public request(
    message: XmlElement,
    transmit: Transmit,
    scope: CancellationScope,
  ): Promise<XmlElement> {
    if (scope.reason !== null) {
      const reason = scope.reason;
      scope.dispose();
      return Promise.reject(new CancelledError(reason));
    }

    const token = this.nextToken();
    const result = new OneShot<XmlElement>();
    this.pending.set(token, result);

    const removeCancelListener = scope.onCancel((reason) => {
      if (result.cancel(reason)) {
        this.logger.debug({ token, reason }, 'request cancelled');
      }
    });
    result.onSettled(() => {
      if (this.pending.get(token) === result) {
        this.pending.delete(token);
      }
      removeCancelListener();
      scope.dispose();
    });

    this.transmit(stampToken(message, token), transmit).catch((error: Error) => {
      this.pending.delete(token);
      result.fail(error);
    });

    this.logger.debug({ token, tag: message.name }, 'request sent');
    return result.promise;
  }

  /**
   * Sends a message without registering a waiter.
   * @returns The token stamped on the message
   */
  public async post(message: XmlElement, transmit: Transmit): Promise<number> {
    const token = this.nextToken();
    await this.transmit(stampToken(message, token), transmit);
    this.logger.debug({ token, tag: message.name }, 'message posted');
    return token;
  }

  /**
   * Routes the reply to the given token to the use-path handler instead of
   * a pending request.
   */
  public expectUseReply(token: number): void {
    this.useToken = token;
  }

  public dispatch(reply: XmlElement): void {
    const token = readToken(reply);
    if (token === NOTIFICATION_TOKEN) {
      this.logger.debug({ tag: reply.name }, 'notification received');
      return;
    }

    if (token === this.useToken) {
      this.useToken = null;
      this.onUseReply(isExceptionReply(reply) ? ROOT_NODE_PATH : usePathFromReply(reply));
      return;
    }

    const entry = this.pending.get(token);
    if (!entry) {
      this.logger.debug({ token, tag: reply.name }, 'reply for unknown token dropped');
      return;
    }
    this.pending.delete(token);

    setImmediate(() => {
      if (isExceptionReply(reply)) {
        entry.fail(remoteFaultFromReply(reply));
      } else {
        entry.resolve(reply);
      }
    });
  }

  private nextToken(): number {
    return this.tokens.next(
      (candidate) => this.pending.has(candidate) || candidate === this.useToken,
    );
  }

  private transmit(envelope: XmlElement, transmit: Transmit): Promise<void> {
    let sent: Promise<void>;
    try {
      sent = transmit(serializeDocument(envelope));
    } catch (error) {
      sent = Promise.reject(error);
    }
    return sent.catch((error: unknown) => {
      if (error instanceof SessionError) {
        throw error;
      }
      throw SessionError.sendFailed(error instanceof Error ? error : new Error(String(error)));
    });
  }
}
