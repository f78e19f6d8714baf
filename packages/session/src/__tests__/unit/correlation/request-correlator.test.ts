import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { CancellationScope, CancelledError, RemoteFault } from '@dedbg/core';
import { RequestCorrelator, type Transmit } from '../../../correlation/index.js';
import {
  createExecuteEnvelope,
  createUseEnvelope,
  element,
  getAttribute,
  parseDocument,
} from '../../../protocol/index.js';

describe('RequestCorrelator', () => {
  let correlator: RequestCorrelator;
  let onUseReply: Mock<(nodePath: string) => void>;
  let sent: string[];
  let transmit: Transmit;
  let scope: CancellationScope;

  beforeEach(() => {
    onUseReply = vi.fn<(nodePath: string) => void>();
    correlator = new RequestCorrelator({ onUseReply });
    sent = [];
    transmit = (text) => {
      sent.push(text);
      return Promise.resolve();
    };
    scope = CancellationScope.root();
  });

  it('should stamp a token and resolve with the matching reply', async () => {
    const pending = correlator.request(createExecuteEnvelope('1'), transmit, scope.createChild());

    expect(sent).toHaveLength(1);
    expect(getAttribute(parseDocument(sent[0]), 'token')).toBe('1');
    expect(correlator.pendingCount).toBe(1);

    const reply = element('return', { token: '1' });
    correlator.dispatch(reply);

    await expect(pending).resolves.toBe(reply);
    expect(correlator.pendingCount).toBe(0);
  });

  it('should settle replies off the dispatching call', async () => {
    const settled = vi.fn();
    const pending = correlator.request(createExecuteEnvelope('1'), transmit, scope.createChild());
    void pending.then(settled);

    correlator.dispatch(element('return', { token: '1' }));
    await Promise.resolve();
    expect(settled).not.toHaveBeenCalled();

    await pending;
    expect(settled).toHaveBeenCalledTimes(1);
  });

  it('should fail a request with a RemoteFault on exception replies', async () => {
    const pending = correlator.request(createExecuteEnvelope('x'), transmit, scope.createChild());

    correlator.dispatch(element('exception', { token: '1', message: 'bad' }));

    await expect(pending).rejects.toBeInstanceOf(RemoteFault);
  });

  it('should cancel a request with its scope', async () => {
    const requestScope = scope.createChild();
    const pending = correlator.request(createExecuteEnvelope('x'), transmit, requestScope);

    scope.cancel('disconnected');

    const error = await pending.catch((failure: unknown) => failure);
    expect(error).toBeInstanceOf(CancelledError);
    expect(error).toMatchObject({ reason: 'disconnected' });
    expect(correlator.pendingCount).toBe(0);

    correlator.dispatch(element('return', { token: '1' }));
    expect(correlator.pendingCount).toBe(0);
  });

  it('should reject without sending when the scope is already cancelled', async () => {
    const requestScope = scope.createChild();
    requestScope.cancel('timeout');

    await expect(
      correlator.request(createExecuteEnvelope('x'), transmit, requestScope),
    ).rejects.toMatchObject({ reason: 'timeout' });
    expect(sent).toHaveLength(0);
  });

  it('should unregister before reporting a transmission failure', async () => {
    let pendingAtFailure = -1;
    const failing: Transmit = () => {
      throw new Error('write after end');
    };

    const pending = correlator.request(createExecuteEnvelope('x'), failing, scope.createChild());
    const error = await pending.catch((failure: unknown) => {
      pendingAtFailure = correlator.pendingCount;
      return failure;
    });

    expect(error).toMatchObject({ code: 'send_failed', message: 'Send failed: write after end' });
    expect(pendingAtFailure).toBe(0);
  });

  it('should post without registering a waiter', async () => {
    const token = await correlator.post(createUseEnvelope('/app'), transmit);

    expect(token).toBe(1);
    expect(correlator.pendingCount).toBe(0);
    expect(getAttribute(parseDocument(sent[0]), 'node')).toBe('/app');
  });

  it('should route the in-flight use reply to the use handler', async () => {
    const token = await correlator.post(createUseEnvelope('/app'), transmit);
    correlator.expectUseReply(token);

    const pending = correlator.request(createExecuteEnvelope('x'), transmit, scope.createChild());
    expect(getAttribute(parseDocument(sent[1]), 'token')).toBe('2');

    correlator.dispatch(element('use', { token: '1', node: '/app' }));
    expect(onUseReply).toHaveBeenCalledWith('/app');
    expect(correlator.inFlightUseToken).toBeNull();

    correlator.dispatch(element('return', { token: '2' }));
    await expect(pending).resolves.toMatchObject({ name: 'return' });
  });

  it('should reset the use path to the root on a faulted use reply', () => {
    correlator.expectUseReply(5);

    correlator.dispatch(element('exception', { token: '5' }));

    expect(onUseReply).toHaveBeenCalledWith('/');
  });

  it('should ignore notifications and unknown tokens', () => {
    correlator.dispatch(element('event', { token: '0' }));
    correlator.dispatch(element('return', { token: '99' }));

    expect(onUseReply).not.toHaveBeenCalled();
    expect(correlator.pendingCount).toBe(0);
  });
});
