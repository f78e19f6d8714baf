/**
 * Tests for CancellationScope - hierarchy, linking and timeouts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CancellationScope } from '../../../cancellation/index.js';
import { CancelledError } from '../../../errors/index.js';

describe('CancellationScope', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts uncancelled', () => {
    const scope = CancellationScope.root();

    expect(scope.isCancelled).toBe(false);
    expect(scope.reason).toBeNull();
    expect(scope.signal.aborted).toBe(false);
  });

  it('aborts its signal with a CancelledError carrying the reason', () => {
    const scope = CancellationScope.root();
    scope.cancel('disconnected');

    expect(scope.signal.aborted).toBe(true);
    expect(scope.signal.reason).toBeInstanceOf(CancelledError);
    expect(scope.signal.reason).toMatchObject({ reason: 'disconnected' });
  });

  it('keeps the first reason when cancelled twice', () => {
    const scope = CancellationScope.root();
    const listener = vi.fn();
    scope.onCancel(listener);

    scope.cancel('timeout');
    scope.cancel('disposed');

    expect(scope.reason).toBe('timeout');
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('timeout');
  });

  it('cancels descendants with the ancestor reason', () => {
    const session = CancellationScope.root();
    const connection = session.createChild();
    const request = connection.createChild();

    session.cancel('disposed');

    expect(connection.reason).toBe('disposed');
    expect(request.reason).toBe('disposed');
  });

  it('does not cancel the parent when a child is cancelled', () => {
    const session = CancellationScope.root();
    const connection = session.createChild();

    connection.cancel('disconnected');

    expect(session.isCancelled).toBe(false);
  });

  it('creates already-cancelled children from a cancelled parent', () => {
    const parent = CancellationScope.root();
    parent.cancel('disconnected');

    expect(parent.createChild().reason).toBe('disconnected');
  });

  it('calls listeners registered after cancellation immediately', () => {
    const scope = CancellationScope.root();
    scope.cancel('aborted');
    const listener = vi.fn();

    scope.onCancel(listener);

    expect(listener).toHaveBeenCalledWith('aborted');
  });

  it('stops notifying a removed listener', () => {
    const scope = CancellationScope.root();
    const listener = vi.fn();
    const remove = scope.onCancel(listener);

    remove();
    scope.cancel('aborted');

    expect(listener).not.toHaveBeenCalled();
  });

  describe('linkedWith', () => {
    it('cancels with reason aborted when the external signal fires', () => {
      const parent = CancellationScope.root();
      const controller = new AbortController();
      const linked = parent.linkedWith(controller.signal);

      controller.abort();

      expect(linked.reason).toBe('aborted');
      expect(parent.isCancelled).toBe(false);
    });

    it('is cancelled at once for an already aborted signal', () => {
      const controller = new AbortController();
      controller.abort();

      const linked = CancellationScope.root().linkedWith(controller.signal);

      expect(linked.reason).toBe('aborted');
    });

    it('still follows its parent', () => {
      const parent = CancellationScope.root();
      const linked = parent.linkedWith(new AbortController().signal);

      parent.cancel('disconnected');

      expect(linked.reason).toBe('disconnected');
    });
  });

  describe('withTimeout', () => {
    it('cancels with reason timeout after the delay', () => {
      const scope = CancellationScope.root().withTimeout(100);

      vi.advanceTimersByTime(99);
      expect(scope.isCancelled).toBe(false);

      vi.advanceTimersByTime(1);
      expect(scope.reason).toBe('timeout');
    });

    it('clears the timer once disposed', () => {
      const scope = CancellationScope.root().withTimeout(100);

      scope.dispose();
      vi.advanceTimersByTime(200);

      expect(scope.isCancelled).toBe(false);
    });
  });

  describe('dispose', () => {
    it('detaches from the parent without cancelling', () => {
      const parent = CancellationScope.root();
      const child = parent.createChild();

      child.dispose();
      parent.cancel('disposed');

      expect(child.isCancelled).toBe(false);
    });
  });
});
