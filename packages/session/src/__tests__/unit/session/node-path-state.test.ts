import { describe, expect, it, vi } from 'vitest';
import { NodePathState } from '../../../session/node-path-state.js';

describe('NodePathState', () => {
  it('should notify synchronously on change only', () => {
    const state = new NodePathState();
    const listener = vi.fn();
    state.onChange(listener);

    expect(state.current).toBeNull();
    expect(state.set('/')).toBe(true);
    expect(state.set('/')).toBe(false);
    expect(state.set('/app')).toBe(true);

    expect(listener.mock.calls).toEqual([
      [null, '/'],
      ['/', '/app'],
    ]);
    expect(state.current).toBe('/app');
  });
});
