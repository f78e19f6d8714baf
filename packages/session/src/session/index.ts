export { DebugSession } from './debug-session.js';
export { NodePathState } from './node-path-state.js';
export type {
  CurrentNodeChangedEvent,
  DebugSessionEvents,
  DebugSessionOptions,
  RequestOptions,
  SessionObserver,
} from './types.js';
