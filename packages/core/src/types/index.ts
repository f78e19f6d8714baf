export { ConnectionState } from './connection-state.js';
export type { ConnectionStateChange, ReconnectionConfig } from './connection-state.js';
