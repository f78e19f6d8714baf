export {
  CLOSE_MESSAGE_TOO_BIG,
  CLOSE_NORMAL,
  ConnectionEngine,
} from './connection-engine.js';
export type { ConnectionEngineOptions, EngineHost } from './connection-engine.js';
export { ConnectionSlot } from './connection-slot.js';
export type { ConnectionHandle } from './connection-slot.js';
export { FrameQueue } from './frame-queue.js';
export { MessageAssembler } from './message-assembler.js';
export { WebSocketConnector, basicAuthorization } from './websocket-connector.js';
export type {
  ConnectOptions,
  CredentialProvider,
  Credentials,
  DebugConnection,
  DebugConnector,
  InboundFrame,
} from './types.js';
