export * from './session/index.js';
export * from './config/index.js';
export * from './marshalling/index.js';
export {
  WebSocketConnector,
  basicAuthorization,
} from './connection/index.js';
export type {
  ConnectOptions,
  CredentialProvider,
  Credentials,
  DebugConnection,
  DebugConnector,
  InboundFrame,
} from './connection/index.js';
export {
  element,
  getAttribute,
  childElements,
  textContent,
  parseDocument,
  serializeDocument,
} from './protocol/index.js';
export type { XmlElement, XmlNode, XmlText } from './protocol/index.js';

export {
  CancelledError,
  RemoteFault,
  SessionError,
  SessionErrorCode,
  isCancelledError,
} from '@dedbg/core';
export type { CancellationReason } from '@dedbg/core';
