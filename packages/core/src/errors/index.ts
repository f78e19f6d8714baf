export { SessionError, SessionErrorCode } from './session-error.js';
export { RemoteFault } from './remote-fault.js';
export { CancelledError, isCancelledError } from './cancelled-error.js';
export type { CancellationReason } from './cancelled-error.js';
