export {
  DEFAULT_MAX_MESSAGE_BYTES,
  DEFAULT_SUB_PROTOCOL,
  DebugSessionConfigSchema,
  ReconnectConfigSchema,
} from './DebugSessionConfigSchema.js';
export type { DebugSessionConfig, DebugSessionConfigInput } from './DebugSessionConfigSchema.js';
export { normalizeServerUrl, resolveSessionConfig } from './resolve-session-config.js';
