/**
 * Pino logger setup with automatic redaction of credential fields
 *
 * Uses fast-redact (through pino) for path-based redaction. The level starts
 * at 'silent' unless DEDBG_LOG_LEVEL names another pino level.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/**
 * Reads the log level from DEDBG_LOG_LEVEL, defaulting to 'silent'.
 * @internal
 */
export function resolveLogLevel(
  value: string | undefined = process.env.DEDBG_LOG_LEVEL,
): LevelWithSilent {
  const candidate = (value ?? '').trim().toLowerCase();
  return LEVELS.find((level) => level === candidate) ?? 'silent';
}

/**
 * Redaction paths applied to every log record. Handshake credentials are the
 * only secrets the session ever touches.
 * @public
 */
export const REDACT_PATHS: readonly string[] = [
  'password',
  '*.password',
  'authorization',
  '*.authorization',
  'credentials',
  '*.credentials',
  'headers.Authorization',
  '*.headers.Authorization',
];

/**
 * Root logger instance with automatic redaction of credential fields.
 *
 * @example
 * ```typescript
 * import { rootLogger } from './pino-setup.js';
 *
 * rootLogger.level = 'info';
 * rootLogger.info({ password: 'test-secret' }); // Logs: { password: '[REDACTED]' }
 * ```
 *
 * @public
 */
const rootLogger: Logger = pino({
  name: 'dedbg',
  level: resolveLogLevel(),
  redact: {
    paths: [...REDACT_PATHS],
    censor: '[REDACTED]',
    remove: false,
  },
  serializers: {
    ...pino.stdSerializers,
    err: pino.stdSerializers.err,
  },
});

export { rootLogger };
