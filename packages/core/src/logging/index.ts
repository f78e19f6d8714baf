/**
 * Logging infrastructure exports
 *
 * Provides structured logging with automatic redaction via pino + fast-redact
 */

import type { Logger } from 'pino';
import { rootLogger } from './pino-setup.js';

export { rootLogger, resolveLogLevel, REDACT_PATHS } from './pino-setup.js';
export type { Logger } from 'pino';

/**
 * Creates a child of the root logger tagged with a component scope.
 * @param scope - Component name, e.g. `session:engine`
 * @public
 */
export function createLogger(scope: string): Logger {
  return rootLogger.child({ scope });
}
