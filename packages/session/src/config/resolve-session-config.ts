import { SessionError } from '@dedbg/core';
import {
  DebugSessionConfigSchema,
  type DebugSessionConfig,
  type DebugSessionConfigInput,
} from './DebugSessionConfigSchema.js';

/**
 * Maps `http:` to `ws:` and `https:` to `wss:`.
 * @throws SessionError with code `invalid_url` for other schemes
 */
export function normalizeServerUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch (error) {
    throw SessionError.invalidUrl(value, error instanceof Error ? error : undefined);
  }

  if (url.protocol === 'http:') {
    url.protocol = 'ws:';
  } else if (url.protocol === 'https:') {
    url.protocol = 'wss:';
  } else if (url.protocol !== 'ws:' && url.protocol !== 'wss:') {
    throw SessionError.invalidUrl(
      value,
      new Error('URL must use http:, https:, ws:, or wss: protocol'),
    );
  }
  return url.toString();
}

/**
 * Validates session options, fills in defaults and normalizes the URL.
 * @throws SessionError with code `invalid_config` or `invalid_url`
 * @public
 */
export function resolveSessionConfig(input: DebugSessionConfigInput): DebugSessionConfig {
  const result = DebugSessionConfigSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw SessionError.invalidConfig(detail, result.error);
  }
  return { ...result.data, url: normalizeServerUrl(result.data.url) };
}
