import { z } from 'zod';

export const DEFAULT_SUB_PROTOCOL = 'dedbg';
export const DEFAULT_MAX_MESSAGE_BYTES = 1 << 20;

export const ReconnectConfigSchema = z.object({
  initialDelayMs: z.number().int().nonnegative().default(1000),
  maxDelayMs: z.number().int().nonnegative().default(30000),
  backoffMultiplier: z.number().min(1).default(2),
  jitter: z.number().min(0).max(1).default(0.25),
});

export const DebugSessionConfigSchema = z.object({
  url: z.string().min(1),
  defaultTimeoutMs: z
    .number()
    .int()
    .default(0)
    .transform((value) => Math.max(0, value)),
  subProtocol: z.string().min(1).default(DEFAULT_SUB_PROTOCOL),
  maxMessageBytes: z.number().int().positive().default(DEFAULT_MAX_MESSAGE_BYTES),
  connectTimeoutMs: z.number().int().positive().default(30000),
  reconnect: ReconnectConfigSchema.default({}),
});

export type DebugSessionConfigInput = z.input<typeof DebugSessionConfigSchema>;
export type DebugSessionConfig = z.output<typeof DebugSessionConfigSchema>;
