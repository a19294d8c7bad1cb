import { z } from 'zod';

const LOG_LEVELS = ['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'OFF'] as const;

export type LogLevelName = typeof LOG_LEVELS[number];

const envSchema = z.object({
  STREAM_OPS_LOG: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
  STREAM_OPS_CONFIG: z.string().optional(),
});

export interface StreamOpsEnv {
  logLevel: LogLevelName;
  configPath?: string;
}

function toLevel(raw: string | undefined): LogLevelName | undefined {
  if (!raw) return undefined;
  const upper = raw.toUpperCase();
  return LOG_LEVELS.find(l => l === upper);
}

/**
 * Reads the environment variables the tool understands.
 * Unknown log levels fall back to ERROR (quiet).
 */
export function readEnv(source: NodeJS.ProcessEnv = process.env): StreamOpsEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    return { logLevel: 'ERROR' };
  }

  const env = result.data;
  return {
    logLevel: toLevel(env.STREAM_OPS_LOG) ?? toLevel(env.LOG_LEVEL) ?? 'ERROR',
    configPath: env.STREAM_OPS_CONFIG || undefined,
  };
}
