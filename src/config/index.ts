/**
 * Environment configuration
 *
 * Parsed once from process.env; CLI flags take precedence over every value.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const logLevelSchema = z.enum(LOG_LEVELS);
export type LogLevel = z.infer<typeof logLevelSchema>;

const emptyAsUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

export const environmentSchema = z.object({
  LOG_LEVEL: z.preprocess(emptyAsUndefined, logLevelSchema.optional()),
  AUDIT_PROFILE: z.preprocess(emptyAsUndefined, z.string().optional()),
  AUDIT_PROFILE_FILE: z.preprocess(emptyAsUndefined, z.string().optional()),
  AUDIT_REPORT_FILE: z.preprocess(emptyAsUndefined, z.string().optional()),
  NODE_ENV: z.preprocess(
    emptyAsUndefined,
    z.enum(['development', 'production', 'test']).default('production'),
  ),
});

export interface AppConfig {
  logLevel?: LogLevel;
  profile?: string;
  profileFile?: string;
  reportFile?: string;
  nodeEnv: 'development' | 'production' | 'test';
}

/**
 * Read configuration from an environment map
 *
 * @throws ZodError when a variable has an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = environmentSchema.parse(env);
  return {
    ...(parsed.LOG_LEVEL !== undefined && { logLevel: parsed.LOG_LEVEL }),
    ...(parsed.AUDIT_PROFILE !== undefined && { profile: parsed.AUDIT_PROFILE }),
    ...(parsed.AUDIT_PROFILE_FILE !== undefined && { profileFile: parsed.AUDIT_PROFILE_FILE }),
    ...(parsed.AUDIT_REPORT_FILE !== undefined && { reportFile: parsed.AUDIT_REPORT_FILE }),
    nodeEnv: parsed.NODE_ENV,
  };
}

/**
 * Log level when no flag sets one: LOG_LEVEL, else `debug` in development, else `warn`
 */
export function resolveLogLevel(config: AppConfig): LogLevel {
  return config.logLevel ?? (config.nodeEnv === 'development' ? 'debug' : 'warn');
}
