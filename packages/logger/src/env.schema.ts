import { z } from 'zod';

import { LOG_LEVELS, type LogLevel } from './logger.js';

export const loggerEnvSchema = z.object({
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
  REQBENCH_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .refine((val) => LOG_LEVELS.some((level) => level === val), {
      message: `Invalid log level, expected one of: ${LOG_LEVELS.join(', ')}`,
    })
    .default('warn'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Validate logging-related environment variables.
 * @throws Error listing every invalid variable
 */
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Resolve the effective log level: --verbose wins, then REQBENCH_LOG_LEVEL, then 'warn'.
 */
export function resolveLogLevel(verbose: boolean, env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (verbose) {
    return 'debug';
  }
  const level = validateLoggerEnv(env).REQBENCH_LOG_LEVEL;
  return LOG_LEVELS.find((candidate) => candidate === level) ?? 'warn';
}
