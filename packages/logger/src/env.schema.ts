import { z } from 'zod';

export const logLevels = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof logLevels)[number];

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val: string) => val === 'true');

export const loggerEnvSchema = z.object({
  LOGGER_CONSOLE_ENABLED: booleanFlag('true'),
  LOGGER_FILE_LOG_ENABLED: booleanFlag('false'),
  LOGGER_FILE_LOG_FILENAME: z.string().trim().min(1, { message: 'Invalid file log name' }).default('application.log'),
  LOGGER_LOG_DIRNAME: z.string().trim().min(1, { message: 'Invalid log directory name' }).default('logs'),
  LOGGER_LOG_LEVEL: z.enum(logLevels).default('info'),
  LOGGER_SERVICE_NAME: z.string().default('fintick'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export interface LoggerEnvResolution {
  config: LoggerEnvConfig;
  /** `path: message` for every variable that was rejected and defaulted */
  issues: string[];
}

/**
 * Like {@link validateLoggerEnv} but never throws: rejected variables fall back
 * to their defaults and are reported in `issues`.
 */
export function resolveLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvResolution {
  const result = loggerEnvSchema.safeParse(env);
  if (result.success) {
    return { config: result.data, issues: [] };
  }

  const rejected = new Set(result.error.issues.map((issue) => String(issue.path[0])));
  const accepted = Object.fromEntries(Object.entries(env).filter(([key]) => !rejected.has(key)));
  return {
    config: loggerEnvSchema.parse(accepted),
    issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  };
}

/**
 * Validates logger environment variables.
 * @throws Error listing every invalid variable
 */
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Logger environment validation failed:\n${errors}`);
  }
  return result.data;
}
