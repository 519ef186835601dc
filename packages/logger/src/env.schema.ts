import { z } from 'zod';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val: string) => val.toLowerCase() === 'true');

/**
 * Logger env never fails: it is read while modules load, so an unexpected
 * value falls back to its default instead of throwing.
 */
export const loggerEnvSchema = z.object({
  LOGGER_CONSOLE_ENABLED: booleanFlag('false'),
  LOGGER_FILE_LOG_ENABLED: booleanFlag('false'),
  LOGGER_FILE_LOG_FILENAME: z
    .string()
    .trim()
    .min(1, { message: 'Invalid file log name' })
    .default('commitguard.log')
    .catch('commitguard.log'),
  LOGGER_LOG_DIRNAME: z.string().trim().min(1, { message: 'Invalid log directory name' }).default('logs').catch('logs'),
  LOGGER_LOG_LEVEL: z
    .string()
    .transform((val: string) => val.toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .default('info')
    .catch('info'),
  LOGGER_SERVICE_NAME: z.string().default('commitguard'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('production').catch('production'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
