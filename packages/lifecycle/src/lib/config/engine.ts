import 'dotenv/config';
import { z } from 'zod';
import { fromZodError } from '../errors.js';

const LogLevelEnum = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const EngineEnvSchema = z.object({
  LOG_LEVEL: LogLevelEnum.default('info'),
  LIFECYCLE_MAX_CASCADE_DEPTH: z.coerce.number().int().positive().default(25),
  REDIS_HOST: z.string().min(1).default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().int().nonnegative().default(0),
});

export type LogLevel = z.infer<typeof LogLevelEnum>;

export interface EngineConfig {
  logLevel: LogLevel;
  maxCascadeDepth: number;
  redis: {
    host: string;
    port: number;
    password?: string;
    db: number;
  };
}

let cachedConfig: EngineConfig | undefined;

/**
 * Validate the lifecycle engine environment variables.
 * Throws ValidationError when a variable is present but malformed.
 */
export function getEngineConfig(): EngineConfig {
  if (cachedConfig !== undefined) {
    return cachedConfig;
  }

  const parsed = EngineEnvSchema.safeParse(process.env);
  if (!parsed.success) {
    throw fromZodError(parsed.error, 'Invalid lifecycle engine configuration');
  }

  const env = parsed.data;
  cachedConfig = {
    logLevel: env.LOG_LEVEL,
    maxCascadeDepth: env.LIFECYCLE_MAX_CASCADE_DEPTH,
    redis: {
      host: env.REDIS_HOST,
      port: env.REDIS_PORT,
      // Empty string means "no password"
      password: env.REDIS_PASSWORD || undefined,
      db: env.REDIS_DB,
    },
  };
  return cachedConfig;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetEngineConfigCache(): void {
  cachedConfig = undefined;
}
