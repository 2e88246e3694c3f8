import { config } from 'dotenv';
import { z } from 'zod';
import { logger } from './logger.js';
import type { RegistryConfig } from '../types/runtime.js';

// Load .env file
config();

const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3003),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  CORS_ORIGIN: z.string().default('*'),

  // Admission and lifetimes
  MAX_CONCURRENT_SESSIONS: z.coerce.number().int().positive().default(10),
  SESSION_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  CANCEL_GRACE_MS: z.coerce.number().int().nonnegative().default(10 * 1000),
  CREATED_IDLE_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  SESSION_RETENTION_MS: z.coerce.number().int().nonnegative().default(24 * 60 * 60 * 1000),
  ARTIFACT_RETENTION_MS: z.coerce.number().int().nonnegative().default(24 * 60 * 60 * 1000),

  // Streaming
  SUBSCRIBER_QUEUE_DEPTH: z.coerce.number().int().positive().default(256),
  EVENT_BUFFER_SIZE: z.coerce.number().int().positive().default(1000),
  SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(1000),

  // Scripted worker
  SCREENSHOT_INTERVAL_MS: z.coerce.number().int().positive().default(2000),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

/**
 * Map validated environment onto registry settings
 */
export function registryConfigFromEnv(env: Env): Partial<RegistryConfig> {
  return {
    maxConcurrentSessions: env.MAX_CONCURRENT_SESSIONS,
    runningTimeoutMs: env.SESSION_TIMEOUT_MS,
    cancelGraceMs: env.CANCEL_GRACE_MS,
    createdIdleMs: env.CREATED_IDLE_MS,
    sessionRetentionMs: env.SESSION_RETENTION_MS,
    subscriberQueueDepth: env.SUBSCRIBER_QUEUE_DEPTH,
    eventBufferSize: env.EVENT_BUFFER_SIZE,
    sweepIntervalMs: env.SWEEP_INTERVAL_MS,
  };
}

let env: Env;

try {
  env = parseEnv(process.env);
  logger.info('Environment variables validated successfully');
} catch (error) {
  logger.error({ error }, 'Invalid environment variables');
  process.exit(1);
}

export { env };
