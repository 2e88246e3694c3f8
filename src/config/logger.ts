import { config } from 'dotenv';
import { pino, type LoggerOptions } from 'pino';

// The logger is built on first import, before env.ts runs, so .env has to be
// loaded here for NODE_ENV and LOG_LEVEL to apply
config();

export function createLoggerOptions(source: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const nodeEnv = source.NODE_ENV ?? 'development';

  return {
    name: 'session-stream-runtime',
    level: source.LOG_LEVEL ?? (nodeEnv === 'test' ? 'silent' : 'info'),
    ...(nodeEnv === 'development'
      ? {
          transport: {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l' },
          },
        }
      : {}),
  };
}

export const logger = pino(createLoggerOptions());

export type Logger = typeof logger;
