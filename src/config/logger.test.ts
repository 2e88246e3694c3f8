import { describe, it, expect } from 'vitest';
import { createLoggerOptions } from './logger.js';

describe('createLoggerOptions', () => {
  it('pretty-prints at info level in development', () => {
    expect(createLoggerOptions({ NODE_ENV: 'development' })).toEqual({
      name: 'session-stream-runtime',
      level: 'info',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l' },
      },
    });
  });

  it('treats a missing NODE_ENV as development', () => {
    expect(createLoggerOptions({}).transport).toEqual({
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l' },
    });
  });

  it('is silent under test', () => {
    expect(createLoggerOptions({ NODE_ENV: 'test' })).toEqual({
      name: 'session-stream-runtime',
      level: 'silent',
    });
  });

  it('takes LOG_LEVEL over the environment default and writes JSON in production', () => {
    expect(createLoggerOptions({ NODE_ENV: 'production', LOG_LEVEL: 'debug' })).toEqual({
      name: 'session-stream-runtime',
      level: 'debug',
    });
  });
});
