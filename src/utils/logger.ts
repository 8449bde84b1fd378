import pino from 'pino';

const level =
  process.env.LOG_LEVEL ||
  (process.env.NODE_ENV === 'production' ? 'info' : process.env.NODE_ENV === 'test' ? 'silent' : 'debug');

export const logger = pino({
  name: 'thread-radar',
  level,
});

export type Logger = typeof logger;
