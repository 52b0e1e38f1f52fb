import pino, { type LoggerOptions } from 'pino';

const level = process.env['LOG_LEVEL'] ?? 'info';
const pretty = process.env['NODE_ENV'] !== 'production' && process.env['NODE_ENV'] !== 'test';

/** Shared with Fastify so request logs match the application's. */
export const loggerOptions: LoggerOptions = {
  level: process.env['NODE_ENV'] === 'test' ? 'silent' : level,
  ...(pretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:HH:MM:ss' },
        },
      }
    : {}),
};

export const logger = pino({ name: 'race-aggregator', ...loggerOptions });

export type Logger = typeof logger;
