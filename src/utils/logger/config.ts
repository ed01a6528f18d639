import type { LoggerOptions } from 'pino';

const env = process.env.NODE_ENV;

export const loggerConfig: LoggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  transport:
    env === 'production' || env === 'test'
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        },
  base: {
    env: env || 'development',
  },
};
