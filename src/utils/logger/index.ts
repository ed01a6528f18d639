import { pino } from 'pino';
import { loggerConfig } from './config.js';

export const logger = pino(loggerConfig);

// Typed convenience methods
export const logInfo = (component: string, message: string, data?: object) => {
  logger.info({ component, ...data }, message);
};

export const logDebug = (component: string, message: string, data?: object) => {
  logger.debug({ component, ...data }, message);
};

export const logWarn = (component: string, message: string, data?: object) => {
  logger.warn({ component, ...data }, message);
};

export const logError = (
  component: string,
  message: string,
  error?: Error | unknown,
  data?: object
) => {
  logger.error(
    {
      component,
      ...data,
      err: error instanceof Error ? error : new Error(String(error)),
    },
    message
  );
};
