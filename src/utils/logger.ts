import { pino, type LoggerOptions } from 'pino';
import { config } from '../config.js';

const loggerOptions: LoggerOptions = {
  level: config.LOG_LEVEL,
  ...(config.NODE_ENV === 'development'
    ? { transport: { target: 'pino-pretty', options: { colorize: true } } }
    : {}),
};

export const logger = pino(loggerOptions);
