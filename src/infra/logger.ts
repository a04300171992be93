import { pino, type Logger } from 'pino';

// Pretty print only for local development; tests and production log JSON.
const isDevelopment = process.env.NODE_ENV === 'development';
const transport = isDevelopment
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        translateTime: 'SYS:standard',
      },
    }
  : undefined;

/**
 * Application logger.
 */
export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport,
  redact: ['password', 'passwordHash', 'token', 'req.headers.authorization'],
});
