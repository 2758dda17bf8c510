import pino from 'pino';

const logLevel = process.env.LOG_LEVEL || 'info';
const usePretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger = pino({
  name: 'leasehold',
  level: logLevel,
  transport: usePretty ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname'
    }
  } : undefined,
  formatters: {
    level: (label) => {
      return { level: label };
    }
  }
});

export type Logger = typeof logger;

/**
 * Routes listener failures from core notifiers into the server log.
 */
export function logListenerError(err: unknown, notifier: string): void {
  logger.error({ err, notifier }, 'Notifier listener failed');
}
