import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST);

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

/**
 * Creates a child logger scoped to a single user session.
 */
export const createSessionLogger = (sessionId: string, extra?: Record<string, unknown>) =>
  logger.child({ sessionId, ...extra });

export const createComponentLogger = (component: string) => logger.child({ component });

export default logger;
