import pino from 'pino';

let correlationId: string | undefined;

function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  const loggerOptions: pino.LoggerOptions =
    process.env.NODE_ENV === 'development'
      ? {
          level: process.env.LOG_LEVEL || 'info',
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : {
          level: process.env.LOG_LEVEL || 'info',
        };

  const baseLogger = pino(loggerOptions);

  // One id per process so both programs' lines can be grouped
  if (!correlationId) {
    correlationId = generateCorrelationId();
  }

  return baseLogger.child({
    correlationId,
    ...context,
  });
}
