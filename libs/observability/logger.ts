import pino from 'pino';

// Create logger based on environment
const environment = process.env.NODE_ENV || 'development';
const isDevelopment = environment === 'development';

export const logger = pino({
  level: process.env.LOG_LEVEL || (environment === 'test' ? 'silent' : 'info'),

  // Pretty print in development, JSON otherwise
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      }
    : undefined,

  // Base fields added to all logs
  base: {
    service: process.env.SERVICE_NAME || 'datasource-pools',
    env: environment,
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  formatters: {
    level: (label) => {
      return { level: label.toUpperCase() };
    },
  },
});

/**
 * Log a data source lifecycle step
 */
export function logDataSourceEvent(
  dataSource: string,
  mode: 'single' | 'multiple',
  phase: 'init' | 'bound' | 'customized',
  meta?: Record<string, unknown>,
) {
  logger.info(
    {
      type: 'data_source',
      dataSource,
      mode,
      phase,
      ...meta,
    },
    `${mode === 'single' ? 'Single' : 'Dynamic'} data source (${dataSource}) ${phase}`,
  );
}

/**
 * Log error with stack trace
 */
export function logError(
  error: Error,
  context?: string,
  meta?: Record<string, unknown>,
) {
  logger.error(
    {
      type: 'error',
      error: {
        message: error.message,
        stack: error.stack,
        name: error.name,
      },
      ...(context && { context }),
      ...meta,
    },
    error.message,
  );
}
