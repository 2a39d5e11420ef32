import pino, { type Logger, type LoggerOptions } from 'pino';

export interface LoggerSettings {
  level: string;
  environment: string;
}

/**
 * Logger options shared by the root logger and Fastify's request logger.
 *
 * Development gets `pino-pretty` on stdout, test runs are silent and
 * everything else writes JSON lines.
 */
export function loggerOptions(settings: LoggerSettings): LoggerOptions {
  const options: LoggerOptions = {
    level: settings.environment === 'test' ? 'silent' : settings.level,
    base: { service: 'pow-utxo-ledger' }
  };

  if (settings.environment === 'development') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname'
      }
    };
  }

  return options;
}

export function createLogger(settings: LoggerSettings): Logger {
  return pino(loggerOptions(settings));
}

// Module-level logger used before the app config is loaded and by code paths
// that are not handed a logger explicitly.
export const logger: Logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  environment: process.env.NODE_ENV || 'development'
});
