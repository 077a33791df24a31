import pino, { Logger, LoggerOptions } from 'pino';

const isDevelopment = process.env.NODE_ENV === 'development';

/** Credentials and tokens never reach the log output. */
export const REDACT_PATHS = [
     'password',
     '*.password',
     'access_token',
     '*.access_token',
     'headers.authorization',
     'headers.Authorization',
];

const loggerConfig: LoggerOptions = {
     level: process.env.LOG_LEVEL || 'info',
     formatters: {
          level: (label: string) => ({ level: label }),
     },
     serializers: {
          err: pino.stdSerializers.err,
     },
     redact: {
          paths: REDACT_PATHS,
          censor: '[REDACTED]',
     },
     base: {
          service: process.env.SERVICE_NAME || 'outpost-sync',
          environment: process.env.NODE_ENV || 'production',
     },
};

if (isDevelopment) {
     loggerConfig.transport = {
          target: 'pino-pretty',
          options: {
               colorize: true,
               translateTime: 'HH:MM:ss Z',
               ignore: 'pid,hostname',
          },
     };
}

export const logger = pino(loggerConfig);

export type { Logger };

export function createChildLogger(context: Record<string, unknown>): Logger {
     return logger.child(context);
}
