import { diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';
import pino from 'pino';

export const initOtel = (logLevel: DiagLogLevel = DiagLogLevel.ERROR): void => {
  diag.setLogger(new DiagConsoleLogger(), logLevel);
};

const createLogger = (level: string = process.env.LOG_LEVEL ?? 'info') =>
  pino({
    level,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'SYS:standard' },
          }
        : undefined,
  });

const baseLogger = createLogger();

export const logger = {
  info: (msg: string, meta?: Record<string, unknown>) => baseLogger.info(meta, msg),
  error: (msg: string, meta?: Record<string, unknown>) => baseLogger.error(meta, msg),
};

