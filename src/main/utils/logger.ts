import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';
import { LoggingConfig } from '../../shared/types/config';
import { StatusReporter } from '../../shared/types/transfer';

const logger = winston.createLogger({
  level: process.env.FILERELAY_LOG_LEVEL ?? 'info',
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  transports: [
    new winston.transports.Console({
      format:
        process.env.NODE_ENV === 'production'
          ? winston.format.combine(winston.format.timestamp(), winston.format.json())
          : winston.format.simple(),
    }),
  ],
});

let fileTransportsDir: string | undefined;

export function initializeLogger(config?: LoggingConfig): winston.Logger {
  if (config) {
    logger.level = config.level;

    if (config.directory && config.directory !== fileTransportsDir) {
      const logDir = path.resolve(config.directory);
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
      logger.add(
        new winston.transports.File({ filename: path.join(logDir, 'error.log'), level: 'error' })
      );
      logger.add(new winston.transports.File({ filename: path.join(logDir, 'combined.log') }));
      fileTransportsDir = config.directory;
    }
  }

  logger.debug('Logger initialized', { level: logger.level, directory: fileTransportsDir });
  return logger;
}

/**
 * Status lines go to the injected sink when there is one (the log keeps a debug
 * copy), otherwise they are logged at info level.
 */
export function reportStatus(
  reporter: StatusReporter | undefined,
  message: string,
  meta?: Record<string, unknown>
): void {
  if (reporter) {
    logger.debug(message, meta);
    reporter(message);
  } else {
    logger.info(message, meta);
  }
}

export { logger };
