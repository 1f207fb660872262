import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';
import type { LogLevel } from '../../shared/types/config';

const consoleTransport = new winston.transports.Console({ format: winston.format.simple() });

const logger = winston.createLogger({
  level: process.env.FILEWIRE_LOG_LEVEL ?? 'info',
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  transports: [consoleTransport],
});

export interface LoggerOptions {
  level: LogLevel;
  logDir?: string;
}

let fileLogDir: string | null = null;

export function initializeLogger(options: LoggerOptions): winston.Logger {
  logger.level = options.level;

  if (options.logDir && options.logDir !== fileLogDir) {
    fileLogDir = options.logDir;
    if (!fs.existsSync(options.logDir)) {
      fs.mkdirSync(options.logDir, { recursive: true });
    }
    logger.add(
      new winston.transports.File({
        filename: path.join(options.logDir, 'error.log'),
        level: 'error',
      })
    );
    logger.add(new winston.transports.File({ filename: path.join(options.logDir, 'combined.log') }));

    if (process.env.NODE_ENV === 'production') {
      logger.remove(consoleTransport);
    }
  }

  logger.debug('Logger initialized', { level: options.level, logDir: options.logDir });
  return logger;
}

export { logger };
