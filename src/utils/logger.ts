import winston from 'winston';
import { appConfig } from '../config';

const fileLimits = {
  ...(appConfig.logging.maxSizeBytes !== undefined ? { maxsize: appConfig.logging.maxSizeBytes } : {}),
  ...(appConfig.logging.maxFiles !== undefined ? { maxFiles: appConfig.logging.maxFiles } : {}),
};

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    )
  })
];

if (appConfig.logging.toFile) {
  transports.push(
    new winston.transports.File({ filename: 'logs/error.log', level: 'error', ...fileLimits }),
    new winston.transports.File({ filename: 'logs/combined.log', ...fileLimits })
  );
}

// Create winston logger instance
const logger = winston.createLogger({
  level: appConfig.logging.level,
  silent: appConfig.logging.silent,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const metaString = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
      return `${timestamp} [${level.toUpperCase()}]: ${message} ${metaString}`;
    })
  ),
  transports
});

export const logEvent = (event: string, meta?: Record<string, unknown>): void => {
  if (meta) {
    logger.info(event, meta);
  } else {
    logger.info(event);
  }
};

export const logError = (message: string, error?: unknown, meta?: Record<string, unknown>): void => {
  const errorMeta = {
    ...meta,
    ...(error instanceof Error
      ? { error: error.message, stack: error.stack }
      : error !== undefined ? { error: String(error) } : {})
  };

  logger.error(message, errorMeta);
};

export const logWarning = (message: string, meta?: Record<string, unknown>): void => {
  if (meta) {
    logger.warn(message, meta);
  } else {
    logger.warn(message);
  }
};

export const logDebug = (message: string, meta?: Record<string, unknown>): void => {
  if (meta) {
    logger.debug(message, meta);
  } else {
    logger.debug(message);
  }
};

export { logger };
