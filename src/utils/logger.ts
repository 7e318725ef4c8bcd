import winston from 'winston';
import { playerConfig } from '../config';

const isTest = process.env.NODE_ENV === 'test';

const fileLimits = {
  ...(playerConfig.logging.maxSizeBytes !== undefined ? { maxsize: playerConfig.logging.maxSizeBytes } : {}),
  ...(playerConfig.logging.maxFiles !== undefined ? { maxFiles: playerConfig.logging.maxFiles } : {}),
};

const logger = winston.createLogger({
  level: playerConfig.logging.level,
  silent: isTest,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const metaString = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
      return `${timestamp} [${level.toUpperCase()}]: ${message} ${metaString}`;
    })
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      )
    }),
    ...(isTest ? [] : [
      new winston.transports.File({ filename: 'logs/error.log', level: 'error', ...fileLimits }),
      new winston.transports.File({ filename: 'logs/combined.log', ...fileLimits })
    ])
  ]
});

export const logEvent = (event: string, meta?: Record<string, unknown>): void => {
  if (meta) {
    logger.info(event, meta);
  } else {
    logger.info(event);
  }
};

export const logError = (message: string, error?: unknown, meta?: Record<string, unknown>): void => {
  const err = error instanceof Error ? error : undefined;
  const errorMeta = {
    ...meta,
    ...(err ? { error: err.message, stack: err.stack } : {}),
    ...(error !== undefined && !err ? { error: String(error) } : {})
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

// Redact stream URLs for logs (avoid leaking query/signatures)
export function describeUrl(url: string): { host: string; path: string } {
  try {
    const u = new URL(url);
    return { host: u.host, path: u.pathname };
  } catch {
    return { host: 'invalid', path: '' };
  }
}

export { logger };
