import winston, { format } from 'winston';
import path from 'path';
import 'winston-daily-rotate-file';
import { Request, Response, NextFunction } from 'express';
import { appConfig, logConfig } from '../config';

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Define colors for different log levels
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'blue',
};

winston.addColors(colors);

// Metadata is appended as JSON so structured fields survive the plain-text format
const logFormat = format.combine(
  format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  format.errors({ stack: true }),
  format.splat(),
  format.printf(({ timestamp, level, message, service, stack, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${stack ? `\n${stack}` : ''}${extra}`;
  })
);

const logDirectory = path.resolve(process.cwd(), logConfig.directory);

const fileTransports = (): winston.transport[] => [
  new winston.transports.DailyRotateFile({
    filename: path.join(logDirectory, 'application-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    maxSize: logConfig.maxSize,
    maxFiles: logConfig.maxFiles,
    zippedArchive: true,
  }),
  new winston.transports.DailyRotateFile({
    level: 'error',
    filename: path.join(logDirectory, 'error-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    maxSize: logConfig.maxSize,
    maxFiles: '30d',
    zippedArchive: true,
  }),
  new winston.transports.DailyRotateFile({
    level: 'http',
    filename: path.join(logDirectory, 'http-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    maxSize: logConfig.maxSize,
    maxFiles: logConfig.maxFiles,
    zippedArchive: true,
  }),
];

const logger = winston.createLogger({
  level: appConfig.isDevelopment ? 'debug' : logConfig.level,
  levels,
  format: logFormat,
  defaultMeta: { service: appConfig.name },
  transports: logConfig.toFile ? fileTransports() : [],
  exitOnError: false,
});

// Console output outside production, or when file logging is off; tests keep it silent
if (!appConfig.isProduction || !logConfig.toFile) {
  logger.add(
    new winston.transports.Console({
      silent: appConfig.isTest,
      format: format.combine(format.colorize({ all: true }), logFormat),
    })
  );
}

/**
 * Child logger carrying a fixed component label.
 */
const createLogger = (component: string): winston.Logger => logger.child({ component });

// Log HTTP requests
const httpLogger = (req: Request, res: Response, next: NextFunction) => {
  // Skip logging for health checks
  if (req.path.endsWith('/health') || req.path.endsWith('/health/')) {
    return next();
  }

  const start = Date.now();
  const { method, originalUrl, ip } = req;

  logger.http(`[${method}] ${originalUrl} - IP: ${ip} - Started`);

  res.on('finish', () => {
    const { statusCode } = res;
    const responseTime = Date.now() - start;
    const contentLength = res.get('content-length') || 0;

    let level = 'http';
    if (statusCode >= 500) {
      level = 'error';
    } else if (statusCode >= 400) {
      level = 'warn';
    }

    logger.log({
      level,
      message: `[${method}] ${originalUrl} - ${statusCode} - ${responseTime}ms - ${contentLength}b`,
      userAgent: req.get('user-agent'),
    });
  });

  next();
};

export { logger, httpLogger, createLogger };
