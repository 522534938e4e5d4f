import winston from 'winston';
import { LOG_LEVEL, NODE_ENV } from '@/config/index';
import path from 'path';

const sensitiveKeys = ['password', 'token', 'api_key', 'apikey', 'secret', 'authorization'];

const redactFormat = winston.format((info) => {
  const redact = (obj: unknown): unknown => {
    if (typeof obj !== 'object' || obj === null || obj instanceof Error) return obj;

    const redacted: Record<string, unknown> = { ...obj };
    for (const key in redacted) {
      if (sensitiveKeys.some((sensitive) => key.toLowerCase().includes(sensitive))) {
        redacted[key] = '[REDACTED]';
      } else if (typeof redacted[key] === 'object') {
        redacted[key] = redact(redacted[key]);
      }
    }
    return redacted;
  };

  for (const key of Object.keys(info)) {
    if (sensitiveKeys.some((sensitive) => key.toLowerCase().includes(sensitive))) {
      info[key] = '[REDACTED]';
    } else if (typeof info[key] === 'object') {
      info[key] = redact(info[key]);
    }
  }
  return info;
});

const logger = winston.createLogger({
  level: LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss',
    }),
    winston.format.errors({ stack: true }),
    redactFormat(),
    winston.format.splat(),
    winston.format.json(),
  ),
  defaultMeta: {
    service: 'latest-posts-bot',
    version: process.env.npm_package_version || '1.0.0',
    environment: NODE_ENV,
  },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, service, version: _v, environment: _e, ...meta }) => {
          const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
          return `${timestamp} [${service}] ${level}: ${message} ${metaStr}`;
        }),
      ),
    }),
  ],
  exitOnError: false,
});

if (NODE_ENV === 'production') {
  const logsDir = path.join(process.cwd(), 'logs');

  logger.add(
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      maxsize: 5242880,
      maxFiles: 5,
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    }),
  );

  logger.add(
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log'),
      maxsize: 5242880,
      maxFiles: 5,
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    }),
  );

  logger.exceptions.handle(
    new winston.transports.File({ filename: path.join(logsDir, 'exceptions.log') }),
  );

  logger.rejections.handle(
    new winston.transports.File({ filename: path.join(logsDir, 'rejections.log') }),
  );
}

export default logger;
