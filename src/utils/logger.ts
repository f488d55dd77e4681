import winston from 'winston';
import { mkdirSync } from 'fs';
import { join } from 'path';

const LOG_DIR = process.env.OPS_LOG_DIR?.trim() || join('ops', 'logs');
const IS_TEST = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `[${timestamp}] ${level.toUpperCase().padEnd(5)} ${message}${metaStr}`;
  })
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  logFormat
);

type LogTransport =
  | InstanceType<typeof winston.transports.Console>
  | InstanceType<typeof winston.transports.File>;

const transports: LogTransport[] = [
  new winston.transports.Console({
    format: consoleFormat,
    silent: IS_TEST && process.env.LOG_LEVEL === undefined,
  }),
];

// In Tests keine Log-Dateien schreiben
if (!IS_TEST) {
  mkdirSync(LOG_DIR, { recursive: true });
  transports.push(
    new winston.transports.File({
      filename: join(LOG_DIR, 'error.log'),
      level: 'error',
    }),
    new winston.transports.File({
      filename: join(LOG_DIR, 'combined.log'),
    })
  );
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  transports,
});

export default logger;
