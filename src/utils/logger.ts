/**
 * Winston Logger Configuration
 * Централизованное логирование с уровнями и форматированием
 */

import winston from 'winston';
import fs from 'fs';
import path from 'path';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

// Форматирование логов
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

// Транспорты
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
    level: isProduction ? 'info' : 'debug',
  }),
];

// Файловые логи нужны, когда скрипт крутится по cron на сервере
if (isProduction && process.env.ENABLE_FILE_LOGGING === 'true') {
  const logsDir = path.join(process.cwd(), 'logs');

  try {
    fs.mkdirSync(logsDir, { recursive: true });

    transports.push(
      new winston.transports.File({
        filename: path.join(logsDir, 'sync.log'),
        format: logFormat,
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(logsDir, 'sync-error.log'),
        level: 'error',
        format: logFormat,
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      })
    );
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    process.stderr.write(`File logging disabled: unable to create ${logsDir} (${reason})\n`);
  }
}

const logger = winston.createLogger({
  level: isProduction ? 'info' : 'debug',
  format: logFormat,
  transports,
  silent: isTest,
  exitOnError: false,
});

export const logSync = (message: string, meta?: Record<string, unknown>) => {
  logger.info(`[SYNC] ${message}`, meta);
};

export const logAPI = (message: string, meta?: Record<string, unknown>) => {
  logger.debug(`[API] ${message}`, meta);
};

export default logger;
