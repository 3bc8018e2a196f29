import * as fs from 'fs';
import * as path from 'path';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: TIMESTAMP_FORMAT }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, context, stack }) => {
    const contextStr = context ? `[${String(context)}] ` : '';
    const stackStr = stack ? `\n${String(stack)}` : '';
    return `[${String(timestamp)}] [${level.toUpperCase()}] ${contextStr}${String(message)}${stackStr}`;
  }),
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: TIMESTAMP_FORMAT }),
  winston.format.printf(({ timestamp, level, message, context }) => {
    const contextStr = context ? `[${String(context)}] ` : '';
    return `[${String(timestamp)}] ${level} ${contextStr}${String(message)}`;
  }),
);

function ensureLogDir(logDir: string): boolean {
  if (fs.existsSync(logDir)) {
    return true;
  }
  try {
    fs.mkdirSync(logDir, { recursive: true });
    return true;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`Failed to create log directory ${logDir}: ${reason}`);
    return false;
  }
}

function rotatingFiles(logDir: string): DailyRotateFile[] {
  return [
    new DailyRotateFile({
      filename: path.join(logDir, 'stepforge-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '10m',
      maxFiles: '14d',
      format: fileFormat,
      level: 'debug',
    }),
    new DailyRotateFile({
      filename: path.join(logDir, 'stepforge-error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '10m',
      maxFiles: '14d',
      format: fileFormat,
      level: 'error',
    }),
  ];
}

/**
 * Console logger, plus daily-rotating main and error files when a log
 * directory is configured and can be created.
 */
export function createWinstonLogger(logDir?: string): winston.Logger {
  const consoleTransport = new winston.transports.Console({
    format: consoleFormat,
    level: 'debug',
  });
  const transports =
    logDir && ensureLogDir(logDir)
      ? [consoleTransport, ...rotatingFiles(logDir)]
      : [consoleTransport];

  return winston.createLogger({ level: 'debug', transports });
}
