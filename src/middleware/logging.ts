import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { ConfigManager } from '../config/ConfigManager.js';
import { LoggingConfig } from '../config/types.js';

// stdout carries command output; every log level goes to stderr
const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

function consoleTransport(colorize: boolean): winston.transports.ConsoleTransportInstance {
  return new winston.transports.Console({
    stderrLevels: ALL_LEVELS,
    format: winston.format.combine(winston.format.colorize({ all: colorize }), winston.format.simple()),
  });
}

function rotatingFile(file: LoggingConfig['file'], name: string, level?: string): DailyRotateFile {
  return new DailyRotateFile({
    filename: `${file.path}/${name}-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    maxSize: `${file.maxSize}m`,
    maxFiles: `${file.maxFiles}d`,
    zippedArchive: true,
    auditFile: `${file.path}/.audit-${name}.json`,
    ...(level && { level }),
  });
}

// Usable before configuration is read; initializeLogger() replaces the transports
export const logger = winston.createLogger({
  level: 'warn',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [consoleTransport(true)],
});

let isInitialized = false;

/**
 * Apply the logging section of the configuration. Call once, after ConfigManager validated.
 */
export function initializeLogger(): void {
  if (isInitialized) {
    return;
  }

  const config = ConfigManager.getInstance().getLoggingConfig();
  logger.level = config.level;
  logger.clear();

  if (config.file.enabled) {
    logger.add(rotatingFile(config.file, 'error', 'error'));
    logger.add(rotatingFile(config.file, 'app'));
  }
  if (config.console.enabled) {
    logger.add(consoleTransport(config.console.colorize));
  }

  // winston complains about a logger without transports
  if (!config.file.enabled && !config.console.enabled) {
    logger.silent = true;
  }

  isInitialized = true;
  logger.debug('Logger initialized', { level: config.level });
}
