import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { ConfigurationError, errorMessage } from './errors.js';

export interface LoggerConfig {
  logFile?: string;
  logLevel?: string;
  enableConsole?: boolean;
  silent?: boolean;
}

type LogMeta = Record<string, unknown>;

class Logger {
  private static instance: winston.Logger | null = null;
  private static config: LoggerConfig = {};

  /**
   * Replace the active logger. A log file that cannot be opened raises a
   * ConfigurationError and leaves the previous configuration in place.
   */
  static initialize(config: LoggerConfig = {}): void {
    Logger.instance = Logger.createLogger(config);
    Logger.config = config;
  }

  private static createLogger(config: LoggerConfig): winston.Logger {
    const { logFile, logLevel = 'warn', enableConsole = false, silent = false } = config;

    const transports: winston.transport[] = [];

    // LOG_FILE switches from stderr to daily rotated JSON files
    if (logFile) {
      try {
        transports.push(...Logger.createFileTransports(logFile, logLevel));
      } catch (error) {
        throw new ConfigurationError(`Unable to open LOG_FILE '${logFile}': ${errorMessage(error)}`);
      }
    } else {
      // stdout carries passphrases, so every level goes to stderr
      transports.push(
        new winston.transports.Console({
          stderrLevels: ['error', 'warn', 'info', 'debug', 'verbose'],
          level: logLevel,
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.printf(({ timestamp, level, message, ...meta }) => {
              let log = `${timestamp} [phrasewright] [${level}] ${message}`;
              if (Object.keys(meta).length > 0) {
                log += ` ${JSON.stringify(meta)}`;
              }
              return log;
            })
          )
        })
      );
    }

    if (enableConsole) {
      transports.push(
        new winston.transports.Console({
          stderrLevels: ['error', 'warn', 'info', 'debug', 'verbose'],
          level: logLevel,
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.timestamp({ format: 'HH:mm:ss' }),
            winston.format.printf(({ timestamp, level, message, ...meta }) => {
              let log = `${timestamp} [${level}]: ${message}`;
              if (Object.keys(meta).length > 0) {
                log += ` ${JSON.stringify(meta)}`;
              }
              return log;
            })
          )
        })
      );
    }

    return winston.createLogger({
      level: logLevel,
      transports,
      exitOnError: false,
      silent
    });
  }

  private static createFileTransports(logFile: string, logLevel: string): winston.transport[] {
    const logDir = path.dirname(logFile);

    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    const baseFileName = path.basename(logFile, path.extname(logFile));
    const fileFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    );

    return [
      new DailyRotateFile({
        filename: path.join(logDir, `${baseFileName}-%DATE%.log`),
        datePattern: 'YYYY-MM-DD',
        maxSize: '5m',
        maxFiles: '14d',
        level: logLevel,
        format: fileFormat
      }),
      new DailyRotateFile({
        filename: path.join(logDir, `${baseFileName}-error-%DATE%.log`),
        datePattern: 'YYYY-MM-DD',
        maxSize: '5m',
        maxFiles: '30d',
        level: 'error',
        format: fileFormat
      })
    ];
  }

  static getLogger(): winston.Logger {
    if (!Logger.instance) {
      Logger.instance = Logger.createLogger(Logger.config);
    }
    return Logger.instance;
  }

  static error(message: string, meta?: LogMeta): void {
    Logger.getLogger().error(message, meta);
  }

  static warn(message: string, meta?: LogMeta): void {
    Logger.getLogger().warn(message, meta);
  }

  static debug(message: string, meta?: LogMeta): void {
    Logger.getLogger().debug(message, meta);
  }

  // Reconfigure at runtime (tests silence output this way)
  static reconfigure(config: LoggerConfig): void {
    Logger.initialize({ ...Logger.config, ...config });
  }
}

export default Logger;
