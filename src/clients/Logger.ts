import winston from 'winston';
import { Logger as ILogger, LogLevel } from '../interfaces/Logger';

export const LOG_TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'dbpassword'];

export interface LoggerOptions {
  level?: LogLevel;

  /** Append log lines to this file; console only when omitted */
  logFile?: string;
}

/**
 * Sanitize metadata to remove sensitive information
 */
export function sanitizeMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = { ...meta };

  for (const [key, value] of Object.entries(sanitized)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

    if (isSensitive) {
      sanitized[key] = value ? '[REDACTED]' : value;
    } else if (isPlainObject(value)) {
      sanitized[key] = sanitizeMeta(value);
    }
  }

  return sanitized;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Render one entry as `[YYYY-MM-DD HH:MM:SS] message`. In verbose mode the
 * metadata follows as JSON and an error stack on the next lines.
 */
export function formatLogLine(info: winston.Logform.TransformableInfo, verbose: boolean): string {
  const { timestamp, level, message, ...meta } = info;
  let line = `[${String(timestamp)}] ${String(message)}`;

  if (!verbose) {
    return line;
  }

  const { error, ...rest } = meta;
  if (Object.keys(rest).length > 0) {
    line += ` ${JSON.stringify(sanitizeMeta(rest))}`;
  }
  if (isPlainObject(error) && typeof error.stack === 'string') {
    line += `\n${error.stack}`;
  }
  return line;
}

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(options: LoggerOptions = {}) {
    const level = options.level ?? LogLevel.INFO;
    const verbose = level === LogLevel.DEBUG;

    const lineFormat = winston.format.combine(
      winston.format.timestamp({ format: LOG_TIMESTAMP_FORMAT }),
      winston.format.printf(info => formatLogLine(info, verbose))
    );

    const consoleTransport = new winston.transports.Console();
    const transports = options.logFile
      ? [consoleTransport, new winston.transports.File({ filename: options.logFile })]
      : [consoleTransport];

    this.winston = winston.createLogger({
      level,
      format: lineFormat,
      transports,
    });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: Record<string, unknown>): void {
    const errorMeta = {
      ...meta,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
          ...('code' in error && { code: error.code }),
          ...('path' in error && { path: error.path }),
        },
      }),
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.winston.debug(message, meta);
  }

  logBackupStart(target: string): void {
    this.info(`Starting backup: ${target}`, {
      operation: 'backup_start',
      target,
    });
  }

  logBackupComplete(target: string, filePath: string, fileSize: number, duration: number): void {
    this.info(`Backup of ${target} completed: ${filePath}`, {
      operation: 'backup_complete',
      target,
      filePath,
      fileSize,
      duration,
    });
  }

  logBackupError(target: string, error: Error): void {
    this.error(`Error: backup of ${target} failed: ${error.message}`, error, {
      operation: 'backup_error',
      target,
    });
  }

  logRestoreStart(filePath: string, databaseName?: string): void {
    const into = databaseName ? `database ${databaseName}` : 'databases named in the dump';
    this.info(`Starting restore into ${into} from file: ${filePath}`, {
      operation: 'restore_start',
      filePath,
      databaseName,
    });
  }

  logRestoreComplete(filePath: string, duration: number): void {
    this.info('Database restore completed successfully', {
      operation: 'restore_complete',
      filePath,
      duration,
    });
  }

  logRestoreError(filePath: string, error: Error): void {
    this.error(`Error: database restore failed: ${error.message}`, error, {
      operation: 'restore_error',
      filePath,
    });
  }

  logBackupDeleted(filePath: string): void {
    this.info(`Deleted old backup file: ${filePath}`, {
      operation: 'backup_deleted',
      filePath,
    });
  }

  logRetentionCleanup(deletedCount: number, retentionDays: number): void {
    this.info(`Retention cleanup completed: ${deletedCount} backup(s) older than ${retentionDays} day(s) deleted`, {
      operation: 'retention_cleanup',
      deletedCount,
      retentionDays,
    });
  }

  logConfigurationStart(config: Record<string, unknown>): void {
    this.debug('Configuration loaded', {
      operation: 'startup',
      config: sanitizeMeta(config),
    });
  }
}
