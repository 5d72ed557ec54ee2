export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: Error, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;

  // Specialized logging methods for backup operations
  logBackupStart(target: string): void;
  logBackupComplete(target: string, filePath: string, fileSize: number, duration: number): void;
  logBackupError(target: string, error: Error): void;
  logRestoreStart(filePath: string, databaseName?: string): void;
  logRestoreComplete(filePath: string, duration: number): void;
  logRestoreError(filePath: string, error: Error): void;
  logBackupDeleted(filePath: string): void;
  logRetentionCleanup(deletedCount: number, retentionDays: number): void;
  logConfigurationStart(config: Record<string, unknown>): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
