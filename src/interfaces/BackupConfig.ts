import { LogLevel } from './Logger';

export interface BackupConfig {
  backupDir: string;
  logFile: string;
  timestampFormat: string; // fecha tokens, e.g. YYYYMMDD_HHmmss
  dbUser: string;
  dbPassword: string; // empty means no password argument
  dbHost?: string;
  dbPort?: number;
  dbSocket?: string;
  dumpCommand: string;
  clientCommand: string;
  retentionDays: number;
  commandTimeoutMinutes?: number;
  logLevel: LogLevel;
}
