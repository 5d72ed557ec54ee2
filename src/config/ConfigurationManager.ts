import { BackupConfig } from '../interfaces/BackupConfig';
import { LogLevel } from '../interfaces/Logger';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Values given on the command line, which take precedence over the environment
 */
export interface ConfigurationOverrides {
  backupDir?: string;
  logFile?: string;
}

export const DEFAULT_BACKUP_DIR = '/var/backups/mariadb';
export const DEFAULT_LOG_FILE = '/var/log/mariadb_backup.log';
export const DEFAULT_TIMESTAMP_FORMAT = 'YYYYMMDD_HHmmss';
export const DEFAULT_RETENTION_DAYS = 30;

export class ConfigurationManager {
  /**
   * Build the configuration for one invocation. The returned object is frozen.
   */
  static loadConfiguration(
    env: NodeJS.ProcessEnv = process.env,
    overrides: ConfigurationOverrides = {}
  ): Readonly<BackupConfig> {
    const timestampFormat = env.BACKUP_TIMESTAMP_FORMAT || DEFAULT_TIMESTAMP_FORMAT;
    if (/[\\/]/.test(timestampFormat)) {
      throw new ConfigurationError(
        'BACKUP_TIMESTAMP_FORMAT must not contain path separators',
        'BACKUP_TIMESTAMP_FORMAT'
      );
    }

    const logLevel = (env.LOG_LEVEL || LogLevel.INFO).toLowerCase();
    if (!this.isLogLevel(logLevel)) {
      throw new ConfigurationError(
        `LOG_LEVEL must be one of: ${Object.values(LogLevel).join(', ')}`,
        'LOG_LEVEL'
      );
    }

    const config: BackupConfig = {
      backupDir: overrides.backupDir || env.BACKUP_DIR || DEFAULT_BACKUP_DIR,
      logFile: overrides.logFile || env.LOG_FILE || DEFAULT_LOG_FILE,
      timestampFormat,
      // An explicitly empty DB_USER leaves the user to the client's defaults
      dbUser: env.DB_USER ?? 'root',
      dbPassword: env.DB_PASSWORD ?? '',
      dumpCommand: env.MYSQLDUMP_BIN || 'mysqldump',
      clientCommand: env.MYSQL_BIN || 'mysql',
      retentionDays:
        this.parseNonNegativeInteger(env, 'BACKUP_RETENTION_DAYS') ?? DEFAULT_RETENTION_DAYS,
      logLevel,
    };

    // Add optional properties only if they exist
    if (env.DB_HOST) {
      config.dbHost = env.DB_HOST;
    }
    if (env.DB_SOCKET) {
      config.dbSocket = env.DB_SOCKET;
    }
    const port = this.parseNonNegativeInteger(env, 'DB_PORT');
    if (port !== undefined) {
      if (port === 0 || port > 65535) {
        throw new ConfigurationError('DB_PORT must be between 1 and 65535', 'DB_PORT');
      }
      config.dbPort = port;
    }
    const timeout = this.parseNonNegativeInteger(env, 'COMMAND_TIMEOUT_MINUTES');
    if (timeout) {
      config.commandTimeoutMinutes = timeout;
    }

    return Object.freeze(config);
  }

  static sanitizeForLogging(config: Readonly<BackupConfig>): Record<string, unknown> {
    return {
      ...config,
      dbPassword: config.dbPassword ? '[REDACTED]' : '',
    };
  }

  /**
   * Parse a days/port/minutes style variable; undefined when unset or empty
   */
  private static parseNonNegativeInteger(
    env: NodeJS.ProcessEnv,
    name: string
  ): number | undefined {
    const raw = env[name]?.trim();
    if (!raw) {
      return undefined;
    }
    if (!/^\d+$/.test(raw)) {
      throw new ConfigurationError(`${name} must be a non-negative integer`, name);
    }
    return parseInt(raw, 10);
  }

  private static isLogLevel(value: string): value is LogLevel {
    return Object.values(LogLevel).some(level => level === value);
  }
}
