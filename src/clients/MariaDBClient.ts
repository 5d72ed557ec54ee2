import { createGunzip } from 'zlib';
import { Connection, createConnection } from 'mysql2/promise';
import { BackupConfig } from '../interfaces/BackupConfig';
import { CommandResult, CommandRunner, CommandSpec } from '../interfaces/CommandRunner';
import { Logger } from '../interfaces/Logger';
import {
  DumpTarget,
  LoadOptions,
  MariaDBClient as IMariaDBClient,
} from '../interfaces/MariaDBClient';
import { formatError, toError } from '../utils/errors';

const MAX_DATABASE_NAME_LENGTH = 64;

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Reject names that cannot be a database, would escape the backup directory
 * when used in a file name, or would be read as an option by the client tools.
 */
export function validateDatabaseName(name: string): void {
  if (!name) {
    throw new ValidationError('Database name must not be empty', 'databaseName');
  }
  if (name.length > MAX_DATABASE_NAME_LENGTH) {
    throw new ValidationError(
      `Database name must be at most ${MAX_DATABASE_NAME_LENGTH} characters: ${name}`,
      'databaseName'
    );
  }
  if (/[/\\\0]/.test(name)) {
    throw new ValidationError(`Database name contains a path separator: ${name}`, 'databaseName');
  }
  if (name.startsWith('-')) {
    throw new ValidationError(`Database name must not start with '-': ${name}`, 'databaseName');
  }
}

export function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

/**
 * MariaDB client that drives mysqldump and mysql through a CommandRunner
 */
export class MariaDBClient implements IMariaDBClient {
  constructor(
    private readonly config: Readonly<BackupConfig>,
    private readonly runner: CommandRunner,
    private readonly logger: Logger
  ) {}

  /**
   * Test that the server accepts the configured credentials
   */
  async testConnection(): Promise<boolean> {
    let connection: Connection | undefined;

    try {
      connection = await createConnection({
        user: this.config.dbUser || undefined,
        password: this.config.dbPassword || undefined,
        ...(this.config.dbSocket
          ? { socketPath: this.config.dbSocket }
          : { host: this.config.dbHost ?? 'localhost', port: this.config.dbPort ?? 3306 }),
        connectTimeout: 10000,
      });
      await connection.query('SELECT 1');
      return true;
    } catch (error) {
      const failure = toError(error);
      this.logger.error(`Error: connection test failed: ${failure.message}`, failure);
      return false;
    } finally {
      await connection?.end().catch(cleanupError => {
        this.logger.warn(`Failed to close database connection: ${formatError(cleanupError)}`);
      });
    }
  }

  async dump(target: DumpTarget, outputPath: string): Promise<CommandResult> {
    const args = this.connectionArgs();

    if (target.kind === 'all') {
      args.push('--all-databases');
    } else {
      validateDatabaseName(target.name);
    }

    // Consistent InnoDB snapshot without table locks, rows streamed instead of buffered
    args.push('--single-transaction', '--quick', '--lock-tables=false');

    if (target.kind === 'database') {
      args.push(target.name);
    }

    return this.runner.run(
      this.withTimeout({ command: this.config.dumpCommand, args, stdoutFile: outputPath })
    );
  }

  async executeStatement(sql: string): Promise<CommandResult> {
    return this.runner.run(
      this.withTimeout({
        command: this.config.clientCommand,
        args: [...this.connectionArgs(), `--execute=${sql}`],
      })
    );
  }

  async createDatabaseIfNotExists(databaseName: string): Promise<CommandResult> {
    validateDatabaseName(databaseName);
    return this.executeStatement(`CREATE DATABASE IF NOT EXISTS ${quoteIdentifier(databaseName)};`);
  }

  async load(inputPath: string, options: LoadOptions): Promise<CommandResult> {
    const args = this.connectionArgs();
    if (options.databaseName) {
      validateDatabaseName(options.databaseName);
      args.push(options.databaseName);
    }

    return this.runner.run(
      this.withTimeout({
        command: this.config.clientCommand,
        args,
        stdinFile: inputPath,
        stdinTransforms: options.decompress ? [createGunzip()] : [],
      })
    );
  }

  /**
   * Credential and server arguments; empty values are left out entirely
   */
  private connectionArgs(): string[] {
    const args: string[] = [];

    if (this.config.dbUser) {
      args.push(`--user=${this.config.dbUser}`);
    }
    if (this.config.dbPassword) {
      args.push(`--password=${this.config.dbPassword}`);
    }
    if (this.config.dbHost) {
      args.push(`--host=${this.config.dbHost}`);
    }
    if (this.config.dbPort !== undefined) {
      args.push(`--port=${this.config.dbPort}`);
    }
    if (this.config.dbSocket) {
      args.push(`--socket=${this.config.dbSocket}`);
    }

    return args;
  }

  private withTimeout(spec: CommandSpec): CommandSpec {
    if (this.config.commandTimeoutMinutes) {
      return { ...spec, timeoutMs: this.config.commandTimeoutMinutes * 60 * 1000 };
    }
    return spec;
  }
}
