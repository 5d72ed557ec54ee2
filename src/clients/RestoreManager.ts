import { promises as fs } from 'fs';
import { BackupConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { MariaDBClient } from '../interfaces/MariaDBClient';
import { RestoreManager as IRestoreManager, RestoreResult } from '../interfaces/RestoreManager';
import { GZIP_SUFFIX, isGzipFile } from '../utils/compression';
import { toError } from '../utils/errors';
import { describeCommandFailure, isSuccessful } from './CommandRunner';
import { validateDatabaseName } from './MariaDBClient';

export class RestoreError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RestoreError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Loads backup artifacts into the server with the mysql client
 */
export class RestoreManager implements IRestoreManager {
  constructor(
    private readonly client: MariaDBClient,
    private readonly config: Readonly<BackupConfig>,
    private readonly logger: Logger
  ) {}

  async restore(filePath: string, databaseName?: string): Promise<RestoreResult> {
    const startTime = Date.now();
    let compressed = false;

    // Precondition: nothing is run against the server for a missing file
    if (!(await this.isRegularFile(filePath))) {
      const message = `Error: backup file does not exist: ${filePath}`;
      this.logger.error(message);
      return {
        success: false,
        filePath,
        databaseName,
        compressed,
        duration: Date.now() - startTime,
        error: message,
      };
    }

    try {
      if (databaseName) {
        validateDatabaseName(databaseName);
      }

      this.logger.logRestoreStart(filePath, databaseName);

      compressed = await isGzipFile(filePath);
      const hasGzipSuffix = filePath.endsWith(GZIP_SUFFIX);
      if (compressed !== hasGzipSuffix) {
        this.logger.warn(
          compressed
            ? `File ${filePath} is gzip-compressed despite its name, decompressing`
            : `File ${filePath} is not gzip-compressed despite its name, loading as plain SQL`
        );
      }

      if (databaseName) {
        const created = await this.client.createDatabaseIfNotExists(databaseName);
        if (!isSuccessful(created)) {
          throw new RestoreError(
            `Failed to create database ${databaseName}: ${describeCommandFailure(this.config.clientCommand, created)}`,
            'create_database'
          );
        }
      }

      const result = await this.client.load(filePath, { databaseName, decompress: compressed });
      if (!isSuccessful(result)) {
        throw new RestoreError(
          describeCommandFailure(this.config.clientCommand, result),
          result.inputError ? 'decompress' : 'load',
          result.inputError
        );
      }

      const duration = Date.now() - startTime;
      this.logger.logRestoreComplete(filePath, duration);

      return { success: true, filePath, databaseName, compressed, duration };
    } catch (error) {
      const failure = toError(error);
      this.logger.logRestoreError(filePath, failure);

      return {
        success: false,
        filePath,
        databaseName,
        compressed,
        duration: Date.now() - startTime,
        error: failure.message,
      };
    }
  }

  private async isRegularFile(filePath: string): Promise<boolean> {
    try {
      return (await fs.stat(filePath)).isFile();
    } catch {
      return false;
    }
  }
}
