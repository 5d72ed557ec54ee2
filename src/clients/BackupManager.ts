import { promises as fs } from 'fs';
import { join } from 'path';
import { BackupConfig } from '../interfaces/BackupConfig';
import {
  BackupListing,
  BackupManager as IBackupManager,
  BackupResult,
} from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';
import { DumpTarget, MariaDBClient } from '../interfaces/MariaDBClient';
import {
  ALL_DATABASES_NAME,
  BACKUP_FILE_PATTERN,
  buildBackupFileName,
  scanBackupDirectory,
} from '../utils/backupFiles';
import { gzipFile } from '../utils/compression';
import { errorCode, formatError, toError } from '../utils/errors';
import { describeCommandFailure, isSuccessful } from './CommandRunner';
import { validateDatabaseName } from './MariaDBClient';

/**
 * Error raised for a failed step of a backup; `operation` names the step
 */
export class BackupError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'BackupError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * BackupManager implementation that dumps one or all databases into the backup
 * directory and compresses the result
 */
export class BackupManager implements IBackupManager {
  constructor(
    private readonly client: MariaDBClient,
    private readonly config: Readonly<BackupConfig>,
    private readonly logger: Logger
  ) {}

  async backupDatabase(databaseName: string): Promise<BackupResult> {
    return this.executeBackup({ kind: 'database', name: databaseName });
  }

  async backupAllDatabases(): Promise<BackupResult> {
    return this.executeBackup({ kind: 'all' });
  }

  async listBackups(): Promise<BackupListing> {
    const directory = this.config.backupDir;
    const files = await scanBackupDirectory(directory, BACKUP_FILE_PATTERN);

    return {
      directory,
      directoryExists: files !== null,
      files: files ?? [],
    };
  }

  /**
   * Dump, compress and verify. Failures are logged and returned, never thrown.
   */
  private async executeBackup(target: DumpTarget): Promise<BackupResult> {
    const startTime = Date.now();
    const targetName = target.kind === 'all' ? ALL_DATABASES_NAME : target.name;
    let dumpPath: string | null = null;

    try {
      if (target.kind === 'database') {
        validateDatabaseName(target.name);
      }
      this.logger.logBackupStart(targetName);

      // The timestamp is taken once, when the file name is built
      dumpPath = join(
        this.config.backupDir,
        buildBackupFileName(targetName, new Date(), this.config.timestampFormat)
      );

      const result = await this.client.dump(target, dumpPath);
      if (!isSuccessful(result)) {
        throw new BackupError(
          describeCommandFailure(this.config.dumpCommand, result),
          'dump',
          result.outputError
        );
      }

      const archivePath = await this.compress(dumpPath);
      await this.removeCompressedDump(dumpPath);
      dumpPath = null;

      const stats = await fs.stat(archivePath);
      if (stats.size === 0) {
        throw new BackupError(`Backup file is empty: ${archivePath}`, 'verify');
      }

      const duration = Date.now() - startTime;
      this.logger.logBackupComplete(targetName, archivePath, stats.size, duration);

      return {
        success: true,
        target: targetName,
        filePath: archivePath,
        fileSize: stats.size,
        duration,
      };
    } catch (error) {
      const failure = toError(error);
      this.logger.logBackupError(targetName, failure);

      // Only a failed dump leaves a partial file; a complete dump whose
      // compression failed is kept so it can be compressed by hand
      if (dumpPath && !(failure instanceof BackupError && failure.operation === 'compress')) {
        await this.removePartialFile(dumpPath);
      }

      return {
        success: false,
        target: targetName,
        filePath: '',
        fileSize: 0,
        duration: Date.now() - startTime,
        error: failure.message,
      };
    }
  }

  private async compress(dumpPath: string): Promise<string> {
    try {
      return await gzipFile(dumpPath);
    } catch (error) {
      throw new BackupError(
        `Failed to compress ${dumpPath}: ${formatError(error)}`,
        'compress',
        toError(error)
      );
    }
  }

  // The archive is complete; a leftover dump is only logged
  private async removeCompressedDump(dumpPath: string): Promise<void> {
    try {
      await fs.unlink(dumpPath);
    } catch (error) {
      this.logger.warn(`Failed to remove uncompressed dump ${dumpPath}: ${formatError(error)}`);
    }
  }

  private async removePartialFile(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
      this.logger.info(`Removed incomplete backup file: ${filePath}`);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        this.logger.warn(`Failed to remove incomplete backup file ${filePath}: ${formatError(error)}`);
      }
    }
  }
}
