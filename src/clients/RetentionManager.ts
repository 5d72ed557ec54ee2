import { promises as fs } from 'fs';
import { BackupConfig } from '../interfaces/BackupConfig';
import { BackupFileInfo } from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';
import {
  RetentionManager as IRetentionManager,
  RetentionResult,
} from '../interfaces/RetentionManager';
import { COMPRESSED_BACKUP_PATTERN, scanBackupDirectory } from '../utils/backupFiles';
import { formatError, toError } from '../utils/errors';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Custom error classes for retention management operations
 */
export class RetentionError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RetentionError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class RetentionDeletionError extends RetentionError {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: Error
  ) {
    super(message, 'deletion', cause);
    this.name = 'RetentionDeletionError';
  }
}

/**
 * RetentionManager implementation for the local backup directory.
 * Only compressed artifacts are considered; plain `.sql` files are never deleted.
 */
export class RetentionManager implements IRetentionManager {
  constructor(
    private readonly config: Readonly<BackupConfig>,
    private readonly logger: Logger
  ) {}

  async cleanupExpiredBackups(
    retentionDays: number = this.config.retentionDays
  ): Promise<RetentionResult> {
    const result: RetentionResult = {
      deletedCount: 0,
      totalCount: 0,
      deletedFiles: [],
      errors: [],
    };

    this.logger.info(`Cleaning up backup files older than ${retentionDays} day(s)`);

    let backups: BackupFileInfo[] | null;
    try {
      backups = await scanBackupDirectory(this.config.backupDir, COMPRESSED_BACKUP_PATTERN);
    } catch (error) {
      const listingError = new RetentionError(
        `Failed to list backups for cleanup: ${formatError(error)}`,
        'listing',
        toError(error)
      );
      this.logger.error(listingError.message, listingError);
      result.errors.push(listingError.message);
      return result;
    }

    if (backups === null) {
      this.logger.warn(`Backup directory does not exist: ${this.config.backupDir}`);
      return result;
    }

    result.totalCount = backups.length;
    const now = new Date();

    // Sequential deletion keeps one log line per file in directory order
    for (const backup of backups) {
      if (!this.isBackupExpired(backup.lastModified, retentionDays, now)) {
        this.logger.debug(
          `Keeping backup: ${backup.filePath} (modified: ${backup.lastModified.toISOString()})`
        );
        continue;
      }

      try {
        await fs.unlink(backup.filePath);
        result.deletedCount++;
        result.deletedFiles.push(backup.filePath);
        this.logger.logBackupDeleted(backup.filePath);
      } catch (error) {
        const deletionError = new RetentionDeletionError(
          `Failed to delete backup ${backup.filePath}: ${formatError(error)}`,
          backup.filePath,
          toError(error)
        );
        result.errors.push(deletionError.message);
        this.logger.error(deletionError.message, deletionError);
      }
    }

    this.logger.logRetentionCleanup(result.deletedCount, retentionDays);

    if (result.errors.length > 0) {
      this.logger.warn(
        `Retention cleanup had ${result.errors.length} errors. Some backups may not have been deleted.`
      );
    }

    return result;
  }

  /**
   * A backup is expired when it was last modified more than `retentionDays`
   * days before `now`. 0 days expires every backup.
   */
  isBackupExpired(lastModified: Date, retentionDays: number, now: Date = new Date()): boolean {
    if (retentionDays === 0) {
      return true;
    }

    const cutoff = now.getTime() - retentionDays * DAY_MS;
    return lastModified.getTime() < cutoff;
  }
}
