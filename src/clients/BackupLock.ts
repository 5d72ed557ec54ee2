import { join } from 'path';
import { lock } from 'proper-lockfile';
import { Logger } from '../interfaces/Logger';
import { errorCode, formatError, toError } from '../utils/errors';

export const LOCK_FILE_NAME = '.backup.lock';

const STALE_LOCK_MS = 10 * 60 * 1000;

export class LockError extends Error {
  constructor(
    message: string,
    public readonly directory: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'LockError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Advisory lock serializing backup, restore and cleanup runs that share one
 * backup directory. The lock is refreshed while held, so only a crashed holder
 * leaves a lock that goes stale.
 */
export class BackupLock {
  constructor(
    private readonly backupDir: string,
    private readonly logger: Logger
  ) {}

  get lockPath(): string {
    return join(this.backupDir, LOCK_FILE_NAME);
  }

  async withLock<T>(action: () => Promise<T>): Promise<T> {
    let release: () => Promise<void>;
    try {
      release = await lock(this.backupDir, {
        lockfilePath: this.lockPath,
        retries: { retries: 5, minTimeout: 200, maxTimeout: 2000 },
        stale: STALE_LOCK_MS,
        onCompromised: error => {
          this.logger.error(`Lock on ${this.backupDir} was compromised: ${error.message}`, error);
        },
      });
    } catch (error) {
      const message =
        errorCode(error) === 'ELOCKED'
          ? `Another backup operation is running in ${this.backupDir}`
          : `Failed to acquire lock for ${this.backupDir}: ${formatError(error)}`;
      throw new LockError(message, this.backupDir, toError(error));
    }

    this.logger.debug(`Acquired lock ${this.lockPath}`);
    try {
      return await action();
    } finally {
      await this.releaseLock(release);
    }
  }

  /**
   * Release failures (e.g. after the lock was compromised) are logged, not rethrown
   */
  private async releaseLock(release: () => Promise<void>): Promise<void> {
    try {
      await release();
      this.logger.debug(`Released lock ${this.lockPath}`);
    } catch (error) {
      this.logger.warn(`Failed to release lock ${this.lockPath}: ${formatError(error)}`);
    }
  }
}
