import { promises as fs } from 'fs';
import { Logger } from '../interfaces/Logger';
import { errorCode } from '../utils/errors';

/**
 * Creates the backup and log directories on demand
 */
export class DirectoryInitializer {
  constructor(private readonly logger: Logger) {}

  /**
   * Create `directory` (with parents) unless it exists. Logs only when it was
   * created; permission errors propagate.
   */
  async ensureDirectory(directory: string): Promise<boolean> {
    const created = await DirectoryInitializer.createDirectory(directory);
    if (created) {
      this.logger.info(`Created directory: ${directory}`);
    }
    return created;
  }

  /**
   * Create without logging, for the log directory which must exist before the
   * logger opens its file
   */
  static async createDirectory(directory: string): Promise<boolean> {
    try {
      const stats = await fs.stat(directory);
      if (stats.isDirectory()) {
        return false;
      }
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw error;
      }
    }

    // A non-directory at the path makes mkdir fail with EEXIST/ENOTDIR
    await fs.mkdir(directory, { recursive: true });
    return true;
  }
}
