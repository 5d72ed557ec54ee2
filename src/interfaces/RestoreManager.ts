/**
 * Result of a restore operation
 */
export interface RestoreResult {
  success: boolean;
  filePath: string;
  databaseName?: string;
  compressed: boolean;
  duration: number;
  error?: string;
}

export interface RestoreManager {
  /**
   * Load a backup file into the server
   * @param filePath backup artifact, plain or gzip-compressed
   * @param databaseName created if missing and used as the load target; omit for all-databases dumps
   */
  restore(filePath: string, databaseName?: string): Promise<RestoreResult>;
}
