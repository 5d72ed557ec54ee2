/**
 * Result of a retention cleanup operation
 */
export interface RetentionResult {
  /** Number of backups that were deleted */
  deletedCount: number;

  /** Total number of compressed backups found */
  totalCount: number;

  /** Paths of the deleted backups */
  deletedFiles: string[];

  /** Any errors encountered during deletion */
  errors: string[];
}

/**
 * Interface for managing backup retention and cleanup
 */
export interface RetentionManager {
  /**
   * Delete compressed backups whose modification time is older than the threshold
   * @param retentionDays age threshold in days; 0 deletes every compressed backup
   */
  cleanupExpiredBackups(retentionDays?: number): Promise<RetentionResult>;

  /**
   * Check if a backup is expired based on its modification time
   */
  isBackupExpired(lastModified: Date, retentionDays: number, now?: Date): boolean;
}
