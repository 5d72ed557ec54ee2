/**
 * Result of a backup operation
 */
export interface BackupResult {
  /** Whether the backup operation was successful */
  success: boolean;

  /** Database that was backed up, or `all_databases` */
  target: string;

  /** Path of the compressed artifact, empty on failure */
  filePath: string;

  /** Size of the compressed artifact in bytes */
  fileSize: number;

  /** Duration of the backup operation in milliseconds */
  duration: number;

  /** Error message if the backup failed */
  error?: string;
}

/**
 * A backup file found in the backup directory
 */
export interface BackupFileInfo {
  fileName: string;
  filePath: string;
  size: number;
  lastModified: Date;
}

export interface BackupListing {
  directory: string;
  directoryExists: boolean;
  files: BackupFileInfo[];
}

/**
 * Interface for the backup executor
 */
export interface BackupManager {
  /** Back up a single named database */
  backupDatabase(databaseName: string): Promise<BackupResult>;

  /** Back up every database on the server */
  backupAllDatabases(): Promise<BackupResult>;

  /** List backup artifacts in the backup directory */
  listBackups(): Promise<BackupListing>;
}
