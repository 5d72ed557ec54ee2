import { ConfigurationOverrides } from '../config/ConfigurationManager';
import { BackupListing, BackupResult } from './BackupManager';
import { RestoreResult } from './RestoreManager';
import { RetentionResult } from './RetentionManager';

/**
 * The operations the command line dispatches to
 */
export interface BackupCommands {
  /** Load configuration, open the log and create the backup directory */
  initialize(overrides: ConfigurationOverrides): Promise<void>;

  /** Back up the named database, or every database when omitted */
  backup(databaseName?: string): Promise<BackupResult>;

  restore(filePath: string, databaseName?: string): Promise<RestoreResult>;

  list(): Promise<BackupListing>;

  /** Delete compressed backups older than the threshold (configured default when omitted) */
  cleanup(retentionDays?: number): Promise<RetentionResult>;

  /** Verify the server accepts the configured credentials */
  check(): Promise<boolean>;

  /** Report an unexpected failure through the log when it is open */
  reportError(error: unknown): void;
}
