import { Command, InvalidArgumentError, OutputConfiguration } from 'commander';
import { format } from 'fecha';
import { BackupCommands } from './interfaces/BackupCommands';
import { BackupListing } from './interfaces/BackupManager';

export const PROGRAM_NAME = 'mariadb-backup';

type GlobalOptions = {
  backupDir?: string;
  logFile?: string;
};

/**
 * An operation ran and failed. The failure is already logged, so the router
 * only turns it into a non-zero exit status.
 */
export class CommandFailedError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1
  ) {
    super(message);
    this.name = 'CommandFailedError';
  }
}

/**
 * Parse the cleanup age threshold; an empty value falls back to the configured default
 */
export function parseRetentionDays(value: string): number | undefined {
  const trimmed = value.trim();
  if (trimmed === '') {
    return undefined;
  }
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError('Days must be a non-negative integer.');
  }
  return parseInt(trimmed, 10);
}

/**
 * Human readable size in the style of `ls -lh`
 */
export function formatFileSize(bytes: number): string {
  const units = ['K', 'M', 'G', 'T'];
  if (bytes < 1024) {
    return `${bytes}B`;
  }

  // One decimal below 10, whole numbers above; the unit is picked after rounding
  const rounded = (value: number): number => {
    const tenths = Math.round(value * 10) / 10;
    return tenths < 10 ? tenths : Math.round(value);
  };

  let size = bytes / 1024;
  let unitIndex = 0;
  while (rounded(size) >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  const value = rounded(size);
  return `${value < 10 ? value.toFixed(1) : value}${units[unitIndex]}`;
}

export function formatListing(listing: BackupListing): string[] {
  if (!listing.directoryExists) {
    return [`Backup directory does not exist: ${listing.directory}`];
  }
  if (listing.files.length === 0) {
    return [`No backup files found in ${listing.directory}`];
  }

  return [
    `Available backup files in ${listing.directory}:`,
    ...listing.files.map(
      file =>
        `  ${formatFileSize(file.size).padStart(6)}  ${format(file.lastModified, 'YYYY-MM-DD HH:mm')}  ${file.fileName}`
    ),
  ];
}

/**
 * Build the command line. Commander errors (unknown command, missing argument)
 * are thrown as CommanderError instead of exiting, operation failures as
 * CommandFailedError.
 */
export function createProgram(
  commands: BackupCommands,
  output: OutputConfiguration = {},
  version = '0.0.0'
): Command {
  const writeOut = (text: string): void => {
    if (output.writeOut) {
      output.writeOut(text);
    } else {
      process.stdout.write(text);
    }
  };

  const program = new Command();

  // Set before subcommands are added so they inherit it
  program
    .name(PROGRAM_NAME)
    .description('Back up and restore MariaDB databases with mysqldump, gzip and retention cleanup')
    .version(version)
    .option('--backup-dir <dir>', 'backup directory (overrides BACKUP_DIR)')
    .option('--log-file <file>', 'log file (overrides LOG_FILE)')
    .configureOutput(output)
    .showHelpAfterError()
    .exitOverride();

  program.hook('preAction', async () => {
    await commands.initialize(program.opts<GlobalOptions>());
  });

  program
    .command('backup')
    .description('back up a database, or all databases when none is named')
    .argument('[database]', 'database to back up')
    .action(async (databaseName: string | undefined) => {
      const result = await commands.backup(databaseName || undefined);
      if (!result.success) {
        throw new CommandFailedError(result.error ?? `Backup of ${result.target} failed`);
      }
      writeOut(`Backup file: ${result.filePath}\n`);
    });

  program
    .command('restore')
    .description('restore a backup file, into the named database when given')
    .argument('<file>', 'backup file (.sql or .sql.gz)')
    .argument('[database]', 'target database, created if missing')
    .action(async (filePath: string, databaseName: string | undefined) => {
      const result = await commands.restore(filePath, databaseName || undefined);
      if (!result.success) {
        throw new CommandFailedError(result.error ?? 'Database restore failed');
      }
    });

  program
    .command('list')
    .description('list backup files in the backup directory')
    .action(async () => {
      const listing = await commands.list();
      writeOut(`${formatListing(listing).join('\n')}\n`);
    });

  program
    .command('cleanup')
    .description('delete compressed backups older than the given number of days (default 30)')
    .argument('[days]', 'age threshold in days', parseRetentionDays)
    .action(async (retentionDays: number | undefined) => {
      const result = await commands.cleanup(retentionDays);
      if (result.errors.length > 0) {
        throw new CommandFailedError(`Cleanup finished with ${result.errors.length} error(s)`);
      }
    });

  program
    .command('check')
    .description('verify that the database server accepts the configured credentials')
    .action(async () => {
      if (!(await commands.check())) {
        throw new CommandFailedError('Connection check failed');
      }
      writeOut('Connection to the database server succeeded\n');
    });

  return program;
}
