import { CommanderError } from 'commander';
import {
  CommandFailedError,
  createProgram,
  formatFileSize,
  formatListing,
  parseRetentionDays,
} from '../src/cli';
import { captureOutput, CapturedOutput, createMockCommands } from './helpers/commands';

describe('createProgram', () => {
  let commands: ReturnType<typeof createMockCommands>;
  let output: CapturedOutput;

  const run = (...args: string[]) =>
    createProgram(commands, output, '1.2.3').parseAsync(['node', 'mariadb-backup', ...args]);

  const runExpectingError = async (...args: string[]): Promise<unknown> => {
    try {
      await run(...args);
    } catch (error) {
      return error;
    }
    return undefined;
  };

  beforeEach(() => {
    jest.clearAllMocks();
    commands = createMockCommands();
    output = captureOutput();
  });

  describe('backup', () => {
    it('should back up the named database and print the artifact path', async () => {
      await run('backup', 'shop');

      expect(commands.initialize).toHaveBeenCalledWith({});
      expect(commands.backup).toHaveBeenCalledWith('shop');
      expect(output.out).toBe('Backup file: /var/backups/mariadb/shop_20240115_143045.sql.gz\n');
    });

    it('should back up all databases without an argument', async () => {
      await run('backup');

      expect(commands.backup).toHaveBeenCalledWith(undefined);
    });

    it('should pass the global directory options to initialization', async () => {
      await run('--backup-dir', '/srv/backups', '--log-file', '/srv/backup.log', 'backup', 'shop');

      expect(commands.initialize).toHaveBeenCalledWith({
        backupDir: '/srv/backups',
        logFile: '/srv/backup.log',
      });
    });

    it('should fail with the backup error', async () => {
      commands.backup.mockResolvedValue({
        success: false,
        target: 'shop',
        filePath: '',
        fileSize: 0,
        duration: 10,
        error: 'mysqldump failed with exit code 2',
      });

      const error = await runExpectingError('backup', 'shop');

      expect(error).toBeInstanceOf(CommandFailedError);
      expect(error).toMatchObject({ message: 'mysqldump failed with exit code 2', exitCode: 1 });
      expect(output.out).toBe('');
    });
  });

  describe('restore', () => {
    it('should restore into the named database', async () => {
      await run('restore', '/tmp/shop.sql.gz', 'shop');

      expect(commands.restore).toHaveBeenCalledWith('/tmp/shop.sql.gz', 'shop');
    });

    it('should restore without a database', async () => {
      await run('restore', '/tmp/all_databases.sql.gz');

      expect(commands.restore).toHaveBeenCalledWith('/tmp/all_databases.sql.gz', undefined);
    });

    it('should require a backup file', async () => {
      const error = await runExpectingError('restore');

      expect(error).toBeInstanceOf(CommanderError);
      expect(error).toMatchObject({ code: 'commander.missingArgument', exitCode: 1 });
      expect(output.err).toContain("error: missing required argument 'file'");
      expect(commands.initialize).not.toHaveBeenCalled();
      expect(commands.restore).not.toHaveBeenCalled();
    });

    it('should fail when the restore fails', async () => {
      commands.restore.mockResolvedValue({
        success: false,
        filePath: '/tmp/missing.sql',
        compressed: false,
        duration: 0,
        error: 'Error: backup file does not exist: /tmp/missing.sql',
      });

      const error = await runExpectingError('restore', '/tmp/missing.sql');

      expect(error).toBeInstanceOf(CommandFailedError);
    });
  });

  describe('list', () => {
    it('should print the listing', async () => {
      await run('list');

      expect(output.out).toBe('No backup files found in /var/backups/mariadb\n');
    });
  });

  describe('cleanup', () => {
    it('should use the configured default without an argument', async () => {
      await run('cleanup');

      expect(commands.cleanup).toHaveBeenCalledWith(undefined);
    });

    it('should parse the number of days', async () => {
      await run('cleanup', '7');

      expect(commands.cleanup).toHaveBeenCalledWith(7);
    });

    it('should reject a non-numeric number of days', async () => {
      const error = await runExpectingError('cleanup', 'abc');

      expect(error).toMatchObject({ code: 'commander.invalidArgument', exitCode: 1 });
      expect(output.err).toContain('Days must be a non-negative integer.');
      expect(commands.cleanup).not.toHaveBeenCalled();
    });

    it('should fail when deletions failed', async () => {
      commands.cleanup.mockResolvedValue({
        deletedCount: 0,
        totalCount: 1,
        deletedFiles: [],
        errors: ['Failed to delete backup /var/backups/mariadb/a.sql.gz: Error: EACCES'],
      });

      const error = await runExpectingError('cleanup', '0');

      expect(error).toMatchObject({ message: 'Cleanup finished with 1 error(s)', exitCode: 1 });
    });
  });

  describe('check', () => {
    it('should report a working connection', async () => {
      await run('check');

      expect(output.out).toBe('Connection to the database server succeeded\n');
    });

    it('should fail when the connection fails', async () => {
      commands.check.mockResolvedValue(false);

      const error = await runExpectingError('check');

      expect(error).toMatchObject({ message: 'Connection check failed', exitCode: 1 });
    });
  });

  it('should reject an unknown command', async () => {
    const error = await runExpectingError('snapshot');

    expect(error).toBeInstanceOf(CommanderError);
    expect(error).toMatchObject({ code: 'commander.unknownCommand', exitCode: 1 });
    expect(output.err).toContain("error: unknown command 'snapshot'");
  });

  it('should print the version', async () => {
    const error = await runExpectingError('--version');

    expect(error).toMatchObject({ code: 'commander.version', exitCode: 0 });
    expect(output.out).toBe('1.2.3\n');
  });
});

describe('parseRetentionDays', () => {
  it('should parse non-negative integers', () => {
    expect(parseRetentionDays('0')).toBe(0);
    expect(parseRetentionDays(' 14 ')).toBe(14);
  });

  it('should treat an empty value as unset', () => {
    expect(parseRetentionDays('')).toBeUndefined();
  });

  it.each(['-1', '1.5', 'ten'])('should reject %p', value => {
    expect(() => parseRetentionDays(value)).toThrow('Days must be a non-negative integer.');
  });
});

describe('formatFileSize', () => {
  it.each([
    [0, '0B'],
    [1023, '1023B'],
    [1024, '1.0K'],
    [1536, '1.5K'],
    [20 * 1024, '20K'],
    [10188, '9.9K'],
    [10200, '10K'],
    [1048575, '1.0M'],
    [5 * 1024 * 1024, '5.0M'],
    [3 * 1024 * 1024 * 1024, '3.0G'],
  ])('should format %p bytes as %p', (bytes, expected) => {
    expect(formatFileSize(bytes)).toBe(expected);
  });
});

describe('formatListing', () => {
  it('should report a missing directory', () => {
    expect(formatListing({ directory: '/srv/backups', directoryExists: false, files: [] })).toEqual([
      'Backup directory does not exist: /srv/backups',
    ]);
  });

  it('should print one line per file', () => {
    const lines = formatListing({
      directory: '/srv/backups',
      directoryExists: true,
      files: [
        {
          fileName: 'shop_20240115_143045.sql.gz',
          filePath: '/srv/backups/shop_20240115_143045.sql.gz',
          size: 1536,
          lastModified: new Date(2024, 0, 15, 14, 30, 45),
        },
      ],
    });

    expect(lines).toEqual([
      'Available backup files in /srv/backups:',
      '    1.5K  2024-01-15 14:30  shop_20240115_143045.sql.gz',
    ]);
  });
});
