import { MariaDBBackupApplication, main } from '../src/index';
import { ConfigurationError } from '../src/config/ConfigurationManager';
import { captureOutput, CapturedOutput, createMockCommands } from './helpers/commands';

describe('main', () => {
  let application: ReturnType<typeof createMockCommands>;
  let output: CapturedOutput;

  const runMain = (args: string[], elevated = true) =>
    main(['node', 'mariadb-backup', ...args], {
      application,
      isElevated: () => elevated,
      output,
    });

  beforeEach(() => {
    jest.clearAllMocks();
    application = createMockCommands();
    output = captureOutput();
  });

  it('should refuse to run without root privileges', async () => {
    const exitCode = await runMain(['backup', 'shop'], false);

    expect(exitCode).toBe(1);
    expect(output.err).toBe('This program must be run as root (use sudo or run as root)\n');
    expect(application.initialize).not.toHaveBeenCalled();
    expect(application.backup).not.toHaveBeenCalled();
  });

  it('should print usage to stderr and fail without a command', async () => {
    const exitCode = await runMain([]);

    expect(exitCode).toBe(1);
    expect(output.err).toContain('Usage: mariadb-backup [options] [command]');
    expect(output.err).toContain('cleanup [days]');
    expect(application.initialize).not.toHaveBeenCalled();
  });

  it('should exit with 0 after help', async () => {
    const exitCode = await runMain(['help']);

    expect(exitCode).toBe(0);
    expect(output.out).toContain('Usage: mariadb-backup [options] [command]');
  });

  it.each(['--help', '-h'])('should exit with 0 after %s', async flag => {
    const exitCode = await runMain([flag]);

    expect(exitCode).toBe(0);
    expect(output.out).toContain('Usage: mariadb-backup [options] [command]');
    expect(output.err).toBe('');
    expect(application.initialize).not.toHaveBeenCalled();
  });

  it('should exit with 0 after a successful command', async () => {
    await expect(runMain(['backup', 'shop'])).resolves.toBe(0);
  });

  it('should exit with 1 after a failed command without reporting it again', async () => {
    application.check.mockResolvedValue(false);

    await expect(runMain(['check'])).resolves.toBe(1);
    expect(application.reportError).not.toHaveBeenCalled();
  });

  it('should exit with 1 for an unknown command', async () => {
    await expect(runMain(['snapshot'])).resolves.toBe(1);
  });

  it('should report unexpected errors', async () => {
    const error = new ConfigurationError('DB_PORT must be between 1 and 65535', 'DB_PORT');
    application.initialize.mockRejectedValue(error);

    const exitCode = await runMain(['list']);

    expect(exitCode).toBe(1);
    expect(application.reportError).toHaveBeenCalledWith(error);
    expect(application.list).not.toHaveBeenCalled();
  });
});

describe('MariaDBBackupApplication', () => {
  it('should require initialization before running commands', async () => {
    const application = new MariaDBBackupApplication({});

    await expect(application.list()).rejects.toThrow('Application not initialized. Call initialize() first.');
  });

  it('should report errors on stderr before the log is open', () => {
    const consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const application = new MariaDBBackupApplication({});

    application.reportError(new Error('BACKUP_RETENTION_DAYS must be a non-negative integer'));

    expect(consoleSpy).toHaveBeenCalledWith('Error: BACKUP_RETENTION_DAYS must be a non-negative integer');
    consoleSpy.mockRestore();
  });
});
