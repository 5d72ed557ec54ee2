import { mkdtempSync, rmSync, statSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DirectoryInitializer } from '../src/clients/DirectoryInitializer';
import { createMockLogger } from './helpers/mocks';

describe('DirectoryInitializer', () => {
  let workDir: string;
  let logger: ReturnType<typeof createMockLogger>;
  let initializer: DirectoryInitializer;

  beforeEach(() => {
    jest.clearAllMocks();
    workDir = mkdtempSync(join(tmpdir(), 'mariadb-backup-dirs-'));
    logger = createMockLogger();
    initializer = new DirectoryInitializer(logger);
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it('should create a missing directory with its parents and log it', async () => {
    const directory = join(workDir, 'var', 'backups', 'mariadb');

    const created = await initializer.ensureDirectory(directory);

    expect(created).toBe(true);
    expect(statSync(directory).isDirectory()).toBe(true);
    expect(logger.info).toHaveBeenCalledWith(`Created directory: ${directory}`);
  });

  it('should leave an existing directory alone without logging', async () => {
    const created = await initializer.ensureDirectory(workDir);

    expect(created).toBe(false);
    expect(logger.info).not.toHaveBeenCalled();
  });

  it('should fail when a file is in the way', async () => {
    const filePath = join(workDir, 'backups');
    writeFileSync(filePath, '');

    await expect(initializer.ensureDirectory(filePath)).rejects.toThrow(/EEXIST/);
    expect(logger.info).not.toHaveBeenCalled();
  });

  describe('createDirectory', () => {
    it('should create without a logger', async () => {
      const directory = join(workDir, 'log');

      await expect(DirectoryInitializer.createDirectory(directory)).resolves.toBe(true);
      await expect(DirectoryInitializer.createDirectory(directory)).resolves.toBe(false);
    });
  });
});
