#!/usr/bin/env node
import { dirname } from 'path';
import { CommanderError, OutputConfiguration } from 'commander';
import { version } from '../package.json';
import { createProgram, CommandFailedError } from './cli';
import { BackupLock } from './clients/BackupLock';
import { BackupManager } from './clients/BackupManager';
import { CommandRunner } from './clients/CommandRunner';
import { DirectoryInitializer } from './clients/DirectoryInitializer';
import { Logger } from './clients/Logger';
import { MariaDBClient } from './clients/MariaDBClient';
import { RestoreManager } from './clients/RestoreManager';
import { RetentionManager } from './clients/RetentionManager';
import { ConfigurationManager, ConfigurationOverrides } from './config/ConfigurationManager';
import { BackupCommands } from './interfaces/BackupCommands';
import { BackupConfig } from './interfaces/BackupConfig';
import { BackupListing, BackupResult } from './interfaces/BackupManager';
import { RestoreResult } from './interfaces/RestoreManager';
import { RetentionResult } from './interfaces/RetentionManager';
import { toError } from './utils/errors';
import { isElevated } from './utils/privileges';

interface ApplicationComponents {
  config: Readonly<BackupConfig>;
  logger: Logger;
  client: MariaDBClient;
  backupManager: BackupManager;
  restoreManager: RestoreManager;
  retentionManager: RetentionManager;
  lock: BackupLock;
}

/**
 * Main application class that initializes and coordinates all components
 */
class MariaDBBackupApplication implements BackupCommands {
  private components: ApplicationComponents | null = null;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Initialize the application with configuration and component setup
   */
  async initialize(overrides: ConfigurationOverrides): Promise<void> {
    const config = ConfigurationManager.loadConfiguration(this.env, overrides);

    // The log directory has to exist before the logger opens its file
    const logDir = dirname(config.logFile);
    const logDirCreated = await DirectoryInitializer.createDirectory(logDir);
    const logger = new Logger({ level: config.logLevel, logFile: config.logFile });
    if (logDirCreated) {
      logger.info(`Created directory: ${logDir}`);
    }

    logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

    await new DirectoryInitializer(logger).ensureDirectory(config.backupDir);

    const client = new MariaDBClient(config, new CommandRunner(), logger);
    this.components = {
      config,
      logger,
      client,
      backupManager: new BackupManager(client, config, logger),
      restoreManager: new RestoreManager(client, config, logger),
      retentionManager: new RetentionManager(config, logger),
      lock: new BackupLock(config.backupDir, logger),
    };
  }

  async backup(databaseName?: string): Promise<BackupResult> {
    const { backupManager, lock } = this.getComponents();
    return lock.withLock(() =>
      databaseName
        ? backupManager.backupDatabase(databaseName)
        : backupManager.backupAllDatabases()
    );
  }

  async restore(filePath: string, databaseName?: string): Promise<RestoreResult> {
    const { restoreManager, lock } = this.getComponents();
    return lock.withLock(() => restoreManager.restore(filePath, databaseName));
  }

  async list(): Promise<BackupListing> {
    return this.getComponents().backupManager.listBackups();
  }

  async cleanup(retentionDays?: number): Promise<RetentionResult> {
    const { retentionManager, lock } = this.getComponents();
    return lock.withLock(() => retentionManager.cleanupExpiredBackups(retentionDays));
  }

  async check(): Promise<boolean> {
    const { client, logger } = this.getComponents();
    logger.info('Testing connection to the database server...');
    const connected = await client.testConnection();
    if (connected) {
      logger.info('Connection test passed');
    }
    return connected;
  }

  reportError(error: unknown): void {
    const failure = toError(error);
    if (this.components) {
      this.components.logger.error(`Error: ${failure.message}`, failure);
    } else {
      console.error(`Error: ${failure.message}`);
    }
  }

  private getComponents(): ApplicationComponents {
    if (!this.components) {
      throw new Error('Application not initialized. Call initialize() first.');
    }
    return this.components;
  }
}

export interface MainDependencies {
  application?: BackupCommands;
  isElevated?: () => boolean;
  output?: OutputConfiguration;
}

/**
 * Run one command and resolve the process exit code
 */
async function main(argv: string[] = process.argv, dependencies: MainDependencies = {}): Promise<number> {
  const output = dependencies.output ?? {};
  const writeErr = (text: string): void => {
    if (output.writeErr) {
      output.writeErr(text);
    } else {
      process.stderr.write(text);
    }
  };

  // Checked before anything touches the filesystem
  if (!(dependencies.isElevated ?? isElevated)()) {
    writeErr('This program must be run as root (use sudo or run as root)\n');
    return 1;
  }

  const application = dependencies.application ?? new MariaDBBackupApplication();
  const program = createProgram(application, output, version);

  if (argv.length <= 2) {
    program.outputHelp({ error: true });
    return 1;
  }

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError || error instanceof CommandFailedError) {
      return error.exitCode;
    }
    application.reportError(error);
    return 1;
  }
}

// Export for testing
export { MariaDBBackupApplication, main };

if (require.main === module) {
  main()
    .then(exitCode => {
      process.exitCode = exitCode;
    })
    .catch(error => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
