import { CommandResult } from './CommandRunner';

/**
 * What a dump covers: one named database or the whole server
 */
export type DumpTarget = { kind: 'database'; name: string } | { kind: 'all' };

export interface LoadOptions {
  /** Scope the load to this database */
  databaseName?: string;

  /** Gunzip the input file before it reaches the client */
  decompress: boolean;
}

export interface MariaDBClient {
  testConnection(): Promise<boolean>;
  dump(target: DumpTarget, outputPath: string): Promise<CommandResult>;
  executeStatement(sql: string): Promise<CommandResult>;
  createDatabaseIfNotExists(databaseName: string): Promise<CommandResult>;
  load(inputPath: string, options: LoadOptions): Promise<CommandResult>;
}
