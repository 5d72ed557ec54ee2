import { Dirent, promises as fs } from 'fs';
import { join } from 'path';
import { format } from 'fecha';
import { BackupFileInfo } from '../interfaces/BackupManager';
import { errorCode } from './errors';

/** Artifact name used for a dump of every database on the server */
export const ALL_DATABASES_NAME = 'all_databases';

/** Plain or compressed backup artifacts */
export const BACKUP_FILE_PATTERN = /\.sql(\.gz)?$/;

/** Compressed artifacts, the only ones retention cleanup deletes */
export const COMPRESSED_BACKUP_PATTERN = /\.sql\.gz$/;

/**
 * `<target>_<timestamp>.sql`, e.g. `shop_20240115_143045.sql`
 */
export function buildBackupFileName(target: string, date: Date, timestampFormat: string): string {
  return `${target}_${format(date, timestampFormat)}.sql`;
}

/**
 * Regular files directly inside `directory` whose names match `pattern`,
 * sorted by name. Resolves null when the directory does not exist.
 */
export async function scanBackupDirectory(
  directory: string,
  pattern: RegExp
): Promise<BackupFileInfo[] | null> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }

  const files: BackupFileInfo[] = [];
  for (const entry of entries) {
    if (!entry.isFile() || !pattern.test(entry.name)) {
      continue;
    }
    const filePath = join(directory, entry.name);
    const stats = await fs.stat(filePath);
    files.push({
      fileName: entry.name,
      filePath,
      size: stats.size,
      lastModified: stats.mtime,
    });
  }

  return files.sort((a, b) => a.fileName.localeCompare(b.fileName));
}
