import { createReadStream, createWriteStream, promises as fs } from 'fs';
import { pipeline } from 'stream/promises';
import { createGzip } from 'zlib';

const GZIP_MAGIC = Buffer.from([0x1f, 0x8b]);

export const GZIP_SUFFIX = '.gz';

/**
 * Compress a file to `<file>.gz`, overwriting an existing archive, and return
 * the archive path. The original is left in place. A partially written
 * archive is removed when compression fails.
 */
export async function gzipFile(filePath: string): Promise<string> {
  const archivePath = `${filePath}${GZIP_SUFFIX}`;

  try {
    await pipeline(
      createReadStream(filePath),
      createGzip({ level: 6 }),
      createWriteStream(archivePath, { flags: 'w' })
    );
  } catch (error) {
    await fs.rm(archivePath, { force: true });
    throw error;
  }

  return archivePath;
}

/**
 * Detect gzip content from the first two bytes of the file
 */
export async function isGzipFile(filePath: string): Promise<boolean> {
  const handle = await fs.open(filePath, 'r');
  try {
    const header = Buffer.alloc(GZIP_MAGIC.length);
    const { bytesRead } = await handle.read(header, 0, header.length, 0);
    return bytesRead === GZIP_MAGIC.length && header.equals(GZIP_MAGIC);
  } finally {
    await handle.close();
  }
}
