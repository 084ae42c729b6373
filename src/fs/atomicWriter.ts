import { writeFile, mkdir, rename, unlink } from 'fs/promises';
import { dirname, join } from 'path';
import { randomBytes } from 'crypto';
import { logger } from '../util/logger.js';
import { errorMessage } from '../util/errors.js';

export interface AtomicWriteOptions {
  encoding?: BufferEncoding;
  ensureDir?: boolean;
}

/**
 * Write content through a temporary sibling file renamed into place, so a
 * reader never sees a half-written image or document. Failures are rethrown.
 */
export async function atomicWriteFile(
  filePath: string,
  content: string | Buffer,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const { encoding = 'utf8', ensureDir = true } = options;
  const tempPath = generateTempPath(filePath);

  try {
    if (ensureDir) {
      await ensureDirectory(dirname(filePath));
    }

    if (typeof content === 'string') {
      await writeFile(tempPath, content, { encoding });
    } else {
      await writeFile(tempPath, content);
    }

    await rename(tempPath, filePath);

    logger.debug('File written', { path: filePath, size: content.length });
  } catch (error) {
    try {
      await unlink(tempPath);
    } catch (cleanupError) {
      logger.debug('No temp file to clean up', { tempPath, error: errorMessage(cleanupError) });
    }

    logger.error('Write failed', { path: filePath, error: errorMessage(error) });
    throw error;
  }
}

export async function ensureDirectory(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

function generateTempPath(filePath: string): string {
  return join(dirname(filePath), `.tmp-${randomBytes(8).toString('hex')}`);
}
