import { promises as fs, constants as fsConstants } from 'fs';
import { dirname, basename, join } from 'path';
import { randomBytes } from 'crypto';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write several text files so that readers only ever see the old or the
 * complete new content of each. Every file is staged beside its target
 * before the first rename, and a failed write leaves no target touched.
 */
export async function writeTextFilesAtomic(
  files: ReadonlyArray<{ path: string; content: string }>
): Promise<void> {
  const staged: string[] = [];
  const discardStaged = async (): Promise<void> => {
    await Promise.all(staged.map(tempPath => fs.rm(tempPath, { force: true })));
  };

  for (const file of files) {
    await ensureDir(dirname(file.path)).catch(async (error: unknown) => {
      await discardStaged();
      throw error;
    });
    const tempPath = join(dirname(file.path), `.${basename(file.path)}.${randomBytes(6).toString('hex')}.tmp`);
    try {
      await fs.writeFile(tempPath, file.content, 'utf8');
      staged.push(tempPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      await discardStaged();
      throw new FileSystemError(`Failed to write file: ${file.path}`, { path: file.path, error });
    }
  }

  for (const [index, file] of files.entries()) {
    try {
      await fs.rename(staged[index], file.path);
    } catch (error) {
      await discardStaged();
      throw new FileSystemError(`Failed to write file: ${file.path}`, { path: file.path, error });
    }
    logger.debug(`Wrote file: ${file.path}`);
  }
}
