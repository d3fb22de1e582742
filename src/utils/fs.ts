import { promises as fs, constants as fsConstants } from 'fs';
import { dirname } from 'path';
import { isJunk } from 'junk';
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
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
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
 * Write text to a file, optionally setting its mode
 */
export async function writeTextFile(
  path: string,
  content: string,
  options: { encoding?: BufferEncoding; mode?: number } = {}
): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, options.encoding ?? 'utf8');
    if (options.mode !== undefined) {
      await fs.chmod(path, options.mode);
    }
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Rename (move) a file within the same volume
 */
export async function renameFile(src: string, dest: string): Promise<void> {
  try {
    await fs.rename(src, dest);
    logger.debug(`Renamed: ${src} -> ${dest}`);
  } catch (error) {
    throw new FileSystemError(`Failed to rename file: ${src} -> ${dest}`, { src, dest, error });
  }
}

/**
 * List files in a directory (non-recursive), skipping OS junk like .DS_Store
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && !isJunk(entry.name))
      .map(entry => entry.name);
  } catch (error) {
    throw new FileSystemError(`Failed to list files in directory: ${dirPath}`, { dirPath, error });
  }
}
