/**
 * File Operations
 *
 * Safe file operations with proper error handling.
 */

import {
  mkdir,
  writeFile,
  readFile,
  rename,
  rm,
} from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Safely write a file, ensuring the directory exists
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Buffer,
  options: { mode?: number } = {}
): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, { encoding: 'utf8', mode: options.mode });
}

/**
 * Safely read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Remove a file; a missing file is not an error
 */
export async function removeFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

/**
 * Move a file to a new location
 */
export async function moveFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  await rename(source, destination);
}
