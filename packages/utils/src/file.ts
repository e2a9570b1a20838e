/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import { mkdir, writeFile, readdir, stat } from 'node:fs/promises';
import { dirname, join } from 'node:path';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Safely write a binary file, ensuring the directory exists
 */
export async function safeWriteFile(
  filePath: string,
  content: Buffer | Uint8Array
): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content);
}

/**
 * Check whether a path is an existing directory
 */
export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * List regular files in a directory (non-recursive), sorted by name.
 * Returns an empty list when the directory doesn't exist.
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await readdir(dirPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => join(dirPath, entry.name))
      .sort();
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }
}
