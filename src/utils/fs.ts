/**
 * File system utilities
 */

import { access, mkdir, rm, stat } from 'fs/promises';
import { constants } from 'fs';

/**
 * Delete a file if it exists
 *
 * @param filePath - Path to the file to delete
 */
export async function safeUnlink(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

/**
 * Check whether a regular file exists at the given path
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await stat(filePath);
    return stats.isFile();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Assert that a path points at an executable regular file.
 * Rejects with a descriptive error otherwise.
 */
export async function assertExecutable(filePath: string): Promise<void> {
  const stats = await stat(filePath);
  if (!stats.isFile()) {
    throw new Error(`Not a regular file: ${filePath}`);
  }
  await access(filePath, constants.X_OK);
}

/**
 * Create a directory (and parents) if missing
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
