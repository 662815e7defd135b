/**
 * Filesystem helpers shared by the assembler, cache and header resolver
 */

import { stat, mkdir, rm, rename, cp } from 'fs/promises';

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export async function directoryExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function ensureDirectory(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

/**
 * Remove a file or directory tree; missing paths are ignored
 */
export async function removeIfExists(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Replace a directory with a fresh empty one
 */
export async function recreateDirectory(path: string): Promise<void> {
  await removeIfExists(path);
  await ensureDirectory(path);
}

/**
 * Move an item; the destination must not exist.
 * Falls back to copy-and-delete across filesystems.
 */
export async function moveItem(source: string, destination: string): Promise<void> {
  if (await pathExists(destination)) {
    throw new Error(`Destination already exists: ${destination}`);
  }

  try {
    await rename(source, destination);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') {
      throw error;
    }
    await cp(source, destination, { recursive: true, verbatimSymlinks: true });
    await removeIfExists(source);
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
