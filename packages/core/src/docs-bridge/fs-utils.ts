/**
 * File helpers shared by the writer, the backup store and the orchestrator.
 */

import { randomBytes } from 'node:crypto';
import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { isErrnoException } from '../utils/errors.js';

/**
 * Read a UTF-8 file, returning null when it does not exist
 */
export async function readTextOrNull(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Check that `candidate` (absolute) lies inside `base` (absolute)
 */
export function isWithin(base: string, candidate: string): boolean {
  const rel = relative(base, candidate);
  return rel === '' || (!rel.startsWith(`..${sep}`) && rel !== '..' && !isAbsolute(rel));
}

/**
 * Resolve a relative path against a base directory, or null if it is absolute or escapes the base
 */
export function resolveWithin(base: string, relativePath: string): string | null {
  if (isAbsolute(relativePath)) {
    return null;
  }
  const resolved = resolve(base, relativePath);
  return isWithin(base, resolved) ? resolved : null;
}

/**
 * Project-relative path with forward slashes, for reports and snapshots
 */
export function toProjectPath(projectRoot: string, absolutePath: string): string {
  return relative(projectRoot, absolutePath).split(sep).join('/');
}

export interface TempWriteHooks {
  /** Called after the temp file is fully written and before it replaces the target */
  beforeRename?: (context: { tempPath: string; targetPath: string }) => void | Promise<void>;
}

/**
 * Write to a temp file in the target directory, then rename it over the target.
 * On failure the temp file is removed and the target is untouched.
 */
export async function writeFileAtomic(targetPath: string, content: string, hooks: TempWriteHooks = {}): Promise<void> {
  const directory = dirname(targetPath);
  await mkdir(directory, { recursive: true });

  const tempPath = join(directory, `.${basename(targetPath)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);
  try {
    await writeFile(tempPath, content, 'utf-8');
    await hooks.beforeRename?.({ tempPath, targetPath });
    await rename(tempPath, targetPath);
  } catch (error) {
    await removeIfExists(tempPath);
    throw error;
  }
}

/**
 * Remove a file if present
 */
export async function removeIfExists(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (error) {
    if (!(isErrnoException(error) && error.code === 'ENOENT')) {
      throw error;
    }
  }
}
