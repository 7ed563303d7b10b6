/**
 * Shared helpers for docs bridge tests
 */

import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { DocsBridgeError } from '../errors.js';
import { markerLine } from '../markers.js';

export const start = (token: string): string => markerLine('start', token);
export const end = (token: string): string => markerLine('end', token);

export async function createTempProject(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'steward-docs-'));
}

export async function removeTempProject(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

export async function writeProjectFile(root: string, relativePath: string, content: string): Promise<string> {
  const filePath = join(root, relativePath);
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, 'utf-8');
  return filePath;
}

export async function readProjectFile(root: string, relativePath: string): Promise<string> {
  return readFile(join(root, relativePath), 'utf-8');
}

export async function mtimeOf(root: string, relativePath: string): Promise<number> {
  return (await stat(join(root, relativePath))).mtimeMs;
}

/**
 * Run `fn` and return the DocsBridgeError it throws
 */
export function expectBridgeError(fn: () => unknown): DocsBridgeError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DocsBridgeError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a DocsBridgeError to be thrown');
}

export async function expectBridgeErrorAsync(fn: () => Promise<unknown>): Promise<DocsBridgeError> {
  try {
    await fn();
  } catch (error) {
    if (error instanceof DocsBridgeError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a DocsBridgeError to be thrown');
}
