/**
 * Shared helpers for CLI tests
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { createLogger, type Logger, type LogLevel } from '../src/lib/logger.js';

export async function createTempProject(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'steward-cli-'));
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

export interface CapturedLogger {
  logger: Logger;
  stdout: string[];
  stderr: string[];
  /** stdout parsed as one JSON document */
  json: () => unknown;
}

/**
 * Logger writing into arrays instead of the console
 */
export function captureLogger(options: { json?: boolean; level?: LogLevel } = {}): CapturedLogger {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const logger = createLogger({
    json: options.json,
    level: options.level ?? 'info',
    colors: false,
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
  });
  return { logger, stdout, stderr, json: (): unknown => JSON.parse(stdout.join('\n')) };
}
