#!/usr/bin/env node
/**
 * Steward CLI - keeps machine-owned documentation regions in sync
 *
 * Entry point: registers process handlers, checks the runtime and parses
 * the command line. The docs verbs set the exit code from their report.
 */

import { fileURLToPath } from 'node:url';
import { realpathSync } from 'node:fs';
import { CommanderError } from 'commander';
import {
  CliError,
  MIN_NODE_MAJOR,
  createLogger,
  getEnvironment,
  isVerbose,
  registerShutdownHandlers,
  wrapError,
} from './lib/index.js';
import { createProgram } from './program.js';

async function main(argv: readonly string[]): Promise<void> {
  const program = createProgram({
    onExit: (code) => {
      process.exitCode = code;
    },
  });

  registerShutdownHandlers(
    () => {
      process.exitCode = 130;
    },
    (error) => createLogger({ level: 'error' }).logError(wrapError(error))
  );

  try {
    const { nodeVersion } = getEnvironment();
    if (nodeVersion.major < MIN_NODE_MAJOR) {
      throw CliError.fromCode(
        'VERSION_MISMATCH',
        `Node.js ${MIN_NODE_MAJOR} or higher is required (current: ${process.version})`
      );
    }

    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      // help, version and usage errors were already printed by commander
      process.exitCode = error.exitCode;
      return;
    }

    const opts = program.opts<{ json?: boolean; verbose?: boolean }>();
    const logger = createLogger({
      json: opts.json,
      level: opts.verbose || isVerbose() ? 'debug' : 'error',
    });
    const wrapped = wrapError(error);
    logger.logError(wrapped);
    process.exitCode = wrapped.severity === 'fatal' ? 2 : 1;
  }
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked) {
    return false;
  }
  try {
    return realpathSync(invoked) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv).catch((error: unknown) => {
    createLogger({ level: 'error' }).logError(wrapError(error));
    process.exitCode = 1;
  });
}

// Export for programmatic use
export { createProgram } from './program.js';
export { docsCommand, type DocsCommandContext } from './commands/index.js';
export { defineConfig, loadConfig } from './lib/config.js';
export type { StewardConfig, StewardConfigInput } from './lib/config.js';
export { CliError } from './lib/errors.js';
export type { ErrorCode } from './lib/errors.js';
export type { DocsOptions, DocsVerb, InitResult } from './types.js';
