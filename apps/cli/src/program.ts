/**
 * Command-line program definition
 *
 * Built by a factory so tests can parse argument vectors without touching
 * process state; the binary entry point lives in index.ts.
 */

import { Command, InvalidArgumentError } from 'commander';
import type { SyncMode } from '@steward/core';
import { CLI_VERSION } from './lib/index.js';
import { docsCommand, type DocsCommandContext } from './commands/index.js';
import type { DocsOptions, DocsVerb } from './types.js';

/**
 * Validate file path argument
 */
function validatePath(value: string): string {
  if (!value || value.trim() === '') {
    throw new InvalidArgumentError('Path cannot be empty');
  }
  return value.trim();
}

/**
 * Collect a repeatable --section option
 */
function collectSection(value: string, previous: string[] = []): string[] {
  const name = value.trim();
  if (name === '') {
    throw new InvalidArgumentError('Section name cannot be empty');
  }
  return [...previous, name];
}

function parseSyncMode(value: string): SyncMode {
  if (value === 'repair' || value === 'adopt') {
    return value;
  }
  throw new InvalidArgumentError('Mode must be one of: repair, adopt');
}

export interface ProgramHooks extends DocsCommandContext {
  /** Receives the exit code of each docs verb */
  onExit?: (code: number) => void;
}

/**
 * Build the `steward` program
 */
export function createProgram(hooks: ProgramHooks = {}): Command {
  const { onExit, ...context } = hooks;
  const program = new Command();

  program
    .name('steward')
    .description('Keep generated regions of your documentation in sync')
    .version(CLI_VERSION, '-v, --version', 'Output the current version')
    .option('--verbose', 'Enable verbose output')
    .option('--quiet', 'Suppress non-essential output')
    .option('--json', 'Output in JSON format')
    .option('-c, --config <path>', 'Path to a settings file', validatePath)
    .option('--no-color', 'Disable colored output')
    // usage errors surface as CommanderError instead of exiting; subcommands inherit this
    .exitOverride()
    .configureOutput({
      writeErr: (str) => process.stderr.write(str),
      writeOut: (str) => process.stdout.write(str),
      outputError: (str, write) => {
        write(`\n${str}`);
      },
    });

  const docs = program.command('docs').description('Inspect and maintain managed documentation regions');

  const run = async (verb: DocsVerb, command: Command): Promise<void> => {
    const options: DocsOptions = command.optsWithGlobals();
    const code = await docsCommand(verb, options, context);
    onExit?.(code);
  };

  const withRoot = (command: Command): Command =>
    command.option('-r, --root <dir>', 'Project root (default: current directory)', validatePath);

  withRoot(docs.command('diagnose'))
    .description('Report the health of every section without writing anything')
    .action(async (_options, command: Command) => run('diagnose', command));

  withRoot(docs.command('list'))
    .description('List configured sections and their status')
    .action(async (_options, command: Command) => run('list', command));

  withRoot(docs.command('diff'))
    .description('Show how a section differs from its desired content')
    .option('-s, --section <name>', 'Section to compare', collectSection)
    .action(async (_options, command: Command) => run('diff', command));

  withRoot(docs.command('repair'))
    .description('Rewrite drifted or missing sections from their desired content')
    .option('-s, --section <name>', 'Section to repair (repeatable; default: all)', collectSection)
    .action(async (_options, command: Command) => run('repair', command));

  withRoot(docs.command('adopt'))
    .description('Accept the current content of a section as its baseline')
    .option('-s, --section <name>', 'Section to adopt', collectSection)
    .action(async (_options, command: Command) => run('adopt', command));

  withRoot(docs.command('rollback'))
    .description('Restore a section target from a snapshot')
    .option('-s, --section <name>', 'Section to restore', collectSection)
    .option('-t, --timestamp <ts>', 'Snapshot id or ISO timestamp (see `docs history`)', validatePath)
    .action(async (_options, command: Command) => run('rollback', command));

  withRoot(docs.command('sync'))
    .description('Diff, then repair or adopt, then diff again')
    .option('-s, --section <name>', 'Section to sync (repeatable; default: all)', collectSection)
    .option('-m, --mode <mode>', 'What to do with drifted sections (repair, adopt)', parseSyncMode, 'repair')
    .action(async (_options, command: Command) => run('sync', command));

  withRoot(docs.command('history'))
    .description('List snapshots, oldest first')
    .option('-s, --section <name>', 'Only this section', collectSection)
    .action(async (_options, command: Command) => run('history', command));

  withRoot(docs.command('init'))
    .description('Write a starter docs bridge configuration')
    .option('-f, --force', 'Overwrite an existing configuration')
    .action(async (_options, command: Command) => run('init', command));

  return program;
}
