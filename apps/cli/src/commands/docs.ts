/**
 * Docs commands - drive the docs bridge from the command line
 *
 * Every verb ends in exactly one result on stdout: the rendered report, or
 * with --json the report object itself. Failures of the shell around the
 * bridge (settings, arguments) are folded into the same report shape in JSON
 * mode so automation can branch on `issues[].code`.
 */

import path from 'node:path';
import fs from 'node:fs/promises';
import {
  DocsBridge,
  Logger as EngineLogger,
  ManifestContentProvider,
  buildReport,
  exitCodeFor,
  isDocsBridgeError,
  readTextOrNull,
  renderDefaultBridgeConfig,
  resolveWithin,
  writeFileAtomic,
  type BridgeIssue,
  type BridgeReport,
  type ContentProvider,
  type TempWriteHooks,
} from '@steward/core';
import {
  CliError,
  assertDefined,
  createLogger,
  displayPath,
  isQuiet,
  isVerbose,
  loadConfig,
  wrapError,
  type Logger,
  type LogLevel,
  type StewardConfig,
} from '../lib/index.js';
import { renderInitResult, renderReport } from '../ui/report-renderer.js';
import type { DocsOptions, DocsVerb, InitResult } from '../types.js';

/** Collaborators the command normally builds itself; tests replace them */
export interface DocsCommandContext {
  logger?: Logger;
  provider?: ContentProvider;
  cwd?: string;
  now?: () => Date;
  hooks?: TempWriteHooks;
}

/** Report-shaped failure printed in JSON mode when the bridge never ran */
interface FailureReport {
  command: DocsVerb;
  status: 'error';
  generatedAt: string;
  sections: [];
  issues: BridgeIssue[];
}

function resolveLevel(options: DocsOptions): LogLevel {
  if (options.verbose || isVerbose()) return 'debug';
  if (options.quiet || isQuiet()) return 'error';
  return 'info';
}

/**
 * Run one docs verb and return the process exit code
 */
export async function docsCommand(
  verb: DocsVerb,
  options: DocsOptions = {},
  context: DocsCommandContext = {}
): Promise<number> {
  const now = context.now ?? (() => new Date());
  const createCommandLogger = (json: boolean): Logger =>
    context.logger ??
    createLogger({
      json,
      level: resolveLevel(options),
      ...(options.color === false ? { colors: false } : {}),
    });

  let logger = createCommandLogger(options.json ?? false);
  let json = options.json ?? false;

  try {
    const projectRoot = await resolveProjectRoot(options.root, context.cwd);
    const settings = await loadConfig(options.config, { cwd: projectRoot });

    if (options.json === undefined && settings.output === 'json') {
      json = true;
      logger = createCommandLogger(true);
    }
    logger.debug(`Project root: ${displayPath(projectRoot)}`);

    if (verb === 'init') {
      const result = await runInit(projectRoot, settings, options, now);
      if (json) {
        logger.json(result);
      } else {
        renderInitResult(result, renderOptions(options)).forEach((line) => logger.log(line));
      }
      return 0;
    }

    const report = await runBridgeVerb(verb, projectRoot, settings, options, context, logger);
    if (json) {
      logger.json(report);
    } else {
      renderReport(report, renderOptions(options)).forEach((line) => logger.log(line));
    }
    return exitCodeFor(report);
  } catch (error) {
    const wrapped = wrapError(error, { operation: `docs ${verb}` });
    if (json) {
      logger.json(failureReport(verb, wrapped, now()));
    } else {
      logger.logError(wrapped);
    }
    return wrapped.severity === 'fatal' ? 2 : 1;
  }
}

function renderOptions(options: DocsOptions): { colors?: boolean } {
  return options.color === false ? { colors: false } : {};
}

async function resolveProjectRoot(root: string | undefined, cwd: string | undefined): Promise<string> {
  const projectRoot = path.resolve(cwd ?? process.cwd(), root ?? '.');
  try {
    const stats = await fs.stat(projectRoot);
    if (stats.isDirectory()) {
      return projectRoot;
    }
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error;
    }
  }
  throw CliError.fromCode('PROJECT_NOT_FOUND', `Project root ${projectRoot} is not a directory`, {
    context: { file: projectRoot },
  });
}

async function runBridgeVerb(
  verb: Exclude<DocsVerb, 'init'>,
  projectRoot: string,
  settings: StewardConfig,
  options: DocsOptions,
  context: DocsCommandContext,
  logger: Logger
): Promise<BridgeReport> {
  const now = context.now ?? (() => new Date());
  const engineLogger = new EngineLogger({ level: 'silent', component: 'docs-bridge', onLog: logger.engineSink });
  const provider =
    context.provider ??
    new ManifestContentProvider(
      path.resolve(projectRoot, settings.docs.manifest),
      settings.docs.manifest,
      engineLogger.child('manifest')
    );

  // Sections resolve before the bridge opens so argument errors win over config errors
  const sections = options.section ?? [];
  const single = (): string => {
    assertDefined(sections[0], `--section is required for docs ${verb}`);
    if (sections.length > 1) {
      throw CliError.fromCode('INVALID_INPUT', `docs ${verb} takes exactly one --section`);
    }
    return sections[0];
  };
  const timestamp = (): string => {
    assertDefined(options.timestamp, '--timestamp is required for docs rollback');
    return options.timestamp;
  };
  if (verb === 'diff' || verb === 'adopt' || verb === 'rollback') {
    single();
  }
  if (verb === 'rollback') {
    timestamp();
  }
  if (verb === 'history' && sections.length > 1) {
    throw CliError.fromCode('INVALID_INPUT', 'docs history takes at most one --section');
  }

  let bridge: DocsBridge;
  try {
    bridge = await DocsBridge.open({
      projectRoot,
      provider,
      configPath: settings.docs.config,
      stateDir: settings.docs.stateDir,
      backupKeep: settings.docs.backups.keep,
      hooks: context.hooks,
      logger: engineLogger,
      now,
    });
  } catch (error) {
    if (!isDocsBridgeError(error)) {
      throw error;
    }
    return buildReport(verb, now(), [], [error.toIssue()]);
  }

  logger.debug(`Loaded ${bridge.registry.names().length} section(s)`);

  switch (verb) {
    case 'diagnose':
      return bridge.diagnose();
    case 'list':
      return bridge.list();
    case 'diff':
      return bridge.diff(single());
    case 'repair':
      return bridge.repair(sections.length > 0 ? sections : undefined);
    case 'adopt':
      return bridge.adopt(single());
    case 'rollback':
      return bridge.rollback(single(), timestamp());
    case 'sync':
      return bridge.sync({ sections: sections.length > 0 ? sections : undefined, mode: options.mode });
    case 'history':
      return bridge.history(sections[0]);
  }
}

async function runInit(
  projectRoot: string,
  settings: StewardConfig,
  options: DocsOptions,
  now: () => Date
): Promise<InitResult> {
  const target = resolveWithin(projectRoot, settings.docs.config);
  if (target === null) {
    throw CliError.fromCode('INVALID_INPUT', `docs.config '${settings.docs.config}' must stay inside the project`);
  }

  const existing = await readTextOrNull(target);
  if (existing !== null && !options.force) {
    throw CliError.fromCode('BRIDGE_CONFIG_EXISTS', `${settings.docs.config} already exists`, {
      context: { file: settings.docs.config },
    });
  }

  await writeFileAtomic(target, renderDefaultBridgeConfig());
  return {
    command: 'init',
    status: 'ok',
    generatedAt: now().toISOString(),
    path: settings.docs.config,
    overwritten: existing !== null,
  };
}

function failureReport(verb: DocsVerb, error: CliError, generatedAt: Date): FailureReport {
  return {
    command: verb,
    status: 'error',
    generatedAt: generatedAt.toISOString(),
    sections: [],
    issues: [
      {
        code: error.code,
        path: error.context.file ?? null,
        message: error.message,
        severity: 'error',
        remediation: error.suggestions.length > 0 ? error.suggestions.join('; ') : 'Run with --verbose for more details',
      },
    ],
  };
}
