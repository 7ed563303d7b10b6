/**
 * Docs Bridge Orchestrator
 *
 * Exposes the lifecycle verbs over the section registry:
 *
 * - diagnose / list / diff: read-only classification
 * - repair: bring drifting or unmaterialized regions back to the desired content
 * - adopt: accept the current on-disk content as the new baseline
 * - rollback: restore a snapshot
 * - sync: diff, then repair (or adopt), then diff again
 * - history: list snapshots
 *
 * Sections are processed one at a time in registry order. A failing section is
 * reported as an issue and never stops the others.
 */

import { resolve } from 'node:path';
import { getErrorMessage } from '../utils/errors.js';
import { hashContent } from '../utils/hashing.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { getAdapter, type AdapterInspection } from './adapters/index.js';
import { insertRegion } from './anchor-resolver.js';
import { AtomicWriter } from './atomic-writer.js';
import { BackupStore } from './backup-store.js';
import { BaselineStore, emptyState, serializeState, withBaseline, type LoadedState } from './baseline-store.js';
import type { ContentProvider } from './content-provider.js';
import { classifyRegion } from './diff-engine.js';
import { DocsBridgeError, errorCodeForStatus, isDocsBridgeError, toDocsBridgeError } from './errors.js';
import { readTextOrNull, resolveWithin, type TempWriteHooks } from './fs-utils.js';
import { buildRegion, createDocument, parseDocument, renderDocument, replaceInner } from './markers.js';
import { buildReport, severityForStatus, summarizeSnapshot } from './report.js';
import { DEFAULT_STATE_DIR, loadSectionRegistry, type RegisteredSection, type SectionRegistry } from './section-registry.js';
import { diffText } from './text-diff.js';
import type {
  AdoptedBaseline,
  BridgeCommand,
  BridgeIssue,
  BridgeReport,
  DesiredContent,
  ExternalSectionConfig,
  ManagedRegion,
  ManagedSectionConfig,
  RegionDiff,
  RegionStatus,
  SectionAction,
  SectionReport,
  SyncStep,
} from './types.js';

export interface DocsBridgeOptions {
  /** Absolute project root */
  projectRoot: string;
  provider: ContentProvider;
  /** Bridge config path relative to the project root */
  configPath?: string;
  /** State directory relative to the project root (default: .steward/state/docs) */
  stateDir?: string;
  /** Snapshots kept per section */
  backupKeep?: number;
  /** Temp-file hooks, used for fault injection */
  hooks?: TempWriteHooks;
  logger?: Logger;
  now?: () => Date;
}

export type SyncMode = 'repair' | 'adopt';

export interface SyncOptions {
  sections?: readonly string[];
  mode?: SyncMode;
}

/** Provider output plus the baseline that may override it */
export interface ResolvedDesired {
  provided: DesiredContent;
  effective: DesiredContent;
  baseline?: AdoptedBaseline;
}

/** One section as observed on disk during this invocation */
export interface SectionObservation {
  entry: RegisteredSection;
  status: RegionStatus;
  /** Current text of the target, null when absent */
  current: string | null;
  fileHash: string | null;
  desiredHash?: string;
  diff?: RegionDiff;
  reason?: string;
  /** Managed sections only */
  region?: ManagedRegion;
  desired?: ResolvedDesired;
  /** External sections only */
  inspection?: AdapterInspection;
}

export type RepairPlan =
  | { kind: 'noop'; section: string; status: RegionStatus }
  | {
      kind: 'write';
      section: string;
      status: RegionStatus;
      action: Extract<SectionAction, 'updated' | 'inserted' | 'created'>;
      targetPath: string;
      relativePath: string;
      next: string;
      /** Whole-file hash observed when the plan was made */
      expectedHash: string | null;
    };

interface SectionOutcome {
  report: SectionReport;
  issues: BridgeIssue[];
}

export class DocsBridge {
  readonly registry: SectionRegistry;
  private readonly projectRoot: string;
  private readonly provider: ContentProvider;
  private readonly backups: BackupStore;
  private readonly baselines: BaselineStore;
  private readonly writer: AtomicWriter;
  private readonly logger: Logger;
  private readonly now: () => Date;

  /**
   * Load the registry fresh and build a bridge; invalid config throws DOC_BRIDGE_INVALID_CONFIG
   */
  static async open(options: DocsBridgeOptions): Promise<DocsBridge> {
    const projectRoot = resolve(options.projectRoot);
    const registry = await loadSectionRegistry(projectRoot, {
      configPath: options.configPath,
      stateDir: options.stateDir,
    });
    return new DocsBridge({ ...options, projectRoot }, registry);
  }

  constructor(options: DocsBridgeOptions, registry: SectionRegistry) {
    this.registry = registry;
    this.projectRoot = resolve(options.projectRoot);
    this.provider = options.provider;
    const stateDir = resolve(this.projectRoot, options.stateDir ?? DEFAULT_STATE_DIR);
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? getLogger('docs-bridge');
    this.backups = new BackupStore({
      projectRoot: this.projectRoot,
      stateDir,
      keep: options.backupKeep,
      now: this.now,
      logger: this.logger.child('backups'),
    });
    this.baselines = new BaselineStore(this.projectRoot, stateDir);
    this.writer = new AtomicWriter({
      projectRoot: this.projectRoot,
      backups: this.backups,
      hooks: options.hooks,
      logger: this.logger.child('writer'),
    });
  }

  // ==========================================================================
  // Read-only verbs
  // ==========================================================================

  async diagnose(): Promise<BridgeReport> {
    return this.guard('diagnose', async () => {
      const state = await this.readStateTolerant();
      const outcomes: SectionOutcome[] = [];
      for (const entry of this.registry.sections()) {
        outcomes.push(await this.inspectSection(entry, state.loaded, 'diagnose', { details: true }));
      }
      return this.report('diagnose', outcomes, state.issues);
    });
  }

  async list(): Promise<BridgeReport> {
    return this.guard('list', async () => {
      const state = await this.readStateTolerant();
      const outcomes: SectionOutcome[] = [];
      for (const entry of this.registry.sections()) {
        outcomes.push(await this.inspectSection(entry, state.loaded, 'list', { details: false }));
      }
      return this.report('list', outcomes, state.issues);
    });
  }

  async diff(sectionName: string): Promise<BridgeReport> {
    return this.guard('diff', async () => {
      const entry = this.registry.get(sectionName);
      const state = await this.readStateTolerant();
      const outcome = await this.inspectSection(entry, state.loaded, 'diff', { details: true, diff: true });
      return this.report('diff', [outcome], state.issues);
    });
  }

  async history(sectionName?: string): Promise<BridgeReport> {
    return this.guard('history', async () => {
      const snapshots = await this.backups.list(sectionName);
      return buildReport('history', this.now(), [], [], { snapshots: snapshots.map(summarizeSnapshot) });
    });
  }

  /**
   * Observe a section: read its target, render desired content and classify it
   */
  async observe(sectionName: string): Promise<SectionObservation> {
    const entry = this.registry.get(sectionName);
    return this.observeEntry(entry, await this.baselines.load());
  }

  // ==========================================================================
  // Mutating verbs
  // ==========================================================================

  async repair(sections?: readonly string[]): Promise<BridgeReport> {
    return this.guard('repair', async () => {
      const entries = this.registry.select(sections);
      const loaded = await this.baselines.load();
      const outcomes: SectionOutcome[] = [];
      for (const entry of entries) {
        outcomes.push(await this.repairEntry(entry, loaded));
      }
      return this.report('repair', outcomes);
    });
  }

  /**
   * Work out the write a repair needs without touching the disk
   */
  async planRepair(sectionName: string): Promise<RepairPlan> {
    const observation = await this.observe(sectionName);
    return this.plan(observation);
  }

  /**
   * Execute a plan; the target must still hash to what the plan observed
   */
  async applyRepair(plan: RepairPlan): Promise<{ snapshotId: string | null }> {
    if (plan.kind === 'noop') {
      return { snapshotId: null };
    }
    const result = await this.writer.write({
      sectionName: plan.section,
      targetPath: plan.targetPath,
      content: plan.next,
      expectedHash: plan.expectedHash,
      operation: 'repair',
    });
    return { snapshotId: result.snapshot.id };
  }

  async adopt(sectionName: string): Promise<BridgeReport> {
    return this.guard('adopt', async () => {
      const entry = this.registry.get(sectionName);
      const loaded = await this.baselines.load();
      return this.report('adopt', [await this.adoptEntry(entry, loaded)]);
    });
  }

  async rollback(sectionName: string, timestamp: string): Promise<BridgeReport> {
    return this.guard('rollback', async () => {
      const snapshot = await this.backups.find(sectionName, timestamp);
      const targetPath = resolveWithin(this.projectRoot, snapshot.targetPath);
      if (targetPath === null) {
        throw new DocsBridgeError(
          'DOC_BRIDGE_STATE_CORRUPTED',
          `Snapshot ${snapshot.id} points outside the project (${snapshot.targetPath})`,
          { operation: 'rollback', section: sectionName, path: snapshot.targetPath }
        );
      }

      const current = await readTextOrNull(targetPath);
      const result = await this.writer.write({
        sectionName,
        targetPath,
        content: snapshot.priorContent,
        expectedHash: current === null ? null : hashContent(current),
        operation: 'rollback',
      });
      this.logger.info('Rolled back', { section: sectionName, snapshot: snapshot.id });

      const extra = { action: 'restored' as const, backup: result.snapshot.id };
      let outcome: SectionOutcome;
      if (this.registry.has(sectionName)) {
        const state = await this.readStateTolerant();
        outcome = await this.inspectSection(this.registry.get(sectionName), state.loaded, 'rollback', { details: true });
        outcome = { ...outcome, report: { ...outcome.report, ...extra }, issues: [...state.issues, ...outcome.issues] };
      } else {
        outcome = {
          report: { name: sectionName, status: 'unknown', target: snapshot.targetPath, mode: 'managed', ...extra },
          issues: [],
        };
      }
      return buildReport('rollback', this.now(), [outcome.report], outcome.issues, {
        snapshots: [summarizeSnapshot(snapshot)],
      });
    });
  }

  async sync(options: SyncOptions = {}): Promise<BridgeReport> {
    const mode = options.mode ?? 'repair';
    return this.guard('sync', async () => {
      const entries = this.registry.select(options.sections);
      const steps: SyncStep[] = [];

      let loaded = await this.baselines.load();
      const before: SectionObservation[] = [];
      const beforeStatuses: SyncStep['sections'] = [];
      for (const entry of entries) {
        try {
          const observation = await this.observeEntry(entry, loaded);
          before.push(observation);
          beforeStatuses.push({ name: entry.config.name, status: observation.status });
        } catch (error) {
          // reported by the diff-after pass
          this.logger.debug('Section not observable', { section: entry.config.name, error: getErrorMessage(error) });
          beforeStatuses.push({ name: entry.config.name, status: 'unknown' });
        }
      }
      steps.push({ step: 'diff-before', sections: beforeStatuses });

      const actions = new Map<string, SectionOutcome>();

      const actionable = before.filter((observation) =>
        mode === 'repair'
          ? observation.status === 'drift' || observation.status === 'missing_marker'
          : observation.status === 'drift'
      );
      const acted: SyncStep['sections'] = [];
      for (const observation of actionable) {
        const outcome =
          mode === 'repair' ? await this.repairObserved(observation) : await this.adoptObserved(observation, loaded);
        actions.set(observation.entry.config.name, outcome);
        acted.push({ name: outcome.report.name, status: outcome.report.status, action: outcome.report.action });
        if (mode === 'adopt' && outcome.report.action === 'adopted') {
          loaded = await this.baselines.load();
        }
      }
      steps.push({ step: mode, sections: acted, ...(actionable.length === 0 ? { skipped: true } : {}) });

      const outcomes: SectionOutcome[] = [];
      for (const entry of entries) {
        const after = await this.inspectSection(entry, loaded, 'sync', { details: true });
        const action = actions.get(entry.config.name);
        outcomes.push({
          report: { ...after.report, action: action?.report.action ?? 'none', ...backupOf(action) },
          issues: [...(action?.issues ?? []), ...after.issues],
        });
      }
      steps.push({
        step: 'diff-after',
        sections: outcomes.map((outcome) => ({ name: outcome.report.name, status: outcome.report.status })),
      });

      return this.report('sync', outcomes, [], steps);
    });
  }

  // ==========================================================================
  // Observation
  // ==========================================================================

  /**
   * Provider content for a section, with an adopted baseline applied while it is current
   */
  async resolveDesired(sectionName: string, state: LoadedState['state']): Promise<ResolvedDesired> {
    const provided = await this.provider.render(sectionName);
    const baseline = state.baselines[sectionName];
    if (baseline && baseline.providerHash === provided.hash) {
      return { provided, effective: { content: baseline.content, hash: baseline.contentHash }, baseline };
    }
    return { provided, effective: provided };
  }

  private async observeEntry(entry: RegisteredSection, loaded: LoadedState): Promise<SectionObservation> {
    const { config } = entry;
    if (config.mode === 'managed') {
      return this.observeManaged(entry, config, loaded);
    }
    return this.observeExternal(entry, config, loaded);
  }

  private async observeManaged(
    entry: RegisteredSection,
    config: ManagedSectionConfig,
    loaded: LoadedState
  ): Promise<SectionObservation> {
    const current = await readTextOrNull(entry.path);
    const desired = await this.resolveDesired(config.name, loaded.state);
    const region = classifyRegion({
      section: config,
      target: entry.path,
      label: entry.relativePath,
      desired: desired.effective,
      fileContent: current,
    });
    return {
      entry,
      status: region.status,
      current,
      fileHash: region.fileHash,
      desiredHash: desired.effective.hash,
      diff: region.diff,
      reason: region.reason,
      region,
      desired,
    };
  }

  private async observeExternal(
    entry: RegisteredSection,
    config: ExternalSectionConfig,
    loaded: LoadedState
  ): Promise<SectionObservation> {
    const adapter = getAdapter(config.adapter);
    const current = await readTextOrNull(entry.path);
    const fileHash = current === null ? null : hashContent(current);
    const source = adapter.contentSource(config);
    const desired = source === null ? undefined : await this.resolveDesired(source, loaded.state);
    const desiredHash = externalDesiredHash(config, desired?.effective);
    const base = { entry, current, fileHash, desiredHash, desired };

    const baseline = loaded.state.baselines[config.name];
    if (baseline && baseline.providerHash === desiredHash && fileHash === baseline.contentHash) {
      return { ...base, status: 'match' };
    }

    const inspection = adapter.inspect({ section: config, current, desired: desired?.effective });
    switch (inspection.kind) {
      case 'match':
        return { ...base, status: 'match', inspection };
      case 'drift':
        return {
          ...base,
          status: 'drift',
          inspection,
          reason: inspection.summary,
          diff: diffText(current ?? '', inspection.next, entry.relativePath),
        };
      case 'missing_file':
        return { ...base, status: 'missing_file', inspection, reason: 'artifact does not exist' };
      case 'corrupted':
        return { ...base, status: 'corrupted', inspection, reason: inspection.reason };
    }
  }

  private async inspectSection(
    entry: RegisteredSection,
    loaded: LoadedState,
    operation: BridgeCommand,
    show: { details: boolean; diff?: boolean }
  ): Promise<SectionOutcome> {
    let observation: SectionObservation;
    try {
      observation = await this.observeEntry(entry, loaded);
    } catch (error) {
      return this.failure(entry, error, operation, 'unknown');
    }

    const report = describeSection(entry, observation.status);
    if (show.details) {
      Object.assign(report, observationDetails(observation));
    }
    if (show.diff && observation.diff) {
      report.diff = observation.diff.unified;
    }
    const issue = this.structuralIssue(observation, operation);
    return { report, issues: issue ? [issue] : [] };
  }

  // ==========================================================================
  // Repair
  // ==========================================================================

  private plan(observation: SectionObservation): RepairPlan {
    const { entry, status } = observation;
    const section = entry.config.name;
    if (status === 'match') {
      return { kind: 'noop', section, status };
    }

    const write = (action: 'updated' | 'inserted' | 'created', next: string): RepairPlan => ({
      kind: 'write',
      section,
      status,
      action,
      targetPath: entry.path,
      relativePath: entry.relativePath,
      next,
      expectedHash: observation.fileHash,
    });

    const { config } = entry;
    if (config.mode === 'external') {
      const adapter = getAdapter(config.adapter);
      const inspection = observation.inspection;
      if (inspection?.kind === 'drift') {
        adapter.assertWritable(config, inspection.next, entry.relativePath);
        return write('updated', inspection.next);
      }
      if (inspection?.kind === 'missing_file' && adapter.createsTarget && inspection.next !== undefined) {
        adapter.assertWritable(config, inspection.next, entry.relativePath);
        return write('created', inspection.next);
      }
      throw this.structuralError(observation, 'repair');
    }

    const desired = observation.desired?.effective;
    if (desired === undefined) {
      throw this.structuralError(observation, 'repair');
    }
    const context = { section, path: entry.relativePath };

    switch (status) {
      case 'drift': {
        const span = observation.region?.span;
        if (observation.current === null || span === undefined) {
          throw this.structuralError(observation, 'repair');
        }
        const doc = parseDocument(observation.current);
        return write('updated', renderDocument(replaceInner(doc, span.startLine - 1, span.endLine - 1, desired.content)));
      }
      case 'missing_marker': {
        const doc = parseDocument(observation.current ?? '');
        const { document } = insertRegion(doc, config.anchor, config.marker, desired.content, context);
        return write('inserted', renderDocument(document));
      }
      case 'missing_file':
        if (config.createMissing) {
          return write('created', renderDocument(createDocument(buildRegion(config.marker, desired.content))));
        }
        throw this.structuralError(observation, 'repair');
      default:
        throw this.structuralError(observation, 'repair');
    }
  }

  private async repairEntry(entry: RegisteredSection, loaded: LoadedState): Promise<SectionOutcome> {
    let observation: SectionObservation;
    try {
      observation = await this.observeEntry(entry, loaded);
    } catch (error) {
      return this.failure(entry, error, 'repair', 'unknown');
    }
    return this.repairObserved(observation);
  }

  private async repairObserved(observation: SectionObservation): Promise<SectionOutcome> {
    const { entry } = observation;
    try {
      const plan = this.plan(observation);
      if (plan.kind === 'noop') {
        return { report: { ...describeSection(entry, 'match'), ...observationDetails(observation), action: 'none' }, issues: [] };
      }
      const { snapshotId } = await this.applyRepair(plan);
      return {
        report: {
          ...describeSection(entry, 'match'),
          // the span moved with the write
          ...(observation.desiredHash !== undefined ? { desiredHash: observation.desiredHash } : {}),
          action: plan.action,
          ...(snapshotId !== null ? { backup: snapshotId } : {}),
        },
        issues: [],
      };
    } catch (error) {
      return this.failure(entry, error, 'repair', observation.status);
    }
  }

  // ==========================================================================
  // Adopt
  // ==========================================================================

  private async adoptEntry(entry: RegisteredSection, loaded: LoadedState): Promise<SectionOutcome> {
    let observation: SectionObservation;
    try {
      observation = await this.observeEntry(entry, loaded);
    } catch (error) {
      return this.failure(entry, error, 'adopt', 'unknown');
    }
    return this.adoptObserved(observation, loaded);
  }

  private async adoptObserved(observation: SectionObservation, loaded: LoadedState): Promise<SectionOutcome> {
    const { entry, status } = observation;
    const name = entry.config.name;
    try {
      if (status !== 'match' && status !== 'drift') {
        throw this.structuralError(observation, 'adopt');
      }
      if (status === 'match') {
        return { report: { ...describeSection(entry, 'match'), ...observationDetails(observation), action: 'none' }, issues: [] };
      }

      const baseline = this.baselineFor(observation);
      const result = await this.writer.write({
        sectionName: name,
        targetPath: this.baselines.path,
        content: serializeState(withBaseline(loaded.state, baseline)),
        expectedHash: loaded.hash,
        operation: 'adopt',
      });
      this.logger.info('Adopted baseline', { section: name, contentHash: baseline.contentHash });

      return {
        report: {
          ...describeSection(entry, 'match'),
          ...observationDetails(observation),
          desiredHash: baseline.contentHash,
          action: 'adopted',
          backup: result.snapshot.id,
        },
        issues: [],
      };
    } catch (error) {
      return this.failure(entry, error, 'adopt', status);
    }
  }

  private baselineFor(observation: SectionObservation): AdoptedBaseline {
    const { entry } = observation;
    const adoptedAt = this.now().toISOString();

    if (entry.config.mode === 'managed') {
      const content = observation.region?.inner;
      const provided = observation.desired?.provided;
      if (content === undefined || provided === undefined) {
        throw this.structuralError(observation, 'adopt');
      }
      return { section: entry.config.name, content, contentHash: hashContent(content), providerHash: provided.hash, adoptedAt };
    }

    if (observation.current === null || observation.desiredHash === undefined) {
      throw this.structuralError(observation, 'adopt');
    }
    return {
      section: entry.config.name,
      content: observation.current,
      contentHash: hashContent(observation.current),
      providerHash: observation.desiredHash,
      adoptedAt,
    };
  }

  // ==========================================================================
  // Issues and reports
  // ==========================================================================

  private structuralError(observation: SectionObservation, operation: string): DocsBridgeError {
    const { entry, status } = observation;
    const code =
      entry.config.mode === 'external' && status === 'corrupted'
        ? 'DOC_BRIDGE_CORRUPTED_ARTIFACT'
        : errorCodeForStatus(status) ?? 'DOC_BRIDGE_WRITE_FAILED';
    const detail = observation.reason ?? status.replace(/_/g, ' ');
    return new DocsBridgeError(code, `${entry.relativePath}: ${detail}`, {
      operation,
      section: entry.config.name,
      path: entry.relativePath,
      severity: severityForStatus(status, canCreate(entry)) ?? 'error',
      details: { status },
    });
  }

  private structuralIssue(observation: SectionObservation, operation: string): BridgeIssue | null {
    if (observation.status === 'match' || observation.status === 'drift') {
      return null;
    }
    return this.structuralError(observation, operation).toIssue();
  }

  private failure(
    entry: RegisteredSection,
    error: unknown,
    operation: string,
    status: SectionReport['status']
  ): SectionOutcome {
    const bridgeError = toDocsBridgeError(error, 'DOC_BRIDGE_CONTENT_UNAVAILABLE', {
      operation,
      section: entry.config.name,
      path: entry.relativePath,
    });
    this.logger.warn('Section failed', { section: entry.config.name, code: bridgeError.code, operation });
    return {
      report: { ...describeSection(entry, status), action: 'failed' },
      issues: [bridgeError.toIssue()],
    };
  }

  private report(command: BridgeCommand, outcomes: SectionOutcome[], extraIssues: BridgeIssue[] = [], steps?: SyncStep[]): BridgeReport {
    return buildReport(
      command,
      this.now(),
      outcomes.map((outcome) => outcome.report),
      [...extraIssues, ...outcomes.flatMap((outcome) => outcome.issues)],
      steps !== undefined ? { steps } : {}
    );
  }

  /**
   * Run a verb, turning bridge errors that stop the whole verb into a report
   */
  private async guard(command: BridgeCommand, run: () => Promise<BridgeReport>): Promise<BridgeReport> {
    try {
      return await run();
    } catch (error) {
      if (!isDocsBridgeError(error)) {
        throw error;
      }
      this.logger.warn('Command failed', { command, code: error.code });
      return buildReport(command, this.now(), [], [error.toIssue()]);
    }
  }

  /**
   * Read-only verbs keep going without baselines when state.json is unreadable
   */
  private async readStateTolerant(): Promise<{ loaded: LoadedState; issues: BridgeIssue[] }> {
    try {
      return { loaded: await this.baselines.load(), issues: [] };
    } catch (error) {
      if (!isDocsBridgeError(error)) {
        throw error;
      }
      return { loaded: { state: emptyState(), raw: null, hash: null }, issues: [error.toIssue()] };
    }
  }
}

function canCreate(entry: RegisteredSection): boolean {
  const { config } = entry;
  return config.mode === 'managed' ? config.createMissing : getAdapter(config.adapter).createsTarget;
}

function describeSection(entry: RegisteredSection, status: SectionReport['status']): SectionReport {
  const { config } = entry;
  const base: SectionReport = { name: config.name, status, target: entry.relativePath, mode: config.mode };
  return config.mode === 'managed'
    ? { ...base, marker: config.marker, anchor: config.anchor }
    : { ...base, adapter: config.adapter };
}

function observationDetails(observation: SectionObservation): Partial<SectionReport> {
  const { region } = observation;
  return {
    ...(region?.span !== undefined ? { span: region.span } : {}),
    ...(region?.contentHash !== undefined ? { contentHash: region.contentHash } : {}),
    ...(observation.desiredHash !== undefined ? { desiredHash: observation.desiredHash } : {}),
  };
}

function backupOf(outcome: SectionOutcome | undefined): Partial<SectionReport> {
  return outcome?.report.backup !== undefined ? { backup: outcome.report.backup } : {};
}

/**
 * What an external section should produce: its options plus the published content
 */
function externalDesiredHash(config: ExternalSectionConfig, desired: DesiredContent | undefined): string {
  return hashContent(JSON.stringify({ adapter: config.adapter, options: config.options, content: desired?.hash ?? null }));
}

