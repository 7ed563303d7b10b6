/**
 * Baseline Store
 *
 * Adopted baselines live in `<stateDir>/state.json`. Reading never creates the
 * file; writes go through the AtomicWriter so state changes are snapshotted
 * like any other target.
 */

import { join } from 'node:path';
import type { ZodError } from 'zod';
import { hashContent } from '../utils/hashing.js';
import { DocsBridgeError } from './errors.js';
import { readTextOrNull, toProjectPath } from './fs-utils.js';
import { BridgeStateSchema, type AdoptedBaseline, type BridgeState } from './types.js';

export const STATE_FILE_NAME = 'state.json';

export interface LoadedState {
  state: BridgeState;
  /** File text as read, null when absent */
  raw: string | null;
  /** Hash of `raw`, used as the writer's expected hash */
  hash: string | null;
}

export class BaselineStore {
  readonly path: string;
  private readonly projectRoot: string;

  constructor(projectRoot: string, stateDir: string) {
    this.projectRoot = projectRoot;
    this.path = join(stateDir, STATE_FILE_NAME);
  }

  async load(): Promise<LoadedState> {
    const raw = await readTextOrNull(this.path);
    if (raw === null) {
      return { state: emptyState(), raw: null, hash: null };
    }

    const relPath = toProjectPath(this.projectRoot, this.path);
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new DocsBridgeError('DOC_BRIDGE_STATE_CORRUPTED', `${relPath} is not valid JSON`, {
        operation: 'loadState',
        path: relPath,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const parsed = BridgeStateSchema.safeParse(data);
    if (!parsed.success) {
      throw new DocsBridgeError('DOC_BRIDGE_STATE_CORRUPTED', `${relPath} does not match the state schema`, {
        operation: 'loadState',
        path: relPath,
        details: { issues: formatIssues(parsed.error) },
      });
    }

    return { state: parsed.data, raw, hash: hashContent(raw) };
  }
}

export function emptyState(): BridgeState {
  return { version: 1, baselines: {} };
}

export function withBaseline(state: BridgeState, baseline: AdoptedBaseline): BridgeState {
  return { ...state, baselines: { ...state.baselines, [baseline.section]: baseline } };
}

export function serializeState(state: BridgeState): string {
  const sorted = Object.fromEntries(Object.entries(state.baselines).sort(([a], [b]) => a.localeCompare(b)));
  return `${JSON.stringify({ version: state.version, baselines: sorted }, null, 2)}\n`;
}

function formatIssues(error: ZodError): string[] {
  return error.errors.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}
