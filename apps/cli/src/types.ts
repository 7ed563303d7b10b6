/**
 * CLI-specific types for Steward
 */

import type { BridgeCommand, SyncMode } from '@steward/core';

/** Base options available to all commands */
export interface CliOptions {
  /** Enable verbose output */
  verbose?: boolean;
  /** Suppress non-essential output */
  quiet?: boolean;
  /** Output as JSON */
  json?: boolean;
  /** Path to a settings file */
  config?: string;
  /** false when --no-color was given */
  color?: boolean;
}

/** Verbs of `steward docs` */
export type DocsVerb = BridgeCommand | 'init';

export const DOCS_VERBS: readonly DocsVerb[] = [
  'diagnose',
  'list',
  'diff',
  'repair',
  'adopt',
  'rollback',
  'sync',
  'history',
  'init',
];

/** Options for the docs commands */
export interface DocsOptions extends CliOptions {
  /** Project root (default: cwd) */
  root?: string;
  /** Sections to act on; repeatable */
  section?: string[];
  /** Snapshot id or ISO timestamp for rollback */
  timestamp?: string;
  /** What sync does with drifted sections */
  mode?: SyncMode;
  /** Overwrite an existing bridge configuration (init) */
  force?: boolean;
}

/** Result printed by `docs init` */
export interface InitResult {
  command: 'init';
  status: 'ok';
  generatedAt: string;
  /** Project-relative path of the written configuration */
  path: string;
  overwritten: boolean;
}
