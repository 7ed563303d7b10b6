/**
 * Docs Bridge Types
 *
 * Type definitions for managed documentation regions: the bridge configuration
 * file, per-section runtime observations, backup snapshots and reports.
 */

import { z } from 'zod';

// ============================================================================
// Configuration Types
// ============================================================================

/** Marker tokens and section names share one conservative alphabet */
export const TOKEN_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export const SectionModeSchema = z.enum(['managed', 'external']);
export type SectionMode = z.infer<typeof SectionModeSchema>;

export const AdapterKindSchema = z.enum(['mkdocs_nav', 'docusaurus_sidebar', 'confluence_page']);
export type AdapterKind = z.infer<typeof AdapterKindSchema>;

const ADAPTER_ALIASES: Readonly<Record<string, AdapterKind>> = {
  mkdocs: 'mkdocs_nav',
  docusaurus: 'docusaurus_sidebar',
  confluence: 'confluence_page',
};

const tokenSchema = (label: string) =>
  z
    .string()
    .regex(TOKEN_PATTERN, `${label} must start with a letter or digit and contain only letters, digits, '_', '.' or '-'`);

export const RawSectionSchema = z
  .object({
    mode: SectionModeSchema.default('managed'),
    /** Host file (managed: relative to docs root; external: relative to project root) */
    target: z.string().trim().min(1, 'target cannot be empty').optional(),
    /** Marker token, defaults to the section name */
    marker: tokenSchema('marker').optional(),
    insert_after_heading: z.string().trim().min(1, 'insert_after_heading cannot be empty').optional(),
    insert_before_marker: tokenSchema('insert_before_marker').optional(),
    adapter: z
      .preprocess((value) => (typeof value === 'string' ? ADAPTER_ALIASES[value] ?? value : value), AdapterKindSchema)
      .optional(),
    options: z.record(z.unknown()).default({}),
    /** Allow repair to create the host file when it is absent */
    create_missing: z.boolean().default(false),
  })
  .strict()
  .superRefine((section, ctx) => {
    if (section.insert_after_heading !== undefined && section.insert_before_marker !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'insert_after_heading and insert_before_marker are mutually exclusive',
        path: ['insert_before_marker'],
      });
    }
    if (section.mode === 'managed') {
      if (section.target === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'target is required for managed sections', path: ['target'] });
      }
      if (section.adapter !== undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'adapter is only valid for external sections', path: ['adapter'] });
      }
    } else if (section.adapter === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'adapter is required for external sections', path: ['adapter'] });
    }
  });
export type RawSection = z.infer<typeof RawSectionSchema>;

export const BridgeConfigFileSchema = z
  .object({
    version: z.literal(1).default(1),
    /** Documentation root, relative to the project root */
    root: z.string().trim().min(1, 'root cannot be empty').default('docs'),
    sections: z.record(tokenSchema('section name'), RawSectionSchema).default({}),
  })
  .strict();
export type BridgeConfigFile = z.infer<typeof BridgeConfigFileSchema>;

/** Where a region is first materialized in a host file */
export type AnchorPolicy =
  | { readonly kind: 'after_heading'; readonly heading: string }
  | { readonly kind: 'before_marker'; readonly token: string }
  | { readonly kind: 'append_end' };

export interface ManagedSectionConfig {
  readonly mode: 'managed';
  readonly name: string;
  /** Target as declared, relative to the docs root */
  readonly target: string;
  readonly marker: string;
  readonly anchor: AnchorPolicy;
  readonly createMissing: boolean;
}

export interface ExternalSectionConfig {
  readonly mode: 'external';
  readonly name: string;
  readonly adapter: AdapterKind;
  /** Target as declared, relative to the project root; adapters may supply a default */
  readonly target?: string;
  readonly options: Readonly<Record<string, unknown>>;
}

export type SectionConfig = ManagedSectionConfig | ExternalSectionConfig;

// ============================================================================
// Region Types
// ============================================================================

export const REGION_STATUSES = [
  'match',
  'drift',
  'missing_file',
  'missing_marker',
  'duplicate_marker',
  'corrupted',
] as const;
export type RegionStatus = (typeof REGION_STATUSES)[number];

/** Status reported when a section could not be classified at all */
export type SectionStatus = RegionStatus | 'unknown';

/** Generated payload a section should contain; opaque to the engine */
export interface DesiredContent {
  content: string;
  hash: string;
}

/** 1-based, inclusive of both marker lines */
export interface RegionSpan {
  startLine: number;
  endLine: number;
}

export interface DiffHunk {
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  lines: string[];
}

export interface RegionDiff {
  added: string[];
  removed: string[];
  hunks: DiffHunk[];
  /** Rendered unified diff text */
  unified: string;
}

/** Runtime-observed state of a section inside its target file; never persisted */
export interface ManagedRegion {
  section: string;
  /** Absolute path of the host file */
  target: string;
  marker: string;
  status: RegionStatus;
  span?: RegionSpan;
  /** Hash of the normalized inner span */
  contentHash?: string;
  /** Normalized inner span, present when a matched pair was found */
  inner?: string;
  /** Hash of the whole file as read, null when absent */
  fileHash: string | null;
  desiredHash: string;
  diff?: RegionDiff;
  reason?: string;
}

// ============================================================================
// Persistence Types
// ============================================================================

export const SnapshotOperationSchema = z.enum(['repair', 'adopt', 'rollback']);
export type SnapshotOperation = z.infer<typeof SnapshotOperationSchema>;

export const BackupSnapshotSchema = z.object({
  /** Compact sortable UTC id, e.g. 20261019T031500123Z */
  id: z.string().min(1),
  /** ISO-8601 UTC creation instant */
  timestamp: z.string().datetime(),
  sectionName: z.string().min(1),
  /** Project-relative path of the file that was about to change */
  targetPath: z.string().min(1),
  /** Whole file before mutation, null when it did not exist */
  priorContent: z.string().nullable(),
  priorHash: z.string().nullable(),
  operation: SnapshotOperationSchema,
});
export type BackupSnapshot = z.infer<typeof BackupSnapshotSchema>;

export const AdoptedBaselineSchema = z.object({
  section: z.string().min(1),
  /** Content accepted as the new baseline */
  content: z.string(),
  contentHash: z.string(),
  /** Provider hash at adoption time; a different hash supersedes the baseline */
  providerHash: z.string(),
  adoptedAt: z.string().datetime(),
});
export type AdoptedBaseline = z.infer<typeof AdoptedBaselineSchema>;

export const BridgeStateSchema = z.object({
  version: z.literal(1),
  baselines: z.record(AdoptedBaselineSchema).default({}),
});
export type BridgeState = z.infer<typeof BridgeStateSchema>;

// ============================================================================
// Report Types
// ============================================================================

export type BridgeCommand = 'diagnose' | 'list' | 'diff' | 'repair' | 'adopt' | 'rollback' | 'sync' | 'history';

export type RunStatus = 'ok' | 'warning' | 'error';

export type IssueSeverity = 'error' | 'warning' | 'info';

export type SectionAction = 'none' | 'updated' | 'inserted' | 'created' | 'adopted' | 'restored' | 'failed';

export interface BridgeIssue {
  code: string;
  /** Project-relative path the issue refers to */
  path: string | null;
  message: string;
  severity: IssueSeverity;
  remediation: string;
  section?: string;
}

export interface SectionReport {
  name: string;
  status: SectionStatus;
  /** Project-relative path of the host file or artifact */
  target: string;
  mode: SectionMode;
  marker?: string;
  adapter?: AdapterKind;
  anchor?: AnchorPolicy;
  span?: RegionSpan;
  contentHash?: string;
  desiredHash?: string;
  diff?: string;
  action?: SectionAction;
  /** Snapshot created by this invocation */
  backup?: string;
}

export interface SnapshotSummary {
  id: string;
  timestamp: string;
  section: string;
  target: string;
  operation: SnapshotOperation;
}

export interface SyncStep {
  step: 'diff-before' | 'repair' | 'adopt' | 'diff-after';
  sections: Array<{ name: string; status: SectionStatus; action?: SectionAction }>;
  skipped?: boolean;
}

export interface BridgeReport {
  command: BridgeCommand;
  status: RunStatus;
  generatedAt: string;
  sections: SectionReport[];
  issues: BridgeIssue[];
  snapshots?: SnapshotSummary[];
  steps?: SyncStep[];
}
