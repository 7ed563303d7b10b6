/**
 * Report helpers: severities, run status aggregation and snapshot summaries.
 */

import type {
  BackupSnapshot,
  BridgeCommand,
  BridgeIssue,
  BridgeReport,
  IssueSeverity,
  RunStatus,
  SectionReport,
  SectionStatus,
  SnapshotSummary,
  SyncStep,
} from './types.js';

const SEVERITY_RANK: Readonly<Record<IssueSeverity, number>> = { info: 0, warning: 1, error: 2 };

/**
 * Severity of a section status, null when healthy
 *
 * @param canCreate - whether repair may create the missing target
 */
export function severityForStatus(status: SectionStatus, canCreate = false): IssueSeverity | null {
  switch (status) {
    case 'match':
      return null;
    case 'drift':
    case 'missing_marker':
      return 'warning';
    case 'missing_file':
      return canCreate ? 'warning' : 'error';
    case 'duplicate_marker':
    case 'corrupted':
    case 'unknown':
      return 'error';
  }
}

export function worstSeverity(severities: readonly IssueSeverity[]): IssueSeverity | null {
  return severities.reduce<IssueSeverity | null>(
    (worst, severity) => (worst === null || SEVERITY_RANK[severity] > SEVERITY_RANK[worst] ? severity : worst),
    null
  );
}

/**
 * `error` if any issue is an error, `warning` if anything is not a clean match, otherwise `ok`
 */
export function aggregateStatus(sections: readonly SectionReport[], issues: readonly BridgeIssue[]): RunStatus {
  const worst = worstSeverity(issues.map((issue) => issue.severity));
  if (worst === 'error') {
    return 'error';
  }
  if (worst === 'warning' || sections.some((section) => section.status !== 'match')) {
    return 'warning';
  }
  return 'ok';
}

export function summarizeSnapshot(snapshot: BackupSnapshot): SnapshotSummary {
  return {
    id: snapshot.id,
    timestamp: snapshot.timestamp,
    section: snapshot.sectionName,
    target: snapshot.targetPath,
    operation: snapshot.operation,
  };
}

export function buildReport(
  command: BridgeCommand,
  generatedAt: Date,
  sections: SectionReport[],
  issues: BridgeIssue[],
  extra: { snapshots?: SnapshotSummary[]; steps?: SyncStep[] } = {}
): BridgeReport {
  return {
    command,
    status: aggregateStatus(sections, issues),
    generatedAt: generatedAt.toISOString(),
    sections,
    issues,
    ...(extra.snapshots !== undefined ? { snapshots: extra.snapshots } : {}),
    ...(extra.steps !== undefined ? { steps: extra.steps } : {}),
  };
}

/**
 * Process exit code for a report: 1 when the run ended in error
 */
export function exitCodeFor(report: Pick<BridgeReport, 'status'>): number {
  return report.status === 'error' ? 1 : 0;
}
