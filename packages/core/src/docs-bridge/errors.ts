/**
 * Docs bridge error codes and remediation texts.
 *
 * Every failure the bridge reports carries one of these codes plus a
 * remediation string that can be shown verbatim to a human or an agent.
 */

import { StewardError, getErrorMessage, isErrnoException } from '../utils/errors.js';
import type { BridgeIssue, IssueSeverity, RegionStatus } from './types.js';

export const DOCS_BRIDGE_ERROR_CODES = [
  'DOC_BRIDGE_INVALID_CONFIG',
  'DOC_BRIDGE_MISSING_FILE',
  'DOC_BRIDGE_MISSING_MARKER',
  'DOC_BRIDGE_DUPLICATE_MARKER',
  'DOC_BRIDGE_CORRUPTED_MARKERS',
  'DOC_BRIDGE_CORRUPTED_ARTIFACT',
  'DOC_BRIDGE_ANCHOR_NOT_FOUND',
  'DOC_BRIDGE_CONFLICT',
  'DOC_BRIDGE_SIZE_BUDGET_EXCEEDED',
  'DOC_BRIDGE_UNKNOWN_SECTION',
  'DOC_BRIDGE_BACKUP_NOT_FOUND',
  'DOC_BRIDGE_CONTENT_UNAVAILABLE',
  'DOC_BRIDGE_STATE_CORRUPTED',
  'DOC_BRIDGE_WRITE_FAILED',
] as const;
export type DocsBridgeErrorCode = (typeof DOCS_BRIDGE_ERROR_CODES)[number];

/**
 * Remediation templates; `{section}` and `{path}` are substituted when known.
 */
export const ERROR_REMEDIATIONS: Readonly<Record<DocsBridgeErrorCode, string>> = Object.freeze({
  DOC_BRIDGE_INVALID_CONFIG:
    'Fix the docs bridge configuration ({path}) so it matches the schema, then rerun `steward docs diagnose`.',
  DOC_BRIDGE_MISSING_FILE:
    'Create {path} (or set create_missing: true for section {section}) and rerun `steward docs repair --section {section}`.',
  DOC_BRIDGE_MISSING_MARKER: 'Run `steward docs repair --section {section}` to insert the managed region into {path}.',
  DOC_BRIDGE_DUPLICATE_MARKER:
    'Manually remove the duplicate markers of section {section} in {path}; repair will not guess which pair is authoritative.',
  DOC_BRIDGE_CORRUPTED_MARKERS:
    'Restore the start/end marker pair of section {section} in {path} by hand, or run `steward docs rollback --section {section} --timestamp <ts>`.',
  DOC_BRIDGE_CORRUPTED_ARTIFACT: 'Fix the syntax of {path} by hand, then rerun `steward docs repair --section {section}`.',
  DOC_BRIDGE_ANCHOR_NOT_FOUND:
    'Add the anchor used by section {section} to {path}, or change its insert_after_heading / insert_before_marker setting.',
  DOC_BRIDGE_CONFLICT:
    '{path} changed after it was diagnosed; rerun `steward docs diff --section {section}` and repair again.',
  DOC_BRIDGE_SIZE_BUDGET_EXCEEDED: 'Reduce the content published by section {section} or raise its max_bytes option.',
  DOC_BRIDGE_UNKNOWN_SECTION: 'Run `steward docs list` to see the configured sections.',
  DOC_BRIDGE_BACKUP_NOT_FOUND: 'Run `steward docs history --section {section}` to list available timestamps.',
  DOC_BRIDGE_CONTENT_UNAVAILABLE:
    'Make sure the content provider can render section {section} (for example that the architecture manifest exists and is valid).',
  DOC_BRIDGE_STATE_CORRUPTED: 'Restore {path} from a snapshot with `steward docs rollback` or delete it to drop adopted baselines.',
  DOC_BRIDGE_WRITE_FAILED: 'Check permissions and free space for {path}, then rerun the command; the file was left unchanged.',
});

const STATUS_ERROR_CODES: Readonly<Partial<Record<RegionStatus, DocsBridgeErrorCode>>> = Object.freeze({
  missing_file: 'DOC_BRIDGE_MISSING_FILE',
  missing_marker: 'DOC_BRIDGE_MISSING_MARKER',
  duplicate_marker: 'DOC_BRIDGE_DUPLICATE_MARKER',
  corrupted: 'DOC_BRIDGE_CORRUPTED_MARKERS',
});

/**
 * Render the remediation for a code with section and path filled in
 */
export function remediationFor(code: DocsBridgeErrorCode, context: { section?: string; path?: string | null } = {}): string {
  return ERROR_REMEDIATIONS[code]
    .replace(/\{section\}/g, context.section ?? '<section>')
    .replace(/\{path\}/g, context.path ?? '<path>');
}

/**
 * Error code matching a structural region status, if the status is not healthy
 */
export function errorCodeForStatus(status: RegionStatus): DocsBridgeErrorCode | undefined {
  return STATUS_ERROR_CODES[status];
}

export interface DocsBridgeErrorOptions {
  operation: string;
  section?: string;
  /** Project-relative path the error refers to */
  path?: string | null;
  severity?: IssueSeverity;
  details?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Error raised by any docs bridge component
 */
export class DocsBridgeError extends StewardError<DocsBridgeErrorCode> {
  public readonly section?: string;
  public readonly path: string | null;
  public readonly severity: IssueSeverity;
  public readonly remediation: string;

  constructor(code: DocsBridgeErrorCode, message: string, options: DocsBridgeErrorOptions) {
    const remediation = remediationFor(code, { section: options.section, path: options.path });
    super(
      message,
      {
        code,
        component: 'docs-bridge',
        operation: options.operation,
        details: options.details,
        recoveryHint: remediation,
        retryable: code === 'DOC_BRIDGE_CONFLICT',
      },
      options.cause
    );
    this.name = 'DocsBridgeError';
    this.section = options.section;
    this.path = options.path ?? null;
    this.severity = options.severity ?? 'error';
    this.remediation = remediation;
  }

  /**
   * Convert to the issue shape used in reports
   */
  toIssue(): BridgeIssue {
    return {
      code: this.code,
      path: this.path,
      message: this.message,
      severity: this.severity,
      remediation: this.remediation,
      ...(this.section !== undefined ? { section: this.section } : {}),
    };
  }
}

export function isDocsBridgeError(error: unknown): error is DocsBridgeError {
  return error instanceof DocsBridgeError;
}

/**
 * Wrap an unexpected failure (I/O, provider bugs) so it can be reported as an issue
 */
export function toDocsBridgeError(
  error: unknown,
  fallback: DocsBridgeErrorCode,
  options: DocsBridgeErrorOptions
): DocsBridgeError {
  if (isDocsBridgeError(error)) {
    return error;
  }
  const cause = error instanceof Error ? error : undefined;
  const errno = isErrnoException(error) ? ` (${error.code})` : '';
  return new DocsBridgeError(fallback, `${getErrorMessage(error)}${errno}`, { ...options, cause });
}
