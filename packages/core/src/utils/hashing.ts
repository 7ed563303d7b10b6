/**
 * Content Hashing and Snapshot IDs
 *
 * Stable, content-based hashes for managed regions and whole files, plus
 * sortable timestamp IDs for backup snapshots.
 *
 * @module hashing
 * @example
 * ```typescript
 * hashContent('hello');            // 'sha256' hex digest
 * generateSnapshotId(new Date(0)); // '19700101T000000000Z'
 * ```
 */

import * as crypto from 'node:crypto';

/** Hash algorithm used for content hashes */
const HASH_ALGORITHM = 'sha256';

const SNAPSHOT_ID_PATTERN = /^\d{8}T\d{9}Z$/;

/**
 * Compute a hex digest of the given content.
 */
export function hashContent(content: string): string {
  return crypto.createHash(HASH_ALGORITHM).update(content, 'utf8').digest('hex');
}

/**
 * Generate a compact, lexicographically sortable UTC snapshot ID.
 *
 * `2026-10-19T03:15:00.123Z` becomes `20261019T031500123Z`.
 */
export function generateSnapshotId(date: Date = new Date()): string {
  return date.toISOString().replace(/[-:.]/g, '');
}

/**
 * Accept either a compact snapshot ID or an ISO-8601 UTC timestamp and
 * return the compact form. Returns null for anything else.
 */
export function normalizeSnapshotId(value: string): string | null {
  const trimmed = value.trim();
  if (SNAPSHOT_ID_PATTERN.test(trimmed)) {
    return trimmed;
  }

  const parsed = Date.parse(trimmed);
  if (Number.isNaN(parsed) || !trimmed.includes('T')) {
    return null;
  }
  return generateSnapshotId(new Date(parsed));
}
