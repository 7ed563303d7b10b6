/**
 * @steward/core - Managed documentation region engine
 *
 * Locates, diffs, repairs, adopts and rolls back machine-owned regions in
 * documentation trees without touching the human-authored text around them.
 */

export * from './utils/index.js';
export * from './docs-bridge/index.js';
