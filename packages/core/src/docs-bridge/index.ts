/**
 * Docs Bridge Module
 *
 * Managed documentation regions: marker-delimited spans inside host Markdown
 * files (and external artifacts) kept in sync with generated content.
 */

export * from './types.js';
export * from './errors.js';
export * from './markers.js';
export * from './anchor-resolver.js';
export * from './text-diff.js';
export * from './diff-engine.js';
export * from './fs-utils.js';
export * from './backup-store.js';
export * from './atomic-writer.js';
export * from './baseline-store.js';
export * from './content-provider.js';
export * from './manifest-renderer.js';
export * from './section-registry.js';
export * from './report.js';
export * from './orchestrator.js';
export * from './adapters/index.js';
