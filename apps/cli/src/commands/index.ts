/**
 * Command exports
 */

export { docsCommand, type DocsCommandContext } from './docs.js';
