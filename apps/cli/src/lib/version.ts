/**
 * CLI Version
 *
 * Kept in step with apps/cli/package.json when releasing.
 *
 * @module lib/version
 */

export const CLI_VERSION = '0.1.0';

/** Lowest Node.js major the CLI runs on */
export const MIN_NODE_MAJOR = 20;
