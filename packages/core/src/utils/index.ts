/**
 * Core Utilities Module
 *
 * Shared utilities for error handling, logging and hashing.
 */

export * from './errors.js';
export * from './logger.js';
export * from './hashing.js';
