/**
 * CLI settings with cosmiconfig + zod validation
 *
 * Settings say where the docs bridge finds its inputs (bridge config, state
 * directory, architecture manifest) and how output is printed. The bridge
 * configuration itself is a separate YAML file read by the core.
 *
 * @module config
 * @example
 * ```typescript
 * // steward.config.mjs
 * import { defineConfig } from '@steward/cli';
 *
 * export default defineConfig({
 *   docs: { manifest: 'design/manifest.yaml' },
 * });
 * ```
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';
import { z } from 'zod';
import path from 'node:path';
import fs from 'node:fs/promises';
import { DEFAULT_BACKUP_KEEP, DEFAULT_BRIDGE_CONFIG_PATH, DEFAULT_MANIFEST_PATH, DEFAULT_STATE_DIR } from '@steward/core';
import { CliError, isCliError, withTimeout } from './errors.js';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_CONFIG_TIMEOUT_MS = 10000;

const OUTPUT_FORMATS = ['json', 'pretty'] as const;

/** Project-relative path that may not climb out of the project */
const projectPath = (label: string) =>
  z
    .string()
    .min(1, `${label} cannot be empty`)
    .refine((p) => !path.isAbsolute(p) && !p.split(/[\\/]/).includes('..'), `${label} must be a relative path inside the project`);

/**
 * Configuration schema for steward settings files
 */
export const configSchema = z
  .object({
    /** Default output format */
    output: z.enum(OUTPUT_FORMATS).default('pretty'),

    docs: z
      .object({
        /** Bridge configuration (YAML) */
        config: projectPath('docs.config').default(DEFAULT_BRIDGE_CONFIG_PATH),
        /** Snapshots, baselines and external payloads */
        stateDir: projectPath('docs.stateDir').default(DEFAULT_STATE_DIR),
        /** Architecture manifest rendered into the default sections */
        manifest: projectPath('docs.manifest').default(DEFAULT_MANIFEST_PATH),
        backups: z
          .object({
            keep: z
              .number()
              .int()
              .min(1, 'docs.backups.keep must be at least 1')
              .max(1000, 'docs.backups.keep cannot exceed 1000')
              .default(DEFAULT_BACKUP_KEEP),
          })
          .strict()
          .default({}),
      })
      .strict()
      .default({}),
  })
  .strict();

export type StewardConfig = z.infer<typeof configSchema>;
export type StewardConfigInput = z.input<typeof configSchema>;

/**
 * Default configuration - validated at module load
 */
export const defaultConfig: StewardConfig = configSchema.parse({});

// ============================================================================
// Cache Management
// ============================================================================

interface ConfigCacheEntry {
  config: StewardConfig;
  /** Absolute path to the config file, or null if using defaults */
  path: string | null;
  /** File modification time in milliseconds for cache invalidation */
  mtime: number;
}

/** Keyed by search directory or explicit file */
const configCache = new Map<string, ConfigCacheEntry>();

// ============================================================================
// Config Discovery
// ============================================================================

/**
 * Config search locations in priority order
 */
export const CONFIG_SEARCH_PLACES = [
  'steward.config.json',
  'steward.config.yaml',
  'steward.config.yml',
  'steward.config.js',
  'steward.config.mjs',
  'steward.config.cjs',
  '.stewardrc',
  '.stewardrc.json',
  '.stewardrc.yaml',
  '.stewardrc.yml',
  'package.json',
] as const;

function createExplorer(): ReturnType<typeof cosmiconfig> {
  return cosmiconfig('steward', {
    searchPlaces: [...CONFIG_SEARCH_PLACES],
    cache: false,
  });
}

export interface LoadConfigOptions {
  /** Directory searched for a settings file (default: process.cwd()) */
  cwd?: string;
  /** Whether to use cached config (default: true) */
  cache?: boolean;
  /** Maximum time to wait for config load in ms (default: 10000) */
  timeout?: number;
}

/**
 * Load settings from file or use defaults
 *
 * @param configPath - Explicit settings file; skips the search. Relative paths
 *                     resolve against `options.cwd`.
 * @throws {CliError} CONFIG_INVALID when the file does not match the schema
 * @throws {CliError} FILE_NOT_FOUND when an explicit file does not exist
 */
export async function loadConfig(configPath?: string, options?: LoadConfigOptions): Promise<StewardConfig> {
  const cwd = path.resolve(options?.cwd ?? process.cwd());
  const useCache = options?.cache ?? true;
  const timeout = options?.timeout ?? DEFAULT_CONFIG_TIMEOUT_MS;
  const explicitPath = configPath ? path.resolve(cwd, configPath) : undefined;
  const cacheKey = explicitPath ?? cwd;

  if (useCache) {
    const cached = await readCache(cacheKey);
    if (cached) {
      return cached;
    }
  }

  const explorer = createExplorer();

  try {
    const result = await withTimeout<CosmiconfigResult>(
      async () => (explicitPath ? explorer.load(explicitPath) : explorer.search(cwd)),
      timeout,
      'CONFIG_TIMEOUT'
    );

    if (!result || result.isEmpty) {
      configCache.set(cacheKey, { config: defaultConfig, path: result?.filepath ?? null, mtime: 0 });
      return defaultConfig;
    }

    const validation = validateConfig(result.config);
    if (!validation.valid || !validation.data) {
      const errors = (validation.errors ?? []).map((e) => `  • ${e}`).join('\n');
      throw new CliError(`Invalid configuration in ${result.filepath}:\n${errors}`, 'CONFIG_INVALID', {
        context: { file: result.filepath },
        suggestions: ['Check your configuration file for typos', 'Remove keys the settings schema does not know'],
      });
    }

    const stats = await fs.stat(result.filepath);
    configCache.set(cacheKey, { config: validation.data, path: result.filepath, mtime: stats.mtimeMs });
    return validation.data;
  } catch (error) {
    throw toConfigError(error, explicitPath);
  }
}

async function readCache(key: string): Promise<StewardConfig | null> {
  const cached = configCache.get(key);
  if (!cached) {
    return null;
  }
  if (!cached.path) {
    return cached.config;
  }
  try {
    const stats = await fs.stat(cached.path);
    if (stats.mtimeMs === cached.mtime) {
      return cached.config;
    }
  } catch (error) {
    if (!isErrno(error, 'ENOENT')) {
      throw toConfigError(error, cached.path);
    }
  }
  configCache.delete(key);
  return null;
}

function toConfigError(error: unknown, file: string | undefined): CliError {
  if (isCliError(error) && (error.code === 'CONFIG_INVALID' || error.code === 'CONFIG_TIMEOUT')) {
    return error;
  }
  // withTimeout wraps loader failures; classify the underlying error
  const cause = isCliError(error) ? (error.cause ?? error) : error;
  if (isErrno(cause, 'ENOENT')) {
    return CliError.fromCode('FILE_NOT_FOUND', `Configuration file not found: ${file ?? 'unknown'}`, {
      context: { file },
    });
  }
  if (isErrno(cause, 'EACCES')) {
    return CliError.fromCode('CONFIG_PERMISSION_DENIED', undefined, { cause, context: { file } });
  }
  return CliError.fromCode(
    'CONFIG_PARSE_ERROR',
    `Failed to load configuration: ${cause instanceof Error ? cause.message : String(cause)}`,
    { cause: cause instanceof Error ? cause : undefined, context: { file } }
  );
}

function isErrno(error: unknown, code: string): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Get the settings file that would be loaded from a directory, if any
 */
export async function getConfigPath(cwd: string = process.cwd()): Promise<string | null> {
  const result = await createExplorer().search(path.resolve(cwd));
  return result?.filepath ?? null;
}

/**
 * Forces the next loadConfig() call to re-read from disk
 */
export function clearConfigCache(): void {
  configCache.clear();
}

interface ValidationResult {
  valid: boolean;
  /** Only present when valid */
  data?: StewardConfig;
  /** Only present when invalid */
  errors?: string[];
}

/**
 * Validate a configuration object against the schema
 */
export function validateConfig(config: unknown): ValidationResult {
  const parsed = configSchema.safeParse(config);
  if (parsed.success) {
    return { valid: true, data: parsed.data };
  }
  return {
    valid: false,
    errors: parsed.error.errors.map((e) => `${e.path.join('.') || 'root'}: ${e.message}`),
  };
}

/**
 * Typed helper for JavaScript settings files
 */
export function defineConfig(config: StewardConfigInput): StewardConfigInput {
  return config;
}
