/**
 * Section Registry
 *
 * Loads `docs.bridge.yaml`, validates it and resolves every section to an
 * absolute target. A registry is an immutable value built fresh for each
 * invocation; nothing here is cached between runs.
 */

import { resolve } from 'node:path';
import { dump, load } from 'js-yaml';
import { getErrorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { getAdapter } from './adapters/index.js';
import { DocsBridgeError } from './errors.js';
import { readTextOrNull, resolveWithin, toProjectPath } from './fs-utils.js';
import {
  BridgeConfigFileSchema,
  type AnchorPolicy,
  type BridgeConfigFile,
  type ExternalSectionConfig,
  type RawSection,
  type SectionConfig,
} from './types.js';

export const DEFAULT_BRIDGE_CONFIG_PATH = '.steward/config/docs.bridge.yaml';
export const DEFAULT_STATE_DIR = '.steward/state/docs';

/** Used when the project has no bridge configuration file */
export const DEFAULT_BRIDGE_CONFIG: Readonly<BridgeConfigFile> = Object.freeze<BridgeConfigFile>({
  version: 1,
  root: 'docs',
  sections: {
    architecture_overview: { mode: 'managed', target: 'architecture/overview.md', options: {}, create_missing: false },
    adr_index: { mode: 'managed', target: 'adr/index.md', options: {}, create_missing: false },
    rfc_index: { mode: 'managed', target: 'rfc/index.md', options: {}, create_missing: false },
  },
});

export interface RegisteredSection {
  readonly config: SectionConfig;
  /** Absolute path of the host file or artifact */
  readonly path: string;
  /** Project-relative path with forward slashes */
  readonly relativePath: string;
}

export interface LoadRegistryOptions {
  /** Bridge config path relative to the project root */
  configPath?: string;
  /** State directory relative to the project root */
  stateDir?: string;
}

export class SectionRegistry {
  readonly projectRoot: string;
  /** Absolute docs root */
  readonly docsRoot: string;
  /** Absolute bridge config path, whether or not it exists */
  readonly configPath: string;
  /** False when the built-in defaults were used */
  readonly fromFile: boolean;
  private readonly entries: ReadonlyMap<string, RegisteredSection>;

  constructor(init: {
    projectRoot: string;
    docsRoot: string;
    configPath: string;
    fromFile: boolean;
    sections: readonly RegisteredSection[];
  }) {
    this.projectRoot = init.projectRoot;
    this.docsRoot = init.docsRoot;
    this.configPath = init.configPath;
    this.fromFile = init.fromFile;
    this.entries = new Map(init.sections.map((section) => [section.config.name, section]));
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): RegisteredSection {
    const section = this.entries.get(name);
    if (!section) {
      throw new DocsBridgeError('DOC_BRIDGE_UNKNOWN_SECTION', `Unknown section '${name}'`, {
        operation: 'lookup',
        section: name,
        details: { known: this.names() },
      });
    }
    return section;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  /** Sections in declaration order */
  sections(): RegisteredSection[] {
    return [...this.entries.values()];
  }

  /**
   * The named sections, or all of them when `names` is empty or undefined
   */
  select(names?: readonly string[]): RegisteredSection[] {
    if (!names || names.length === 0) {
      return this.sections();
    }
    return [...new Set(names)].map((name) => this.get(name));
  }
}

/**
 * Parse and schema-check bridge config text
 */
export function parseBridgeConfig(text: string, source: string): BridgeConfigFile {
  let data: unknown;
  try {
    data = load(text);
  } catch (error) {
    throw invalidConfig(source, [`<root>: invalid YAML: ${getErrorMessage(error)}`]);
  }

  const parsed = BridgeConfigFileSchema.safeParse(data ?? {});
  if (!parsed.success) {
    throw invalidConfig(
      source,
      parsed.error.errors.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Resolve a parsed config into a registry, checking cross-section invariants
 */
export function buildRegistry(
  projectRoot: string,
  file: BridgeConfigFile,
  options: { configPath: string; stateDir: string; fromFile: boolean }
): SectionRegistry {
  const source = toProjectPath(projectRoot, options.configPath);
  const issues: string[] = [];

  const docsRoot = resolveWithin(projectRoot, file.root);
  if (docsRoot === null) {
    throw invalidConfig(source, [`root: '${file.root}' must be a relative path inside the project`]);
  }
  const stateDir = toProjectPath(projectRoot, resolve(projectRoot, options.stateDir));

  const sections: RegisteredSection[] = [];
  /** absolute target -> marker -> owning section */
  const markersByTarget = new Map<string, Map<string, string>>();

  for (const [name, raw] of Object.entries(file.sections)) {
    const at = (field: string, message: string) => issues.push(`sections.${name}.${field}: ${message}`);

    if (raw.mode === 'managed') {
      const target = raw.target ?? '';
      const path = resolveWithin(docsRoot, target);
      if (path === null) {
        at('target', `'${target}' must be a relative path inside '${file.root}'`);
        continue;
      }
      const marker = raw.marker ?? name;
      if (raw.insert_before_marker === marker) {
        at('insert_before_marker', "cannot reference the section's own marker");
      }

      const markers = markersByTarget.get(path) ?? new Map<string, string>();
      const owner = markers.get(marker);
      if (owner !== undefined) {
        at('marker', `'${marker}' is already used by section '${owner}' in ${toProjectPath(projectRoot, path)}`);
      }
      markers.set(marker, name);
      markersByTarget.set(path, markers);

      sections.push({
        config: {
          mode: 'managed',
          name,
          target,
          marker,
          anchor: anchorFor(raw),
          createMissing: raw.create_missing,
        },
        path,
        relativePath: toProjectPath(projectRoot, path),
      });
      continue;
    }

    // validated by the schema: external sections always carry an adapter
    if (raw.adapter === undefined) {
      continue;
    }
    for (const field of ['marker', 'insert_after_heading', 'insert_before_marker'] as const) {
      if (raw[field] !== undefined) {
        at(field, 'is only valid for managed sections');
      }
    }

    const adapter = getAdapter(raw.adapter);
    adapter.validateOptions(raw.options).forEach((issue) => issues.push(`sections.${name}.${issue}`));

    const config: ExternalSectionConfig = {
      mode: 'external',
      name,
      adapter: raw.adapter,
      ...(raw.target !== undefined ? { target: raw.target } : {}),
      options: raw.options,
    };
    const target = raw.target ?? adapter.defaultTarget(config, stateDir);
    if (target === undefined) {
      at('target', `is required for adapter '${raw.adapter}'`);
      continue;
    }
    const path = resolveWithin(projectRoot, target);
    if (path === null) {
      at('target', `'${target}' must be a relative path inside the project`);
      continue;
    }
    sections.push({ config, path, relativePath: toProjectPath(projectRoot, path) });
  }

  if (issues.length > 0) {
    throw invalidConfig(source, issues);
  }

  return new SectionRegistry({
    projectRoot,
    docsRoot,
    configPath: options.configPath,
    fromFile: options.fromFile,
    sections,
  });
}

/**
 * Load the registry for a project; a missing config file yields the default sections
 */
export async function loadSectionRegistry(
  projectRoot: string,
  options: LoadRegistryOptions = {}
): Promise<SectionRegistry> {
  const logger = getLogger('docs-bridge:registry');
  const configPath = resolve(projectRoot, options.configPath ?? DEFAULT_BRIDGE_CONFIG_PATH);
  const source = toProjectPath(projectRoot, configPath);

  let text: string | null;
  try {
    text = await readTextOrNull(configPath);
  } catch (error) {
    throw invalidConfig(source, [`<root>: cannot read file: ${getErrorMessage(error)}`]);
  }

  const file = text === null ? DEFAULT_BRIDGE_CONFIG : parseBridgeConfig(text, source);
  if (text === null) {
    logger.debug('No bridge config, using default sections', { path: source });
  }

  const registry = buildRegistry(projectRoot, file, {
    configPath,
    stateDir: options.stateDir ?? DEFAULT_STATE_DIR,
    fromFile: text !== null,
  });
  logger.debug('Section registry loaded', { path: source, sections: registry.names().length });
  return registry;
}

/**
 * Starter config text for `docs init`
 */
export function renderDefaultBridgeConfig(): string {
  const sections = Object.fromEntries(
    Object.entries(DEFAULT_BRIDGE_CONFIG.sections).map(([name, section]) => [
      name,
      { mode: section.mode, target: section.target, marker: name },
    ])
  );
  const body = dump({ version: 1, root: DEFAULT_BRIDGE_CONFIG.root, sections }, { lineWidth: -1, noRefs: true });
  return `# Managed documentation regions. Each section owns one marker pair in its target.\n${body}`;
}

function anchorFor(raw: RawSection): AnchorPolicy {
  if (raw.insert_after_heading !== undefined) {
    return { kind: 'after_heading', heading: raw.insert_after_heading };
  }
  if (raw.insert_before_marker !== undefined) {
    return { kind: 'before_marker', token: raw.insert_before_marker };
  }
  return { kind: 'append_end' };
}

function invalidConfig(source: string, issues: string[]): DocsBridgeError {
  const [first] = issues;
  const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : '';
  return new DocsBridgeError('DOC_BRIDGE_INVALID_CONFIG', `Invalid docs bridge config ${source}: ${first}${more}`, {
    operation: 'loadConfig',
    path: source,
    details: { issues },
  });
}
