/**
 * Manifest Renderer
 *
 * Renders the default documentation sections from `architecture/manifest.yaml`:
 * `architecture_overview`, `adr_index` and `rfc_index`.
 */

import { load } from 'js-yaml';
import { z } from 'zod';
import { getErrorMessage } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { desiredContent, type ContentProvider } from './content-provider.js';
import { DocsBridgeError } from './errors.js';
import { readTextOrNull } from './fs-utils.js';
import type { DesiredContent } from './types.js';

export const DEFAULT_MANIFEST_PATH = 'architecture/manifest.yaml';

const EMPTY_CELL = '-';

/** YAML dates load as Date objects; tables want plain text */
const dateText = z.union([z.string(), z.date()]).transform((value) =>
  typeof value === 'string' ? value : value.toISOString().slice(0, 10)
);
const instantText = z.union([z.string(), z.date()]).transform((value) =>
  typeof value === 'string' ? value : value.toISOString().replace(/\.\d{3}Z$/, 'Z')
);
const scalarText = z.union([z.string(), z.number()]).transform(String);

const SystemSchema = z.object({
  id: scalarText,
  name: z.string(),
  purpose: z.string().optional(),
  adr: scalarText.optional(),
  rfc: scalarText.optional(),
  status: z.string().optional(),
  dependencies: z.array(z.string()).default([]),
  roadmap_phase: scalarText.optional(),
});

const RecordEntrySchema = z.object({
  id: scalarText,
  title: z.string(),
  status: z.string().optional(),
  date: dateText.optional(),
  related_systems: z.array(z.string()).default([]),
});

export const ArchitectureManifestSchema = z.object({
  version: scalarText,
  updated_at: instantText.optional(),
  program: z.object({
    id: scalarText,
    name: z.string(),
  }),
  systems: z.array(SystemSchema).default([]),
  adr: z.array(RecordEntrySchema).default([]),
  rfc: z.array(RecordEntrySchema).default([]),
});
export type ArchitectureManifest = z.infer<typeof ArchitectureManifestSchema>;

export const MANIFEST_SECTIONS = ['architecture_overview', 'adr_index', 'rfc_index'] as const;
export type ManifestSection = (typeof MANIFEST_SECTIONS)[number];

/**
 * Render every manifest-driven section
 */
export function renderManifestSections(manifest: ArchitectureManifest): Record<ManifestSection, string> {
  return {
    architecture_overview: renderOverview(manifest),
    adr_index: renderRecordIndex('ADR', manifest.adr),
    rfc_index: renderRecordIndex('RFC', manifest.rfc),
  };
}

function renderOverview(manifest: ArchitectureManifest): string {
  const lines = [
    '## Program Snapshot',
    '',
    `- Program ID: ${manifest.program.id}`,
    `- Name: ${manifest.program.name}`,
    `- Version: ${manifest.version}`,
    `- Updated: ${manifest.updated_at ?? EMPTY_CELL}`,
    '',
    '## Systems',
    '',
    ...table(
      ['ID', 'Name', 'Purpose', 'ADR', 'RFC', 'Status', 'Dependencies', 'Roadmap Phase'],
      manifest.systems.map((system) => [
        system.id,
        system.name,
        system.purpose,
        system.adr,
        system.rfc,
        system.status,
        system.dependencies.join(', '),
        system.roadmap_phase,
      ])
    ),
  ];
  return lines.join('\n');
}

function renderRecordIndex(label: string, entries: ArchitectureManifest['adr']): string {
  return table(
    [label, 'Title', 'Status', 'Date', 'Systems'],
    entries.map((entry) => [entry.id, entry.title, entry.status, entry.date, entry.related_systems.join(', ')])
  ).join('\n');
}

function table(header: string[], rows: Array<Array<string | undefined>>): string[] {
  return [
    row(header),
    row(header.map(() => '---')),
    ...rows.map((cells) => row(cells.map(cell))),
  ];
}

function row(cells: string[]): string {
  return `| ${cells.join(' | ')} |`;
}

function cell(value: string | undefined): string {
  const text = (value ?? '').replace(/\r?\n/g, ' ').trim();
  return text === '' ? EMPTY_CELL : text.replace(/\|/g, '\\|');
}

function isManifestSection(name: string): name is ManifestSection {
  return (MANIFEST_SECTIONS as readonly string[]).includes(name);
}

/**
 * Parse manifest YAML text
 */
export function parseManifest(text: string, source: string): ArchitectureManifest {
  let data: unknown;
  try {
    data = load(text);
  } catch (error) {
    throw new DocsBridgeError('DOC_BRIDGE_CONTENT_UNAVAILABLE', `${source} is not valid YAML: ${getErrorMessage(error)}`, {
      operation: 'loadManifest',
      path: source,
    });
  }
  const parsed = ArchitectureManifestSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new DocsBridgeError('DOC_BRIDGE_CONTENT_UNAVAILABLE', `${source} is not a valid architecture manifest`, {
      operation: 'loadManifest',
      path: source,
      details: { issues },
    });
  }
  return parsed.data;
}

/**
 * Provider backed by the architecture manifest; the file is read once per instance
 */
export class ManifestContentProvider implements ContentProvider {
  private readonly manifestPath: string;
  private readonly label: string;
  private readonly logger: Logger;
  private sections: Record<ManifestSection, string> | undefined;

  /**
   * @param manifestPath - Absolute path of the manifest
   * @param label - Path shown in errors, usually project-relative
   */
  constructor(manifestPath: string, label: string = DEFAULT_MANIFEST_PATH, logger?: Logger) {
    this.manifestPath = manifestPath;
    this.label = label;
    this.logger = logger ?? getLogger('docs-bridge:manifest');
  }

  async render(sectionName: string): Promise<DesiredContent> {
    if (!isManifestSection(sectionName)) {
      throw new DocsBridgeError(
        'DOC_BRIDGE_CONTENT_UNAVAILABLE',
        `The architecture manifest does not render section '${sectionName}'`,
        { operation: 'render', section: sectionName, path: this.label, details: { renders: [...MANIFEST_SECTIONS] } }
      );
    }
    const sections = await this.load();
    return desiredContent(sections[sectionName]);
  }

  private async load(): Promise<Record<ManifestSection, string>> {
    if (this.sections) {
      return this.sections;
    }
    const text = await readTextOrNull(this.manifestPath);
    if (text === null) {
      throw new DocsBridgeError('DOC_BRIDGE_CONTENT_UNAVAILABLE', `Architecture manifest ${this.label} not found`, {
        operation: 'loadManifest',
        path: this.label,
      });
    }
    this.sections = renderManifestSections(parseManifest(text, this.label));
    this.logger.debug('Manifest rendered', { path: this.label });
    return this.sections;
  }
}
