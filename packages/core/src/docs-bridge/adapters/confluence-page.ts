/**
 * Confluence Page Adapter
 *
 * Builds a page-update payload for the Confluence REST API and keeps it in a
 * JSON file the caller publishes. No network I/O happens here.
 */

import { posix } from 'node:path';
import { z } from 'zod';
import { getErrorMessage } from '../../utils/errors.js';
import { DocsBridgeError } from '../errors.js';
import type { DesiredContent, ExternalSectionConfig } from '../types.js';
import { BaseExternalAdapter, isRecord, type AdapterInspectInput, type AdapterInspection } from './base-adapter.js';

export const DEFAULT_MAX_PAYLOAD_BYTES = 1024 * 1024;

const ConfluencePageOptionsSchema = z.object({
  space: z.string().trim().min(1, 'space is required'),
  title: z.string().trim().min(1, 'title is required'),
  ancestor_id: z.union([z.string().trim().min(1), z.number().int().positive()]).transform(String).optional(),
  /** Payload file name, defaults to the title in kebab case */
  slug: z
    .string()
    .regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*$/, 'slug may only contain letters, digits, _, . and -')
    .optional(),
  /** Section whose rendered content becomes the page body, defaults to this section */
  source: z.string().trim().min(1).optional(),
  max_bytes: z.number().int().positive().default(DEFAULT_MAX_PAYLOAD_BYTES),
});
export type ConfluencePageOptions = z.infer<typeof ConfluencePageOptionsSchema>;

export interface ConfluencePagePayload {
  type: 'page';
  title: string;
  space: { key: string };
  ancestors?: Array<{ id: string }>;
  body: { storage: { value: string; representation: 'storage' } };
  version: { number: number; message: string };
  metadata: { slug: string; source: string; contentHash: string };
}

export class ConfluencePageAdapter extends BaseExternalAdapter<ConfluencePageOptions> {
  readonly kind = 'confluence_page' as const;
  readonly createsTarget = true;
  protected readonly schema = ConfluencePageOptionsSchema;

  contentSource(section: ExternalSectionConfig): string {
    const parsed = this.schema.safeParse(section.options);
    return (parsed.success ? parsed.data.source : undefined) ?? section.name;
  }

  defaultTarget(section: ExternalSectionConfig, stateDir: string): string {
    const parsed = this.schema.safeParse(section.options);
    const slug = parsed.success ? slugFor(parsed.data) : section.name;
    return posix.join(stateDir, 'confluence', `${slug}.json`);
  }

  assertWritable(section: ExternalSectionConfig, next: string, path: string): void {
    const { max_bytes: maxBytes } = this.parseOptions(section);
    const size = Buffer.byteLength(next, 'utf-8');
    if (size > maxBytes) {
      throw new DocsBridgeError(
        'DOC_BRIDGE_SIZE_BUDGET_EXCEEDED',
        `Confluence payload for '${section.name}' is ${size} bytes, over the ${maxBytes} byte budget`,
        { operation: 'repair', section: section.name, path, details: { size, maxBytes } }
      );
    }
  }

  protected inspectWith(options: ConfluencePageOptions, input: AdapterInspectInput): AdapterInspection {
    const { desired } = input;
    if (desired === undefined) {
      throw new DocsBridgeError('DOC_BRIDGE_CONTENT_UNAVAILABLE', `No content to publish for '${input.section.name}'`, {
        operation: 'inspect',
        section: input.section.name,
      });
    }
    const source = options.source ?? input.section.name;

    if (input.current === null) {
      return { kind: 'missing_file', next: renderPayload(options, source, desired, 1) };
    }

    let current: unknown;
    try {
      current = JSON.parse(input.current);
    } catch (error) {
      return { kind: 'corrupted', reason: `invalid JSON: ${getErrorMessage(error)}` };
    }
    const version = isRecord(current) && isRecord(current.version) ? current.version.number : undefined;
    if (typeof version !== 'number' || !Number.isInteger(version) || version < 1) {
      return { kind: 'corrupted', reason: 'payload has no valid version.number' };
    }

    if (input.current === renderPayload(options, source, desired, version)) {
      return { kind: 'match' };
    }
    return {
      kind: 'drift',
      next: renderPayload(options, source, desired, version + 1),
      summary: `page '${options.title}' -> version ${version + 1}`,
    };
  }
}

export function buildPayload(
  options: ConfluencePageOptions,
  source: string,
  desired: DesiredContent,
  version: number
): ConfluencePagePayload {
  return {
    type: 'page',
    title: options.title,
    space: { key: options.space },
    ...(options.ancestor_id !== undefined ? { ancestors: [{ id: options.ancestor_id }] } : {}),
    body: { storage: { value: desired.content, representation: 'storage' } },
    version: { number: version, message: `steward:${desired.hash.slice(0, 12)}` },
    metadata: { slug: slugFor(options), source, contentHash: desired.hash },
  };
}

function renderPayload(options: ConfluencePageOptions, source: string, desired: DesiredContent, version: number): string {
  return `${JSON.stringify(buildPayload(options, source, desired, version), null, 2)}\n`;
}

function slugFor(options: ConfluencePageOptions): string {
  return options.slug ?? (options.title.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '') || 'page');
}
