/**
 * MkDocs Nav Adapter
 *
 * Keeps one `{ <title>: <doc> }` entry in the `nav` list of an existing
 * mkdocs.yml. The title is the stable key, so re-running never duplicates it.
 */

import { dump, load } from 'js-yaml';
import { z } from 'zod';
import { getErrorMessage } from '../../utils/errors.js';
import { BaseExternalAdapter, isRecord, type AdapterInspectInput, type AdapterInspection } from './base-adapter.js';

const MkDocsNavOptionsSchema = z.object({
  /** Nav label, defaults to the section name */
  title: z.string().trim().min(1).optional(),
  /** Page path relative to docs_dir */
  doc: z.string().trim().min(1, 'doc is required'),
  /** Title of the sibling the entry is placed after when first added */
  insert_after: z.string().trim().min(1).optional(),
});
export type MkDocsNavOptions = z.infer<typeof MkDocsNavOptionsSchema>;

export class MkDocsNavAdapter extends BaseExternalAdapter<MkDocsNavOptions> {
  readonly kind = 'mkdocs_nav' as const;
  readonly createsTarget = false;
  protected readonly schema = MkDocsNavOptionsSchema;

  defaultTarget(): string {
    return 'mkdocs.yml';
  }

  protected inspectWith(options: MkDocsNavOptions, input: AdapterInspectInput): AdapterInspection {
    if (input.current === null) {
      return { kind: 'missing_file' };
    }

    let root: unknown;
    try {
      root = load(input.current);
    } catch (error) {
      return { kind: 'corrupted', reason: `invalid YAML: ${getErrorMessage(error)}` };
    }
    if (root === undefined || root === null) {
      root = {};
    }
    if (!isRecord(root)) {
      return { kind: 'corrupted', reason: 'mkdocs config root is not a mapping' };
    }

    const nav = root.nav ?? [];
    if (!Array.isArray(nav)) {
      return { kind: 'corrupted', reason: '`nav` is not a list' };
    }

    const title = options.title ?? input.section.name;
    const index = nav.findIndex((item) => entryTitle(item) === title);
    const entry = { [title]: options.doc };

    let nextNav: unknown[];
    let summary: string;
    if (index !== -1) {
      const item: unknown = nav[index];
      if (isRecord(item) && item[title] === options.doc) {
        return { kind: 'match' };
      }
      nextNav = nav.map((existing, position) => (position === index ? entry : existing));
      summary = `update nav entry '${title}' -> ${options.doc}`;
    } else {
      const after = options.insert_after === undefined ? -1 : nav.findIndex((item) => entryTitle(item) === options.insert_after);
      nextNav = after === -1 ? [...nav, entry] : [...nav.slice(0, after + 1), entry, ...nav.slice(after + 1)];
      summary = `add nav entry '${title}' -> ${options.doc}`;
    }

    const next = dump({ ...root, nav: nextNav }, { lineWidth: -1, noRefs: true });
    return { kind: 'drift', next, summary };
  }
}

/** Title of a single-key nav item, undefined for bare paths or malformed items */
function entryTitle(item: unknown): string | undefined {
  if (!isRecord(item)) {
    return undefined;
  }
  const keys = Object.keys(item);
  return keys.length === 1 ? keys[0] : undefined;
}
