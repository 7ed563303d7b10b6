/**
 * Docusaurus Sidebar Adapter
 *
 * Ensures a doc id is listed inside a category of a JSON sidebar file.
 * Matching is by doc id within the category label.
 */

import { z } from 'zod';
import { getErrorMessage } from '../../utils/errors.js';
import { BaseExternalAdapter, isRecord, type AdapterInspectInput, type AdapterInspection } from './base-adapter.js';

const DocusaurusSidebarOptionsSchema = z.object({
  sidebar: z.string().trim().min(1).default('docs'),
  category: z.string().trim().min(1).default('Architecture'),
  doc_id: z.string().trim().min(1, 'doc_id is required'),
});
export type DocusaurusSidebarOptions = z.infer<typeof DocusaurusSidebarOptionsSchema>;

export class DocusaurusSidebarAdapter extends BaseExternalAdapter<DocusaurusSidebarOptions> {
  readonly kind = 'docusaurus_sidebar' as const;
  readonly createsTarget = false;
  protected readonly schema = DocusaurusSidebarOptionsSchema;

  defaultTarget(): string {
    return 'sidebars.json';
  }

  protected inspectWith(options: DocusaurusSidebarOptions, input: AdapterInspectInput): AdapterInspection {
    if (input.current === null) {
      return { kind: 'missing_file' };
    }

    let root: unknown;
    try {
      root = JSON.parse(input.current);
    } catch (error) {
      return { kind: 'corrupted', reason: `invalid JSON: ${getErrorMessage(error)}` };
    }
    if (!isRecord(root)) {
      return { kind: 'corrupted', reason: 'sidebar file root is not an object' };
    }

    const items = root[options.sidebar] ?? [];
    if (!Array.isArray(items)) {
      return { kind: 'corrupted', reason: `sidebar '${options.sidebar}' is not a list` };
    }

    const index = items.findIndex(
      (item) => isRecord(item) && item.type === 'category' && item.label === options.category
    );

    let nextItems: unknown[];
    let summary: string;
    if (index === -1) {
      nextItems = [...items, { type: 'category', label: options.category, items: [options.doc_id] }];
      summary = `add category '${options.category}' with '${options.doc_id}'`;
    } else {
      const category: unknown = items[index];
      if (!isRecord(category)) {
        return { kind: 'corrupted', reason: `category '${options.category}' is malformed` };
      }
      const docs = category.items ?? [];
      if (!Array.isArray(docs)) {
        return { kind: 'corrupted', reason: `items of category '${options.category}' is not a list` };
      }
      if (docs.some((doc) => doc === options.doc_id || (isRecord(doc) && doc.type === 'doc' && doc.id === options.doc_id))) {
        return { kind: 'match' };
      }
      const updated = { ...category, items: [...docs, options.doc_id] };
      nextItems = items.map((item, position) => (position === index ? updated : item));
      summary = `add '${options.doc_id}' to category '${options.category}'`;
    }

    const next = `${JSON.stringify({ ...root, [options.sidebar]: nextItems }, null, 2)}\n`;
    return { kind: 'drift', next, summary };
  }
}
