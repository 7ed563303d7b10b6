/**
 * Desired content providers.
 *
 * The engine asks a provider for the content a section should hold and treats
 * the answer as opaque text plus its hash.
 */

import { hashContent } from '../utils/hashing.js';
import { DocsBridgeError } from './errors.js';
import { normalizeContent } from './markers.js';
import type { DesiredContent } from './types.js';

export interface ContentProvider {
  render(sectionName: string): DesiredContent | Promise<DesiredContent>;
}

/**
 * Wrap raw text as desired content; the hash covers the normalized form so
 * trailing-newline differences never count as a change
 */
export function desiredContent(content: string): DesiredContent {
  return { content, hash: hashContent(normalizeContent(content)) };
}

/**
 * In-memory provider, mostly for tests and programmatic callers
 */
export class StaticContentProvider implements ContentProvider {
  private readonly sections: Map<string, string>;

  constructor(sections: Readonly<Record<string, string>> = {}) {
    this.sections = new Map(Object.entries(sections));
  }

  set(sectionName: string, content: string): this {
    this.sections.set(sectionName, content);
    return this;
  }

  render(sectionName: string): DesiredContent {
    const content = this.sections.get(sectionName);
    if (content === undefined) {
      throw new DocsBridgeError('DOC_BRIDGE_CONTENT_UNAVAILABLE', `No content registered for section '${sectionName}'`, {
        operation: 'render',
        section: sectionName,
      });
    }
    return desiredContent(content);
  }
}
