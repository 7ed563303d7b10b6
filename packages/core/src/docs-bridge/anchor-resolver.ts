/**
 * Anchor Resolver
 *
 * Computes where a region that does not exist yet should be inserted.
 * Pure: the same lines and policy always give the same insertion point.
 */

import { DocsBridgeError } from './errors.js';
import { buildRegion, insertLines, isMarkerLine, type TextDocument } from './markers.js';
import type { AnchorPolicy } from './types.js';

export interface InsertionPoint {
  /** Line index the region is inserted before (0-based, may equal line count) */
  index: number;
  /** Emit one blank line before the region */
  padBefore: boolean;
  /** Emit one blank line after the region */
  padAfter: boolean;
}

export interface AnchorContext {
  section?: string;
  /** Project-relative path, used in error reports */
  path?: string;
}

const isBlank = (line: string | undefined): boolean => line !== undefined && line.trim() === '';

export function resolveAnchor(
  lines: readonly string[],
  anchor: AnchorPolicy,
  context: AnchorContext = {}
): InsertionPoint {
  switch (anchor.kind) {
    case 'after_heading': {
      const heading = anchor.heading.trim();
      const headingIndex = lines.findIndex((line) => line.trim() === heading);
      if (headingIndex === -1) {
        throw new DocsBridgeError('DOC_BRIDGE_ANCHOR_NOT_FOUND', `Heading '${heading}' not found`, {
          operation: 'resolveAnchor',
          section: context.section,
          path: context.path,
          details: { anchor },
        });
      }
      const followedByBlank = isBlank(lines[headingIndex + 1]);
      const index = followedByBlank ? headingIndex + 2 : headingIndex + 1;
      return {
        index,
        padBefore: !followedByBlank,
        padAfter: index < lines.length && !isBlank(lines[index]),
      };
    }

    case 'before_marker': {
      const markerIndex = lines.findIndex(
        (line) => isMarkerLine(line, 'start', anchor.token) || isMarkerLine(line, 'end', anchor.token)
      );
      if (markerIndex === -1) {
        throw new DocsBridgeError('DOC_BRIDGE_ANCHOR_NOT_FOUND', `Marker '${anchor.token}' not found`, {
          operation: 'resolveAnchor',
          section: context.section,
          path: context.path,
          details: { anchor },
        });
      }
      return { index: markerIndex, padBefore: false, padAfter: true };
    }

    case 'append_end':
      return {
        index: lines.length,
        padBefore: lines.length > 0 && !isBlank(lines[lines.length - 1]),
        padAfter: false,
      };
  }
}

/**
 * Insert a fresh marker pair wrapping `content` at the anchor's insertion point
 */
export function insertRegion(
  doc: TextDocument,
  anchor: AnchorPolicy,
  marker: string,
  content: string,
  context: AnchorContext = {}
): { document: TextDocument; point: InsertionPoint } {
  const point = resolveAnchor(doc.lines, anchor, context);
  const block = [
    ...(point.padBefore ? [''] : []),
    ...buildRegion(marker, content),
    ...(point.padAfter ? [''] : []),
  ];
  return { document: insertLines(doc, point.index, block), point };
}
