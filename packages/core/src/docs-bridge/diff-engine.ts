/**
 * Diff Engine
 *
 * Classifies a managed section against the file on disk. Classification is
 * ordered and the first matching rule wins:
 *
 * 1. file absent            -> missing_file
 * 2. marker absent          -> missing_marker
 * 3. unbalanced / repeated  -> corrupted | duplicate_marker
 * 4. inner span == desired  -> match
 * 5. otherwise              -> drift (with a structured diff)
 */

import { hashContent } from '../utils/hashing.js';
import { innerContent, normalizeContent, parseDocument, scanMarkers } from './markers.js';
import { diffText } from './text-diff.js';
import type { DesiredContent, ManagedRegion, ManagedSectionConfig } from './types.js';

export interface ClassifyInput {
  section: ManagedSectionConfig;
  /** Absolute path of the host file */
  target: string;
  /** Label used in rendered diffs, usually the project-relative path */
  label: string;
  desired: DesiredContent;
  /** Current file text, or null when the file does not exist */
  fileContent: string | null;
}

export function classifyRegion(input: ClassifyInput): ManagedRegion {
  const { section, target, desired, fileContent } = input;
  const base = {
    section: section.name,
    target,
    marker: section.marker,
    desiredHash: desired.hash,
  };

  if (fileContent === null) {
    return { ...base, status: 'missing_file', fileHash: null, reason: 'target file does not exist' };
  }

  const fileHash = hashContent(fileContent);
  const doc = parseDocument(fileContent);
  const scan = scanMarkers(doc.lines, section.marker);

  switch (scan.kind) {
    case 'absent':
      return { ...base, status: 'missing_marker', fileHash, reason: `no markers for '${section.marker}'` };
    case 'corrupted':
      return { ...base, status: 'corrupted', fileHash, reason: scan.reason };
    case 'duplicate':
      return { ...base, status: 'duplicate_marker', fileHash, reason: scan.reason };
    case 'pair':
      break;
  }

  const inner = innerContent(doc.lines, scan.start, scan.end);
  const expected = normalizeContent(desired.content);
  const region: ManagedRegion = {
    ...base,
    status: 'match',
    fileHash,
    span: { startLine: scan.start + 1, endLine: scan.end + 1 },
    contentHash: hashContent(inner),
    inner,
  };

  if (inner === expected) {
    return region;
  }

  return {
    ...region,
    status: 'drift',
    diff: diffText(inner, expected, input.label),
  };
}
