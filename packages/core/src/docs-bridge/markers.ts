/**
 * Marker Model
 *
 * A managed region is delimited by two single-line HTML comments:
 *
 *   <!-- steward:start:<marker> -->
 *   ...generated content...
 *   <!-- steward:end:<marker> -->
 *
 * Detection is a literal line scan. Marker-looking lines inside fenced code
 * blocks are treated as real markers.
 */

export const MARKER_NAMESPACE = 'steward';

export type MarkerRole = 'start' | 'end';

export type LineEnding = '\n' | '\r\n';

/**
 * Host file split into lines. Each line keeps its own terminator so that
 * mixed line endings survive a rewrite; `eol` is the dominant style, used for
 * lines that have none of their own.
 */
export interface TextDocument {
  readonly lines: readonly string[];
  readonly endings: readonly LineEnding[];
  readonly eol: LineEnding;
}

export type MarkerScan =
  | { kind: 'absent' }
  | { kind: 'pair'; start: number; end: number }
  | { kind: 'duplicate'; starts: number[]; ends: number[]; reason: string }
  | { kind: 'corrupted'; starts: number[]; ends: number[]; reason: string };

export function markerLine(role: MarkerRole, token: string): string {
  return `<!-- ${MARKER_NAMESPACE}:${role}:${token} -->`;
}

export function isMarkerLine(line: string, role: MarkerRole, token: string): boolean {
  return line.trim() === markerLine(role, token);
}

export function createDocument(lines: readonly string[], eol: LineEnding = '\n'): TextDocument {
  return { lines, endings: lines.map(() => eol), eol };
}

export function parseDocument(text: string): TextDocument {
  const lines: string[] = [];
  const terminators: LineEnding[] = [];
  const pattern = /\r?\n/g;
  let offset = 0;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    lines.push(text.slice(offset, match.index));
    terminators.push(match[0] === '\r\n' ? '\r\n' : '\n');
    offset = match.index + match[0].length;
  }

  const crlf = terminators.filter((ending) => ending === '\r\n').length;
  const eol: LineEnding = crlf > terminators.length - crlf ? '\r\n' : '\n';

  // unterminated last line
  if (offset < text.length) {
    lines.push(text.slice(offset));
    terminators.push(eol);
  }
  return { lines, endings: terminators, eol };
}

/**
 * Join lines back into file text; non-empty documents always end with a newline
 */
export function renderDocument(doc: TextDocument): string {
  return doc.lines.map((line, index) => `${line}${doc.endings[index] ?? doc.eol}`).join('');
}

/**
 * Normalize content for comparison: LF line endings, no leading or trailing newlines
 */
export function normalizeContent(content: string): string {
  return content.replace(/\r\n/g, '\n').replace(/^\n+|\n+$/g, '');
}

export function contentLines(content: string): string[] {
  const normalized = normalizeContent(content);
  return normalized === '' ? [] : normalized.split('\n');
}

/**
 * Locate the marker pair for a token.
 *
 * Count mismatches are reported as corruption before duplicates, so two starts
 * with no end is `corrupted`, while two complete pairs (or a start repeated
 * before its end, with counts balanced) is `duplicate`.
 */
export function scanMarkers(lines: readonly string[], token: string): MarkerScan {
  const starts: number[] = [];
  const ends: number[] = [];

  lines.forEach((line, index) => {
    if (isMarkerLine(line, 'start', token)) {
      starts.push(index);
    } else if (isMarkerLine(line, 'end', token)) {
      ends.push(index);
    }
  });

  if (starts.length === 0 && ends.length === 0) {
    return { kind: 'absent' };
  }

  if (starts.length !== ends.length) {
    return {
      kind: 'corrupted',
      starts,
      ends,
      reason: `found ${starts.length} start and ${ends.length} end marker(s) for '${token}'`,
    };
  }

  if (starts.length > 1) {
    return {
      kind: 'duplicate',
      starts,
      ends,
      reason: `marker '${token}' appears ${starts.length} times (lines ${starts.map((i) => i + 1).join(', ')})`,
    };
  }

  const [start] = starts;
  const [end] = ends;
  if (end < start) {
    return {
      kind: 'corrupted',
      starts,
      ends,
      reason: `end marker for '${token}' (line ${end + 1}) precedes its start marker (line ${start + 1})`,
    };
  }

  return { kind: 'pair', start, end };
}

/**
 * Normalized inner span between a matched pair (markers excluded)
 */
export function innerContent(lines: readonly string[], start: number, end: number): string {
  return normalizeContent(lines.slice(start + 1, end).join('\n'));
}

/**
 * Marker pair wrapped around content lines
 */
export function buildRegion(token: string, content: string): string[] {
  return [markerLine('start', token), ...contentLines(content), markerLine('end', token)];
}

/**
 * Replace the inner span of a matched pair; markers and surrounding lines are kept verbatim.
 * New lines take the start marker's terminator.
 */
export function replaceInner(doc: TextDocument, start: number, end: number, content: string): TextDocument {
  const inner = contentLines(content);
  const ending = doc.endings[start] ?? doc.eol;
  return {
    eol: doc.eol,
    lines: [...doc.lines.slice(0, start + 1), ...inner, ...doc.lines.slice(end)],
    endings: [...doc.endings.slice(0, start + 1), ...inner.map(() => ending), ...doc.endings.slice(end)],
  };
}

/**
 * Splice lines into a document at a line index. Inserted lines take the
 * terminator of the line they follow (or precede, at the top of the file).
 */
export function insertLines(doc: TextDocument, index: number, inserted: readonly string[]): TextDocument {
  const ending = doc.endings[index - 1] ?? doc.endings[index] ?? doc.eol;
  return {
    eol: doc.eol,
    lines: [...doc.lines.slice(0, index), ...inserted, ...doc.lines.slice(index)],
    endings: [...doc.endings.slice(0, index), ...inserted.map(() => ending), ...doc.endings.slice(index)],
  };
}
