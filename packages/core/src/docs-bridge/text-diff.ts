/**
 * Line Diff
 *
 * LCS-based line diff producing unified hunks for drift reports.
 */

import type { DiffHunk, RegionDiff } from './types.js';

export interface LineDiffOptions {
  /** Number of context lines around changes (default: 3) */
  contextLines?: number;
  /** Above this many cells the LCS table is skipped and the diff is a full replacement */
  maxCells?: number;
}

type OpType = 'equal' | 'delete' | 'insert';

interface DiffOp {
  type: OpType;
  line: string;
  /** Old lines consumed before this op */
  oldIndex: number;
  /** New lines consumed before this op */
  newIndex: number;
}

const DEFAULT_OPTIONS: Readonly<Required<LineDiffOptions>> = Object.freeze({
  contextLines: 3,
  maxCells: 4_000_000,
});

const PREFIX: Record<OpType, string> = { equal: ' ', delete: '-', insert: '+' };

/**
 * Diff two line arrays
 */
export function diffLines(
  before: readonly string[],
  after: readonly string[],
  options: LineDiffOptions = {}
): Omit<RegionDiff, 'unified'> {
  const contextLines = Math.max(0, options.contextLines ?? DEFAULT_OPTIONS.contextLines);
  const maxCells = options.maxCells ?? DEFAULT_OPTIONS.maxCells;

  const ops = computeOps(before, after, maxCells);
  return {
    added: ops.filter((op) => op.type === 'insert').map((op) => op.line),
    removed: ops.filter((op) => op.type === 'delete').map((op) => op.line),
    hunks: groupHunks(ops, contextLines),
  };
}

/**
 * Diff two texts and render the result as a unified diff labelled with `label`
 */
export function diffText(before: string, after: string, label: string, options: LineDiffOptions = {}): RegionDiff {
  const result = diffLines(splitLines(before), splitLines(after), options);
  return { ...result, unified: formatUnifiedDiff(label, result.hunks) };
}

export function formatUnifiedDiff(label: string, hunks: readonly DiffHunk[]): string {
  if (hunks.length === 0) {
    return '';
  }
  const lines = [`--- a/${label}`, `+++ b/${label}`];
  for (const hunk of hunks) {
    lines.push(`@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@`);
    lines.push(...hunk.lines);
  }
  return lines.join('\n');
}

function splitLines(text: string): string[] {
  const normalized = text.replace(/\r\n/g, '\n');
  if (normalized === '') {
    return [];
  }
  const lines = normalized.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function computeOps(a: readonly string[], b: readonly string[], maxCells: number): DiffOp[] {
  const m = a.length;
  const n = b.length;
  const ops: DiffOp[] = [];
  let i = 0;
  let j = 0;

  const push = (type: OpType, line: string): void => {
    ops.push({ type, line, oldIndex: i, newIndex: j });
    if (type !== 'insert') i++;
    if (type !== 'delete') j++;
  };

  if ((m + 1) * (n + 1) > maxCells) {
    a.forEach((line) => push('delete', line));
    b.forEach((line) => push('insert', line));
    return ops;
  }

  // Suffix LCS lengths so the walk can run forwards
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));
  for (let x = m - 1; x >= 0; x--) {
    for (let y = n - 1; y >= 0; y--) {
      dp[x][y] = a[x] === b[y] ? dp[x + 1][y + 1] + 1 : Math.max(dp[x + 1][y], dp[x][y + 1]);
    }
  }

  while (i < m && j < n) {
    if (a[i] === b[j]) {
      push('equal', a[i]);
    } else if (dp[i + 1][j] >= dp[i][j + 1]) {
      push('delete', a[i]);
    } else {
      push('insert', b[j]);
    }
  }
  while (i < m) push('delete', a[i]);
  while (j < n) push('insert', b[j]);

  return ops;
}

function groupHunks(ops: readonly DiffOp[], context: number): DiffHunk[] {
  const hunks: DiffHunk[] = [];
  let cursor = 0;
  let previousEnd = 0;

  while (cursor < ops.length) {
    if (ops[cursor].type === 'equal') {
      cursor++;
      continue;
    }

    const start = Math.max(previousEnd, cursor - context);
    let lastChange = cursor;
    let scan = cursor;
    while (scan < ops.length) {
      if (ops[scan].type !== 'equal') {
        lastChange = scan;
      } else if (scan - lastChange > 2 * context) {
        break;
      }
      scan++;
    }
    const end = Math.min(ops.length, lastChange + 1 + context);

    const slice = ops.slice(start, end);
    const oldLines = slice.filter((op) => op.type !== 'insert').length;
    const newLines = slice.filter((op) => op.type !== 'delete').length;
    const first = slice[0];
    hunks.push({
      oldStart: oldLines === 0 ? first.oldIndex : first.oldIndex + 1,
      oldLines,
      newStart: newLines === 0 ? first.newIndex : first.newIndex + 1,
      newLines,
      lines: slice.map((op) => `${PREFIX[op.type]}${op.line}`),
    });

    previousEnd = end;
    cursor = end;
  }

  return hunks;
}
