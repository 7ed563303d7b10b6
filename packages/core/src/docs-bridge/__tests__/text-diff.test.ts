/**
 * Tests for Line Diff
 */

import { describe, it, expect } from 'vitest';
import { diffLines, diffText, formatUnifiedDiff } from '../text-diff.js';

describe('text-diff', () => {
  it('should render a single replaced line', () => {
    const diff = diffText('v1', 'v2', 'docs/x.md');

    expect(diff.removed).toEqual(['v1']);
    expect(diff.added).toEqual(['v2']);
    expect(diff.unified).toBe('--- a/docs/x.md\n+++ b/docs/x.md\n@@ -1,1 +1,1 @@\n-v1\n+v2');
  });

  it('should produce no hunks for identical input', () => {
    const diff = diffText('a\nb\n', 'a\r\nb', 'x');
    expect(diff.hunks).toEqual([]);
    expect(diff.unified).toBe('');
  });

  it('should include three lines of context around a change', () => {
    const before = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'];
    const after = ['a', 'b', 'c', 'd', 'E', 'f', 'g', 'h'];
    const { hunks } = diffLines(before, after);

    expect(hunks).toHaveLength(1);
    expect(hunks[0]).toEqual({
      oldStart: 2,
      oldLines: 7,
      newStart: 2,
      newLines: 7,
      lines: [' b', ' c', ' d', '-e', '+E', ' f', ' g', ' h'],
    });
  });

  it('should split distant changes into separate hunks', () => {
    const before = Array.from({ length: 20 }, (_, i) => `l${i + 1}`);
    const after = before.map((line) => (line === 'l2' || line === 'l19' ? line.toUpperCase() : line));
    const { hunks } = diffLines(before, after);

    expect(hunks).toHaveLength(2);
    expect(hunks[0].oldStart).toBe(1);
    expect(hunks[0].lines).toEqual([' l1', '-l2', '+L2', ' l3', ' l4', ' l5']);
    expect(hunks[1].oldStart).toBe(16);
  });

  it('should report pure insertions into an empty text', () => {
    const { hunks, added } = diffLines([], ['x', 'y']);
    expect(added).toEqual(['x', 'y']);
    expect(hunks[0]).toMatchObject({ oldStart: 0, oldLines: 0, newStart: 1, newLines: 2 });
  });

  it('should fall back to a full replacement above maxCells', () => {
    const { removed, added } = diffLines(['a', 'b'], ['a', 'c'], { maxCells: 1 });
    expect(removed).toEqual(['a', 'b']);
    expect(added).toEqual(['a', 'c']);
  });

  it('should honour contextLines', () => {
    const { hunks } = diffLines(['a', 'b', 'c'], ['a', 'B', 'c'], { contextLines: 0 });
    expect(hunks[0].lines).toEqual(['-b', '+B']);
    expect(formatUnifiedDiff('f', hunks)).toBe('--- a/f\n+++ b/f\n@@ -2,1 +2,1 @@\n-b\n+B');
  });
});
