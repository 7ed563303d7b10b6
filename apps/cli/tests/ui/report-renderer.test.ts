import { describe, it, expect } from 'vitest';
import type { BridgeReport, SectionReport } from '@steward/core';
import { ASCII_SYMBOLS } from '../../src/lib/environment.js';
import { renderInitResult, renderReport } from '../../src/ui/report-renderer.js';

const plain = { colors: false, symbols: ASCII_SYMBOLS };

function report(overrides: Partial<BridgeReport>): BridgeReport {
  return {
    command: 'diagnose',
    status: 'ok',
    generatedAt: '2026-10-19T03:15:00.123Z',
    sections: [],
    issues: [],
    ...overrides,
  };
}

function section(overrides: Partial<SectionReport> & Pick<SectionReport, 'name' | 'status'>): SectionReport {
  return { target: `docs/${overrides.name}.md`, mode: 'managed', ...overrides };
}

describe('renderReport', () => {
  it('renders sections and issues of a diagnose run', () => {
    const lines = renderReport(
      report({
        status: 'warning',
        sections: [section({ name: 'overview', status: 'missing_marker', target: 'docs/guide.md' })],
        issues: [
          {
            code: 'DOC_BRIDGE_MISSING_MARKER',
            path: 'docs/guide.md',
            message: 'Marker missing',
            severity: 'warning',
            remediation: 'Run repair',
            section: 'overview',
          },
        ],
      }),
      plain
    );

    expect(lines).toEqual([
      '! docs diagnose: warning',
      '',
      'Sections:',
      '  ! overview  missing_marker  docs/guide.md',
      '',
      'Issues:',
      '  ! [DOC_BRIDGE_MISSING_MARKER] Marker missing',
      '    -> Run repair',
    ]);
  });

  it('aligns columns and shows actions with backups', () => {
    const lines = renderReport(
      report({
        command: 'repair',
        sections: [
          section({ name: 'overview', status: 'match', target: 'docs/guide.md', action: 'inserted', backup: '20261019T031500123Z' }),
          section({ name: 'api', status: 'match', action: 'none' }),
        ],
      }),
      plain
    );

    expect(lines).toEqual([
      '√ docs repair: ok',
      '',
      'Sections:',
      '  √ overview  match  docs/guide.md  -> inserted (backup 20261019T031500123Z)',
      '  √ api       match  docs/api.md',
    ]);
  });

  it('marks sections by their worst issue', () => {
    const lines = renderReport(
      report({
        command: 'repair',
        status: 'error',
        sections: [section({ name: 'overview', status: 'unknown', action: 'failed' })],
        issues: [
          { code: 'A', path: null, message: 'note', severity: 'info', remediation: 'r1', section: 'overview' },
          { code: 'B', path: null, message: 'broken', severity: 'error', remediation: 'r2', section: 'overview' },
        ],
      }),
      plain
    );

    expect(lines[0]).toBe('x docs repair: error');
    expect(lines[3]).toBe('  x overview  unknown  docs/overview.md  -> failed');
    expect(lines.slice(5)).toEqual(['Issues:', '  i [A] note', '    -> r1', '  x [B] broken', '    -> r2']);
  });

  it('indents diff lines under their section', () => {
    const lines = renderReport(
      report({
        command: 'diff',
        status: 'warning',
        sections: [
          section({
            name: 'overview',
            status: 'drift',
            diff: '--- docs/overview.md\n+++ desired\n@@ -1 +1 @@\n-old\n+new\n',
          }),
        ],
      }),
      plain
    );

    expect(lines.slice(3)).toEqual([
      '  √ overview  drift  docs/overview.md',
      '      --- docs/overview.md',
      '      +++ desired',
      '      @@ -1 +1 @@',
      '      -old',
      '      +new',
    ]);
  });

  it('notes when no sections are configured', () => {
    expect(renderReport(report({ command: 'list' }), plain)).toEqual([
      '√ docs list: ok',
      '',
      '  (no sections configured)',
    ]);
  });

  it('renders sync steps', () => {
    const lines = renderReport(
      report({
        command: 'sync',
        steps: [
          { step: 'diff-before', sections: [{ name: 'overview', status: 'drift' }] },
          { step: 'repair', sections: [{ name: 'overview', status: 'match', action: 'updated' }] },
          { step: 'adopt', sections: [], skipped: true },
          { step: 'diff-after', sections: [] },
        ],
      }),
      plain
    );

    expect(lines).toEqual([
      '√ docs sync: ok',
      '',
      'Steps:',
      '  diff-before: overview=drift',
      '  repair: overview=match (updated)',
      '  adopt: skipped',
      '  diff-after: nothing to do',
    ]);
  });

  it('renders snapshot history', () => {
    const lines = renderReport(
      report({
        command: 'history',
        snapshots: [
          {
            id: '20261019T031500123Z-1',
            timestamp: '2026-10-19T03:15:00.123Z',
            section: 'overview',
            target: 'docs/guide.md',
            operation: 'rollback',
          },
          {
            id: '20261019T031500123Z',
            timestamp: '2026-10-19T03:15:00.123Z',
            section: 'overview',
            target: 'docs/guide.md',
            operation: 'repair',
          },
        ],
      }),
      plain
    );

    expect(lines).toEqual([
      '√ docs history: ok',
      '',
      'Snapshots:',
      '  20261019T031500123Z-1  rollback  overview  docs/guide.md',
      '  20261019T031500123Z    repair    overview  docs/guide.md',
    ]);
  });

  it('notes an empty history', () => {
    expect(renderReport(report({ command: 'history', snapshots: [] }), plain)).toEqual([
      '√ docs history: ok',
      '',
      'Snapshots:',
      '  (no snapshots)',
    ]);
  });
});

describe('renderInitResult', () => {
  it('reports a new file', () => {
    const lines = renderInitResult(
      {
        command: 'init',
        status: 'ok',
        generatedAt: '2026-10-19T03:15:00.123Z',
        path: '.steward/config/docs.bridge.yaml',
        overwritten: false,
      },
      plain
    );

    expect(lines).toEqual([
      '√ Wrote .steward/config/docs.bridge.yaml',
      '  -> Edit the sections, then run `steward docs diagnose`',
    ]);
  });

  it('reports an overwrite', () => {
    const lines = renderInitResult(
      { command: 'init', status: 'ok', generatedAt: '2026-10-19T03:15:00.123Z', path: 'bridge.yaml', overwritten: true },
      plain
    );
    expect(lines[0]).toBe('√ Overwrote bridge.yaml');
  });
});
