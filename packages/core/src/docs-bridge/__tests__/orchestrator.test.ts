/**
 * Tests for Docs Bridge Orchestrator
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { Logger } from '../../utils/logger.js';
import { StaticContentProvider } from '../content-provider.js';
import type { TempWriteHooks } from '../fs-utils.js';
import { DocsBridge } from '../orchestrator.js';
import { DEFAULT_BRIDGE_CONFIG_PATH } from '../section-registry.js';
import {
  createTempProject,
  end,
  expectBridgeErrorAsync,
  mtimeOf,
  readProjectFile,
  removeTempProject,
  start,
  writeProjectFile,
} from './helpers.js';

const NOW = new Date('2026-10-19T03:15:00.123Z');
const SNAPSHOT = '20261019T031500123Z';

const GUIDE = '# Guide\n\nIntro text.\n';
const GUIDE_CONFIG = `version: 1
root: docs
sections:
  overview:
    target: guide.md
    insert_after_heading: "# Guide"
`;

const regionText = (marker: string, body: string) => `${start(marker)}\n${body}\n${end(marker)}`;
const repairedGuide = (body: string) => `# Guide\n\n${regionText('overview', body)}\n\nIntro text.\n`;

describe('DocsBridge', () => {
  let root: string;
  const logger = new Logger({ level: 'silent' });

  const open = (content: Record<string, string> = { overview: 'Generated body' }, hooks?: TempWriteHooks) =>
    DocsBridge.open({
      projectRoot: root,
      provider: new StaticContentProvider(content),
      hooks,
      logger,
      now: () => NOW,
    });

  const writeConfig = (yaml: string) => writeProjectFile(root, DEFAULT_BRIDGE_CONFIG_PATH, yaml);

  beforeEach(async () => {
    root = await createTempProject();
  });

  afterEach(async () => {
    await removeTempProject(root);
  });

  describe('diagnose', () => {
    beforeEach(async () => {
      await writeConfig(GUIDE_CONFIG);
      await writeProjectFile(root, 'docs/guide.md', GUIDE);
    });

    it('should report a missing marker as a warning', async () => {
      const report = await (await open()).diagnose();

      expect(report.command).toBe('diagnose');
      expect(report.status).toBe('warning');
      expect(report.generatedAt).toBe('2026-10-19T03:15:00.123Z');
      expect(report.sections).toHaveLength(1);
      expect(report.sections[0]).toMatchObject({
        name: 'overview',
        status: 'missing_marker',
        target: 'docs/guide.md',
        mode: 'managed',
        marker: 'overview',
        anchor: { kind: 'after_heading', heading: '# Guide' },
      });
      expect(report.issues).toHaveLength(1);
      expect(report.issues[0]).toMatchObject({
        code: 'DOC_BRIDGE_MISSING_MARKER',
        section: 'overview',
        path: 'docs/guide.md',
        severity: 'warning',
        remediation: 'Run `steward docs repair --section overview` to insert the managed region into docs/guide.md.',
      });
    });

    it('should never modify files or create state', async () => {
      const before = await mtimeOf(root, 'docs/guide.md');
      const bridge = await open();

      await bridge.diagnose();
      await bridge.list();
      await bridge.diff('overview');

      expect(await readProjectFile(root, 'docs/guide.md')).toBe(GUIDE);
      expect(await mtimeOf(root, 'docs/guide.md')).toBe(before);
      expect(existsSync(join(root, '.steward/state'))).toBe(false);
    });

    it('should report a section whose content cannot be rendered as unknown', async () => {
      const report = await (await open({})).diagnose();

      expect(report.status).toBe('error');
      expect(report.sections[0]).toMatchObject({ status: 'unknown', action: 'failed' });
      expect(report.issues[0].code).toBe('DOC_BRIDGE_CONTENT_UNAVAILABLE');
    });
  });

  describe('repair', () => {
    beforeEach(async () => {
      await writeConfig(GUIDE_CONFIG);
      await writeProjectFile(root, 'docs/guide.md', GUIDE);
    });

    it('should insert the region at the anchor with a snapshot', async () => {
      const report = await (await open()).repair();

      expect(report.status).toBe('ok');
      expect(report.sections[0]).toMatchObject({ status: 'match', action: 'inserted', backup: SNAPSHOT });
      expect(await readProjectFile(root, 'docs/guide.md')).toBe(repairedGuide('Generated body'));
    });

    it('should be idempotent', async () => {
      const bridge = await open();
      await bridge.repair();
      const afterFirst = await readProjectFile(root, 'docs/guide.md');

      const second = await bridge.repair();

      expect(second.sections[0]).toMatchObject({ status: 'match', action: 'none' });
      expect(second.sections[0].backup).toBeUndefined();
      expect(await readProjectFile(root, 'docs/guide.md')).toBe(afterFirst);
      expect((await bridge.history('overview')).snapshots).toHaveLength(1);
    });

    it('should replace drifted content and keep everything outside the markers', async () => {
      const edited = `# Guide\n\nBefore.\n${regionText('overview', 'hand edit\nmore')}\nAfter.\n`;
      await writeProjectFile(root, 'docs/guide.md', edited);
      const bridge = await open();

      const diff = await bridge.diff('overview');
      expect(diff.sections[0].status).toBe('drift');
      expect(diff.sections[0].span).toEqual({ startLine: 4, endLine: 7 });
      expect(diff.sections[0].diff).toBe(
        '--- a/docs/guide.md\n+++ b/docs/guide.md\n@@ -1,2 +1,1 @@\n-hand edit\n-more\n+Generated body'
      );

      const report = await bridge.repair(['overview']);
      expect(report.sections[0].action).toBe('updated');
      expect(await readProjectFile(root, 'docs/guide.md')).toBe(
        `# Guide\n\nBefore.\n${regionText('overview', 'Generated body')}\nAfter.\n`
      );
    });

    it('should keep CRLF line endings', async () => {
      await writeProjectFile(root, 'docs/guide.md', `# Guide\r\n${start('overview')}\r\nold\r\n${end('overview')}\r\n`);
      await (await open()).repair();

      expect(await readProjectFile(root, 'docs/guide.md')).toBe(
        `# Guide\r\n${start('overview')}\r\nGenerated body\r\n${end('overview')}\r\n`
      );
    });

    it('should keep the line endings of human lines in mixed files', async () => {
      const mixed = (body: string) =>
        `# Guide\r\nhuman line one\nhuman line two\n${start('overview')}\n${body}\n${end('overview')}\nafter\n`;
      await writeProjectFile(root, 'docs/guide.md', mixed('old'));

      const report = await (await open()).repair();

      expect(report.sections[0].action).toBe('updated');
      expect(await readProjectFile(root, 'docs/guide.md')).toBe(mixed('Generated body'));
    });

    it('should insert with the terminator of the anchor line in mixed files', async () => {
      await writeProjectFile(root, 'docs/guide.md', '# Guide\r\nhuman\n');

      await (await open()).repair();

      expect(await readProjectFile(root, 'docs/guide.md')).toBe(
        `# Guide\r\n\r\n${start('overview')}\r\nGenerated body\r\n${end('overview')}\r\n\r\nhuman\n`
      );
    });

    it('should refuse corrupted markers and leave the file alone', async () => {
      const broken = `# Guide\n${start('overview')}\nbody\n`;
      await writeProjectFile(root, 'docs/guide.md', broken);
      const bridge = await open();

      const diagnosis = await bridge.diagnose();
      expect(diagnosis.status).toBe('error');
      expect(diagnosis.issues[0].code).toBe('DOC_BRIDGE_CORRUPTED_MARKERS');

      const report = await bridge.repair();
      expect(report.sections[0]).toMatchObject({ status: 'corrupted', action: 'failed' });
      expect(report.issues[0].code).toBe('DOC_BRIDGE_CORRUPTED_MARKERS');
      expect(await readProjectFile(root, 'docs/guide.md')).toBe(broken);
    });

    it('should refuse duplicate markers', async () => {
      const doubled = `${regionText('overview', 'a')}\n${regionText('overview', 'b')}\n`;
      await writeProjectFile(root, 'docs/guide.md', doubled);

      const report = await (await open()).repair();

      expect(report.issues[0]).toMatchObject({ code: 'DOC_BRIDGE_DUPLICATE_MARKER', severity: 'error' });
      expect(await readProjectFile(root, 'docs/guide.md')).toBe(doubled);
    });

    it('should report a missing anchor without writing', async () => {
      await writeProjectFile(root, 'docs/guide.md', '# Other\n');
      const report = await (await open()).repair();

      expect(report.sections[0]).toMatchObject({ status: 'missing_marker', action: 'failed' });
      expect(report.issues[0].code).toBe('DOC_BRIDGE_ANCHOR_NOT_FOUND');
      expect(await readProjectFile(root, 'docs/guide.md')).toBe('# Other\n');
    });

    it('should report a heading anchor in an empty file as not found', async () => {
      await writeProjectFile(root, 'docs/guide.md', '');
      const report = await (await open()).repair();

      expect(report.status).toBe('error');
      expect(report.sections[0]).toMatchObject({ status: 'missing_marker', action: 'failed' });
      expect(report.issues[0]).toMatchObject({ code: 'DOC_BRIDGE_ANCHOR_NOT_FOUND', section: 'overview' });
      expect(await readProjectFile(root, 'docs/guide.md')).toBe('');
    });

    it('should repair other sections when one is corrupted', async () => {
      await writeConfig(`root: docs
sections:
  broken: { target: broken.md }
  overview: { target: guide.md, insert_after_heading: "# Guide" }
`);
      const broken = `# Broken\n${end('broken')}\n`;
      await writeProjectFile(root, 'docs/broken.md', broken);
      await writeProjectFile(root, 'docs/guide.md', repairedGuide('stale'));

      const report = await (await open({ broken: 'B', overview: 'Generated body' })).repair();

      expect(report.status).toBe('error');
      expect(report.sections.map((s) => [s.name, s.action])).toEqual([
        ['broken', 'failed'],
        ['overview', 'updated'],
      ]);
      expect(report.issues.map((issue) => [issue.section, issue.code])).toEqual([
        ['broken', 'DOC_BRIDGE_CORRUPTED_MARKERS'],
      ]);
      expect(await readProjectFile(root, 'docs/broken.md')).toBe(broken);
      expect(await readProjectFile(root, 'docs/guide.md')).toBe(repairedGuide('Generated body'));
    });

    it('should leave the target byte-identical when the final rename fails', async () => {
      const bridge = await open(undefined, {
        beforeRename: () => {
          throw new Error('simulated crash');
        },
      });

      const report = await bridge.repair();

      expect(report.status).toBe('error');
      expect(report.issues[0]).toMatchObject({ code: 'DOC_BRIDGE_WRITE_FAILED', message: 'simulated crash' });
      expect(await readProjectFile(root, 'docs/guide.md')).toBe(GUIDE);
    });

    it('should detect a file edited between plan and apply', async () => {
      const bridge = await open();
      const plan = await bridge.planRepair('overview');
      expect(plan).toMatchObject({ kind: 'write', action: 'inserted', relativePath: 'docs/guide.md' });

      await writeProjectFile(root, 'docs/guide.md', '# Guide\n\nSomeone else.\n');

      const error = await expectBridgeErrorAsync(() => bridge.applyRepair(plan));
      expect(error.code).toBe('DOC_BRIDGE_CONFLICT');
      expect(await readProjectFile(root, 'docs/guide.md')).toBe('# Guide\n\nSomeone else.\n');
    });

    it('should plan nothing for a matching section', async () => {
      const bridge = await open();
      await bridge.repair();

      const plan = await bridge.planRepair('overview');
      expect(plan).toEqual({ kind: 'noop', section: 'overview', status: 'match' });
      expect(await bridge.applyRepair(plan)).toEqual({ snapshotId: null });
    });
  });

  describe('missing files', () => {
    it('should not create a file unless create_missing is set', async () => {
      await writeConfig('sections:\n  overview: { target: new.md }\n');
      const report = await (await open()).repair();

      expect(report.status).toBe('error');
      expect(report.issues[0]).toMatchObject({ code: 'DOC_BRIDGE_MISSING_FILE', severity: 'error' });
      expect(existsSync(join(root, 'docs/new.md'))).toBe(false);
    });

    it('should create the file when create_missing is set', async () => {
      await writeConfig('sections:\n  overview: { target: nested/new.md, create_missing: true }\n');
      const bridge = await open();

      const diagnosis = await bridge.diagnose();
      expect(diagnosis.issues[0]).toMatchObject({ code: 'DOC_BRIDGE_MISSING_FILE', severity: 'warning' });

      const report = await bridge.repair();
      expect(report.sections[0]).toMatchObject({ status: 'match', action: 'created' });
      expect(await readProjectFile(root, 'docs/nested/new.md')).toBe(`${regionText('overview', 'Generated body')}\n`);
    });

    it('should manage one marker token in two files independently', async () => {
      await writeConfig(`sections:
  first: { target: one.md, marker: shared, create_missing: true }
  second: { target: two.md, marker: shared, create_missing: true }
`);
      const report = await (await open({ first: 'A', second: 'B' })).repair();

      expect(report.sections.map((s) => s.action)).toEqual(['created', 'created']);
      expect(await readProjectFile(root, 'docs/one.md')).toBe(`${regionText('shared', 'A')}\n`);
      expect(await readProjectFile(root, 'docs/two.md')).toBe(`${regionText('shared', 'B')}\n`);
    });
  });

  describe('adopt', () => {
    beforeEach(async () => {
      await writeConfig(GUIDE_CONFIG);
      await writeProjectFile(root, 'docs/guide.md', repairedGuide('hand edit'));
    });

    it('should accept the current content as the baseline', async () => {
      const bridge = await open();

      const report = await bridge.adopt('overview');
      expect(report.status).toBe('ok');
      expect(report.sections[0]).toMatchObject({ status: 'match', action: 'adopted', backup: SNAPSHOT });
      expect(existsSync(join(root, '.steward/state/docs/state.json'))).toBe(true);

      expect((await bridge.diagnose()).sections[0].status).toBe('match');
      expect((await bridge.repair()).sections[0].action).toBe('none');
      expect(await readProjectFile(root, 'docs/guide.md')).toBe(repairedGuide('hand edit'));
    });

    it('should drop the baseline once the generated content changes', async () => {
      await (await open()).adopt('overview');

      const changed = await open({ overview: 'Regenerated' });
      expect((await changed.diagnose()).sections[0].status).toBe('drift');

      await changed.repair();
      expect(await readProjectFile(root, 'docs/guide.md')).toBe(repairedGuide('Regenerated'));
    });

    it('should treat a matching section as a no-op', async () => {
      await writeProjectFile(root, 'docs/guide.md', repairedGuide('Generated body'));
      const report = await (await open()).adopt('overview');

      expect(report.sections[0].action).toBe('none');
      expect(existsSync(join(root, '.steward/state'))).toBe(false);
    });

    it('should refuse to adopt a section without markers', async () => {
      await writeProjectFile(root, 'docs/guide.md', GUIDE);
      const report = await (await open()).adopt('overview');

      expect(report.issues[0].code).toBe('DOC_BRIDGE_MISSING_MARKER');
      expect(report.sections[0].action).toBe('failed');
    });

    it('should report an unknown section', async () => {
      const report = await (await open()).adopt('nope');
      expect(report.status).toBe('error');
      expect(report.sections).toEqual([]);
      expect(report.issues[0].code).toBe('DOC_BRIDGE_UNKNOWN_SECTION');
    });
  });

  describe('rollback and history', () => {
    beforeEach(async () => {
      await writeConfig(GUIDE_CONFIG);
      await writeProjectFile(root, 'docs/guide.md', GUIDE);
    });

    it('should list snapshots taken by repair', async () => {
      const bridge = await open();
      await bridge.repair();

      const history = await bridge.history();
      expect(history.command).toBe('history');
      expect(history.snapshots).toEqual([
        { id: SNAPSHOT, timestamp: '2026-10-19T03:15:00.123Z', section: 'overview', target: 'docs/guide.md', operation: 'repair' },
      ]);
    });

    it('should restore the exact bytes of a snapshot', async () => {
      const bridge = await open();
      await bridge.repair();

      const report = await bridge.rollback('overview', '2026-10-19T03:15:00.123Z');

      expect(await readProjectFile(root, 'docs/guide.md')).toBe(GUIDE);
      expect(report.command).toBe('rollback');
      expect(report.sections[0]).toMatchObject({
        status: 'missing_marker',
        action: 'restored',
        backup: `${SNAPSHOT}-1`,
      });
      expect(report.snapshots?.map((s) => s.id)).toEqual([SNAPSHOT]);
    });

    it('should remove a file that did not exist before the snapshot', async () => {
      await writeConfig('sections:\n  overview: { target: made.md, create_missing: true }\n');
      const bridge = await open();
      await bridge.repair();
      expect(existsSync(join(root, 'docs/made.md'))).toBe(true);

      await bridge.rollback('overview', SNAPSHOT);
      expect(existsSync(join(root, 'docs/made.md'))).toBe(false);
    });

    it('should report an unknown timestamp', async () => {
      const report = await (await open()).rollback('overview', '20200101T000000000Z');
      expect(report.issues[0].code).toBe('DOC_BRIDGE_BACKUP_NOT_FOUND');
      expect(report.status).toBe('error');
    });
  });

  describe('sync', () => {
    beforeEach(async () => {
      await writeConfig(GUIDE_CONFIG);
    });

    it('should diff, repair and diff again', async () => {
      await writeProjectFile(root, 'docs/guide.md', repairedGuide('stale'));

      const report = await (await open()).sync();

      expect(report.command).toBe('sync');
      expect(report.status).toBe('ok');
      expect(report.steps).toEqual([
        { step: 'diff-before', sections: [{ name: 'overview', status: 'drift' }] },
        { step: 'repair', sections: [{ name: 'overview', status: 'match', action: 'updated' }] },
        { step: 'diff-after', sections: [{ name: 'overview', status: 'match' }] },
      ]);
      expect(report.sections[0]).toMatchObject({ action: 'updated', backup: SNAPSHOT });
      expect(await readProjectFile(root, 'docs/guide.md')).toBe(repairedGuide('Generated body'));
    });

    it('should insert a missing region', async () => {
      await writeProjectFile(root, 'docs/guide.md', GUIDE);

      const report = await (await open()).sync();

      expect(report.status).toBe('ok');
      expect(report.steps).toEqual([
        { step: 'diff-before', sections: [{ name: 'overview', status: 'missing_marker' }] },
        { step: 'repair', sections: [{ name: 'overview', status: 'match', action: 'inserted' }] },
        { step: 'diff-after', sections: [{ name: 'overview', status: 'match' }] },
      ]);
      expect(await readProjectFile(root, 'docs/guide.md')).toBe(repairedGuide('Generated body'));
    });

    it('should skip the write step when everything matches', async () => {
      await writeProjectFile(root, 'docs/guide.md', repairedGuide('Generated body'));

      const report = await (await open()).sync();

      expect(report.steps?.[1]).toEqual({ step: 'repair', sections: [], skipped: true });
      expect(report.sections[0].action).toBe('none');
    });

    it('should adopt instead of repairing in adopt mode', async () => {
      await writeProjectFile(root, 'docs/guide.md', repairedGuide('kept by hand'));

      const report = await (await open()).sync({ mode: 'adopt' });

      expect(report.steps?.map((step) => step.step)).toEqual(['diff-before', 'adopt', 'diff-after']);
      expect(report.sections[0]).toMatchObject({ status: 'match', action: 'adopted' });
      expect(await readProjectFile(root, 'docs/guide.md')).toBe(repairedGuide('kept by hand'));
    });
  });

  describe('state file', () => {
    beforeEach(async () => {
      await writeConfig(GUIDE_CONFIG);
      await writeProjectFile(root, 'docs/guide.md', repairedGuide('Generated body'));
      await writeProjectFile(root, '.steward/state/docs/state.json', 'not json');
    });

    it('should keep diagnosing without baselines', async () => {
      const report = await (await open()).diagnose();

      expect(report.sections[0].status).toBe('match');
      expect(report.issues.map((issue) => issue.code)).toEqual(['DOC_BRIDGE_STATE_CORRUPTED']);
      expect(report.status).toBe('error');
    });

    it('should refuse to mutate anything', async () => {
      const report = await (await open()).repair();

      expect(report.sections).toEqual([]);
      expect(report.issues[0].code).toBe('DOC_BRIDGE_STATE_CORRUPTED');
    });
  });

  describe('external sections', () => {
    const MKDOCS = 'site_name: Demo\nnav:\n  - Home: index.md\n';

    beforeEach(async () => {
      await writeConfig(`sections:
  nav:
    mode: external
    adapter: mkdocs_nav
    options: { title: Architecture, doc: architecture/overview.md }
  page:
    mode: external
    adapter: confluence_page
    options: { space: ENG, title: Architecture Overview, source: overview }
`);
    });

    it('should repair the mkdocs nav and create the confluence payload', async () => {
      await writeProjectFile(root, 'mkdocs.yml', MKDOCS);
      const bridge = await open();

      const diagnosis = await bridge.diagnose();
      expect(diagnosis.sections.map((s) => [s.name, s.status, s.target])).toEqual([
        ['nav', 'drift', 'mkdocs.yml'],
        ['page', 'missing_file', '.steward/state/docs/confluence/architecture-overview.json'],
      ]);

      const report = await bridge.repair();
      expect(report.sections.map((s) => s.action)).toEqual(['updated', 'created']);

      const payload: unknown = JSON.parse(
        await readProjectFile(root, '.steward/state/docs/confluence/architecture-overview.json')
      );
      expect(payload).toMatchObject({ title: 'Architecture Overview', version: { number: 1 }, body: { storage: { value: 'Generated body' } } });

      const after = await bridge.diagnose();
      expect(after.status).toBe('ok');
    });

    it('should report a missing mkdocs.yml as an error it cannot fix', async () => {
      const report = await (await open()).repair(['nav']);

      expect(report.issues[0]).toMatchObject({ code: 'DOC_BRIDGE_MISSING_FILE', severity: 'error', path: 'mkdocs.yml' });
      expect(existsSync(join(root, 'mkdocs.yml'))).toBe(false);
    });

    it('should report a malformed artifact as CORRUPTED_ARTIFACT', async () => {
      await writeProjectFile(root, 'mkdocs.yml', 'nav: 12\n');
      const report = await (await open()).diagnose();

      expect(report.issues[0]).toMatchObject({ code: 'DOC_BRIDGE_CORRUPTED_ARTIFACT', section: 'nav' });
    });

    it('should keep an adopted artifact until its inputs change', async () => {
      await writeProjectFile(root, 'mkdocs.yml', MKDOCS);
      const bridge = await open();

      expect((await bridge.adopt('nav')).sections[0].action).toBe('adopted');
      expect((await bridge.diagnose()).sections[0].status).toBe('match');
      expect(await readProjectFile(root, 'mkdocs.yml')).toBe(MKDOCS);

      await writeProjectFile(root, 'mkdocs.yml', `${MKDOCS}  - About: about.md\n`);
      expect((await bridge.diagnose()).sections[0].status).toBe('drift');
    });
  });
});
