/**
 * Tests for Backup Store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { hashContent } from '../../utils/hashing.js';
import { Logger } from '../../utils/logger.js';
import { BackupStore } from '../backup-store.js';
import { createTempProject, expectBridgeErrorAsync, removeTempProject, writeProjectFile } from './helpers.js';

const NOW = new Date('2026-10-19T03:15:00.123Z');

describe('BackupStore', () => {
  let root: string;
  let stateDir: string;
  let store: BackupStore;

  beforeEach(async () => {
    root = await createTempProject();
    stateDir = join(root, '.steward/state/docs');
    store = new BackupStore({ projectRoot: root, stateDir, now: () => NOW, logger: new Logger({ level: 'silent' }) });
  });

  afterEach(async () => {
    await removeTempProject(root);
  });

  it('should persist a snapshot with a compact timestamp id', async () => {
    const snapshot = await store.create({
      sectionName: 'overview',
      targetPath: join(root, 'docs/overview.md'),
      priorContent: 'before\n',
      operation: 'repair',
    });

    expect(snapshot).toEqual({
      id: '20261019T031500123Z',
      timestamp: '2026-10-19T03:15:00.123Z',
      sectionName: 'overview',
      targetPath: 'docs/overview.md',
      priorContent: 'before\n',
      priorHash: hashContent('before\n'),
      operation: 'repair',
    });
    expect(await readdir(join(stateDir, 'history/overview'))).toEqual(['20261019T031500123Z.json']);
  });

  it('should record absent files with a null prior hash', async () => {
    const snapshot = await store.create({
      sectionName: 'overview',
      targetPath: join(root, 'docs/overview.md'),
      priorContent: null,
      operation: 'repair',
    });
    expect(snapshot.priorHash).toBeNull();
  });

  it('should suffix colliding ids and list oldest first', async () => {
    const input = { sectionName: 's', targetPath: join(root, 'a.md'), priorContent: 'a', operation: 'repair' } as const;
    await store.create(input);
    await store.create({ ...input, priorContent: 'b' });

    const listed = await store.list('s');
    expect(listed.map((s) => s.id)).toEqual(['20261019T031500123Z', '20261019T031500123Z-1']);
    expect(listed.map((s) => s.priorContent)).toEqual(['a', 'b']);
  });

  it('should list every section when none is given', async () => {
    await store.create({ sectionName: 'b', targetPath: join(root, 'b.md'), priorContent: null, operation: 'repair' });
    await store.create({ sectionName: 'a', targetPath: join(root, 'a.md'), priorContent: null, operation: 'adopt' });

    expect((await store.list()).map((s) => s.sectionName)).toEqual(['a', 'b']);
  });

  it('should return nothing for an empty history', async () => {
    expect(await store.list()).toEqual([]);
    expect(await store.list('missing')).toEqual([]);
  });

  it('should skip unreadable snapshot files', async () => {
    await writeProjectFile(root, '.steward/state/docs/history/s/broken.json', '{not json');
    expect(await store.list('s')).toEqual([]);
  });

  describe('find', () => {
    beforeEach(async () => {
      await store.create({ sectionName: 's', targetPath: join(root, 'a.md'), priorContent: 'a', operation: 'repair' });
    });

    it('should find by compact id', async () => {
      expect((await store.find('s', '20261019T031500123Z')).priorContent).toBe('a');
    });

    it('should find by ISO timestamp', async () => {
      expect((await store.find('s', '2026-10-19T03:15:00.123Z')).id).toBe('20261019T031500123Z');
    });

    it('should fail with BACKUP_NOT_FOUND listing the available ids', async () => {
      const error = await expectBridgeErrorAsync(() => store.find('s', '20200101T000000000Z'));
      expect(error.code).toBe('DOC_BRIDGE_BACKUP_NOT_FOUND');
      expect(error.details).toEqual({ available: ['20261019T031500123Z'] });
    });
  });

  it('should refuse section names that leave the history directory', async () => {
    const elsewhere = await store.create({
      sectionName: 'overview',
      targetPath: join(root, 'docs/overview.md'),
      priorContent: 'x',
      operation: 'repair',
    });
    await writeProjectFile(root, '.steward/state/outside/1.json', JSON.stringify(elsewhere));

    const listError = await expectBridgeErrorAsync(() => store.list('../../outside'));
    expect(listError.code).toBe('DOC_BRIDGE_UNKNOWN_SECTION');
    expect(listError.message).toBe("Invalid section name '../../outside'");

    const findError = await expectBridgeErrorAsync(() => store.find('../../outside', elsewhere.id));
    expect(findError.code).toBe('DOC_BRIDGE_UNKNOWN_SECTION');
  });

  it('should ignore history directories that are not section names', async () => {
    await store.create({ sectionName: 'overview', targetPath: join(root, 'docs/a.md'), priorContent: 'x', operation: 'repair' });
    await writeProjectFile(root, '.steward/state/docs/history/_stray/20261019T031500123Z.json', '{}');

    expect((await store.list()).map((snapshot) => snapshot.sectionName)).toEqual(['overview']);
  });

  it('should prune all but the newest snapshots', async () => {
    const input = { sectionName: 's', targetPath: join(root, 'a.md'), priorContent: 'a', operation: 'repair' } as const;
    await store.create(input);
    await store.create(input);
    await store.create(input);

    const result = await store.prune('s', 2);

    expect(result).toEqual({ removed: ['20261019T031500123Z'], kept: 2 });
    expect((await store.list('s')).map((s) => s.id)).toEqual(['20261019T031500123Z-1', '20261019T031500123Z-2']);
  });
});
