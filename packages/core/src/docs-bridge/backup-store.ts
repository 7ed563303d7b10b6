/**
 * Backup Store
 *
 * Durable whole-file snapshots taken before every mutating write, stored as
 * `<stateDir>/history/<section>/<id>.json`. Snapshots are only removed by
 * `prune` (keep the newest N per section).
 */

import { mkdir, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { getLogger, type Logger } from '../utils/logger.js';
import { hashContent, generateSnapshotId, normalizeSnapshotId } from '../utils/hashing.js';
import { getErrorMessage, isErrnoException } from '../utils/errors.js';
import { DocsBridgeError } from './errors.js';
import { readTextOrNull, toProjectPath, writeFileAtomic } from './fs-utils.js';
import { BackupSnapshotSchema, TOKEN_PATTERN, type BackupSnapshot, type SnapshotOperation } from './types.js';

export interface BackupStoreOptions {
  /** Absolute project root; snapshot target paths are stored relative to it */
  projectRoot: string;
  /** Absolute docs bridge state directory */
  stateDir: string;
  /** Snapshots kept per section by `prune` (default: 20) */
  keep?: number;
  now?: () => Date;
  logger?: Logger;
}

export interface CreateSnapshotInput {
  sectionName: string;
  /** Absolute path of the file about to change */
  targetPath: string;
  /** Whole file before mutation, null when it does not exist */
  priorContent: string | null;
  operation: SnapshotOperation;
}

export interface PruneResult {
  removed: string[];
  kept: number;
}

export const DEFAULT_BACKUP_KEEP = 20;

/** Plain code-unit order, so `X` sorts before its collision suffix `X-1` */
function compareIds(a: string, b: string): number {
  return a === b ? 0 : a < b ? -1 : 1;
}

export class BackupStore {
  private readonly projectRoot: string;
  private readonly historyDir: string;
  private readonly keep: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: BackupStoreOptions) {
    this.projectRoot = options.projectRoot;
    this.historyDir = join(options.stateDir, 'history');
    this.keep = Math.max(1, options.keep ?? DEFAULT_BACKUP_KEEP);
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? getLogger('docs-bridge:backups');
  }

  /**
   * Persist a snapshot; resolves only once it is on disk
   */
  async create(input: CreateSnapshotInput): Promise<BackupSnapshot> {
    const createdAt = this.now();
    const sectionDir = this.sectionDir(input.sectionName, 'create');
    await mkdir(sectionDir, { recursive: true });

    const id = await this.uniqueId(sectionDir, generateSnapshotId(createdAt));
    const snapshot: BackupSnapshot = {
      id,
      timestamp: createdAt.toISOString(),
      sectionName: input.sectionName,
      targetPath: toProjectPath(this.projectRoot, input.targetPath),
      priorContent: input.priorContent,
      priorHash: input.priorContent === null ? null : hashContent(input.priorContent),
      operation: input.operation,
    };

    await writeFileAtomic(join(sectionDir, `${id}.json`), `${JSON.stringify(snapshot, null, 2)}\n`);
    this.logger.debug('Snapshot created', { section: input.sectionName, id, target: snapshot.targetPath });
    return snapshot;
  }

  /**
   * Snapshots oldest first, for one section or all of them
   */
  async list(sectionName?: string): Promise<BackupSnapshot[]> {
    const sections =
      sectionName !== undefined
        ? [sectionName]
        : (await this.listDirectories(this.historyDir)).filter((name) => TOKEN_PATTERN.test(name));
    const snapshots: BackupSnapshot[] = [];

    for (const section of sections) {
      const sectionDir = this.sectionDir(section, 'list');
      for (const id of await this.snapshotIds(sectionDir)) {
        const snapshot = await this.read(join(sectionDir, `${id}.json`));
        if (snapshot) {
          snapshots.push(snapshot);
        }
      }
    }

    return snapshots.sort((a, b) => compareIds(a.id, b.id) || a.sectionName.localeCompare(b.sectionName));
  }

  /**
   * Find a snapshot by compact id or ISO-8601 timestamp
   */
  async find(sectionName: string, timestamp: string): Promise<BackupSnapshot> {
    const wanted = timestamp.trim();
    const normalized = normalizeSnapshotId(wanted);
    const snapshots = await this.list(sectionName);

    const found =
      snapshots.find((snapshot) => snapshot.id === wanted) ??
      snapshots.find((snapshot) => normalized !== null && snapshot.id === normalized) ??
      snapshots.find((snapshot) => snapshot.timestamp === wanted);

    if (!found) {
      throw new DocsBridgeError(
        'DOC_BRIDGE_BACKUP_NOT_FOUND',
        `No snapshot '${wanted}' for section '${sectionName}'`,
        { operation: 'find', section: sectionName, details: { available: snapshots.map((s) => s.id) } }
      );
    }
    return found;
  }

  /**
   * Delete all but the newest `keep` snapshots of a section
   */
  async prune(sectionName: string, keep: number = this.keep): Promise<PruneResult> {
    const limit = Math.max(1, keep);
    const sectionDir = this.sectionDir(sectionName, 'prune');
    const ids = await this.snapshotIds(sectionDir);
    const excess = ids.slice(0, Math.max(0, ids.length - limit));

    for (const id of excess) {
      await rm(join(sectionDir, `${id}.json`), { force: true });
    }
    if (excess.length > 0) {
      this.logger.debug('Pruned snapshots', { section: sectionName, removed: excess.length });
    }

    return { removed: excess, kept: ids.length - excess.length };
  }

  /**
   * Snapshot ids of a section directory, oldest first
   */
  private async snapshotIds(sectionDir: string): Promise<string[]> {
    return (await this.listFiles(sectionDir))
      .filter((file) => file.endsWith('.json'))
      .map((file) => file.slice(0, -'.json'.length))
      .sort(compareIds);
  }

  private async uniqueId(sectionDir: string, baseId: string): Promise<string> {
    const existing = new Set(await this.listFiles(sectionDir));
    let candidate = baseId;
    for (let suffix = 1; existing.has(`${candidate}.json`); suffix++) {
      candidate = `${baseId}-${suffix}`;
    }
    return candidate;
  }

  private async read(filePath: string): Promise<BackupSnapshot | null> {
    const text = await readTextOrNull(filePath);
    if (text === null) {
      return null;
    }
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      this.logger.warn('Skipping unreadable snapshot', { file: filePath, error: getErrorMessage(error) });
      return null;
    }
    const parsed = BackupSnapshotSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn('Skipping invalid snapshot', { file: filePath });
      return null;
    }
    return parsed.data;
  }

  /**
   * History directory of a section; names that are not marker tokens never reach the filesystem
   */
  private sectionDir(sectionName: string, operation: string): string {
    if (!TOKEN_PATTERN.test(sectionName)) {
      throw new DocsBridgeError('DOC_BRIDGE_UNKNOWN_SECTION', `Invalid section name '${sectionName}'`, {
        operation,
        section: sectionName,
      });
    }
    return join(this.historyDir, sectionName);
  }

  private async listFiles(directory: string): Promise<string[]> {
    const entries = await this.readDirectory(directory);
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
  }

  private async listDirectories(directory: string): Promise<string[]> {
    const entries = await this.readDirectory(directory);
    return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name).sort();
  }

  private async readDirectory(directory: string) {
    try {
      return await readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }
}
