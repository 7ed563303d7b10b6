/**
 * Atomic Writer
 *
 * Every mutation of a host file goes through here:
 *   read current -> conflict check -> snapshot -> temp write + rename -> prune.
 * A failure up to the rename leaves the target byte-identical to what was read.
 * A failed prune is logged and does not fail the write.
 */

import { getErrorMessage } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { hashContent } from '../utils/hashing.js';
import type { BackupStore } from './backup-store.js';
import { DocsBridgeError, toDocsBridgeError } from './errors.js';
import { readTextOrNull, removeIfExists, toProjectPath, writeFileAtomic, type TempWriteHooks } from './fs-utils.js';
import type { BackupSnapshot, SnapshotOperation } from './types.js';

export interface AtomicWriterOptions {
  projectRoot: string;
  backups: BackupStore;
  hooks?: TempWriteHooks;
  logger?: Logger;
}

export interface WriteRequest {
  sectionName: string;
  /** Absolute path of the file to replace */
  targetPath: string;
  /** New whole-file content; null deletes the file */
  content: string | null;
  /** Hash of the file as diagnosed, null when it was absent */
  expectedHash: string | null;
  operation: SnapshotOperation;
}

export interface WriteResult {
  snapshot: BackupSnapshot;
  targetPath: string;
  bytesWritten: number;
}

export class AtomicWriter {
  private readonly projectRoot: string;
  private readonly backups: BackupStore;
  private readonly hooks: TempWriteHooks;
  private readonly logger: Logger;

  constructor(options: AtomicWriterOptions) {
    this.projectRoot = options.projectRoot;
    this.backups = options.backups;
    this.hooks = options.hooks ?? {};
    this.logger = options.logger ?? getLogger('docs-bridge:writer');
  }

  async write(request: WriteRequest): Promise<WriteResult> {
    const path = toProjectPath(this.projectRoot, request.targetPath);
    const context = { operation: request.operation, section: request.sectionName, path };

    let snapshot: BackupSnapshot;
    try {
      const current = await readTextOrNull(request.targetPath);
      const currentHash = current === null ? null : hashContent(current);
      if (currentHash !== request.expectedHash) {
        throw new DocsBridgeError('DOC_BRIDGE_CONFLICT', `${path} changed since it was diagnosed`, {
          ...context,
          details: { expectedHash: request.expectedHash, actualHash: currentHash },
        });
      }

      snapshot = await this.backups.create({
        sectionName: request.sectionName,
        targetPath: request.targetPath,
        priorContent: current,
        operation: request.operation,
      });

      if (request.content === null) {
        await removeIfExists(request.targetPath);
      } else {
        await writeFileAtomic(request.targetPath, request.content, this.hooks);
      }
    } catch (error) {
      throw toDocsBridgeError(error, 'DOC_BRIDGE_WRITE_FAILED', context);
    }

    // the target is already replaced; a failed prune only leaves extra snapshots
    let pruned = 0;
    try {
      pruned = (await this.backups.prune(request.sectionName)).removed.length;
    } catch (error) {
      this.logger.warn('Snapshot pruning failed', {
        section: request.sectionName,
        snapshot: snapshot.id,
        error: getErrorMessage(error),
      });
    }

    const bytesWritten = request.content === null ? 0 : Buffer.byteLength(request.content, 'utf-8');
    this.logger.info('Wrote target', {
      section: request.sectionName,
      path,
      operation: request.operation,
      snapshot: snapshot.id,
      bytes: bytesWritten,
      pruned,
    });

    return { snapshot, targetPath: request.targetPath, bytesWritten };
  }
}
