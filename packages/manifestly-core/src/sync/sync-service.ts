/**
 * One-way sync: make a target tree match a source manifest.
 *
 * The target manifest is the record of what the target holds. A missing
 * target manifest means an empty target, so the first run seeds it with
 * a full copy. After execution the target manifest is updated from the
 * operations that succeeded, without re-scanning the target. A refreshed
 * source manifest is written back before anything is copied.
 */

import type { Logger } from 'pino';
import { OperationCancelledError, SyncFailedError } from '../errors.js';
import type { PathFailure } from '../errors.js';
import { diffManifests } from '../diff/diff-engine.js';
import { Manifest } from '../manifest/manifest.js';
import type { ManifestStore } from '../manifest/manifest-store.js';
import type { ManifestEntry } from '../manifest/types.js';
import type { SyncExecutor } from './sync-executor.js';
import { planSync } from './sync-planner.js';
import type { SyncOptions, SyncReport, SyncResult } from './types.js';

export interface SyncServiceOptions {
  store: ManifestStore;
  executor: SyncExecutor;
  logger: Logger;
}

export class SyncService {
  private readonly store: ManifestStore;
  private readonly executor: SyncExecutor;
  private readonly logger: Logger;

  constructor(options: SyncServiceOptions) {
    this.store = options.store;
    this.executor = options.executor;
    this.logger = options.logger.child({ component: 'sync-service' });
  }

  /**
   * @throws SyncFailedError after saving the target manifest, if any
   *   operation failed
   * @throws OperationCancelledError after saving, if the signal aborted
   */
  async sync(options: SyncOptions): Promise<SyncResult> {
    const { sourceManifest, dryRun = false, signal } = options;

    let sourceManifestLocation: string | undefined;
    if (options.refresh) {
      this.logger.info({ root: sourceManifest.root }, 'Refreshing source manifest');
      await sourceManifest.refresh();
      if (!dryRun) {
        sourceManifestLocation = await this.store.save(sourceManifest, options.sourceManifestLocation);
      }
    }

    const targetLocation = await this.store.resolveManifestLocation(options.targetManifestLocation);
    const existing = await this.store.tryLoad(targetLocation, { root: options.targetRoot });
    const target =
      existing ??
      Manifest.empty(
        options.targetRoot ?? this.store.defaultRoot(targetLocation),
        sourceManifest.algorithm,
        sourceManifest.scanContext,
      );

    if (!existing) {
      this.logger.info({ location: targetLocation }, 'No target manifest, seeding the target from scratch');
    }

    const diff = diffManifests(sourceManifest, target);
    const plan = planSync(diff);

    this.logger.info(
      {
        source: sourceManifest.root,
        target: target.root,
        copies: diff.added.length + diff.changed.length,
        deletes: diff.removed.length,
        dryRun,
      },
      'Sync planned',
    );

    const report = await this.executor.execute(plan, {
      source: sourceManifest.root,
      target: target.root,
      sourceManifest,
      dryRun,
      signal,
    });

    if (dryRun) {
      return { diff, plan, report, targetManifest: target };
    }

    // An empty source carries no hashes; the surviving entries keep the target's algorithm
    const algorithm = sourceManifest.isEmpty ? target.algorithm : sourceManifest.algorithm;
    const targetManifest = Manifest.fromEntries(
      target.root,
      algorithm,
      this.updatedEntries(target, sourceManifest, report),
      { context: target.scanContext },
    );
    const savedLocation = await this.store.save(targetManifest, targetLocation);

    const failures: PathFailure[] = report.results.flatMap((result) =>
      result.status === 'failed' && result.error ? [{ path: result.operation.path, error: result.error }] : [],
    );
    if (failures.length > 0) {
      throw new SyncFailedError(target.root, failures);
    }
    if (report.cancelled > 0) {
      throw new OperationCancelledError(`Sync to ${target.root}`);
    }

    return { diff, plan, report, targetManifest, targetManifestLocation: savedLocation, sourceManifestLocation };
  }

  /**
   * Previous target entries, minus paths deleted, plus the source entries
   * of paths copied. Failed and cancelled operations leave the previous
   * entry in place, matching what the target still holds.
   */
  private updatedEntries(target: Manifest, source: Manifest, report: SyncReport): ManifestEntry[] {
    const entries = new Map<string, ManifestEntry>(target.entries);

    for (const result of report.results) {
      if (result.status !== 'done') {
        continue;
      }
      const { type, path } = result.operation;
      if (type === 'delete') {
        entries.delete(path);
        continue;
      }
      const copied = source.get(path);
      if (copied) {
        entries.set(path, copied);
      }
    }

    return [...entries.values()];
  }
}
