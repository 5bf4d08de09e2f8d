/**
 * Applies a sync plan between two storage locations.
 *
 * Deletes run before copies, since a path can change between file and
 * directory across the two trees. Copies stream through the target
 * backend's atomic write and are re-hashed afterwards; a mismatch is
 * retried once before the path is reported as failed. Operations are
 * independent: one failure never stops the rest of the plan.
 */

import type { Logger } from 'pino';
import type { ManifestConfig } from '../config/types.js';
import { runWithConcurrency } from '../concurrency.js';
import type { SettledOutcome } from '../concurrency.js';
import { IntegrityMismatchError, toManifestlyError } from '../errors.js';
import { hashStream } from '../hash/file-hasher.js';
import type { HashAlgorithmRegistry } from '../hash/registry.js';
import type { Manifest } from '../manifest/manifest.js';
import type { StorageResolver } from '../storage/resolver.js';
import type { ResolvedLocation } from '../storage/types.js';
import type { ExecuteOptions, SyncOperation, SyncOperationResult, SyncPlan, SyncReport } from './types.js';

export interface SyncExecutorOptions {
  resolver: StorageResolver;
  config: Pick<ManifestConfig, 'chunkSize' | 'maxConcurrentTransfers' | 'verifyCopies'>;
  logger: Logger;
  registry?: HashAlgorithmRegistry;
}

/** Attempts per copy: the first plus one integrity retry */
const MAX_COPY_ATTEMPTS = 2;

interface CopyOutcome {
  bytes: number;
  attempts: number;
}

export class SyncExecutor {
  private readonly resolver: StorageResolver;
  private readonly config: SyncExecutorOptions['config'];
  private readonly logger: Logger;
  private readonly registry?: HashAlgorithmRegistry;

  constructor(options: SyncExecutorOptions) {
    this.resolver = options.resolver;
    this.config = options.config;
    this.registry = options.registry;
    this.logger = options.logger.child({ component: 'sync-executor' });
  }

  async execute(plan: SyncPlan, options: ExecuteOptions): Promise<SyncReport> {
    const startTime = Date.now();
    const dryRun = options.dryRun ?? false;

    if (dryRun) {
      const results = plan.operations.map((operation): SyncOperationResult => ({ operation, status: 'planned' }));
      for (const { operation } of results) {
        this.logger.info({ type: operation.type, path: operation.path }, 'Dry run: would apply');
      }
      return this.buildReport(results, startTime, true);
    }

    const source = this.resolver.resolve(options.source);
    const target = this.resolver.resolve(options.target);
    const deletes = plan.operations.filter((op) => op.type === 'delete');
    const copies = plan.operations.filter((op) => op.type === 'copy');

    const deleteOutcomes = await runWithConcurrency(
      deletes,
      this.config.maxConcurrentTransfers,
      (op) => this.deleteFile(target, op.path),
      { signal: options.signal },
    );
    const copyOutcomes = await runWithConcurrency(
      copies,
      this.config.maxConcurrentTransfers,
      (op) => this.copyFile(source, target, op.path, options.sourceManifest),
      { signal: options.signal },
    );

    const byOperation = new Map<SyncOperation, SyncOperationResult>();
    deletes.forEach((operation, index) => {
      byOperation.set(operation, this.toResult(operation, deleteOutcomes[index]));
    });
    copies.forEach((operation, index) => {
      byOperation.set(operation, this.toResult(operation, copyOutcomes[index]));
    });

    const results = plan.operations.map(
      (operation): SyncOperationResult => byOperation.get(operation) ?? { operation, status: 'cancelled' },
    );
    const report = this.buildReport(results, startTime, false);

    this.logger.info(
      {
        copied: report.copied,
        deleted: report.deleted,
        failed: report.failed,
        cancelled: report.cancelled,
        bytesCopied: report.bytesCopied,
        durationMs: report.durationMs,
      },
      'Sync plan executed',
    );

    return report;
  }

  private async deleteFile(target: ResolvedLocation, relativePath: string): Promise<CopyOutcome> {
    const location = target.backend.join(target.path, relativePath);
    await target.backend.remove(location, { pruneEmptyParentsUpTo: target.path });
    this.logger.debug({ path: relativePath }, 'Deleted');
    return { bytes: 0, attempts: 1 };
  }

  private async copyFile(
    source: ResolvedLocation,
    target: ResolvedLocation,
    relativePath: string,
    sourceManifest: Manifest,
  ): Promise<CopyOutcome> {
    const from = source.backend.join(source.path, relativePath);
    const to = target.backend.join(target.path, relativePath);
    const expected = sourceManifest.get(relativePath);
    const chunkSize = this.config.chunkSize;

    for (let attempt = 1; ; attempt++) {
      const input = await source.backend.openRead(from, { chunkSize });
      await target.backend.write(to, input, { size: expected?.size });

      if (!this.config.verifyCopies || expected === undefined) {
        return { bytes: expected?.size ?? 0, attempts: attempt };
      }

      const written = await hashStream(await target.backend.openRead(to, { chunkSize }), sourceManifest.algorithm, {
        chunkSize,
        registry: this.registry,
      });

      if (written.hash === expected.hash) {
        this.logger.debug({ path: relativePath, bytes: written.sizeBytes, attempt }, 'Copied');
        return { bytes: written.sizeBytes, attempts: attempt };
      }

      if (attempt >= MAX_COPY_ATTEMPTS) {
        throw new IntegrityMismatchError(relativePath, expected.hash, written.hash);
      }
      this.logger.warn(
        { path: relativePath, expected: expected.hash, actual: written.hash },
        'Copied file does not match source hash, retrying',
      );
    }
  }

  private toResult(operation: SyncOperation, outcome: SettledOutcome<CopyOutcome>): SyncOperationResult {
    switch (outcome.status) {
      case 'fulfilled':
        return { operation, status: 'done', bytes: outcome.value.bytes, attempts: outcome.value.attempts };
      case 'rejected': {
        const error = toManifestlyError(outcome.reason, operation.path);
        this.logger.error({ type: operation.type, path: operation.path, err: error }, 'Sync operation failed');
        return { operation, status: 'failed', error };
      }
      case 'cancelled':
        return { operation, status: 'cancelled' };
    }
  }

  private buildReport(results: SyncOperationResult[], startTime: number, dryRun: boolean): SyncReport {
    let copied = 0;
    let deleted = 0;
    let failed = 0;
    let cancelled = 0;
    let bytesCopied = 0;

    for (const result of results) {
      if (result.status === 'done') {
        if (result.operation.type === 'copy') {
          copied++;
          bytesCopied += result.bytes ?? 0;
        } else {
          deleted++;
        }
      } else if (result.status === 'failed') {
        failed++;
      } else if (result.status === 'cancelled') {
        cancelled++;
      }
    }

    return { results, copied, deleted, failed, cancelled, bytesCopied, durationMs: Date.now() - startTime, dryRun };
  }
}
