import type { DiffResult } from '../diff/types.js';
import { comparePaths } from '../paths.js';
import type { SyncOperation, SyncPlan } from './types.js';

/**
 * Turn a diff into the operations that make the target match the source:
 * COPY for added and changed paths, DELETE for removed ones, in path order.
 */
export function planSync(diff: DiffResult): SyncPlan {
  const operations: SyncOperation[] = [
    ...diff.added.map((path): SyncOperation => ({ type: 'copy', path })),
    ...diff.changed.map((path): SyncOperation => ({ type: 'copy', path })),
    ...diff.removed.map((path): SyncOperation => ({ type: 'delete', path })),
  ];
  operations.sort((a, b) => comparePaths(a.path, b.path));
  return { operations };
}
