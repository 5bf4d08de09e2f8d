import type { ManifestlyError } from '../errors.js';
import type { DiffResult } from '../diff/types.js';
import type { Manifest } from '../manifest/manifest.js';

export type SyncOperationType = 'copy' | 'delete';

/** COPY reads from the source root; DELETE acts on the target root */
export interface SyncOperation {
  type: SyncOperationType;
  path: string;
}

export interface SyncPlan {
  operations: SyncOperation[];
}

/**
 * - `done`: performed (and verified, for copies)
 * - `failed`: attempted and failed; see `error`
 * - `cancelled`: never started because the run was cancelled
 * - `planned`: dry run, nothing performed
 */
export type SyncOperationStatus = 'done' | 'failed' | 'cancelled' | 'planned';

export interface SyncOperationResult {
  operation: SyncOperation;
  status: SyncOperationStatus;
  /** Bytes written, for completed copies */
  bytes?: number;
  /** Copy attempts made, including the integrity retry */
  attempts?: number;
  error?: ManifestlyError;
}

export interface SyncReport {
  /** One result per planned operation, in plan order */
  results: SyncOperationResult[];
  copied: number;
  deleted: number;
  failed: number;
  cancelled: number;
  bytesCopied: number;
  durationMs: number;
  dryRun: boolean;
}

export interface ExecuteOptions {
  /** Source root location */
  source: string;
  /** Target root location */
  target: string;
  /** Manifest holding the expected hash of every copied path */
  sourceManifest: Manifest;
  dryRun?: boolean;
  signal?: AbortSignal;
}

export interface SyncOptions {
  sourceManifest: Manifest;
  /** Target manifest file, or the directory holding it */
  targetManifestLocation: string;
  /** Target tree; defaults to the root recorded in (or implied by) the target manifest */
  targetRoot?: string;
  /** Re-scan the source before diffing and save the refreshed source manifest */
  refresh?: boolean;
  /** Where a refreshed source manifest is saved; defaults to the manifest name inside its root */
  sourceManifestLocation?: string;
  dryRun?: boolean;
  signal?: AbortSignal;
}

export interface SyncResult {
  diff: DiffResult;
  plan: SyncPlan;
  report: SyncReport;
  /** The target manifest after the run (unchanged on dry runs) */
  targetManifest: Manifest;
  /** Where the target manifest was saved; absent on dry runs */
  targetManifestLocation?: string;
  /** Where the refreshed source manifest was saved; absent unless refreshed outside a dry run */
  sourceManifestLocation?: string;
}
