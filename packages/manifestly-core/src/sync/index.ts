export { planSync } from './sync-planner.js';
export { SyncExecutor } from './sync-executor.js';
export type { SyncExecutorOptions } from './sync-executor.js';
export { SyncService } from './sync-service.js';
export type { SyncServiceOptions } from './sync-service.js';
export type {
  SyncOperation,
  SyncOperationType,
  SyncOperationStatus,
  SyncOperationResult,
  SyncPlan,
  SyncReport,
  SyncOptions,
  SyncResult,
  ExecuteOptions,
} from './types.js';
