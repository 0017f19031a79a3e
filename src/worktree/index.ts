/**
 * Worktree lifecycle module for parallel agent isolation.
 */

// Types
export type {
  ChangeSummary,
  LifecycleContext,
  ManagerOptions,
  NukeOptions,
  NukeResult,
  ReconcileIssue,
  ReconcileReport,
  ReconcilerOptions,
  RetryOutcome,
  SpawnOptions,
  SyncOptions,
  SyncResult,
  WorktreeHandle,
  WorktreeStatus,
} from './types.js';

// Allocation
export { AGENT_ID_PATTERN, allocate, validateAgentId, type WorktreeLayout } from './allocation.js';

// Components
export { WorktreeLifecycleManager, toHandle } from './lifecycle-manager.js';
export { StatusInspector, summarizeChanges, formatChangeSummary } from './status-inspector.js';
export { CommitCoordinator, parseAuthor } from './commit-coordinator.js';
export { CleanupReconciler, startReconcileLoop, hasChanges, type ReconcileLoop } from './reconciler.js';

// Formatting
export {
  formatHandle,
  formatNukeResult,
  formatReconcileReport,
  formatRecordList,
  formatStatus,
  formatSyncResult,
} from './format.js';
