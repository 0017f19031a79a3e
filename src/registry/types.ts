/**
 * Types for the durable worktree registry.
 */

/**
 * Lifecycle state of an agent worktree.
 */
export type WorktreeState =
  | 'spawning'
  | 'active'
  | 'dirty'
  | 'committing'
  | 'removing'
  | 'removed'
  | 'orphaned';

export const WORKTREE_STATES = [
  'spawning',
  'active',
  'dirty',
  'committing',
  'removing',
  'removed',
  'orphaned',
] as const satisfies readonly WorktreeState[];

/** States recording a structural or commit operation that has not finished */
export const IN_PROGRESS_STATES: ReadonlySet<WorktreeState> = new Set(['spawning', 'removing', 'committing']);

/**
 * Forward transitions. `orphaned` is reachable from every non-terminal state;
 * leaving it is reserved to the reconciler.
 */
export const TRANSITIONS: Readonly<Record<WorktreeState, readonly WorktreeState[]>> = {
  spawning: ['active', 'orphaned'],
  active: ['dirty', 'committing', 'removing', 'orphaned'],
  dirty: ['active', 'committing', 'removing', 'orphaned'],
  committing: ['active', 'dirty', 'orphaned'],
  removing: ['removed', 'orphaned'],
  removed: [],
  orphaned: ['active', 'removing'],
};

/**
 * One agent's worktree.
 */
export interface WorktreeRecord {
  agentId: string;
  /** Absolute worktree path, unique across live records */
  path: string;
  /** Branch checked out in the worktree, unique across live records */
  branchName: string;
  /** Ref the worktree was branched from */
  baseRef: string;
  state: WorktreeState;
  /** Epoch milliseconds */
  createdAt: number;
  /** Epoch milliseconds of the last state change */
  lastTransitionAt: number;
  /** Last observed commit, null until first observed */
  headSha: string | null;
}

export interface NewWorktreeRecord {
  agentId: string;
  path: string;
  branchName: string;
  baseRef: string;
  state: 'spawning' | 'orphaned';
  headSha?: string | null;
}

/**
 * Fields a transition may update alongside the state.
 */
export interface TransitionPatch {
  headSha?: string | null;
}

/**
 * Serialized registry file.
 */
export interface RegistrySnapshot {
  version: 1;
  updatedAt: number;
  records: WorktreeRecord[];
}
