/**
 * Types shared by the worktree lifecycle components.
 */

import type { BaseRefMismatchPolicy, OrphanPolicy } from '../config.js';
import type { CommitAuthor, RepositoryGateway } from '../gateway/types.js';
import type { StructuralLock } from '../lock/structural-lock.js';
import type { WorktreeRegistry } from '../registry/worktree-registry.js';
import type { WorktreeState } from '../registry/types.js';
import type { WorktreeLayout } from './allocation.js';

/**
 * What an agent gets back from spawn: where to work and on which branch.
 */
export interface WorktreeHandle {
  agentId: string;
  path: string;
  branchName: string;
  baseRef: string;
  headSha: string | null;
}

/**
 * Collaborators every lifecycle component works against.
 */
export interface LifecycleContext {
  gateway: RepositoryGateway;
  registry: WorktreeRegistry;
  lock: StructuralLock;
  layout: WorktreeLayout;
  /** Time budget for each gateway call */
  timeoutMs: number;
}

export interface SpawnOptions {
  /** Ref to branch from (default: configured default base ref) */
  baseRef?: string;
}

export interface NukeOptions {
  /** Skip the uncommitted-changes check */
  force?: boolean;
  /** Delete the agent branch as well */
  deleteBranch?: boolean;
}

export interface NukeResult {
  agentId: string;
  removed: boolean;
  /** No record existed; nothing was done */
  alreadyAbsent: boolean;
  path?: string;
  branchName?: string;
}

/**
 * Uncommitted changes of a worktree, grouped by kind.
 */
export interface ChangeSummary {
  staged: string[];
  modified: string[];
  deleted: string[];
  untracked: string[];
  conflicted: string[];
  total: number;
}

export type WorktreeStatus = { kind: 'clean' } | { kind: 'dirty'; summary: ChangeSummary };

export interface SyncResult {
  agentId: string;
  headSha: string;
  /** False when there was nothing to commit */
  committed: boolean;
}

export interface SyncOptions {
  author?: CommitAuthor;
}

export interface ManagerOptions {
  defaultBaseRef: string;
  baseRefMismatch: BaseRefMismatchPolicy;
  deleteBranch: boolean;
}

export interface ReconcilerOptions {
  orphanPolicy: OrphanPolicy;
  staleAfterMs: number;
  now?: () => number;
}

export type PendingOperation = 'spawn' | 'remove' | 'commit';

export interface RetryOutcome {
  agentId: string;
  operation: PendingOperation;
  /** State after the retry; `orphaned` when the retry failed */
  result: WorktreeState | 'purged';
}

export interface ReconcileIssue {
  agentId?: string;
  path?: string;
  message: string;
}

/**
 * What a reconcile pass found and changed.
 */
export interface ReconcileReport {
  /** Records dropped because their worktree no longer exists */
  purged: string[];
  /** Records marked orphaned during this pass */
  orphaned: string[];
  /** Orphans taken over as active records */
  adopted: string[];
  /** Orphan worktree paths removed from the repository */
  removed: string[];
  /** Stuck in-progress records retried */
  retried: RetryOutcome[];
  /** Orphans left in place for an operator, including any with uncommitted changes under the remove policy */
  unresolved: string[];
  /** Agents skipped because their records are corrupt */
  corrupt: string[];
  issues: ReconcileIssue[];
}

export type { CommitAuthor };
