/**
 * Capability surface over one primary repository.
 * The lifecycle core never touches the filesystem or git metadata except through it.
 */

/**
 * A worktree as reported by the repository.
 */
export interface GatewayWorktree {
  /** Absolute path of the worktree directory */
  path: string;
  /** Branch checked out in the worktree, empty when detached */
  branch: string;
  /** Commit at the worktree's HEAD */
  headSha: string;
}

export type ChangeCode = 'added' | 'modified' | 'deleted' | 'renamed' | 'untracked' | 'conflicted';

/**
 * One changed path in a worktree.
 */
export interface StatusEntry {
  path: string;
  code: ChangeCode;
  /** Whether the change is staged in the index */
  staged: boolean;
}

export interface StatusReport {
  entries: StatusEntry[];
}

export interface CommitAuthor {
  name: string;
  email: string;
}

export interface GatewayCallOptions {
  /** Aborting stops the primitive; it still settles once the work has stopped */
  signal?: AbortSignal;
}

export interface RemoveWorktreeOptions extends GatewayCallOptions {
  /** Remove even when the worktree has uncommitted changes; with `branch`, delete it unmerged */
  force?: boolean;
  /** Branch to delete once the worktree is gone */
  branch?: string;
}

/**
 * Repository primitives consumed by the lifecycle core.
 * Each call is atomic from the caller's perspective and rejects with a GatewayError.
 */
export interface RepositoryGateway {
  /** Root of the primary repository */
  readonly rootPath: string;
  listWorktrees(options?: GatewayCallOptions): Promise<GatewayWorktree[]>;
  createWorktree(path: string, branch: string, baseRef: string, options?: GatewayCallOptions): Promise<void>;
  removeWorktree(path: string, options?: RemoveWorktreeOptions): Promise<void>;
  status(path: string, options?: GatewayCallOptions): Promise<StatusReport>;
  commit(path: string, message: string, author: CommitAuthor, options?: GatewayCallOptions): Promise<string>;
  headSha(path: string, options?: GatewayCallOptions): Promise<string>;
}

/**
 * Opens a gateway for a primary repository.
 */
export type RepositoryGatewayFactory = (rootPath: string) => Promise<RepositoryGateway>;
