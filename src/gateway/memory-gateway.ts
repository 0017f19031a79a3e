/**
 * In-memory RepositoryGateway.
 *
 * Models worktrees, branches and pending file changes without subprocesses so the
 * lifecycle core can be exercised deterministically. Failures and hangs can be
 * scripted per primitive.
 */

import { createHash } from 'crypto';
import { GatewayError } from '../utils/errors.js';
import type {
  CommitAuthor,
  GatewayCallOptions,
  GatewayWorktree,
  RemoveWorktreeOptions,
  RepositoryGateway,
  StatusEntry,
  StatusReport,
} from './types.js';

export type GatewayPrimitive =
  | 'listWorktrees'
  | 'createWorktree'
  | 'removeWorktree'
  | 'status'
  | 'commit'
  | 'headSha';

export interface GatewayCall {
  primitive: GatewayPrimitive;
  args: unknown[];
}

export interface CommitRecord {
  sha: string;
  path: string;
  message: string;
  author: CommitAuthor;
  files: string[];
}

interface MemoryWorktree {
  path: string;
  branch: string;
  headSha: string;
  changes: Map<string, StatusEntry>;
}

type ScriptedFault = { type: 'fail'; error: GatewayError } | { type: 'hang'; settleAfterAbortMs: number };

export class InMemoryRepositoryGateway implements RepositoryGateway {
  readonly rootPath: string;
  readonly calls: GatewayCall[] = [];
  readonly commits: CommitRecord[] = [];

  private readonly worktrees = new Map<string, MemoryWorktree>();
  private readonly branches = new Map<string, string>();
  /** Branches holding commits that no other branch has */
  private readonly unmerged = new Set<string>();
  private readonly faults = new Map<GatewayPrimitive, ScriptedFault[]>();
  private commitCounter = 0;
  private active = 0;

  constructor(rootPath: string = '/repo', options: { baseRefs?: Record<string, string> } = {}) {
    this.rootPath = rootPath;
    const baseRefs = options.baseRefs ?? { main: fakeSha('main') };
    for (const [ref, sha] of Object.entries(baseRefs)) {
      this.branches.set(ref, sha);
    }
    const mainSha = this.branches.get('main') ?? fakeSha('main');
    this.worktrees.set(rootPath, { path: rootPath, branch: 'main', headSha: mainSha, changes: new Map() });
  }

  /**
   * Make the next call of `primitive` reject with `error`.
   */
  failNext(primitive: GatewayPrimitive, error: GatewayError): void {
    this.enqueueFault(primitive, { type: 'fail', error });
  }

  /**
   * Make the next call of `primitive` hang until its signal aborts, then keep
   * working for `settleAfterAbortMs` before it rejects. Without a signal it never settles.
   */
  hangNext(primitive: GatewayPrimitive, options: { settleAfterAbortMs?: number } = {}): void {
    this.enqueueFault(primitive, { type: 'hang', settleAfterAbortMs: options.settleAfterAbortMs ?? 0 });
  }

  /** Calls started and not yet settled */
  get activeCalls(): number {
    return this.active;
  }

  /**
   * Simulate an agent editing a file inside a worktree.
   */
  writeFile(worktreePath: string, file: string, options: { staged?: boolean } = {}): void {
    const worktree = this.requireWorktree(worktreePath, 'writeFile');
    const tracked = this.isTracked(worktree, file);
    worktree.changes.set(file, {
      path: file,
      code: tracked ? 'modified' : options.staged ? 'added' : 'untracked',
      staged: options.staged ?? false,
    });
  }

  /**
   * Simulate a worktree created outside the lifecycle core.
   */
  addExternalWorktree(path: string, branch: string): GatewayWorktree {
    const headSha = this.branches.get('main') ?? fakeSha('main');
    this.branches.set(branch, headSha);
    this.worktrees.set(path, { path, branch, headSha, changes: new Map() });
    return { path, branch, headSha };
  }

  /**
   * Simulate a worktree deleted outside the lifecycle core.
   */
  removeExternally(path: string): void {
    this.worktrees.delete(path);
  }

  hasBranch(branch: string): boolean {
    return this.branches.has(branch);
  }

  callsOf(primitive: GatewayPrimitive): GatewayCall[] {
    return this.calls.filter((call) => call.primitive === primitive);
  }

  listWorktrees(options: GatewayCallOptions = {}): Promise<GatewayWorktree[]> {
    return this.run('listWorktrees', [], options.signal, async () =>
      [...this.worktrees.values()].map(({ path, branch, headSha }) => ({ path, branch, headSha }))
    );
  }

  createWorktree(path: string, branch: string, baseRef: string, options: GatewayCallOptions = {}): Promise<void> {
    return this.run('createWorktree', [path, branch, baseRef], options.signal, async () => {
      this.addWorktree(path, branch, baseRef);
    });
  }

  private addWorktree(path: string, branch: string, baseRef: string): void {

    const baseSha = this.resolveRef(baseRef);
    if (!baseSha) {
      throw new GatewayError(`invalid reference: ${baseRef}`, 'createWorktree', { retryable: false });
    }
    if (this.worktrees.has(path)) {
      throw new GatewayError(`'${path}' already exists`, 'createWorktree', { retryable: false, collision: 'path' });
    }
    if (this.branches.has(branch)) {
      throw new GatewayError(`a branch named '${branch}' already exists`, 'createWorktree', {
        retryable: false,
        collision: 'branch',
      });
    }

    this.branches.set(branch, baseSha);
    this.worktrees.set(path, { path, branch, headSha: baseSha, changes: new Map() });
  }

  removeWorktree(path: string, options: RemoveWorktreeOptions = {}): Promise<void> {
    const { signal, ...removal } = options;
    return this.run('removeWorktree', [path, removal], signal, async () => this.dropWorktree(path, removal));
  }

  private dropWorktree(path: string, options: RemoveWorktreeOptions): void {
    const worktree = this.worktrees.get(path);
    if (worktree) {
      if (path === this.rootPath) {
        throw new GatewayError(`'${path}' is a main working tree`, 'removeWorktree', { retryable: false });
      }
      if (worktree.changes.size > 0 && !options.force) {
        throw new GatewayError(`'${path}' contains modified or untracked files, use --force to delete it`, 'removeWorktree', {
          retryable: false,
        });
      }
      this.worktrees.delete(path);
    }

    // Like `git branch -d`, unmerged work survives unless forced
    if (options.branch && (options.force || !this.unmerged.has(options.branch))) {
      this.branches.delete(options.branch);
      this.unmerged.delete(options.branch);
    }
  }

  status(path: string, options: GatewayCallOptions = {}): Promise<StatusReport> {
    return this.run('status', [path], options.signal, async () => {
      const worktree = this.requireWorktree(path, 'status');
      return { entries: [...worktree.changes.values()].map((entry) => ({ ...entry })) };
    });
  }

  commit(path: string, message: string, author: CommitAuthor, options: GatewayCallOptions = {}): Promise<string> {
    return this.run('commit', [path, message, author], options.signal, async () =>
      this.recordCommit(path, message, author)
    );
  }

  private recordCommit(path: string, message: string, author: CommitAuthor): string {
    const worktree = this.requireWorktree(path, 'commit');
    if (worktree.changes.size === 0) {
      return worktree.headSha;
    }

    this.commitCounter += 1;
    const sha = fakeSha(`${worktree.headSha}:${this.commitCounter}:${message}`);
    this.commits.push({ sha, path, message, author, files: [...worktree.changes.keys()].sort() });
    worktree.headSha = sha;
    worktree.changes.clear();
    if (worktree.branch) {
      this.branches.set(worktree.branch, sha);
      this.unmerged.add(worktree.branch);
    }
    return sha;
  }

  headSha(path: string, options: GatewayCallOptions = {}): Promise<string> {
    return this.run('headSha', [path], options.signal, async () => this.requireWorktree(path, 'headSha').headSha);
  }

  private enqueueFault(primitive: GatewayPrimitive, fault: ScriptedFault): void {
    const queue = this.faults.get(primitive) ?? [];
    queue.push(fault);
    this.faults.set(primitive, queue);
  }

  private async run<T>(
    primitive: GatewayPrimitive,
    args: unknown[],
    signal: AbortSignal | undefined,
    body: () => Promise<T>
  ): Promise<T> {
    this.calls.push({ primitive, args });
    this.active += 1;
    try {
      const fault = this.faults.get(primitive)?.shift();
      if (fault?.type === 'fail') throw fault.error;
      if (fault?.type === 'hang') await hangUntilAborted(primitive, signal, fault.settleAfterAbortMs);
      return await body();
    } finally {
      this.active -= 1;
    }
  }

  private requireWorktree(path: string, primitive: string): MemoryWorktree {
    const worktree = this.worktrees.get(path);
    if (!worktree) {
      throw new GatewayError(`'${path}' is not a working tree`, primitive, { retryable: false });
    }
    return worktree;
  }

  private resolveRef(ref: string): string | undefined {
    if (ref === 'HEAD') return this.worktrees.get(this.rootPath)?.headSha;
    if (this.branches.has(ref)) return this.branches.get(ref);
    if (/^[0-9a-f]{40}$/.test(ref)) return ref;
    return undefined;
  }

  private isTracked(worktree: MemoryWorktree, file: string): boolean {
    return this.commits.some((commit) => commit.path === worktree.path && commit.files.includes(file));
  }
}

function hangUntilAborted(primitive: string, signal: AbortSignal | undefined, settleAfterAbortMs: number): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    const settle = () =>
      setTimeout(
        () => reject(new GatewayError(`${primitive} was aborted`, primitive, { retryable: true, timedOut: true })),
        settleAfterAbortMs
      );
    if (!signal) return;
    if (signal.aborted) {
      settle();
      return;
    }
    signal.addEventListener('abort', settle, { once: true });
  });
}

/**
 * Deterministic 40-hex-character commit id for a seed.
 */
export function fakeSha(seed: string): string {
  return createHash('sha1').update(seed).digest('hex');
}
