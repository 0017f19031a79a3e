/**
 * Git-backed RepositoryGateway.
 *
 * Drives the git CLI with array arguments, one subprocess per call, each bounded
 * by a kill timeout.
 */

import { execFile } from 'child_process';
import { GatewayError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type {
  ChangeCode,
  CommitAuthor,
  GatewayCallOptions,
  GatewayWorktree,
  RemoveWorktreeOptions,
  RepositoryGateway,
  StatusEntry,
  StatusReport,
} from './types.js';

export interface GitRunOptions {
  /** Primitive named in failures */
  primitive: string;
  signal?: AbortSignal;
}

/**
 * Runs git with the given arguments in a directory and resolves with stdout.
 * An aborted run settles only after the subprocess has exited.
 */
export type GitRunner = (args: string[], cwd: string, options: GitRunOptions) => Promise<string>;

export interface GitGatewayOptions {
  /** Kill timeout for each git subprocess (default: 30000) */
  timeoutMs?: number;
  /** Command runner (for testing) */
  runner?: GitRunner;
}

const DEFAULT_TIMEOUT_MS = 30000;
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

/** stderr fragments that indicate contention rather than a permanent failure */
const TRANSIENT_PATTERNS = [
  /index\.lock/i,
  /unable to create '.*\.lock'/i,
  /could not lock/i,
  /another git process seems to be running/i,
  /resource temporarily unavailable/i,
];

const BRANCH_EXISTS_PATTERN = /a branch named '.*' already exists/i;
const PATH_EXISTS_PATTERN = /'.*' already exists/i;

const NOT_A_WORKTREE_PATTERNS = [/is not a working tree/i, /not a working tree/i, /no such file or directory/i];

interface ExecFailure {
  name?: string;
  message: string;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
  code?: number | string | null;
}

/**
 * Classify a failed git invocation as transient, timed out, or fatal.
 */
export function classifyGitFailure(primitive: string, failure: ExecFailure, stderr: string): GatewayError {
  const detail = stderr.trim() || failure.message;

  if (failure.killed || failure.name === 'AbortError') {
    return new GatewayError(`git ${primitive} timed out: ${detail}`, primitive, {
      retryable: true,
      timedOut: true,
    });
  }

  const retryable = TRANSIENT_PATTERNS.some((pattern) => pattern.test(detail));
  return new GatewayError(`git ${primitive} failed: ${detail}`, primitive, {
    retryable,
    cause: new Error(failure.message),
  });
}

/**
 * Create a runner that shells out to git via execFile.
 */
export function createExecGitRunner(timeoutMs: number = DEFAULT_TIMEOUT_MS): GitRunner {
  return (args, cwd, { primitive, signal }) =>
    new Promise((resolve, reject) => {
      const child = execFile(
        'git',
        args,
        { cwd, timeout: timeoutMs, maxBuffer: MAX_OUTPUT_BYTES, encoding: 'utf8', signal },
        (error, stdout, stderr) => {
          if (!error) {
            resolve(stdout);
            return;
          }
          const failure = classifyGitFailure(primitive, error, stderr);
          if (child.exitCode !== null || child.signalCode !== null) {
            reject(failure);
            return;
          }
          // Aborted: the process may still be writing to the worktree
          child.once('exit', () => reject(failure));
        }
      );
    });
}

/**
 * Parse `git worktree list --porcelain` output. Bare entries are skipped.
 */
export function parseWorktreeList(output: string): GatewayWorktree[] {
  const worktrees: GatewayWorktree[] = [];

  for (const block of output.split(/\n\s*\n/)) {
    let path = '';
    let branch = '';
    let headSha = '';
    let bare = false;

    for (const line of block.split('\n')) {
      if (line.startsWith('worktree ')) {
        path = line.slice('worktree '.length);
      } else if (line.startsWith('HEAD ')) {
        headSha = line.slice('HEAD '.length);
      } else if (line.startsWith('branch ')) {
        branch = line.slice('branch '.length).replace(/^refs\/heads\//, '');
      } else if (line === 'bare') {
        bare = true;
      }
    }

    if (path && !bare) {
      worktrees.push({ path, branch, headSha });
    }
  }

  return worktrees;
}

const CONFLICT_CODES = new Set(['DD', 'AU', 'UD', 'UA', 'DU', 'AA', 'UU']);

const STAGED_CODES: Record<string, ChangeCode> = {
  A: 'added',
  C: 'added',
  M: 'modified',
  T: 'modified',
  D: 'deleted',
  R: 'renamed',
};

const UNSTAGED_CODES: Record<string, ChangeCode> = {
  M: 'modified',
  T: 'modified',
  D: 'deleted',
};

/**
 * Parse `git status --porcelain=v1 -z` output into status entries.
 * A path with both staged and unstaged changes yields two entries.
 */
export function parseStatus(output: string): StatusReport {
  const entries: StatusEntry[] = [];
  const tokens = output.split('\0');

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.length < 4) continue;

    const xy = token.slice(0, 2);
    const path = token.slice(3);
    // Renames and copies are followed by their source path
    if (xy[0] === 'R' || xy[0] === 'C') i++;

    if (xy === '!!') continue;
    if (xy === '??') {
      entries.push({ path, code: 'untracked', staged: false });
      continue;
    }
    if (CONFLICT_CODES.has(xy)) {
      entries.push({ path, code: 'conflicted', staged: false });
      continue;
    }

    const stagedCode = STAGED_CODES[xy[0]];
    if (stagedCode) {
      entries.push({ path, code: stagedCode, staged: true });
    }
    const unstagedCode = UNSTAGED_CODES[xy[1]];
    if (unstagedCode) {
      entries.push({ path, code: unstagedCode, staged: false });
    }
  }

  return { entries };
}

/**
 * RepositoryGateway backed by the git CLI.
 */
export class GitRepositoryGateway implements RepositoryGateway {
  readonly rootPath: string;
  private readonly git: GitRunner;

  constructor(rootPath: string, options: GitGatewayOptions = {}) {
    this.rootPath = rootPath;
    this.git = options.runner ?? createExecGitRunner(options.timeoutMs);
  }

  /**
   * Open the repository containing `rootPath`, resolving it to its top level.
   */
  static async open(rootPath: string, options: GitGatewayOptions = {}): Promise<GitRepositoryGateway> {
    const runner = options.runner ?? createExecGitRunner(options.timeoutMs);
    const toplevel = (await runner(['rev-parse', '--show-toplevel'], rootPath, { primitive: 'open' })).trim();
    return new GitRepositoryGateway(toplevel || rootPath, { ...options, runner });
  }

  async listWorktrees(options: GatewayCallOptions = {}): Promise<GatewayWorktree[]> {
    const output = await this.git(['worktree', 'list', '--porcelain'], this.rootPath, {
      primitive: 'listWorktrees',
      signal: options.signal,
    });
    return parseWorktreeList(output);
  }

  async createWorktree(path: string, branch: string, baseRef: string, options: GatewayCallOptions = {}): Promise<void> {
    try {
      await this.git(['worktree', 'add', '-b', branch, path, baseRef], this.rootPath, {
        primitive: 'createWorktree',
        signal: options.signal,
      });
    } catch (error) {
      if (!(error instanceof GatewayError)) throw error;
      const collision = BRANCH_EXISTS_PATTERN.test(error.message)
        ? 'branch'
        : PATH_EXISTS_PATTERN.test(error.message)
          ? 'path'
          : undefined;
      if (!collision) throw error;
      throw new GatewayError(error.message, error.primitive, { retryable: false, collision, cause: error });
    }
  }

  async removeWorktree(path: string, options: RemoveWorktreeOptions = {}): Promise<void> {
    const run = { primitive: 'removeWorktree', signal: options.signal };
    const args = ['worktree', 'remove'];
    if (options.force) args.push('--force');
    args.push(path);

    try {
      await this.git(args, this.rootPath, run);
    } catch (error) {
      if (!(error instanceof GatewayError) || !NOT_A_WORKTREE_PATTERNS.some((p) => p.test(error.message))) {
        throw error;
      }
      // Directory already gone: drop git's stale administrative entry instead
      await this.git(['worktree', 'prune'], this.rootPath, run);
      const remaining = await this.listWorktrees({ signal: options.signal });
      if (remaining.some((worktree) => worktree.path === path)) {
        throw error;
      }
    }

    if (options.branch) {
      try {
        // -d keeps a branch holding unmerged commits; only force discards them
        await this.git(['branch', options.force ? '-D' : '-d', options.branch], this.rootPath, run);
      } catch (error) {
        logger.warn(`Kept branch ${options.branch}`, 'git', {
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  async status(path: string, options: GatewayCallOptions = {}): Promise<StatusReport> {
    const output = await this.git(['status', '--porcelain=v1', '-z', '--untracked-files=all'], path, {
      primitive: 'status',
      signal: options.signal,
    });
    return parseStatus(output);
  }

  async commit(path: string, message: string, author: CommitAuthor, options: GatewayCallOptions = {}): Promise<string> {
    const run = { primitive: 'commit', signal: options.signal };
    await this.git(['add', '-A'], path, run);
    await this.git(
      ['-c', `user.name=${author.name}`, '-c', `user.email=${author.email}`, 'commit', '-m', message],
      path,
      run
    );
    return this.headSha(path, options);
  }

  async headSha(path: string, options: GatewayCallOptions = {}): Promise<string> {
    const output = await this.git(['rev-parse', 'HEAD'], path, { primitive: 'headSha', signal: options.signal });
    return output.trim();
  }
}
