/**
 * Deterministic path and branch allocation for agent worktrees.
 */

import * as path from 'path';
import { WardenError, type Operation } from '../utils/errors.js';

/** Letters, digits, dot, underscore and dash; must start with a letter or digit */
export const AGENT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/;

export interface WorktreeLayout {
  /** Absolute directory holding agent worktrees */
  worktreeRoot: string;
  branchPrefix: string;
}

export interface Allocation {
  path: string;
  branchName: string;
}

/**
 * Why `agentId` cannot name a worktree, or null when it can.
 * Rules cover both directory names and git ref names.
 */
export function agentIdProblem(agentId: string): string | null {
  if (!AGENT_ID_PATTERN.test(agentId)) {
    return 'must be 1-64 characters of letters, digits, ".", "_" or "-", starting with a letter or digit';
  }
  if (agentId.includes('..')) {
    return 'must not contain ".."';
  }
  if (agentId.endsWith('.') || agentId.endsWith('.lock')) {
    return 'must not end with "." or ".lock"';
  }
  return null;
}

export function validateAgentId(agentId: string, operation: Operation): string {
  const problem = agentIdProblem(agentId);
  if (problem) {
    throw new WardenError(`Invalid agent id "${agentId}": ${problem}`, 'validation', {
      agentId,
      operation,
    });
  }
  return agentId;
}

/**
 * Path and branch for an agent. The same id always yields the same pair.
 */
export function allocate(agentId: string, layout: WorktreeLayout): Allocation {
  return {
    path: path.join(layout.worktreeRoot, agentId),
    branchName: `${layout.branchPrefix}${agentId}`,
  };
}

/**
 * Whether `worktreePath` is a direct child of the worktree root.
 */
export function isManagedPath(worktreePath: string, layout: WorktreeLayout): boolean {
  const relative = path.relative(layout.worktreeRoot, path.resolve(worktreePath));
  return relative.length > 0 && !relative.startsWith('..') && !path.isAbsolute(relative) && !relative.includes(path.sep);
}

/**
 * Agent id a managed worktree path was allocated for, if it is a valid one.
 */
export function agentIdForPath(worktreePath: string, layout: WorktreeLayout): string | undefined {
  if (!isManagedPath(worktreePath, layout)) {
    return undefined;
  }
  const candidate = path.basename(worktreePath);
  return agentIdProblem(candidate) === null ? candidate : undefined;
}

export function samePath(a: string, b: string): boolean {
  return path.resolve(a) === path.resolve(b);
}
