/**
 * Repository gateway module.
 */

export type {
  ChangeCode,
  CommitAuthor,
  GatewayCallOptions,
  GatewayWorktree,
  RemoveWorktreeOptions,
  RepositoryGateway,
  RepositoryGatewayFactory,
  StatusEntry,
  StatusReport,
} from './types.js';

export {
  GitRepositoryGateway,
  classifyGitFailure,
  createExecGitRunner,
  parseStatus,
  parseWorktreeList,
  type GitGatewayOptions,
  type GitRunner,
  type GitRunOptions,
} from './git-gateway.js';
export { InMemoryRepositoryGateway, fakeSha } from './memory-gateway.js';

import { GitRepositoryGateway } from './git-gateway.js';
import type { RepositoryGatewayFactory } from './types.js';

/**
 * Factory for git-backed gateways with a per-call kill timeout.
 */
export function gitGatewayFactory(timeoutMs: number): RepositoryGatewayFactory {
  return (rootPath) => GitRepositoryGateway.open(rootPath, { timeoutMs });
}
