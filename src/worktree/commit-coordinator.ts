/**
 * Stages and commits an agent's pending changes.
 *
 * Runs without the structural lock. Two syncs of the same agent must be
 * serialized by the caller.
 */

import { WardenError, isWardenError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { validateAgentId } from './allocation.js';
import { callGateway } from './gateway-call.js';
import type { StatusInspector } from './status-inspector.js';
import type { CommitAuthor, LifecycleContext, SyncOptions, SyncResult } from './types.js';

const AUTHOR_PATTERN = /^\s*([^<>]+?)\s*<([^<>\s]+@[^<>\s]+)>\s*$/;

/**
 * Parse a `Name <email>` author string.
 */
export function parseAuthor(value: string): CommitAuthor {
  const match = AUTHOR_PATTERN.exec(value);
  if (!match) {
    throw new WardenError(`Invalid author "${value}": expected "Name <email>"`, 'validation', {
      operation: 'sync',
    });
  }
  return { name: match[1], email: match[2] };
}

export class CommitCoordinator {
  private readonly context: LifecycleContext;
  private readonly inspector: StatusInspector;
  private readonly defaultAuthor: CommitAuthor;

  constructor(context: LifecycleContext, inspector: StatusInspector, defaultAuthor: CommitAuthor) {
    this.context = context;
    this.inspector = inspector;
    this.defaultAuthor = defaultAuthor;
  }

  /**
   * Commit everything pending in the agent's worktree.
   * A clean worktree returns the previous head unchanged.
   */
  async sync(agentId: string, message: string, options: SyncOptions = {}): Promise<SyncResult> {
    validateAgentId(agentId, 'sync');
    if (message.trim().length === 0) {
      throw new WardenError('Commit message must not be empty', 'validation', { agentId, operation: 'sync' });
    }

    const { registry, gateway } = this.context;
    await registry.refresh();
    const record = registry.require(agentId, 'sync');

    if (record.state === 'orphaned') {
      throw new WardenError('Worktree is orphaned and awaits reconciliation', 'orphan-detected', {
        agentId,
        operation: 'sync',
      });
    }
    if (record.state !== 'active' && record.state !== 'dirty') {
      throw new WardenError(`Worktree is ${record.state}; cannot commit`, 'invalid-state', {
        agentId,
        operation: 'sync',
        context: { state: record.state },
      });
    }

    const summary = await this.inspector.inspect(agentId, record.path, 'sync');
    if (summary.total === 0) {
      const headSha =
        record.headSha ??
        (await callGateway(this.context, { operation: 'sync', agentId, primitive: 'headSha' }, (signal) =>
          gateway.headSha(record.path, { signal })
        ));
      if (record.state === 'dirty' || record.headSha === null) {
        await registry.transition(agentId, 'active', { headSha }, { operation: 'sync' });
      }
      logger.debug(`Nothing to commit for ${agentId}`, 'commit');
      return { agentId, headSha, committed: false };
    }

    await registry.transition(agentId, 'committing', {}, { operation: 'sync' });

    const author = options.author ?? this.defaultAuthor;
    let headSha: string;
    try {
      headSha = await callGateway(this.context, { operation: 'sync', agentId, primitive: 'commit' }, (signal) =>
        gateway.commit(record.path, message, author, { signal })
      );
    } catch (error) {
      if (isWardenError(error, 'timeout')) {
        logger.warn(`Commit of ${agentId} left pending for reconciliation`, 'commit');
        throw error;
      }
      await registry.transition(agentId, 'dirty', {}, { operation: 'sync' });
      throw error;
    }

    await registry.transition(agentId, 'active', { headSha }, { operation: 'sync' });
    logger.info(`Committed ${summary.total} change(s) for ${agentId}`, 'commit', { headSha });
    return { agentId, headSha, committed: headSha !== record.headSha };
  }
}
