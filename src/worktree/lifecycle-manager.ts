/**
 * Worktree lifecycle management for parallel agent isolation.
 *
 * Creates and destroys one worktree per agent under the structural lock. Intent
 * is recorded in the registry before every gateway side effect, so an
 * interrupted operation always leaves a record the reconciler can finish.
 */

import type { GatewayWorktree } from '../gateway/types.js';
import type { WorktreeRecord } from '../registry/types.js';
import { WardenError, isWardenError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { allocate, samePath, validateAgentId } from './allocation.js';
import { callGateway, isDeferrable } from './gateway-call.js';
import { formatChangeSummary, type StatusInspector } from './status-inspector.js';
import type {
  LifecycleContext,
  ManagerOptions,
  NukeOptions,
  NukeResult,
  SpawnOptions,
  WorktreeHandle,
} from './types.js';

export function toHandle(record: WorktreeRecord): WorktreeHandle {
  return {
    agentId: record.agentId,
    path: record.path,
    branchName: record.branchName,
    baseRef: record.baseRef,
    headSha: record.headSha,
  };
}

export class WorktreeLifecycleManager {
  private readonly context: LifecycleContext;
  private readonly inspector: StatusInspector;
  private readonly options: ManagerOptions;

  constructor(context: LifecycleContext, inspector: StatusInspector, options: ManagerOptions) {
    this.context = context;
    this.inspector = inspector;
    this.options = options;
  }

  /**
   * Create a worktree for an agent, or return the one it already has.
   */
  async spawn(agentId: string, options: SpawnOptions = {}): Promise<WorktreeHandle> {
    validateAgentId(agentId, 'spawn');
    return this.context.lock.runExclusive(`spawn ${agentId}`, () => this.spawnLocked(agentId, options));
  }

  /**
   * Remove an agent's worktree. Succeeds when there is nothing to remove.
   */
  async nuke(agentId: string, options: NukeOptions = {}): Promise<NukeResult> {
    validateAgentId(agentId, 'nuke');
    return this.context.lock.runExclusive(`nuke ${agentId}`, () => this.nukeLocked(agentId, options));
  }

  get(agentId: string): WorktreeRecord | undefined {
    return this.context.registry.get(agentId);
  }

  list(): WorktreeRecord[] {
    return this.context.registry.list();
  }

  private async spawnLocked(agentId: string, options: SpawnOptions): Promise<WorktreeHandle> {
    const { registry, gateway, layout } = this.context;
    registry.assertUsable(agentId, 'spawn');

    const existing = registry.get(agentId);
    if (existing) {
      return this.reuse(existing, options.baseRef);
    }

    const baseRef = options.baseRef ?? this.options.defaultBaseRef;
    const { path, branchName } = allocate(agentId, layout);
    registry.checkAllocation(agentId, path, branchName, 'spawn');

    const worktrees = await callGateway(this.context, { operation: 'spawn', agentId, primitive: 'listWorktrees' }, (signal) =>
      gateway.listWorktrees({ signal })
    );
    assertNoGatewayCollision(agentId, path, branchName, worktrees);

    await registry.insert({ agentId, path, branchName, baseRef, state: 'spawning' }, 'spawn');

    try {
      await callGateway(this.context, { operation: 'spawn', agentId, primitive: 'createWorktree' }, (signal) =>
        gateway.createWorktree(path, branchName, baseRef, { signal })
      );
    } catch (error) {
      if (isDeferrable(error)) {
        logger.warn(`Spawn of ${agentId} left pending for reconciliation`, 'lifecycle', { kind: error.kind });
        throw error;
      }
      if (isWardenError(error, 'branch-collision') || isWardenError(error, 'path-collision')) {
        // git refused before creating anything; the path or branch it found belongs to someone else
        await registry.remove(agentId, 'spawn');
        logger.warn(`Spawn of ${agentId} refused: ${error.message}`, 'lifecycle');
        throw error;
      }
      await this.rollbackSpawn(agentId, path);
      throw error;
    }

    // Worktree exists from here on; a failure leaves `spawning` for the reconciler to complete
    const headSha = await callGateway(this.context, { operation: 'spawn', agentId, primitive: 'headSha' }, (signal) =>
      gateway.headSha(path, { signal })
    );
    const record = await registry.transition(agentId, 'active', { headSha }, { operation: 'spawn' });

    logger.info(`Spawned worktree for ${agentId}`, 'lifecycle', { path, branchName, baseRef });
    return toHandle(record);
  }

  private reuse(existing: WorktreeRecord, requestedBaseRef: string | undefined): WorktreeHandle {
    const { agentId } = existing;

    if (existing.state === 'orphaned') {
      throw new WardenError('Worktree is orphaned and awaits reconciliation', 'orphan-detected', {
        agentId,
        operation: 'spawn',
      });
    }
    if (existing.state === 'spawning' || existing.state === 'removing') {
      throw new WardenError(`Worktree is ${existing.state}; run reconcile to settle it`, 'invalid-state', {
        agentId,
        operation: 'spawn',
        context: { state: existing.state },
      });
    }

    if (requestedBaseRef !== undefined && requestedBaseRef !== existing.baseRef) {
      if (this.options.baseRefMismatch === 'reject') {
        throw new WardenError(
          `Worktree exists from base ${existing.baseRef}, not ${requestedBaseRef}`,
          'base-ref-mismatch',
          { agentId, operation: 'spawn', context: { recorded: existing.baseRef, requested: requestedBaseRef } }
        );
      }
      logger.warn(`Reusing worktree of ${agentId} created from ${existing.baseRef}`, 'lifecycle', {
        requested: requestedBaseRef,
      });
    }

    logger.debug(`Returning existing worktree for ${agentId}`, 'lifecycle');
    return toHandle(existing);
  }

  /**
   * Undo a spawn whose create primitive failed fatally. Filesystem cleanup runs
   * before the record goes, so a crash in between still leaves a record to purge.
   */
  private async rollbackSpawn(agentId: string, path: string): Promise<void> {
    try {
      await callGateway(this.context, { operation: 'spawn', agentId, primitive: 'removeWorktree' }, (signal) =>
        this.context.gateway.removeWorktree(path, { force: true, signal })
      );
    } catch (cleanupError) {
      const message = cleanupError instanceof Error ? cleanupError.message : String(cleanupError);
      logger.warn(`Cleanup after failed spawn of ${agentId} did not complete: ${message}`, 'lifecycle');
    }
    await this.context.registry.remove(agentId, 'spawn');
    logger.debug(`Rolled back spawn of ${agentId}`, 'lifecycle');
  }

  private async nukeLocked(agentId: string, options: NukeOptions): Promise<NukeResult> {
    const { registry, gateway } = this.context;
    registry.assertUsable(agentId, 'nuke');

    const record = registry.get(agentId);
    if (!record) {
      logger.debug(`Nothing to remove for ${agentId}`, 'lifecycle');
      return { agentId, removed: false, alreadyAbsent: true };
    }

    if (record.state === 'orphaned') {
      throw new WardenError('Worktree is orphaned and awaits reconciliation', 'orphan-detected', {
        agentId,
        operation: 'nuke',
      });
    }
    if (record.state === 'spawning') {
      throw new WardenError('Worktree is still spawning; run reconcile to settle it', 'invalid-state', {
        agentId,
        operation: 'nuke',
        context: { state: record.state },
      });
    }

    const force = options.force ?? false;
    const deleteBranch = options.deleteBranch ?? this.options.deleteBranch;

    if (record.state !== 'removing') {
      if (!force) {
        await this.refuseIfDirty(record);
      }
      await registry.transition(agentId, 'removing', {}, { operation: 'nuke' });
    }

    try {
      await callGateway(this.context, { operation: 'nuke', agentId, primitive: 'removeWorktree' }, (signal) =>
        gateway.removeWorktree(record.path, { force, branch: deleteBranch ? record.branchName : undefined, signal })
      );
    } catch (error) {
      logger.warn(`Removal of ${agentId} left pending for reconciliation`, 'lifecycle', { path: record.path });
      throw error;
    }

    await registry.transition(agentId, 'removed', {}, { operation: 'nuke' });
    await registry.remove(agentId, 'nuke');

    logger.info(`Removed worktree for ${agentId}`, 'lifecycle', { path: record.path });
    return { agentId, removed: true, alreadyAbsent: false, path: record.path, branchName: record.branchName };
  }

  private async refuseIfDirty(record: WorktreeRecord): Promise<void> {
    const { agentId } = record;
    const worktrees = await callGateway(this.context, { operation: 'nuke', agentId, primitive: 'listWorktrees' }, (signal) =>
      this.context.gateway.listWorktrees({ signal })
    );
    // A worktree already gone from disk has nothing left to lose
    if (!worktrees.some((worktree) => samePath(worktree.path, record.path))) {
      return;
    }

    const summary = await this.inspector.inspect(agentId, record.path, 'nuke');
    if (summary.total > 0) {
      throw new WardenError(
        `Worktree has ${summary.total} uncommitted change(s); use force to discard them`,
        'dirty-worktree',
        { agentId, operation: 'nuke', context: { path: record.path, summary: formatChangeSummary(summary) } }
      );
    }
  }
}

function assertNoGatewayCollision(
  agentId: string,
  path: string,
  branchName: string,
  worktrees: GatewayWorktree[]
): void {
  const atPath = worktrees.find((worktree) => samePath(worktree.path, path));
  if (atPath) {
    throw new WardenError(`Path ${path} already holds a worktree unknown to the registry`, 'path-collision', {
      agentId,
      operation: 'spawn',
      context: { path, branch: atPath.branch },
    });
  }
  const onBranch = worktrees.find((worktree) => worktree.branch === branchName);
  if (onBranch) {
    throw new WardenError(`Branch ${branchName} is checked out at ${onBranch.path}`, 'branch-collision', {
      agentId,
      operation: 'spawn',
      context: { branchName, path: onBranch.path },
    });
  }
}
