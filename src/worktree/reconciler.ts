/**
 * Brings the registry back in line with the worktrees the repository reports.
 *
 * The reconciler is the only component allowed to move a record out of
 * `orphaned`. It only considers worktrees under the configured worktree root;
 * the primary checkout and worktrees created elsewhere are never touched.
 */

import type { GatewayWorktree } from '../gateway/types.js';
import { IN_PROGRESS_STATES, type WorktreeRecord } from '../registry/types.js';
import { logger } from '../utils/logger.js';
import { agentIdForPath, isManagedPath, samePath } from './allocation.js';
import { callGateway } from './gateway-call.js';
import { summarizeChanges } from './status-inspector.js';
import type {
  LifecycleContext,
  PendingOperation,
  ReconcileReport,
  ReconcilerOptions,
  RetryOutcome,
} from './types.js';

function emptyReport(): ReconcileReport {
  return {
    purged: [],
    orphaned: [],
    adopted: [],
    removed: [],
    retried: [],
    unresolved: [],
    corrupt: [],
    issues: [],
  };
}

const PENDING_OPERATION: Partial<Record<WorktreeRecord['state'], PendingOperation>> = {
  spawning: 'spawn',
  removing: 'remove',
  committing: 'commit',
};

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Whether a pass changed anything.
 */
export function hasChanges(report: ReconcileReport): boolean {
  return (
    report.purged.length + report.orphaned.length + report.adopted.length + report.removed.length + report.retried.length >
    0
  );
}

export class CleanupReconciler {
  private readonly context: LifecycleContext;
  private readonly options: ReconcilerOptions;
  private readonly now: () => number;

  constructor(context: LifecycleContext, options: ReconcilerOptions) {
    this.context = context;
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  /**
   * Run one reconciliation pass under the structural lock.
   */
  async reconcile(): Promise<ReconcileReport> {
    return this.context.lock.runExclusive('reconcile', () => this.reconcileLocked());
  }

  private async reconcileLocked(): Promise<ReconcileReport> {
    const { registry, gateway, layout } = this.context;
    const report = emptyReport();
    report.corrupt = registry.corruptAgents();

    const worktrees = await callGateway(this.context, { operation: 'reconcile', primitive: 'listWorktrees' }, (signal) =>
      gateway.listWorktrees({ signal })
    );
    const exists = (worktreePath: string): boolean => worktrees.some((worktree) => samePath(worktree.path, worktreePath));

    for (const record of registry.list()) {
      if (!exists(record.path)) {
        await this.attempt(report, record.agentId, async () => {
          await registry.remove(record.agentId, 'reconcile');
          report.purged.push(record.agentId);
        });
      }
    }

    for (const worktree of worktrees.filter((candidate) => isManagedPath(candidate.path, layout))) {
      if (!registry.findByPath(worktree.path)) {
        await this.adoptAsOrphan(report, worktree);
      }
    }

    for (const record of registry.list()) {
      if (IN_PROGRESS_STATES.has(record.state) && this.isStale(record)) {
        report.retried.push(await this.retryPending(report, record));
      }
    }

    for (const record of registry.list()) {
      if (record.state === 'orphaned') {
        await this.resolveOrphan(report, record);
      }
    }

    if (report.corrupt.length > 0) {
      logger.warn(`Skipped corrupt registry entries: ${report.corrupt.join(', ')}`, 'reconcile');
    }
    logger.info('Reconciliation finished', 'reconcile', {
      purged: report.purged.length,
      orphaned: report.orphaned.length,
      adopted: report.adopted.length,
      removed: report.removed.length,
      retried: report.retried.length,
      unresolved: report.unresolved.length,
    });
    return report;
  }

  private isStale(record: WorktreeRecord): boolean {
    return this.now() - record.lastTransitionAt >= this.options.staleAfterMs;
  }

  /**
   * Record a managed worktree nobody owns as `orphaned`.
   */
  private async adoptAsOrphan(report: ReconcileReport, worktree: GatewayWorktree): Promise<void> {
    const { registry, layout } = this.context;
    const agentId = agentIdForPath(worktree.path, layout);
    if (!agentId) {
      report.issues.push({ path: worktree.path, message: 'Directory name is not a valid agent id' });
      return;
    }
    if (registry.isCorrupt(agentId)) {
      return;
    }

    await this.attempt(report, agentId, async () => {
      await registry.insert(
        {
          agentId,
          path: worktree.path,
          branchName: worktree.branch,
          baseRef: worktree.branch || worktree.headSha,
          state: 'orphaned',
          headSha: worktree.headSha,
        },
        'reconcile'
      );
      report.orphaned.push(agentId);
      logger.warn(`Found worktree without a record: ${worktree.path}`, 'reconcile', { agentId });
    });
  }

  /**
   * Retry the operation a stale record was left in once; mark it orphaned if that fails.
   */
  private async retryPending(report: ReconcileReport, record: WorktreeRecord): Promise<RetryOutcome> {
    const { registry, gateway } = this.context;
    const { agentId } = record;
    const operation = PENDING_OPERATION[record.state] ?? 'spawn';
    const scope = { operation: 'reconcile' as const, agentId };

    try {
      switch (operation) {
        case 'spawn': {
          const headSha = await callGateway(this.context, { ...scope, primitive: 'headSha' }, (signal) =>
            gateway.headSha(record.path, { signal })
          );
          await registry.transition(agentId, 'active', { headSha }, { operation: 'reconcile' });
          return { agentId, operation, result: 'active' };
        }
        case 'remove': {
          await callGateway(this.context, { ...scope, primitive: 'removeWorktree' }, (signal) =>
            gateway.removeWorktree(record.path, { force: true, signal })
          );
          await registry.transition(agentId, 'removed', {}, { operation: 'reconcile' });
          await registry.remove(agentId, 'reconcile');
          return { agentId, operation, result: 'purged' };
        }
        case 'commit': {
          const headSha = await callGateway(this.context, { ...scope, primitive: 'headSha' }, (signal) =>
            gateway.headSha(record.path, { signal })
          );
          const statusReport = await callGateway(this.context, { ...scope, primitive: 'status' }, (signal) =>
            gateway.status(record.path, { signal })
          );
          const next = summarizeChanges(statusReport.entries).total === 0 ? 'active' : 'dirty';
          await registry.transition(agentId, next, { headSha }, { operation: 'reconcile' });
          return { agentId, operation, result: next };
        }
      }
    } catch (error) {
      logger.warn(`Retry of pending ${operation} for ${agentId} failed: ${describe(error)}`, 'reconcile');
      report.issues.push({ agentId, path: record.path, message: describe(error) });
    }

    await this.attempt(report, agentId, async () => {
      await registry.transition(agentId, 'orphaned', {}, { operation: 'reconcile', byReconciler: true });
      report.orphaned.push(agentId);
    });
    return { agentId, operation, result: 'orphaned' };
  }

  /**
   * Apply the orphan policy to an orphaned record whose worktree still exists.
   */
  private async resolveOrphan(report: ReconcileReport, record: WorktreeRecord): Promise<void> {
    const { registry, gateway } = this.context;
    const { agentId } = record;
    const transition = { operation: 'reconcile' as const, byReconciler: true };

    switch (this.options.orphanPolicy) {
      case 'report':
        report.unresolved.push(agentId);
        return;
      case 'adopt':
        await this.attempt(report, agentId, async () => {
          const headSha = await callGateway(
            this.context,
            { operation: 'reconcile', agentId, primitive: 'headSha' },
            (signal) => gateway.headSha(record.path, { signal })
          );
          await registry.transition(agentId, 'active', { headSha }, transition);
          report.adopted.push(agentId);
          logger.info(`Adopted orphaned worktree of ${agentId}`, 'reconcile', { path: record.path });
        });
        return;
      case 'remove': {
        const changes = await this.pendingChanges(report, record);
        if (changes !== 0) {
          if (changes !== undefined) {
            logger.warn(`Kept orphaned worktree ${record.path} with ${changes} uncommitted change(s)`, 'reconcile', {
              agentId,
            });
          }
          report.unresolved.push(agentId);
          return;
        }
        await this.attempt(report, agentId, async () => {
          await registry.transition(agentId, 'removing', {}, transition);
          await callGateway(this.context, { operation: 'reconcile', agentId, primitive: 'removeWorktree' }, (signal) =>
            gateway.removeWorktree(record.path, { force: false, signal })
          );
          await registry.transition(agentId, 'removed', {}, transition);
          await registry.remove(agentId, 'reconcile');
          report.removed.push(record.path);
          logger.info(`Removed orphaned worktree ${record.path}`, 'reconcile', { agentId });
        });
        return;
      }
    }
  }

  /**
   * Count uncommitted changes in an orphan's worktree. Undefined when status could
   * not be read; the failure is reported.
   */
  private async pendingChanges(report: ReconcileReport, record: WorktreeRecord): Promise<number | undefined> {
    const { agentId } = record;
    try {
      const statusReport = await callGateway(this.context, { operation: 'reconcile', agentId, primitive: 'status' }, (signal) =>
        this.context.gateway.status(record.path, { signal })
      );
      return summarizeChanges(statusReport.entries).total;
    } catch (error) {
      logger.warn(`Could not inspect orphaned worktree of ${agentId}: ${describe(error)}`, 'reconcile');
      report.issues.push({ agentId, path: record.path, message: describe(error) });
      return undefined;
    }
  }

  /**
   * Run one reconciliation step; a failure is reported and the pass moves on.
   */
  private async attempt(report: ReconcileReport, agentId: string, step: () => Promise<void>): Promise<void> {
    try {
      await step();
    } catch (error) {
      logger.warn(`Reconciliation of ${agentId} failed: ${describe(error)}`, 'reconcile');
      report.issues.push({ agentId, message: describe(error) });
    }
  }
}

export interface ReconcileLoop {
  stop(): void;
}

/**
 * Run `reconciler` every `intervalMs`. A pass still running when the next is due is not overlapped.
 */
export function startReconcileLoop(reconciler: Pick<CleanupReconciler, 'reconcile'>, intervalMs: number): ReconcileLoop {
  let running = false;

  const tick = (): void => {
    if (running) return;
    running = true;
    reconciler
      .reconcile()
      .then((report) => {
        if (hasChanges(report)) {
          logger.info('Periodic reconciliation applied changes', 'reconcile', {
            purged: report.purged,
            orphaned: report.orphaned,
          });
        }
      })
      .catch((error: unknown) => {
        logger.error('Periodic reconciliation failed', 'reconcile', error);
      })
      .finally(() => {
        running = false;
      });
  };

  const timer = setInterval(tick, intervalMs);
  timer.unref();
  return {
    stop: () => clearInterval(timer),
  };
}
