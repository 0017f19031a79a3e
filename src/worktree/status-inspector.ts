/**
 * Read-only view of an agent worktree's uncommitted changes.
 *
 * Runs without the structural lock: it only reads one agent's isolated
 * directory. The record's `active`/`dirty` state is brought in line with what
 * the gateway reports.
 */

import type { StatusEntry } from '../gateway/types.js';
import { WardenError, type Operation } from '../utils/errors.js';
import { validateAgentId } from './allocation.js';
import { callGateway } from './gateway-call.js';
import type { ChangeSummary, LifecycleContext, WorktreeStatus } from './types.js';

export function summarizeChanges(entries: StatusEntry[]): ChangeSummary {
  const summary: ChangeSummary = {
    staged: [],
    modified: [],
    deleted: [],
    untracked: [],
    conflicted: [],
    total: entries.length,
  };

  for (const entry of entries) {
    if (entry.code === 'conflicted') {
      summary.conflicted.push(entry.path);
    } else if (entry.code === 'untracked') {
      summary.untracked.push(entry.path);
    } else if (entry.staged) {
      summary.staged.push(entry.path);
    } else if (entry.code === 'deleted') {
      summary.deleted.push(entry.path);
    } else {
      summary.modified.push(entry.path);
    }
  }

  for (const paths of [summary.staged, summary.modified, summary.deleted, summary.untracked, summary.conflicted]) {
    paths.sort();
  }
  return summary;
}

/**
 * Render a change summary as indented lines, one group per kind.
 */
export function formatChangeSummary(summary: ChangeSummary): string {
  const groups: Array<[string, string[]]> = [
    ['staged', summary.staged],
    ['modified', summary.modified],
    ['deleted', summary.deleted],
    ['untracked', summary.untracked],
    ['conflicted', summary.conflicted],
  ];

  return groups
    .filter(([, paths]) => paths.length > 0)
    .map(([label, paths]) => `  ${label} (${paths.length}): ${paths.join(', ')}`)
    .join('\n');
}

export class StatusInspector {
  private readonly context: LifecycleContext;

  constructor(context: LifecycleContext) {
    this.context = context;
  }

  /**
   * Report whether the agent's worktree has uncommitted changes.
   */
  async status(agentId: string): Promise<WorktreeStatus> {
    validateAgentId(agentId, 'status');
    const { registry } = this.context;
    await registry.refresh();
    const record = registry.require(agentId, 'status');

    if (record.state === 'orphaned') {
      throw new WardenError('Worktree is orphaned and awaits reconciliation', 'orphan-detected', {
        agentId,
        operation: 'status',
      });
    }
    if (record.state !== 'active' && record.state !== 'dirty' && record.state !== 'committing') {
      throw new WardenError(`Worktree is ${record.state}; status is unavailable`, 'invalid-state', {
        agentId,
        operation: 'status',
        context: { state: record.state },
      });
    }

    const summary = await this.inspect(agentId, record.path, 'status');

    const next = summary.total === 0 ? 'active' : 'dirty';
    if (registry.get(agentId)?.state !== next) {
      // A commit in flight, or any other process's change since, owns the record's state
      await registry.transition(agentId, next, {}, { operation: 'status', onlyFrom: ['active', 'dirty'] });
    }

    return summary.total === 0 ? { kind: 'clean' } : { kind: 'dirty', summary };
  }

  /**
   * Change summary of a worktree path, without touching the registry.
   */
  async inspect(agentId: string, worktreePath: string, operation: Operation): Promise<ChangeSummary> {
    const report = await callGateway(this.context, { operation, agentId, primitive: 'status' }, (signal) =>
      this.context.gateway.status(worktreePath, { signal })
    );
    return summarizeChanges(report.entries);
  }
}
