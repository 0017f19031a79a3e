/**
 * Human-readable rendering of lifecycle results.
 */

import type { WorktreeRecord } from '../registry/types.js';
import { formatChangeSummary } from './status-inspector.js';
import type { NukeResult, ReconcileReport, SyncResult, WorktreeHandle, WorktreeStatus } from './types.js';

function shortSha(sha: string | null): string {
  return sha ? sha.slice(0, 12) : 'unknown';
}

export function formatHandle(handle: WorktreeHandle): string {
  const parts: string[] = [];
  parts.push(`## Worktree: ${handle.agentId}`);
  parts.push(`**Path:** ${handle.path}`);
  parts.push(`**Branch:** ${handle.branchName}`);
  parts.push(`**Base:** ${handle.baseRef}`);
  parts.push(`**Commit:** ${shortSha(handle.headSha)}`);
  parts.push('\n**Usage:** Spawn agent with `cwd: "' + handle.path + '"`');
  return parts.join('\n');
}

/**
 * Format registered worktrees for display.
 */
export function formatRecordList(records: WorktreeRecord[]): string {
  if (records.length === 0) {
    return 'No agent worktrees registered.';
  }

  const parts: string[] = [];
  parts.push(`Found ${records.length} worktree(s):\n`);
  for (const record of records) {
    parts.push(`- **${record.agentId}** on \`${record.branchName}\` (${record.state}) at ${shortSha(record.headSha)}`);
    parts.push(`  Path: ${record.path}`);
  }
  return parts.join('\n');
}

export function formatStatus(agentId: string, status: WorktreeStatus): string {
  if (status.kind === 'clean') {
    return `Worktree of ${agentId} is clean.`;
  }
  return `Worktree of ${agentId} has ${status.summary.total} uncommitted change(s):\n${formatChangeSummary(status.summary)}`;
}

export function formatSyncResult(result: SyncResult): string {
  if (!result.committed) {
    return `Nothing to commit for ${result.agentId}; head is ${result.headSha}`;
  }
  return `Committed changes of ${result.agentId} as ${result.headSha}`;
}

export function formatNukeResult(result: NukeResult): string {
  if (result.alreadyAbsent) {
    return `No worktree registered for ${result.agentId}; nothing to remove.`;
  }
  return `Removed worktree of ${result.agentId} at ${result.path ?? 'unknown path'}`;
}

/**
 * Format a reconciliation report, one line per non-empty category.
 */
export function formatReconcileReport(report: ReconcileReport): string {
  const lines: string[] = ['## Reconciliation'];
  const categories: Array<[string, string[]]> = [
    ['Purged', report.purged],
    ['Orphaned', report.orphaned],
    ['Adopted', report.adopted],
    ['Removed', report.removed],
    ['Unresolved orphans', report.unresolved],
    ['Corrupt (skipped)', report.corrupt],
  ];

  for (const [label, items] of categories) {
    if (items.length > 0) {
      lines.push(`**${label}:** ${items.join(', ')}`);
    }
  }
  for (const retry of report.retried) {
    lines.push(`**Retried:** ${retry.agentId} (${retry.operation} -> ${retry.result})`);
  }
  for (const issue of report.issues) {
    lines.push(`- ${issue.agentId ?? issue.path ?? 'repository'}: ${issue.message}`);
  }

  if (lines.length === 1) {
    lines.push('Registry and repository agree; nothing to do.');
  }
  return lines.join('\n');
}
