/**
 * Tool handlers for worktree lifecycle operations.
 */

import { z } from 'zod';
import { WardenError, formatErrorResponse, logError } from '../utils/errors.js';
import {
  formatHandle,
  formatNukeResult,
  formatReconcileReport,
  formatRecordList,
  formatStatus,
  formatSyncResult,
  parseAuthor,
} from '../worktree/index.js';
import { createErrorResponse, createToolResponse, type ToolContext, type ToolResponse } from './types.js';

const SpawnArgsSchema = z.object({
  agent_id: z.string().min(1),
  base_ref: z.string().min(1).optional(),
});

const NukeArgsSchema = z.object({
  agent_id: z.string().min(1),
  force: z.boolean().optional(),
  delete_branch: z.boolean().optional(),
});

const StatusArgsSchema = z.object({
  agent_id: z.string().min(1),
});

const SyncArgsSchema = z.object({
  agent_id: z.string().min(1),
  message: z.string().min(1),
  author: z.string().optional(),
});

export type SpawnWorktreeArgs = z.infer<typeof SpawnArgsSchema>;
export type NukeWorktreeArgs = z.infer<typeof NukeArgsSchema>;
export type WorktreeStatusArgs = z.infer<typeof StatusArgsSchema>;
export type SyncWorktreeArgs = z.infer<typeof SyncArgsSchema>;

/**
 * Validate raw tool arguments against a schema.
 */
function parseArgs<T>(schema: z.ZodType<T>, args: Record<string, unknown> | undefined, tool: string): T {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || 'arguments'}: ${issue.message}`)
      .join('; ');
    throw new WardenError(`Invalid arguments for ${tool}: ${problems}`, 'validation', { context: { tool } });
  }
  return result.data;
}

export function parseSpawnWorktreeArgs(args: Record<string, unknown> | undefined): SpawnWorktreeArgs {
  return parseArgs(SpawnArgsSchema, args, 'spawn_worktree');
}

export function parseNukeWorktreeArgs(args: Record<string, unknown> | undefined): NukeWorktreeArgs {
  return parseArgs(NukeArgsSchema, args, 'nuke_worktree');
}

export function parseWorktreeStatusArgs(args: Record<string, unknown> | undefined): WorktreeStatusArgs {
  return parseArgs(StatusArgsSchema, args, 'worktree_status');
}

export function parseSyncWorktreeArgs(args: Record<string, unknown> | undefined): SyncWorktreeArgs {
  return parseArgs(SyncArgsSchema, args, 'sync_worktree');
}

/**
 * Handle spawn_worktree tool.
 */
export async function handleSpawnWorktree(args: SpawnWorktreeArgs, context: ToolContext): Promise<ToolResponse> {
  const handle = await context.warden.manager.spawn(args.agent_id, { baseRef: args.base_ref });
  return createToolResponse(formatHandle(handle));
}

/**
 * Handle nuke_worktree tool.
 */
export async function handleNukeWorktree(args: NukeWorktreeArgs, context: ToolContext): Promise<ToolResponse> {
  const result = await context.warden.manager.nuke(args.agent_id, {
    force: args.force,
    deleteBranch: args.delete_branch,
  });
  return createToolResponse(formatNukeResult(result));
}

/**
 * Handle worktree_status tool.
 */
export async function handleWorktreeStatus(args: WorktreeStatusArgs, context: ToolContext): Promise<ToolResponse> {
  const status = await context.warden.inspector.status(args.agent_id);
  return createToolResponse(formatStatus(args.agent_id, status));
}

/**
 * Handle sync_worktree tool.
 */
export async function handleSyncWorktree(args: SyncWorktreeArgs, context: ToolContext): Promise<ToolResponse> {
  const author = args.author === undefined ? undefined : parseAuthor(args.author);
  const result = await context.warden.coordinator.sync(args.agent_id, args.message, { author });
  return createToolResponse(formatSyncResult(result));
}

/**
 * Handle reconcile_worktrees tool.
 */
export async function handleReconcileWorktrees(context: ToolContext): Promise<ToolResponse> {
  const report = await context.warden.reconciler.reconcile();
  return createToolResponse(formatReconcileReport(report));
}

/**
 * Handle list_worktrees tool.
 */
export async function handleListWorktrees(context: ToolContext): Promise<ToolResponse> {
  return createToolResponse(formatRecordList(context.warden.manager.list()));
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, { type: string; description: string }>;
    required?: string[];
  };
}

const AGENT_ID_PROPERTY = {
  type: 'string',
  description: 'Agent identifier: letters, digits, ".", "_" or "-"',
};

/**
 * Tool definitions advertised to MCP clients.
 */
export const WORKTREE_TOOLS: ToolDefinition[] = [
  {
    name: 'spawn_worktree',
    description:
      'Create an isolated git worktree for an agent, or return the one it already has. Work inside the returned path.',
    inputSchema: {
      type: 'object',
      properties: {
        agent_id: AGENT_ID_PROPERTY,
        base_ref: { type: 'string', description: 'Ref to branch from (default: configured base ref)' },
      },
      required: ['agent_id'],
    },
  },
  {
    name: 'nuke_worktree',
    description: "Remove an agent's worktree. Refuses when there are uncommitted changes unless force is set.",
    inputSchema: {
      type: 'object',
      properties: {
        agent_id: AGENT_ID_PROPERTY,
        force: { type: 'boolean', description: 'Discard uncommitted changes (default: false)' },
        delete_branch: { type: 'boolean', description: 'Delete the agent branch as well' },
      },
      required: ['agent_id'],
    },
  },
  {
    name: 'worktree_status',
    description: "Show uncommitted changes in an agent's worktree.",
    inputSchema: {
      type: 'object',
      properties: { agent_id: AGENT_ID_PROPERTY },
      required: ['agent_id'],
    },
  },
  {
    name: 'sync_worktree',
    description: "Stage and commit everything pending in an agent's worktree. A clean worktree is a no-op.",
    inputSchema: {
      type: 'object',
      properties: {
        agent_id: AGENT_ID_PROPERTY,
        message: { type: 'string', description: 'Commit message' },
        author: { type: 'string', description: 'Commit author as "Name <email>"' },
      },
      required: ['agent_id', 'message'],
    },
  },
  {
    name: 'reconcile_worktrees',
    description: 'Bring the worktree registry in line with the repository and settle interrupted operations.',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'list_worktrees',
    description: 'List registered agent worktrees and their states.',
    inputSchema: { type: 'object', properties: {} },
  },
];

/**
 * Route a tool call to its handler. Failures become error responses.
 */
export async function handleToolCall(
  name: string,
  args: Record<string, unknown> | undefined,
  context: ToolContext
): Promise<ToolResponse> {
  try {
    switch (name) {
      case 'spawn_worktree':
        return await handleSpawnWorktree(parseSpawnWorktreeArgs(args), context);
      case 'nuke_worktree':
        return await handleNukeWorktree(parseNukeWorktreeArgs(args), context);
      case 'worktree_status':
        return await handleWorktreeStatus(parseWorktreeStatusArgs(args), context);
      case 'sync_worktree':
        return await handleSyncWorktree(parseSyncWorktreeArgs(args), context);
      case 'reconcile_worktrees':
        return await handleReconcileWorktrees(context);
      case 'list_worktrees':
        return await handleListWorktrees(context);
      default:
        throw new WardenError(`Unknown tool: ${name}`, 'validation', { context: { tool: name } });
    }
  } catch (error) {
    logError(error, name);
    return createErrorResponse(formatErrorResponse(error));
  }
}
