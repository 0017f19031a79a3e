#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { createWarden, resolveRepoPath, type Warden } from './runtime.js';
import { WORKTREE_TOOLS, handleToolCall } from './tools/worktree-handlers.js';
import { logError } from './utils/errors.js';
import { logger } from './utils/logger.js';
import { startReconcileLoop, type ReconcileLoop } from './worktree/index.js';

const REPO_PATH = resolveRepoPath();

let wardenPromise: Promise<Warden> | null = null;
let loop: ReconcileLoop | null = null;

/**
 * Open the repository once; a failed open is retried on the next call.
 */
function getWarden(): Promise<Warden> {
  if (!wardenPromise) {
    wardenPromise = createWarden(REPO_PATH).catch((error: unknown) => {
      wardenPromise = null;
      throw error;
    });
  }
  return wardenPromise;
}

const server = new Server(
  {
    name: 'worktree-warden',
    version: '0.1.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

// List available tools
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: WORKTREE_TOOLS };
});

// Handle tool calls
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  try {
    const warden = await getWarden();
    return await handleToolCall(name, args, { warden });
  } catch (error) {
    logError(error, name);
    return {
      content: [
        {
          type: 'text',
          text: `Error: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
      isError: true,
    };
  }
});

/**
 * Settle whatever a previous process left behind, then keep reconciling if configured.
 */
async function startReconciliation(): Promise<void> {
  const warden = await getWarden();
  const report = await warden.reconciler.reconcile();
  if (report.unresolved.length > 0) {
    logger.warn(`Orphaned worktrees awaiting an operator: ${report.unresolved.join(', ')}`, 'server');
  }
  const intervalMs = warden.config.reconcile.intervalMs;
  if (intervalMs > 0) {
    loop = startReconcileLoop(warden.reconciler, intervalMs);
  }
}

// Start server
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`MCP server started for ${REPO_PATH}`, 'server');

  startReconciliation().catch((error: unknown) => {
    logger.error('Startup reconciliation failed', 'server', error);
  });

  process.on('SIGINT', () => {
    loop?.stop();
    process.exit(0);
  });
}

main().catch((error) => {
  console.error('[warden] Fatal error:', error);
  process.exit(1);
});
