/**
 * Command-line surface over the lifecycle core.
 *
 * Exit codes: 0 success (no-ops included), 1 failure, 2 refused because the
 * worktree is dirty, 3 timeout.
 */

import { Command, CommanderError } from 'commander';
import { createWarden, resolveRepoPath, type Warden } from './runtime.js';
import { EXIT_CODES, WardenError, exitCodeFor, formatErrorResponse, type ExitCode } from './utils/errors.js';
import {
  formatHandle,
  formatNukeResult,
  formatReconcileReport,
  formatRecordList,
  formatStatus,
  formatSyncResult,
  parseAuthor,
} from './worktree/index.js';

export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliDeps {
  /** Opens the repository (default: createWarden) */
  open?: (repoPath: string) => Promise<Warden>;
  output?: CliOutput;
}

interface GlobalOptions {
  repo?: string;
  json?: boolean;
}

const processOutput: CliOutput = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

function errorPayload(error: unknown): Record<string, unknown> {
  if (error instanceof WardenError) {
    return {
      error: {
        kind: error.kind,
        message: error.message,
        agentId: error.agentId,
        operation: error.operation,
        context: error.context,
      },
    };
  }
  return { error: { kind: 'internal', message: error instanceof Error ? error.message : String(error) } };
}

/**
 * Parse `argv` (without node and script) and run the command. Resolves with the exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<ExitCode> {
  const output = deps.output ?? processOutput;
  const open = deps.open ?? ((repoPath: string) => createWarden(repoPath));
  let exitCode: ExitCode = EXIT_CODES.success;

  const program = new Command();
  program
    .name('warden')
    .description('Manage isolated git worktrees for concurrent agents')
    .option('-r, --repo <path>', 'Primary repository (default: $WARDEN_REPO or cwd)')
    .option('--json', 'Print machine-readable JSON')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.stdout(text.trimEnd()),
      writeErr: (text) => output.stderr(text.trimEnd()),
    });

  /**
   * Run one command against the opened repository, printing its result or error.
   */
  const run = <T>(operation: (warden: Warden) => Promise<T>, render: (result: T) => string) => {
    return async (): Promise<void> => {
      const globals = program.opts<GlobalOptions>();
      try {
        const warden = await open(resolveRepoPath(globals.repo));
        const result = await operation(warden);
        output.stdout(globals.json ? JSON.stringify(result, null, 2) : render(result));
      } catch (error) {
        exitCode = exitCodeFor(error);
        if (globals.json) {
          output.stdout(JSON.stringify(errorPayload(error), null, 2));
        } else {
          output.stderr(formatErrorResponse(error));
        }
      }
    };
  };

  program
    .command('spawn')
    .description('Create a worktree for an agent, or return its existing one')
    .argument('<agentId>', 'Agent identifier')
    .option('-b, --base <ref>', 'Ref to branch from')
    .action((agentId: string, options: { base?: string }) =>
      run((warden) => warden.manager.spawn(agentId, { baseRef: options.base }), formatHandle)()
    );

  program
    .command('nuke')
    .description("Remove an agent's worktree")
    .argument('<agentId>', 'Agent identifier')
    .option('-f, --force', 'Discard uncommitted changes')
    .option('--delete-branch', 'Delete the agent branch as well')
    .action((agentId: string, options: { force?: boolean; deleteBranch?: boolean }) =>
      run(
        (warden) => warden.manager.nuke(agentId, { force: options.force, deleteBranch: options.deleteBranch }),
        formatNukeResult
      )()
    );

  program
    .command('status')
    .description("Show uncommitted changes in an agent's worktree")
    .argument('<agentId>', 'Agent identifier')
    .action((agentId: string) =>
      run(
        (warden) => warden.inspector.status(agentId),
        (status) => formatStatus(agentId, status)
      )()
    );

  program
    .command('sync')
    .description("Commit everything pending in an agent's worktree")
    .argument('<agentId>', 'Agent identifier')
    .argument('<message>', 'Commit message')
    .option('-a, --author <author>', 'Commit author as "Name <email>"')
    .action((agentId: string, message: string, options: { author?: string }) =>
      run(async (warden) => {
        const author = options.author === undefined ? undefined : parseAuthor(options.author);
        return warden.coordinator.sync(agentId, message, { author });
      }, formatSyncResult)()
    );

  program
    .command('reconcile')
    .description('Bring the registry in line with the repository')
    .action(() => run((warden) => warden.reconciler.reconcile(), formatReconcileReport)());

  program
    .command('list')
    .description('List registered worktrees')
    .action(() => run(async (warden) => warden.manager.list(), formatRecordList)());

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.success : EXIT_CODES.failure;
    }
    throw error;
  }
  return exitCode;
}
