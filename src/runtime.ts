/**
 * Composition root: builds the lifecycle components for one primary repository.
 */

import * as path from 'path';
import { loadConfig, type ResolvedConfig } from './config.js';
import { gitGatewayFactory } from './gateway/index.js';
import type { RepositoryGateway, RepositoryGatewayFactory } from './gateway/types.js';
import { FileLock, type ProcessLock } from './lock/process-lock.js';
import { StructuralLock } from './lock/structural-lock.js';
import { FileRegistryStore, type RegistryStore } from './registry/store.js';
import { WorktreeRegistry } from './registry/worktree-registry.js';
import { isWardenError, wrapError } from './utils/errors.js';
import { logger } from './utils/logger.js';
import {
  CleanupReconciler,
  CommitCoordinator,
  StatusInspector,
  WorktreeLifecycleManager,
  type LifecycleContext,
} from './worktree/index.js';

const STRUCTURAL_LOCK_FILE = 'structural.lock';

export interface Warden {
  config: ResolvedConfig;
  gateway: RepositoryGateway;
  registry: WorktreeRegistry;
  lock: StructuralLock;
  manager: WorktreeLifecycleManager;
  inspector: StatusInspector;
  coordinator: CommitCoordinator;
  reconciler: CleanupReconciler;
}

export interface WardenOptions {
  /** Opens the repository (default: git CLI) */
  gatewayFactory?: RepositoryGatewayFactory;
  /** Registry persistence (default: JSON file at the configured registry path) */
  store?: RegistryStore;
  /** Lock shared with other processes (default: lock file beside the registry) */
  processLock?: ProcessLock;
  /** Clock for record timestamps and staleness */
  now?: () => number;
  /** Use this configuration instead of loading it from the repository */
  config?: ResolvedConfig;
}

/**
 * Resolve the repository to operate on: explicit path, then WARDEN_REPO, then cwd.
 */
export function resolveRepoPath(explicit?: string): string {
  return path.resolve(explicit ?? process.env.WARDEN_REPO ?? process.cwd());
}

/**
 * Open a repository and assemble the lifecycle components around it.
 */
export async function createWarden(repoPath: string, options: WardenOptions = {}): Promise<Warden> {
  let config = options.config ?? (await loadConfig(repoPath));
  const factory = options.gatewayFactory ?? gitGatewayFactory(config.gateway.timeoutMs);

  let gateway: RepositoryGateway;
  try {
    gateway = await factory(config.repoRoot);
  } catch (error) {
    if (isWardenError(error)) throw error;
    throw wrapError(`Failed to open repository at ${config.repoRoot}`, 'gateway-failure', error, {
      operation: 'open',
    });
  }

  // A subdirectory was given: configuration lives at the top level
  if (!options.config && path.resolve(gateway.rootPath) !== config.repoRoot) {
    config = await loadConfig(gateway.rootPath);
  }

  const registry = await WorktreeRegistry.open(options.store ?? new FileRegistryStore(config.registryPath), {
    now: options.now,
  });
  const lock = new StructuralLock(gateway.rootPath, {
    processLock: options.processLock ?? new FileLock(path.join(path.dirname(config.registryPath), STRUCTURAL_LOCK_FILE)),
    // Another process may have changed the registry while we waited
    onAcquire: () => registry.refresh(),
  });

  const context: LifecycleContext = {
    gateway,
    registry,
    lock,
    layout: { worktreeRoot: config.worktreeRoot, branchPrefix: config.branchPrefix },
    timeoutMs: config.gateway.timeoutMs,
  };

  const inspector = new StatusInspector(context);
  const manager = new WorktreeLifecycleManager(context, inspector, {
    defaultBaseRef: config.spawn.defaultBaseRef,
    baseRefMismatch: config.spawn.baseRefMismatch,
    deleteBranch: config.nuke.deleteBranch,
  });
  const coordinator = new CommitCoordinator(context, inspector, {
    name: config.commit.authorName,
    email: config.commit.authorEmail,
  });
  const reconciler = new CleanupReconciler(context, {
    orphanPolicy: config.reconcile.orphanPolicy,
    staleAfterMs: config.reconcile.staleAfterMs,
    now: options.now,
  });

  logger.debug(`Opened ${gateway.rootPath}`, 'runtime', {
    registry: registry.location,
    worktreeRoot: config.worktreeRoot,
  });

  return { config, gateway, registry, lock, manager, inspector, coordinator, reconciler };
}
