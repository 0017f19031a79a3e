/**
 * Durable record of which agent owns which worktree.
 *
 * The registry owns its record map outright; callers get copies. Every mutation
 * is persisted before the returned promise resolves, so a recorded state always
 * precedes the gateway side effect it announces. Other processes may write the
 * same store: each mutation re-reads it under the store lock and changes only
 * its own agent's record.
 */

import * as path from 'path';
import { z } from 'zod';
import { WardenError, wrapError, type Operation } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { RegistryStore } from './store.js';
import {
  TRANSITIONS,
  WORKTREE_STATES,
  type NewWorktreeRecord,
  type RegistrySnapshot,
  type TransitionPatch,
  type WorktreeRecord,
  type WorktreeState,
} from './types.js';

const RecordSchema = z.object({
  agentId: z.string().min(1),
  path: z.string().min(1),
  branchName: z.string(),
  baseRef: z.string(),
  state: z.enum(WORKTREE_STATES),
  createdAt: z.number(),
  lastTransitionAt: z.number(),
  headSha: z.string().nullable(),
});

const SnapshotSchema = z.object({
  version: z.literal(1),
  updatedAt: z.number(),
  records: z.array(RecordSchema),
});

export interface RegistryOptions {
  /** Clock used for timestamps (default: Date.now) */
  now?: () => number;
}

export interface TransitionOptions {
  /** Required to move a record out of `orphaned` */
  byReconciler?: boolean;
  operation?: Operation;
  /** Leave the record untouched unless it is in one of these states */
  onlyFrom?: readonly WorktreeState[];
}

type RecordChange = { kind: 'put'; record: WorktreeRecord } | { kind: 'delete' } | { kind: 'keep' };

export class WorktreeRegistry {
  private readonly store: RegistryStore;
  private readonly now: () => number;
  private records = new Map<string, WorktreeRecord>();
  /** Records of agents whose entries violate a uniqueness invariant; persisted untouched */
  private quarantined: WorktreeRecord[] = [];
  private readonly corrupt = new Set<string>();
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(store: RegistryStore, options: RegistryOptions) {
    this.store = store;
    this.now = options.now ?? Date.now;
  }

  /**
   * Load the registry from its store.
   * Throws `registry-corruption` when the stored content cannot be parsed.
   */
  static async open(store: RegistryStore, options: RegistryOptions = {}): Promise<WorktreeRegistry> {
    const registry = new WorktreeRegistry(store, options);
    await registry.load();
    return registry;
  }

  /**
   * Pick up changes other processes made to the store.
   */
  refresh(): Promise<void> {
    return this.enqueue(() => this.load());
  }

  get location(): string {
    return this.store.location;
  }

  get(agentId: string): WorktreeRecord | undefined {
    const record = this.records.get(agentId);
    return record ? { ...record } : undefined;
  }

  /**
   * Look up a record the caller is about to act on.
   */
  require(agentId: string, operation: Operation): WorktreeRecord {
    this.assertUsable(agentId, operation);
    const record = this.get(agentId);
    if (!record) {
      throw new WardenError('No worktree is registered for this agent', 'not-found', { agentId, operation });
    }
    return record;
  }

  list(): WorktreeRecord[] {
    return [...this.records.values()]
      .map((record) => ({ ...record }))
      .sort((a, b) => a.createdAt - b.createdAt || a.agentId.localeCompare(b.agentId));
  }

  findByPath(worktreePath: string): WorktreeRecord | undefined {
    const target = path.resolve(worktreePath);
    return this.allLive().find((record) => path.resolve(record.path) === target);
  }

  findByBranch(branchName: string): WorktreeRecord | undefined {
    return this.allLive().find((record) => record.branchName === branchName);
  }

  isCorrupt(agentId: string): boolean {
    return this.corrupt.has(agentId);
  }

  corruptAgents(): string[] {
    return [...this.corrupt].sort();
  }

  /**
   * Refuse work on an agent whose records violate a uniqueness invariant.
   */
  assertUsable(agentId: string, operation: Operation): void {
    if (this.corrupt.has(agentId)) {
      throw new WardenError(
        'Registry records for this agent violate a uniqueness invariant; manual repair required',
        'registry-corruption',
        { agentId, operation, context: { location: this.store.location } }
      );
    }
  }

  /**
   * Throw a collision error when `path` or `branchName` is held by another agent.
   */
  checkAllocation(agentId: string, worktreePath: string, branchName: string, operation: Operation): void {
    const pathHolder = this.findByPath(worktreePath);
    if (pathHolder && pathHolder.agentId !== agentId) {
      throw new WardenError(
        `Path ${worktreePath} is already allocated to agent ${pathHolder.agentId}`,
        'path-collision',
        { agentId, operation, context: { path: worktreePath, holder: pathHolder.agentId } }
      );
    }
    const branchHolder = branchName ? this.findByBranch(branchName) : undefined;
    if (branchHolder && branchHolder.agentId !== agentId) {
      throw new WardenError(
        `Branch ${branchName} is already allocated to agent ${branchHolder.agentId}`,
        'branch-collision',
        { agentId, operation, context: { branchName, holder: branchHolder.agentId } }
      );
    }
  }

  /**
   * Insert a new record and persist it.
   */
  async insert(input: NewWorktreeRecord, operation: Operation): Promise<WorktreeRecord> {
    const record = await this.update(input.agentId, operation, (current) => {
      this.assertUsable(input.agentId, operation);
      if (current) {
        throw new WardenError('A worktree record already exists for this agent', 'invalid-state', {
          agentId: input.agentId,
          operation,
        });
      }
      this.checkAllocation(input.agentId, input.path, input.branchName, operation);

      const timestamp = this.now();
      return {
        kind: 'put',
        record: {
          agentId: input.agentId,
          path: input.path,
          branchName: input.branchName,
          baseRef: input.baseRef,
          state: input.state,
          createdAt: timestamp,
          lastTransitionAt: timestamp,
          headSha: input.headSha ?? null,
        },
      };
    });

    logger.debug(`Registered ${input.agentId} as ${input.state}`, 'registry', { path: input.path });
    return this.existing(record, input.agentId, operation);
  }

  /**
   * Move a record to `to`, enforcing the transition table, and persist it.
   */
  async transition(
    agentId: string,
    to: WorktreeState,
    patch: TransitionPatch = {},
    options: TransitionOptions = {}
  ): Promise<WorktreeRecord> {
    const operation = options.operation ?? 'reconcile';
    const record = await this.update(agentId, operation, () => {
      const current = this.require(agentId, operation);
      if (options.onlyFrom && !options.onlyFrom.includes(current.state)) {
        return { kind: 'keep' };
      }

      if (current.state === 'orphaned' && !options.byReconciler) {
        throw new WardenError('Orphaned records can only be resolved by reconciliation', 'orphan-detected', {
          agentId,
          operation,
        });
      }
      if (current.state !== to && !TRANSITIONS[current.state].includes(to)) {
        throw new WardenError(`Cannot move from ${current.state} to ${to}`, 'invalid-state', {
          agentId,
          operation,
          context: { from: current.state, to },
        });
      }

      if (current.state !== to) {
        logger.debug(`${agentId}: ${current.state} -> ${to}`, 'registry');
      }
      return {
        kind: 'put',
        record: {
          ...current,
          ...(patch.headSha !== undefined ? { headSha: patch.headSha } : {}),
          state: to,
          lastTransitionAt: current.state === to ? current.lastTransitionAt : this.now(),
        },
      };
    });
    return this.existing(record, agentId, operation);
  }

  /**
   * Drop a record (rollback of a failed spawn, or purge after removal) and persist.
   */
  async remove(agentId: string, operation: Operation): Promise<void> {
    await this.update(agentId, operation, (current) => {
      this.assertUsable(agentId, operation);
      if (!current) {
        return { kind: 'keep' };
      }
      logger.debug(`Purged ${agentId}`, 'registry');
      return { kind: 'delete' };
    });
  }

  /**
   * Current content as persisted, quarantined records included.
   */
  snapshot(): RegistrySnapshot {
    return {
      version: 1,
      updatedAt: this.now(),
      records: [...this.list(), ...this.quarantined.map((record) => ({ ...record }))],
    };
  }

  private allLive(): WorktreeRecord[] {
    return [...this.records.values(), ...this.quarantined].filter((record) => record.state !== 'removed');
  }

  private async load(): Promise<void> {
    const raw = await this.store.load();
    if (raw === undefined) {
      this.hydrate([]);
      return;
    }
    const parsed = SnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new WardenError(`Registry at ${this.store.location} does not match the expected format`, 'registry-corruption', {
        operation: 'load',
        context: { location: this.store.location, issues: parsed.error.issues.map((issue) => issue.message) },
      });
    }
    this.hydrate(parsed.data.records);
  }

  private hydrate(records: WorktreeRecord[]): void {
    this.records = new Map();
    this.quarantined = [];
    this.corrupt.clear();

    const live = records.filter((record) => record.state !== 'removed');
    const offenders = new Set<string>();

    for (const key of ['agentId', 'path', 'branchName'] as const) {
      const holders = new Map<string, string[]>();
      for (const record of live) {
        const value = record[key];
        if (!value) continue;
        holders.set(value, [...(holders.get(value) ?? []), record.agentId]);
      }
      for (const agentIds of holders.values()) {
        if (agentIds.length > 1) {
          agentIds.forEach((agentId) => offenders.add(agentId));
        }
      }
    }

    for (const record of live) {
      if (offenders.has(record.agentId)) {
        this.quarantined.push({ ...record });
        this.corrupt.add(record.agentId);
      } else {
        this.records.set(record.agentId, { ...record });
      }
    }

    if (offenders.size > 0) {
      logger.error(
        `Registry ${this.store.location} holds conflicting records for: ${[...offenders].sort().join(', ')}`,
        'registry'
      );
    }
  }

  /**
   * Re-read the store, decide the change against the fresh record, and persist it.
   * Resolves with the agent's record afterwards.
   */
  private update(
    agentId: string,
    operation: Operation,
    decide: (current: WorktreeRecord | undefined) => RecordChange
  ): Promise<WorktreeRecord | undefined> {
    return this.enqueue(() =>
      this.store.withLock(async () => {
        await this.load();
        const previous = this.records.get(agentId);
        const change = decide(previous ? { ...previous } : undefined);
        if (change.kind === 'keep') {
          return previous ? { ...previous } : undefined;
        }

        if (change.kind === 'put') {
          this.records.set(agentId, change.record);
        } else {
          this.records.delete(agentId);
        }
        try {
          await this.store.save(this.snapshot());
        } catch (error) {
          if (previous) {
            this.records.set(agentId, previous);
          } else {
            this.records.delete(agentId);
          }
          throw wrapError(`Failed to persist registry to ${this.store.location}`, 'internal', error, {
            agentId,
            operation,
          });
        }
        return change.kind === 'put' ? { ...change.record } : undefined;
      })
    );
  }

  private existing(record: WorktreeRecord | undefined, agentId: string, operation: Operation): WorktreeRecord {
    if (!record) {
      throw new WardenError('No worktree is registered for this agent', 'not-found', { agentId, operation });
    }
    return record;
  }

  /** Serialize store access from this registry */
  private enqueue<T>(work: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(work);
    this.writeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
