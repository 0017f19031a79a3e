import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryRegistryStore } from '../../registry/store.js';
import { WorktreeRegistry } from '../../registry/worktree-registry.js';
import type { NewWorktreeRecord } from '../../registry/types.js';
import { WardenError } from '../../utils/errors.js';
import {
  WORKTREE_ROOT,
  createClock,
  createRecord,
  rejectionOf,
  snapshotOf,
  type TestClock,
} from '../mocks/warden.mock.js';

function newRecord(agentId: string, overrides: Partial<NewWorktreeRecord> = {}): NewWorktreeRecord {
  return {
    agentId,
    path: `${WORKTREE_ROOT}/${agentId}`,
    branchName: `agent/${agentId}`,
    baseRef: 'main',
    state: 'spawning',
    ...overrides,
  };
}

function thrownBy(action: () => unknown): WardenError {
  try {
    action();
  } catch (error) {
    if (error instanceof WardenError) return error;
    throw error;
  }
  throw new Error('expected action to throw');
}

describe('WorktreeRegistry', () => {
  let store: MemoryRegistryStore;
  let clock: TestClock;
  let registry: WorktreeRegistry;

  beforeEach(async () => {
    store = new MemoryRegistryStore();
    clock = createClock();
    registry = await WorktreeRegistry.open(store, { now: clock.now });
  });

  describe('insert', () => {
    it('should persist a new record before resolving', async () => {
      const record = await registry.insert(newRecord('a1'), 'spawn');

      expect(record).toEqual(createRecord('a1', { state: 'spawning' }));
      expect(store.saveCount).toBe(1);
      expect(store.peek()?.records).toEqual([createRecord('a1', { state: 'spawning' })]);
    });

    it('should refuse a second record for the same agent', async () => {
      await registry.insert(newRecord('a1'), 'spawn');

      const error = await rejectionOf(registry.insert(newRecord('a1'), 'spawn'));
      expect(error.kind).toBe('invalid-state');
    });

    it('should refuse a path held by another agent', async () => {
      await registry.insert(newRecord('a1'), 'spawn');

      const error = await rejectionOf(
        registry.insert(newRecord('b2', { path: `${WORKTREE_ROOT}/a1` }), 'spawn')
      );
      expect(error.kind).toBe('path-collision');
      expect(error.message).toBe(`spawn b2: Path ${WORKTREE_ROOT}/a1 is already allocated to agent a1 (path-collision)`);
      expect(registry.get('b2')).toBeUndefined();
    });

    it('should refuse a branch held by another agent', async () => {
      await registry.insert(newRecord('a1'), 'spawn');

      const error = await rejectionOf(registry.insert(newRecord('b2', { branchName: 'agent/a1' }), 'spawn'));
      expect(error.kind).toBe('branch-collision');
    });
  });

  describe('transition', () => {
    it('should follow the transition table and stamp the change', async () => {
      await registry.insert(newRecord('a1'), 'spawn');
      clock.advance(500);

      const record = await registry.transition('a1', 'active', { headSha: 'abc' }, { operation: 'spawn' });

      expect(record.state).toBe('active');
      expect(record.headSha).toBe('abc');
      expect(record.createdAt).toBe(1000);
      expect(record.lastTransitionAt).toBe(1500);
    });

    it('should reject moves outside the table', async () => {
      await registry.insert(newRecord('a1'), 'spawn');

      const error = await rejectionOf(registry.transition('a1', 'dirty', {}, { operation: 'status' }));

      expect(error.kind).toBe('invalid-state');
      expect(error.message).toBe('status a1: Cannot move from spawning to dirty (invalid-state)');
      expect(registry.get('a1')?.state).toBe('spawning');
    });

    it('should allow a patch without a state change', async () => {
      await registry.insert(newRecord('a1'), 'spawn');
      await registry.transition('a1', 'active', { headSha: 'abc' }, { operation: 'spawn' });
      clock.advance(100);

      const record = await registry.transition('a1', 'active', { headSha: 'def' }, { operation: 'sync' });

      expect(record.headSha).toBe('def');
      expect(record.lastTransitionAt).toBe(1000);
    });

    it('should reserve leaving orphaned to the reconciler', async () => {
      await registry.insert(newRecord('a1', { state: 'orphaned' }), 'reconcile');

      const error = await rejectionOf(registry.transition('a1', 'active', {}, { operation: 'spawn' }));
      expect(error.kind).toBe('orphan-detected');

      const adopted = await registry.transition('a1', 'active', {}, { byReconciler: true });
      expect(adopted.state).toBe('active');
    });

    it('should fail with not-found for an unknown agent', async () => {
      const error = await rejectionOf(registry.transition('ghost', 'active'));
      expect(error.kind).toBe('not-found');
    });

    it('should roll back the record when persisting fails', async () => {
      await registry.insert(newRecord('a1'), 'spawn');
      store.failNextSave(new Error('disk full'));

      const error = await rejectionOf(registry.transition('a1', 'active', {}, { operation: 'spawn' }));

      expect(error.kind).toBe('internal');
      expect(registry.get('a1')?.state).toBe('spawning');
      expect(store.peek()?.records[0].state).toBe('spawning');
    });
  });

  describe('reads', () => {
    it('should list records by creation time', async () => {
      await registry.insert(newRecord('zed'), 'spawn');
      clock.advance(10);
      await registry.insert(newRecord('amy'), 'spawn');

      expect(registry.list().map((record) => record.agentId)).toEqual(['zed', 'amy']);
    });

    it('should hand out copies', async () => {
      await registry.insert(newRecord('a1'), 'spawn');
      const copy = registry.get('a1');
      if (copy) copy.state = 'removed';

      expect(registry.get('a1')?.state).toBe('spawning');
    });

    it('should find records by path and branch', async () => {
      await registry.insert(newRecord('a1'), 'spawn');

      expect(registry.findByPath(`${WORKTREE_ROOT}/../agent-worktrees/a1`)?.agentId).toBe('a1');
      expect(registry.findByBranch('agent/a1')?.agentId).toBe('a1');
      expect(registry.findByBranch('agent/b2')).toBeUndefined();
    });

    it('should throw not-found from require', () => {
      const error = thrownBy(() => registry.require('ghost', 'status'));
      expect(error.message).toBe('status ghost: No worktree is registered for this agent (not-found)');
    });
  });

  describe('remove', () => {
    it('should drop the record and persist', async () => {
      await registry.insert(newRecord('a1'), 'spawn');
      await registry.remove('a1', 'nuke');

      expect(registry.get('a1')).toBeUndefined();
      expect(store.peek()?.records).toEqual([]);
    });

    it('should ignore unknown agents', async () => {
      await registry.remove('ghost', 'nuke');
      expect(store.saveCount).toBe(0);
    });
  });

  describe('registries sharing a store', () => {
    let other: WorktreeRegistry;

    beforeEach(async () => {
      other = await WorktreeRegistry.open(store, { now: clock.now });
    });

    it('should keep records written through the other registry', async () => {
      await registry.insert(newRecord('a1'), 'spawn');
      await other.insert(newRecord('b2'), 'spawn');
      await registry.transition('a1', 'active', {}, { operation: 'spawn' });

      expect(store.peek()?.records.map((record) => [record.agentId, record.state])).toEqual([
        ['a1', 'active'],
        ['b2', 'spawning'],
      ]);
    });

    it('should check allocations against the stored records', async () => {
      await other.insert(newRecord('b2', { path: `${WORKTREE_ROOT}/shared` }), 'spawn');

      const error = await rejectionOf(registry.insert(newRecord('a1', { path: `${WORKTREE_ROOT}/shared` }), 'spawn'));

      expect(error.kind).toBe('path-collision');
    });

    it('should pick up changes on refresh', async () => {
      await other.insert(newRecord('b2'), 'spawn');
      expect(registry.get('b2')).toBeUndefined();

      await registry.refresh();

      expect(registry.get('b2')).toEqual(createRecord('b2', { state: 'spawning' }));
    });

    it('should not resurrect a record the other registry removed', async () => {
      await registry.insert(newRecord('a1'), 'spawn');
      await other.refresh();
      await other.remove('a1', 'nuke');

      const error = await rejectionOf(registry.transition('a1', 'active', {}, { operation: 'spawn' }));

      expect(error.kind).toBe('not-found');
      expect(store.peek()?.records).toEqual([]);
    });
  });

  describe('onlyFrom', () => {
    it('should leave a record in another state untouched', async () => {
      await registry.insert(newRecord('a1', { state: 'active' }), 'spawn');
      await registry.transition('a1', 'committing', {}, { operation: 'sync' });
      const saves = store.saveCount;

      const record = await registry.transition('a1', 'dirty', {}, { operation: 'status', onlyFrom: ['active', 'dirty'] });

      expect(record.state).toBe('committing');
      expect(store.saveCount).toBe(saves);
    });
  });

  describe('open', () => {
    it('should restore persisted records', async () => {
      await registry.insert(newRecord('a1'), 'spawn');

      const reopened = await WorktreeRegistry.open(store, { now: clock.now });

      expect(reopened.get('a1')).toEqual(createRecord('a1', { state: 'spawning' }));
    });

    it('should drop removed records', async () => {
      const seeded = new MemoryRegistryStore(snapshotOf([createRecord('a1', { state: 'removed' })]));
      const reopened = await WorktreeRegistry.open(seeded);

      expect(reopened.list()).toEqual([]);
    });

    it('should reject content of the wrong shape', async () => {
      const seeded = new MemoryRegistryStore({ version: 2, records: [] });

      const error = await rejectionOf(WorktreeRegistry.open(seeded));

      expect(error.kind).toBe('registry-corruption');
      expect(error.operation).toBe('load');
    });

    it('should quarantine agents whose records share a path', async () => {
      const shared = `${WORKTREE_ROOT}/shared`;
      const seeded = new MemoryRegistryStore(
        snapshotOf([
          createRecord('a1', { path: shared }),
          createRecord('b2', { path: shared }),
          createRecord('c3'),
        ])
      );

      const reopened = await WorktreeRegistry.open(seeded, { now: clock.now });

      expect(reopened.corruptAgents()).toEqual(['a1', 'b2']);
      expect(reopened.list().map((record) => record.agentId)).toEqual(['c3']);
      expect(reopened.findByPath(shared)?.agentId).toBe('a1');

      const error = thrownBy(() => reopened.require('a1', 'nuke'));
      expect(error.kind).toBe('registry-corruption');

      await reopened.transition('c3', 'dirty', {}, { operation: 'status' });
      expect(
        seeded
          .peek()
          ?.records.map((record) => record.agentId)
          .sort()
      ).toEqual(['a1', 'b2', 'c3']);
    });

    it('should quarantine agents whose records share a branch', async () => {
      const seeded = new MemoryRegistryStore(
        snapshotOf([createRecord('a1'), createRecord('b2', { branchName: 'agent/a1' })])
      );

      const reopened = await WorktreeRegistry.open(seeded);

      expect(reopened.corruptAgents()).toEqual(['a1', 'b2']);
      expect(reopened.isCorrupt('a1')).toBe(true);
    });
  });
});
