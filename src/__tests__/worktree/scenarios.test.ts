import { describe, it, expect } from 'vitest';
import { MemoryRegistryStore } from '../../registry/store.js';
import {
  WORKTREE_ROOT,
  createRecord,
  createTestWarden,
  rejectionOf,
  snapshotOf,
  type TestWarden,
} from '../mocks/warden.mock.js';

async function finalState(warden: TestWarden): Promise<{ records: unknown[]; worktrees: string[] }> {
  const worktrees = await warden.fake.listWorktrees();
  return {
    records: warden.registry.list(),
    worktrees: worktrees.map((worktree) => `${worktree.path} ${worktree.branch}`).sort(),
  };
}

describe('agent worktree lifecycle', () => {
  it('should take one agent from spawn to nuke', async () => {
    const warden = await createTestWarden();

    const handle = await warden.manager.spawn('agent-1', { baseRef: 'main' });
    expect(handle.path).toBe(`${WORKTREE_ROOT}/agent-1`);
    expect(handle.branchName).toBe('agent/agent-1');

    warden.fake.writeFile(handle.path, 'README.md');
    const synced = await warden.coordinator.sync('agent-1', 'init');
    expect(synced.committed).toBe(true);
    expect(warden.fake.commits[0].sha).toBe(synced.headSha);

    await expect(warden.inspector.status('agent-1')).resolves.toEqual({ kind: 'clean' });
    await expect(warden.manager.nuke('agent-1')).resolves.toMatchObject({ removed: true });

    const report = await warden.reconciler.reconcile();
    expect(report.orphaned).toEqual([]);
    expect(report.retried).toEqual([]);
    expect(report.purged).toEqual([]);
    expect(warden.registry.list()).toEqual([]);
  });

  it('should give the same final state for concurrent and serial spawns', async () => {
    const concurrent = await createTestWarden();
    await Promise.all([concurrent.manager.spawn('a'), concurrent.manager.spawn('b')]);

    const forward = await createTestWarden();
    await forward.manager.spawn('a');
    await forward.manager.spawn('b');

    const backward = await createTestWarden();
    await backward.manager.spawn('b');
    await backward.manager.spawn('a');

    const expected = await finalState(forward);
    expect(await finalState(concurrent)).toEqual(expected);
    expect(await finalState(backward)).toEqual(expected);
  });

  it('should keep records across a restart', async () => {
    const first = await createTestWarden();
    await first.manager.spawn('a1');

    const restarted = await createTestWarden({ fake: first.fake, store: first.store });

    expect(restarted.registry.get('a1')).toEqual(first.registry.get('a1'));
    await expect(restarted.manager.spawn('a1')).resolves.toMatchObject({ path: `${WORKTREE_ROOT}/a1` });
    expect(restarted.fake.callsOf('createWorktree')).toHaveLength(1);
  });

  describe('crash recovery', () => {
    it('should purge a spawning record whose worktree never appeared', async () => {
      const warden = await createTestWarden({
        store: new MemoryRegistryStore(snapshotOf([createRecord('agent-2', { state: 'spawning' })])),
      });

      const report = await warden.reconciler.reconcile();

      expect(report.purged).toEqual(['agent-2']);
      expect(warden.registry.list()).toEqual([]);
    });

    it('should adopt a worktree left without a record under the adopt policy', async () => {
      const warden = await createTestWarden({ config: { reconcile: { orphanPolicy: 'adopt' } } });
      warden.fake.addExternalWorktree(`${WORKTREE_ROOT}/agent-3`, 'agent/agent-3');

      const report = await warden.reconciler.reconcile();

      expect(report.orphaned).toEqual(['agent-3']);
      expect(report.adopted).toEqual(['agent-3']);
      expect(warden.registry.get('agent-3')?.state).toBe('active');
      await expect(warden.inspector.status('agent-3')).resolves.toEqual({ kind: 'clean' });
    });

    it('should remove a worktree left without a record under the remove policy', async () => {
      const warden = await createTestWarden({ config: { reconcile: { orphanPolicy: 'remove' } } });
      warden.fake.addExternalWorktree(`${WORKTREE_ROOT}/agent-3`, 'agent/agent-3');

      const report = await warden.reconciler.reconcile();

      expect(report.removed).toEqual([`${WORKTREE_ROOT}/agent-3`]);
      expect(warden.registry.get('agent-3')).toBeUndefined();
      expect(await finalState(warden)).toEqual({ records: [], worktrees: ['/repo main'] });
    });

    it('should keep a reported orphan out of reach until resolved', async () => {
      const warden = await createTestWarden();
      warden.fake.addExternalWorktree(`${WORKTREE_ROOT}/agent-3`, 'agent/agent-3');
      await warden.reconciler.reconcile();

      expect((await rejectionOf(warden.manager.spawn('agent-3'))).kind).toBe('orphan-detected');
      expect((await rejectionOf(warden.coordinator.sync('agent-3', 'work'))).kind).toBe('orphan-detected');
    });
  });
});
