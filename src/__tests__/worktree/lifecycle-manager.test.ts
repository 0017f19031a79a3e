import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { fakeSha } from '../../gateway/memory-gateway.js';
import { InProcessLock } from '../../lock/process-lock.js';
import { MemoryRegistryStore } from '../../registry/store.js';
import { GatewayError } from '../../utils/errors.js';
import {
  WORKTREE_ROOT,
  createRecord,
  createTestWarden,
  rejectionOf,
  snapshotOf,
  type TestWarden,
} from '../mocks/warden.mock.js';

const A1_PATH = `${WORKTREE_ROOT}/a1`;

describe('WorktreeLifecycleManager', () => {
  let warden: TestWarden;

  beforeEach(async () => {
    warden = await createTestWarden();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('spawn', () => {
    it('should create a worktree on the agent branch and record it as active', async () => {
      const handle = await warden.manager.spawn('a1');

      expect(handle).toEqual({
        agentId: 'a1',
        path: A1_PATH,
        branchName: 'agent/a1',
        baseRef: 'HEAD',
        headSha: fakeSha('main'),
      });
      expect(warden.fake.callsOf('createWorktree')[0].args).toEqual([A1_PATH, 'agent/a1', 'HEAD']);
      expect(warden.registry.get('a1')?.state).toBe('active');
      expect(warden.store.peek()?.records.map((record) => record.state)).toEqual(['active']);
    });

    it('should return the existing worktree on a repeated spawn', async () => {
      const first = await warden.manager.spawn('a1', { baseRef: 'main' });
      const second = await warden.manager.spawn('a1');

      expect(second).toEqual(first);
      expect(warden.fake.callsOf('createWorktree')).toHaveLength(1);
    });

    it('should reuse the worktree when a different base ref is requested by default', async () => {
      await warden.manager.spawn('a1', { baseRef: 'main' });

      const handle = await warden.manager.spawn('a1', { baseRef: 'HEAD' });

      expect(handle.baseRef).toBe('main');
      expect(warden.fake.callsOf('createWorktree')).toHaveLength(1);
    });

    it('should reject a different base ref when configured to', async () => {
      warden = await createTestWarden({ config: { spawn: { baseRefMismatch: 'reject' } } });
      await warden.manager.spawn('a1', { baseRef: 'main' });

      const error = await rejectionOf(warden.manager.spawn('a1', { baseRef: 'HEAD' }));

      expect(error.kind).toBe('base-ref-mismatch');
      expect(error.message).toBe('spawn a1: Worktree exists from base main, not HEAD (base-ref-mismatch)');
    });

    it('should give concurrent agents disjoint worktrees', async () => {
      const [a, b] = await Promise.all([warden.manager.spawn('a'), warden.manager.spawn('b')]);

      expect(a.path).toBe(`${WORKTREE_ROOT}/a`);
      expect(b.path).toBe(`${WORKTREE_ROOT}/b`);
      expect(a.branchName).not.toBe(b.branchName);
      expect(warden.manager.list().map((record) => [record.agentId, record.state])).toEqual([
        ['a', 'active'],
        ['b', 'active'],
      ]);
    });

    it('should reject invalid agent ids before touching the repository', async () => {
      const error = await rejectionOf(warden.manager.spawn('../escape'));

      expect(error.kind).toBe('validation');
      expect(warden.fake.calls).toEqual([]);
    });

    it('should refuse a path already holding a foreign worktree', async () => {
      warden.fake.addExternalWorktree(A1_PATH, 'feature/x');

      const error = await rejectionOf(warden.manager.spawn('a1'));

      expect(error.message).toBe(
        `spawn a1: Path ${A1_PATH} already holds a worktree unknown to the registry (path-collision)`
      );
      expect(warden.registry.get('a1')).toBeUndefined();
    });

    it('should refuse a branch checked out elsewhere', async () => {
      warden.fake.addExternalWorktree('/scratch/a1', 'agent/a1');

      const error = await rejectionOf(warden.manager.spawn('a1'));

      expect(error.message).toBe('spawn a1: Branch agent/a1 is checked out at /scratch/a1 (branch-collision)');
    });

    it('should roll back the record when the worktree cannot be created', async () => {
      const error = await rejectionOf(warden.manager.spawn('a1', { baseRef: 'nope' }));

      expect(error.kind).toBe('gateway-failure');
      expect(error.message).toBe('spawn a1: invalid reference: nope (gateway-failure)');
      expect(warden.fake.callsOf('removeWorktree')[0].args).toEqual([A1_PATH, { force: true }]);
      expect(warden.registry.get('a1')).toBeUndefined();
      expect(warden.store.peek()?.records).toEqual([]);
    });

    it('should leave a transient create failure as spawning', async () => {
      warden.fake.failNext(
        'createWorktree',
        new GatewayError("Unable to create '/repo/.git/index.lock'", 'createWorktree', { retryable: true })
      );

      const error = await rejectionOf(warden.manager.spawn('a1'));

      expect(error.kind).toBe('gateway-failure');
      expect(error.retryable).toBe(true);
      expect(warden.registry.get('a1')?.state).toBe('spawning');

      const retry = await rejectionOf(warden.manager.spawn('a1'));
      expect(retry.message).toBe('spawn a1: Worktree is spawning; run reconcile to settle it (invalid-state)');
    });

    it('should leave a timed out create as spawning', async () => {
      vi.useFakeTimers();
      warden.fake.hangNext('createWorktree');

      const outcome = rejectionOf(warden.manager.spawn('a1'));
      await vi.advanceTimersByTimeAsync(1000);
      const error = await outcome;

      expect(error.kind).toBe('timeout');
      expect(error.message).toBe('spawn a1: createWorktree did not finish within 1000ms (timeout)');
      expect(warden.registry.get('a1')?.state).toBe('spawning');
    });

    it('should leave spawning when the head cannot be read after creation', async () => {
      warden.fake.failNext('headSha', new GatewayError('broken HEAD', 'headSha', { retryable: false }));

      await rejectionOf(warden.manager.spawn('a1'));

      expect(warden.registry.get('a1')?.state).toBe('spawning');
      expect(warden.fake.callsOf('removeWorktree')).toHaveLength(0);
    });

    it('should refuse an orphaned agent', async () => {
      warden = await createTestWarden({
        store: new MemoryRegistryStore(snapshotOf([createRecord('a1', { state: 'orphaned' })])),
      });

      const error = await rejectionOf(warden.manager.spawn('a1'));

      expect(error.kind).toBe('orphan-detected');
    });
  });

  describe('nuke', () => {
    it('should remove the worktree and purge its record', async () => {
      await warden.manager.spawn('a1');

      const result = await warden.manager.nuke('a1');

      expect(result).toEqual({
        agentId: 'a1',
        removed: true,
        alreadyAbsent: false,
        path: A1_PATH,
        branchName: 'agent/a1',
      });
      expect(warden.registry.get('a1')).toBeUndefined();
      expect((await warden.fake.listWorktrees()).map((worktree) => worktree.path)).toEqual(['/repo']);
      expect(warden.fake.hasBranch('agent/a1')).toBe(true);
    });

    it('should delete the branch when asked', async () => {
      await warden.manager.spawn('a1');

      await warden.manager.nuke('a1', { deleteBranch: true });

      expect(warden.fake.callsOf('removeWorktree')[0].args).toEqual([A1_PATH, { force: false, branch: 'agent/a1' }]);
      expect(warden.fake.hasBranch('agent/a1')).toBe(false);
    });

    it('should succeed when no record exists', async () => {
      await expect(warden.manager.nuke('ghost')).resolves.toEqual({
        agentId: 'ghost',
        removed: false,
        alreadyAbsent: true,
      });
      expect(warden.fake.calls).toEqual([]);
    });

    it('should refuse to discard uncommitted changes without force', async () => {
      await warden.manager.spawn('a1');
      warden.fake.writeFile(A1_PATH, 'notes.txt');

      const error = await rejectionOf(warden.manager.nuke('a1'));

      expect(error.kind).toBe('dirty-worktree');
      expect(error.message).toBe('nuke a1: Worktree has 1 uncommitted change(s); use force to discard them (dirty-worktree)');
      expect(error.context?.summary).toBe('  untracked (1): notes.txt');
      expect(warden.registry.get('a1')?.state).toBe('active');
      expect(warden.fake.callsOf('removeWorktree')).toHaveLength(0);
    });

    it('should discard uncommitted changes with force', async () => {
      await warden.manager.spawn('a1');
      warden.fake.writeFile(A1_PATH, 'notes.txt');

      const result = await warden.manager.nuke('a1', { force: true });

      expect(result.removed).toBe(true);
      expect(warden.fake.callsOf('status')).toHaveLength(0);
    });

    it('should skip the dirty check when the directory is already gone', async () => {
      await warden.manager.spawn('a1');
      warden.fake.removeExternally(A1_PATH);

      const result = await warden.manager.nuke('a1');

      expect(result.removed).toBe(true);
      expect(warden.fake.callsOf('status')).toHaveLength(0);
    });

    it('should leave removing after a failed removal and finish on retry', async () => {
      await warden.manager.spawn('a1');
      warden.fake.failNext('removeWorktree', new GatewayError('permission denied', 'removeWorktree', { retryable: false }));

      const error = await rejectionOf(warden.manager.nuke('a1'));

      expect(error.kind).toBe('gateway-failure');
      expect(warden.registry.get('a1')?.state).toBe('removing');

      await expect(warden.manager.nuke('a1')).resolves.toMatchObject({ removed: true });
      expect(warden.registry.get('a1')).toBeUndefined();
    });

    it('should refuse orphaned and spawning records', async () => {
      warden = await createTestWarden({
        store: new MemoryRegistryStore(
          snapshotOf([createRecord('a1', { state: 'orphaned' }), createRecord('b2', { state: 'spawning' })])
        ),
      });

      expect((await rejectionOf(warden.manager.nuke('a1'))).kind).toBe('orphan-detected');
      expect((await rejectionOf(warden.manager.nuke('b2'))).message).toBe(
        'nuke b2: Worktree is still spawning; run reconcile to settle it (invalid-state)'
      );
    });

    it('should hold the lock until a timed out removal has stopped', async () => {
      vi.useFakeTimers();
      await warden.manager.spawn('a1');
      warden.fake.hangNext('removeWorktree', { settleAfterAbortMs: 300 });

      const nuked = rejectionOf(warden.manager.nuke('a1'));
      const spawned = warden.manager.spawn('b');
      await vi.advanceTimersByTimeAsync(1000);

      expect(warden.fake.activeCalls).toBe(1);
      expect(warden.fake.callsOf('createWorktree')).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(300);
      const error = await nuked;

      expect(error.message).toBe('nuke a1: removeWorktree did not finish within 1000ms (timeout)');
      await expect(spawned).resolves.toMatchObject({ agentId: 'b' });
      expect(warden.fake.activeCalls).toBe(0);
      expect(warden.registry.get('a1')?.state).toBe('removing');
    });

    it('should report a branch left by an earlier agent as a branch collision', async () => {
      await warden.manager.spawn('a1');
      warden.fake.writeFile(A1_PATH, 'src/a.ts');
      await warden.coordinator.sync('a1', 'work');
      await warden.manager.nuke('a1');

      const error = await rejectionOf(warden.manager.spawn('a1'));

      expect(error.kind).toBe('branch-collision');
      expect(error.message).toBe("spawn a1: a branch named 'agent/a1' already exists (branch-collision)");
      expect(warden.registry.get('a1')).toBeUndefined();
      expect(warden.fake.callsOf('removeWorktree')).toHaveLength(1);
      expect(warden.fake.hasBranch('agent/a1')).toBe(true);
    });

    it('should keep a branch with unmerged commits unless forced', async () => {
      await warden.manager.spawn('a1');
      warden.fake.writeFile(A1_PATH, 'src/a.ts');
      await warden.coordinator.sync('a1', 'work');

      await warden.manager.nuke('a1', { deleteBranch: true });

      expect(warden.fake.hasBranch('agent/a1')).toBe(true);
      expect((await rejectionOf(warden.manager.spawn('a1'))).kind).toBe('branch-collision');
    });

    it('should spawn again once a forced removal deleted the branch', async () => {
      await warden.manager.spawn('a1');
      warden.fake.writeFile(A1_PATH, 'src/a.ts');
      await warden.coordinator.sync('a1', 'work');
      await warden.manager.nuke('a1', { force: true, deleteBranch: true });

      const handle = await warden.manager.spawn('a1');

      expect(handle.headSha).toBe(fakeSha('main'));
      expect(warden.fake.hasBranch('agent/a1')).toBe(true);
      expect(warden.registry.get('a1')?.state).toBe('active');
    });

    it('should allow a fresh spawn after removal', async () => {
      await warden.manager.spawn('a1');
      await warden.manager.nuke('a1', { deleteBranch: true });

      const handle = await warden.manager.spawn('a1');

      expect(handle.path).toBe(A1_PATH);
      expect(warden.registry.get('a1')?.state).toBe('active');
    });
  });

  describe('several processes', () => {
    it('should keep the records each process adds', async () => {
      const processLock = new InProcessLock();
      const first = await createTestWarden({ processLock });
      const second = await createTestWarden({ fake: first.fake, store: first.store, processLock });

      await Promise.all([first.manager.spawn('a'), second.manager.spawn('b')]);
      await first.manager.spawn('c');

      expect(first.store.peek()?.records.map((record) => record.agentId).sort()).toEqual(['a', 'b', 'c']);
      expect(first.manager.list().map((record) => record.agentId).sort()).toEqual(['a', 'b', 'c']);
    });

    it('should see a removal made by another process', async () => {
      const processLock = new InProcessLock();
      const first = await createTestWarden({ processLock });
      await first.manager.spawn('a1');
      const second = await createTestWarden({ fake: first.fake, store: first.store, processLock });

      await second.manager.nuke('a1');
      const result = await first.manager.nuke('a1');

      expect(result).toEqual({ agentId: 'a1', removed: false, alreadyAbsent: true });
      expect(first.fake.callsOf('removeWorktree')).toHaveLength(1);
    });
  });

  describe('structural lock', () => {
    it('should serialize spawn and nuke behind a held lock', async () => {
      let release: () => void = () => undefined;
      const held = warden.lock.runExclusive(
        'hold',
        () =>
          new Promise<void>((resolve) => {
            release = () => resolve();
          })
      );

      const spawned = warden.manager.spawn('a1');
      await Promise.resolve();
      expect(warden.lock.queueLength).toBe(2);
      expect(warden.fake.calls).toEqual([]);

      release();
      await held;
      await spawned;
      expect(warden.registry.get('a1')?.state).toBe('active');
    });
  });
});
