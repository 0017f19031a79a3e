import { describe, it, expect, beforeEach } from 'vitest';
import { fakeSha } from '../../gateway/memory-gateway.js';
import { MemoryRegistryStore } from '../../registry/store.js';
import { GatewayError } from '../../utils/errors.js';
import { parseAuthor } from '../../worktree/commit-coordinator.js';
import {
  WORKTREE_ROOT,
  createRecord,
  createTestWarden,
  rejectionOf,
  snapshotOf,
  type TestWarden,
} from '../mocks/warden.mock.js';

const A1_PATH = `${WORKTREE_ROOT}/a1`;

describe('parseAuthor', () => {
  it('should split name and email', () => {
    expect(parseAuthor('Ada Lovelace <ada@example.test>')).toEqual({ name: 'Ada Lovelace', email: 'ada@example.test' });
  });

  it('should reject strings without an email', () => {
    let message = '';
    try {
      parseAuthor('nobody');
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }
    expect(message).toBe('sync: Invalid author "nobody": expected "Name <email>" (validation)');
  });
});

describe('CommitCoordinator', () => {
  let warden: TestWarden;

  beforeEach(async () => {
    warden = await createTestWarden();
  });

  it('should commit pending changes and record the new head', async () => {
    await warden.manager.spawn('a1');
    warden.fake.writeFile(A1_PATH, 'src/a.ts');
    const expectedSha = fakeSha(`${fakeSha('main')}:1:init`);

    const result = await warden.coordinator.sync('a1', 'init');

    expect(result).toEqual({ agentId: 'a1', headSha: expectedSha, committed: true });
    expect(warden.fake.commits).toEqual([
      {
        sha: expectedSha,
        path: A1_PATH,
        message: 'init',
        author: { name: 'Warden Agent', email: 'agent@warden.local' },
        files: ['src/a.ts'],
      },
    ]);
    expect(warden.registry.get('a1')).toMatchObject({ state: 'active', headSha: expectedSha });
  });

  it('should commit as the given author', async () => {
    await warden.manager.spawn('a1');
    warden.fake.writeFile(A1_PATH, 'src/a.ts');

    await warden.coordinator.sync('a1', 'init', { author: { name: 'Test Agent', email: 'agent@example.test' } });

    expect(warden.fake.commits[0].author).toEqual({ name: 'Test Agent', email: 'agent@example.test' });
  });

  it('should return the previous head when there is nothing to commit', async () => {
    await warden.manager.spawn('a1');
    const saves = warden.store.saveCount;

    const result = await warden.coordinator.sync('a1', 'noop');

    expect(result).toEqual({ agentId: 'a1', headSha: fakeSha('main'), committed: false });
    expect(warden.fake.callsOf('commit')).toHaveLength(0);
    expect(warden.store.saveCount).toBe(saves);
  });

  it('should read the head when the record has none yet', async () => {
    warden = await createTestWarden({ store: new MemoryRegistryStore(snapshotOf([createRecord('a1')])) });
    warden.fake.addExternalWorktree(A1_PATH, 'agent/a1');

    const result = await warden.coordinator.sync('a1', 'noop');

    expect(result.headSha).toBe(fakeSha('main'));
    expect(warden.registry.get('a1')?.headSha).toBe(fakeSha('main'));
  });

  it('should mark a dirty record active when the worktree turned out clean', async () => {
    warden = await createTestWarden({
      store: new MemoryRegistryStore(snapshotOf([createRecord('a1', { state: 'dirty', headSha: 'abc' })])),
    });
    warden.fake.addExternalWorktree(A1_PATH, 'agent/a1');

    const result = await warden.coordinator.sync('a1', 'noop');

    expect(result).toEqual({ agentId: 'a1', headSha: 'abc', committed: false });
    expect(warden.registry.get('a1')?.state).toBe('active');
  });

  it('should reject an empty message', async () => {
    await warden.manager.spawn('a1');

    const error = await rejectionOf(warden.coordinator.sync('a1', '   '));

    expect(error.message).toBe('sync a1: Commit message must not be empty (validation)');
  });

  it('should return the record to dirty when the commit fails', async () => {
    await warden.manager.spawn('a1');
    warden.fake.writeFile(A1_PATH, 'src/a.ts');
    warden.fake.failNext('commit', new GatewayError('hook rejected', 'commit', { retryable: false }));

    const error = await rejectionOf(warden.coordinator.sync('a1', 'init'));

    expect(error.message).toBe('sync a1: hook rejected (gateway-failure)');
    expect(warden.registry.get('a1')?.state).toBe('dirty');
  });

  it('should leave committing when the commit times out', async () => {
    await warden.manager.spawn('a1');
    warden.fake.writeFile(A1_PATH, 'src/a.ts');
    warden.fake.failNext(
      'commit',
      new GatewayError('git commit timed out: killed', 'commit', { retryable: true, timedOut: true })
    );

    const error = await rejectionOf(warden.coordinator.sync('a1', 'init'));

    expect(error.kind).toBe('timeout');
    expect(warden.registry.get('a1')?.state).toBe('committing');

    const retry = await rejectionOf(warden.coordinator.sync('a1', 'init'));
    expect(retry.message).toBe('sync a1: Worktree is committing; cannot commit (invalid-state)');
  });

  it('should refuse an orphaned record', async () => {
    warden = await createTestWarden({
      store: new MemoryRegistryStore(snapshotOf([createRecord('a1', { state: 'orphaned' })])),
    });

    expect((await rejectionOf(warden.coordinator.sync('a1', 'init'))).kind).toBe('orphan-detected');
  });

  it('should keep agents independent', async () => {
    await warden.manager.spawn('a');
    await warden.manager.spawn('b');
    warden.fake.writeFile(`${WORKTREE_ROOT}/a`, 'a.txt');

    await warden.coordinator.sync('a', 'work of a');

    await expect(warden.inspector.status('b')).resolves.toEqual({ kind: 'clean' });
    expect(warden.fake.commits.map((commit) => commit.path)).toEqual([`${WORKTREE_ROOT}/a`]);
  });
});
