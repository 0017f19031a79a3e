import type { ProcessLock } from './process-lock.js';

export interface StructuralLockOptions {
  /** Lock shared with other processes on the same repository */
  processLock?: ProcessLock;
  /** Runs once the lock is held, before the holder's operation */
  onAcquire?: () => Promise<void>;
}

/**
 * Exclusive lock over one repository's worktree metadata.
 *
 * Holders in this process run one at a time in arrival order. Each acquisition
 * chains onto the previous holder's completion, so a failing holder never
 * blocks the queue. With a process lock, holders in other processes are
 * excluded as well.
 */
export class StructuralLock {
  readonly scope: string;
  private readonly processLock?: ProcessLock;
  private readonly onAcquire?: () => Promise<void>;
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private holder: string | null = null;

  constructor(scope: string, options: StructuralLockOptions = {}) {
    this.scope = scope;
    this.processLock = options.processLock;
    this.onAcquire = options.onAcquire;
  }

  /**
   * Run `operation` while holding the lock.
   */
  async runExclusive<T>(label: string, operation: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const run = this.tail.then(() => this.enter(label, operation));
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /** Number of holders queued or running */
  get queueLength(): number {
    return this.pending;
  }

  /** Label of the current holder, if any */
  get currentHolder(): string | null {
    return this.holder;
  }

  isLocked(): boolean {
    return this.holder !== null;
  }

  private async enter<T>(label: string, operation: () => Promise<T>): Promise<T> {
    this.holder = label;
    try {
      const release = this.processLock ? await this.processLock.acquire() : undefined;
      try {
        await this.onAcquire?.();
        return await operation();
      } finally {
        await release?.();
      }
    } finally {
      this.holder = null;
      this.pending -= 1;
    }
  }
}
