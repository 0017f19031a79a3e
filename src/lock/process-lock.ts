/**
 * Locks shared between processes working on the same repository.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { WardenError, wrapError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** Gives the lock back */
export type Release = () => Promise<void>;

export interface ProcessLock {
  acquire(): Promise<Release>;
}

export interface FileLockOptions {
  /** Delay between attempts while another process holds the lock (default: 50) */
  retryMs?: number;
  /** Give up waiting after this long (default: 60000) */
  waitMs?: number;
}

const DEFAULT_RETRY_MS = 50;
const DEFAULT_WAIT_MS = 60000;
/** An empty lock file older than this was left by a holder that died before writing its pid */
const EMPTY_LOCK_GRACE_MS = 5000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

/**
 * Whether a process with this id is still running.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(error) === 'EPERM';
  }
}

/**
 * Lock file holding the owner's pid, created exclusively.
 * A file left by a process that no longer runs is taken over.
 */
export class FileLock implements ProcessLock {
  readonly lockPath: string;
  private readonly retryMs: number;
  private readonly waitMs: number;

  constructor(lockPath: string, options: FileLockOptions = {}) {
    this.lockPath = lockPath;
    this.retryMs = options.retryMs ?? DEFAULT_RETRY_MS;
    this.waitMs = options.waitMs ?? DEFAULT_WAIT_MS;
  }

  async acquire(): Promise<Release> {
    const deadline = Date.now() + this.waitMs;
    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });

    for (;;) {
      if (await this.tryCreate()) {
        return () => this.release();
      }
      if (await this.clearIfStale()) {
        continue;
      }
      if (Date.now() >= deadline) {
        throw new WardenError(`Lock ${this.lockPath} is still held by another process`, 'timeout', {
          context: { lockPath: this.lockPath, waitMs: this.waitMs },
        });
      }
      await sleep(this.retryMs);
    }
  }

  private async tryCreate(): Promise<boolean> {
    let handle: fs.FileHandle;
    try {
      handle = await fs.open(this.lockPath, 'wx');
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        return false;
      }
      throw wrapError(`Failed to create lock ${this.lockPath}`, 'internal', error);
    }
    try {
      await handle.writeFile(`${process.pid}\n`, 'utf-8');
    } finally {
      await handle.close();
    }
    return true;
  }

  private async clearIfStale(): Promise<boolean> {
    let content: string;
    try {
      content = await fs.readFile(this.lockPath, 'utf-8');
    } catch (error) {
      // Released between our attempt and this read
      if (errorCode(error) === 'ENOENT') return true;
      throw wrapError(`Failed to read lock ${this.lockPath}`, 'internal', error);
    }

    if (content.length === 0) {
      if (!(await this.isOlderThan(EMPTY_LOCK_GRACE_MS))) return false;
    } else {
      const owner = Number.parseInt(content.trim(), 10);
      if (Number.isInteger(owner) && owner > 0 && isProcessAlive(owner)) return false;
    }

    logger.warn(`Taking over stale lock ${this.lockPath}`, 'lock', { owner: content.trim() });
    await this.unlink();
    return true;
  }

  private async isOlderThan(ms: number): Promise<boolean> {
    try {
      const stats = await fs.stat(this.lockPath);
      return Date.now() - stats.mtimeMs > ms;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return true;
      throw wrapError(`Failed to inspect lock ${this.lockPath}`, 'internal', error);
    }
  }

  private async release(): Promise<void> {
    await this.unlink();
  }

  private async unlink(): Promise<void> {
    try {
      await fs.unlink(this.lockPath);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw wrapError(`Failed to remove lock ${this.lockPath}`, 'internal', error);
      }
    }
  }
}

/**
 * Lock kept in memory. Stands in for a FileLock where every party lives in one process.
 */
export class InProcessLock implements ProcessLock {
  private tail: Promise<void> = Promise.resolve();

  acquire(): Promise<Release> {
    let release: Release = async () => undefined;
    const held = new Promise<void>((resolve) => {
      release = async () => resolve();
    });
    const acquired = this.tail.then(() => release);
    this.tail = this.tail.then(() => held);
    return acquired;
  }
}
