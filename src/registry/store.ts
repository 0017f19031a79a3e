/**
 * Persistence backends for the worktree registry.
 */

import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import { FileLock, InProcessLock, type ProcessLock } from '../lock/process-lock.js';
import { WardenError } from '../utils/errors.js';
import type { RegistrySnapshot } from './types.js';

export interface RegistryStore {
  /** Human-readable location, used in error messages */
  readonly location: string;
  /** Raw persisted content, or undefined when nothing has been saved yet */
  load(): Promise<unknown>;
  save(snapshot: RegistrySnapshot): Promise<void>;
  /** Run `work` while no other writer, in this process or another, can save */
  withLock<T>(work: () => Promise<T>): Promise<T>;
}

async function underLock<T>(lock: ProcessLock, work: () => Promise<T>): Promise<T> {
  const release = await lock.acquire();
  try {
    return await work();
  } finally {
    await release();
  }
}

/**
 * JSON file store. Writes go to a temp file renamed over the target, so a crash
 * leaves either the previous or the next snapshot on disk.
 */
export class FileRegistryStore implements RegistryStore {
  readonly location: string;
  private readonly lock: ProcessLock;
  private writeCounter = 0;

  constructor(filePath: string, options: { lock?: ProcessLock } = {}) {
    this.location = filePath;
    this.lock = options.lock ?? new FileLock(`${filePath}.lock`);
  }

  withLock<T>(work: () => Promise<T>): Promise<T> {
    return underLock(this.lock, work);
  }

  async load(): Promise<unknown> {
    let raw: string;
    try {
      raw = await fs.readFile(this.location, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new WardenError(`Registry file ${this.location} is not valid JSON`, 'registry-corruption', {
        operation: 'load',
        context: { location: this.location },
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async save(snapshot: RegistrySnapshot): Promise<void> {
    const dir = dirname(this.location);
    await fs.mkdir(dir, { recursive: true });

    this.writeCounter += 1;
    const tempPath = join(dir, `.registry.${process.pid}.${Date.now()}.${this.writeCounter}.tmp`);
    await fs.writeFile(tempPath, JSON.stringify(snapshot, null, 2), 'utf-8');
    await fs.rename(tempPath, this.location);
  }
}

/**
 * Store kept in memory. Registries opened on the same instance share it the way
 * processes share a registry file.
 */
export class MemoryRegistryStore implements RegistryStore {
  readonly location = 'memory';
  private serialized: string | undefined;
  private last: RegistrySnapshot | undefined;
  private pendingFailure: Error | undefined;
  private readonly lock = new InProcessLock();
  saveCount = 0;

  constructor(initial?: unknown) {
    this.serialized = initial === undefined ? undefined : JSON.stringify(initial);
  }

  withLock<T>(work: () => Promise<T>): Promise<T> {
    return underLock(this.lock, work);
  }

  async load(): Promise<unknown> {
    return this.serialized === undefined ? undefined : JSON.parse(this.serialized);
  }

  async save(snapshot: RegistrySnapshot): Promise<void> {
    if (this.pendingFailure) {
      const failure = this.pendingFailure;
      this.pendingFailure = undefined;
      throw failure;
    }
    this.serialized = JSON.stringify(snapshot);
    this.last = structuredClone(snapshot);
    this.saveCount += 1;
  }

  /** Make the next save reject with `error` */
  failNextSave(error: Error): void {
    this.pendingFailure = error;
  }

  /** Last saved snapshot, if any */
  peek(): RegistrySnapshot | undefined {
    return this.last === undefined ? undefined : structuredClone(this.last);
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
