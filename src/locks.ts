// SPDX-License-Identifier: BUSL-1.1
// Copyright (c) 2025 Theodor Storm

/**
 * Per-name locking
 *
 * Mutations of one reference are serialized in two layers:
 * 1. An in-process queue keyed by name, so concurrent tool calls in this
 *    process wait in order without polling
 * 2. A lock file acquired with the `O_CREAT|O_EXCL` flag (`wx` mode), so
 *    separate processes sharing a storage root exclude each other
 *
 * Different names never share a queue entry or a lock file.
 *
 * **Storage Layout:**
 * ```
 * <root>/locks/<sha256(name) first 32 hex chars>.lock
 * ```
 *
 * @module locks
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createHash, randomUUID } from 'crypto';
import { StorageIOError, errnoCode } from './errors.js';
import type { StoreOperation } from './errors.js';

/** Default time to wait for a lock (60s) */
export const DEFAULT_LOCK_TIMEOUT_MS = 60000;

/** Default age after which a lock file is considered abandoned (30s) */
export const DEFAULT_LOCK_STALE_MS = 30000;

const RETRY_INTERVAL_MS = 50;

/**
 * Runs tasks one at a time per key, in arrival order.
 *
 * @example
 * const mutex = new KeyedMutex();
 * await Promise.all([
 *   mutex.run('a', () => write('a', 1)),
 *   mutex.run('a', () => write('a', 2)), // starts after the first settles
 *   mutex.run('b', () => write('b', 1))  // runs alongside 'a'
 * ]);
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running tasks */
  get size(): number {
    return this.tails.size;
  }
}

export interface LockOptions {
  timeoutMs?: number;
  staleMs?: number;
}

/**
 * Holds the lock table for one storage root.
 */
export class ReferenceLockManager {
  private readonly queue = new KeyedMutex();
  private readonly timeoutMs: number;
  private readonly staleMs: number;

  /**
   * @param locksDir - Directory for lock files (typically `<root>/locks`)
   */
  constructor(
    private readonly locksDir: string,
    options: LockOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    this.staleMs = options.staleMs ?? DEFAULT_LOCK_STALE_MS;
  }

  /**
   * Runs `task` while holding the lock for `name`.
   *
   * The lock is released whether the task resolves or throws.
   *
   * @throws {StorageIOError} LOCK_TIMEOUT if the lock is not acquired in time
   */
  async withLock<T>(name: string, operation: StoreOperation, task: () => Promise<T>): Promise<T> {
    return this.queue.run(name, async () => {
      const unlock = await this.acquireFileLock(name, operation);
      try {
        return await task();
      } finally {
        await unlock();
      }
    });
  }

  /** Lock file path for `name` */
  lockPath(name: string): string {
    const digest = createHash('sha256').update(name, 'utf8').digest('hex').substring(0, 32);
    return path.join(this.locksDir, `${digest}.lock`);
  }

  /**
   * Acquires the cross-process lock file with stale detection.
   *
   * Lock files contain metadata (acquired_at, pid, reference, operation) for
   * debugging. While held, the file's mtime is refreshed every `staleMs / 2`,
   * so a long-running holder is never mistaken for a crashed one. Stale locks
   * are removed with a warning log, but only if the file still holds the
   * contents that were judged stale.
   *
   * A holder whose process stalls (not just runs long) for more than
   * `staleMs` can still lose its lock to another process.
   */
  private async acquireFileLock(
    name: string,
    operation: StoreOperation
  ): Promise<() => Promise<void>> {
    const lockPath = this.lockPath(name);
    const startTime = Date.now();

    const lockContent = JSON.stringify({
      acquired_at: new Date().toISOString(),
      pid: process.pid,
      token: randomUUID(),
      reference: name,
      operation
    }, null, 2);

    while (true) {
      if (Date.now() - startTime > this.timeoutMs) {
        throw new StorageIOError(
          `Lock acquisition timeout after ${this.timeoutMs}ms for reference: ${name}`,
          name,
          operation,
          'LOCK_TIMEOUT',
          'LOCK_TIMEOUT'
        );
      }

      try {
        await fs.mkdir(this.locksDir, { recursive: true });
        const handle = await fs.open(lockPath, 'wx');
        try {
          await handle.writeFile(lockContent, 'utf-8');
        } finally {
          await handle.close();
        }

        const heartbeat = setInterval(() => {
          const now = new Date();
          fs.utimes(lockPath, now, now).catch((err: unknown) => {
            console.warn(`Failed to refresh lock for ${name}:`, err);
          });
        }, Math.max(1, Math.floor(this.staleMs / 2)));
        heartbeat.unref();

        return async () => {
          clearInterval(heartbeat);
          await this.releaseFileLock(name, lockPath, lockContent);
        };
      } catch (err: unknown) {
        if (errnoCode(err) !== 'EEXIST') {
          throw StorageIOError.fromCause(err, name, operation);
        }

        try {
          const stats = await fs.stat(lockPath);
          const age = Date.now() - stats.mtimeMs;

          if (age > this.staleMs) {
            const staleContent = await fs.readFile(lockPath, 'utf-8');
            if (await this.removeIfUnchanged(lockPath, staleContent, stats.mtimeMs)) {
              console.warn(`Removing stale lock for ${name} (age: ${age}ms, owner PID: ${ownerPid(staleContent)})`);
            }
            continue;
          }
        } catch (statErr: unknown) {
          // Lock disappeared between EEXIST and stat - retry immediately
          if (errnoCode(statErr) === 'ENOENT') {
            continue;
          }
          throw StorageIOError.fromCause(statErr, name, operation);
        }

        await new Promise(resolve => setTimeout(resolve, RETRY_INTERVAL_MS));
      }
    }
  }

  /**
   * Removes a lock judged stale, unless its owner refreshed it or another
   * process replaced it since it was inspected.
   *
   * @returns true if the lock file was removed
   */
  private async removeIfUnchanged(
    lockPath: string,
    observedContent: string,
    observedMtimeMs: number
  ): Promise<boolean> {
    const stats = await fs.stat(lockPath);
    const content = await fs.readFile(lockPath, 'utf-8');
    if (stats.mtimeMs !== observedMtimeMs || content !== observedContent) {
      return false;
    }
    await fs.rm(lockPath, { force: true });
    return true;
  }

  /** Unlinks the lock file if it is still ours. */
  private async releaseFileLock(name: string, lockPath: string, lockContent: string): Promise<void> {
    try {
      if (await fs.readFile(lockPath, 'utf-8') !== lockContent) {
        console.warn(`Lock for ${name} was taken over by another process before release`);
        return;
      }
      await fs.unlink(lockPath);
    } catch (err: unknown) {
      // Already removed as stale by another process
      if (errnoCode(err) !== 'ENOENT') {
        console.error(`Warning: Failed to release lock for ${name}:`, err);
      }
    }
  }
}

/** PID recorded in a lock file, for log messages. */
function ownerPid(lockContent: string): string {
  try {
    const data: unknown = JSON.parse(lockContent);
    return typeof data === 'object' && data !== null && 'pid' in data ? String(data.pid) : 'unknown';
  } catch {
    return 'unknown';
  }
}
