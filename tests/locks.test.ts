/**
 * Lock table tests
 * Tests per-key ordering, independence of keys, lock files and stale lock recovery
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { tmpdir } from 'node:os';
import * as path from 'path';
import * as fs from 'fs/promises';
import { randomUUID } from 'crypto';
import { KeyedMutex, ReferenceLockManager } from '../src/locks.js';

function createTestRoot(): string {
  return path.join(tmpdir(), `refstore-test-${Date.now()}-${randomUUID()}`);
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('KeyedMutex', () => {
  it('should run tasks for the same key one at a time in arrival order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([1, 2, 3].map(n =>
      mutex.run('same', async () => {
        events.push(`start-${n}`);
        await delay(10);
        events.push(`end-${n}`);
      })
    ));

    assert.deepStrictEqual(events, ['start-1', 'end-1', 'start-2', 'end-2', 'start-3', 'end-3']);
    assert.strictEqual(mutex.size, 0);
  });

  it('should let different keys run concurrently', async () => {
    const mutex = new KeyedMutex();
    let running = 0;
    let maxRunning = 0;

    await Promise.all(['a', 'b', 'c'].map(key =>
      mutex.run(key, async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await delay(20);
        running--;
      })
    ));

    assert.strictEqual(maxRunning, 3);
  });

  it('should keep the queue moving after a task fails', async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.run('k', async () => {
      throw new Error('boom');
    });
    const following = mutex.run('k', async () => 'ran');

    await assert.rejects(failing, { message: 'boom' });
    assert.strictEqual(await following, 'ran');
    assert.strictEqual(mutex.size, 0);
  });
});

describe('ReferenceLockManager', () => {
  it('should hold a lock file during the task and remove it afterwards', async () => {
    const testRoot = createTestRoot();
    const locks = new ReferenceLockManager(path.join(testRoot, 'locks'));
    const lockPath = locks.lockPath('prompts/greeting');

    await locks.withLock('prompts/greeting', 'create_or_update', async () => {
      const lockContent = await fs.readFile(lockPath, 'utf-8');
      assert.match(lockContent, /"reference": "prompts\/greeting"/);
      assert.match(lockContent, /"operation": "create_or_update"/);
    });

    await assert.rejects(fs.access(lockPath), { code: 'ENOENT' });

    await fs.rm(testRoot, { recursive: true, force: true });
  });

  it('should use distinct lock files for distinct names', () => {
    const locks = new ReferenceLockManager(path.join(createTestRoot(), 'locks'));
    assert.notStrictEqual(locks.lockPath('a/b'), locks.lockPath('a/c'));
    assert.match(path.basename(locks.lockPath('a/b')), /^[0-9a-f]{32}\.lock$/);
  });

  it('should release the lock when the task throws', async () => {
    const testRoot = createTestRoot();
    const locks = new ReferenceLockManager(path.join(testRoot, 'locks'));

    await assert.rejects(
      locks.withLock('x', 'delete', async () => {
        throw new Error('task failed');
      }),
      { message: 'task failed' }
    );
    await assert.rejects(fs.access(locks.lockPath('x')), { code: 'ENOENT' });

    await fs.rm(testRoot, { recursive: true, force: true });
  });

  it('should time out while another process holds a fresh lock', async () => {
    const testRoot = createTestRoot();
    const locks = new ReferenceLockManager(path.join(testRoot, 'locks'), {
      timeoutMs: 150,
      staleMs: 60000
    });
    const lockPath = locks.lockPath('held');
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    await fs.writeFile(lockPath, JSON.stringify({ pid: 99999 }), 'utf-8');

    await assert.rejects(
      locks.withLock('held', 'update', async () => 'never'),
      {
        name: 'StorageIOError',
        code: 'LOCK_TIMEOUT',
        kind: 'StorageIOError',
        retryable: true
      }
    );

    await fs.rm(testRoot, { recursive: true, force: true });
  });

  it('should remove a stale lock left by a crashed process', async () => {
    const testRoot = createTestRoot();
    const locks = new ReferenceLockManager(path.join(testRoot, 'locks'), {
      timeoutMs: 5000,
      staleMs: 1000
    });
    const lockPath = locks.lockPath('abandoned');
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    await fs.writeFile(lockPath, JSON.stringify({ pid: 99999 }), 'utf-8');
    const past = new Date(Date.now() - 10000);
    await fs.utimes(lockPath, past, past);

    const result = await locks.withLock('abandoned', 'update', async () => 'acquired');
    assert.strictEqual(result, 'acquired');

    await fs.rm(testRoot, { recursive: true, force: true });
  });

  it('should keep a long-running holder from being treated as stale', async () => {
    const testRoot = createTestRoot();
    const locksDir = path.join(testRoot, 'locks');
    const options = { timeoutMs: 5000, staleMs: 200 };
    // Two managers on one directory stand in for two processes
    const first = new ReferenceLockManager(locksDir, options);
    const second = new ReferenceLockManager(locksDir, options);
    const events: string[] = [];

    const holder = first.withLock('slow', 'update', async () => {
      events.push('first-start');
      await delay(600);
      events.push('first-end');
    });
    await delay(50);
    const waiter = second.withLock('slow', 'update', async () => {
      events.push('second');
    });

    await Promise.all([holder, waiter]);
    assert.deepStrictEqual(events, ['first-start', 'first-end', 'second']);

    await fs.rm(testRoot, { recursive: true, force: true });
  });

  it('should not remove a lock another process took over before release', async () => {
    const testRoot = createTestRoot();
    const locks = new ReferenceLockManager(path.join(testRoot, 'locks'));
    const lockPath = locks.lockPath('contested');
    const otherOwner = JSON.stringify({ pid: 99999, token: 'other-owner' });

    await locks.withLock('contested', 'update', async () => {
      await fs.writeFile(lockPath, otherOwner, 'utf-8');
    });

    assert.strictEqual(await fs.readFile(lockPath, 'utf-8'), otherOwner);

    await fs.rm(testRoot, { recursive: true, force: true });
  });
});
