/**
 * Configuration tests
 * Tests environment defaults, overrides and rejection of unusable values
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import * as path from 'path';
import { DEFAULT_STORAGE_PATH, loadServerConfig } from '../src/config.js';

describe('Server Config', () => {
  it('should use defaults for an empty environment', () => {
    assert.deepStrictEqual(loadServerConfig({}), {
      storage_root: DEFAULT_STORAGE_PATH,
      lock_timeout_ms: 60000,
      lock_stale_timeout_ms: 30000
    });
  });

  it('should read overrides from the environment', () => {
    assert.deepStrictEqual(
      loadServerConfig({
        REFSTORE_DATA_DIR: '/srv/refstore',
        REFSTORE_LOCK_TIMEOUT_MS: '5000',
        REFSTORE_LOCK_STALE_MS: '2000'
      }),
      {
        storage_root: path.resolve('/srv/refstore'),
        lock_timeout_ms: 5000,
        lock_stale_timeout_ms: 2000
      }
    );
  });

  it('should resolve a relative data directory against the working directory', () => {
    const config = loadServerConfig({ REFSTORE_DATA_DIR: 'data/refs' });
    assert.strictEqual(config.storage_root, path.resolve('data/refs'));
  });

  it('should treat blank values as unset', () => {
    const config = loadServerConfig({ REFSTORE_DATA_DIR: '  ', REFSTORE_LOCK_TIMEOUT_MS: '' });
    assert.strictEqual(config.storage_root, DEFAULT_STORAGE_PATH);
    assert.strictEqual(config.lock_timeout_ms, 60000);
  });

  it('should reject unusable lock timeouts', () => {
    for (const value of ['abc', '0', '-5', '1.5']) {
      assert.throws(
        () => loadServerConfig({ REFSTORE_LOCK_TIMEOUT_MS: value }),
        { name: 'ValidationError', code: 'INVALID_CONFIG' },
        `Should reject ${value}`
      );
    }
  });
});
