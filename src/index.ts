#!/usr/bin/env node
// SPDX-License-Identifier: BUSL-1.1
// Copyright (c) 2025 Theodor Storm

/**
 * Reference Store MCP Server - Entry Point
 *
 * Builds one store for the configured storage root and one MCP server on
 * top of it, then serves tool calls over stdio.
 *
 * **Environment Variables:**
 * - `REFSTORE_DATA_DIR`: Custom storage path (default: ~/.refstore)
 * - `REFSTORE_LOCK_TIMEOUT_MS`: Max wait for a per-reference lock (default: 60000)
 * - `REFSTORE_LOCK_STALE_MS`: Age after which a lock file is abandoned (default: 30000)
 *
 * **Usage:**
 * ```bash
 * # Run with default storage
 * node dist/src/index.js
 *
 * # Run with custom storage path
 * REFSTORE_DATA_DIR=/custom/path node dist/src/index.js
 * ```
 *
 * @module index
 * @see {@link ReferenceServer} for server implementation
 */

import { loadServerConfig } from './config.js';
import { ReferenceServer } from './server.js';
import { FileSystemReferenceStore } from './storage.js';

async function main(): Promise<void> {
  const config = loadServerConfig();

  const store = new FileSystemReferenceStore(config.storage_root, {
    lockTimeoutMs: config.lock_timeout_ms,
    lockStaleMs: config.lock_stale_timeout_ms
  });
  await store.initialize();
  console.error(`Reference store initialized at ${config.storage_root}`);

  const server = new ReferenceServer(store);
  await server.run();
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
