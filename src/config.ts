// SPDX-License-Identifier: BUSL-1.1
// Copyright (c) 2025 Theodor Storm

/**
 * Server configuration from the environment
 *
 * **Configuration Hierarchy:**
 * 1. Environment variables (highest priority)
 * 2. Hardcoded defaults (fallback)
 *
 * Invalid values are reported instead of silently replaced by defaults.
 *
 * @module config
 */

import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import { DEFAULT_LOCK_STALE_MS, DEFAULT_LOCK_TIMEOUT_MS } from './locks.js';
import type { ServerConfig } from './types.js';

/**
 * Default storage path for all reference data.
 * Located in user's home directory: ~/.refstore
 */
export const DEFAULT_STORAGE_PATH = path.join(os.homedir(), '.refstore');

const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const EnvSchema = z.object({
  REFSTORE_DATA_DIR: z.preprocess(blankAsUndefined, z.string().optional()),
  REFSTORE_LOCK_TIMEOUT_MS: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().optional()
  ),
  REFSTORE_LOCK_STALE_MS: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().optional()
  )
});

/**
 * Resolves the server configuration.
 *
 * @param env - Environment to read (defaults to `process.env`)
 * @throws {ValidationError} INVALID_CONFIG if a variable has an unusable value
 *
 * @example
 * loadServerConfig({ REFSTORE_DATA_DIR: '/srv/refs' });
 * // { storage_root: '/srv/refs', lock_timeout_ms: 60000, lock_stale_timeout_ms: 30000 }
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(
      `Invalid configuration: ${issue?.path.join('.') ?? 'environment'} ${issue?.message ?? ''}`.trim(),
      'INVALID_CONFIG',
      { issues: result.error.issues.map(i => ({ variable: i.path.join('.'), message: i.message })) }
    );
  }

  const parsed = result.data;
  return {
    storage_root: path.resolve(parsed.REFSTORE_DATA_DIR ?? DEFAULT_STORAGE_PATH),
    lock_timeout_ms: parsed.REFSTORE_LOCK_TIMEOUT_MS ?? DEFAULT_LOCK_TIMEOUT_MS,
    lock_stale_timeout_ms: parsed.REFSTORE_LOCK_STALE_MS ?? DEFAULT_LOCK_STALE_MS
  };
}
