// SPDX-License-Identifier: BUSL-1.1
// Copyright (c) 2025 Theodor Storm

/**
 * Core type definitions for the reference store
 *
 * A reference is a named, versioned, durable unit of text (a prompt, a
 * template, a persona, an intermediate pipeline result). Names are
 * hierarchical (`prompts/greeting`, `pipeline/step3`) and map one-to-one
 * onto files under the storage root.
 *
 * **Design Principles:**
 * - ISO 8601 timestamps for all temporal data
 * - Content is opaque; metadata is stored verbatim and never validated
 * - One persisted record per name, versions gapless within a lineage
 *
 * @module types
 */

/** Open map of auxiliary attributes (tags, source tool, ...). */
export type ReferenceMetadata = Record<string, unknown>;

/** Which on-disk serialization a record was read from. */
export type RecordFormat = 'current' | 'legacy';

/**
 * The persisted shape of a reference, identical in both formats.
 *
 * @example
 * {
 *   content: "Hello, {name}!",
 *   metadata: { source: "prompt-optimizer" },
 *   created: "2026-10-18T09:00:00.000Z",
 *   updated: "2026-10-18T09:05:00.000Z",
 *   version: 2
 * }
 */
export interface ReferenceRecord {
  /** Opaque text payload */
  content: string;

  /** Auxiliary attributes stored alongside content */
  metadata: ReferenceMetadata;

  /** ISO 8601 timestamp of the first write in this lineage (immutable) */
  created: string;

  /** ISO 8601 timestamp of the latest write */
  updated: string;

  /** Starts at 1, incremented by exactly 1 on every write */
  version: number;
}

/**
 * A reference as returned by `read`.
 */
export interface ReferenceSnapshot {
  name: string;
  content: string;
  metadata: ReferenceMetadata;
  version: number;
  created_at: string;
  updated_at: string;
  /** Format the record was found in; `legacy` until the next write upgrades it */
  format: RecordFormat;
}

/** Result of a successful write. */
export interface WriteResult {
  name: string;
  /** The version this write produced */
  version: number;
}

export interface DeleteResult {
  deleted: true;
  name: string;
}

export interface CleanupResult {
  removed: number;
}

/**
 * Sources for {@link ReferenceStoreContract.composeInput}, in priority order
 * `ref` > `refs` > `promptRef` > `prompt`.
 */
export interface ComposeSources {
  /** A single reference whose content is the whole input */
  ref?: string;
  /** References concatenated with a `---` separator; missing ones are skipped */
  refs?: string[];
  /** A reference holding a prompt */
  promptRef?: string;
  /** Literal prompt text */
  prompt?: string;
}

/**
 * Tunables for a store instance. All are optional.
 */
export interface StoreOptions {
  /** Maximum wait for a per-name lock before failing with LOCK_TIMEOUT (default: 60000) */
  lockTimeoutMs?: number;

  /** Lock files older than this are considered abandoned and removed (default: 30000) */
  lockStaleMs?: number;

  /** Clock used for timestamps and cleanup ages (default: `() => new Date()`) */
  now?: () => Date;
}

/**
 * The operation set consumed by tool handlers and feature modules.
 *
 * Every method may block on storage I/O. Failures are raised as
 * {@link ReferenceStoreError} subclasses.
 */
export interface ReferenceStoreContract {
  /** Upsert: version 1 for a new name, previous version + 1 otherwise */
  createOrUpdate(name: string, content: string, metadata?: ReferenceMetadata): Promise<WriteResult>;

  read(name: string): Promise<ReferenceSnapshot>;

  /** Like createOrUpdate, but fails with ReferenceNotFound when the name is absent */
  update(name: string, content: string, metadata?: ReferenceMetadata): Promise<WriteResult>;

  delete(name: string): Promise<DeleteResult>;

  /** Sorted names starting with `prefix` (all names when omitted) */
  list(prefix?: string): Promise<string[]>;

  /** Removes references under `prefix` last written more than `maxAgeSeconds` ago */
  cleanup(prefix: string, maxAgeSeconds: number): Promise<CleanupResult>;

  exists(name: string): Promise<boolean>;

  composeInput(sources: ComposeSources): Promise<string>;
}

/**
 * Server configuration resolved from the environment.
 *
 * **Environment Variables:**
 * - `REFSTORE_DATA_DIR`: storage root (default: ~/.refstore)
 * - `REFSTORE_LOCK_TIMEOUT_MS`: per-name lock wait limit
 * - `REFSTORE_LOCK_STALE_MS`: age after which a lock file is abandoned
 */
export interface ServerConfig {
  /** Absolute path to storage root directory */
  storage_root: string;

  lock_timeout_ms: number;

  lock_stale_timeout_ms: number;
}
