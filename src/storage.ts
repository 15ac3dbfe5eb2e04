/**
 * File System Reference Store
 *
 * This module is the only component that touches persisted reference state.
 * It implements create/read/update/delete/list/cleanup over references, owns
 * versioning, and keeps records written in the legacy JSON format readable
 * until the next write upgrades them.
 *
 * **Architecture Principles:**
 * - **Atomic Operations**: All writes use temp-file-then-rename pattern for crash safety
 * - **Per-name Locking**: Mutations of one name are totally ordered; other names proceed freely
 * - **Security by Default**: Every name is validated by {@link ReferencePathResolver} before use
 * - **No Cache**: Every read goes to disk, so a read never observes a stale record
 *
 * **Storage Layout:**
 * ```
 * <root>/
 *   refs/                    - One file per reference, segments as directories
 *     prompts/
 *       greeting.yaml        - Current format
 *     sites/
 *       reddit.json          - Legacy format (read-only, replaced on next write)
 *   locks/                   - Per-name lock files
 *     <hash>.lock
 * ```
 *
 * @module storage
 * @see {@link ReferenceServer} for MCP protocol layer
 */

import * as fs from 'fs/promises';
import type { Dirent } from 'fs';
import type { FileHandle } from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import type {
  CleanupResult,
  ComposeSources,
  DeleteResult,
  RecordFormat,
  ReferenceMetadata,
  ReferenceRecord,
  ReferenceSnapshot,
  ReferenceStoreContract,
  StoreOptions,
  WriteResult
} from './types.js';
import {
  FormatError,
  InvalidReferenceNameError,
  ReferenceNotFoundError,
  StorageIOError,
  ValidationError,
  errnoCode,
  settle
} from './errors.js';
import type { StoreOperation } from './errors.js';
import { CURRENT_EXTENSION, LEGACY_EXTENSION, ReferencePathResolver } from './paths.js';
import { ReferenceLockManager } from './locks.js';
import { RecordDecodeError, decodeRecord, encodeRecord } from './format.js';

/** Separator placed between references concatenated by composeInput */
export const COMPOSE_SEPARATOR = '\n\n---\n\n';

/** Retries when a concurrent delete prunes the directory being written into */
const MAX_WRITE_ATTEMPTS = 5;

interface LoadedRecord {
  record: ReferenceRecord;
  format: RecordFormat;
}

function isMissing(err: unknown): boolean {
  const code = errnoCode(err);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

function isRecordFile(fileName: string): boolean {
  return fileName.endsWith(CURRENT_EXTENSION) || fileName.endsWith(LEGACY_EXTENSION);
}

/**
 * File system implementation of the {@link ReferenceStoreContract}.
 *
 * **Versioning:**
 * The first write of a name produces version 1; every later write reads the
 * previous version under the name's lock and persists `previous + 1`. Deleting
 * a name erases its lineage, so the next write starts again at 1.
 *
 * **Thread Safety:**
 * Mutations run inside {@link ReferenceLockManager.withLock}. Reads and
 * listings take no lock; atomic renames guarantee they only ever see whole
 * records.
 *
 * @example
 * ```typescript
 * const store = new FileSystemReferenceStore('/Users/alice/.refstore');
 * await store.initialize();
 *
 * await store.createOrUpdate('prompts/greeting', 'Hello, {name}!');
 * // { name: 'prompts/greeting', version: 1 }
 *
 * await store.update('prompts/greeting', 'Hi, {name}!');
 * // { name: 'prompts/greeting', version: 2 }
 * ```
 */
export class FileSystemReferenceStore implements ReferenceStoreContract {
  /** Absolute path to storage root directory */
  private root: string;

  readonly resolver: ReferencePathResolver;

  private locks: ReferenceLockManager;

  private now: () => Date;

  /**
   * Creates a new store instance. Nothing is touched on disk until
   * {@link initialize} or the first write.
   *
   * @param rootPath - Storage root (typically ~/.refstore)
   */
  constructor(rootPath: string, options: StoreOptions = {}) {
    this.root = path.resolve(rootPath);
    this.resolver = new ReferencePathResolver(path.join(this.root, 'refs'));
    this.locks = new ReferenceLockManager(path.join(this.root, 'locks'), {
      timeoutMs: options.lockTimeoutMs,
      staleMs: options.lockStaleMs
    });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Creates the `refs/` and `locks/` directories.
   *
   * **Idempotent:** Safe to call multiple times; existing records are preserved.
   */
  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.resolver.refsDir, { recursive: true });
      await fs.mkdir(path.join(this.root, 'locks'), { recursive: true });
    } catch (err: unknown) {
      throw StorageIOError.fromCause(err, this.root, 'initialize');
    }
  }

  // ============================================================================
  // Atomic file operations
  // ============================================================================

  /**
   * Atomically writes content to a file with crash safety guarantees.
   *
   * Uses the standard atomic write pattern:
   * 1. Write to temporary file with unique UUID name
   * 2. Call fsync() to flush to disk
   * 3. Atomically rename temp file to target path
   *
   * A failure at any step leaves the previous file untouched and removes
   * the temporary file.
   */
  private async atomicWrite(
    filePath: string,
    content: string,
    name: string,
    operation: StoreOperation
  ): Promise<void> {
    const dir = path.dirname(filePath);
    // Fixed-length name, so a segment at the length limit still fits
    const tempPath = path.join(dir, `.${randomUUID()}.tmp`);

    try {
      for (let attempt = 1; ; attempt++) {
        await fs.mkdir(dir, { recursive: true });
        try {
          await fs.writeFile(tempPath, content, 'utf-8');
          break;
        } catch (err: unknown) {
          // Directory pruned by a concurrent delete between mkdir and write
          if (errnoCode(err) === 'ENOENT' && attempt < MAX_WRITE_ATTEMPTS) {
            continue;
          }
          throw err;
        }
      }

      const handle = await fs.open(tempPath, 'r');
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }

      await fs.rename(tempPath, filePath);
    } catch (err: unknown) {
      try {
        await fs.rm(tempPath, { force: true });
      } catch (cleanupErr: unknown) {
        console.warn(`Failed to remove temporary file ${tempPath}:`, cleanupErr);
      }
      throw StorageIOError.fromCause(err, name, operation);
    }
  }

  /**
   * Reads and decodes one record file.
   *
   * @returns The record, or null if the file does not exist
   * @throws {FormatError} If the file exists but does not parse
   * @throws {StorageIOError} On any other I/O failure
   */
  private async readRecordFile(
    name: string,
    filePath: string,
    format: RecordFormat,
    operation: StoreOperation
  ): Promise<LoadedRecord | null> {
    let handle: FileHandle;
    try {
      handle = await fs.open(filePath, 'r');
    } catch (err: unknown) {
      if (isMissing(err)) {
        return null;
      }
      throw StorageIOError.fromCause(err, name, operation);
    }

    let text: string;
    let modified: Date;
    try {
      const stats = await handle.stat();
      modified = stats.mtime;
      text = await handle.readFile('utf-8');
    } catch (err: unknown) {
      throw StorageIOError.fromCause(err, name, operation);
    } finally {
      await handle.close();
    }

    try {
      return { record: decodeRecord(text, format, modified.toISOString()), format };
    } catch (err: unknown) {
      if (err instanceof RecordDecodeError) {
        throw new FormatError(name, operation, format, err.message);
      }
      throw err;
    }
  }

  /**
   * Loads a record through the fallback chain: current format, then legacy.
   *
   * When both are missing the current location is checked once more, since
   * a concurrent write may have just replaced the legacy file with a current
   * one.
   */
  private async loadRecord(name: string, operation: StoreOperation): Promise<LoadedRecord | null> {
    const location = this.resolver.resolve(name, operation);

    const current = await this.readRecordFile(name, location, 'current', operation);
    if (current) {
      return current;
    }

    const legacy = await this.readRecordFile(
      name,
      this.resolver.toLegacy(location),
      'legacy',
      operation
    );
    if (legacy) {
      return legacy;
    }

    return this.readRecordFile(name, location, 'current', operation);
  }

  // ============================================================================
  // Write operations
  // ============================================================================

  /**
   * Creates a reference or replaces its content, incrementing the version.
   *
   * The read of the previous version and the write of the new one happen
   * under the name's lock, so concurrent callers each receive a distinct
   * version and none of their writes is lost. A legacy record for the name
   * is upgraded: the YAML record is written, then the JSON file is removed.
   *
   * @param name - Reference name (e.g., 'prompts/greeting')
   * @param content - Text payload (may be empty)
   * @param metadata - Auxiliary attributes; replaced wholesale, `{}` when omitted
   *
   * @throws {InvalidReferenceNameError} If the name is malformed
   * @throws {FormatError} If an existing record for the name cannot be parsed
   * @throws {StorageIOError} If persisting fails (the previous record stays intact)
   *
   * @example
   * ```typescript
   * await store.createOrUpdate('pipeline/step3', summary, { source: 'summarizer' });
   * ```
   */
  async createOrUpdate(
    name: string,
    content: string,
    metadata?: ReferenceMetadata
  ): Promise<WriteResult> {
    return this.writeRecord(name, content, metadata, 'create_or_update');
  }

  /**
   * Replaces the content of an existing reference.
   *
   * Unlike {@link createOrUpdate}, the name must already exist, and omitted
   * metadata keeps the previous metadata.
   *
   * @throws {ReferenceNotFoundError} If no record exists for the name
   */
  async update(name: string, content: string, metadata?: ReferenceMetadata): Promise<WriteResult> {
    return this.writeRecord(name, content, metadata, 'update');
  }

  private async writeRecord(
    name: string,
    content: string,
    metadata: ReferenceMetadata | undefined,
    operation: 'create_or_update' | 'update'
  ): Promise<WriteResult> {
    const canonical = this.resolver.normalize(name, operation);
    const location = this.resolver.resolve(canonical, operation);

    return this.locks.withLock(canonical, operation, async () => {
      const existing = await this.loadRecord(canonical, operation);
      if (!existing && operation === 'update') {
        throw new ReferenceNotFoundError(canonical, operation);
      }

      const timestamp = this.now().toISOString();
      const inheritedMetadata = operation === 'update' && existing ? existing.record.metadata : {};
      const record: ReferenceRecord = {
        content,
        metadata: metadata ?? inheritedMetadata,
        created: existing ? existing.record.created : timestamp,
        updated: timestamp,
        version: existing ? existing.record.version + 1 : 1
      };

      await this.atomicWrite(location, encodeRecord(record), canonical, operation);
      await this.discardLegacy(canonical, location);

      return { name: canonical, version: record.version };
    });
  }

  /**
   * Removes the legacy JSON file once a current record exists for the name.
   *
   * The current record takes precedence on every read, so a failure here is
   * logged rather than reported as a failed write.
   */
  private async discardLegacy(name: string, location: string): Promise<void> {
    try {
      await fs.unlink(this.resolver.toLegacy(location));
      console.error(`Upgraded legacy reference to current format: ${name}`);
    } catch (err: unknown) {
      if (!isMissing(err)) {
        console.warn(`Failed to remove legacy record for ${name}:`, err);
      }
    }
  }

  // ============================================================================
  // Read operations
  // ============================================================================

  /**
   * Reads a reference, falling back to the legacy format.
   *
   * @throws {ReferenceNotFoundError} If the name has no record in either format
   * @throws {FormatError} If the record exists but cannot be parsed
   *
   * @example
   * ```typescript
   * const ref = await store.read('prompts/greeting');
   * // { name, content: 'Hello, {name}!', metadata: {}, version: 1, created_at, updated_at, format: 'current' }
   * ```
   */
  async read(name: string): Promise<ReferenceSnapshot> {
    const canonical = this.resolver.normalize(name, 'read');
    const loaded = await this.loadRecord(canonical, 'read');
    if (!loaded) {
      throw new ReferenceNotFoundError(canonical, 'read');
    }

    const { record, format } = loaded;
    return {
      name: canonical,
      content: record.content,
      metadata: record.metadata,
      version: record.version,
      created_at: record.created,
      updated_at: record.updated,
      format
    };
  }

  /**
   * Returns true if a record exists for the name in either format.
   * Does not parse the record.
   */
  async exists(name: string): Promise<boolean> {
    const location = this.resolver.resolve(name, 'read');
    for (const filePath of [location, this.resolver.toLegacy(location)]) {
      try {
        const stats = await fs.stat(filePath);
        if (stats.isFile()) {
          return true;
        }
      } catch (err: unknown) {
        if (!isMissing(err)) {
          throw StorageIOError.fromCause(err, name, 'read');
        }
      }
    }
    return false;
  }

  /**
   * Lists reference names starting with `prefix`, sorted.
   *
   * A name present in both formats is reported once. Temporary files from
   * in-flight writes and files that do not decode to a valid name are
   * ignored.
   *
   * @param prefix - Plain string prefix (`'a/'` matches `a/x` but not `ab/x`)
   *
   * @example
   * ```typescript
   * await store.list('a/'); // ['a/x', 'a/y']
   * ```
   */
  async list(prefix?: string): Promise<string[]> {
    const scope = this.resolver.resolvePrefix(prefix, 'list');
    const names = new Set<string>();
    await this.collectNames(scope.directory, names, prefix ?? '');

    return [...names].filter(name => name.startsWith(scope.prefix)).sort();
  }

  private async collectNames(directory: string, names: Set<string>, prefix: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (err: unknown) {
      // Directory removed by a concurrent delete, or never created
      if (isMissing(err)) {
        return;
      }
      throw StorageIOError.fromCause(err, prefix, 'list');
    }

    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        await this.collectNames(fullPath, names, prefix);
      } else if (entry.isFile() && isRecordFile(entry.name)) {
        try {
          names.add(this.resolver.unresolve(fullPath));
        } catch (err: unknown) {
          if (!(err instanceof InvalidReferenceNameError)) {
            throw err;
          }
        }
      }
    }
  }

  // ============================================================================
  // Removal
  // ============================================================================

  /**
   * Deletes a reference in both formats.
   *
   * Directories left empty by the removal are pruned up to the refs root.
   * Records that fail to parse can still be deleted.
   *
   * @throws {ReferenceNotFoundError} If the name has no record
   */
  async delete(name: string): Promise<DeleteResult> {
    const canonical = this.resolver.normalize(name, 'delete');
    const location = this.resolver.resolve(canonical, 'delete');

    return this.locks.withLock(canonical, 'delete', async () => {
      const removed = await this.removeRecordFiles(canonical, location, 'delete');
      if (!removed) {
        throw new ReferenceNotFoundError(canonical, 'delete');
      }
      return { deleted: true, name: canonical };
    });
  }

  /**
   * Unlinks the current and legacy files. Caller must hold the name's lock.
   *
   * @returns true if at least one file was removed
   */
  private async removeRecordFiles(
    name: string,
    location: string,
    operation: StoreOperation
  ): Promise<boolean> {
    let removed = false;
    for (const filePath of [location, this.resolver.toLegacy(location)]) {
      try {
        await fs.unlink(filePath);
        removed = true;
      } catch (err: unknown) {
        if (!isMissing(err)) {
          throw StorageIOError.fromCause(err, name, operation);
        }
      }
    }

    if (removed) {
      await this.pruneEmptyDirectories(path.dirname(location));
    }
    return removed;
  }

  private async pruneEmptyDirectories(directory: string): Promise<void> {
    const refsDir = this.resolver.refsDir;
    let current = directory;

    while (current.startsWith(refsDir + path.sep)) {
      try {
        await fs.rmdir(current);
      } catch (err: unknown) {
        const code = errnoCode(err);
        if (code !== 'ENOTEMPTY' && code !== 'EEXIST' && code !== 'ENOENT') {
          console.warn(`Failed to prune empty directory ${current}:`, err);
        }
        return;
      }
      current = path.dirname(current);
    }
  }

  /**
   * Removes references under `prefix` whose last write is older than
   * `maxAgeSeconds`.
   *
   * Best-effort: a record that cannot be checked or removed is logged and
   * skipped, and records that disappear mid-sweep are simply not counted.
   * Each removal holds the record's lock, so a concurrent write either lands
   * before the age check (and keeps the record) or after the removal (and
   * starts a new lineage).
   *
   * @param prefix - Name prefix to sweep (e.g., 'pipeline/')
   * @param maxAgeSeconds - Records with `updated_at` before `now - maxAgeSeconds` are removed
   *
   * @throws {ValidationError} If maxAgeSeconds is negative or not finite
   * @throws {InvalidReferenceNameError} If the prefix is malformed
   *
   * @example
   * ```typescript
   * await store.cleanup('tmp/', 86400); // { removed: 3 }
   * ```
   */
  async cleanup(prefix: string, maxAgeSeconds: number): Promise<CleanupResult> {
    if (!Number.isFinite(maxAgeSeconds) || maxAgeSeconds < 0) {
      throw new ValidationError(
        'max_age_seconds must be a finite, non-negative number',
        'INVALID_MAX_AGE',
        { provided: maxAgeSeconds }
      );
    }

    const cutoff = this.now().getTime() - maxAgeSeconds * 1000;
    const names = await this.list(prefix);
    let removed = 0;

    for (const name of names) {
      try {
        const wasRemoved = await this.locks.withLock(name, 'cleanup', async () => {
          const loaded = await this.loadRecord(name, 'cleanup');
          if (!loaded) {
            return false;
          }

          const updatedAt = Date.parse(loaded.record.updated);
          if (Number.isNaN(updatedAt)) {
            throw new FormatError(name, 'cleanup', loaded.format, `unparseable timestamp "${loaded.record.updated}"`);
          }
          if (updatedAt >= cutoff) {
            return false;
          }

          return this.removeRecordFiles(name, this.resolver.resolve(name, 'cleanup'), 'cleanup');
        });
        if (wasRemoved) {
          removed++;
        }
      } catch (err: unknown) {
        console.warn(`Skipping reference ${name} during cleanup:`, err instanceof Error ? err.message : err);
      }
    }

    if (removed > 0) {
      console.error(`Cleaned ${removed} old references with prefix '${prefix}'`);
    }
    return { removed };
  }

  // ============================================================================
  // Input composition
  // ============================================================================

  /**
   * Builds tool input text from references or a literal prompt.
   *
   * Priority: `ref` > `refs` > `promptRef` > `prompt`. Missing entries of
   * `refs` are skipped with a warning; when none of them exist the next
   * source is tried.
   *
   * @throws {ValidationError} NO_INPUT if no source yields text
   * @throws {ReferenceNotFoundError} If `ref` or `promptRef` is missing
   *
   * @example
   * ```typescript
   * await store.composeInput({ refs: ['personas/critic', 'drafts/intro'] });
   * // "<critic>\n\n---\n\n<intro>"
   * ```
   */
  async composeInput(sources: ComposeSources): Promise<string> {
    if (sources.ref) {
      return (await this.read(sources.ref)).content;
    }

    if (sources.refs && sources.refs.length > 0) {
      const contents: string[] = [];
      for (const ref of sources.refs) {
        const outcome = await settle(this.read(ref));
        if (outcome.ok) {
          contents.push(outcome.value.content);
        } else if (outcome.error.kind === 'ReferenceNotFound') {
          console.warn(`Reference not found while composing input: ${ref}`);
        } else {
          throw outcome.error;
        }
      }
      if (contents.length > 0) {
        return contents.join(COMPOSE_SEPARATOR);
      }
    }

    if (sources.promptRef) {
      return (await this.read(sources.promptRef)).content;
    }

    if (sources.prompt) {
      return sources.prompt;
    }

    throw new ValidationError(
      'No input provided. Use prompt, ref, refs, or prompt_ref.',
      'NO_INPUT'
    );
  }
}
