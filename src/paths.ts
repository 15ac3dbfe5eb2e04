// SPDX-License-Identifier: BUSL-1.1
// Copyright (c) 2025 Theodor Storm

/**
 * Reference name ⇄ storage location mapping
 *
 * `prompts/greeting` lives at `<refs>/prompts/greeting.yaml` (current format)
 * and, for records written by older tooling, `<refs>/prompts/greeting.json`.
 * Segments become directories, so prefix listings become directory scans.
 *
 * **Security:**
 * Names are validated before any path is built. Traversal segments, empty
 * segments, control characters and backslashes are rejected, so a resolved
 * location can never escape the refs directory.
 *
 * @module paths
 */

import * as path from 'path';
import { InvalidReferenceNameError } from './errors.js';
import type { StoreOperation } from './errors.js';

/** Extension of current-format (YAML) records */
export const CURRENT_EXTENSION = '.yaml';

/** Extension of legacy-format (JSON) records */
export const LEGACY_EXTENSION = '.json';

const RECORD_EXTENSIONS = [CURRENT_EXTENSION, LEGACY_EXTENSION];

export const MAX_NAME_LENGTH = 1024;

/** In UTF-8 bytes; leaves room for the record extension within 255-byte file name limits */
export const MAX_SEGMENT_LENGTH = 255 - Math.max(CURRENT_EXTENSION.length, LEGACY_EXTENSION.length);

const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;

/**
 * Where a listing prefix can match, as computed by
 * {@link ReferencePathResolver.resolvePrefix}.
 */
export interface PrefixScope {
  /** Normalized prefix to compare names against (may be empty) */
  prefix: string;
  /** Deepest directory that can contain matching records */
  directory: string;
}

export class ReferencePathResolver {
  /** Absolute path of the directory holding all records */
  readonly refsDir: string;

  constructor(refsDir: string) {
    this.refsDir = path.resolve(refsDir);
  }

  /**
   * Returns the canonical form of `name` (leading and trailing `/` removed).
   *
   * @throws {InvalidReferenceNameError} If the name is empty or malformed
   */
  normalize(name: string, operation: StoreOperation = 'resolve'): string {
    const trimmed = name.replace(/^\/+|\/+$/g, '');
    if (trimmed.length === 0) {
      throw new InvalidReferenceNameError(
        'Invalid reference name: must not be empty',
        name,
        operation
      );
    }
    this.assertSegments(trimmed, name, operation, true);
    return trimmed;
  }

  /**
   * Maps a reference name to the location of its current-format record.
   *
   * @example
   * resolver.resolve('/prompts/greeting/'); // <refs>/prompts/greeting.yaml
   */
  resolve(name: string, operation: StoreOperation = 'resolve'): string {
    const canonical = this.normalize(name, operation);
    return path.join(this.refsDir, ...canonical.split('/')) + CURRENT_EXTENSION;
  }

  /** Location of the legacy JSON record for `name`. */
  legacyLocation(name: string, operation: StoreOperation = 'resolve'): string {
    return this.toLegacy(this.resolve(name, operation));
  }

  /** Swaps the current extension of a resolved location for the legacy one. */
  toLegacy(location: string): string {
    return location.slice(0, -CURRENT_EXTENSION.length) + LEGACY_EXTENSION;
  }

  /**
   * Inverse of {@link resolve}. Accepts current and legacy record locations.
   *
   * @throws {InvalidReferenceNameError} If the location is outside the refs
   *   directory, has no record extension, or does not decode to a valid name
   */
  unresolve(location: string): string {
    const relative = path.relative(this.refsDir, path.resolve(location));
    const escapes = relative === '..' || relative.startsWith('..' + path.sep);
    if (relative === '' || escapes || path.isAbsolute(relative)) {
      throw new InvalidReferenceNameError(
        'Location is outside the reference store',
        location,
        'resolve'
      );
    }

    const extension = RECORD_EXTENSIONS.find(ext => relative.endsWith(ext));
    if (!extension) {
      throw new InvalidReferenceNameError(
        'Location is not a reference record',
        location,
        'resolve',
        { expected: RECORD_EXTENSIONS }
      );
    }

    const name = relative.slice(0, -extension.length).split(path.sep).join('/');
    if (this.normalize(name) !== name) {
      throw new InvalidReferenceNameError(
        'Location does not map to a canonical reference name',
        location,
        'resolve'
      );
    }
    return name;
  }

  /**
   * Validates a listing prefix and narrows the directory to scan.
   *
   * Complete segments of the prefix become directories; a trailing partial
   * segment is matched by name comparison. An empty prefix scans everything.
   *
   * @example
   * resolver.resolvePrefix('a/');   // { prefix: 'a/', directory: <refs>/a }
   * resolver.resolvePrefix('a/bc'); // { prefix: 'a/bc', directory: <refs>/a }
   */
  resolvePrefix(prefix: string | undefined, operation: StoreOperation = 'list'): PrefixScope {
    const raw = prefix ?? '';
    const withoutLeading = raw.replace(/^\/+/, '');
    if (withoutLeading.length === 0) {
      return { prefix: '', directory: this.refsDir };
    }
    if (withoutLeading.length > MAX_NAME_LENGTH) {
      throw new InvalidReferenceNameError(
        `Invalid reference prefix: exceeds ${MAX_NAME_LENGTH} characters`,
        raw,
        operation,
        { length: withoutLeading.length, max: MAX_NAME_LENGTH }
      );
    }

    const segments = withoutLeading.split('/');
    const complete = segments.slice(0, -1);
    const partial = segments[segments.length - 1];

    if (complete.length > 0) {
      this.assertSegments(complete.join('/'), raw, operation, false);
    }
    // A partial segment may still grow ("." into ".env"), so only characters are checked.
    this.assertCharacters(partial, raw, operation);

    return {
      prefix: withoutLeading,
      directory: path.join(this.refsDir, ...complete)
    };
  }

  private assertSegments(
    canonical: string,
    original: string,
    operation: StoreOperation,
    isFullName: boolean
  ): void {
    if (canonical.length > MAX_NAME_LENGTH) {
      throw new InvalidReferenceNameError(
        `Invalid reference name: exceeds ${MAX_NAME_LENGTH} characters`,
        original,
        operation,
        { length: canonical.length, max: MAX_NAME_LENGTH }
      );
    }
    this.assertCharacters(canonical, original, operation);

    const segments = canonical.split('/');
    segments.forEach((segment, index) => {
      if (segment === '') {
        throw new InvalidReferenceNameError(
          'Invalid reference name: empty path segment',
          original,
          operation
        );
      }
      if (segment === '.' || segment === '..') {
        this.rejectTraversal(original, operation, segment);
      }
      const bytes = Buffer.byteLength(segment, 'utf8');
      if (bytes > MAX_SEGMENT_LENGTH) {
        throw new InvalidReferenceNameError(
          `Invalid reference name: segment exceeds ${MAX_SEGMENT_LENGTH} bytes`,
          original,
          operation,
          { segment, bytes, max: MAX_SEGMENT_LENGTH }
        );
      }
      const isDirectory = !isFullName || index < segments.length - 1;
      if (isDirectory && RECORD_EXTENSIONS.some(ext => segment.endsWith(ext))) {
        // Would share a path with the record file of the same stem.
        throw new InvalidReferenceNameError(
          'Invalid reference name: only the last segment may end in a record extension',
          original,
          operation,
          { segment }
        );
      }
    });
  }

  private assertCharacters(value: string, original: string, operation: StoreOperation): void {
    if (CONTROL_CHARACTERS.test(value)) {
      throw new InvalidReferenceNameError(
        'Invalid reference name: contains control characters',
        original,
        operation
      );
    }
    if (value.includes('\\')) {
      throw new InvalidReferenceNameError(
        'Invalid reference name: backslash is not a separator, use "/"',
        original,
        operation
      );
    }
  }

  private rejectTraversal(original: string, operation: StoreOperation, segment: string): never {
    throw new InvalidReferenceNameError(
      `Invalid reference name: segment "${segment}" is not allowed`,
      original,
      operation,
      { segment }
    );
  }
}
