// SPDX-License-Identifier: BUSL-1.1
// Copyright (c) 2025 Theodor Storm

/**
 * Record serialization
 *
 * Current records are YAML documents (readable and hand-editable); legacy
 * records are JSON documents with the same fields. Both decode into a
 * {@link ReferenceRecord}. Records written by older tooling may lack
 * `version`, `metadata` or timestamps, so the decoder takes fallbacks for
 * those instead of rejecting the record.
 *
 * @module format
 */

import { parse, stringify } from 'yaml';
import { z } from 'zod';
import type { RecordFormat, ReferenceRecord } from './types.js';

const TimestampSchema = z
  .union([z.string().min(1), z.date()])
  .transform(value => (value instanceof Date ? value.toISOString() : value));

const StoredRecordSchema = z.object({
  content: z.string().default(''),
  metadata: z.record(z.unknown()).nullish(),
  created: TimestampSchema.optional(),
  updated: TimestampSchema.optional(),
  version: z.number().int().positive().optional()
});

/** Raised by {@link decodeRecord}; the store wraps it in a FormatError. */
export class RecordDecodeError extends Error {
  constructor(
    public readonly format: RecordFormat,
    message: string
  ) {
    super(message);
    this.name = 'RecordDecodeError';
  }
}

/**
 * Serializes a record in the current (YAML) format.
 *
 * @example
 * encodeRecord({ content: 'Hi', metadata: {}, created: t, updated: t, version: 1 });
 * // "content: Hi\nmetadata: {}\ncreated: ...\nupdated: ...\nversion: 1\n"
 */
export function encodeRecord(record: ReferenceRecord): string {
  return stringify(
    {
      content: record.content,
      metadata: record.metadata,
      created: record.created,
      updated: record.updated,
      version: record.version
    },
    { lineWidth: 0 }
  );
}

/**
 * Parses a stored record.
 *
 * @param text - File contents
 * @param format - Which serialization to expect
 * @param fallbackTimestamp - Used for missing `created`/`updated` (the file's mtime)
 * @throws {RecordDecodeError} If the text is not a record in that format
 */
export function decodeRecord(
  text: string,
  format: RecordFormat,
  fallbackTimestamp: string
): ReferenceRecord {
  let document: unknown;
  try {
    document = format === 'current' ? parse(text) : JSON.parse(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RecordDecodeError(format, `not valid ${format === 'current' ? 'YAML' : 'JSON'}: ${reason}`);
  }

  const result = StoredRecordSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new RecordDecodeError(format, `unexpected record shape${where}: ${issue?.message ?? 'invalid'}`);
  }

  const stored = result.data;
  const updated = stored.updated ?? stored.created ?? fallbackTimestamp;
  return {
    content: stored.content,
    metadata: stored.metadata ?? {},
    created: stored.created ?? updated,
    updated,
    version: stored.version ?? 1
  };
}
