/**
 * Path resolver tests
 * Tests name normalization, traversal rejection and location round trips
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import * as path from 'path';
import { tmpdir } from 'os';
import { ReferencePathResolver } from '../src/paths.js';

const refsDir = path.join(tmpdir(), 'refstore-paths-test', 'refs');
const resolver = new ReferencePathResolver(refsDir);

const invalidName = { name: 'InvalidReferenceNameError', code: 'INVALID_REFERENCE_NAME' };

describe('Path Resolver: resolve', () => {
  it('should map segments to directories with a .yaml record file', () => {
    assert.strictEqual(
      resolver.resolve('prompts/greeting'),
      path.join(refsDir, 'prompts', 'greeting.yaml')
    );
  });

  it('should strip leading and trailing separators', () => {
    assert.strictEqual(resolver.resolve('/sites/reddit/'), resolver.resolve('sites/reddit'));
    assert.strictEqual(resolver.normalize('//sites/reddit//'), 'sites/reddit');
  });

  it('should place the legacy record beside the current one', () => {
    assert.strictEqual(
      resolver.legacyLocation('sites/reddit'),
      path.join(refsDir, 'sites', 'reddit.json')
    );
  });

  it('should keep names case-sensitive', () => {
    assert.notStrictEqual(resolver.resolve('Prompts/A'), resolver.resolve('prompts/a'));
  });

  it('should reject empty names', () => {
    assert.throws(() => resolver.resolve(''), invalidName);
    assert.throws(() => resolver.resolve('///'), invalidName);
  });

  it('should reject traversal segments', () => {
    for (const name of ['..', '../etc/passwd', 'a/../b', './a', 'a/.', 'a/./b']) {
      assert.throws(() => resolver.resolve(name), invalidName, `Should reject ${name}`);
    }
  });

  it('should reject empty inner segments', () => {
    assert.throws(() => resolver.resolve('a//b'), invalidName);
  });

  it('should reject control characters and backslashes', () => {
    assert.throws(() => resolver.resolve('a\u0000b'), invalidName);
    assert.throws(() => resolver.resolve('line\nbreak'), invalidName);
    assert.throws(() => resolver.resolve('a\\b'), invalidName);
  });

  it('should reject directory segments that end in a record extension', () => {
    assert.throws(() => resolver.resolve('x.yaml/y'), invalidName);
    assert.throws(() => resolver.resolve('x.json/y'), invalidName);
    assert.strictEqual(resolver.resolve('x.yaml'), path.join(refsDir, 'x.yaml.yaml'));
  });

  it('should reject overlong segments', () => {
    assert.throws(() => resolver.resolve('a'.repeat(251)), invalidName);
    assert.doesNotThrow(() => resolver.resolve('a'.repeat(250)));
  });

  it('should measure segment length in UTF-8 bytes', () => {
    assert.doesNotThrow(() => resolver.resolve('\u00e9'.repeat(125)));
    assert.throws(
      () => resolver.resolve('\u00e9'.repeat(126)),
      { ...invalidName, details: { reference: '\u00e9'.repeat(126), operation: 'resolve', segment: '\u00e9'.repeat(126), bytes: 252, max: 250 } }
    );
  });

  it('should report the offending name and operation', () => {
    assert.throws(
      () => resolver.resolve('a/../b', 'create_or_update'),
      {
        reference: 'a/../b',
        operation: 'create_or_update',
        details: { reference: 'a/../b', operation: 'create_or_update', segment: '..' }
      }
    );
  });
});

describe('Path Resolver: unresolve', () => {
  it('should round-trip valid names', () => {
    const names = [
      'a',
      'prompts/greeting',
      'pipeline/step3',
      'deeply/nested/group/of/names',
      'with spaces/and-dashes_underscores',
      'unicode/名前/ünïcode',
      'dots/v1.2.3',
      '.hidden/.env',
      '..foo',
      '..bar/baz',
      'x.yaml'
    ];
    for (const name of names) {
      assert.strictEqual(resolver.unresolve(resolver.resolve(name)), name);
    }
  });

  it('should map legacy locations to the same name', () => {
    assert.strictEqual(resolver.unresolve(resolver.legacyLocation('sites/reddit')), 'sites/reddit');
  });

  it('should resolve distinct names to distinct locations', () => {
    const locations = new Set(['a', 'a/b', 'ab', 'a.b', 'A'].map(name => resolver.resolve(name)));
    assert.strictEqual(locations.size, 5);
  });

  it('should not mistake names starting with two dots for escapes', () => {
    assert.strictEqual(resolver.unresolve(path.join(refsDir, '..foo.yaml')), '..foo');
    assert.strictEqual(resolver.unresolve(path.join(refsDir, '..bar', 'baz.json')), '..bar/baz');
  });

  it('should reject locations outside the refs directory', () => {
    assert.throws(() => resolver.unresolve(path.join(refsDir, '..', 'locks', 'x.yaml')), invalidName);
    assert.throws(() => resolver.unresolve(refsDir), invalidName);
  });

  it('should reject files that are not records', () => {
    assert.throws(() => resolver.unresolve(path.join(refsDir, 'a', 'b.yaml.1234.tmp')), invalidName);
    assert.throws(() => resolver.unresolve(path.join(refsDir, 'notes.txt')), invalidName);
  });
});

describe('Path Resolver: prefixes', () => {
  it('should scan the whole store for an empty prefix', () => {
    assert.deepStrictEqual(resolver.resolvePrefix(undefined), { prefix: '', directory: refsDir });
    assert.deepStrictEqual(resolver.resolvePrefix(''), { prefix: '', directory: refsDir });
    assert.deepStrictEqual(resolver.resolvePrefix('/'), { prefix: '', directory: refsDir });
  });

  it('should scan the directory of complete segments', () => {
    assert.deepStrictEqual(resolver.resolvePrefix('a/'), {
      prefix: 'a/',
      directory: path.join(refsDir, 'a')
    });
    assert.deepStrictEqual(resolver.resolvePrefix('a/bc'), {
      prefix: 'a/bc',
      directory: path.join(refsDir, 'a')
    });
    assert.deepStrictEqual(resolver.resolvePrefix('ab'), { prefix: 'ab', directory: refsDir });
  });

  it('should allow a partial segment that could grow into a valid name', () => {
    assert.deepStrictEqual(resolver.resolvePrefix('a/.'), {
      prefix: 'a/.',
      directory: path.join(refsDir, 'a')
    });
  });

  it('should reject traversal in complete segments', () => {
    assert.throws(() => resolver.resolvePrefix('../'), invalidName);
    assert.throws(() => resolver.resolvePrefix('a/../b'), invalidName);
    assert.throws(() => resolver.resolvePrefix('a\u0007'), invalidName);
  });
});
