import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';
import { MetadataDocument, foldValue } from '../src/metadata/MetadataDocument.js';
import { parseRecord, serializeRecord, type RecordEntry } from '../src/record/record.js';
import { expandTagSet, tagSetFromTags } from '../src/tags/tags.js';
import { compareVersions } from '../src/tags/version.js';
import { WheelArchive } from '../src/wheel/WheelArchive.js';
import { buildWheel } from '../src/wheel/WheelBuilder.js';

const PROPERTY_CONFIG = {
  numRuns: 120,
  seed: 0x5eedc0de
} as const;

const BUILD_PROPERTY_CONFIG = {
  numRuns: 24,
  seed: 0x5eedcafe
} as const;

const fieldName = fc.stringMatching(/^[A-Za-z][A-Za-z0-9-]{0,15}$/);
const fieldValue = fc.stringMatching(/^[ -~\n]{0,40}$/);
const pathSegment = fc
  .stringMatching(/^[A-Za-z0-9_.,"-]{1,8}$/)
  .filter((segment) => segment !== '.' && segment !== '..');
const recordPath = fc.array(pathSegment, { minLength: 1, maxLength: 3 }).map((segments) => segments.join('/'));

test('property: METADATA values read back folded', () => {
  fc.assert(
    fc.property(fc.array(fc.tuple(fieldName, fieldValue), { maxLength: 8 }), (fields) => {
      const text = new MetadataDocument(fields).toString();
      const parsed = MetadataDocument.parse(text);
      assert.deepEqual(
        parsed.fields(),
        fields.map(([name, value]) => ({ name, value: foldValue(value) }))
      );
      assert.equal(parsed.body, undefined);
    }),
    PROPERTY_CONFIG
  );
});

test('property: reparsing a serialized document gives the same document', () => {
  const fieldLine = fc.tuple(fieldName, fc.stringMatching(/^[ -~]{0,20}$/)).map(([name, value]) => `${name}:${value}`);
  const continuationLine = fc
    .tuple(fc.constantFrom(' ', '\t', '        '), fc.stringMatching(/^[ -~]{0,20}$/))
    .map(([indent, text]) => `${indent}${text}`);
  const lines = fc
    .tuple(fieldLine, fc.array(fc.oneof(fieldLine, continuationLine), { maxLength: 10 }))
    .map(([first, rest]) => [first, ...rest]);
  fc.assert(
    fc.property(lines, fc.boolean(), (source, trailingNewline) => {
      const first = MetadataDocument.parse(source.join('\n') + (trailingNewline ? '\n' : ''));
      const second = MetadataDocument.parse(first.toString());
      assert.deepEqual(second.fields(), first.fields());
      assert.equal(second.body, first.body);
    }),
    PROPERTY_CONFIG
  );
});

test('property: RECORD rows survive serialize and parse', () => {
  const entry = fc.record(
    {
      path: recordPath,
      digest: fc.stringMatching(/^[A-Za-z0-9_-]{1,43}$/).map((value) => ({ algorithm: 'sha256', value })),
      size: fc.nat()
    },
    { requiredKeys: ['path'] }
  );
  fc.assert(
    fc.property(fc.uniqueArray(entry, { selector: (item) => item.path, maxLength: 10 }), (generated) => {
      const entries: RecordEntry[] = generated.map((item) => ({
        path: item.path,
        ...(item.digest !== undefined ? { digest: item.digest } : {}),
        ...(item.size !== undefined ? { size: item.size } : {})
      }));
      assert.deepEqual(parseRecord(serializeRecord(entries)), entries);
    }),
    PROPERTY_CONFIG
  );
});

test('property: compressed tags expand to the full cross product', () => {
  const values = fc.uniqueArray(fc.stringMatching(/^[a-z0-9_]{1,6}$/), { minLength: 1, maxLength: 3 });
  fc.assert(
    fc.property(values, values, values, (interpreters, abis, platforms) => {
      const tags = { interpreters, abis, platforms };
      const expanded = expandTagSet(tags);
      assert.equal(expanded.length, interpreters.length * abis.length * platforms.length);
      assert.deepEqual(tagSetFromTags(expanded), tags);
    }),
    PROPERTY_CONFIG
  );
});

test('property: version comparison is antisymmetric and only equal for equal strings', () => {
  const version = fc.stringMatching(/^[0-9a-z]{1,3}(\.[0-9a-z]{1,3}){0,3}$/);
  fc.assert(
    fc.property(version, version, (a, b) => {
      const forward = compareVersions(a, b);
      const backward = compareVersions(b, a);
      assert.ok(forward === -backward, `${a} vs ${b}: ${forward} and ${backward}`);
      assert.equal(forward === 0, a === b);
    }),
    PROPERTY_CONFIG
  );
});

test('property: builds are deterministic and verify cleanly', () => {
  const payloadPath = fc
    .array(fc.stringMatching(/^[a-z0-9_]{1,8}$/), { minLength: 1, maxLength: 3 })
    .map((segments) => segments.join('/'));
  const files = fc.uniqueArray(fc.tuple(payloadPath, fc.uint8Array({ maxLength: 64 })), {
    selector: ([path]) => path,
    maxLength: 6
  });
  fc.assert(
    fc.property(files, fc.constantFrom<'store' | 'deflate'>('store', 'deflate'), (entries, compression) => {
      const options = { distribution: 'prop', version: '1.0', files: entries, compression };
      const first = buildWheel(options);
      assert.deepEqual(buildWheel(options).bytes, first.bytes);

      const archive = WheelArchive.open(first.bytes);
      assert.deepEqual(archive.verify(), []);
      assert.equal(archive.paths().length, entries.length + 3);
    }),
    BUILD_PROPERTY_CONFIG
  );
});
