import test from 'node:test';
import assert from 'node:assert/strict';
import { ZipError, ZipReader, ZipWriter } from '../src/zip/index.js';

const encoder = new TextEncoder();

function buildZip(
  entries: Array<{ name: string; data: Uint8Array; method?: 0 | 8; mode?: number }>,
  comment?: string
): Uint8Array {
  const writer = new ZipWriter();
  for (const entry of entries) {
    writer.add(entry.name, entry.data, { method: entry.method, mode: entry.mode });
  }
  return writer.finish(comment);
}

test('roundtrip store and deflate', () => {
  const text = encoder.encode('hello');
  const repeated = encoder.encode('wheel '.repeat(500));
  const zip = buildZip([
    { name: 'hello.txt', data: text, method: 0 },
    { name: 'big.txt', data: repeated, method: 8 },
    { name: 'pkg/', data: new Uint8Array(0) }
  ]);
  const reader = ZipReader.fromUint8Array(zip);
  const entries = reader.entries();
  assert.deepEqual(
    entries.map((entry) => [entry.name, entry.method, entry.isDirectory]),
    [
      ['hello.txt', 0, false],
      ['big.txt', 8, false],
      ['pkg/', 0, true]
    ]
  );
  assert.ok((entries[1]?.compressedSize ?? 0) < repeated.length);
  assert.deepEqual(reader.read('hello.txt'), text);
  assert.deepEqual(reader.read('big.txt'), repeated);
  assert.deepEqual(reader.read('pkg/'), new Uint8Array(0));
});

test('read returns independent plain Uint8Array copies', () => {
  const zip = buildZip([
    { name: 'stored.txt', data: encoder.encode('stored'), method: 0 },
    { name: 'deflated.txt', data: encoder.encode('deflated '.repeat(50)), method: 8 }
  ]);
  const reader = ZipReader.fromUint8Array(Buffer.from(zip));
  for (const name of ['stored.txt', 'deflated.txt']) {
    const first = reader.read(name);
    assert.equal(Object.getPrototypeOf(first), Uint8Array.prototype);
    first.fill(0);
    assert.notDeepEqual(reader.read(name), first);
  }
  assert.deepEqual(reader.read('stored.txt'), encoder.encode('stored'));
});

test('stores Unix modes and a fixed timestamp', () => {
  const zip = buildZip([
    { name: 'run.sh', data: encoder.encode('#!/bin/sh\n'), mode: 0o100755 },
    { name: 'plain.txt', data: encoder.encode('x') },
    { name: 'dir/', data: new Uint8Array(0) }
  ]);
  const reader = ZipReader.fromUint8Array(zip);
  assert.deepEqual(
    reader.entries().map((entry) => entry.mode),
    [0o100755, 0o100644, 0o40755]
  );
  assert.equal(reader.get('dir/')?.externalAttributes, ((0o40755 << 16) | 0x10) >>> 0);
  for (const entry of reader.entries()) {
    assert.equal(entry.mtime.getTime(), Date.UTC(1980, 0, 1));
  }
});

test('identical input writes identical bytes', () => {
  const entries = [
    { name: 'a.txt', data: encoder.encode('alpha') },
    { name: 'b.txt', data: encoder.encode('beta'.repeat(20)) }
  ];
  assert.deepEqual(buildZip(entries), buildZip(entries));
});

test('keeps the archive comment', () => {
  const reader = ZipReader.fromUint8Array(buildZip([{ name: 'a', data: encoder.encode('a') }], 'note'));
  assert.equal(new TextDecoder().decode(reader.comment), 'note');
});

test('rejects duplicate, empty and late entries', () => {
  const writer = new ZipWriter();
  writer.add('a.txt', encoder.encode('a'));
  assert.throws(() => writer.add('a.txt', encoder.encode('b')), { code: 'ZIP_NAME_COLLISION' });
  assert.throws(() => writer.add('', encoder.encode('b')), { code: 'ZIP_INVALID_NAME' });
  assert.throws(() => writer.add('dir/', encoder.encode('b')), { code: 'ZIP_UNSUPPORTED_FEATURE' });
  writer.finish();
  assert.throws(() => writer.add('c.txt', encoder.encode('c')), { code: 'ZIP_UNSUPPORTED_FEATURE' });
  assert.throws(() => writer.finish(), { code: 'ZIP_UNSUPPORTED_FEATURE' });
});

test('rejects data without an end of central directory', () => {
  assert.throws(
    () => ZipReader.fromUint8Array(encoder.encode('not a zip file at all, just some text')),
    (err: unknown) => err instanceof ZipError && err.code === 'ZIP_EOCD_NOT_FOUND'
  );
});

test('CRC mismatch throws when strict and warns otherwise', () => {
  const zip = buildZip([{ name: 'a.txt', data: encoder.encode('hello'), method: 0 }]);
  // local header (30 bytes) + name (5 bytes) precede the stored data
  zip[35] = (zip[35] ?? 0) ^ 0xff;

  const strict = ZipReader.fromUint8Array(zip);
  assert.throws(() => strict.read('a.txt'), { code: 'ZIP_BAD_CRC' });

  const seen: string[] = [];
  const lenient = ZipReader.fromUint8Array(zip, { profile: 'compat', onWarning: (warning) => seen.push(warning.code) });
  lenient.read('a.txt');
  assert.deepEqual(
    lenient.warnings().map((warning) => warning.code),
    ['ZIP_BAD_CRC']
  );
  assert.deepEqual(seen, ['ZIP_BAD_CRC']);
});

test('enforces entry and size limits', () => {
  const zip = buildZip([
    { name: 'a.txt', data: encoder.encode('aaaa') },
    { name: 'b.txt', data: encoder.encode('bbbb') }
  ]);
  assert.throws(() => ZipReader.fromUint8Array(zip, { limits: { maxEntries: 1 } }), { code: 'ZIP_LIMIT_EXCEEDED' });
  assert.throws(() => ZipReader.fromUint8Array(zip, { limits: { maxUncompressedEntryBytes: 3 } }), {
    code: 'ZIP_LIMIT_EXCEEDED'
  });
  assert.throws(() => ZipReader.fromUint8Array(zip, { limits: { maxTotalUncompressedBytes: 7 } }), {
    code: 'ZIP_LIMIT_EXCEEDED'
  });
});

test('only non-compat profiles limit the compression ratio', () => {
  const zip = buildZip([{ name: 'zeros.bin', data: new Uint8Array(10 * 1024 * 1024), method: 8 }]);
  assert.throws(() => ZipReader.fromUint8Array(zip), { code: 'ZIP_LIMIT_EXCEEDED' });
  const reader = ZipReader.fromUint8Array(zip, { profile: 'compat' });
  assert.equal(reader.read('zeros.bin').length, 10 * 1024 * 1024);
  assert.throws(() => ZipReader.fromUint8Array(zip, { profile: 'compat', limits: { maxCompressionRatio: 1000 } }), {
    code: 'ZIP_LIMIT_EXCEEDED'
  });
});

test('reading an unknown entry fails', () => {
  const reader = ZipReader.fromUint8Array(buildZip([{ name: 'a', data: encoder.encode('a') }]));
  assert.equal(reader.get('missing'), undefined);
  assert.throws(() => reader.read('missing'), { code: 'ZIP_BAD_CENTRAL_DIRECTORY' });
});
