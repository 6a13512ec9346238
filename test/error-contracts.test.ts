import { test } from 'node:test';
import assert from 'node:assert/strict';
import { IntegrityError, WheelError, formatDiscrepancy, sanitizeErrorContext } from '../src/errors.js';
import { ZipError } from '../src/zip/errors.js';
import { parseRecord } from '../src/record/record.js';

test('wheel errors serialize with schemaVersion, hint and sanitized context', () => {
  const err = new WheelError('WHEEL_INVALID_METADATA', 'Name is missing', {
    entryName: 'demo-1.0.dist-info/METADATA',
    line: 4,
    context: { field: 'Name', code: 'shadowed', entryName: 'shadowed', line: 'shadowed' }
  });
  assert.deepEqual(JSON.parse(JSON.stringify(err)), {
    schemaVersion: '1',
    name: 'WheelError',
    code: 'WHEEL_INVALID_METADATA',
    message: 'Name is missing',
    hint: 'Name is missing',
    context: { field: 'Name' },
    entryName: 'demo-1.0.dist-info/METADATA',
    line: 4
  });
});

test('entryName and line stay in context when not set at the top level', () => {
  const json = new WheelError('WHEEL_INVALID_TAG', 'bad', { context: { entryName: 'x', line: '2' } }).toJSON();
  assert.deepEqual(json.context, { entryName: 'x', line: '2' });
  assert.equal('entryName' in json, false);
});

test('zip errors share the report shape', () => {
  const json = new ZipError('ZIP_BAD_CRC', 'CRC mismatch', { entryName: 'a.txt', method: 8, offset: 42 }).toJSON();
  assert.deepEqual(json, {
    schemaVersion: '1',
    name: 'ZipError',
    code: 'ZIP_BAD_CRC',
    message: 'CRC mismatch',
    hint: 'CRC mismatch',
    context: {},
    entryName: 'a.txt',
    method: 8,
    offset: 42
  });
});

test('sanitizeErrorContext drops reserved keys', () => {
  assert.deepEqual(sanitizeErrorContext(undefined), {});
  assert.deepEqual(sanitizeErrorContext({ message: 'm', hint: 'h', kept: 'k', offset: '1' }, ['offset']), { kept: 'k' });
});

test('IntegrityError lists every discrepancy in its message', () => {
  const err = new IntegrityError(
    [
      { kind: 'MissingFile', path: 'a.py' },
      { kind: 'SizeMismatch', path: 'b.py', expected: 3, actual: 4 }
    ],
    { context: { distInfoPath: 'demo-1.0.dist-info' } }
  );
  assert.equal(err.name, 'IntegrityError');
  assert.equal(err.code, 'WHEEL_INTEGRITY_VIOLATION');
  assert.ok(err instanceof WheelError);
  assert.equal(
    err.message,
    [
      'RECORD verification failed with 2 discrepancies:',
      '  a.py: listed in RECORD but not present',
      '  b.py: size 4 does not match recorded 3'
    ].join('\n')
  );
  assert.deepEqual(err.toJSON().context, { distInfoPath: 'demo-1.0.dist-info', discrepancies: '2' });
});

test('formatDiscrepancy describes unlisted files and digest mismatches', () => {
  assert.equal(formatDiscrepancy({ kind: 'UnlistedFile', path: 'x.py' }), 'x.py: present but not listed in RECORD');
  assert.equal(
    formatDiscrepancy({ kind: 'DigestMismatch', path: 'x.py', algorithm: 'sha256', expected: 'AAA', actual: 'BBB' }),
    'x.py: sha256 digest BBB does not match recorded AAA'
  );
});

test('parse failures carry the offending line', () => {
  assert.throws(
    () => parseRecord('a.py,,1\nb.py,,x\n'),
    (err: unknown) =>
      err instanceof WheelError &&
      err.code === 'WHEEL_MALFORMED_RECORD' &&
      err.line === 2 &&
      err.toJSON().line === 2
  );
});
