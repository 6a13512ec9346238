import test from 'node:test';
import assert from 'node:assert/strict';
import { MetadataDocument, foldValue, parseMetadata, serializeMetadata } from '../src/metadata/MetadataDocument.js';
import { WheelError } from '../src/errors.js';

test('parses repeated fields case-insensitively and keeps the body verbatim', () => {
  const doc = MetadataDocument.parse(
    'Metadata-Version: 2.1\nName: demo\nClassifier: A\nclassifier: B\n\nLong body\nline two\n'
  );
  assert.deepEqual(doc.getAll('Classifier'), ['A', 'B']);
  assert.equal(doc.getFirst('name'), 'demo');
  assert.equal(doc.getFirst('Summary'), undefined);
  assert.equal(doc.has('METADATA-VERSION'), true);
  assert.deepEqual(doc.names(), ['Metadata-Version', 'Name', 'Classifier']);
  assert.equal(doc.body, 'Long body\nline two\n');
});

test('folds continuation lines with a single space', () => {
  const doc = parseMetadata('Summary: first\n  second line\n\tthird\n');
  assert.equal(doc.getFirst('Summary'), 'first second line third');
  assert.equal(doc.body, undefined);
});

test('accepts CRLF line endings', () => {
  const doc = parseMetadata('Name: demo\r\nVersion: 1.0\r\n');
  assert.deepEqual(doc.fields(), [
    { name: 'Name', value: 'demo' },
    { name: 'Version', value: '1.0' }
  ]);
});

test('a whitespace-only line ends the field block', () => {
  const doc = parseMetadata('Name: a\n   \nbody text');
  assert.deepEqual(doc.fields(), [{ name: 'Name', value: 'a' }]);
  assert.equal(doc.body, 'body text');
});

test('an empty body survives a round trip', () => {
  const doc = parseMetadata('Name: a\n\n');
  assert.equal(doc.body, '');
  assert.equal(doc.toString(), 'Name: a\n\n');
});

test('rejects a line without a colon, naming the line', () => {
  assert.throws(
    () => parseMetadata('Name: x\nbad line\n'),
    (err: unknown) => err instanceof WheelError && err.code === 'WHEEL_MALFORMED_METADATA' && err.line === 2
  );
});

test('rejects a continuation line with no preceding field', () => {
  assert.throws(
    () => parseMetadata(' orphan\n'),
    (err: unknown) => err instanceof WheelError && err.code === 'WHEEL_MALFORMED_METADATA' && err.line === 1
  );
});

test('serializes multi-line values as indented continuations', () => {
  const doc = new MetadataDocument([
    ['Name', 'demo'],
    ['Description', 'one\ntwo\n\n   three']
  ]);
  const text = serializeMetadata(doc);
  assert.equal(text, 'Name: demo\nDescription: one\n        two\n        three\n');
  assert.equal(parseMetadata(text).getFirst('Description'), foldValue('one\ntwo\n\n   three'));
  assert.equal(foldValue('one\ntwo\n\n   three'), 'one two three');
});

test('a continuation after an empty value adds no leading space', () => {
  const doc = parseMetadata('Description:\n        long text\nName: demo\n');
  assert.equal(doc.getFirst('Description'), 'long text');
  assert.equal(doc.toString(), 'Description: long text\nName: demo\n');
  assert.deepEqual(parseMetadata(doc.toString()).fields(), doc.fields());
  assert.equal(foldValue('\n  long text'), 'long text');
});

test('writes the body after a blank line', () => {
  const doc = new MetadataDocument([{ name: 'Name', value: 'demo' }], 'Hello\n');
  assert.equal(doc.toString(), 'Name: demo\n\nHello\n');
});

test('set replaces every occurrence at the first position', () => {
  const doc = new MetadataDocument([
    ['A', '1'],
    ['B', '2'],
    ['a', '3']
  ]);
  doc.set('A', 'x');
  assert.deepEqual(doc.fields(), [
    { name: 'A', value: 'x' },
    { name: 'B', value: '2' }
  ]);
  doc.set('C', 'new');
  assert.deepEqual(doc.getAll('c'), ['new']);
  assert.equal(doc.remove('b'), 1);
  assert.equal(doc.remove('missing'), 0);
});

test('clone is independent of the original', () => {
  const doc = new MetadataDocument([['Name', 'demo']], 'body');
  const copy = doc.clone();
  copy.add('Name', 'other');
  assert.deepEqual(doc.getAll('Name'), ['demo']);
  assert.deepEqual(copy.getAll('Name'), ['demo', 'other']);
  assert.equal(copy.body, 'body');
});

test('rejects invalid field names', () => {
  assert.throws(() => new MetadataDocument([['Bad Name', 'x']]), { code: 'WHEEL_MALFORMED_METADATA' });
  assert.throws(() => new MetadataDocument().add('Bad:Name', 'x'), { code: 'WHEEL_MALFORMED_METADATA' });
  assert.throws(() => new MetadataDocument().set('', 'x'), { code: 'WHEEL_MALFORMED_METADATA' });
});
