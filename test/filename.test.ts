import test from 'node:test';
import assert from 'node:assert/strict';
import {
  compareBuildTags,
  compareWheelFilenames,
  escapeFilenameComponent,
  expandTags,
  formatWheelFilename,
  normalizeDistributionName,
  parseBuildTag,
  parseWheelFilename
} from '../src/tags/filename.js';
import { formatTag } from '../src/tags/tags.js';
import { WheelError } from '../src/errors.js';

test('parses a five-field filename', () => {
  assert.deepEqual(parseWheelFilename('demo_pkg-1.0.2-py3-none-any.whl'), {
    distribution: 'demo_pkg',
    version: '1.0.2',
    tags: { interpreters: ['py3'], abis: ['none'], platforms: ['any'] }
  });
});

test('parses a build tag', () => {
  const parsed = parseWheelFilename('demo-1.0-2b-cp310-cp310-manylinux_2_17_x86_64.whl');
  assert.deepEqual(parsed.buildTag, { raw: '2b', number: 2n, suffix: 'b' });
  assert.deepEqual(expandTags(parsed).map(formatTag), ['cp310-cp310-manylinux_2_17_x86_64']);
});

test('rejects a filename with four fields', () => {
  assert.throws(
    () => parseWheelFilename('demo-1.0-py3-none.whl'),
    (err: unknown) =>
      err instanceof WheelError &&
      err.code === 'WHEEL_INVALID_FILENAME' &&
      err.context?.['filename'] === 'demo-1.0-py3-none.whl'
  );
});

test('rejects seven fields, wrong extensions and bad build tags', () => {
  assert.throws(() => parseWheelFilename('a-1.0-1-x-py3-none-any.whl'), { code: 'WHEEL_INVALID_FILENAME' });
  assert.throws(() => parseWheelFilename('demo-1.0-py3-none-any.zip'), { code: 'WHEEL_INVALID_FILENAME' });
  assert.throws(() => parseWheelFilename('demo-1.0-b1-py3-none-any.whl'), { code: 'WHEEL_INVALID_FILENAME' });
  assert.throws(() => parseWheelFilename('demo--py3-none-any.whl'), { code: 'WHEEL_INVALID_FILENAME' });
});

test('formats an escaped filename', () => {
  assert.equal(
    formatWheelFilename({ distribution: 'Demo.Pkg', version: '1.0-beta', buildTag: '1', tags: 'py3-none-any' }),
    'Demo_Pkg-1.0_beta-1-py3-none-any.whl'
  );
  assert.equal(escapeFilenameComponent('a--b..c'), 'a_b_c');
});

test('normalizes distribution names for comparison', () => {
  assert.equal(normalizeDistributionName('Foo.Bar-baz__Qux'), 'foo_bar_baz_qux');
});

test('orders build tags numerically then by suffix', () => {
  assert.equal(compareBuildTags(undefined, parseBuildTag('0')), -1);
  assert.equal(compareBuildTags(undefined, undefined), 0);
  assert.equal(compareBuildTags(parseBuildTag('10'), parseBuildTag('9')), 1);
  assert.equal(compareBuildTags(parseBuildTag('1a'), parseBuildTag('1b')), -1);
  assert.equal(compareBuildTags(parseBuildTag('99999999999999999999'), parseBuildTag('9')), 1);
  assert.equal(compareBuildTags(parseBuildTag('3x'), parseBuildTag('3x')), 0);
});

test('sorts filenames by name, version and build', () => {
  const names = [
    'demo-1.10-py3-none-any.whl',
    'Demo-1.2-2-py3-none-any.whl',
    'alpha-3.0-py3-none-any.whl',
    'demo-1.2-py3-none-any.whl'
  ];
  const sorted = names.map(parseWheelFilename).sort(compareWheelFilenames);
  assert.deepEqual(
    sorted.map((parsed) => formatWheelFilename(parsed)),
    [
      'alpha-3.0-py3-none-any.whl',
      'demo-1.2-py3-none-any.whl',
      'Demo-1.2-2-py3-none-any.whl',
      'demo-1.10-py3-none-any.whl'
    ]
  );
});
