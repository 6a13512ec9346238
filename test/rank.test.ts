import test from 'node:test';
import assert from 'node:assert/strict';
import { parseWheelFilename } from '../src/tags/filename.js';
import { rankCandidates, selectBest } from '../src/tags/rank.js';
import { supportedTags } from '../src/tags/supported.js';
import { parseTag } from '../src/tags/tags.js';

const SUPPORTED = ['cp310-cp310-manylinux_2_17_x86_64', 'cp39-abi3-manylinux_2_17_x86_64', 'py3-none-any'].map(
  (tag) => parseTag(tag)
);

function candidates(...names: string[]) {
  return names.map((name) => parseWheelFilename(name));
}

test('picks the candidate matching the earliest supported tag', () => {
  const list = candidates('pkg-1.0-py3-none-any.whl', 'pkg-1.0-cp39-abi3-manylinux_2_17_x86_64.whl');
  const best = selectBest(list, SUPPORTED);
  assert.equal(best?.candidate, list[1]);
  assert.equal(best?.index, 1);
  assert.deepEqual(
    rankCandidates(list, SUPPORTED).map((ranked) => ranked.index),
    [1, 2]
  );
});

test('leaves out candidates with no supported tag', () => {
  const list = candidates('pkg-1.0-cp27-cp27mu-linux_i686.whl', 'pkg-1.0-py3-none-any.whl');
  const ranked = rankCandidates(list, SUPPORTED);
  assert.equal(ranked.length, 1);
  assert.equal(ranked[0]?.candidate, list[1]);
  assert.equal(selectBest(candidates('pkg-1.0-cp27-cp27mu-linux_i686.whl'), SUPPORTED), undefined);
});

test('prefers the higher build tag at the same index', () => {
  const list = candidates('pkg-1.0-1-py3-none-any.whl', 'pkg-1.0-2-py3-none-any.whl');
  assert.equal(selectBest(list, SUPPORTED)?.candidate, list[1]);
});

test('prefers the more specific tag set at the same index', () => {
  const list = candidates('pkg-1.0-py2.py3-none-any.whl', 'pkg-1.0-py3-none-any.whl');
  assert.equal(selectBest(list, SUPPORTED)?.candidate, list[1]);
});

test('applies tie-break rules in the configured order', () => {
  const list = candidates('pkg-1.0-1-py2.py3-none-any.whl', 'pkg-1.0-py3-none-any.whl');
  assert.equal(selectBest(list, SUPPORTED)?.candidate, list[0]);
  assert.equal(selectBest(list, SUPPORTED, { tieBreak: ['specificity', 'build-tag'] })?.candidate, list[1]);
  assert.equal(selectBest([...list].reverse(), SUPPORTED, { tieBreak: [] })?.candidate, list[1]);
});

test('ranks every eligible candidate best first', () => {
  const list = candidates(
    'pkg-1.0-py3-none-any.whl',
    'pkg-1.0-cp310-cp310-manylinux_2_17_x86_64.whl',
    'pkg-1.0-cp39-abi3-manylinux_2_17_x86_64.whl'
  );
  assert.deepEqual(
    rankCandidates(list, SUPPORTED).map((ranked) => list.indexOf(ranked.candidate)),
    [1, 2, 0]
  );
});

test('selects against a generated CPython priority list', () => {
  const supported = supportedTags({ version: [3, 11], platforms: ['manylinux_2_17_x86_64', 'linux_x86_64'] });
  const list = candidates('pkg-1.0-py3-none-any.whl', 'pkg-1.0-cp39-abi3-manylinux_2_17_x86_64.whl');
  assert.equal(selectBest(list, supported)?.candidate, list[1]);
});
