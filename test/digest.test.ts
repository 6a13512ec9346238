import test from 'node:test';
import assert from 'node:assert/strict';
import {
  createNodeDigester,
  encodeDigest,
  getDigester,
  listDigesters,
  registerDigester,
  resolveDigester,
  type Digester
} from '../src/digest.js';

test('defaults to sha256 and encodes unpadded base64url', () => {
  const digester = resolveDigester(undefined);
  assert.equal(digester.algorithm, 'sha256');
  assert.equal(encodeDigest(digester, new Uint8Array(0)), '47DEQpj8HBSa-_TImW-5JCeuQeRkm5NMpJWZG3hSuFU');
});

test('resolves registered algorithms case-insensitively', () => {
  assert.equal(resolveDigester('SHA384').algorithm, 'sha384');
  assert.equal(getDigester('Sha512')?.algorithm, 'sha512');
  assert.deepEqual(
    listDigesters()
      .map((digester) => digester.algorithm)
      .filter((name) => name.startsWith('sha')),
    ['sha256', 'sha384', 'sha512']
  );
});

test('rejects unknown, weak and badly named algorithms', () => {
  assert.throws(() => resolveDigester('whirlpool-9000'), { code: 'WHEEL_UNSUPPORTED_DIGEST' });
  const weak: Digester = { algorithm: 'sha1', digest: () => new Uint8Array(20) };
  assert.throws(() => resolveDigester(weak), { code: 'WHEEL_UNSUPPORTED_DIGEST' });
  const badName: Digester = { algorithm: 'sha 256', digest: () => new Uint8Array(32) };
  assert.throws(() => resolveDigester(badName), { code: 'WHEEL_UNSUPPORTED_DIGEST' });
  assert.throws(() => createNodeDigester('no-such-hash'), { code: 'WHEEL_UNSUPPORTED_DIGEST' });
});

test('registered digesters become resolvable by name', () => {
  const fixed: Digester = { algorithm: 'fixed', digest: () => new Uint8Array([0xfb, 0xff]) };
  registerDigester(fixed);
  assert.equal(resolveDigester('fixed'), fixed);
  assert.equal(encodeDigest(fixed, new Uint8Array(0)), '-_8');
});
