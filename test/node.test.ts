import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rename, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { buildWheel, readWheelFile, writeWheelFile } from '../src/node/index.js';

const encoder = new TextEncoder();

test('writes a wheel under its filename and reads it back', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'wheelwright-'));
  try {
    const built = buildWheel({
      distribution: 'demo',
      version: '1.0',
      files: [['demo/__init__.py', encoder.encode('x = 1\n')]]
    });
    const target = await writeWheelFile(path.join(dir, 'dist'), built);
    assert.equal(target, path.join(dir, 'dist', 'demo-1.0-py3-none-any.whl'));
    assert.deepEqual(new Uint8Array(await readFile(target)), built.bytes);

    const archive = await readWheelFile(pathToFileURL(target));
    assert.equal(archive.distribution, 'demo');
    assert.deepEqual(archive.read('demo/__init__.py'), encoder.encode('x = 1\n'));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('checks the file name on disk against the archive', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'wheelwright-'));
  try {
    const target = await writeWheelFile(dir, buildWheel({ distribution: 'demo', version: '1.0' }));
    const renamed = path.join(dir, 'demo-2.0-py3-none-any.whl');
    await rename(target, renamed);
    await assert.rejects(readWheelFile(renamed), { code: 'WHEEL_FILENAME_MISMATCH' });

    const archive = await readWheelFile(renamed, { filename: 'demo-1.0-py3-none-any.whl' });
    assert.equal(archive.version, '1.0');
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
