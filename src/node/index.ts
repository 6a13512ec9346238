import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { WheelArchive } from '../wheel/WheelArchive.js';
import type { WheelBuildResult, WheelOpenOptions } from '../wheel/types.js';

export * from '../index.js';

/** A path on disk, as a string or a `file:` URL. */
export type WheelPath = string | URL;

/**
 * Read and open a wheel from disk. Unless `options.filename` is given, the
 * file's basename is checked against the archive contents.
 */
export async function readWheelFile(input: WheelPath, options?: WheelOpenOptions): Promise<WheelArchive> {
  const filePath = typeof input === 'string' ? input : fileURLToPath(input);
  const data = new Uint8Array(await readFile(filePath));
  return WheelArchive.open(data, {
    ...options,
    ...(options?.filename !== undefined ? {} : { filename: path.basename(filePath) })
  });
}

/** Write a built wheel into `directory` under its canonical filename; returns the path written. */
export async function writeWheelFile(directory: WheelPath, result: WheelBuildResult): Promise<string> {
  const directoryPath = typeof directory === 'string' ? directory : fileURLToPath(directory);
  await mkdir(directoryPath, { recursive: true });
  const target = path.join(directoryPath, result.filename);
  await writeFile(target, result.bytes);
  return target;
}
