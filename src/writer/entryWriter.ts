import { deflateRawSync } from 'node:zlib';
import { encodeUtf8, writeUint16LE, writeUint32LE } from '../binary.js';
import { crc32 } from '../crc32.js';
import { dateToDos } from '../dosTime.js';
import { ZipError } from '../zip/errors.js';
import type { CompressionMethod } from '../types.js';
import type { Sink } from './Sink.js';

const LFH_SIGNATURE = 0x04034b50;
const UINT32_MAX = 0xffffffff;
// APPNOTE 4.4.4 bit 11: name and comment are UTF-8.
const UTF8_FLAG = 0x800;
export const VERSION_NEEDED = 20;

export interface EntryWriteResult {
  name: string;
  nameBytes: Uint8Array;
  flags: number;
  method: CompressionMethod;
  crc32: number;
  compressedSize: number;
  uncompressedSize: number;
  offset: number;
  mtime: Date;
  comment?: string | undefined;
  externalAttributes: number;
}

export interface EntryWriteInput {
  name: string;
  data: Uint8Array;
  method: CompressionMethod;
  deflateLevel: number;
  mtime: Date;
  mode: number;
  comment?: string | undefined;
}

/** Write a local file header followed by the (possibly deflated) entry data. */
export function writeEntry(sink: Sink, input: EntryWriteInput): EntryWriteResult {
  const nameBytes = encodeUtf8(input.name);
  if (nameBytes.length > 0xffff) {
    throw new ZipError('ZIP_INVALID_NAME', 'Entry name exceeds 65535 bytes', { entryName: input.name });
  }
  const isDirectory = input.name.endsWith('/');
  if (isDirectory && input.data.length > 0) {
    throw new ZipError('ZIP_UNSUPPORTED_FEATURE', 'Directory entries cannot carry data', {
      entryName: input.name
    });
  }
  const method: CompressionMethod = isDirectory ? 0 : input.method;
  const payload = method === 8 ? deflateRawSync(input.data, { level: input.deflateLevel }) : input.data;
  const offset = sink.position;
  if (input.data.length >= UINT32_MAX || payload.length >= UINT32_MAX || offset >= UINT32_MAX) {
    throw new ZipError('ZIP_ZIP64_REQUIRED', 'Entry requires ZIP64, which this writer does not produce', {
      entryName: input.name,
      offset
    });
  }

  const checksum = crc32(input.data);
  const dos = dateToDos(input.mtime);
  const header = new Uint8Array(30 + nameBytes.length);
  writeUint32LE(header, 0, LFH_SIGNATURE);
  writeUint16LE(header, 4, VERSION_NEEDED);
  writeUint16LE(header, 6, UTF8_FLAG);
  writeUint16LE(header, 8, method);
  writeUint16LE(header, 10, dos.time);
  writeUint16LE(header, 12, dos.date);
  writeUint32LE(header, 14, checksum);
  writeUint32LE(header, 18, payload.length);
  writeUint32LE(header, 22, input.data.length);
  writeUint16LE(header, 26, nameBytes.length);
  writeUint16LE(header, 28, 0);
  header.set(nameBytes, 30);

  sink.write(header);
  sink.write(payload);

  // MS-DOS directory attribute in the low byte, Unix mode in the high word.
  const externalAttributes = ((input.mode & 0xffff) * 0x10000 + (isDirectory ? 0x10 : 0)) >>> 0;
  return {
    name: input.name,
    nameBytes,
    flags: UTF8_FLAG,
    method,
    crc32: checksum,
    compressedSize: payload.length,
    uncompressedSize: input.data.length,
    offset,
    mtime: input.mtime,
    comment: input.comment,
    externalAttributes
  };
}
