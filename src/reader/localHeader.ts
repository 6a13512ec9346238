import { readUint16LE, readUint32LE } from '../binary.js';
import { ZipError } from '../zip/errors.js';
import type { ZipEntryRecord } from './centralDirectory.js';

const LFH_SIGNATURE = 0x04034b50;

export interface LocalHeaderInfo {
  flags: number;
  method: number;
  nameBytes: Uint8Array;
  dataOffset: number;
}

export function readLocalHeader(data: Uint8Array, entry: ZipEntryRecord): LocalHeaderInfo {
  if (entry.offset + 30 > data.length || readUint32LE(data, entry.offset) !== LFH_SIGNATURE) {
    throw new ZipError('ZIP_INVALID_SIGNATURE', 'Invalid local file header signature', {
      entryName: entry.name,
      offset: entry.offset
    });
  }
  const flags = readUint16LE(data, entry.offset + 6);
  const method = readUint16LE(data, entry.offset + 8);
  const nameLen = readUint16LE(data, entry.offset + 26);
  const extraLen = readUint16LE(data, entry.offset + 28);
  const nameStart = entry.offset + 30;
  const dataOffset = nameStart + nameLen + extraLen;
  if (dataOffset > data.length) {
    throw new ZipError('ZIP_TRUNCATED', 'Local header truncated', { entryName: entry.name, offset: entry.offset });
  }
  return {
    flags,
    method,
    nameBytes: data.subarray(nameStart, nameStart + nameLen),
    dataOffset
  };
}
