import { encodeUtf8, writeUint16LE, writeUint32LE } from '../binary.js';
import { dateToDos } from '../dosTime.js';
import { VERSION_NEEDED, type EntryWriteResult } from './entryWriter.js';
import type { Sink } from './Sink.js';

const CDFH_SIGNATURE = 0x02014b50;
const MADE_BY_UNIX = 3;

export interface CentralDirectoryInfo {
  offset: number;
  size: number;
}

export function writeCentralDirectory(sink: Sink, entries: readonly EntryWriteResult[]): CentralDirectoryInfo {
  const offset = sink.position;
  let size = 0;

  for (const entry of entries) {
    const nameBytes = entry.nameBytes;
    const commentBytes = entry.comment ? encodeUtf8(entry.comment) : new Uint8Array(0);
    const dos = dateToDos(entry.mtime);

    const header = new Uint8Array(46 + nameBytes.length + commentBytes.length);
    writeUint32LE(header, 0, CDFH_SIGNATURE);
    writeUint16LE(header, 4, (MADE_BY_UNIX << 8) | VERSION_NEEDED);
    writeUint16LE(header, 6, VERSION_NEEDED);
    writeUint16LE(header, 8, entry.flags);
    writeUint16LE(header, 10, entry.method);
    writeUint16LE(header, 12, dos.time);
    writeUint16LE(header, 14, dos.date);
    writeUint32LE(header, 16, entry.crc32);
    writeUint32LE(header, 20, entry.compressedSize);
    writeUint32LE(header, 24, entry.uncompressedSize);
    writeUint16LE(header, 28, nameBytes.length);
    writeUint16LE(header, 30, 0);
    writeUint16LE(header, 32, commentBytes.length);
    writeUint16LE(header, 34, 0);
    writeUint16LE(header, 36, 0);
    writeUint32LE(header, 38, entry.externalAttributes);
    writeUint32LE(header, 42, entry.offset);

    header.set(nameBytes, 46);
    header.set(commentBytes, 46 + nameBytes.length);

    sink.write(header);
    size += header.length;
  }

  return { offset, size };
}
