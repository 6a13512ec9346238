import { encodeUtf8, writeUint16LE, writeUint32LE } from '../binary.js';
import { ZipError } from '../zip/errors.js';
import type { Sink } from './Sink.js';

const EOCD_SIGNATURE = 0x06054b50;

export interface FinalizeOptions {
  entryCount: number;
  cdOffset: number;
  cdSize: number;
  comment?: string | undefined;
}

/** Write the end-of-central-directory record. */
export function finalizeArchive(sink: Sink, options: FinalizeOptions): void {
  if (options.entryCount >= 0xffff || options.cdOffset >= 0xffffffff || options.cdSize >= 0xffffffff) {
    throw new ZipError('ZIP_ZIP64_REQUIRED', 'Archive requires ZIP64, which this writer does not produce', {
      context: {
        entries: String(options.entryCount),
        centralDirectoryOffset: String(options.cdOffset)
      }
    });
  }
  const commentBytes = options.comment ? encodeUtf8(options.comment) : new Uint8Array(0);
  if (commentBytes.length > 0xffff) {
    throw new ZipError('ZIP_UNSUPPORTED_FEATURE', 'Archive comment exceeds 65535 bytes');
  }
  const eocd = new Uint8Array(22 + commentBytes.length);
  writeUint32LE(eocd, 0, EOCD_SIGNATURE);
  writeUint16LE(eocd, 4, 0);
  writeUint16LE(eocd, 6, 0);
  writeUint16LE(eocd, 8, options.entryCount);
  writeUint16LE(eocd, 10, options.entryCount);
  writeUint32LE(eocd, 12, options.cdSize);
  writeUint32LE(eocd, 16, options.cdOffset);
  writeUint16LE(eocd, 20, commentBytes.length);
  eocd.set(commentBytes, 22);
  sink.write(eocd);
}
