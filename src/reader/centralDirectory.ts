import { decodeUtf8, readUint16LE, readUint32LE } from '../binary.js';
import { dosToDate } from '../dosTime.js';
import { ZipError, type ZipWarning } from '../zip/errors.js';

const CDFH_SIGNATURE = 0x02014b50;
const CDFH_MIN_SIZE = 46;
const HOST_UNIX = 3;

export interface ZipEntryRecord {
  name: string;
  rawNameBytes: Uint8Array;
  comment?: string | undefined;
  flags: number;
  method: number;
  crc32: number;
  compressedSize: number;
  uncompressedSize: number;
  offset: number;
  mtime: Date;
  mode?: number | undefined;
  externalAttributes: number;
  isDirectory: boolean;
  encrypted: boolean;
}

export interface CentralDirectoryOptions {
  strict: boolean;
  maxEntries: number;
  onWarning: (warning: ZipWarning) => void;
}

export function readCentralDirectory(
  data: Uint8Array,
  cdOffset: number,
  cdSize: number,
  totalEntries: number,
  options: CentralDirectoryOptions
): ZipEntryRecord[] {
  const entries: ZipEntryRecord[] = [];
  const end = cdOffset + cdSize;
  let ptr = cdOffset;

  while (end - ptr >= CDFH_MIN_SIZE) {
    if (readUint32LE(data, ptr) !== CDFH_SIGNATURE) {
      throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Invalid central directory signature', { offset: ptr });
    }
    const nameLen = readUint16LE(data, ptr + 28);
    const extraLen = readUint16LE(data, ptr + 30);
    const commentLen = readUint16LE(data, ptr + 32);
    const entrySize = CDFH_MIN_SIZE + nameLen + extraLen + commentLen;
    if (ptr + entrySize > end) {
      throw new ZipError('ZIP_TRUNCATED', 'Central directory truncated', { offset: ptr });
    }

    entries.push(parseCentralDirectoryEntry(data, ptr, options));
    if (entries.length > options.maxEntries) {
      throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Too many entries in ZIP', {
        context: { limitEntries: String(options.maxEntries) }
      });
    }
    ptr += entrySize;
  }

  if (ptr !== end) {
    if (options.strict) {
      throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Central directory has trailing data', { offset: ptr });
    }
    options.onWarning({
      code: 'ZIP_BAD_CENTRAL_DIRECTORY',
      message: 'Central directory has trailing data; ignoring'
    });
  }

  if (totalEntries !== entries.length) {
    if (options.strict) {
      throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Central directory entry count mismatch', {
        context: { declaredEntries: String(totalEntries), parsedEntries: String(entries.length) }
      });
    }
    options.onWarning({
      code: 'ZIP_BAD_CENTRAL_DIRECTORY',
      message: 'Central directory entry count mismatch; using parsed entries'
    });
  }

  return entries;
}

function parseCentralDirectoryEntry(
  data: Uint8Array,
  ptr: number,
  options: CentralDirectoryOptions
): ZipEntryRecord {
  const madeBy = readUint16LE(data, ptr + 4);
  const flags = readUint16LE(data, ptr + 8);
  const method = readUint16LE(data, ptr + 10);
  const modTime = readUint16LE(data, ptr + 12);
  const modDate = readUint16LE(data, ptr + 14);
  const crc32 = readUint32LE(data, ptr + 16);
  const compressedSize = readUint32LE(data, ptr + 20);
  const uncompressedSize = readUint32LE(data, ptr + 24);
  const nameLen = readUint16LE(data, ptr + 28);
  const extraLen = readUint16LE(data, ptr + 30);
  const commentLen = readUint16LE(data, ptr + 32);
  const externalAttributes = readUint32LE(data, ptr + 38);
  const offset = readUint32LE(data, ptr + 42);

  const nameStart = ptr + CDFH_MIN_SIZE;
  const rawNameBytes = data.subarray(nameStart, nameStart + nameLen);
  const commentStart = nameStart + nameLen + extraLen;
  const commentBytes = data.subarray(commentStart, commentStart + commentLen);

  const utf8 = (flags & 0x800) !== 0;
  const name = decodeName(rawNameBytes, utf8, options);
  const mode = madeBy >>> 8 === HOST_UNIX ? externalAttributes >>> 16 : undefined;
  const isDirectory = name.endsWith('/') || (externalAttributes & 0x10) !== 0;

  return {
    name,
    rawNameBytes,
    comment: commentLen > 0 ? decodeUtf8(commentBytes) : undefined,
    flags,
    method,
    crc32,
    compressedSize,
    uncompressedSize,
    offset,
    mtime: dosToDate(modTime, modDate),
    mode,
    externalAttributes,
    isDirectory,
    encrypted: (flags & 0x1) !== 0
  };
}

function decodeName(bytes: Uint8Array, utf8Flag: boolean, options: CentralDirectoryOptions): string {
  try {
    return decodeUtf8(bytes, true);
  } catch (err) {
    if (utf8Flag && options.strict) {
      throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Entry name is not valid UTF-8', { cause: err });
    }
    const name = decodeUtf8(bytes);
    options.onWarning({
      code: 'ZIP_INVALID_ENCODING',
      message: 'Entry name is not valid UTF-8; decoded with replacement characters',
      entryName: name
    });
    return name;
  }
}
