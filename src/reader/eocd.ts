import { readUint16LE, readUint32LE } from '../binary.js';
import { ZipError, type ZipWarning } from '../zip/errors.js';

const EOCD_SIGNATURE = 0x06054b50;
const ZIP64_LOCATOR_SIGNATURE = 0x07064b50;
const EOCD_SIZE = 22;

export interface EocdResult {
  eocdOffset: number;
  cdOffset: number;
  cdSize: number;
  totalEntries: number;
  comment: Uint8Array;
  warnings: ZipWarning[];
}

export interface FindEocdOptions {
  maxSearchBytes: number;
}

export function findEocd(data: Uint8Array, strict: boolean, options: FindEocdOptions): EocdResult {
  const warnings: ZipWarning[] = [];
  if (data.length < EOCD_SIZE) {
    throw new ZipError('ZIP_EOCD_NOT_FOUND', 'File too small for EOCD');
  }
  // APPNOTE 4.3.16: EOCD lies within the last 64KiB + its own size.
  const searchSize = Math.min(data.length, Math.max(EOCD_SIZE, Math.floor(options.maxSearchBytes)));
  const searchStart = data.length - searchSize;

  const candidates: number[] = [];
  for (let i = data.length - EOCD_SIZE; i >= searchStart; i -= 1) {
    if (readUint32LE(data, i) === EOCD_SIGNATURE) {
      candidates.push(i);
    }
  }
  const eocdOffset = candidates[0];
  if (eocdOffset === undefined) {
    throw new ZipError('ZIP_EOCD_NOT_FOUND', 'End of central directory not found');
  }
  if (candidates.length > 1) {
    if (strict) {
      throw new ZipError('ZIP_MULTIPLE_EOCD', 'Multiple EOCD records found');
    }
    warnings.push({
      code: 'ZIP_MULTIPLE_EOCD',
      message: 'Multiple EOCD records found; using last occurrence'
    });
  }

  const diskNumber = readUint16LE(data, eocdOffset + 4);
  const cdDisk = readUint16LE(data, eocdOffset + 6);
  const entriesOnDisk = readUint16LE(data, eocdOffset + 8);
  const totalEntries = readUint16LE(data, eocdOffset + 10);
  const cdSize = readUint32LE(data, eocdOffset + 12);
  const cdOffset = readUint32LE(data, eocdOffset + 16);
  const commentLength = readUint16LE(data, eocdOffset + 20);

  const recordEnd = eocdOffset + EOCD_SIZE + commentLength;
  if (recordEnd > data.length) {
    throw new ZipError('ZIP_TRUNCATED', 'EOCD comment extends past end of file', { offset: eocdOffset });
  }
  if (recordEnd !== data.length) {
    if (strict) {
      throw new ZipError('ZIP_BAD_EOCD', 'EOCD does not end at EOF', { offset: eocdOffset });
    }
    warnings.push({
      code: 'ZIP_BAD_EOCD',
      message: 'EOCD does not end at EOF; ignoring trailing bytes'
    });
  }

  if (diskNumber !== 0 || cdDisk !== 0 || entriesOnDisk !== totalEntries) {
    throw new ZipError('ZIP_UNSUPPORTED_FEATURE', 'Multi-disk archives are not supported', {
      offset: eocdOffset
    });
  }
  const hasZip64Locator = eocdOffset >= 20 && readUint32LE(data, eocdOffset - 20) === ZIP64_LOCATOR_SIGNATURE;
  if (hasZip64Locator || totalEntries === 0xffff || cdSize === 0xffffffff || cdOffset === 0xffffffff) {
    throw new ZipError('ZIP_UNSUPPORTED_FEATURE', 'ZIP64 archives are not supported', { offset: eocdOffset });
  }
  if (cdOffset + cdSize > eocdOffset) {
    throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Central directory overlaps the EOCD record', {
      offset: cdOffset,
      context: {
        centralDirectorySize: String(cdSize),
        eocdOffset: String(eocdOffset)
      }
    });
  }

  return {
    eocdOffset,
    cdOffset,
    cdSize,
    totalEntries,
    comment: data.subarray(eocdOffset + EOCD_SIZE, recordEnd),
    warnings
  };
}
