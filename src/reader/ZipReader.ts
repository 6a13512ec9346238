import { inflateRawSync } from 'node:zlib';
import { crc32 } from '../crc32.js';
import { ZipError, type ZipWarning } from '../zip/errors.js';
import { resolveReadProfile, type ReadProfile, type ResourceLimits } from '../limits.js';
import type { ZipEntry, ZipReaderOptions } from '../types.js';
import { findEocd } from './eocd.js';
import { readCentralDirectory, type ZipEntryRecord } from './centralDirectory.js';
import { readLocalHeader } from './localHeader.js';

/**
 * Read ZIP archives held in memory.
 *
 * The central directory is parsed eagerly; entry data is decoded on
 * {@link ZipReader.read}. In non-strict mode recoverable structural problems
 * and CRC mismatches become warnings instead of errors.
 */
export class ZipReader {
  readonly profile: ReadProfile;
  private readonly strict: boolean;
  private readonly limits: Required<ResourceLimits>;
  private readonly warningsList: ZipWarning[] = [];
  private readonly entriesList: ZipEntryRecord[];
  private readonly byName = new Map<string, ZipEntryRecord>();
  private readonly onWarning: ((warning: ZipWarning) => void) | undefined;
  /** Archive comment from the EOCD record. */
  readonly comment: Uint8Array;

  private constructor(
    private readonly data: Uint8Array,
    options?: ZipReaderOptions
  ) {
    const resolved = resolveReadProfile(options?.profile ?? 'strict', options);
    this.profile = resolved.profile;
    this.strict = resolved.strict;
    this.limits = resolved.limits;
    this.onWarning = options?.onWarning;

    const eocd = findEocd(data, this.strict, { maxSearchBytes: this.limits.maxZipEocdSearchBytes });
    for (const warning of eocd.warnings) this.pushWarning(warning);
    this.comment = eocd.comment;
    this.entriesList = readCentralDirectory(data, eocd.cdOffset, eocd.cdSize, eocd.totalEntries, {
      strict: this.strict,
      maxEntries: this.limits.maxEntries,
      onWarning: (warning) => this.pushWarning(warning)
    });
    this.indexEntries();
  }

  static fromUint8Array(data: Uint8Array, options?: ZipReaderOptions): ZipReader {
    return new ZipReader(data, options);
  }

  entries(): ZipEntry[] {
    return this.entriesList.map(toPublicEntry);
  }

  warnings(): ZipWarning[] {
    return [...this.warningsList];
  }

  /** Look up an entry by exact name. */
  get(name: string): ZipEntry | undefined {
    const record = this.byName.get(name);
    return record ? toPublicEntry(record) : undefined;
  }

  /** Decode an entry's data, verifying its CRC-32 and size. */
  read(entryOrName: ZipEntry | string): Uint8Array {
    const name = typeof entryOrName === 'string' ? entryOrName : entryOrName.name;
    const entry = this.byName.get(name);
    if (!entry) {
      throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', `No entry named ${name}`, { entryName: name });
    }
    if (entry.encrypted) {
      throw new ZipError('ZIP_UNSUPPORTED_ENCRYPTION', 'Encrypted entries are not supported', {
        entryName: entry.name
      });
    }

    const local = readLocalHeader(this.data, entry);
    if (local.method !== entry.method) {
      throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Local header method disagrees with central directory', {
        entryName: entry.name,
        method: local.method
      });
    }
    const end = local.dataOffset + entry.compressedSize;
    if (end > this.data.length) {
      throw new ZipError('ZIP_TRUNCATED', 'Entry data truncated', { entryName: entry.name, offset: entry.offset });
    }
    const raw = this.data.subarray(local.dataOffset, end);
    const content = this.decode(entry, raw);

    if (content.length !== entry.uncompressedSize) {
      this.mismatch(entry, `Uncompressed size mismatch for ${entry.name}`);
    }
    if (crc32(content) !== entry.crc32) {
      this.mismatch(entry, `CRC32 mismatch for ${entry.name}`);
    }
    return content;
  }

  private decode(entry: ZipEntryRecord, raw: Uint8Array): Uint8Array {
    switch (entry.method) {
      // Always a fresh plain Uint8Array, never a Buffer or a view into `data`.
      case 0:
        return new Uint8Array(raw);
      case 8:
        try {
          return new Uint8Array(inflateRawSync(raw, { maxOutputLength: this.limits.maxUncompressedEntryBytes }));
        } catch (err) {
          throw new ZipError('ZIP_BAD_DATA', `Deflate stream is corrupt for ${entry.name}`, {
            entryName: entry.name,
            method: entry.method,
            cause: err
          });
        }
      default:
        throw new ZipError('ZIP_UNSUPPORTED_METHOD', `Unsupported compression method ${entry.method}`, {
          entryName: entry.name,
          method: entry.method
        });
    }
  }

  private mismatch(entry: ZipEntryRecord, message: string): void {
    if (this.strict) {
      throw new ZipError('ZIP_BAD_CRC', message, { entryName: entry.name });
    }
    this.pushWarning({ code: 'ZIP_BAD_CRC', message, entryName: entry.name });
  }

  private indexEntries(): void {
    let total = 0;
    for (const entry of this.entriesList) {
      if (this.byName.has(entry.name)) {
        throw new ZipError('ZIP_NAME_COLLISION', `Duplicate entry name: ${entry.name}`, { entryName: entry.name });
      }
      this.byName.set(entry.name, entry);
      if (entry.uncompressedSize > this.limits.maxUncompressedEntryBytes) {
        throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Entry exceeds uncompressed size limit', {
          entryName: entry.name,
          context: { limitBytes: String(this.limits.maxUncompressedEntryBytes) }
        });
      }
      if (
        entry.compressedSize > 0 &&
        entry.uncompressedSize / entry.compressedSize > this.limits.maxCompressionRatio
      ) {
        throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Entry exceeds compression ratio limit', {
          entryName: entry.name,
          context: { limitRatio: String(this.limits.maxCompressionRatio) }
        });
      }
      total += entry.uncompressedSize;
      if (total > this.limits.maxTotalUncompressedBytes) {
        throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Archive exceeds total uncompressed size limit', {
          context: { limitBytes: String(this.limits.maxTotalUncompressedBytes) }
        });
      }
    }
  }

  private pushWarning(warning: ZipWarning): void {
    this.warningsList.push(warning);
    this.onWarning?.(warning);
  }
}

function toPublicEntry(record: ZipEntryRecord): ZipEntry {
  return {
    name: record.name,
    comment: record.comment,
    method: record.method,
    flags: record.flags,
    crc32: record.crc32,
    compressedSize: record.compressedSize,
    uncompressedSize: record.uncompressedSize,
    offset: record.offset,
    mtime: new Date(record.mtime.getTime()),
    mode: record.mode,
    externalAttributes: record.externalAttributes,
    isDirectory: record.isDirectory,
    encrypted: record.encrypted
  };
}
