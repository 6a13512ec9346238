import { ZipError } from '../zip/errors.js';
import { DOS_EPOCH } from '../dosTime.js';
import { BufferSink } from './Sink.js';
import { writeEntry, type EntryWriteResult } from './entryWriter.js';
import { writeCentralDirectory } from './centralDirectoryWriter.js';
import { finalizeArchive } from './finalize.js';
import type { CompressionMethod, ZipWriterAddOptions, ZipWriterOptions } from '../types.js';

const DEFAULT_FILE_MODE = 0o100644;
const DEFAULT_DIRECTORY_MODE = 0o40755;

/**
 * Write ZIP archives into memory.
 *
 * Entries are written in the order they are added. No timestamps other than
 * the ones supplied (or {@link ZipWriterOptions.defaultMtime}) reach the
 * output and no extra fields are emitted, so identical input yields
 * identical bytes.
 */
export class ZipWriter {
  private readonly sink = new BufferSink();
  private readonly entries: EntryWriteResult[] = [];
  private readonly names = new Set<string>();
  private closed = false;
  private readonly defaultMethod: CompressionMethod;
  private readonly deflateLevel: number;
  private readonly defaultMtime: Date;

  constructor(options?: ZipWriterOptions) {
    this.defaultMethod = options?.defaultMethod ?? 8;
    this.deflateLevel = options?.deflateLevel ?? 6;
    this.defaultMtime = options?.defaultMtime ?? DOS_EPOCH;
  }

  /** Add an entry; names ending in `/` are directories and must be empty. */
  add(name: string, data: Uint8Array, options?: ZipWriterAddOptions): void {
    if (this.closed) {
      throw new ZipError('ZIP_UNSUPPORTED_FEATURE', 'Cannot add entries after finish');
    }
    if (name.length === 0) {
      throw new ZipError('ZIP_INVALID_NAME', 'Entry names must not be empty');
    }
    if (name.includes('\u0000')) {
      throw new ZipError('ZIP_INVALID_NAME', 'Entry names must not contain NUL', { entryName: name });
    }
    if (this.names.has(name)) {
      throw new ZipError('ZIP_NAME_COLLISION', `Duplicate entry name: ${name}`, { entryName: name });
    }

    const isDirectory = name.endsWith('/');
    const entry = writeEntry(this.sink, {
      name,
      data,
      method: options?.method ?? this.defaultMethod,
      deflateLevel: this.deflateLevel,
      mtime: options?.mtime ?? this.defaultMtime,
      mode: options?.mode ?? (isDirectory ? DEFAULT_DIRECTORY_MODE : DEFAULT_FILE_MODE),
      comment: options?.comment
    });
    this.names.add(name);
    this.entries.push(entry);
  }

  /** Write the central directory and return the finished archive. */
  finish(comment?: string): Uint8Array {
    if (this.closed) {
      throw new ZipError('ZIP_UNSUPPORTED_FEATURE', 'Archive already finished');
    }
    const cdInfo = writeCentralDirectory(this.sink, this.entries);
    finalizeArchive(this.sink, {
      entryCount: this.entries.length,
      cdOffset: cdInfo.offset,
      cdSize: cdInfo.size,
      comment
    });
    this.closed = true;
    return this.sink.toBytes();
  }
}
