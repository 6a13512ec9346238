import type { ReadProfile, ResourceLimits } from './limits.js';
import type { ZipWarning } from './zip/errors.js';
export type { ReadProfile, ResourceLimits } from './limits.js';

/** ZIP compression methods this container writes and reads: store and deflate. */
export type CompressionMethod = 0 | 8;

/** ZIP entry metadata exposed by ZipReader. */
export type ZipEntry = {
  name: string;
  comment?: string | undefined;
  method: number;
  flags: number;
  crc32: number;
  compressedSize: number;
  uncompressedSize: number;
  offset: number;
  mtime: Date;
  /** Unix mode bits when the entry was made on a Unix host. */
  mode?: number | undefined;
  externalAttributes: number;
  isDirectory: boolean;
  encrypted: boolean;
};

/** Options for creating ZipReader instances. */
export type ZipReaderOptions = {
  profile?: ReadProfile | undefined;
  isStrict?: boolean | undefined;
  limits?: ResourceLimits | undefined;
  onWarning?: ((warning: ZipWarning) => void) | undefined;
};

/** Options for creating ZipWriter instances. */
export type ZipWriterOptions = {
  defaultMethod?: CompressionMethod;
  /** zlib level used for deflated entries. */
  deflateLevel?: number;
  /** Timestamp applied to entries added without one. */
  defaultMtime?: Date;
};

/** Options for adding entries with ZipWriter. */
export type ZipWriterAddOptions = {
  method?: CompressionMethod | undefined;
  mtime?: Date | undefined;
  /** Unix mode bits, including the file-type bits (e.g. `0o100644`). */
  mode?: number | undefined;
  comment?: string | undefined;
};
