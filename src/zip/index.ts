export { ZipReader } from '../reader/ZipReader.js';
export { ZipWriter } from '../writer/ZipWriter.js';
export { ZipError } from './errors.js';
export type { ZipErrorCode, ZipWarning, ZipWarningCode } from './errors.js';
export type {
  CompressionMethod,
  ZipEntry,
  ZipReaderOptions,
  ZipWriterAddOptions,
  ZipWriterOptions
} from '../types.js';
