import { decodeUtf8 } from '../binary.js';
import { IntegrityError, WheelError, type Discrepancy, type WheelWarning } from '../errors.js';
import { parseEntryPoints, type EntryPointSection } from '../metadata/entryPoints.js';
import { MetadataDocument } from '../metadata/MetadataDocument.js';
import { describeUnsafePath } from '../paths.js';
import { parseRecord, verifyRecord, type RecordEntry } from '../record/record.js';
import { ZipReader } from '../reader/ZipReader.js';
import {
  escapeVersion,
  formatWheelFilename,
  normalizeDistributionName,
  parseBuildTag,
  parseWheelFilename,
  type BuildTag
} from '../tags/filename.js';
import { parseTag, tagSetFromTags, type WheelTag } from '../tags/tags.js';
import { ZipError } from '../zip/errors.js';
import { ENTRY_POINTS_FILE, METADATA_FILE, RECORD_FILE, WHEEL_FILE } from './layout.js';
import type { WheelOpenOptions } from './types.js';

const SUPPORTED_WHEEL_MAJOR = 1;
const SUPPORTED_WHEEL_MINOR = 0;

type ArchiveParts = {
  distribution: string;
  version: string;
  buildTag: BuildTag | undefined;
  tags: WheelTag[];
  rootIsPurelib: boolean;
  generator: string | undefined;
  wheelVersion: string;
  distInfoPath: string;
  metadata: MetadataDocument;
  wheel: MetadataDocument;
  record: RecordEntry[];
  contents: Map<string, Uint8Array>;
  discrepancies: Discrepancy[];
  warnings: WheelWarning[];
  options: WheelOpenOptions | undefined;
};

/**
 * A wheel opened from bytes: parsed `METADATA`, `WHEEL` and `RECORD`, plus
 * every stored file. Immutable once opened.
 */
export class WheelArchive {
  readonly distribution: string;
  readonly version: string;
  readonly buildTag: BuildTag | undefined;
  readonly tags: readonly WheelTag[];
  readonly rootIsPurelib: boolean;
  readonly generator: string | undefined;
  readonly wheelVersion: string;
  readonly distInfoPath: string;
  private readonly metadataDocument: MetadataDocument;
  private readonly wheelDocument: MetadataDocument;
  private readonly recordEntries: RecordEntry[];
  private readonly contents: Map<string, Uint8Array>;
  private readonly discrepancyList: Discrepancy[];
  private readonly warningsList: WheelWarning[];
  private readonly options: WheelOpenOptions | undefined;

  private constructor(parts: ArchiveParts) {
    this.distribution = parts.distribution;
    this.version = parts.version;
    this.buildTag = parts.buildTag;
    this.tags = parts.tags;
    this.rootIsPurelib = parts.rootIsPurelib;
    this.generator = parts.generator;
    this.wheelVersion = parts.wheelVersion;
    this.distInfoPath = parts.distInfoPath;
    this.metadataDocument = parts.metadata;
    this.wheelDocument = parts.wheel;
    this.recordEntries = parts.record;
    this.contents = parts.contents;
    this.discrepancyList = parts.discrepancies;
    this.warningsList = parts.warnings;
    this.options = parts.options;
  }

  /**
   * Open and validate a wheel.
   *
   * @throws WheelError `WHEEL_ARCHIVE_CORRUPT` for container failures and
   *   `WHEEL_LIMIT_EXCEEDED` for resource limits (the `ZipError` is the
   *   `cause` of both), parse and layout errors, and
   *   `IntegrityError` when `integrity` is `enforce` and RECORD disagrees.
   */
  static open(bytes: Uint8Array, options?: WheelOpenOptions): WheelArchive {
    const warnings: WheelWarning[] = [];
    const warn = (warning: WheelWarning): void => {
      warnings.push(warning);
      options?.onWarning?.(warning);
    };

    const contents = readContainer(bytes, options, warn);
    const distInfoPath = findDistInfo(contents.keys());
    const metadataPath = `${distInfoPath}/${METADATA_FILE}`;
    const wheelPath = `${distInfoPath}/${WHEEL_FILE}`;
    const recordPath = `${distInfoPath}/${RECORD_FILE}`;

    const metadata = parseDocument(metadataPath, requireFile(contents, metadataPath));
    const wheel = parseDocument(wheelPath, requireFile(contents, wheelPath));
    const recordText = decodeText(recordPath, requireFile(contents, recordPath), 'WHEEL_MALFORMED_RECORD');
    const record = withEntry(recordPath, () => parseRecord(recordText));

    const wheelVersion = checkWheelVersion(wheelPath, wheel, warn);
    const distribution = requireField(metadata, 'Name', metadataPath);
    const version = requireField(metadata, 'Version', metadataPath);
    checkDistInfoName(distInfoPath, distribution, version);

    const buildValue = wheel.getFirst('Build');
    const buildTag = buildValue !== undefined ? withEntry(wheelPath, () => parseBuildTag(buildValue.trim())) : undefined;
    const tagValues = wheel.getAll('Tag');
    if (tagValues.length === 0) {
      throw new WheelError('WHEEL_INVALID_METADATA', `${wheelPath} declares no Tag`, {
        entryName: wheelPath,
        context: { field: 'Tag' }
      });
    }
    const tags = withEntry(wheelPath, () => tagValues.map((value) => parseTag(value.trim())));
    const rootIsPurelib = parseBoolean(requireField(wheel, 'Root-Is-Purelib', wheelPath), wheelPath);

    if (options?.filename !== undefined) {
      checkFilename(options.filename, distribution, version, buildTag);
    }

    const integrity = options?.integrity ?? 'enforce';
    const discrepancies =
      integrity === 'skip' ? [] : verifyRecord(record, contents, { recordPath, digesters: options?.digesters });
    if (integrity === 'enforce' && discrepancies.length > 0) {
      throw new IntegrityError(discrepancies, { context: { distInfoPath } });
    }

    return new WheelArchive({
      distribution,
      version,
      buildTag,
      tags,
      rootIsPurelib,
      generator: wheel.getFirst('Generator'),
      wheelVersion,
      distInfoPath,
      metadata,
      wheel,
      record,
      contents,
      discrepancies,
      warnings,
      options
    });
  }

  /** Copy of the parsed METADATA document. */
  get metadata(): MetadataDocument {
    return this.metadataDocument.clone();
  }

  /** Copy of the parsed WHEEL document. */
  get wheel(): MetadataDocument {
    return this.wheelDocument.clone();
  }

  record(): RecordEntry[] {
    return this.recordEntries.map((entry) => ({ ...entry }));
  }

  /** Stored paths in archive order, directories included. */
  paths(): string[] {
    return [...this.contents.keys()];
  }

  has(path: string): boolean {
    return this.contents.has(path);
  }

  /** @throws WheelError `WHEEL_INVALID_PATH` when no such entry is stored. */
  read(path: string): Uint8Array {
    const data = this.contents.get(path);
    if (!data) {
      throw new WheelError('WHEEL_INVALID_PATH', `No entry named ${path}`, { entryName: path });
    }
    return new Uint8Array(data);
  }

  /** Parsed `entry_points.txt`, or an empty list when the wheel has none. */
  entryPoints(): EntryPointSection[] {
    const path = `${this.distInfoPath}/${ENTRY_POINTS_FILE}`;
    const data = this.contents.get(path);
    if (!data) return [];
    return withEntry(path, () => parseEntryPoints(decodeText(path, data, 'WHEEL_MALFORMED_METADATA')));
  }

  /** Discrepancies found while opening; empty unless opened with `integrity: 'report'`. */
  discrepancies(): Discrepancy[] {
    return this.discrepancyList.map((item) => ({ ...item }));
  }

  warnings(): WheelWarning[] {
    return [...this.warningsList];
  }

  /** Recompute every digest against RECORD. */
  verify(): Discrepancy[] {
    return verifyRecord(this.recordEntries, this.contents, {
      recordPath: `${this.distInfoPath}/${RECORD_FILE}`,
      digesters: this.options?.digesters
    });
  }

  /** Canonical filename derived from METADATA and WHEEL. */
  filename(): string {
    return formatWheelFilename({
      distribution: this.distribution,
      version: this.version,
      buildTag: this.buildTag,
      tags: tagSetFromTags(this.tags)
    });
  }
}

function readContainer(
  bytes: Uint8Array,
  options: WheelOpenOptions | undefined,
  warn: (warning: WheelWarning) => void
): Map<string, Uint8Array> {
  try {
    const reader = ZipReader.fromUint8Array(bytes, {
      profile: options?.profile ?? 'compat',
      isStrict: options?.isStrict,
      limits: options?.limits,
      onWarning: warn
    });
    const contents = new Map<string, Uint8Array>();
    for (const entry of reader.entries()) {
      const reason = describeUnsafePath(entry.name);
      if (reason !== null) {
        throw new WheelError('WHEEL_INVALID_PATH', `Unsafe archive path ${JSON.stringify(entry.name)}: ${reason}`, {
          entryName: entry.name
        });
      }
      contents.set(entry.name, reader.read(entry));
    }
    return contents;
  } catch (err) {
    if (err instanceof ZipError && err.code === 'ZIP_LIMIT_EXCEEDED') {
      throw new WheelError('WHEEL_LIMIT_EXCEEDED', `Wheel exceeds a resource limit: ${err.message}`, {
        ...(err.entryName !== undefined ? { entryName: err.entryName } : {}),
        context: { ...err.context, zipCode: err.code },
        cause: err
      });
    }
    if (err instanceof ZipError) {
      throw new WheelError('WHEEL_ARCHIVE_CORRUPT', `Wheel container is corrupt: ${err.message}`, {
        ...(err.entryName !== undefined ? { entryName: err.entryName } : {}),
        context: { zipCode: err.code },
        cause: err
      });
    }
    throw err;
  }
}

function findDistInfo(paths: Iterable<string>): string {
  const directories = new Set<string>();
  for (const path of paths) {
    const [top = '', ...rest] = path.split('/');
    if (rest.length > 0 && top.endsWith('.dist-info')) directories.add(top);
  }
  const [first, ...others] = [...directories].sort();
  if (first === undefined) {
    throw new WheelError('WHEEL_INVALID_LAYOUT', 'Wheel has no .dist-info directory');
  }
  if (others.length > 0) {
    throw new WheelError('WHEEL_INVALID_LAYOUT', `Wheel has several .dist-info directories: ${[first, ...others].join(', ')}`, {
      context: { directories: [first, ...others].join(',') }
    });
  }
  return first;
}

function requireFile(contents: ReadonlyMap<string, Uint8Array>, path: string): Uint8Array {
  const data = contents.get(path);
  if (!data) {
    throw new WheelError('WHEEL_INVALID_LAYOUT', `Wheel is missing ${path}`, { entryName: path });
  }
  return data;
}

function decodeText(
  path: string,
  data: Uint8Array,
  code: 'WHEEL_MALFORMED_METADATA' | 'WHEEL_MALFORMED_RECORD'
): string {
  try {
    return decodeUtf8(data, true);
  } catch (err) {
    throw new WheelError(code, `${path} is not valid UTF-8`, { entryName: path, cause: err });
  }
}

function parseDocument(path: string, data: Uint8Array): MetadataDocument {
  return withEntry(path, () => MetadataDocument.parse(decodeText(path, data, 'WHEEL_MALFORMED_METADATA')));
}

/** Attach `path` to wheel errors raised without one. */
function withEntry<T>(path: string, run: () => T): T {
  try {
    return run();
  } catch (err) {
    if (err instanceof WheelError && err.entryName === undefined) {
      throw new WheelError(err.code, `${path}: ${err.message}`, {
        entryName: path,
        line: err.line,
        context: err.context,
        cause: err
      });
    }
    throw err;
  }
}

function requireField(document: MetadataDocument, name: string, path: string): string {
  const value = document.getFirst(name)?.trim();
  if (value === undefined || value.length === 0) {
    throw new WheelError('WHEEL_INVALID_METADATA', `${path} is missing ${name}`, {
      entryName: path,
      context: { field: name }
    });
  }
  return value;
}

function checkWheelVersion(path: string, wheel: MetadataDocument, warn: (warning: WheelWarning) => void): string {
  const value = requireField(wheel, 'Wheel-Version', path);
  const match = /^(\d+)\.(\d+)$/.exec(value);
  if (!match) {
    throw new WheelError('WHEEL_INVALID_METADATA', `Invalid Wheel-Version ${JSON.stringify(value)}`, {
      entryName: path,
      context: { field: 'Wheel-Version' }
    });
  }
  const major = Number(match[1]);
  const minor = Number(match[2]);
  if (major !== SUPPORTED_WHEEL_MAJOR) {
    throw new WheelError('WHEEL_UNSUPPORTED_VERSION', `Wheel-Version ${value} is not supported`, {
      entryName: path,
      context: { wheelVersion: value }
    });
  }
  if (minor > SUPPORTED_WHEEL_MINOR) {
    warn({
      code: 'WHEEL_NEWER_MINOR_VERSION',
      message: `Wheel-Version ${value} is newer than ${SUPPORTED_WHEEL_MAJOR}.${SUPPORTED_WHEEL_MINOR}`,
      entryName: path
    });
  }
  return value;
}

function checkDistInfoName(distInfoPath: string, distribution: string, version: string): void {
  const stem = distInfoPath.slice(0, -'.dist-info'.length);
  const separator = stem.indexOf('-');
  const name = separator < 0 ? stem : stem.slice(0, separator);
  const dirVersion = separator < 0 ? '' : stem.slice(separator + 1);
  if (
    normalizeDistributionName(name) !== normalizeDistributionName(distribution) ||
    dirVersion.toLowerCase() !== escapeVersion(version).toLowerCase()
  ) {
    throw new WheelError('WHEEL_INVALID_LAYOUT', `${distInfoPath} does not match ${distribution} ${version}`, {
      entryName: distInfoPath
    });
  }
}

function checkFilename(filename: string, distribution: string, version: string, buildTag: BuildTag | undefined): void {
  const basename = filename.slice(filename.lastIndexOf('/') + 1);
  const parsed = parseWheelFilename(basename);
  const mismatch =
    normalizeDistributionName(parsed.distribution) !== normalizeDistributionName(distribution)
      ? 'distribution'
      : parsed.version.toLowerCase() !== escapeVersion(version).toLowerCase()
        ? 'version'
        : parsed.buildTag?.raw !== buildTag?.raw
          ? 'build tag'
          : undefined;
  if (mismatch !== undefined) {
    throw new WheelError('WHEEL_FILENAME_MISMATCH', `Filename ${basename} disagrees with the archive ${mismatch}`, {
      context: { filename: basename, field: mismatch }
    });
  }
}

function parseBoolean(value: string, path: string): boolean {
  const lowered = value.toLowerCase();
  if (lowered === 'true') return true;
  if (lowered === 'false') return false;
  throw new WheelError('WHEEL_INVALID_METADATA', `Root-Is-Purelib must be true or false, got ${JSON.stringify(value)}`, {
    entryName: path,
    context: { field: 'Root-Is-Purelib' }
  });
}
