import { encodeUtf8 } from '../binary.js';
import { resolveDigester } from '../digest.js';
import { DOS_EPOCH } from '../dosTime.js';
import { WheelError } from '../errors.js';
import { MetadataDocument } from '../metadata/MetadataDocument.js';
import { assertSafePath, comparePaths, isDirectoryPath } from '../paths.js';
import { buildRecord, serializeRecord } from '../record/record.js';
import {
  formatWheelFilename,
  normalizeDistributionName,
  parseBuildTag,
  type BuildTag
} from '../tags/filename.js';
import { expandTagSet, formatTag, formatTagSet, parseTagSet, type TagSet } from '../tags/tags.js';
import { ZipWriter } from '../writer/ZipWriter.js';
import { assertLicenseExpression, spdxLicenseValidator } from './license.js';
import {
  DIRECTORY_MODE,
  EXECUTABLE_MODE,
  FILE_MODE,
  GENERATOR,
  METADATA_FILE,
  RECORD_FILE,
  WHEEL_FILE,
  WHEEL_FORMAT_VERSION,
  dataDirectory,
  distInfoDirectory,
  isDataCategory
} from './layout.js';
import type {
  DataCategory,
  FileManifestSupplier,
  WheelBuildOptions,
  WheelBuildResult,
  WheelFile,
  WheelFileInput
} from './types.js';

const DISTRIBUTION_NAME = /^[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?$/;
const VERSION = /^[A-Za-z0-9][A-Za-z0-9.+!_-]*$/;
const DEFAULT_TAGS = 'py3-none-any';
const MANAGED_FIELDS = ['Metadata-Version', 'Name', 'Version', 'License-Expression'] as const;

/** Build a wheel in one call. */
export function buildWheel(options: WheelBuildOptions): WheelBuildResult {
  return new WheelBuilder(options).build();
}

/**
 * Collects payload files and METADATA fields, then writes a reproducible
 * wheel.
 *
 * Entries are written payload first in code-unit path order, then
 * `METADATA`, `WHEEL` and `RECORD`, all with the same timestamp and
 * normalized modes, so identical input gives identical bytes.
 */
export class WheelBuilder {
  readonly distribution: string;
  readonly version: string;
  readonly buildTag: BuildTag | undefined;
  readonly tags: TagSet;
  /** `{name}-{version}.dist-info` */
  readonly distInfoPath: string;
  private readonly files = new Map<string, WheelFile>();
  private readonly metadata: MetadataDocument;

  constructor(private readonly options: WheelBuildOptions) {
    const distribution = options.distribution.trim();
    const version = options.version.trim();
    if (!DISTRIBUTION_NAME.test(distribution)) {
      throw new WheelError('WHEEL_INVALID_METADATA', `Invalid distribution name ${JSON.stringify(options.distribution)}`, {
        context: { field: 'Name' }
      });
    }
    if (!VERSION.test(version)) {
      throw new WheelError('WHEEL_INVALID_METADATA', `Invalid version ${JSON.stringify(options.version)}`, {
        context: { field: 'Version' }
      });
    }
    this.distribution = distribution;
    this.version = version;
    this.buildTag = options.buildTag !== undefined ? parseBuildTag(options.buildTag) : undefined;
    const tags = options.tags ?? DEFAULT_TAGS;
    this.tags = parseTagSet(typeof tags === 'string' ? tags : formatTagSet(tags));
    this.distInfoPath = distInfoDirectory(distribution, version);
    this.metadata = new MetadataDocument(options.metadataFields ?? []);

    if (options.files !== undefined) {
      const entries = isFileManifestSupplier(options.files) ? options.files.files() : options.files;
      for (const [path, input] of entries) this.addFile(path, input);
    }
  }

  /**
   * Add a payload file. Paths ending in `/` add an empty directory entry.
   *
   * @throws WheelError `WHEEL_INVALID_PATH` for unsafe, duplicate or reserved paths.
   */
  addFile(path: string, input: WheelFileInput): this {
    assertSafePath(path);
    const file: WheelFile = input instanceof Uint8Array ? { data: input } : input;
    if (this.files.has(path)) {
      throw invalidPath(path, 'duplicate path');
    }
    if (isDirectoryPath(path) && file.data.length > 0) {
      throw invalidPath(path, 'directory entries cannot carry data');
    }
    const [top = ''] = path.split('/');
    if (top.endsWith('.dist-info') && top !== this.distInfoPath) {
      throw invalidPath(path, `only ${this.distInfoPath} may be used as a .dist-info directory`);
    }
    if ([METADATA_FILE, WHEEL_FILE, RECORD_FILE].some((name) => path === `${this.distInfoPath}/${name}`)) {
      throw invalidPath(path, 'path is generated by the builder');
    }
    this.files.set(path, { data: file.data, executable: file.executable === true });
    return this;
  }

  /** Add a file under `{name}-{version}.data/{category}/`. */
  addDataFile(category: DataCategory, path: string, input: WheelFileInput): this {
    if (!isDataCategory(category)) {
      throw invalidPath(path, `unknown data category ${JSON.stringify(category)}`);
    }
    assertSafePath(path);
    return this.addFile(`${dataDirectory(this.distribution, this.version)}/${category}/${path}`, input);
  }

  /** Replace a METADATA field. */
  setMetadataField(name: string, value: string): this {
    this.metadata.set(name, value);
    return this;
  }

  /** Append a METADATA field, keeping earlier occurrences. */
  addMetadataField(name: string, value: string): this {
    this.metadata.add(name, value);
    return this;
  }

  filename(): string {
    return formatWheelFilename({
      distribution: this.distribution,
      version: this.version,
      buildTag: this.buildTag,
      tags: this.tags
    });
  }

  build(): WheelBuildResult {
    const digester = resolveDigester(this.options.digest);
    const metadataPath = `${this.distInfoPath}/${METADATA_FILE}`;
    const wheelPath = `${this.distInfoPath}/${WHEEL_FILE}`;
    const recordPath = `${this.distInfoPath}/${RECORD_FILE}`;
    const metadataBytes = encodeUtf8(this.composeMetadata().toString());
    const wheelBytes = encodeUtf8(this.composeWheel().toString());

    const payload = [...this.files.entries()].sort(([a], [b]) => comparePaths(a, b));
    const record = buildRecord(
      [
        ...payload.map(([path, file]) => [path, file.data] as const),
        [metadataPath, metadataBytes] as const,
        [wheelPath, wheelBytes] as const
      ],
      digester,
      { recordPath }
    );
    const recordBytes = encodeUtf8(serializeRecord(record));

    const writer = new ZipWriter({
      defaultMethod: this.options.compression === 'store' ? 0 : 8,
      defaultMtime: this.options.modifiedTime ?? DOS_EPOCH
    });
    for (const [path, file] of payload) {
      writer.add(path, file.data, { mode: modeFor(path, file) });
    }
    writer.add(metadataPath, metadataBytes, { mode: FILE_MODE });
    writer.add(wheelPath, wheelBytes, { mode: FILE_MODE });
    writer.add(recordPath, recordBytes, { mode: FILE_MODE });

    return { filename: this.filename(), bytes: writer.finish(), record };
  }

  private composeMetadata(): MetadataDocument {
    const supplied = this.metadata.clone();
    const name = supplied.getFirst('Name');
    if (name !== undefined && normalizeDistributionName(name.trim()) !== normalizeDistributionName(this.distribution)) {
      throw new WheelError('WHEEL_INVALID_METADATA', `Name field ${JSON.stringify(name)} does not match ${this.distribution}`, {
        context: { field: 'Name' }
      });
    }
    const version = supplied.getFirst('Version');
    if (version !== undefined && version.trim() !== this.version) {
      throw new WheelError('WHEEL_INVALID_METADATA', `Version field ${JSON.stringify(version)} does not match ${this.version}`, {
        context: { field: 'Version' }
      });
    }

    const suppliedLicense = this.options.licenseExpression ?? supplied.getFirst('License-Expression');
    const license =
      suppliedLicense !== undefined
        ? assertLicenseExpression(suppliedLicense, this.options.licenseValidator ?? spdxLicenseValidator)
        : undefined;
    const metadataVersion =
      this.options.metadataVersion ?? supplied.getFirst('Metadata-Version') ?? (license !== undefined ? '2.4' : '2.1');
    for (const field of MANAGED_FIELDS) supplied.remove(field);

    const document = new MetadataDocument(
      [
        { name: 'Metadata-Version', value: metadataVersion },
        { name: 'Name', value: this.distribution },
        { name: 'Version', value: this.version },
        ...supplied.fields()
      ],
      this.options.description ?? supplied.body
    );
    if (license !== undefined) document.add('License-Expression', license);
    return document;
  }

  private composeWheel(): MetadataDocument {
    const document = new MetadataDocument([
      { name: 'Wheel-Version', value: WHEEL_FORMAT_VERSION },
      { name: 'Generator', value: this.options.generator ?? GENERATOR },
      { name: 'Root-Is-Purelib', value: String(this.options.rootIsPurelib ?? true) }
    ]);
    for (const tag of expandTagSet(this.tags)) document.add('Tag', formatTag(tag));
    if (this.buildTag) document.add('Build', this.buildTag.raw);
    return document;
  }
}

function isFileManifestSupplier(
  files: Iterable<readonly [string, WheelFileInput]> | FileManifestSupplier
): files is FileManifestSupplier {
  return !(Symbol.iterator in files);
}

function modeFor(path: string, file: WheelFile): number {
  if (isDirectoryPath(path)) return DIRECTORY_MODE;
  return file.executable ? EXECUTABLE_MODE : FILE_MODE;
}

function invalidPath(path: string, reason: string): WheelError {
  return new WheelError('WHEEL_INVALID_PATH', `Cannot add ${JSON.stringify(path)}: ${reason}`, { entryName: path });
}
