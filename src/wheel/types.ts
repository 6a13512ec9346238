import type { Digester } from '../digest.js';
import type { WheelWarning } from '../errors.js';
import type { ReadProfile, ResourceLimits } from '../limits.js';
import type { MetadataField } from '../metadata/MetadataDocument.js';
import type { RecordEntry } from '../record/record.js';
import type { TagSet } from '../tags/tags.js';
import type { LicenseExpressionValidator } from './license.js';

/** Payload file with its permission flag. */
export type WheelFile = {
  data: Uint8Array;
  /** Stored with mode 0o755 instead of 0o644. */
  executable?: boolean | undefined;
};

export type WheelFileInput = Uint8Array | WheelFile;

/** Supplies the payload; the builder never discovers files itself. */
export type FileManifestSupplier = {
  files(): Iterable<readonly [string, WheelFileInput]>;
};

/** Sub-directories of `{name}-{version}.data/`. */
export type DataCategory = 'purelib' | 'platlib' | 'scripts' | 'headers' | 'data';

export type WheelBuildOptions = {
  distribution: string;
  version: string;
  buildTag?: string | undefined;
  /** Compressed tag string such as `py2.py3-none-any`, or a tag set. Defaults to `py3-none-any`. */
  tags?: string | TagSet | undefined;
  files?: Iterable<readonly [string, WheelFileInput]> | FileManifestSupplier | undefined;
  /** METADATA fields after `Metadata-Version`, `Name` and `Version`. */
  metadataFields?: Iterable<MetadataField | readonly [string, string]> | undefined;
  /** METADATA body, usually the long description. */
  description?: string | undefined;
  licenseExpression?: string | undefined;
  licenseValidator?: LicenseExpressionValidator | undefined;
  /** Algorithm name or digester used for RECORD. Defaults to `sha256`. */
  digest?: string | Digester | undefined;
  generator?: string | undefined;
  rootIsPurelib?: boolean | undefined;
  metadataVersion?: string | undefined;
  compression?: 'deflate' | 'store' | undefined;
  /** Timestamp stored on every entry. Defaults to 1980-01-01T00:00:00Z. */
  modifiedTime?: Date | undefined;
};

export type WheelBuildResult = {
  filename: string;
  bytes: Uint8Array;
  record: RecordEntry[];
};

/**
 * - `enforce`: throw `IntegrityError` when RECORD disagrees with the contents.
 * - `report`: open anyway; inspect `discrepancies()`.
 * - `skip`: do not verify.
 */
export type IntegrityMode = 'enforce' | 'report' | 'skip';

export type WheelOpenOptions = {
  /** File name the bytes were stored under; checked against the dist-info directory. */
  filename?: string | undefined;
  integrity?: IntegrityMode | undefined;
  profile?: ReadProfile | undefined;
  isStrict?: boolean | undefined;
  limits?: ResourceLimits | undefined;
  /** Digesters for RECORD algorithms beyond the registered ones. */
  digesters?: readonly Digester[] | undefined;
  onWarning?: ((warning: WheelWarning) => void) | undefined;
};
