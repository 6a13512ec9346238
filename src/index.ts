export { WheelArchive } from './wheel/WheelArchive.js';
export { WheelBuilder, buildWheel } from './wheel/WheelBuilder.js';
export { spdxLicenseValidator, assertLicenseExpression } from './wheel/license.js';
export type { LicenseExpressionValidator } from './wheel/license.js';
export { DATA_CATEGORIES, GENERATOR, WHEEL_FORMAT_VERSION, dataDirectory, distInfoDirectory } from './wheel/layout.js';
export type {
  DataCategory,
  FileManifestSupplier,
  IntegrityMode,
  WheelBuildOptions,
  WheelBuildResult,
  WheelFile,
  WheelFileInput,
  WheelOpenOptions
} from './wheel/types.js';

export { MetadataDocument, foldValue, parseMetadata, serializeMetadata } from './metadata/MetadataDocument.js';
export type { MetadataField } from './metadata/MetadataDocument.js';
export {
  findEntryPointGroup,
  parseEntryPointTarget,
  parseEntryPoints,
  serializeEntryPoints
} from './metadata/entryPoints.js';
export type { EntryPoint, EntryPointSection, EntryPointTarget } from './metadata/entryPoints.js';

export { buildRecord, parseRecord, serializeRecord, verifyRecord } from './record/record.js';
export type { BuildRecordOptions, RecordDigest, RecordEntry, VerifyRecordOptions } from './record/record.js';

export {
  createNodeDigester,
  encodeDigest,
  getDigester,
  listDigesters,
  registerDigester,
  resolveDigester
} from './digest.js';
export type { Digester } from './digest.js';

export {
  expandTagSet,
  formatTag,
  formatTagSet,
  normalizeTag,
  parseTag,
  parseTagSet,
  tagSetFromTags
} from './tags/tags.js';
export type { TagSet, WheelTag } from './tags/tags.js';
export {
  WHEEL_EXTENSION,
  compareBuildTags,
  compareWheelFilenames,
  escapeFilenameComponent,
  escapeVersion,
  expandTags,
  formatWheelFilename,
  normalizeDistributionName,
  parseBuildTag,
  parseWheelFilename
} from './tags/filename.js';
export type { BuildTag, WheelFilename, WheelFilenameParts } from './tags/filename.js';
export { compareVersions } from './tags/version.js';
export { DEFAULT_TIE_BREAK, rankCandidates, selectBest } from './tags/rank.js';
export type { RankOptions, RankedCandidate, TieBreakRule } from './tags/rank.js';
export { compatibleTags, cpythonTags, supportedTags } from './tags/supported.js';
export type { CompatibleTagsOptions, CpythonTagsOptions, PythonVersion, SupportedTagsOptions } from './tags/supported.js';

export { IntegrityError, WheelError, formatDiscrepancy } from './errors.js';
export type { Discrepancy, WheelErrorCode, WheelWarning, WheelWarningCode } from './errors.js';
export { describeUnsafePath } from './paths.js';
export { AGENT_RESOURCE_LIMITS, COMPAT_RESOURCE_LIMITS, DEFAULT_RESOURCE_LIMITS } from './limits.js';
export type { ReadProfile, ResourceLimits } from './limits.js';
export { WHEELWRIGHT_REPORT_SCHEMA_VERSION } from './reportSchema.js';

export * from './zip/index.js';
