/** Resource ceilings applied while reading archives. */
export type ResourceLimits = {
  maxEntries?: number;
  maxUncompressedEntryBytes?: number;
  maxTotalUncompressedBytes?: number;
  maxCompressionRatio?: number;
  maxZipEocdSearchBytes?: number;
};

/** Safety profile for reading archives. */
export type ReadProfile = 'compat' | 'strict' | 'agent';

const DEFAULT_LIMITS = Object.freeze({
  maxEntries: 10000,
  maxUncompressedEntryBytes: 512 * 1024 * 1024,
  maxTotalUncompressedBytes: 2 * 1024 * 1024 * 1024,
  maxCompressionRatio: 1000,
  maxZipEocdSearchBytes: 0x10000 + 22
} satisfies Required<ResourceLimits>);

const AGENT_LIMITS = Object.freeze({
  maxEntries: 5000,
  maxUncompressedEntryBytes: 256 * 1024 * 1024,
  maxTotalUncompressedBytes: 1024 * 1024 * 1024,
  maxCompressionRatio: 200,
  maxZipEocdSearchBytes: 0x10000 + 22
} satisfies Required<ResourceLimits>);

const COMPAT_LIMITS = Object.freeze({
  ...DEFAULT_LIMITS,
  maxCompressionRatio: Number.POSITIVE_INFINITY
} satisfies Required<ResourceLimits>);

export const DEFAULT_RESOURCE_LIMITS: Readonly<Required<ResourceLimits>> = DEFAULT_LIMITS;
export const AGENT_RESOURCE_LIMITS: Readonly<Required<ResourceLimits>> = AGENT_LIMITS;
export const COMPAT_RESOURCE_LIMITS: Readonly<Required<ResourceLimits>> = COMPAT_LIMITS;

/**
 * Resolve strictness and limits from a profile plus explicit overrides.
 * `compat` keeps the size ceilings but has no compression-ratio limit.
 */
export function resolveReadProfile(
  profile: ReadProfile,
  overrides?: { isStrict?: boolean | undefined; limits?: ResourceLimits | undefined }
): { profile: ReadProfile; strict: boolean; limits: Required<ResourceLimits> } {
  const defaults = profile === 'agent' ? AGENT_LIMITS : profile === 'compat' ? COMPAT_LIMITS : DEFAULT_LIMITS;
  const strict = overrides?.isStrict ?? profile !== 'compat';
  const limits = overrides?.limits;
  return {
    profile,
    strict,
    limits: {
      maxEntries: limits?.maxEntries ?? defaults.maxEntries,
      maxUncompressedEntryBytes: limits?.maxUncompressedEntryBytes ?? defaults.maxUncompressedEntryBytes,
      maxTotalUncompressedBytes: limits?.maxTotalUncompressedBytes ?? defaults.maxTotalUncompressedBytes,
      maxCompressionRatio: limits?.maxCompressionRatio ?? defaults.maxCompressionRatio,
      maxZipEocdSearchBytes: limits?.maxZipEocdSearchBytes ?? defaults.maxZipEocdSearchBytes
    }
  };
}
