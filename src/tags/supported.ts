import { normalizeTag, type WheelTag } from './tags.js';

/** `[major, minor]` of the target interpreter. */
export type PythonVersion = readonly [major: number, minor: number];

export type CpythonTagsOptions = {
  version: PythonVersion;
  /** Defaults to `cp{major}{minor}`. */
  abis?: readonly string[];
  platforms: readonly string[];
};

export type CompatibleTagsOptions = {
  version: PythonVersion;
  /** Interpreter tag also allowed with `none-any`, e.g. `cp310`. */
  interpreter?: string;
  platforms: readonly string[];
};

export type SupportedTagsOptions = {
  version: PythonVersion;
  abis?: readonly string[];
  platforms: readonly string[];
};

/** Tags accepted by a CPython interpreter, most preferred first. */
export function cpythonTags(options: CpythonTagsOptions): WheelTag[] {
  const [major, minor] = options.version;
  const interpreter = `cp${major}${minor}`;
  const platforms = options.platforms.map(normalizeTag);
  const abis = (options.abis ?? [interpreter]).map(normalizeTag).filter((abi) => abi !== 'abi3' && abi !== 'none');
  const abi3 = major === 3 && minor >= 2;
  const tags: WheelTag[] = [];

  for (const abi of abis) {
    for (const platform of platforms) tags.push({ interpreter, abi, platform });
  }
  if (abi3) {
    for (const platform of platforms) tags.push({ interpreter, abi: 'abi3', platform });
  }
  for (const platform of platforms) tags.push({ interpreter, abi: 'none', platform });
  if (abi3) {
    for (let older = minor - 1; older >= 2; older -= 1) {
      for (const platform of platforms) tags.push({ interpreter: `cp${major}${older}`, abi: 'abi3', platform });
    }
  }
  return tags;
}

/** Pure-Python and `none`-ABI tags, most preferred first. */
export function compatibleTags(options: CompatibleTagsOptions): WheelTag[] {
  const platforms = options.platforms.map(normalizeTag);
  const versions = pyInterpreterRange(options.version);
  const tags: WheelTag[] = [];

  for (const interpreter of versions) {
    for (const platform of platforms) tags.push({ interpreter, abi: 'none', platform });
  }
  if (options.interpreter !== undefined) {
    tags.push({ interpreter: normalizeTag(options.interpreter), abi: 'none', platform: 'any' });
  }
  for (const interpreter of versions) tags.push({ interpreter, abi: 'none', platform: 'any' });
  return tags;
}

/** Full priority list for CPython: {@link cpythonTags} then {@link compatibleTags}. */
export function supportedTags(options: SupportedTagsOptions): WheelTag[] {
  const [major, minor] = options.version;
  const seen = new Set<string>();
  const tags: WheelTag[] = [];
  const all = [
    ...cpythonTags(options.abis ? options : { version: options.version, platforms: options.platforms }),
    ...compatibleTags({ version: options.version, interpreter: `cp${major}${minor}`, platforms: options.platforms })
  ];
  for (const tag of all) {
    const key = `${tag.interpreter}-${tag.abi}-${tag.platform}`;
    if (seen.has(key)) continue;
    seen.add(key);
    tags.push(tag);
  }
  return tags;
}

function pyInterpreterRange([major, minor]: PythonVersion): string[] {
  const versions = [`py${major}${minor}`, `py${major}`];
  for (let older = minor - 1; older >= 0; older -= 1) versions.push(`py${major}${older}`);
  return versions;
}
