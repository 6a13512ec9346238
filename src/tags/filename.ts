import { WheelError } from '../errors.js';
import { comparePaths } from '../paths.js';
import { expandTagSet, formatTagSet, parseTagSet, type TagSet, type WheelTag } from './tags.js';
import { compareVersions } from './version.js';

export const WHEEL_EXTENSION = '.whl';

/** Optional build marker: a decimal prefix plus an optional suffix. */
export type BuildTag = {
  raw: string;
  number: bigint;
  suffix: string;
};

export type WheelFilename = {
  distribution: string;
  version: string;
  buildTag?: BuildTag;
  tags: TagSet;
};

export type WheelFilenameParts = {
  distribution: string;
  version: string;
  buildTag?: BuildTag | string | undefined;
  tags: TagSet | string;
};

/**
 * Parse `{distribution}-{version}(-{build})?-{interpreters}-{abis}-{platforms}.whl`.
 *
 * @throws WheelError `WHEEL_INVALID_FILENAME`, or `WHEEL_INVALID_TAG` for an empty tag segment.
 */
export function parseWheelFilename(name: string): WheelFilename {
  if (!name.toLowerCase().endsWith(WHEEL_EXTENSION)) {
    throw invalidFilename(name, `expected the ${WHEEL_EXTENSION} extension`);
  }
  const stem = name.slice(0, -WHEEL_EXTENSION.length);
  const fields = stem.split('-');
  if (fields.length !== 5 && fields.length !== 6) {
    throw invalidFilename(name, `expected 5 or 6 dash-separated fields but found ${fields.length}`);
  }
  if (fields.some((field) => field.length === 0)) {
    throw invalidFilename(name, 'empty field');
  }

  const [distribution = '', version = ''] = fields;
  const tagFields = fields.slice(-3).join('-');
  const build = fields.length === 6 ? fields[2] : undefined;

  const parsed: WheelFilename = { distribution, version, tags: parseTagSet(tagFields) };
  if (build !== undefined) {
    parsed.buildTag = parseBuildTag(build, name);
  }
  return parsed;
}

/** Canonical filename: escaped name and version, compressed tags. */
export function formatWheelFilename(parts: WheelFilenameParts): string {
  const build =
    parts.buildTag === undefined ? undefined : typeof parts.buildTag === 'string' ? parts.buildTag : parts.buildTag.raw;
  const tags = typeof parts.tags === 'string' ? parts.tags : formatTagSet(parts.tags);
  const fields = [escapeFilenameComponent(parts.distribution), escapeVersion(parts.version)];
  if (build !== undefined) fields.push(build);
  fields.push(tags);
  return `${fields.join('-')}${WHEEL_EXTENSION}`;
}

/** Every tag the filename declares, in interpreter-major order. */
export function expandTags(filename: WheelFilename): WheelTag[] {
  return expandTagSet(filename.tags);
}

/**
 * @param filename reported in the error context when the tag came from a filename.
 * @throws WheelError `WHEEL_INVALID_FILENAME` unless the tag starts with a decimal digit.
 */
export function parseBuildTag(raw: string, filename?: string): BuildTag {
  const match = /^(\d+)([^-]*)$/s.exec(raw);
  if (!match || match[1] === undefined) {
    const reason = raw.includes('-') ? 'must not contain "-"' : 'must start with a digit';
    throw new WheelError('WHEEL_INVALID_FILENAME', `Invalid build tag ${JSON.stringify(raw)}: ${reason}`, {
      context: { buildTag: raw, ...(filename !== undefined ? { filename } : {}) }
    });
  }
  return { raw, number: BigInt(match[1]), suffix: match[2] ?? '' };
}

/** An absent build tag sorts below any present one. */
export function compareBuildTags(a: BuildTag | undefined, b: BuildTag | undefined): number {
  if (a === undefined || b === undefined) {
    return a === b ? 0 : a === undefined ? -1 : 1;
  }
  if (a.number !== b.number) return a.number < b.number ? -1 : 1;
  return comparePaths(a.suffix, b.suffix);
}

/** Name used to compare distributions: lowercase with `-_.` runs collapsed to `_`. */
export function normalizeDistributionName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '_');
}

/** Like {@link normalizeDistributionName} but case-preserving, for writing filenames. */
export function escapeFilenameComponent(value: string): string {
  return value.replace(/[-_.]+/g, '_');
}

export function escapeVersion(version: string): string {
  return version.replace(/-/g, '_');
}

/** Order by normalized name, then version, then build tag. */
export function compareWheelFilenames(a: WheelFilename, b: WheelFilename): number {
  return (
    comparePaths(normalizeDistributionName(a.distribution), normalizeDistributionName(b.distribution)) ||
    compareVersions(a.version, b.version) ||
    compareBuildTags(a.buildTag, b.buildTag)
  );
}

function invalidFilename(filename: string, reason: string): WheelError {
  return new WheelError('WHEEL_INVALID_FILENAME', `Invalid wheel filename ${JSON.stringify(filename)}: ${reason}`, {
    context: { filename }
  });
}
