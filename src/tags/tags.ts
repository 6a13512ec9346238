import { WheelError } from '../errors.js';

/** One (interpreter, abi, platform) compatibility triple. */
export type WheelTag = {
  interpreter: string;
  abi: string;
  platform: string;
};

/** The compressed form: each field may list several dot-separated values. */
export type TagSet = {
  interpreters: string[];
  abis: string[];
  platforms: string[];
};

/** Lowercase and replace every character outside `[A-Za-z0-9.]` with `_`. */
export function normalizeTag(token: string): string {
  return token.toLowerCase().replace(/[^a-z0-9.]/g, '_');
}

export function formatTag(tag: WheelTag): string {
  return `${tag.interpreter}-${tag.abi}-${tag.platform}`;
}

/** Parse a single `interpreter-abi-platform` triple; no compressed segments. */
export function parseTag(text: string): WheelTag {
  const parts = text.split('-');
  const [interpreter, abi, platform] = parts;
  if (parts.length !== 3 || interpreter === undefined || abi === undefined || platform === undefined) {
    throw invalidTag(text, 'expected interpreter-abi-platform');
  }
  const tag = {
    interpreter: normalizeSegment(interpreter, text),
    abi: normalizeSegment(abi, text),
    platform: normalizeSegment(platform, text)
  };
  if ([tag.interpreter, tag.abi, tag.platform].some((segment) => segment.includes('.'))) {
    throw invalidTag(text, 'a single tag cannot hold compressed segments');
  }
  return tag;
}

/** Parse `py2.py3-none-any` style text into its three value lists. */
export function parseTagSet(text: string): TagSet {
  const parts = text.split('-');
  const [interpreters, abis, platforms] = parts;
  if (parts.length !== 3 || interpreters === undefined || abis === undefined || platforms === undefined) {
    throw invalidTag(text, 'expected interpreter-abi-platform');
  }
  return {
    interpreters: splitCompressed(interpreters, text),
    abis: splitCompressed(abis, text),
    platforms: splitCompressed(platforms, text)
  };
}

export function formatTagSet(tags: TagSet): string {
  return [tags.interpreters, tags.abis, tags.platforms].map((values) => values.join('.')).join('-');
}

/**
 * Cross product in interpreter-major, then abi, then platform order.
 * Repeated triples keep their first position.
 */
export function expandTagSet(tags: TagSet): WheelTag[] {
  const expanded: WheelTag[] = [];
  const seen = new Set<string>();
  for (const interpreter of tags.interpreters) {
    for (const abi of tags.abis) {
      for (const platform of tags.platforms) {
        const tag = { interpreter, abi, platform };
        const key = formatTag(tag);
        if (seen.has(key)) continue;
        seen.add(key);
        expanded.push(tag);
      }
    }
  }
  return expanded;
}

/**
 * Compressed form listing each distinct value once, in first-seen order.
 * Its expansion covers `tags` and equals it when they form a full cross product.
 */
export function tagSetFromTags(tags: readonly WheelTag[]): TagSet {
  const unique = (values: string[]): string[] => [...new Set(values)];
  return {
    interpreters: unique(tags.map((tag) => tag.interpreter)),
    abis: unique(tags.map((tag) => tag.abi)),
    platforms: unique(tags.map((tag) => tag.platform))
  };
}

function splitCompressed(field: string, text: string): string[] {
  return field.split('.').map((segment) => normalizeSegment(segment, text));
}

function normalizeSegment(segment: string, text: string): string {
  if (segment.length === 0) {
    throw invalidTag(text, 'empty tag segment');
  }
  return normalizeTag(segment);
}

function invalidTag(text: string, reason: string): WheelError {
  return new WheelError('WHEEL_INVALID_TAG', `Invalid tag ${JSON.stringify(text)}: ${reason}`, {
    context: { tag: text }
  });
}
