type Token = { kind: 'number'; value: bigint } | { kind: 'text'; value: string };

/**
 * Total order over version strings.
 *
 * Dot-separated segments are split into digit and non-digit runs. Numbers
 * compare numerically; text compares case-insensitively and sorts before a
 * number or a missing token, so `1.0a1 < 1.0 < 1.0.1`. A missing segment
 * counts as `0`, so trailing zero segments are insignificant. Versions equal
 * by these rules fall back to code-unit order so distinct strings never
 * compare equal.
 */
export function compareVersions(a: string, b: string): number {
  const left = segments(a);
  const right = segments(b);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i += 1) {
    const result = compareSegments(left[i], right[i]);
    if (result !== 0) return result;
  }
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function segments(version: string): Token[][] {
  return version
    .trim()
    .split('.')
    .map((segment) => tokenize(segment));
}

function tokenize(segment: string): Token[] {
  const tokens: Token[] = [];
  for (const match of segment.matchAll(/\d+|\D+/g)) {
    const run = match[0];
    tokens.push(/^\d/.test(run) ? { kind: 'number', value: BigInt(run) } : { kind: 'text', value: run.toLowerCase() });
  }
  return tokens;
}

const ZERO_SEGMENT: Token[] = [{ kind: 'number', value: 0n }];

function compareSegments(a: Token[] | undefined, b: Token[] | undefined): number {
  const left = a ?? ZERO_SEGMENT;
  const right = b ?? ZERO_SEGMENT;
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i += 1) {
    const result = compareTokens(left[i], right[i]);
    if (result !== 0) return result;
  }
  return 0;
}

function compareTokens(a: Token | undefined, b: Token | undefined): number {
  if (a === undefined && b === undefined) return 0;
  // Text marks a pre-release: it sorts below both a number and the end of the segment.
  if (a === undefined) return b?.kind === 'text' ? 1 : -1;
  if (b === undefined) return a.kind === 'text' ? -1 : 1;
  if (a.kind === 'number' && b.kind === 'number') {
    return a.value === b.value ? 0 : a.value < b.value ? -1 : 1;
  }
  if (a.kind === 'text' && b.kind === 'text') {
    return a.value === b.value ? 0 : a.value < b.value ? -1 : 1;
  }
  return a.kind === 'text' ? -1 : 1;
}
