import { compareBuildTags, expandTags, type WheelFilename } from './filename.js';
import { formatTag, type WheelTag } from './tags.js';

/**
 * Rules applied, in order, to candidates matching at the same supported index.
 *
 * - `build-tag`: keep the candidates with the highest build tag.
 * - `specificity`: drop a candidate when another candidate's tag set is a
 *   strict subset of its own.
 */
export type TieBreakRule = 'build-tag' | 'specificity';

export const DEFAULT_TIE_BREAK: readonly TieBreakRule[] = ['build-tag', 'specificity'];

export type RankOptions = {
  tieBreak?: readonly TieBreakRule[];
};

export type RankedCandidate<T extends WheelFilename = WheelFilename> = {
  candidate: T;
  /** Earliest position in the supported list matched by any of the candidate's tags. */
  index: number;
};

type Scored<T extends WheelFilename> = RankedCandidate<T> & { keys: ReadonlySet<string> };

/**
 * Eligible candidates, best first. Candidates sharing no tag with
 * `supported` are left out. Ties the rules cannot break keep input order.
 */
export function rankCandidates<T extends WheelFilename>(
  candidates: readonly T[],
  supported: readonly WheelTag[],
  options?: RankOptions
): RankedCandidate<T>[] {
  const tieBreak = options?.tieBreak ?? DEFAULT_TIE_BREAK;
  const positions = new Map<string, number>();
  supported.forEach((tag, index) => {
    const key = formatTag(tag);
    if (!positions.has(key)) positions.set(key, index);
  });

  let pool: Scored<T>[] = [];
  for (const candidate of candidates) {
    const keys = new Set(expandTags(candidate).map(formatTag));
    let best = Number.POSITIVE_INFINITY;
    for (const key of keys) {
      const position = positions.get(key);
      if (position !== undefined && position < best) best = position;
    }
    if (Number.isFinite(best)) pool.push({ candidate, index: best, keys });
  }

  const ranked: RankedCandidate<T>[] = [];
  while (pool.length > 0) {
    const winner = pickWinner(pool, tieBreak);
    ranked.push({ candidate: winner.candidate, index: winner.index });
    pool = pool.filter((entry) => entry !== winner);
  }
  return ranked;
}

/** The best installable candidate, or `undefined` when none matches. */
export function selectBest<T extends WheelFilename>(
  candidates: readonly T[],
  supported: readonly WheelTag[],
  options?: RankOptions
): RankedCandidate<T> | undefined {
  return rankCandidates(candidates, supported, options)[0];
}

function pickWinner<T extends WheelFilename>(pool: readonly Scored<T>[], tieBreak: readonly TieBreakRule[]): Scored<T> {
  const minimum = Math.min(...pool.map((entry) => entry.index));
  let stage = pool.filter((entry) => entry.index === minimum);

  for (const rule of tieBreak) {
    if (stage.length <= 1) break;
    if (rule === 'build-tag') {
      const highest = stage.reduce((best, entry) =>
        compareBuildTags(entry.candidate.buildTag, best.candidate.buildTag) > 0 ? entry : best
      );
      stage = stage.filter((entry) => compareBuildTags(entry.candidate.buildTag, highest.candidate.buildTag) === 0);
    } else {
      const current = stage;
      stage = current.filter((entry) => !current.some((rival) => rival !== entry && isStrictSubset(rival.keys, entry.keys)));
    }
  }

  const [winner] = stage;
  if (!winner) {
    throw new Error('Ranking pool unexpectedly empty');
  }
  return winner;
}

function isStrictSubset(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size >= b.size) return false;
  for (const key of a) {
    if (!b.has(key)) return false;
  }
  return true;
}
