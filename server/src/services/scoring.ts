import { distance } from 'fastest-levenshtein';

/** Similarity of a query to a candidate name, from 0 (unrelated) to 100 (identical). */
export type Scorer = (query: string, candidate: string) => number;

export const SCORER_NAMES = ['token-set', 'levenshtein'] as const;

export type ScorerName = (typeof SCORER_NAMES)[number];

export function processText(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

function tokens(value: string): string[] {
  return value ? value.split(' ') : [];
}

function longestCommonSubsequence(a: string, b: string): number {
  if (!a || !b) return 0;
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i += 1) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j += 1) {
      current[j] = a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Normalized insertion/deletion similarity. A single transposition costs two
 * edits against the combined length, so "athsma" / "asthma" scores 83.33.
 */
export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 0;
  const indel = total - 2 * longestCommonSubsequence(a, b);
  return 100 * (1 - indel / total);
}

export function tokenSortRatio(a: string, b: string): number {
  return ratio(tokens(a).sort().join(' '), tokens(b).sort().join(' '));
}

export function tokenSetRatio(a: string, b: string): number {
  const left = new Set(tokens(a));
  const right = new Set(tokens(b));
  if (!left.size || !right.size) return 0;

  const intersection = [...left].filter((token) => right.has(token)).sort();
  const onlyLeft = [...left].filter((token) => !right.has(token)).sort();
  const onlyRight = [...right].filter((token) => !left.has(token)).sort();

  // one side is a subset of the other
  if (intersection.length && (!onlyLeft.length || !onlyRight.length)) return 100;

  const sect = intersection.join(' ');
  const combinedLeft = [...intersection, ...onlyLeft].join(' ');
  const combinedRight = [...intersection, ...onlyRight].join(' ');

  const scores = [ratio(combinedLeft, combinedRight)];
  if (sect) scores.push(ratio(sect, combinedLeft), ratio(sect, combinedRight));
  return Math.max(...scores);
}

/** Best `ratio` of the shorter string against every same-length window of the longer one. */
export function partialRatio(a: string, b: string): number {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (!shorter) return 0;

  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start += 1) {
    best = Math.max(best, ratio(shorter, longer.slice(start, start + shorter.length)));
    if (best === 100) break;
  }
  return best;
}

// Partial matches only count once one side is clearly longer, and are discounted.
function partialScale(a: string, b: string): number {
  const lengthRatio = Math.max(a.length, b.length) / Math.min(a.length, b.length);
  if (lengthRatio < 1.5) return 0;
  return lengthRatio < 8 ? 0.9 : 0.6;
}

/**
 * Default scorer: the best of plain, token-sorted and token-set ratios over
 * case-folded, punctuation-stripped text, plus a discounted partial ratio when
 * the lengths differ enough. Tolerates reordering, case, small edits and
 * truncation ("Diabet" scores 90 against "Diabetes mellitus"), and scores a
 * name whose tokens are all in the query (or vice versa) as 100.
 */
export const tokenSetScorer: Scorer = (query, candidate) => {
  const a = processText(query);
  const b = processText(candidate);
  if (!a || !b) return 0;
  const scale = partialScale(a, b);
  return Math.max(
    ratio(a, b),
    tokenSortRatio(a, b),
    tokenSetRatio(a, b),
    scale ? partialRatio(a, b) * scale : 0,
  );
};

export const levenshteinScorer: Scorer = (query, candidate) => {
  const a = processText(query);
  const b = processText(candidate);
  if (!a || !b) return 0;
  return 100 * (1 - distance(a, b) / Math.max(a.length, b.length));
};

const scorers: Record<ScorerName, Scorer> = {
  'token-set': tokenSetScorer,
  levenshtein: levenshteinScorer,
};

export function getScorer(name: ScorerName): Scorer {
  return scorers[name];
}
