import { diseaseNameSchema, type CodeEntry, type DiseaseCatalog, type DiseaseName } from './catalog';
import { fail, InvalidQueryError, ok, type Result } from './errors';
import { tokenSetScorer, type Scorer } from './scoring';

export const DEFAULT_THRESHOLD = 70;

export type MatchResult =
  | { kind: 'exact'; name: DiseaseName; entry: CodeEntry }
  | { kind: 'fuzzy'; name: DiseaseName; entry: CodeEntry; score: number }
  | { kind: 'not-found' };

export type ResolverOptions = {
  scorer?: Scorer;
  threshold?: number;
};

type Candidate = { name: DiseaseName; score: number };

function isValidThreshold(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 100;
}

/**
 * Highest score wins; equal scores go to the lexicographically smaller name so
 * the outcome does not depend on catalog insertion order.
 */
export function pickBest(candidates: Candidate[]): Candidate | undefined {
  let best: Candidate | undefined;
  for (const candidate of candidates) {
    if (!best || candidate.score > best.score || (candidate.score === best.score && candidate.name < best.name)) {
      best = candidate;
    }
  }
  return best;
}

export class Resolver {
  private readonly scorer: Scorer;
  private readonly threshold: number;

  constructor(private readonly catalog: DiseaseCatalog, options: ResolverOptions = {}) {
    this.scorer = options.scorer ?? tokenSetScorer;
    this.threshold = options.threshold ?? DEFAULT_THRESHOLD;
    if (!isValidThreshold(this.threshold)) {
      throw new RangeError(`threshold must be between 0 and 100, got ${this.threshold}`);
    }
  }

  resolve(query: string, threshold: number = this.threshold): Result<MatchResult, InvalidQueryError> {
    const parsed = diseaseNameSchema.safeParse(query);
    if (!parsed.success) return fail(new InvalidQueryError());
    if (!isValidThreshold(threshold)) {
      return fail(new InvalidQueryError(`threshold must be between 0 and 100, got ${threshold}`));
    }
    const name = parsed.data;

    const exact = this.catalog.get(name);
    if (exact) return ok<MatchResult>({ kind: 'exact', name, entry: exact });

    const best = pickBest(
      this.catalog.names().map((candidate) => ({ name: candidate, score: this.scorer(name, candidate) })),
    );
    if (!best || best.score <= threshold) return ok<MatchResult>({ kind: 'not-found' });

    const entry = this.catalog.get(best.name);
    if (!entry) return ok<MatchResult>({ kind: 'not-found' });
    return ok<MatchResult>({ kind: 'fuzzy', name: best.name, entry, score: best.score });
  }
}
