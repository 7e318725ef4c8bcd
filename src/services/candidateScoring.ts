import type { ScoringPolicy, TrackCandidate } from '../types/music';
import { titleSimilarity } from '../utils/text';
import { qualityRank } from '../utils/tracks';

export const DEFAULT_SCORING: ScoringPolicy = { titleMatchStep: 0.1 };

export interface CandidateScore {
  titleBucket: number;
  qualityRank: number;
  // Infinity when unknown
  duration: number;
  index: number;
}

export function scoreCandidate(
  query: string,
  candidate: TrackCandidate,
  index: number,
  policy: ScoringPolicy = DEFAULT_SCORING
): CandidateScore {
  const similarity = titleSimilarity(query, candidate.title);
  const step = policy.titleMatchStep > 0 ? policy.titleMatchStep : DEFAULT_SCORING.titleMatchStep;
  return {
    // Epsilon keeps exact multiples of the step (0.3 / 0.1) in their own bucket
    titleBucket: Math.floor(similarity / step + 1e-9),
    qualityRank: qualityRank(candidate.quality),
    duration: candidate.durationSeconds > 0 ? candidate.durationSeconds : Number.POSITIVE_INFINITY,
    index,
  };
}

/** Negative when `a` ranks before `b`. */
export function compareScores(a: CandidateScore, b: CandidateScore): number {
  if (a.titleBucket !== b.titleBucket) return b.titleBucket - a.titleBucket;
  if (a.qualityRank !== b.qualityRank) return b.qualityRank - a.qualityRank;
  if (a.duration !== b.duration) return a.duration < b.duration ? -1 : 1;
  return a.index - b.index;
}

/**
 * Orders one provider's candidates best first: closer title (bucketed by the
 * policy step), then higher quality, then shorter known duration, then the
 * provider's own order.
 */
export function rankCandidates(
  query: string,
  candidates: readonly TrackCandidate[],
  policy: ScoringPolicy = DEFAULT_SCORING
): TrackCandidate[] {
  return candidates
    .map((candidate, index) => ({ candidate, score: scoreCandidate(query, candidate, index, policy) }))
    .sort((a, b) => compareScores(a.score, b.score))
    .map((entry) => entry.candidate);
}

export function selectBest(
  query: string,
  candidates: readonly TrackCandidate[],
  policy: ScoringPolicy = DEFAULT_SCORING
): TrackCandidate | null {
  return rankCandidates(query, candidates, policy)[0] ?? null;
}
