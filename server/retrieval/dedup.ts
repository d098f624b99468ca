import type { CandidateSource, SourceCandidate } from '../../shared/types';

export interface SourceCollector {
  /** Returns false when the url was already seen during this run. */
  add: (candidate: SourceCandidate, score: number) => boolean;
  size: () => number;
  ranked: (limit: number) => CandidateSource[];
}

/** Scheme and host are case-insensitive; path and query are not. */
const urlKey = (url: string): string => {
  const trimmed = url.trim();
  try {
    return new URL(trimmed).href;
  } catch {
    return trimmed;
  }
};

/** Highest score first; ties keep first-seen order. */
export const rankSources = (sources: readonly CandidateSource[], limit: number): CandidateSource[] =>
  [...sources].sort((a, b) => b.score - a.score || a.order - b.order).slice(0, Math.max(0, limit));

export const createSourceCollector = (): SourceCollector => {
  const byUrl = new Map<string, CandidateSource>();

  return {
    add: (candidate, score) => {
      const key = urlKey(candidate.url);
      if (byUrl.has(key)) {
        return false;
      }
      byUrl.set(key, { url: candidate.url, title: candidate.title, score, order: byUrl.size });
      return true;
    },
    size: () => byUrl.size,
    ranked: (limit) => rankSources(Array.from(byUrl.values()), limit),
  };
};
