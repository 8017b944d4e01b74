import { CombinedRanking } from './scoring.types';

export type ScoreIndicator = '+++' | '++' | '+' | '-' | '--';

export function formatScoreIndicator(score: number): ScoreIndicator {
  if (score >= 80) return '+++';
  if (score >= 65) return '++';
  if (score >= 50) return '+';
  if (score >= 35) return '-';
  return '--';
}

export const filterByScore = (rankings: readonly CombinedRanking[], minScore = 50): CombinedRanking[] =>
  rankings.filter((ranking) => ranking.combinedScore >= minScore);

/** Keeps tickers corroborated by at least `minSources` sources. */
export const filterBySources = (rankings: readonly CombinedRanking[], minSources = 2): CombinedRanking[] =>
  rankings.filter((ranking) => ranking.sources.length >= minSources);
