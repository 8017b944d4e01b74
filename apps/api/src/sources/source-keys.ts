/** Sources whose scores feed the long (combined) ranking, in weight-table order. */
export const LONG_SOURCE_KEYS = [
  'momentum',
  'finviz',
  'reddit',
  'news',
  'google_trends',
  'short_interest',
  'options_activity',
  'perplexity',
  'insider_trading',
  'analyst_ratings',
  'congress_trading',
  'institutional',
] as const;

export type LongSourceKey = (typeof LONG_SOURCE_KEYS)[number];

/** Everything an external collaborator can deliver (momentum is computed in-process). */
export const COLLECTED_SOURCE_KEYS = [
  'finviz',
  'reddit',
  'news',
  'google_trends',
  'short_interest',
  'options_activity',
  'perplexity',
  'insider_trading',
  'analyst_ratings',
  'congress_trading',
  'institutional',
  'etf_flows',
  'fundamentals',
] as const;

export type CollectedSourceKey = (typeof COLLECTED_SOURCE_KEYS)[number];

/** Sources whose tickers were extracted from posts, articles or search terms. */
export const TEXT_EXTRACTED_SOURCE_KEYS: ReadonlySet<CollectedSourceKey> = new Set<CollectedSourceKey>([
  'reddit',
  'news',
  'google_trends',
  'perplexity',
]);

export type SourceKey = LongSourceKey | CollectedSourceKey;

export const SHORT_SOURCE_KEYS = [
  'bearish_momentum',
  'fundamentals',
  'analyst_downgrades',
  'bearish_options',
  'insider_selling',
  'institutional_dist',
  'finviz_bearish',
  'congress_selling',
  'negative_news',
] as const;

export type ShortSourceKey = (typeof SHORT_SOURCE_KEYS)[number];

export type LongWeights = Record<LongSourceKey, number>;
export type ShortWeights = Record<ShortSourceKey, number>;

export const isCollectedSourceKey = (value: string): value is CollectedSourceKey =>
  COLLECTED_SOURCE_KEYS.some((key) => key === value);
