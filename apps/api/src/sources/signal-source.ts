import { CollectedSourceKey } from './source-keys';

/**
 * Discovery sources run first and report whatever they find; enrichment
 * sources run once the universe is known and are asked about it.
 */
export type SourcePhase = 'discovery' | 'enrichment';

export interface SourceContext {
  universe: readonly string[];
  asOf: Date;
}

/**
 * An external data producer. Returns raw records; shape checks happen in the
 * normalizer. Throwing is fine: the collector turns it into "no data". The
 * signal is aborted when the collector stops waiting, and in-flight work
 * should stop with it.
 */
export interface SignalSource {
  readonly key: CollectedSourceKey;
  readonly phase: SourcePhase;
  fetch(context: SourceContext, signal: AbortSignal): Promise<unknown[]>;
}

export const SIGNAL_SOURCES = Symbol('SIGNAL_SOURCES');

export const DEFAULT_SOURCE_PHASES: Record<CollectedSourceKey, SourcePhase> = {
  finviz: 'discovery',
  reddit: 'discovery',
  news: 'discovery',
  google_trends: 'discovery',
  perplexity: 'discovery',
  insider_trading: 'discovery',
  analyst_ratings: 'discovery',
  congress_trading: 'discovery',
  institutional: 'discovery',
  etf_flows: 'discovery',
  short_interest: 'enrichment',
  options_activity: 'enrichment',
  fundamentals: 'enrichment',
};
