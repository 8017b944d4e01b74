import { CollectedSourceKey, LongSourceKey, SourceKey } from './source-keys';
import { SourceRecordTypes } from './source-records';

/** One source's opinion of one ticker. */
export interface SourceSignal<R = unknown> {
  ticker: string;
  source: SourceKey;
  score: number; // 0-100
  signals: string[];
  summary: string | null;
  record: R;
}

/** A ticker missing from the map means "no opinion", not zero. */
export type SignalMap<K extends SourceKey> = ReadonlyMap<string, SourceSignal<SourceRecordTypes[K]>>;

/** Generic over its keys so a single entry can be written through a key of type `K`. */
export type CollectedSignals<K extends CollectedSourceKey = CollectedSourceKey> = { [P in K]?: SignalMap<P> };

export type LongSignals = { [K in LongSourceKey]?: SignalMap<K> };

export type SignalSnapshot = { [K in SourceKey]?: SignalMap<K> };

/** A ticker lifted by inflows into one or more sector ETFs that hold it. */
export interface HotHolding {
  ticker: string;
  sectors: string[];
  etfExposure: string[];
  combinedFlowScore: number;
}
