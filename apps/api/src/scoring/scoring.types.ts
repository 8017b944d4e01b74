import { BearishMomentumSignal } from '../momentum/bearish-trend';
import { TrendQuality } from '../momentum/momentum.types';
import { LongSourceKey, LongWeights, ShortSourceKey, ShortWeights, SourceKey } from '../sources/source-keys';
import { SourceRecordTypes } from '../sources/source-records';
import { CollectedSignals, HotHolding, LongSignals } from '../sources/source-signal';

export type LongSourceScores = Partial<Record<LongSourceKey, number>>;

export type LongRawRecords = { [K in LongSourceKey]?: SourceRecordTypes[K] };

export interface CombinedRanking {
  ticker: string;
  combinedScore: number; // not clamped: bonuses can push it past 100
  sourceScores: LongSourceScores;
  sources: SourceKey[];
  inHotTheme: boolean;
  trendQuality: TrendQuality | null;
  hotHolding: HotHolding | null;
  summary: string;
  raw: LongRawRecords;
}

export interface LongScoringInput {
  signals: LongSignals;
  hotHoldings?: ReadonlyMap<string, HotHolding>;
  themeTickers?: ReadonlySet<string>;
}

export interface LongScoringSettings {
  weights: Partial<LongWeights>;
  neutralScore: number;
  themeBonus: number;
  multiSourceBonus: number;
  sectorFlowMultiplier: number;
}

export interface ShortCandidate {
  ticker: string;
  shortScore: number;
  bearishSignals: string[]; // de-duplicated, first-seen order
  summary: string;
  squeezeWarning: boolean;
  shortFloat: number | null;
  subScores: Record<ShortSourceKey, number>;
}

export interface ShortScoringInput {
  bearishMomentum: readonly BearishMomentumSignal[];
  signals: CollectedSignals;
}

export interface ShortScoringSettings {
  weights: Partial<ShortWeights>;
  multiSourceBonus: number;
  squeezePenalty: boolean;
  squeezePenaltyPoints: number;
  squeezeShortFloatThreshold: number;
  minScore: number;
}
