/** One daily observation. `StockBar` satisfies this shape. */
export interface PriceSample {
  close: number;
  volume: number;
}

export type TooLateFlag = 'rsi_overheated' | 'extended_above_ma20' | 'long_up_streak';

export type TrendQuality = 'strong_early' | 'confirmed' | 'emerging' | 'extended' | 'weak' | 'bearish';

export interface MomentumMetrics {
  price: number;
  change1d: number;
  change5d: number;
  change1m: number;
  volumeRatio: number; // latest volume / mean of all prior volumes
  rsi: number;
  ma20: number;
  ma50: number;
  aboveMa20: boolean;
  aboveMa50: boolean;
  pctAboveMa20: number;
  acceleration: number; // latest 5d return minus the 5d return before it
  relativeStrength: number; // change1m minus benchmark change1m
  volumeDirectionRatio: number; // mean up-day volume / mean down-day volume
  breakout: boolean;
  consecutiveUpDays: number;
}

export interface MomentumProfile extends MomentumMetrics {
  ticker: string;
  score: number;
  tooLateFlags: TooLateFlag[];
  trendQuality: TrendQuality;
}

export interface TrendQualityInput {
  score: number;
  acceleration: number;
  relativeStrength: number;
  tooLateFlags: readonly TooLateFlag[];
}
