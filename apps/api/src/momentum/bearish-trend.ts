import { clamp, round } from '../common/math';
import { compareTickers } from '../common/sort';
import { MomentumProfile } from './momentum.types';

export type BearishSignalTag =
  | 'declining'
  | 'overbought'
  | 'extreme_overbought'
  | 'below_ma20'
  | 'below_ma50'
  | 'death_cross_proxy'
  | 'high_vol_decline'
  | 'breakdown';

export interface BearishMomentumSignal {
  ticker: string;
  score: number;
  signals: BearishSignalTag[];
  change1m: number;
  rsi: number;
  summary: string;
}

export const DEFAULT_MIN_BEARISH_SCORE = 10;

/**
 * Reads an already computed momentum profile with the polarity flipped:
 * weakness, overheating and heavy selling all count toward a short thesis.
 * Returns null when the profile scores below `minScore`.
 */
export function extractBearishSignals(
  profile: MomentumProfile,
  minScore = DEFAULT_MIN_BEARISH_SCORE,
): BearishMomentumSignal | null {
  const { change1d, change5d, change1m, rsi, volumeRatio, aboveMa20, aboveMa50 } = profile;
  let score = 0;
  const signals: BearishSignalTag[] = [];

  if (change1m < 0) {
    score += Math.min(Math.abs(change1m) * 1.5, 30);
    signals.push('declining');
  }

  if (rsi > 70) {
    score += Math.min((rsi - 70) * 1.5, 20);
    signals.push('overbought');
  }
  if (rsi > 80) {
    score += 5;
    signals.push('extreme_overbought');
  }

  if (!aboveMa20) {
    score += 10;
    signals.push('below_ma20');
  }
  if (!aboveMa50) {
    score += 10;
    signals.push('below_ma50');
  }
  if (!aboveMa50 && change5d < 0) {
    score += 10;
    signals.push('death_cross_proxy');
  }

  const heavySelling = volumeRatio > 1.5 && change1d < 0;
  if (heavySelling) {
    score += Math.min((volumeRatio - 1) * 5, 15);
    signals.push('high_vol_decline');
  }

  if (!aboveMa20 && !aboveMa50) {
    score += 5;
    signals.push('breakdown');
  }

  score = clamp(score, 0, 100);
  if (score < minScore) return null;

  const summaryParts: string[] = [];
  if (rsi > 70) summaryParts.push(`RSI ${rsi.toFixed(0)}`);
  if (change1m < -5) summaryParts.push(`${change1m.toFixed(1)}% 1M`);
  if (!aboveMa50) summaryParts.push('below MA50');
  if (heavySelling) summaryParts.push(`vol ${volumeRatio.toFixed(1)}x on down day`);

  return {
    ticker: profile.ticker,
    score: round(score, 1),
    signals,
    change1m: round(change1m, 2),
    rsi: round(rsi, 1),
    summary: summaryParts.length > 0 ? summaryParts.join('; ') : 'Mild bearish signals',
  };
}

export function scanBearishMomentum(
  profiles: readonly MomentumProfile[],
  minScore = DEFAULT_MIN_BEARISH_SCORE,
): BearishMomentumSignal[] {
  return profiles
    .map((profile) => extractBearishSignals(profile, minScore))
    .filter((signal): signal is BearishMomentumSignal => signal !== null)
    .sort((a, b) => b.score - a.score || compareTickers(a.ticker, b.ticker));
}
