import { InsufficientHistoryError } from '../common/errors';
import { clamp, mean } from '../common/math';
import { Result, err, ok } from '../common/result';
import {
  MomentumMetrics,
  MomentumProfile,
  PriceSample,
  TooLateFlag,
  TrendQuality,
  TrendQualityInput,
} from './momentum.types';

export const MIN_HISTORY = 20;
export const RSI_PERIOD = 14;
const ONE_MONTH_SAMPLES = 21;
const ACCELERATION_MIN_SAMPLES = 11;
const BREAKOUT_WINDOW = 20;
const TOO_LATE_PENALTY = 4;

export const percentChange = (from: number, to: number): number => (from > 0 ? (to / from - 1) * 100 : 0);

/** Mean of the trailing `period` closes, or of all closes when fewer exist. */
export const simpleMovingAverage = (closes: readonly number[], period: number): number =>
  mean(closes.slice(-period));

/** Return over the last 21 samples, or since the first sample on shorter series. */
export const oneMonthChange = (closes: readonly number[]): number => {
  if (closes.length < 2) return 0;
  const reference = closes[Math.max(0, closes.length - 1 - ONE_MONTH_SAMPLES)];
  return percentChange(reference, closes[closes.length - 1]);
};

/**
 * RSI over the last `period` deltas using plain averages of gains and losses.
 * Neutral (50) when the history is too short or the price never moved.
 */
export function calculateRsi(closes: readonly number[], period: number = RSI_PERIOD): number {
  if (closes.length - 1 < period) return 50;

  let gains = 0;
  let losses = 0;
  for (let i = closes.length - period; i < closes.length; i++) {
    const delta = closes[i] - closes[i - 1];
    if (delta > 0) {
      gains += delta;
    } else {
      losses -= delta;
    }
  }

  if (gains === 0 && losses === 0) return 50;
  if (losses === 0) return 100;

  const rs = gains / period / (losses / period);
  return 100 - 100 / (1 + rs);
}

function volumeDirectionRatio(closes: readonly number[], volumes: readonly number[]): number {
  const upVolumes: number[] = [];
  const downVolumes: number[] = [];

  for (let i = 1; i < closes.length; i++) {
    const delta = closes[i] - closes[i - 1];
    if (delta > 0) upVolumes.push(volumes[i]);
    else if (delta < 0) downVolumes.push(volumes[i]);
  }

  if (upVolumes.length === 0 || downVolumes.length === 0) return 1;
  const downMean = mean(downVolumes);
  return downMean > 0 ? mean(upVolumes) / downMean : 1;
}

function consecutiveUpDays(closes: readonly number[]): number {
  let count = 0;
  for (let i = closes.length - 1; i >= 1 && closes[i] > closes[i - 1]; i--) {
    count++;
  }
  return count;
}

/** Raw technical readings for a series that has already passed the length check. */
export function computeMomentumMetrics(series: readonly PriceSample[], benchmarkChange1m = 0): MomentumMetrics {
  const closes = series.map((sample) => sample.close);
  const volumes = series.map((sample) => sample.volume);
  const n = closes.length;
  const price = closes[n - 1];

  const change1d = n >= 2 ? percentChange(closes[n - 2], price) : 0;
  const change5d = n >= 6 ? percentChange(closes[n - 6], price) : 0;
  const change1m = oneMonthChange(closes);

  const avgPriorVolume = mean(volumes.slice(0, -1));
  const volumeRatio = avgPriorVolume > 0 ? volumes[n - 1] / avgPriorVolume : 1;

  const ma20 = simpleMovingAverage(closes, 20);
  const ma50 = n >= 50 ? simpleMovingAverage(closes, 50) : ma20;

  const acceleration =
    n >= ACCELERATION_MIN_SAMPLES ? change5d - percentChange(closes[n - 11], closes[n - 6]) : 0;

  const trailingHigh = Math.max(...closes.slice(-BREAKOUT_WINDOW));

  return {
    price,
    change1d,
    change5d,
    change1m,
    volumeRatio,
    rsi: calculateRsi(closes),
    ma20,
    ma50,
    aboveMa20: price > ma20,
    aboveMa50: price > ma50,
    pctAboveMa20: ma20 > 0 ? ((price - ma20) / ma20) * 100 : 0,
    acceleration,
    relativeStrength: change1m - benchmarkChange1m,
    volumeDirectionRatio: volumeDirectionRatio(closes, volumes),
    breakout: price >= trailingHigh * 0.99 && volumeRatio > 1.5,
    consecutiveUpDays: consecutiveUpDays(closes),
  };
}

/** Signs that a move has already run too far to chase. */
export function detectTooLateFlags(
  metrics: Pick<MomentumMetrics, 'rsi' | 'pctAboveMa20' | 'consecutiveUpDays'>,
): TooLateFlag[] {
  const flags: TooLateFlag[] = [];
  if (metrics.rsi > 80) flags.push('rsi_overheated');
  if (metrics.pctAboveMa20 > 12) flags.push('extended_above_ma20');
  if (metrics.consecutiveUpDays >= 7) flags.push('long_up_streak');
  return flags;
}

const tieredTerm = (value: number, tiers: ReadonlyArray<readonly [number, number]>): number => {
  for (const [threshold, points] of tiers) {
    if (value > threshold) return points;
  }
  for (const [threshold, points] of tiers) {
    if (value < -threshold) return -points;
  }
  return 0;
};

function rsiTerm(rsi: number): number {
  if (rsi >= 50 && rsi < 65) return 8;
  if (rsi >= 65 && rsi < 75) return 4;
  if (rsi >= 30 && rsi < 40) return -4;
  if (rsi < 30) return -8;
  return 0;
}

function volumeDirectionTerm(ratio: number): number {
  if (ratio > 1.4) return 7;
  if (ratio > 1.15) return 4;
  if (ratio < 0.7) return -7;
  if (ratio < 0.85) return -4;
  return 0;
}

/** Composite 0-100 score. Starts at 50 and adds one term per reading. */
export function scoreMomentum(metrics: MomentumMetrics): { score: number; tooLateFlags: TooLateFlag[] } {
  let score = 50;

  score += clamp(metrics.change1m * 1.5, -20, 20);
  score += tieredTerm(metrics.acceleration, [[3, 8], [1, 5], [0, 2]]);
  score += tieredTerm(metrics.relativeStrength, [[8, 7], [4, 5], [1, 3]]);
  score += volumeDirectionTerm(metrics.volumeDirectionRatio);

  if (metrics.volumeRatio > 2) score += 5;
  else if (metrics.volumeRatio > 1.5) score += 3;

  if (metrics.breakout) score += 8;
  score += rsiTerm(metrics.rsi);
  if (metrics.aboveMa20) score += 3;
  if (metrics.aboveMa50) score += 2;

  const tooLateFlags = detectTooLateFlags(metrics);
  score -= tooLateFlags.length * TOO_LATE_PENALTY;

  return { score: clamp(score, 0, 100), tooLateFlags };
}

/** Priority list: the first rule that matches wins. */
export function classifyTrendQuality(input: TrendQualityInput): TrendQuality {
  const { score, acceleration, relativeStrength, tooLateFlags } = input;

  if (score >= 75 && acceleration > 0 && relativeStrength > 0) return 'strong_early';
  if (score >= 65 && tooLateFlags.length === 0) return 'confirmed';
  if (score >= 55) return 'emerging';
  if (tooLateFlags.length > 0) return 'extended';
  if (score >= 40) return 'weak';
  return 'bearish';
}

export function computeMomentumProfile(
  ticker: string,
  series: readonly PriceSample[],
  benchmarkChange1m = 0,
): Result<MomentumProfile, InsufficientHistoryError> {
  if (series.length < MIN_HISTORY) {
    return err(new InsufficientHistoryError(ticker, series.length, MIN_HISTORY));
  }

  const metrics = computeMomentumMetrics(series, benchmarkChange1m);
  const { score, tooLateFlags } = scoreMomentum(metrics);

  return ok({
    ticker,
    ...metrics,
    score,
    tooLateFlags,
    trendQuality: classifyTrendQuality({
      score,
      acceleration: metrics.acceleration,
      relativeStrength: metrics.relativeStrength,
      tooLateFlags,
    }),
  });
}
