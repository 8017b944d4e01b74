import { InsufficientHistoryError } from '../common/errors';
import { breakoutSeries, flatSeries } from '../testing/fixtures';
import { MomentumMetrics, TooLateFlag, TrendQuality } from './momentum.types';
import {
  calculateRsi,
  classifyTrendQuality,
  computeMomentumMetrics,
  computeMomentumProfile,
  detectTooLateFlags,
  oneMonthChange,
  percentChange,
  scoreMomentum,
} from './trend-engine';

const neutralMetrics = (overrides: Partial<MomentumMetrics> = {}): MomentumMetrics => ({
  price: 100,
  change1d: 0,
  change5d: 0,
  change1m: 0,
  volumeRatio: 1,
  rsi: 45,
  ma20: 100,
  ma50: 100,
  aboveMa20: false,
  aboveMa50: false,
  pctAboveMa20: 0,
  acceleration: 0,
  relativeStrength: 0,
  volumeDirectionRatio: 1,
  breakout: false,
  consecutiveUpDays: 0,
  ...overrides,
});

describe('trend engine', () => {
  describe('computeMomentumProfile', () => {
    it('returns no profile for 19 samples', () => {
      const result = computeMomentumProfile('ABC', flatSeries(19));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(InsufficientHistoryError);
      expect(result.error.samples).toBe(19);
      expect(result.error.message).toBe('Insufficient data for ABC: 19 samples (need 20+)');
    });

    it('returns a profile for exactly 20 samples', () => {
      const result = computeMomentumProfile('ABC', flatSeries(20));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      // 50 base + 8 for an RSI of 50; nothing else moves
      expect(result.value.score).toBe(58);
      expect(result.value.rsi).toBe(50);
      expect(result.value.tooLateFlags).toEqual([]);
      expect(result.value.trendQuality).toBe('emerging');
    });

    it('scores relative strength against the benchmark', () => {
      const result = computeMomentumProfile('ABC', flatSeries(20), 10);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.relativeStrength).toBe(-10);
      expect(result.value.score).toBe(51);
      expect(result.value.trendQuality).toBe('weak');
    });

    it('scores a high-volume breakout', () => {
      const result = computeMomentumProfile('ABC', breakoutSeries(), 3);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const profile = result.value;
      expect(profile.change1d).toBeCloseTo(10, 6);
      expect(profile.change5d).toBeCloseTo(10, 6);
      expect(profile.change1m).toBeCloseTo(10, 6);
      expect(profile.volumeRatio).toBe(3);
      expect(profile.ma20).toBeCloseTo(100.5, 6);
      expect(profile.acceleration).toBeCloseTo(10, 6);
      expect(profile.breakout).toBe(true);
      expect(profile.consecutiveUpDays).toBe(1);
      expect(profile.rsi).toBe(100);
      expect(profile.tooLateFlags).toEqual(['rsi_overheated']);
      expect(profile.score).toBeCloseTo(92, 6);
      expect(profile.trendQuality).toBe('strong_early');
    });

    it('keeps the score inside 0-100 for extreme series', () => {
      const crash = Array.from({ length: 60 }, (_, i) => ({ close: 200 - i * 3, volume: 1000 + i * 50 }));
      const melt = Array.from({ length: 60 }, (_, i) => ({ close: 20 + i * i, volume: 1000 + i * 200 }));
      const choppy = Array.from({ length: 40 }, (_, i) => ({ close: 100 + (i % 2 === 0 ? 8 : -8), volume: 500 }));

      for (const series of [crash, melt, choppy]) {
        const result = computeMomentumProfile('ABC', series);
        expect(result.ok).toBe(true);
        if (!result.ok) continue;
        expect(result.value.score).toBeGreaterThanOrEqual(0);
        expect(result.value.score).toBeLessThanOrEqual(100);
      }
    });

    it('is deterministic', () => {
      const series = breakoutSeries();
      expect(computeMomentumProfile('ABC', series, 1)).toEqual(computeMomentumProfile('ABC', series, 1));
    });
  });

  describe('computeMomentumMetrics', () => {
    it('falls back to MA20 when fewer than 50 samples exist', () => {
      const metrics = computeMomentumMetrics(breakoutSeries());
      expect(metrics.ma50).toBe(metrics.ma20);
    });

    it('uses a volume-direction ratio of 1 without down days', () => {
      expect(computeMomentumMetrics(breakoutSeries()).volumeDirectionRatio).toBe(1);
    });

    it('compares volume on up and down days', () => {
      const series = [
        ...flatSeries(18),
        { close: 101, volume: 3000 },
        { close: 100, volume: 1000 },
      ];
      expect(computeMomentumMetrics(series).volumeDirectionRatio).toBe(3);
    });
  });

  describe('calculateRsi', () => {
    it('is neutral with fewer than 14 deltas', () => {
      expect(calculateRsi([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14])).toBe(50);
    });

    it('is 100 without losses', () => {
      expect(calculateRsi(Array.from({ length: 15 }, (_, i) => 100 + i))).toBe(100);
    });

    it('averages gains and losses', () => {
      // seven +2 moves, seven -1 moves: RS 2
      const closes = [100];
      for (let i = 0; i < 14; i++) {
        closes.push(closes[i] + (i % 2 === 0 ? 2 : -1));
      }
      expect(calculateRsi(closes)).toBeCloseTo(66.667, 3);
    });
  });

  describe('percentChange and oneMonthChange', () => {
    it('returns 0 for a non-positive base', () => {
      expect(percentChange(0, 10)).toBe(0);
    });

    it('looks back 21 samples', () => {
      const closes = [50, ...Array.from({ length: 21 }, () => 100), 110];
      expect(oneMonthChange(closes)).toBeCloseTo(10, 6);
    });

    it('uses the first sample on shorter series', () => {
      expect(oneMonthChange([80, 90, 100])).toBeCloseTo(25, 6);
    });
  });

  describe('too-late flags', () => {
    it('fires all three and costs 12 points', () => {
      const late = neutralMetrics({ rsi: 85, pctAboveMa20: 15, consecutiveUpDays: 8 });
      const fresh = neutralMetrics({ rsi: 78, pctAboveMa20: 12, consecutiveUpDays: 6 });

      expect(detectTooLateFlags(late)).toEqual(['rsi_overheated', 'extended_above_ma20', 'long_up_streak']);
      expect(detectTooLateFlags(fresh)).toEqual([]);
      expect(scoreMomentum(fresh).score - scoreMomentum(late).score).toBe(12);
      expect(scoreMomentum(late).score).toBe(38);
    });
  });

  describe('scoreMomentum', () => {
    it('clamps at 100', () => {
      const metrics = neutralMetrics({
        change1m: 30,
        acceleration: 5,
        relativeStrength: 12,
        volumeDirectionRatio: 2,
        volumeRatio: 3,
        breakout: true,
        rsi: 55,
        aboveMa20: true,
        aboveMa50: true,
      });
      expect(scoreMomentum(metrics).score).toBe(100);
    });

    it('clamps at 0', () => {
      const metrics = neutralMetrics({
        change1m: -30,
        acceleration: -5,
        relativeStrength: -12,
        volumeDirectionRatio: 0.5,
        rsi: 20,
      });
      // 50 - 20 - 8 - 7 - 7 - 8 = 0
      expect(scoreMomentum(metrics).score).toBe(0);
    });

    it('starts at 50 for neutral readings', () => {
      expect(scoreMomentum(neutralMetrics()).score).toBe(50);
    });

    const terms: Array<[string, Partial<MomentumMetrics>, number]> = [
      ['1-month change of +4%', { change1m: 4 }, 6],
      ['1-month change of -4%', { change1m: -4 }, -6],
      ['acceleration above 3', { acceleration: 3.5 }, 8],
      ['acceleration of exactly 3', { acceleration: 3 }, 5],
      ['acceleration of 2', { acceleration: 2 }, 5],
      ['acceleration of exactly 1', { acceleration: 1 }, 2],
      ['acceleration of 0.5', { acceleration: 0.5 }, 2],
      ['acceleration of -0.5', { acceleration: -0.5 }, -2],
      ['acceleration of -2', { acceleration: -2 }, -5],
      ['relative strength above 8', { relativeStrength: 9 }, 7],
      ['relative strength of 5', { relativeStrength: 5 }, 5],
      ['relative strength of exactly 4', { relativeStrength: 4 }, 3],
      ['relative strength of 2', { relativeStrength: 2 }, 3],
      ['relative strength of exactly 1', { relativeStrength: 1 }, 0],
      ['relative strength of -2', { relativeStrength: -2 }, -3],
      ['relative strength of -5', { relativeStrength: -5 }, -5],
      ['up/down volume of 1.5', { volumeDirectionRatio: 1.5 }, 7],
      ['up/down volume of exactly 1.4', { volumeDirectionRatio: 1.4 }, 4],
      ['up/down volume of 1.2', { volumeDirectionRatio: 1.2 }, 4],
      ['up/down volume of exactly 1.15', { volumeDirectionRatio: 1.15 }, 0],
      ['up/down volume of exactly 0.85', { volumeDirectionRatio: 0.85 }, 0],
      ['up/down volume of 0.8', { volumeDirectionRatio: 0.8 }, -4],
      ['up/down volume of exactly 0.7', { volumeDirectionRatio: 0.7 }, -4],
      ['up/down volume of 0.6', { volumeDirectionRatio: 0.6 }, -7],
      ['volume spike of 2.5x', { volumeRatio: 2.5 }, 5],
      ['volume spike of exactly 2x', { volumeRatio: 2 }, 3],
      ['volume spike of 1.8x', { volumeRatio: 1.8 }, 3],
      ['volume spike of exactly 1.5x', { volumeRatio: 1.5 }, 0],
      ['RSI of exactly 50', { rsi: 50 }, 8],
      ['RSI of 60', { rsi: 60 }, 8],
      ['RSI of exactly 65', { rsi: 65 }, 4],
      ['RSI of 70', { rsi: 70 }, 4],
      ['RSI of exactly 75', { rsi: 75 }, 0],
      ['RSI of exactly 40', { rsi: 40 }, 0],
      ['RSI of 39.9', { rsi: 39.9 }, -4],
      ['RSI of exactly 30', { rsi: 30 }, -4],
      ['RSI of 29', { rsi: 29 }, -8],
      ['a breakout', { breakout: true }, 8],
      ['a close above MA20', { aboveMa20: true }, 3],
      ['a close above MA50', { aboveMa50: true }, 2],
    ];

    it.each(terms)('adds the right points for %s', (_, overrides, delta) => {
      expect(scoreMomentum(neutralMetrics(overrides)).score).toBe(50 + delta);
    });
  });

  describe('breakout', () => {
    it('fires at exactly 99% of the 20-sample high on heavy volume', () => {
      const metrics = computeMomentumMetrics([...flatSeries(24), { close: 99, volume: 3000 }]);
      expect(metrics.breakout).toBe(true);
    });

    it('does not fire just below 99% of the high', () => {
      const metrics = computeMomentumMetrics([...flatSeries(24), { close: 98.9, volume: 3000 }]);
      expect(metrics.breakout).toBe(false);
    });

    it('needs volume above 1.5x the prior average', () => {
      const metrics = computeMomentumMetrics([...flatSeries(24), { close: 110, volume: 1500 }]);
      expect(metrics.volumeRatio).toBe(1.5);
      expect(metrics.breakout).toBe(false);
    });
  });

  describe('classifyTrendQuality', () => {
    const cases: Array<[number, number, number, TooLateFlag[], TrendQuality]> = [
      [80, 1, 1, [], 'strong_early'],
      [80, 1, 1, ['rsi_overheated'], 'strong_early'],
      [80, 0, 1, [], 'confirmed'],
      [80, 0, 1, ['rsi_overheated'], 'emerging'],
      [65, -1, -1, [], 'confirmed'],
      [60, 2, 2, ['long_up_streak'], 'emerging'],
      [50, 0, 0, ['long_up_streak'], 'extended'],
      [30, 0, 0, ['extended_above_ma20'], 'extended'],
      [45, 0, 0, [], 'weak'],
      [39, 0, 0, [], 'bearish'],
    ];

    it.each(cases)('score %d, accel %d, rs %d, flags %j -> %s', (score, acceleration, relativeStrength, flags, expected) => {
      expect(classifyTrendQuality({ score, acceleration, relativeStrength, tooLateFlags: flags })).toBe(expected);
    });
  });
});
