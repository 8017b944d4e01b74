import { DEFAULT_SCAN_CONFIG, ScanConfig } from '../config/scan-config';
import { MomentumProfile, PriceSample } from '../momentum/momentum.types';

export const makeProfile = (overrides: Partial<MomentumProfile> = {}): MomentumProfile => ({
  ticker: 'TEST',
  price: 100,
  change1d: 0,
  change5d: 0,
  change1m: 0,
  volumeRatio: 1,
  rsi: 50,
  ma20: 100,
  ma50: 100,
  aboveMa20: true,
  aboveMa50: true,
  pctAboveMa20: 0,
  acceleration: 0,
  relativeStrength: 0,
  volumeDirectionRatio: 1,
  breakout: false,
  consecutiveUpDays: 0,
  score: 50,
  tooLateFlags: [],
  trendQuality: 'weak',
  ...overrides,
});

export const flatSeries = (length: number, close = 100, volume = 1000): PriceSample[] =>
  Array.from({ length }, () => ({ close, volume }));

/** 24 flat days at 100, then a jump to 110 on triple volume. */
export const breakoutSeries = (): PriceSample[] => [...flatSeries(24), { close: 110, volume: 3000 }];

export const testConfig = (overrides: Partial<ScanConfig> = {}): ScanConfig => ({
  ...DEFAULT_SCAN_CONFIG,
  ...overrides,
});
