import { ConfigService } from '@nestjs/config';
import { LongWeights, ShortWeights } from '../sources/source-keys';
import themeDefinitions from '../themes/theme-definitions.json';
import { ThemeDefinition } from '../themes/themes.types';
import { BASELINE_WATCHLIST, DEFAULT_BENCHMARK } from './watchlist-data';

export const SCAN_CONFIG = Symbol('SCAN_CONFIG');

export interface ScanConfig {
  readonly neutralScore: number;
  readonly longWeights: Readonly<LongWeights>;
  readonly shortWeights: Readonly<ShortWeights>;
  readonly themeBonus: number;
  readonly multiSourceBonus: number;
  readonly sectorFlowMultiplier: number;
  readonly multiSourceShortBonus: number;
  readonly squeezePenalty: boolean;
  readonly squeezePenaltyPoints: number;
  readonly squeezeShortFloatThreshold: number;
  readonly minShortScore: number;
  readonly minBearishMomentumScore: number;
  readonly benchmarkSymbol: string;
  readonly baselineWatchlist: readonly string[];
  readonly historyLookbackDays: number;
  readonly themeDiscovery: boolean;
  readonly themeDefinitions: readonly ThemeDefinition[];
  readonly themeLookbackDays: number;
  readonly marketBatchSize: number;
  readonly marketConcurrency: number;
  readonly sourceConcurrency: number;
  readonly sourceTimeoutMs: number;
  readonly httpTimeoutMs: number;
  readonly snapshotDir: string;
}

// Sums to 1.00
export const DEFAULT_LONG_WEIGHTS: LongWeights = {
  momentum: 0.2,
  finviz: 0.12,
  reddit: 0.1,
  news: 0.1,
  google_trends: 0.06,
  short_interest: 0.06,
  options_activity: 0.08,
  perplexity: 0.06,
  insider_trading: 0.05,
  analyst_ratings: 0.06,
  congress_trading: 0.05,
  institutional: 0.06,
};

// Sums to 1.00
export const DEFAULT_SHORT_WEIGHTS: ShortWeights = {
  bearish_momentum: 0.25,
  fundamentals: 0.15,
  analyst_downgrades: 0.12,
  bearish_options: 0.12,
  insider_selling: 0.1,
  institutional_dist: 0.08,
  finviz_bearish: 0.08,
  congress_selling: 0.05,
  negative_news: 0.05,
};

export const DEFAULT_SCAN_CONFIG: ScanConfig = {
  neutralScore: 50,
  longWeights: DEFAULT_LONG_WEIGHTS,
  shortWeights: DEFAULT_SHORT_WEIGHTS,
  themeBonus: 5,
  multiSourceBonus: 3,
  sectorFlowMultiplier: 0.05,
  multiSourceShortBonus: 4,
  squeezePenalty: true,
  squeezePenaltyPoints: 15,
  squeezeShortFloatThreshold: 20,
  minShortScore: 40,
  minBearishMomentumScore: 10,
  benchmarkSymbol: DEFAULT_BENCHMARK,
  baselineWatchlist: BASELINE_WATCHLIST,
  historyLookbackDays: 90,
  themeDiscovery: true,
  themeDefinitions,
  themeLookbackDays: 35,
  marketBatchSize: 200,
  marketConcurrency: 5,
  sourceConcurrency: 4,
  sourceTimeoutMs: 30_000,
  httpTimeoutMs: 15_000,
  snapshotDir: './data/latest',
};

const TRUE_VALUES: ReadonlySet<string> = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES: ReadonlySet<string> = new Set(['false', '0', 'no', 'off']);

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};

/** Builds the immutable configuration every phase receives. */
export function loadScanConfig(
  configService: ConfigService,
  overrides: Partial<ScanConfig> = {},
): ScanConfig {
  const readNumber = (key: string, fallback: number): number => {
    const raw = configService.get<string>(key);
    if (raw === undefined || raw === '') return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
  };

  const readBoolean = (key: string, fallback: boolean): boolean => {
    const raw = configService.get<string>(key)?.trim().toLowerCase();
    if (raw === undefined) return fallback;
    if (TRUE_VALUES.has(raw)) return true;
    if (FALSE_VALUES.has(raw)) return false;
    return fallback;
  };

  const defaults = DEFAULT_SCAN_CONFIG;

  return deepFreeze({
    ...defaults,
    longWeights: { ...defaults.longWeights },
    shortWeights: { ...defaults.shortWeights },
    baselineWatchlist: [...defaults.baselineWatchlist],
    themeDefinitions: defaults.themeDefinitions.map((definition) => ({
      ...definition,
      etfs: [...definition.etfs],
      tickers: [...definition.tickers],
    })),
    themeDiscovery: readBoolean('SCAN_THEME_DISCOVERY', defaults.themeDiscovery),
    squeezePenalty: readBoolean('SCAN_SQUEEZE_PENALTY', defaults.squeezePenalty),
    minShortScore: readNumber('SCAN_MIN_SHORT_SCORE', defaults.minShortScore),
    benchmarkSymbol: configService.get<string>('SCAN_BENCHMARK', defaults.benchmarkSymbol).toUpperCase(),
    marketBatchSize: Math.max(1, readNumber('SCAN_MARKET_BATCH_SIZE', defaults.marketBatchSize)),
    marketConcurrency: Math.max(1, readNumber('SCAN_MARKET_CONCURRENCY', defaults.marketConcurrency)),
    sourceConcurrency: Math.max(1, readNumber('SCAN_SOURCE_CONCURRENCY', defaults.sourceConcurrency)),
    sourceTimeoutMs: Math.max(1, readNumber('SCAN_SOURCE_TIMEOUT_MS', defaults.sourceTimeoutMs)),
    snapshotDir: configService.get<string>('SIGNAL_SNAPSHOT_DIR', defaults.snapshotDir),
    ...overrides,
  });
}
