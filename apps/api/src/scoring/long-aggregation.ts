import { round } from '../common/math';
import { compareTickers } from '../common/sort';
import { LONG_SOURCE_KEYS, LongSourceKey, SourceKey } from '../sources/source-keys';
import { SourceRecordTypes } from '../sources/source-records';
import { scoreOrNeutral } from '../sources/source-normalizer';
import { HotHolding, LongSignals, SourceSignal } from '../sources/source-signal';
import {
  CombinedRanking,
  LongRawRecords,
  LongScoringInput,
  LongScoringSettings,
  LongSourceScores,
} from './scoring.types';

const pickSignal = <K extends LongSourceKey>(
  signals: LongSignals,
  key: K,
  ticker: string,
): SourceSignal<SourceRecordTypes[K]> | undefined => signals[key]?.get(ticker);

const copyRecord = <K extends LongSourceKey>(
  raw: LongRawRecords,
  signals: LongSignals,
  key: K,
  ticker: string,
): void => {
  const signal = pickSignal(signals, key, ticker);
  if (signal) {
    raw[key] = signal.record;
  }
};

const formatDollars = (value: number): string => `$${Math.round(value).toLocaleString('en-US')}`;

function buildSummary(raw: LongRawRecords, hotHolding: HotHolding | null, inHotTheme: boolean): string {
  const parts: string[] = [];
  const {
    momentum,
    finviz,
    reddit,
    news,
    google_trends: trends,
    short_interest: shortInterest,
    options_activity: options,
    perplexity,
    insider_trading: insider,
    analyst_ratings: analyst,
    congress_trading: congress,
    institutional,
  } = raw;

  if (momentum && momentum.change1m > 5) parts.push(`+${momentum.change1m.toFixed(0)}% month`);
  if (finviz && finviz.signals.length > 0) parts.push(`finviz: ${finviz.signals.slice(0, 2).join(', ')}`);
  if (reddit && reddit.mentions > 10) parts.push(`${reddit.mentions} Reddit mentions`);
  if (news && news.articleCount > 2) parts.push(`${news.articleCount} news articles`);
  if (trends?.isBreakout) {
    parts.push('Google breakout');
  } else if (trends && trends.trendValue > 50) {
    parts.push(`trending (${trends.trendValue})`);
  }
  if (shortInterest?.squeezeRisk === 'high') {
    parts.push(`squeeze risk (${(shortInterest.shortFloat ?? 0).toFixed(0)}% short)`);
  }
  if (options && (options.signal === 'bullish_sweep' || options.signal === 'bearish_sweep')) {
    parts.push(`options: ${options.signal}`);
  }
  if (perplexity?.hasCatalyst) parts.push('AI catalyst');
  if (insider && insider.isBuy && insider.transactionValue > 100_000) {
    parts.push(`insider buy ${formatDollars(insider.transactionValue)}`);
  }
  if (analyst?.action === 'upgrade') parts.push('analyst upgrade');
  if (congress?.signal === 'congress_buying') parts.push(`congress buying (${congress.politicianCount} members)`);
  if (institutional?.signal === 'institutional_accumulation') parts.push('institutional accumulation');
  if (hotHolding && hotHolding.sectors.length > 0) parts.push(`ETF inflows: ${hotHolding.sectors[0]}`);
  if (inHotTheme) parts.push('hot theme');

  return parts.length > 0 ? parts.join('; ') : 'Low activity';
}

/**
 * Merges every long source into one ranking. A source with no opinion on a
 * ticker scores it at the neutral default; only tickers some source reported
 * are ranked. Bonuses are added on top of the weighted sum and the result is
 * deliberately left unclamped.
 */
export function aggregateLongScores(input: LongScoringInput, settings: LongScoringSettings): CombinedRanking[] {
  const { signals, hotHoldings = new Map<string, HotHolding>(), themeTickers = new Set<string>() } = input;
  const { weights, neutralScore, themeBonus, multiSourceBonus, sectorFlowMultiplier } = settings;

  const tickers = new Set<string>();
  for (const key of LONG_SOURCE_KEYS) {
    for (const ticker of signals[key]?.keys() ?? []) {
      tickers.add(ticker);
    }
  }

  const rankings: CombinedRanking[] = [];

  for (const ticker of tickers) {
    const sourceScores: LongSourceScores = {};
    const sources: SourceKey[] = [];
    const raw: LongRawRecords = {};
    let combined = 0;

    for (const key of LONG_SOURCE_KEYS) {
      const score = scoreOrNeutral(signals[key], ticker, neutralScore);
      sourceScores[key] = round(score);
      combined += score * (weights[key] ?? 0);
      if (signals[key]?.has(ticker)) {
        sources.push(key);
        copyRecord(raw, signals, key, ticker);
      }
    }

    const hotHolding = hotHoldings.get(ticker) ?? null;
    if (hotHolding) {
      combined += hotHolding.combinedFlowScore * sectorFlowMultiplier;
      sources.push('etf_flows');
    }

    const inHotTheme = themeTickers.has(ticker);
    if (inHotTheme) {
      combined += themeBonus;
    }

    if (sources.length > 1) {
      combined += (sources.length - 1) * multiSourceBonus;
    }

    rankings.push({
      ticker,
      combinedScore: round(combined),
      sourceScores,
      sources,
      inHotTheme,
      trendQuality: raw.momentum?.trendQuality ?? null,
      hotHolding,
      summary: buildSummary(raw, hotHolding, inHotTheme),
      raw,
    });
  }

  return rankings.sort((a, b) => b.combinedScore - a.combinedScore || compareTickers(a.ticker, b.ticker));
}
