import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { MalformedRecordError } from '../common/errors';
import { compareTickers } from '../common/sort';
import { MomentumProfile } from '../momentum/momentum.types';
import { isTickerSymbol, isValidTicker, normalizeTicker } from '../universe/ticker-filter';
import { CollectedSourceKey, SourceKey, TEXT_EXTRACTED_SOURCE_KEYS } from './source-keys';
import { EtfFlowRecord, SOURCE_RECORD_CLASSES, SourceRecordTypes } from './source-records';
import { HotHolding, SignalMap, SourceSignal } from './source-signal';

export interface NormalizedSource<K extends SourceKey> {
  signals: SignalMap<K>;
  malformed: MalformedRecordError[];
  invalidTickers: string[];
}

const HOLDINGS_PER_ETF = 5;
const FLOW_SHARE = 0.2;

const flattenProblems = (errors: ValidationError[]): string[] =>
  errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...flattenProblems(error.children ?? []),
  ]);

/**
 * Validates a collaborator's raw records and keys them by ticker. Records that
 * fail validation are reported and skipped; when a ticker repeats, the
 * highest score is kept. Only text-extracted sources are checked against the
 * word blacklist; structured feeds report listed symbols such as `ALL`.
 */
export function normalizeRecords<K extends CollectedSourceKey>(
  source: K,
  rawRecords: readonly unknown[],
): NormalizedSource<K> {
  const recordClass = SOURCE_RECORD_CLASSES[source];
  const signals = new Map<string, SourceSignal<SourceRecordTypes[K]>>();
  const malformed: MalformedRecordError[] = [];
  const invalidTickers: string[] = [];
  const acceptsTicker = TEXT_EXTRACTED_SOURCE_KEYS.has(source) ? isValidTicker : isTickerSymbol;

  rawRecords.forEach((raw, index) => {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      malformed.push(new MalformedRecordError(source, index, ['record must be an object']));
      return;
    }

    const record = plainToInstance(recordClass, raw);
    const problems = flattenProblems(validateSync(record));
    if (problems.length > 0) {
      malformed.push(new MalformedRecordError(source, index, problems));
      return;
    }

    const ticker = normalizeTicker(record.ticker);
    if (!acceptsTicker(ticker)) {
      invalidTickers.push(record.ticker);
      return;
    }
    record.ticker = ticker;

    const existing = signals.get(ticker);
    if (existing && existing.score >= record.score) return;

    signals.set(ticker, {
      ticker,
      source,
      score: record.score,
      signals: record.signalTags(),
      summary: record.summary ?? null,
      record,
    });
  });

  return { signals, malformed, invalidTickers };
}

export function momentumSignals(profiles: readonly MomentumProfile[]): SignalMap<'momentum'> {
  return new Map(
    profiles.map((profile): [string, SourceSignal<MomentumProfile>] => [
      profile.ticker,
      {
        ticker: profile.ticker,
        source: 'momentum',
        score: profile.score,
        signals: [profile.trendQuality, ...profile.tooLateFlags],
        summary: null,
        record: profile,
      },
    ]),
  );
}

/**
 * Stocks held by sector ETFs that are seeing inflows. Each inflow ETF lends
 * its first five holdings a fifth of its flow score; the total sits on top of
 * a neutral 50 and is capped at 100.
 */
export function identifyHotHoldings(etfFlows: SignalMap<'etf_flows'> | undefined): Map<string, HotHolding> {
  const hotHoldings = new Map<string, HotHolding>();
  if (!etfFlows) return hotHoldings;

  const inflows: EtfFlowRecord[] = [...etfFlows.values()]
    .map((signal) => signal.record)
    .filter((record) => record.flowSignal === 'inflow')
    .sort((a, b) => b.score - a.score || compareTickers(a.ticker, b.ticker));

  const accumulated = new Map<string, number>();
  for (const etf of inflows) {
    for (const rawHolding of etf.holdings.slice(0, HOLDINGS_PER_ETF)) {
      const ticker = normalizeTicker(rawHolding);
      if (!isTickerSymbol(ticker)) continue;

      const holding: HotHolding = hotHoldings.get(ticker) ?? {
        ticker,
        sectors: [],
        etfExposure: [],
        combinedFlowScore: 0,
      };
      holding.sectors.push(etf.sector);
      holding.etfExposure.push(etf.ticker);
      hotHoldings.set(ticker, holding);
      accumulated.set(ticker, (accumulated.get(ticker) ?? 0) + etf.score * FLOW_SHARE);
    }
  }

  for (const [ticker, holding] of hotHoldings) {
    holding.combinedFlowScore = Math.min(100, 50 + (accumulated.get(ticker) ?? 0));
  }

  return hotHoldings;
}

/** The source's score for a ticker, or the neutral default when it has no opinion. */
export const scoreOrNeutral = (
  signals: ReadonlyMap<string, Pick<SourceSignal, 'score'>> | undefined,
  ticker: string,
  neutralScore: number,
): number => signals?.get(ticker)?.score ?? neutralScore;
