import { round } from '../common/math';
import { compareTickers } from '../common/sort';
import { BearishMomentumSignal } from '../momentum/bearish-trend';
import { SHORT_SOURCE_KEYS, ShortSourceKey } from '../sources/source-keys';
import { FinvizRecord } from '../sources/source-records';
import { CollectedSignals } from '../sources/source-signal';
import { ShortCandidate, ShortScoringInput, ShortScoringSettings } from './scoring.types';

const MAX_SUMMARY_LENGTH = 120;
const HIGH_PUT_CALL = 1.5;
const LARGE_INSIDER_SALE = 1_000_000;

interface BearishInput {
  score: number;
  signals: string[];
  summary?: string;
}

type BearishInputs = Record<ShortSourceKey, BearishInput | null>;

const formatDollars = (value: number): string => `$${Math.round(value).toLocaleString('en-US')}`;

/** Top losers and overbought screens, read as bearish. */
export function finvizBearishScore(record: FinvizRecord): BearishInput | null {
  const isLoser = record.signals.includes('top_loser');
  const isOverbought = record.signals.includes('overbought');

  if (isLoser) {
    const score = Math.min(Math.abs(record.change ?? 0) * 5, 80);
    return isOverbought
      ? { score: Math.min(score + 20, 100), signals: ['top_loser', 'overbought'] }
      : { score, signals: ['top_loser'] };
  }
  return isOverbought ? { score: 60, signals: ['overbought'] } : null;
}

function bearishInputs(
  ticker: string,
  bearishMomentum: ReadonlyMap<string, BearishMomentumSignal>,
  signals: CollectedSignals,
): BearishInputs {
  const momentum = bearishMomentum.get(ticker);
  const fundamentals = signals.fundamentals?.get(ticker);
  const analyst = signals.analyst_ratings?.get(ticker)?.record;
  const options = signals.options_activity?.get(ticker)?.record;
  const insider = signals.insider_trading?.get(ticker)?.record;
  const institutional = signals.institutional?.get(ticker)?.record;
  const finviz = signals.finviz?.get(ticker)?.record;
  const congress = signals.congress_trading?.get(ticker)?.record;
  const news = signals.news?.get(ticker)?.record;

  let bearishOptions: BearishInput | null = null;
  if (options?.signal === 'bearish_sweep') {
    bearishOptions = { score: options.score, signals: ['bearish_sweep'] };
  } else if (options && (options.putCallRatio ?? 0) > HIGH_PUT_CALL) {
    bearishOptions = { score: Math.min((options.putCallRatio ?? 0) * 30, 80), signals: ['high_put_call'] };
  }

  let insiderSelling: BearishInput | null = null;
  if (insider && !insider.isBuy) {
    const role = insider.role ?? 'insider';
    insiderSelling = {
      score: insider.transactionValue > LARGE_INSIDER_SALE ? Math.min(insider.score + 15, 100) : insider.score,
      signals: ['insider_selling'],
      summary: insider.transactionValue
        ? `${role} sold ${formatDollars(insider.transactionValue)}`
        : `${role} sold`,
    };
  }

  return {
    bearish_momentum: momentum
      ? { score: momentum.score, signals: [...momentum.signals], summary: momentum.summary }
      : null,
    fundamentals: fundamentals
      ? { score: fundamentals.score, signals: [...fundamentals.signals], summary: fundamentals.summary ?? undefined }
      : null,
    analyst_downgrades:
      analyst && (analyst.action === 'downgrade' || analyst.action === 'pt_lower')
        ? {
            score: analyst.score,
            signals: [`analyst_${analyst.action}`],
            summary: analyst.analystFirm ? `${analyst.action} by ${analyst.analystFirm}` : analyst.action,
          }
        : null,
    bearish_options: bearishOptions,
    insider_selling: insiderSelling,
    institutional_dist:
      institutional?.signal === 'institutional_distribution'
        ? { score: institutional.score, signals: ['institutional_distribution'] }
        : null,
    finviz_bearish: finviz ? finvizBearishScore(finviz) : null,
    congress_selling:
      congress?.signal === 'congress_selling' ? { score: congress.score, signals: ['congress_selling'] } : null,
    negative_news: news?.sentiment === 'negative' ? { score: news.score, signals: ['negative_news'] } : null,
  };
}

function buildSummary(inputs: BearishInputs): string {
  const { bearish_momentum: momentum, fundamentals, analyst_downgrades: analyst, insider_selling: insider } = inputs;
  const parts = [
    momentum?.summary,
    fundamentals?.summary,
    analyst && analyst.score > 0 ? analyst.summary : undefined,
    insider && insider.score > 0 ? insider.summary : undefined,
  ].filter((part): part is string => Boolean(part));

  return parts.join('; ').slice(0, MAX_SUMMARY_LENGTH) || 'Bearish signals detected';
}

/**
 * Scores short candidates from the bearish side of every source. Only tickers
 * with at least one bearish input are considered. Crowded shorts take a fixed
 * squeeze penalty when it is enabled; the flag is set either way.
 */
export function aggregateShortScores(input: ShortScoringInput, settings: ShortScoringSettings): ShortCandidate[] {
  const { signals } = input;
  const { weights, multiSourceBonus, squeezePenalty, squeezePenaltyPoints, squeezeShortFloatThreshold, minScore } =
    settings;

  const bearishMomentum = new Map(input.bearishMomentum.map((signal) => [signal.ticker, signal]));
  const tickers = new Set<string>(bearishMomentum.keys());
  for (const map of [
    signals.fundamentals,
    signals.analyst_ratings,
    signals.options_activity,
    signals.insider_trading,
    signals.institutional,
    signals.finviz,
    signals.congress_trading,
    signals.news,
  ]) {
    for (const ticker of map?.keys() ?? []) {
      tickers.add(ticker);
    }
  }

  const candidates: ShortCandidate[] = [];

  for (const ticker of tickers) {
    const inputs = bearishInputs(ticker, bearishMomentum, signals);
    const present = SHORT_SOURCE_KEYS.flatMap((key) => {
      const value = inputs[key];
      return value ? [{ key, ...value }] : [];
    });
    if (present.length === 0) continue;

    const subScores: Record<ShortSourceKey, number> = {
      bearish_momentum: round(inputs.bearish_momentum?.score ?? 0),
      fundamentals: round(inputs.fundamentals?.score ?? 0),
      analyst_downgrades: round(inputs.analyst_downgrades?.score ?? 0),
      bearish_options: round(inputs.bearish_options?.score ?? 0),
      insider_selling: round(inputs.insider_selling?.score ?? 0),
      institutional_dist: round(inputs.institutional_dist?.score ?? 0),
      finviz_bearish: round(inputs.finviz_bearish?.score ?? 0),
      congress_selling: round(inputs.congress_selling?.score ?? 0),
      negative_news: round(inputs.negative_news?.score ?? 0),
    };

    let score = 0;
    for (const { key, score: subScore } of present) {
      score += subScore * (weights[key] ?? 0);
    }
    const activeSources = present.filter((value) => value.score > 0).length;
    if (activeSources > 1) {
      score += (activeSources - 1) * multiSourceBonus;
    }

    const shortFloat = signals.short_interest?.get(ticker)?.record.shortFloat ?? null;
    const squeezeWarning = shortFloat !== null && shortFloat > squeezeShortFloatThreshold;
    if (squeezeWarning && squeezePenalty) {
      score -= squeezePenaltyPoints;
    }

    const shortScore = Math.max(0, round(score));
    if (shortScore < minScore) continue;

    candidates.push({
      ticker,
      shortScore,
      bearishSignals: [...new Set(present.flatMap((value) => value.signals))],
      summary: buildSummary(inputs),
      squeezeWarning,
      shortFloat,
      subScores,
    });
  }

  return candidates.sort((a, b) => b.shortScore - a.shortScore || compareTickers(a.ticker, b.ticker));
}
