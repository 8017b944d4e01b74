import { mean, round } from '../common/math';
import { StockBar } from '../data/data.types';
import { percentChange } from '../momentum/trend-engine';
import { EtfPerformance, ThemeDefinition, ThemeReport } from './themes.types';

const HOT_MONTHLY_CHANGE = 5;
const HOT_WEEKLY_CHANGE = 2;
const WEEK_SAMPLES = 6;

/**
 * Returns over the fetched window: 1-day against the previous close, 1-week
 * against the sixth-from-last close (0 when shorter), 1-month against the
 * first close in the window.
 */
export function measureEtf(etf: string, bars: readonly StockBar[]): EtfPerformance | null {
  const closes = bars.map((bar) => bar.close);
  if (closes.length < 2) return null;

  const last = closes[closes.length - 1];
  return {
    etf,
    price: round(last, 2),
    change1d: round(percentChange(closes[closes.length - 2], last), 2),
    change1w: closes.length >= WEEK_SAMPLES ? round(percentChange(closes[closes.length - WEEK_SAMPLES], last), 2) : 0,
    change1m: round(percentChange(closes[0], last), 2),
  };
}

/** A theme is hot when any of its ETFs is up more than 5% on the month or 2% on the week. */
export function scoreTheme(
  definition: ThemeDefinition,
  bars: ReadonlyMap<string, readonly StockBar[]>,
): ThemeReport {
  const etfs = definition.etfs.flatMap((etf) => {
    const performance = measureEtf(etf, bars.get(etf) ?? []);
    return performance ? [performance] : [];
  });

  return {
    theme: definition.name,
    etfs,
    avgChange1d: round(mean(etfs.map((etf) => etf.change1d)), 2),
    avgChange1w: round(mean(etfs.map((etf) => etf.change1w)), 2),
    avgChange1m: round(mean(etfs.map((etf) => etf.change1m)), 2),
    isHot: etfs.some((etf) => etf.change1m > HOT_MONTHLY_CHANGE || etf.change1w > HOT_WEEKLY_CHANGE),
    tickers: [...definition.tickers],
  };
}

/** Every ticker of every hot theme, once each. */
export const hotThemeTickers = (reports: readonly ThemeReport[]): string[] => [
  ...new Set(reports.filter((report) => report.isHot).flatMap((report) => report.tickers)),
];
