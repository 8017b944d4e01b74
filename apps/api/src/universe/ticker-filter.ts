import blacklist from './ticker-blacklist.json';

// Words that collaborators scraping free text tend to report as tickers.
const TICKER_BLACKLIST: ReadonlySet<string> = new Set(blacklist);

const TICKER_PATTERN = /^[A-Z]{1,5}$/;

/** Upper-cases and strips a leading `$`, e.g. `$nvda` -> `NVDA`. */
export const normalizeTicker = (raw: string): string => raw.trim().replace(/^\$/, '').toUpperCase();

/** Shape only: one to five upper-case letters. */
export const isTickerSymbol = (candidate: string): boolean => TICKER_PATTERN.test(candidate);

/** For tickers pulled out of free text, where common words look like symbols. */
export function isValidTicker(candidate: string): boolean {
  return isTickerSymbol(candidate) && !TICKER_BLACKLIST.has(candidate);
}
