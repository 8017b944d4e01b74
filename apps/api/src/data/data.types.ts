export interface StockBar {
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  timestamp: Date;
}

export const MARKET_DATA_PROVIDER = Symbol('MARKET_DATA_PROVIDER');

/**
 * Daily history for many symbols at once. Symbols with no data map to an
 * empty array rather than being left out.
 */
export interface MarketDataProvider {
  getDailyBarsBatch(symbols: readonly string[], from: string, to: string): Promise<Map<string, StockBar[]>>;
}
