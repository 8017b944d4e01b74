export interface ThemeDefinition {
  name: string;
  /** Thematic ETFs whose momentum decides whether the theme is hot. */
  etfs: readonly string[];
  /** Stocks injected into the universe while the theme is hot. */
  tickers: readonly string[];
}

export interface EtfPerformance {
  etf: string;
  price: number;
  change1d: number;
  change1w: number;
  change1m: number;
}

export interface ThemeReport {
  theme: string;
  etfs: EtfPerformance[];
  avgChange1d: number;
  avgChange1w: number;
  avgChange1m: number;
  isHot: boolean;
  tickers: string[];
}
