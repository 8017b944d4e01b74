// Instruments scanned on every run for market context. Individual stocks
// come from whatever the discovery sources report.

export const BASELINE_WATCHLIST: readonly string[] = [
  // Broad market
  'SPY', 'QQQ', 'IWM', 'DIA', 'VTI',
  // Sector SPDRs
  'XLK', 'XLF', 'XLE', 'XLV', 'XLY', 'XLP', 'XLI', 'XLB', 'XLRE', 'XLU', 'XLC',
  // Thematic
  'SMH', 'SOXX', 'GLD', 'SLV', 'GDX', 'GDXJ', 'XBI', 'URA', 'XME', 'ARKK', 'KWEB', 'IBB',
  // Bonds, volatility, commodities
  'TLT', 'HYG', 'USO', 'UNG', 'VXX',
  // International
  'EEM', 'FXI', 'EWZ',
];

export const DEFAULT_BENCHMARK = 'SPY';
