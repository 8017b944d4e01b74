import { Inject, Injectable, Logger } from '@nestjs/common';
import { SCAN_CONFIG, ScanConfig } from '../config/scan-config';
import { daysBefore, toIsoDate } from '../common/dates';
import { describeError } from '../common/errors';
import { MARKET_DATA_PROVIDER, MarketDataProvider, StockBar } from '../data/data.types';
import { scoreTheme } from './theme-scanner';
import { ThemeReport } from './themes.types';

@Injectable()
export class ThemesService {
  private readonly logger = new Logger(ThemesService.name);

  constructor(
    @Inject(MARKET_DATA_PROVIDER)
    private readonly marketData: MarketDataProvider,
    @Inject(SCAN_CONFIG)
    private readonly config: ScanConfig,
  ) {}

  /**
   * Scores every configured theme from its ETFs' recent history, strongest
   * month first. A failed fetch yields no themes rather than failing the scan.
   */
  async discover(asOf: Date = new Date()): Promise<ThemeReport[]> {
    const definitions = this.config.themeDefinitions;
    const etfs = [...new Set(definitions.flatMap((definition) => definition.etfs))];
    if (etfs.length === 0) return [];

    this.logger.log(`Scanning ${etfs.length} thematic ETFs across ${definitions.length} themes`);

    let bars: Map<string, StockBar[]>;
    try {
      bars = await this.marketData.getDailyBarsBatch(
        etfs,
        toIsoDate(daysBefore(asOf, this.config.themeLookbackDays)),
        toIsoDate(asOf),
      );
    } catch (error) {
      this.logger.warn(`Theme scan failed: ${describeError(error)}`);
      return [];
    }

    const reports = definitions
      .map((definition) => scoreTheme(definition, bars))
      .sort((a, b) => b.avgChange1m - a.avgChange1m || a.theme.localeCompare(b.theme));

    const hot = reports.filter((report) => report.isHot);
    this.logger.log(
      `Theme scan complete: ${hot.length}/${reports.length} themes are hot` +
        (hot.length > 0 ? ` (${hot.map((report) => report.theme).join(', ')})` : ''),
    );
    return reports;
  }
}
