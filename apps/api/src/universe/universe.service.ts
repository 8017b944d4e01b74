import { Inject, Injectable, Logger } from '@nestjs/common';
import { SCAN_CONFIG, ScanConfig } from '../config/scan-config';
import { compareTickers } from '../common/sort';
import { isTickerSymbol, normalizeTicker } from './ticker-filter';

export interface UniverseInput {
  discovered: Iterable<string>;
  themeTickers?: Iterable<string>;
}

@Injectable()
export class UniverseService {
  private readonly logger = new Logger(UniverseService.name);

  constructor(@Inject(SCAN_CONFIG) private readonly config: ScanConfig) {}

  /**
   * Baseline watchlist plus every well-formed discovered or theme ticker, sorted.
   * Discovered tickers were already screened by their source's normalizer.
   */
  build({ discovered, themeTickers = [] }: UniverseInput): string[] {
    const universe = new Set(this.config.baselineWatchlist);
    let rejected = 0;

    for (const raw of [...discovered, ...themeTickers]) {
      const ticker = normalizeTicker(raw);
      if (isTickerSymbol(ticker)) {
        universe.add(ticker);
      } else {
        rejected++;
      }
    }

    if (rejected > 0) {
      this.logger.debug(`Dropped ${rejected} invalid ticker candidates`);
    }

    const tickers = [...universe].sort(compareTickers);
    this.logger.log(
      `Universe: ${tickers.length} tickers (${this.config.baselineWatchlist.length} baseline)`,
    );
    return tickers;
  }
}
