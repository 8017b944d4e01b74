import { Inject, Injectable, Logger } from '@nestjs/common';
import { SCAN_CONFIG, ScanConfig } from '../config/scan-config';
import { daysBefore, toIsoDate } from '../common/dates';
import { describeError } from '../common/errors';
import { compareTickers } from '../common/sort';
import { MARKET_DATA_PROVIDER, MarketDataProvider, StockBar } from '../data/data.types';
import { MomentumProfile } from './momentum.types';
import { computeMomentumProfile, oneMonthChange } from './trend-engine';

@Injectable()
export class MomentumService {
  private readonly logger = new Logger(MomentumService.name);

  constructor(
    @Inject(MARKET_DATA_PROVIDER)
    private readonly marketData: MarketDataProvider,
    @Inject(SCAN_CONFIG)
    private readonly config: ScanConfig,
  ) {}

  /**
   * Fetches history for the universe in batches and builds one profile per
   * ticker with enough samples. Sorted by score, best first.
   */
  async scan(universe: readonly string[], asOf: Date = new Date()): Promise<MomentumProfile[]> {
    const to = toIsoDate(asOf);
    const from = toIsoDate(daysBefore(asOf, this.config.historyLookbackDays));
    const benchmark = this.config.benchmarkSymbol;
    const batchSize = this.config.marketBatchSize;

    const batches: string[][] = [];
    for (let i = 0; i < universe.length; i += batchSize) {
      batches.push(universe.slice(i, i + batchSize));
    }

    this.logger.log(`Scanning momentum for ${universe.length} tickers in ${batches.length} batch(es)`);

    const profiles: MomentumProfile[] = [];
    let skipped = 0;

    for (const [batchIndex, batch] of batches.entries()) {
      let bars: Map<string, StockBar[]>;
      try {
        bars = await this.marketData.getDailyBarsBatch([...new Set([...batch, benchmark])], from, to);
      } catch (error) {
        this.logger.warn(`Batch ${batchIndex + 1}/${batches.length} failed: ${describeError(error)}`);
        skipped += batch.length;
        continue;
      }

      const benchmarkCloses = (bars.get(benchmark) ?? []).map((bar) => bar.close);
      if (benchmarkCloses.length < 2) {
        this.logger.warn(`No ${benchmark} history in batch ${batchIndex + 1}; relative strength uses 0`);
      }
      const benchmarkChange1m = oneMonthChange(benchmarkCloses);

      for (const ticker of batch) {
        const result = computeMomentumProfile(ticker, bars.get(ticker) ?? [], benchmarkChange1m);
        if (result.ok) {
          profiles.push(result.value);
        } else {
          skipped++;
          this.logger.debug(result.error.message);
        }
      }
    }

    profiles.sort((a, b) => b.score - a.score || compareTickers(a.ticker, b.ticker));
    this.logger.log(`Momentum profiles: ${profiles.length} built, ${skipped} skipped`);
    return profiles;
  }
}
