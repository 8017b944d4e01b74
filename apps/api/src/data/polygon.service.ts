import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SCAN_CONFIG, ScanConfig } from '../config/scan-config';
import { describeError } from '../common/errors';
import { MarketDataProvider, StockBar } from './data.types';

interface PolygonAggregate {
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
  t: number;
}

interface PolygonAggregatesResponse {
  status?: string;
  results?: PolygonAggregate[];
}

const isAggregate = (value: unknown): value is PolygonAggregate =>
  typeof value === 'object' &&
  value !== null &&
  'o' in value && typeof value.o === 'number' &&
  'h' in value && typeof value.h === 'number' &&
  'l' in value && typeof value.l === 'number' &&
  'c' in value && typeof value.c === 'number' &&
  'v' in value && typeof value.v === 'number' &&
  't' in value && typeof value.t === 'number';

@Injectable()
export class PolygonService implements MarketDataProvider {
  private readonly logger = new Logger(PolygonService.name);
  private readonly apiKey: string;
  private readonly baseUrl = 'https://api.polygon.io';

  constructor(
    private readonly configService: ConfigService,
    @Inject(SCAN_CONFIG) private readonly scanConfig: ScanConfig,
  ) {
    this.apiKey = this.configService.get<string>('POLYGON_API_KEY', '');
    if (!this.apiKey) {
      this.logger.warn('POLYGON_API_KEY not configured');
    }
  }

  private async fetch<T>(endpoint: string): Promise<T> {
    const url = `${this.baseUrl}${endpoint}${endpoint.includes('?') ? '&' : '?'}apiKey=${this.apiKey}`;
    const response = await fetch(url, { signal: AbortSignal.timeout(this.scanConfig.httpTimeoutMs) });

    if (!response.ok) {
      throw new Error(`Polygon API error: ${response.status} ${response.statusText}`);
    }

    return response.json() as Promise<T>;
  }

  async getDailyBars(symbol: string, from: string, to: string): Promise<StockBar[]> {
    const data = await this.fetch<PolygonAggregatesResponse>(
      `/v2/aggs/ticker/${encodeURIComponent(symbol)}/range/1/day/${from}/${to}?adjusted=true&sort=asc&limit=50000`,
    );

    if (!Array.isArray(data.results)) {
      return [];
    }

    return data.results.filter(isAggregate).map((bar) => ({
      open: bar.o,
      high: bar.h,
      low: bar.l,
      close: bar.c,
      volume: bar.v,
      timestamp: new Date(bar.t),
    }));
  }

  // Polygon has no multi-ticker aggregates endpoint, so a batch is a set of
  // per-symbol requests run a few at a time.
  async getDailyBarsBatch(symbols: readonly string[], from: string, to: string): Promise<Map<string, StockBar[]>> {
    const bars = new Map<string, StockBar[]>();
    const chunkSize = this.scanConfig.marketConcurrency;

    for (let i = 0; i < symbols.length; i += chunkSize) {
      const chunk = symbols.slice(i, i + chunkSize);
      const results = await Promise.allSettled(chunk.map((symbol) => this.getDailyBars(symbol, from, to)));

      results.forEach((result, index) => {
        const symbol = chunk[index];
        if (result.status === 'fulfilled') {
          bars.set(symbol, result.value);
        } else {
          this.logger.debug(`No bars for ${symbol}: ${describeError(result.reason)}`);
          bars.set(symbol, []);
        }
      });
    }

    return bars;
  }
}
