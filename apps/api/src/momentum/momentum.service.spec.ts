import { MarketDataProvider, StockBar } from '../data/data.types';
import { PriceSample } from './momentum.types';
import { breakoutSeries, flatSeries, testConfig } from '../testing/fixtures';
import { MomentumService } from './momentum.service';

const toBars = (series: PriceSample[]): StockBar[] =>
  series.map((sample, i) => ({
    open: sample.close,
    high: sample.close,
    low: sample.close,
    close: sample.close,
    volume: sample.volume,
    timestamp: new Date(Date.UTC(2024, 0, 2 + i)),
  }));

describe('MomentumService', () => {
  const history: Record<string, StockBar[]> = {
    SPY: toBars(flatSeries(25)),
    ABC: toBars(breakoutSeries()),
    SHORT: toBars(flatSeries(10)),
  };

  const provider = (): MarketDataProvider & { getDailyBarsBatch: jest.Mock } => ({
    getDailyBarsBatch: jest.fn(async (symbols: readonly string[]) => {
      const bars = new Map<string, StockBar[]>();
      for (const symbol of symbols) {
        bars.set(symbol, history[symbol] ?? []);
      }
      return bars;
    }),
  });

  it('fetches the universe in batches with the benchmark', async () => {
    const marketData = provider();
    const service = new MomentumService(marketData, testConfig({ marketBatchSize: 2 }));

    const profiles = await service.scan(['ABC', 'SHORT', 'ZZZ'], new Date('2024-03-31T12:00:00Z'));

    expect(marketData.getDailyBarsBatch).toHaveBeenCalledTimes(2);
    expect(marketData.getDailyBarsBatch).toHaveBeenNthCalledWith(1, ['ABC', 'SHORT', 'SPY'], '2024-01-01', '2024-03-31');
    expect(marketData.getDailyBarsBatch).toHaveBeenNthCalledWith(2, ['ZZZ', 'SPY'], '2024-01-01', '2024-03-31');
    expect(profiles.map((profile) => profile.ticker)).toEqual(['ABC']);
    expect(profiles[0].relativeStrength).toBeCloseTo(10, 6);
  });

  it('keeps going when a batch fails', async () => {
    const marketData = provider();
    marketData.getDailyBarsBatch.mockRejectedValueOnce(new Error('rate limited'));
    const service = new MomentumService(marketData, testConfig({ marketBatchSize: 1 }));

    const profiles = await service.scan(['SHORT', 'ABC']);

    expect(profiles.map((profile) => profile.ticker)).toEqual(['ABC']);
  });

  it('orders profiles by score, then ticker', async () => {
    const marketData = provider();
    history.AAA = toBars(flatSeries(20));
    history.BBB = toBars(flatSeries(20));
    const service = new MomentumService(marketData, testConfig());

    const profiles = await service.scan(['BBB', 'ABC', 'AAA']);

    expect(profiles.map((profile) => profile.ticker)).toEqual(['ABC', 'AAA', 'BBB']);
  });
});
