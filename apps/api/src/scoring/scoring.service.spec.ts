import { makeProfile, testConfig } from '../testing/fixtures';
import { momentumSignals } from '../sources/source-normalizer';
import { ScoringService } from './scoring.service';

describe('ScoringService', () => {
  const service = new ScoringService(testConfig());

  it('lays request weights over the configured ones', () => {
    const weights = service.resolveWeights({ momentum: 0.5, reddit: undefined });

    expect(weights.momentum).toBe(0.5);
    expect(weights.reddit).toBe(0.1);
    expect(weights.finviz).toBe(0.12);
  });

  it('ranks with the configured weights by default', () => {
    const signals = { momentum: momentumSignals([makeProfile({ ticker: 'ABC', score: 100 })]) };

    // 100 x 0.20 + 50 x 0.80 for the eleven neutral sources
    expect(service.rankLong({ signals })[0].combinedScore).toBe(60);
    expect(service.rankLong({ signals }, { momentum: 1 })[0].combinedScore).toBe(140);
  });

  it('uses the configured short threshold unless told otherwise', () => {
    const bearishMomentum = [
      { ticker: 'ZZZ', score: 100, signals: [], change1m: -30, rsi: 20, summary: 'weak' },
    ];

    expect(service.rankShort({ bearishMomentum, signals: {} })).toEqual([]);
    expect(service.rankShort({ bearishMomentum, signals: {} }, { minShortScore: 25 })).toHaveLength(1);
  });
});
