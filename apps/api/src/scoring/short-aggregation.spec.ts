import { DEFAULT_SHORT_WEIGHTS } from '../config/scan-config';
import { BearishMomentumSignal } from '../momentum/bearish-trend';
import { FinvizRecord } from '../sources/source-records';
import { normalizeRecords } from '../sources/source-normalizer';
import { CollectedSignals } from '../sources/source-signal';
import { aggregateShortScores, finvizBearishScore } from './short-aggregation';
import { ShortScoringSettings } from './scoring.types';

const settings = (overrides: Partial<ShortScoringSettings> = {}): ShortScoringSettings => ({
  weights: DEFAULT_SHORT_WEIGHTS,
  multiSourceBonus: 4,
  squeezePenalty: true,
  squeezePenaltyPoints: 15,
  squeezeShortFloatThreshold: 20,
  minScore: 0,
  ...overrides,
});

const bearishMomentum: BearishMomentumSignal[] = [
  { ticker: 'ZZZ', score: 60, signals: ['declining', 'below_ma50'], change1m: -12, rsi: 38, summary: 'below MA50' },
];

const crowded: CollectedSignals = {
  analyst_ratings: normalizeRecords('analyst_ratings', [
    { ticker: 'ZZZ', score: 70, action: 'downgrade', analystFirm: 'Example Securities' },
    { ticker: 'ABC', score: 70, action: 'upgrade' },
  ]).signals,
  short_interest: normalizeRecords('short_interest', [
    { ticker: 'ZZZ', score: 80, shortFloat: 25, shortRatio: 6, squeezeRisk: 'high' },
  ]).signals,
};

describe('aggregateShortScores', () => {
  it('weights bearish inputs and flags crowded shorts', () => {
    const [zzz] = aggregateShortScores({ bearishMomentum, signals: crowded }, settings({ squeezePenalty: false }));

    // 60 x 0.25 + 70 x 0.12 + 4 for the second source
    expect(zzz.shortScore).toBe(27.4);
    expect(zzz.squeezeWarning).toBe(true);
    expect(zzz.shortFloat).toBe(25);
    expect(zzz.bearishSignals).toEqual(['declining', 'below_ma50', 'analyst_downgrade']);
    expect(zzz.summary).toBe('below MA50; downgrade by Example Securities');
    expect(zzz.subScores).toEqual({
      bearish_momentum: 60,
      fundamentals: 0,
      analyst_downgrades: 70,
      bearish_options: 0,
      insider_selling: 0,
      institutional_dist: 0,
      finviz_bearish: 0,
      congress_selling: 0,
      negative_news: 0,
    });
  });

  it('takes exactly the squeeze penalty off a crowded short', () => {
    const [penalized] = aggregateShortScores({ bearishMomentum, signals: crowded }, settings());
    const [unpenalized] = aggregateShortScores({ bearishMomentum, signals: crowded }, settings({ squeezePenalty: false }));

    expect(penalized.shortScore).toBe(12.4);
    expect(unpenalized.shortScore - penalized.shortScore).toBeCloseTo(15, 6);
    expect(penalized.squeezeWarning).toBe(true);
  });

  it('floors the score at zero', () => {
    const signals: CollectedSignals = {
      news: normalizeRecords('news', [{ ticker: 'ZZZ', score: 20, articleCount: 4, sentiment: 'negative' }]).signals,
      short_interest: crowded.short_interest,
    };

    const [zzz] = aggregateShortScores({ bearishMomentum: [], signals }, settings());

    expect(zzz.shortScore).toBe(0);
    expect(zzz.summary).toBe('Bearish signals detected');
  });

  it('drops candidates below the minimum score', () => {
    expect(aggregateShortScores({ bearishMomentum, signals: crowded }, settings({ minScore: 40 }))).toEqual([]);
  });

  it('only considers tickers with a bearish input', () => {
    const candidates = aggregateShortScores({ bearishMomentum: [], signals: crowded }, settings());

    expect(candidates.map((candidate) => candidate.ticker)).toEqual(['ZZZ']);
  });

  it('reads insider selling and put/call skew', () => {
    const signals: CollectedSignals = {
      insider_trading: normalizeRecords('insider_trading', [
        { ticker: 'WXYZ', score: 90, isBuy: false, transactionValue: 2000000, role: 'CFO' },
        { ticker: 'ABC', score: 90, isBuy: true, transactionValue: 2000000 },
      ]).signals,
      options_activity: normalizeRecords('options_activity', [
        { ticker: 'WXYZ', score: 40, volumeOiRatio: 3, putCallRatio: 2, signal: 'neutral' },
      ]).signals,
    };

    const candidates = aggregateShortScores({ bearishMomentum: [], signals }, settings());

    expect(candidates).toHaveLength(1);
    const [wxyz] = candidates;
    // 100 x 0.10 + 60 x 0.12 + 4
    expect(wxyz.shortScore).toBe(21.2);
    expect(wxyz.subScores.insider_selling).toBe(100);
    expect(wxyz.subScores.bearish_options).toBe(60);
    expect(wxyz.bearishSignals).toEqual(['high_put_call', 'insider_selling']);
    expect(wxyz.summary).toBe('CFO sold $2,000,000');
    expect(wxyz.squeezeWarning).toBe(false);
    expect(wxyz.shortFloat).toBeNull();
  });

  it('cuts long summaries to 120 characters', () => {
    const wordy: BearishMomentumSignal[] = [
      { ticker: 'ZZZ', score: 60, signals: ['declining'], change1m: -12, rsi: 38, summary: 'x'.repeat(150) },
    ];

    const [zzz] = aggregateShortScores({ bearishMomentum: wordy, signals: {} }, settings());

    expect(zzz.summary).toHaveLength(120);
  });
});

describe('finvizBearishScore', () => {
  const finviz = (signals: string[], change?: number): FinvizRecord =>
    Object.assign(new FinvizRecord(), { ticker: 'ZZZ', score: 50, signals, change });

  it('scales top losers by the size of the drop', () => {
    expect(finvizBearishScore(finviz(['top_loser'], -8))).toEqual({ score: 40, signals: ['top_loser'] });
    expect(finvizBearishScore(finviz(['top_loser'], -30))).toEqual({ score: 80, signals: ['top_loser'] });
  });

  it('adds 20 for an overbought loser', () => {
    expect(finvizBearishScore(finviz(['top_loser', 'overbought'], -8))).toEqual({
      score: 60,
      signals: ['top_loser', 'overbought'],
    });
  });

  it('scores overbought alone at 60', () => {
    expect(finvizBearishScore(finviz(['overbought']))).toEqual({ score: 60, signals: ['overbought'] });
  });

  it('ignores bullish screens', () => {
    expect(finvizBearishScore(finviz(['top_gainer'], 9))).toBeNull();
  });
});
