import { Inject, Injectable, Logger } from '@nestjs/common';
import { SCAN_CONFIG, ScanConfig } from '../config/scan-config';
import { LONG_SOURCE_KEYS, LongWeights } from '../sources/source-keys';
import { aggregateLongScores } from './long-aggregation';
import { aggregateShortScores } from './short-aggregation';
import { CombinedRanking, LongScoringInput, ShortCandidate, ShortScoringInput } from './scoring.types';

export interface ShortScoringOptions {
  squeezePenalty?: boolean;
  minShortScore?: number;
}

@Injectable()
export class ScoringService {
  private readonly logger = new Logger(ScoringService.name);

  constructor(@Inject(SCAN_CONFIG) private readonly config: ScanConfig) {}

  /** Request weights are laid over the configured ones, key by key, and not re-normalized. */
  resolveWeights(overrides: Partial<LongWeights> = {}): LongWeights {
    const weights: LongWeights = { ...this.config.longWeights };
    for (const key of LONG_SOURCE_KEYS) {
      const override = overrides[key];
      if (override !== undefined) {
        weights[key] = override;
      }
    }
    return weights;
  }

  rankLong(input: LongScoringInput, weights?: Partial<LongWeights>): CombinedRanking[] {
    const rankings = aggregateLongScores(input, {
      weights: this.resolveWeights(weights),
      neutralScore: this.config.neutralScore,
      themeBonus: this.config.themeBonus,
      multiSourceBonus: this.config.multiSourceBonus,
      sectorFlowMultiplier: this.config.sectorFlowMultiplier,
    });
    this.logger.log(`Aggregated scores for ${rankings.length} tickers`);
    return rankings;
  }

  rankShort(input: ShortScoringInput, options: ShortScoringOptions = {}): ShortCandidate[] {
    const minScore = options.minShortScore ?? this.config.minShortScore;
    const candidates = aggregateShortScores(input, {
      weights: this.config.shortWeights,
      multiSourceBonus: this.config.multiSourceShortBonus,
      squeezePenalty: options.squeezePenalty ?? this.config.squeezePenalty,
      squeezePenaltyPoints: this.config.squeezePenaltyPoints,
      squeezeShortFloatThreshold: this.config.squeezeShortFloatThreshold,
      minScore,
    });
    this.logger.log(`Short candidates: ${candidates.length} stocks scored at or above ${minScore}`);
    return candidates;
  }
}
