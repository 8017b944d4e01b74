import { ClassConstructor } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { MomentumProfile } from '../momentum/momentum.types';
import { CollectedSourceKey } from './source-keys';

/**
 * Shape every collaborator record shares. Subclasses add the fields their
 * source reports and say which of them count as signal tags.
 */
export abstract class SourceRecord {
  @IsString()
  @IsNotEmpty()
  ticker!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(100)
  score!: number;

  @IsOptional()
  @IsString()
  summary?: string;

  signalTags(): string[] {
    return [];
  }
}

export class FinvizRecord extends SourceRecord {
  // Screens the ticker appeared on, e.g. top_gainer, new_high, top_loser, overbought
  @IsArray()
  @IsString({ each: true })
  signals!: string[];

  @IsOptional()
  @IsNumber()
  change?: number;

  @IsOptional()
  @IsString()
  sector?: string;

  signalTags(): string[] {
    return this.signals;
  }
}

export const REDDIT_SENTIMENTS = ['bullish', 'bearish', 'neutral'] as const;

export class RedditRecord extends SourceRecord {
  @IsInt()
  @Min(0)
  mentions!: number;

  @IsIn(REDDIT_SENTIMENTS)
  sentiment!: (typeof REDDIT_SENTIMENTS)[number];

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  subreddits?: string[];
}

export const NEWS_SENTIMENTS = ['positive', 'negative', 'neutral'] as const;

export class NewsRecord extends SourceRecord {
  @IsInt()
  @Min(0)
  articleCount!: number;

  @IsIn(NEWS_SENTIMENTS)
  sentiment!: (typeof NEWS_SENTIMENTS)[number];

  @IsOptional()
  @IsString()
  topCategory?: string;
}

export class GoogleTrendsRecord extends SourceRecord {
  @IsNumber()
  @Min(0)
  trendValue!: number;

  @IsBoolean()
  isBreakout!: boolean;

  signalTags(): string[] {
    return this.isBreakout ? ['search_breakout'] : [];
  }
}

export const SQUEEZE_RISKS = ['low', 'medium', 'high'] as const;

export class ShortInterestRecord extends SourceRecord {
  // Percent of float sold short
  @IsOptional()
  @IsNumber()
  @Min(0)
  shortFloat?: number | null;

  // Days to cover
  @IsOptional()
  @IsNumber()
  @Min(0)
  shortRatio?: number | null;

  @IsIn(SQUEEZE_RISKS)
  squeezeRisk!: (typeof SQUEEZE_RISKS)[number];

  signalTags(): string[] {
    return this.squeezeRisk === 'high' ? ['squeeze_risk'] : [];
  }
}

export const OPTIONS_SIGNALS = ['bullish_sweep', 'bearish_sweep', 'straddle', 'neutral'] as const;

export class OptionsActivityRecord extends SourceRecord {
  @IsNumber()
  @Min(0)
  volumeOiRatio!: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  putCallRatio?: number | null;

  @IsIn(OPTIONS_SIGNALS)
  signal!: (typeof OPTIONS_SIGNALS)[number];

  signalTags(): string[] {
    return this.signal === 'neutral' ? [] : [this.signal];
  }
}

export class PerplexityRecord extends SourceRecord {
  @IsOptional()
  @IsInt()
  @Min(0)
  mentionCount?: number;

  @IsOptional()
  @IsString()
  sentiment?: string;

  @IsBoolean()
  hasCatalyst!: boolean;

  signalTags(): string[] {
    return this.hasCatalyst ? ['catalyst'] : [];
  }
}

export class InsiderTradingRecord extends SourceRecord {
  @IsBoolean()
  isBuy!: boolean;

  @IsNumber()
  @Min(0)
  transactionValue!: number;

  @IsOptional()
  @IsString()
  role?: string;

  signalTags(): string[] {
    return [this.isBuy ? 'insider_buying' : 'insider_selling'];
  }
}

export const ANALYST_ACTIONS = ['upgrade', 'downgrade', 'initiate', 'pt_raise', 'pt_lower', 'reiterate'] as const;

export class AnalystRatingRecord extends SourceRecord {
  @IsIn(ANALYST_ACTIONS)
  action!: (typeof ANALYST_ACTIONS)[number];

  @IsOptional()
  @IsString()
  analystFirm?: string;

  signalTags(): string[] {
    return [`analyst_${this.action}`];
  }
}

export const CONGRESS_SIGNALS = ['congress_buying', 'congress_selling', 'mixed'] as const;

export class CongressTradingRecord extends SourceRecord {
  @IsIn(CONGRESS_SIGNALS)
  signal!: (typeof CONGRESS_SIGNALS)[number];

  @IsInt()
  @Min(0)
  politicianCount!: number;

  signalTags(): string[] {
    return this.signal === 'mixed' ? [] : [this.signal];
  }
}

export const INSTITUTIONAL_SIGNALS = ['institutional_accumulation', 'institutional_distribution', 'neutral'] as const;

export class InstitutionalRecord extends SourceRecord {
  @IsIn(INSTITUTIONAL_SIGNALS)
  signal!: (typeof INSTITUTIONAL_SIGNALS)[number];

  @IsOptional()
  @IsInt()
  @Min(0)
  fundsBuying?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  fundsSelling?: number;

  signalTags(): string[] {
    return this.signal === 'neutral' ? [] : [this.signal];
  }
}

export const FLOW_SIGNALS = ['inflow', 'outflow', 'neutral'] as const;

/** One sector ETF; `ticker` is the ETF and `score` its flow score. */
export class EtfFlowRecord extends SourceRecord {
  @IsString()
  @IsNotEmpty()
  sector!: string;

  @IsIn(FLOW_SIGNALS)
  flowSignal!: (typeof FLOW_SIGNALS)[number];

  @IsArray()
  @IsString({ each: true })
  holdings!: string[];

  signalTags(): string[] {
    return this.flowSignal === 'neutral' ? [] : [`sector_${this.flowSignal}`];
  }
}

/** Valuation stress for the short side (P/E expansion, margins, debt...). */
export class FundamentalsRecord extends SourceRecord {
  @IsArray()
  @IsString({ each: true })
  signals!: string[];

  signalTags(): string[] {
    return this.signals;
  }
}

export interface SourceRecordTypes {
  momentum: MomentumProfile;
  finviz: FinvizRecord;
  reddit: RedditRecord;
  news: NewsRecord;
  google_trends: GoogleTrendsRecord;
  short_interest: ShortInterestRecord;
  options_activity: OptionsActivityRecord;
  perplexity: PerplexityRecord;
  insider_trading: InsiderTradingRecord;
  analyst_ratings: AnalystRatingRecord;
  congress_trading: CongressTradingRecord;
  institutional: InstitutionalRecord;
  etf_flows: EtfFlowRecord;
  fundamentals: FundamentalsRecord;
}

export const SOURCE_RECORD_CLASSES: { [K in CollectedSourceKey]: ClassConstructor<SourceRecordTypes[K]> } = {
  finviz: FinvizRecord,
  reddit: RedditRecord,
  news: NewsRecord,
  google_trends: GoogleTrendsRecord,
  short_interest: ShortInterestRecord,
  options_activity: OptionsActivityRecord,
  perplexity: PerplexityRecord,
  insider_trading: InsiderTradingRecord,
  analyst_ratings: AnalystRatingRecord,
  congress_trading: CongressTradingRecord,
  institutional: InstitutionalRecord,
  etf_flows: EtfFlowRecord,
  fundamentals: FundamentalsRecord,
};
