import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsBoolean,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { LongWeights } from '../../sources/source-keys';

/** Per-source weight overrides. Keys left out keep their configured weight. */
export class LongWeightsDto implements Partial<LongWeights> {
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  momentum?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  finviz?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  reddit?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  news?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  google_trends?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  short_interest?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  options_activity?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  perplexity?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  insider_trading?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  analyst_ratings?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  congress_trading?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  institutional?: number;
}

export class RunScanDto {
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  sources?: string[];

  @IsOptional()
  @ValidateNested()
  @Type(() => LongWeightsDto)
  weights?: LongWeightsDto;

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(500)
  @IsString({ each: true })
  themeTickers?: string[];

  @IsOptional()
  @IsBoolean()
  discoverThemes?: boolean;

  @IsOptional()
  @IsBoolean()
  squeezePenalty?: boolean;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(100)
  minShortScore?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(500)
  top?: number;

  @IsOptional()
  @IsNumber()
  minScore?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  minSources?: number;
}
