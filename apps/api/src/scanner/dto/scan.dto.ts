import {
  ArrayMaxSize,
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsIn,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { HISTORY_PERIODS, HistoryPeriod } from '../../data/data.types';
import { SCORING_STRATEGIES, ScoringStrategy } from '../../strategy/strategy.types';

export const MAX_SCAN_TICKERS = 100;

export class ScanDto {
  @IsArray()
  @ArrayNotEmpty()
  @ArrayMaxSize(MAX_SCAN_TICKERS)
  @IsString({ each: true })
  @MaxLength(20, { each: true })
  tickers!: string[];

  @IsOptional()
  @IsIn(HISTORY_PERIODS)
  period?: HistoryPeriod;

  @IsOptional()
  @IsIn(SCORING_STRATEGIES)
  strategy?: ScoringStrategy;

  @IsOptional()
  @IsBoolean()
  fundamentals?: boolean;
}
