import { IsBoolean, IsIn, IsOptional } from 'class-validator';
import { Transform } from 'class-transformer';
import { HISTORY_PERIODS, HistoryPeriod } from '../../data/data.types';
import { SCORING_STRATEGIES, ScoringStrategy } from '../../strategy/strategy.types';

export function toBoolean({ value }: { value: unknown }): unknown {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return value;
}

export class AnalysisQueryDto {
  @IsOptional()
  @IsIn(HISTORY_PERIODS)
  period?: HistoryPeriod;

  @IsOptional()
  @IsIn(SCORING_STRATEGIES)
  strategy?: ScoringStrategy;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  fundamentals?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  series?: boolean;
}
