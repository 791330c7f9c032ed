import { Injectable } from '@nestjs/common';
import { IndicatorSnapshot } from '../indicators/indicator.types';
import {
  applyFilterCaps,
  clamp,
  meanReversionSubScores,
  round1,
  sumSubScores,
  trendSubScores,
} from './scoring.functions';
import { FilterFlags, ScoringStrategy, SubScores, TechnicalScore } from './strategy.types';

@Injectable()
export class ScoringService {
  score(snapshot: IndicatorSnapshot, flags: FilterFlags, strategy: ScoringStrategy): TechnicalScore {
    const subScores = this.calculateFactors(snapshot, strategy);
    const rawScore = round1(clamp(0, 100, sumSubScores(subScores)));

    // The hook filter only exists for mean reversion
    const effectiveFlags: FilterFlags =
      strategy === 'mean_reversion' ? flags : { isWaterfall: flags.isWaterfall, isRsiHookFailed: false };
    const score = applyFilterCaps(rawScore, effectiveFlags);

    return {
      strategy,
      rawScore,
      score,
      subScores,
      capped: score < rawScore,
    };
  }

  private calculateFactors(snapshot: IndicatorSnapshot, strategy: ScoringStrategy): SubScores {
    if (strategy === 'trend') {
      return trendSubScores({
        rsi: snapshot.rsi,
        mfi: snapshot.mfi,
        bbUpper: snapshot.bbUpper,
        price: snapshot.currentPrice,
        macdDiff: snapshot.macdDiff,
        ichimokuA: snapshot.ichimokuA,
        ichimokuB: snapshot.ichimokuB,
        vwap: snapshot.vwap,
      });
    }

    return meanReversionSubScores({
      rsi: snapshot.rsi,
      mfi: snapshot.mfi,
      bbLower: snapshot.bbLower,
      price: snapshot.currentPrice,
      macdDiff: snapshot.macdDiff,
      macdDiffPct: snapshot.macdDiffPct,
      ichimokuA: snapshot.ichimokuA,
      ichimokuB: snapshot.ichimokuB,
      vwap: snapshot.vwap,
    });
  }
}
