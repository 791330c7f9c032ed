import { IndicatorSnapshot } from '../indicators/indicator.types';
import { WaterfallCheck } from '../strategy/signal-filters';
import {
  FILTER_SCORE_CAP,
  FundamentalsResult,
  ScoringStrategy,
  SUB_SCORE_MAX,
  SubScores,
} from '../strategy/strategy.types';
import { dynamicStopLoss } from '../strategy/verdict';
import { DetailEntry } from './analysis.types';

export const NarrativeAction = {
  BUY: 'BUY - aggressive accumulation',
  AVOID: 'AVOID - do not buy',
  FALLING_KNIFE: 'WAIT - falling knife',
  OVERHEATED: 'OVERHEATED - not a dip-buying setup',
  NO_MOMENTUM: 'NEUTRAL - no momentum either way',
  HOLD: 'HOLD - not enough evidence',
  FAKEOUT: 'FAKEOUT RISK - long-term trend is down',
  STRONG_BREAKOUT: 'STRONG BUY - breakout in progress',
  NO_TREND: 'NO TREND - momentum faded',
  WATCH: 'WATCH - trend building',
} as const;

export type NarrativeAction = (typeof NarrativeAction)[keyof typeof NarrativeAction];

export interface DetailContext {
  snapshot: IndicatorSnapshot;
  strategy: ScoringStrategy;
  finalScore: number;
  subScores: SubScores;
  waterfall: WaterfallCheck;
  isRsiHookFailed: boolean;
  fundamentals: FundamentalsResult | null;
}

function fmt1(value: number): string {
  return value.toLocaleString('en-US', { minimumFractionDigits: 1, maximumFractionDigits: 1 });
}

function mark(ok: boolean): string {
  return ok ? 'yes' : 'no';
}

export function chooseAction(ctx: DetailContext): { action: NarrativeAction; briefing: string } {
  const { strategy, finalScore, snapshot } = ctx;
  const isWaterfall = ctx.waterfall.isWaterfall;

  if (strategy === 'mean_reversion') {
    if (isWaterfall) {
      return {
        action: NarrativeAction.AVOID,
        briefing: 'Price sits under a falling long-term average. What looks like a bottom may have a basement.',
      };
    }
    if (ctx.isRsiHookFailed) {
      return {
        action: NarrativeAction.FALLING_KNIFE,
        briefing: 'Oversold but the slide has not stopped. Wait for RSI to hook upward before entering.',
      };
    }
    if (finalScore >= 70) {
      return {
        action: NarrativeAction.BUY,
        briefing: 'Oversold readings, support and a trend reversal line up. A technical rebound is likely.',
      };
    }
    if (finalScore <= 30) {
      if (snapshot.rsi >= 65) {
        return {
          action: NarrativeAction.OVERHEATED,
          briefing: 'Strong upward momentum keeps this out of dip-buying range. New entries risk buying the top.',
        };
      }
      return {
        action: NarrativeAction.NO_MOMENTUM,
        briefing: 'Neither an oversold signal nor an upward signal is present.',
      };
    }
    return {
      action: NarrativeAction.HOLD,
      briefing: 'Evidence to buy is thin. Wait for a clear oversold signal (70 points or more).',
    };
  }

  if (isWaterfall) {
    return {
      action: NarrativeAction.FAKEOUT,
      briefing: 'A short-term bounce against a falling long-term average. Breakouts here usually fail.',
    };
  }
  if (finalScore >= 75) {
    return {
      action: NarrativeAction.STRONG_BREAKOUT,
      briefing: 'RSI and money flow are strong and price is pushing through the upper band. Follow the trend.',
    };
  }
  if (finalScore <= 40) {
    return {
      action: NarrativeAction.NO_TREND,
      briefing: 'Upward momentum is weak or sideways. Not enough energy for a breakout trade.',
    };
  }
  return {
    action: NarrativeAction.WATCH,
    briefing: 'The trend is up but has not broken out. Wait for a breakout on volume.',
  };
}

function scoreBreakdown(ctx: DetailContext): string {
  const { snapshot: s, subScores } = ctx;

  if (ctx.strategy === 'mean_reversion') {
    return [
      'Score breakdown (mean reversion):',
      `- RSI (oversold): +${subScores.rsi} / ${SUB_SCORE_MAX.rsi}`,
      `- MFI (money flow): +${subScores.mfi} / ${SUB_SCORE_MAX.mfi}`,
      `- Bollinger (lower band): +${subScores.bollinger} / ${SUB_SCORE_MAX.bollinger}`,
      `- MACD (trend size): +${subScores.macd} / ${SUB_SCORE_MAX.macd}`,
      `- Ichimoku (cloud): +${subScores.ichimoku} / ${SUB_SCORE_MAX.ichimoku}`,
      `- VWAP (discount): +${subScores.vwap} / ${SUB_SCORE_MAX.vwap}`,
    ].join('\n');
  }

  const cloudTop =
    s.ichimokuA !== null && s.ichimokuB !== null ? Math.max(s.ichimokuA, s.ichimokuB) : null;
  return [
    'Score breakdown (trend following):',
    `- RSI momentum 50-75: ${s.rsi > 75 ? 'overheated' : mark(s.rsi >= 50)}`,
    `- MFI inflow 50+: ${mark(s.mfi >= 50)}`,
    `- Upper band breakout: ${mark(s.bbUpper > 0 && s.currentPrice >= s.bbUpper * 0.98)}`,
    `- MACD positive: ${mark(s.macdDiff > 0)}`,
    `- Above the cloud: ${mark(cloudTop !== null && s.currentPrice > cloudTop)}`,
    `- Holding VWAP: ${mark(s.vwap !== null && s.currentPrice > s.vwap)}`,
  ].join('\n');
}

function indicatorEntries(ctx: DetailContext): DetailEntry[] {
  const s = ctx.snapshot;
  const price = s.currentPrice;
  const stop = dynamicStopLoss(price, s.atr);

  let bandPosition: string;
  if (s.bbLower <= 0 || s.bbUpper <= 0) bandPosition = 'Bands unavailable';
  else if (price <= s.bbLower) bandPosition = 'Price near the lower band';
  else if (price >= s.bbUpper) bandPosition = 'Price near the upper band';
  else bandPosition = 'Price mid-range';

  return [
    {
      title: 'RSI (momentum)',
      comment: `${s.rsi.toFixed(1)} (${s.rsi < 30 ? 'oversold' : s.rsi < 70 ? 'normal' : 'overbought'})`,
    },
    {
      title: 'MFI (money flow)',
      comment: `${s.mfi.toFixed(1)} (${s.mfi < 30 ? 'weak' : s.mfi < 70 ? 'neutral' : 'strong'})`,
    },
    {
      title: 'MACD (trend signal)',
      comment: s.macdDiff > 0 ? 'Reversal signal (+)' : 'Decline continues (-)',
    },
    {
      title: 'Ichimoku cloud',
      comment:
        s.ichimokuA === null || s.ichimokuB === null
          ? 'Cloud unavailable (short history)'
          : `Cloud: ${s.ichimokuA > s.ichimokuB ? 'bullish' : 'bearish'}`,
    },
    { title: 'Bollinger Bands (volatility)', comment: bandPosition },
    {
      title: 'ATR (dynamic stop)',
      comment: `ATR=${s.atr.toFixed(2)} -> stop ${fmt1(stop)}`,
    },
    {
      title: 'VWAP (volume weighted)',
      comment:
        s.vwap === null ? 'VWAP unavailable' : price > s.vwap ? 'Above VWAP' : 'Below VWAP',
    },
  ];
}

export function buildDetailInfo(ctx: DetailContext): DetailEntry[] {
  const { snapshot, waterfall, fundamentals } = ctx;
  const detail = indicatorEntries(ctx);

  detail.push({
    title: 'Long-term trend',
    comment: waterfall.isWaterfall
      ? `Danger - waterfall decline (price under a falling ${waterfall.window}-day average)`
      : 'Safe - trend supported or rising',
  });

  if (ctx.strategy === 'mean_reversion') {
    detail.push({
      title: 'RSI turnaround (hook)',
      comment: ctx.isRsiHookFailed
        ? 'Turnaround failed - RSI still falling (falling knife, wait)'
        : 'Turned up or not oversold',
    });
  }

  if (fundamentals && (fundamentals.penalty > 0 || fundamentals.messages.length > 0)) {
    detail.push({ title: 'Fundamentals check', comment: fundamentals.messages.join(' / ') });
  }

  const { action, briefing } = chooseAction(ctx);
  const lines: string[] = [
    `Strategy mode: ${ctx.strategy === 'mean_reversion' ? 'mean reversion (buy the dip)' : 'trend following (breakout)'}`,
    '',
    `[${action}]`,
    '',
    scoreBreakdown(ctx),
  ];

  if (fundamentals && fundamentals.penalty > 0) {
    lines.push(`Fundamentals risk: -${fundamentals.penalty} points`);
  }
  if (waterfall.isWaterfall) {
    lines.push(`Waterfall filter: long-term average falling (score capped at ${FILTER_SCORE_CAP})`);
  }
  if (ctx.isRsiHookFailed && ctx.strategy === 'mean_reversion') {
    lines.push(`RSI hook filter: turnaround failed (score capped at ${FILTER_SCORE_CAP})`);
  }
  if (snapshot.atr > 0 && snapshot.currentPrice > 0) {
    const stop = dynamicStopLoss(snapshot.currentPrice, snapshot.atr);
    const pct = Math.abs(((stop - snapshot.currentPrice) / snapshot.currentPrice) * 100);
    lines.push(`ATR stop: ${fmt1(stop)} (${pct.toFixed(1)}% below)`);
  }
  lines.push('', `Summary: ${briefing}`);

  detail.push({ title: 'Final verdict', comment: lines.join('\n') });
  return detail;
}
