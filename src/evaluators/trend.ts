import { clamp01, createIndicatorSignal, neutralSignal, toFiniteOrNull } from '../signals/signal.js';
import type { Direction, Signal } from '../signals/types.js';

export type TrendStage = 'none' | 'broken' | 'local' | 'confirmed';

export interface TrendStackState {
  direction: Direction;
  /** `broken` when only the price/short-average chain is ordered. */
  stage: Exclude<TrendStage, 'confirmed'>;
  shortAverage: number;
}

export interface TrendEvaluatorOptions {
  /** Multiplier applied to the relative price/long-average spread. */
  strengthScale?: number;
}

export interface TrendEvaluationContext {
  instrumentId?: string | null;
  timeframe?: string | null;
  /**
   * Whether the designated higher timeframe shows the same local condition.
   * Omit when no higher timeframe is available.
   */
  confirmedByHigherTimeframe?: boolean;
}

const TREND_FIELDS = ['price', 'maShort1', 'maShort2', 'maShort3', 'maLong'] as const;

/**
 * Classifies an ordered moving-average stack without any strength logic. Used by
 * the evaluator and by callers that need the higher-timeframe state.
 */
export function classifyTrendStack(
  price: number,
  maShort1: number,
  maShort2: number,
  maShort3: number,
  maLong: number
): TrendStackState {
  const shortAverage = (maShort1 + maShort2 + maShort3) / 3;
  if (price > maShort1 && maShort1 > maShort2 && maShort2 > maShort3) {
    return shortAverage > maLong
      ? { direction: 'BUY', stage: 'local', shortAverage }
      : { direction: 'NEUTRAL', stage: 'broken', shortAverage };
  }
  if (price < maShort1 && maShort1 < maShort2 && maShort2 < maShort3) {
    return shortAverage < maLong
      ? { direction: 'SELL', stage: 'local', shortAverage }
      : { direction: 'NEUTRAL', stage: 'broken', shortAverage };
  }
  return { direction: 'NEUTRAL', stage: 'none', shortAverage };
}

export class TrendEvaluator {
  readonly strengthScale: number;

  constructor(options: TrendEvaluatorOptions = {}) {
    const scale = options.strengthScale ?? 10;
    this.strengthScale = Number.isFinite(scale) && scale > 0 ? scale : 10;
  }

  evaluate(
    price: number | null | undefined,
    maShort1: number | null | undefined,
    maShort2: number | null | undefined,
    maShort3: number | null | undefined,
    maLong: number | null | undefined,
    context: TrendEvaluationContext = {}
  ): Signal {
    const values = [price, maShort1, maShort2, maShort3, maLong].map(toFiniteOrNull);
    const missing = TREND_FIELDS.filter((_, index) => values[index] === null);
    const [p, m1, m2, m3, long] = values;
    if (p === null || m1 === null || m2 === null || m3 === null || long === null) {
      return neutralSignal('trend', `Trend reading missing ${missing.join(', ')}`, context);
    }

    const state = classifyTrendStack(p, m1, m2, m3, long);
    const spread = Math.abs(p - long) / (Math.abs(long) || 1);
    const stage: TrendStage = state.stage;
    const details = {
      price: p,
      shortAverage: state.shortAverage,
      maLong: long,
      spread,
      stage,
    };

    if (state.direction === 'NEUTRAL') {
      const rationale =
        state.stage === 'broken'
          ? 'Short averages ordered but their mean has not crossed the long average'
          : 'Moving averages not stacked';
      return createIndicatorSignal({
        source: 'trend',
        direction: 'NEUTRAL',
        strength: 0,
        rationale,
        details,
        instrumentId: context.instrumentId,
        timeframe: context.timeframe,
      });
    }

    const label = state.direction === 'BUY' ? 'bullish' : 'bearish';
    if (context.confirmedByHigherTimeframe === false) {
      return createIndicatorSignal({
        source: 'trend',
        direction: 'NEUTRAL',
        strength: 0,
        rationale: `Local ${label} stack not confirmed by higher timeframe`,
        details,
        instrumentId: context.instrumentId,
        timeframe: context.timeframe,
      });
    }

    const confirmed = context.confirmedByHigherTimeframe === true;
    return createIndicatorSignal({
      source: 'trend',
      direction: state.direction,
      strength: clamp01(spread * this.strengthScale),
      rationale: confirmed ? `Confirmed ${label} stack` : `Local ${label} stack`,
      details: { ...details, stage: confirmed ? 'confirmed' : 'local' },
      instrumentId: context.instrumentId,
      timeframe: context.timeframe,
    });
  }
}
