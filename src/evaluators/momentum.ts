import type { ZoneThresholdMatcher } from '../thresholds/matcher.js';
import { NEUTRAL_ZONE } from '../thresholds/types.js';
import { createIndicatorSignal, neutralSignal, toFiniteOrNull } from '../signals/signal.js';
import type { Direction, Signal } from '../signals/types.js';

export const MOMENTUM_INDICATOR = 'bars';

/** Histogram-only momentum vote, classified by bar size. */
export class MomentumEvaluator {
  constructor(private readonly matcher: ZoneThresholdMatcher) {}

  evaluate(
    histogramValue: number | null | undefined,
    instrumentId: string,
    timeframe: string
  ): Signal {
    const histogram = toFiniteOrNull(histogramValue);
    if (histogram === null) {
      return neutralSignal('momentum', 'Momentum reading missing histogram', { instrumentId, timeframe });
    }

    const bars = this.matcher.classify(instrumentId, timeframe, MOMENTUM_INDICATOR, Math.abs(histogram));
    let direction: Direction = 'NEUTRAL';
    if (bars.zone !== NEUTRAL_ZONE) {
      if (histogram > 0) direction = 'BUY';
      else if (histogram < 0) direction = 'SELL';
    }

    const rationale =
      direction === 'NEUTRAL'
        ? `Momentum flat (bars=${bars.zone})`
        : `Momentum ${direction === 'BUY' ? 'rising' : 'falling'} (bars=${bars.zone})`;

    return createIndicatorSignal({
      source: 'momentum',
      direction,
      strength: bars.rank.extremity,
      rationale,
      details: {
        histogram,
        barsZone: bars.zone,
        thresholdSource: bars.source,
      },
      instrumentId,
      timeframe,
    });
  }
}
