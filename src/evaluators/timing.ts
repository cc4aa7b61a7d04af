import type { ZoneClassification, ZoneThresholdMatcher } from '../thresholds/matcher.js';
import { clamp01, createIndicatorSignal, neutralSignal, toFiniteOrNull } from '../signals/signal.js';
import type { Direction, Signal } from '../signals/types.js';

export const TIMING_INDICATORS = ['line', 'signal', 'histogram'] as const;

export type TimingIndicator = (typeof TIMING_INDICATORS)[number];

export type TimingWeights = Record<TimingIndicator, number>;

export const DEFAULT_TIMING_WEIGHTS: TimingWeights = { line: 0.4, signal: 0.4, histogram: 0.2 };

/**
 * Oscillator triplet evaluator (line, signal line, histogram). Each scalar is
 * classified on its own and the three zones vote.
 */
export class TimingEvaluator {
  private readonly weights: TimingWeights;

  constructor(
    private readonly matcher: ZoneThresholdMatcher,
    weights: Partial<TimingWeights> = {}
  ) {
    this.weights = { ...DEFAULT_TIMING_WEIGHTS, ...weights };
  }

  evaluate(
    lineValue: number | null | undefined,
    signalValue: number | null | undefined,
    histogramValue: number | null | undefined,
    instrumentId: string,
    timeframe: string
  ): Signal {
    const context = { instrumentId, timeframe };
    const line = toFiniteOrNull(lineValue);
    const signal = toFiniteOrNull(signalValue);
    const histogram = toFiniteOrNull(histogramValue);
    if (line === null || signal === null || histogram === null) {
      const present: Record<TimingIndicator, number | null> = { line, signal, histogram };
      const missing = TIMING_INDICATORS.filter((name) => present[name] === null);
      return neutralSignal('timing', `Timing reading missing ${missing.join(', ')}`, context);
    }

    const zones: Record<TimingIndicator, ZoneClassification> = {
      line: this.matcher.classify(instrumentId, timeframe, 'line', line),
      signal: this.matcher.classify(instrumentId, timeframe, 'signal', signal),
      histogram: this.matcher.classify(instrumentId, timeframe, 'histogram', histogram),
    };

    const bullish = TIMING_INDICATORS.filter((name) => zones[name].rank.side === 'bullish');
    const bearish = TIMING_INDICATORS.filter((name) => zones[name].rank.side === 'bearish');
    let direction: Direction = 'NEUTRAL';
    let winners: TimingIndicator[] = [];
    if (bullish.length >= 2) {
      direction = 'BUY';
      winners = bullish;
    } else if (bearish.length >= 2) {
      direction = 'SELL';
      winners = bearish;
    }

    const strength = clamp01(
      winners.reduce((sum, name) => sum + this.weights[name] * zones[name].rank.extremity, 0)
    );
    const zoneSummary = TIMING_INDICATORS.map((name) => `${name}=${zones[name].zone}`).join(', ');
    const rationale =
      direction === 'NEUTRAL'
        ? `Timing zones split (${zoneSummary})`
        : `Timing ${direction === 'BUY' ? 'bullish' : 'bearish'} on ${winners.length}/3 zones (${zoneSummary})`;

    return createIndicatorSignal({
      source: 'timing',
      direction,
      strength,
      rationale,
      details: {
        line,
        signal,
        histogram,
        lineZone: zones.line.zone,
        signalZone: zones.signal.zone,
        histogramZone: zones.histogram.zone,
        thresholdSource: zones.line.source,
      },
      instrumentId,
      timeframe,
    });
  }
}
