import { describe, expect, it } from 'vitest';

import { TimeframeAggregator, meetsEmissionPolicy } from '../../src/signals/aggregator.js';
import { createSignal } from '../../src/signals/signal.js';
import type { Signal, SignalType } from '../../src/signals/types.js';

function hybrid(signalType: SignalType, strength: number, timeframe: string, confidence?: number): Signal {
  return createSignal({
    signalType,
    strength,
    confidence,
    rationale: 'test',
    instrumentId: 'AAPL',
    timeframe,
  });
}

describe('TimeframeAggregator', () => {
  const aggregator = new TimeframeAggregator();

  it('averages confidence across agreeing timeframes', () => {
    const aggregate = aggregator.aggregate([hybrid('BUY', 0.7, '5m'), hybrid('BUY', 0.7, '1h'), hybrid('BUY', 0.6, '4h')]);

    expect(aggregate.overallDirection).toBe('BUY');
    expect(aggregate.overallConfidence).toBeCloseTo(2 / 3, 10);
    expect(aggregate.overallStrength).toBeCloseTo(2 / 3, 10);
    expect(aggregate.agreementRatio).toBe(1);
    expect(aggregate.instrumentId).toBe('AAPL');
    expect(aggregate.votes).toEqual({ BUY: 3, SELL: 0, NEUTRAL: 0 });
  });

  it('returns the single signal as the aggregate', () => {
    const aggregate = aggregator.aggregate([hybrid('STRONG_SELL', 0.9, '1h', 0.8)]);

    expect(aggregate.overallDirection).toBe('SELL');
    expect(aggregate.overallConfidence).toBe(0.8);
    expect(aggregate.overallStrength).toBe(0.9);
    expect(aggregate.agreementRatio).toBe(1);
    expect(aggregate.perTimeframe).toHaveLength(1);
  });

  it('takes the majority direction and counts WEAK types with their direction', () => {
    const aggregate = aggregator.aggregate([
      hybrid('WEAK_BUY', 0.2, '5m'),
      hybrid('STRONG_BUY', 1, '15m'),
      hybrid('SELL', 0.4, '1h'),
    ]);

    expect(aggregate.overallDirection).toBe('BUY');
    expect(aggregate.agreementRatio).toBeCloseTo(2 / 3, 10);
    expect(aggregate.overallStrength).toBeCloseTo(0.6, 10);
    expect(aggregate.overallConfidence).toBeCloseTo(1.6 / 3, 10);
  });

  it('resolves a tie for the top count to NEUTRAL', () => {
    const aggregate = aggregator.aggregate([hybrid('BUY', 0.5, '5m'), hybrid('SELL', 0.5, '1h')]);

    expect(aggregate.overallDirection).toBe('NEUTRAL');
    expect(aggregate.overallStrength).toBe(0);
    expect(aggregate.agreementRatio).toBe(0);
    expect(aggregate.overallConfidence).toBe(0.5);
  });

  it('lets a NEUTRAL majority win', () => {
    const aggregate = aggregator.aggregate([
      hybrid('NEUTRAL', 0, '5m'),
      hybrid('NEUTRAL', 0, '15m'),
      hybrid('BUY', 0.9, '1h'),
    ]);

    expect(aggregate.overallDirection).toBe('NEUTRAL');
    expect(aggregate.agreementRatio).toBeCloseTo(2 / 3, 10);
  });

  it('handles an empty list', () => {
    const aggregate = aggregator.aggregate([]);

    expect(aggregate).toMatchObject({
      instrumentId: null,
      overallDirection: 'NEUTRAL',
      overallConfidence: 0,
      overallStrength: 0,
      agreementRatio: 0,
    });
  });
});

describe('meetsEmissionPolicy', () => {
  const aggregator = new TimeframeAggregator();
  const unanimous = aggregator.aggregate([hybrid('BUY', 0.5, '5m'), hybrid('BUY', 0.5, '1h')]);
  const twoOfThree = aggregator.aggregate([hybrid('BUY', 0.5, '5m'), hybrid('BUY', 0.5, '1h'), hybrid('SELL', 0.5, '4h')]);
  const split = aggregator.aggregate([hybrid('BUY', 0.5, '5m'), hybrid('SELL', 0.5, '1h')]);

  it('requires every timeframe to agree under unanimous', () => {
    expect(meetsEmissionPolicy(unanimous, 'unanimous')).toBe(true);
    expect(meetsEmissionPolicy(twoOfThree, 'unanimous')).toBe(false);
  });

  it('requires more than half to agree under majority', () => {
    expect(meetsEmissionPolicy(twoOfThree, 'majority')).toBe(true);
    expect(meetsEmissionPolicy(split, 'majority')).toBe(false);
  });
});
