import { describe, expect, it } from 'vitest';

import { TimingEvaluator } from '../../src/evaluators/timing.js';
import { ThresholdBook } from '../../src/thresholds/book.js';
import { ZoneThresholdMatcher } from '../../src/thresholds/matcher.js';
import type { ComparisonOperator, ZoneThreshold } from '../../src/thresholds/types.js';

function ladder(indicatorName: string): ZoneThreshold[] {
  const rows: Array<[string, ComparisonOperator, number]> = [
    ['greed', '>=', 2],
    ['bull', '>', 1],
    ['pos', '>', 0.2],
    ['neg', '<', -0.2],
    ['bear', '<', -1],
  ];
  return rows.map(([zoneName, comparison, minValue]) => ({
    ownerId: 'GLOBAL',
    timeframe: '1h',
    indicatorName,
    zoneName,
    comparison,
    minValue,
    maxValue: null,
  }));
}

const matcher = new ZoneThresholdMatcher(
  new ThresholdBook({ marketRules: [...ladder('line'), ...ladder('signal'), ...ladder('histogram')] })
);

describe('TimingEvaluator', () => {
  const evaluator = new TimingEvaluator(matcher);

  it('emits BUY when all three zones are bullish, weighting zone extremity', () => {
    const signal = evaluator.evaluate(1.5, 2.5, 0.5, 'AAPL', '1h');

    expect(signal.direction).toBe('BUY');
    expect(signal.strength).toBeCloseTo(0.55, 10);
    expect(signal.rationale).toBe('Timing bullish on 3/3 zones (line=bull, signal=greed, histogram=pos)');
    expect(signal.components[0].details).toMatchObject({
      lineZone: 'bull',
      signalZone: 'greed',
      histogramZone: 'pos',
      thresholdSource: 'market',
    });
  });

  it('emits BUY on two bullish zones and counts only those toward strength', () => {
    const signal = evaluator.evaluate(1.5, 0.5, -0.5, 'AAPL', '1h');

    expect(signal.direction).toBe('BUY');
    expect(signal.strength).toBeCloseTo(0.3, 10);
    expect(signal.rationale).toBe('Timing bullish on 2/3 zones (line=bull, signal=pos, histogram=neg)');
  });

  it('emits SELL on bearish zones', () => {
    const signal = evaluator.evaluate(-1.5, -1.5, -0.5, 'AAPL', '1h');

    expect(signal.direction).toBe('SELL');
    expect(signal.strength).toBeCloseTo(0.45, 10);
  });

  it('stays neutral when the zones split', () => {
    const signal = evaluator.evaluate(1.5, 0, -1.5, 'AAPL', '1h');

    expect(signal.direction).toBe('NEUTRAL');
    expect(signal.strength).toBe(0);
    expect(signal.rationale).toBe('Timing zones split (line=bull, signal=neutral, histogram=bear)');
  });

  it('clamps weighted strength to 1', () => {
    const heavy = new TimingEvaluator(matcher, { line: 1, signal: 1, histogram: 1 });
    expect(heavy.evaluate(1.5, 2.5, 0.5, 'AAPL', '1h').strength).toBe(1);
  });

  it('returns neutral when a scalar is missing', () => {
    const signal = evaluator.evaluate(1.5, Number.NaN, 0.5, 'AAPL', '1h');

    expect(signal.direction).toBe('NEUTRAL');
    expect(signal.rationale).toBe('Timing reading missing signal');
    expect(signal.instrumentId).toBe('AAPL');
    expect(signal.timeframe).toBe('1h');
  });

  it('stays neutral without any thresholds for the timeframe', () => {
    const signal = evaluator.evaluate(5, 5, 5, 'AAPL', '4h');
    expect(signal.direction).toBe('NEUTRAL');
  });
});
