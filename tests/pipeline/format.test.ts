import { describe, expect, it } from 'vitest';

import { formatAggregateSummary, formatSignalMessage } from '../../src/pipeline/format.js';
import { TimeframeAggregator } from '../../src/signals/aggregator.js';
import { SignalCombiner } from '../../src/signals/combiner.js';
import { createIndicatorSignal, createSignal } from '../../src/signals/signal.js';

describe('formatSignalMessage', () => {
  it('renders the signal and its component breakdown', () => {
    const context = { instrumentId: 'AAPL', timeframe: '1h' };
    const signal = new SignalCombiner().combine(
      createIndicatorSignal({ source: 'trend', direction: 'BUY', strength: 0.4, rationale: 'Local bullish stack', ...context }),
      createIndicatorSignal({ source: 'timing', direction: 'BUY', strength: 0.35, rationale: 'Timing bullish on 2/3 zones', ...context })
    );

    expect(formatSignalMessage(signal)).toBe(
      [
        'Signal: STRONG_BUY (BUY)',
        'Instrument: AAPL',
        'Timeframe: 1h',
        'Strength: 0.75',
        'Confidence: 0.95',
        'Rationale: Both trend and timing bullish',
        'Components:',
        '- trend BUY 0.40: Local bullish stack',
        '- timing BUY 0.35: Timing bullish on 2/3 zones',
      ].join('\n')
    );
  });

  it('omits the component section when there are none', () => {
    const signal = createSignal({ signalType: 'NEUTRAL', strength: 0, rationale: 'nothing to see' });

    expect(formatSignalMessage(signal)).toBe(
      [
        'Signal: NEUTRAL (NEUTRAL)',
        'Instrument: n/a',
        'Timeframe: n/a',
        'Strength: 0.00',
        'Confidence: 0.00',
        'Rationale: nothing to see',
      ].join('\n')
    );
  });
});

describe('formatAggregateSummary', () => {
  it('lists the overall vote and each timeframe', () => {
    const aggregate = new TimeframeAggregator().aggregate([
      createSignal({ signalType: 'BUY', strength: 0.5, rationale: 'up', instrumentId: 'VNM', timeframe: '15m' }),
      createSignal({ signalType: 'WEAK_SELL', strength: 0.1, rationale: 'split', instrumentId: 'VNM', timeframe: '1h' }),
    ]);

    expect(formatAggregateSummary(aggregate)).toBe(
      [
        'VNM: NEUTRAL (confidence 0.30, agreement 0.00, BUY=1 SELL=1 NEUTRAL=0)',
        '  15m: BUY strength 0.50 - up',
        '  1h: WEAK_SELL strength 0.10 - split',
      ].join('\n')
    );
  });
});
