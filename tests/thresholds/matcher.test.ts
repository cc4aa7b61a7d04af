import { describe, expect, it } from 'vitest';

import { ThresholdBook } from '../../src/thresholds/book.js';
import { ZoneThresholdMatcher } from '../../src/thresholds/matcher.js';
import type { ComparisonOperator, ZoneThreshold } from '../../src/thresholds/types.js';

function rule(
  ownerId: string,
  timeframe: string,
  indicatorName: string,
  zoneName: string,
  comparison: ComparisonOperator,
  minValue: number,
  maxValue: number | null = null
): ZoneThreshold {
  return { ownerId, timeframe, indicatorName, zoneName, comparison, minValue, maxValue };
}

function lineLadder(ownerId: string): ZoneThreshold[] {
  return [
    rule(ownerId, '1h', 'line', 'pos', 'between', 0.1, 0.49),
    rule(ownerId, '1h', 'line', 'bear', '<=', -0.5),
    rule(ownerId, '1h', 'line', 'greed', '>=', 1.5),
    rule(ownerId, '1h', 'line', 'neg', 'between', -0.49, -0.1),
    rule(ownerId, '1h', 'line', 'bull', 'between', 0.5, 1.4),
  ];
}

function buildBook(): ThresholdBook {
  return new ThresholdBook({
    instrumentRules: lineLadder('AAPL'),
    marketRules: [
      rule('US', '1h', 'line', 'greed', '>=', 3),
      rule('US', '1h', 'signal', 'bull', '>=', 1),
      rule('VN', '1h', 'line', 'fear', '<', -2),
    ],
    instruments: {
      AAPL: { market: 'US' },
      MSFT: { exchange: 'nasdaq' },
      VNM: { exchange: 'HOSE' },
    },
    exchanges: { NASDAQ: 'US', HOSE: 'VN' },
  });
}

describe('ZoneThresholdMatcher', () => {
  const matcher = new ZoneThresholdMatcher(buildBook());

  it('classifies values against the instrument ladder', () => {
    expect(matcher.match('AAPL', '1h', 'line', 2)).toBe('greed');
    expect(matcher.match('AAPL', '1h', 'line', 1.5)).toBe('greed');
    expect(matcher.match('AAPL', '1h', 'line', 0.8)).toBe('bull');
    expect(matcher.match('AAPL', '1h', 'line', 0.3)).toBe('pos');
    expect(matcher.match('AAPL', '1h', 'line', -0.3)).toBe('neg');
    expect(matcher.match('AAPL', '1h', 'line', -4)).toBe('bear');
  });

  it('treats both between bounds as inclusive', () => {
    expect(matcher.match('AAPL', '1h', 'line', 0.5)).toBe('bull');
    expect(matcher.match('AAPL', '1h', 'line', 1.4)).toBe('bull');
    expect(matcher.match('AAPL', '1h', 'line', -0.49)).toBe('neg');
  });

  it('returns the neutral sentinel when no zone matches', () => {
    expect(matcher.match('AAPL', '1h', 'line', 0)).toBe('neutral');
    expect(matcher.match('AAPL', '1h', 'line', 1.45)).toBe('neutral');
  });

  it('returns neutral for non-finite values', () => {
    expect(matcher.match('AAPL', '1h', 'line', Number.NaN)).toBe('neutral');
    expect(matcher.match('AAPL', '1h', 'line', Number.POSITIVE_INFINITY)).toBe('neutral');
  });

  it('is deterministic for repeated lookups', () => {
    const first = matcher.classify('AAPL', '1h', 'line', 0.8);
    const second = matcher.classify('AAPL', '1h', 'line', 0.8);
    expect(second).toEqual(first);
    expect(first.rank).toEqual({ side: 'bullish', extremity: 0.5, index: 2 });
    expect(first.source).toBe('instrument');
  });

  it('falls back to the market template when the instrument has no rules for the key', () => {
    const signal = matcher.classify('AAPL', '1h', 'signal', 1.2);
    expect(signal.zone).toBe('bull');
    expect(signal.source).toBe('market');
  });

  it('maps the exchange to a market case-insensitively', () => {
    const result = matcher.classify('MSFT', '1h', 'line', 3.2);
    expect(result).toMatchObject({ zone: 'greed', source: 'market' });
    expect(matcher.match('VNM', '1h', 'line', -2.5)).toBe('fear');
  });

  it('returns neutral with source none when neither instrument nor market has rules', () => {
    const result = matcher.classify('XYZ', '1h', 'line', 99);
    expect(result.zone).toBe('neutral');
    expect(result.source).toBe('none');
    expect(matcher.resolve('XYZ', '1h', 'line')).toEqual({ source: 'none', market: 'GLOBAL', rules: [] });
  });

  it('resolves each timeframe independently', () => {
    expect(matcher.match('AAPL', '4h', 'line', 2)).toBe('neutral');
  });

  it('orders resolved rules from most to least extreme', () => {
    const resolved = matcher.resolve('AAPL', '1h', 'line');
    expect(resolved.rules.map((entry) => entry.zoneName)).toEqual(['greed', 'bull', 'bear', 'pos', 'neg']);
  });
});
