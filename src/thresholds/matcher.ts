import type { ThresholdBook } from './book.js';
import { NEUTRAL_ZONE, type ResolvedRules, type RuleSource, type ZoneRank } from './types.js';
import { matchesRule } from './zones.js';

export interface ZoneClassification {
  zone: string;
  rank: ZoneRank;
  source: RuleSource;
}

/**
 * Classifies indicator values into named zones. Instrument rules win, then the
 * market template for the instrument's market, then the neutral sentinel.
 * Within a rule set the most extreme satisfied zone wins.
 */
export class ZoneThresholdMatcher {
  constructor(private readonly book: ThresholdBook) {}

  match(instrumentId: string, timeframe: string, indicatorName: string, value: number): string {
    return this.classify(instrumentId, timeframe, indicatorName, value).zone;
  }

  classify(
    instrumentId: string,
    timeframe: string,
    indicatorName: string,
    value: number
  ): ZoneClassification {
    const order = this.book.zoneOrder(indicatorName);
    const resolved = this.book.resolve(instrumentId, timeframe, indicatorName);
    const neutral: ZoneClassification = {
      zone: NEUTRAL_ZONE,
      rank: order.rank(NEUTRAL_ZONE),
      source: resolved.source,
    };
    if (!Number.isFinite(value)) return neutral;

    const hit = resolved.rules.find((rule) => matchesRule(rule, value));
    if (!hit) return neutral;
    return { zone: hit.zoneName, rank: order.rank(hit.zoneName), source: resolved.source };
  }

  resolve(instrumentId: string, timeframe: string, indicatorName: string): ResolvedRules {
    return this.book.resolve(instrumentId, timeframe, indicatorName);
  }
}
