import type { InstrumentProfile, ResolvedRules, ZoneThreshold } from './types.js';
import { ThresholdConfigError, validateRuleGroup, validateZoneOrder } from './validate.js';
import { ZoneOrderSet, type ZoneOrder } from './zones.js';

export const DEFAULT_MARKET = 'GLOBAL';

export interface ThresholdBookInput {
  instrumentRules?: readonly ZoneThreshold[];
  marketRules?: readonly ZoneThreshold[];
  zoneOrders?: Record<string, readonly string[]>;
  instruments?: Record<string, InstrumentProfile>;
  /** Exchange code to market classification, e.g. HOSE -> VN. */
  exchanges?: Record<string, string>;
  defaultMarket?: string;
}

function groupKey(ownerId: string, timeframe: string, indicatorName: string): string {
  return `${ownerId}\u0000${timeframe}\u0000${indicatorName}`;
}

/**
 * Immutable zone thresholds for every instrument and market template, grouped
 * by (owner, timeframe, indicator) and sorted in evaluation order. Construction
 * validates everything and throws {@link ThresholdConfigError} on bad input.
 */
export class ThresholdBook {
  readonly zoneOrders: ZoneOrderSet;
  private readonly instrumentGroups: Map<string, readonly ZoneThreshold[]>;
  private readonly marketGroups: Map<string, readonly ZoneThreshold[]>;
  private readonly instruments: Map<string, InstrumentProfile>;
  private readonly exchanges: Map<string, string>;
  private readonly defaultMarket: string;

  constructor(input: ThresholdBookInput = {}) {
    const issues: string[] = [];
    for (const [name, zones] of Object.entries(input.zoneOrders ?? {})) {
      issues.push(...validateZoneOrder(name, zones));
    }
    if (issues.length > 0) {
      throw new ThresholdConfigError(issues);
    }

    this.zoneOrders = new ZoneOrderSet(input.zoneOrders);
    this.instrumentGroups = this.groupRules(input.instrumentRules ?? [], issues);
    this.marketGroups = this.groupRules(input.marketRules ?? [], issues);
    if (issues.length > 0) {
      throw new ThresholdConfigError(issues);
    }

    this.instruments = new Map(Object.entries(input.instruments ?? {}));
    this.exchanges = new Map(
      Object.entries(input.exchanges ?? {}).map(([exchange, market]) => [exchange.toUpperCase(), market])
    );
    this.defaultMarket = input.defaultMarket ?? DEFAULT_MARKET;
  }

  static empty(): ThresholdBook {
    return new ThresholdBook();
  }

  zoneOrder(indicatorName: string): ZoneOrder {
    return this.zoneOrders.forIndicator(indicatorName);
  }

  marketFor(instrumentId: string): string {
    const profile = this.instruments.get(instrumentId);
    if (profile?.market) return profile.market;
    if (profile?.exchange) {
      const market = this.exchanges.get(profile.exchange.toUpperCase());
      if (market) return market;
    }
    return this.defaultMarket;
  }

  resolve(instrumentId: string, timeframe: string, indicatorName: string): ResolvedRules {
    const own = this.instrumentGroups.get(groupKey(instrumentId, timeframe, indicatorName));
    if (own && own.length > 0) {
      return { source: 'instrument', market: null, rules: own };
    }
    const market = this.marketFor(instrumentId);
    const template = this.marketGroups.get(groupKey(market, timeframe, indicatorName));
    if (template && template.length > 0) {
      return { source: 'market', market, rules: template };
    }
    return { source: 'none', market, rules: [] };
  }

  stats(): { instrumentGroups: number; marketGroups: number; rules: number } {
    let rules = 0;
    for (const group of this.instrumentGroups.values()) rules += group.length;
    for (const group of this.marketGroups.values()) rules += group.length;
    return {
      instrumentGroups: this.instrumentGroups.size,
      marketGroups: this.marketGroups.size,
      rules,
    };
  }

  private groupRules(
    rules: readonly ZoneThreshold[],
    issues: string[]
  ): Map<string, readonly ZoneThreshold[]> {
    const buckets = new Map<string, ZoneThreshold[]>();
    for (const rule of rules) {
      const key = groupKey(rule.ownerId, rule.timeframe, rule.indicatorName);
      const bucket = buckets.get(key) ?? [];
      bucket.push(Object.freeze({ ...rule }));
      buckets.set(key, bucket);
    }

    const groups = new Map<string, readonly ZoneThreshold[]>();
    for (const [key, bucket] of buckets) {
      const order = this.zoneOrders.forIndicator(bucket[0].indicatorName);
      bucket.sort((a, b) => order.compare(a.zoneName, b.zoneName));
      issues.push(...validateRuleGroup(bucket, order));
      groups.set(key, Object.freeze(bucket));
    }
    return groups;
  }
}
