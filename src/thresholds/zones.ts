import {
  DEFAULT_BARS_ZONE_ORDER,
  DEFAULT_ZONE_ORDER,
  NEUTRAL_ZONE,
  type ComparisonOperator,
  type ZoneRank,
  type ZoneThreshold,
} from './types.js';

const NEUTRAL_RANK: ZoneRank = { side: 'neutral', extremity: 0, index: -1 };

/**
 * Ordered list of zone names for one indicator, from the most bullish extreme to
 * the most bearish one. Zones before `neutral` sit on the bullish side.
 */
export class ZoneOrder {
  private readonly ranks = new Map<string, ZoneRank>();

  constructor(readonly zones: readonly string[]) {
    const neutralIndex = zones.indexOf(NEUTRAL_ZONE);
    const pivot = neutralIndex === -1 ? zones.length : neutralIndex;
    const bullishSpan = pivot;
    const bearishSpan = zones.length - 1 - pivot;

    zones.forEach((zone, index) => {
      if (this.ranks.has(zone)) return;
      if (index === pivot) {
        this.ranks.set(zone, { ...NEUTRAL_RANK, index });
      } else if (index < pivot) {
        this.ranks.set(zone, {
          side: 'bullish',
          extremity: bullishSpan > 0 ? (pivot - index) / bullishSpan : 0,
          index,
        });
      } else {
        this.ranks.set(zone, {
          side: 'bearish',
          extremity: bearishSpan > 0 ? (index - pivot) / bearishSpan : 0,
          index,
        });
      }
    });
  }

  has(zone: string): boolean {
    return this.ranks.has(zone);
  }

  rank(zone: string): ZoneRank {
    return this.ranks.get(zone) ?? NEUTRAL_RANK;
  }

  /**
   * Evaluation order: most extreme first, bullish before bearish at equal
   * extremity, neutral last.
   */
  compare(a: string, b: string): number {
    const left = this.rank(a);
    const right = this.rank(b);
    if (left.extremity !== right.extremity) return right.extremity - left.extremity;
    if (left.side !== right.side) {
      if (left.side === 'neutral') return 1;
      if (right.side === 'neutral') return -1;
      return left.side === 'bullish' ? -1 : 1;
    }
    return left.index - right.index;
  }
}

export class ZoneOrderSet {
  private readonly orders = new Map<string, ZoneOrder>();
  private readonly fallback: ZoneOrder;

  constructor(orders: Record<string, readonly string[]> = {}) {
    this.fallback = new ZoneOrder(orders.default ?? DEFAULT_ZONE_ORDER);
    this.orders.set('bars', new ZoneOrder(DEFAULT_BARS_ZONE_ORDER));
    for (const [indicator, zones] of Object.entries(orders)) {
      if (indicator === 'default') continue;
      this.orders.set(indicator, new ZoneOrder(zones));
    }
  }

  forIndicator(indicatorName: string): ZoneOrder {
    return this.orders.get(indicatorName) ?? this.fallback;
  }

  entries(): Array<[string, ZoneOrder]> {
    return [['default', this.fallback], ...this.orders.entries()];
  }
}

export function matchesRule(rule: ZoneThreshold, value: number): boolean {
  switch (rule.comparison) {
    case '>':
      return value > rule.minValue;
    case '>=':
      return value >= rule.minValue;
    case '<':
      return value < rule.minValue;
    case '<=':
      return value <= rule.minValue;
    case 'between':
      return rule.maxValue !== null && value >= rule.minValue && value <= rule.maxValue;
  }
}

export type RuleDirection = 'upward' | 'downward' | 'bounded';

export function ruleDirection(comparison: ComparisonOperator): RuleDirection {
  if (comparison === '>' || comparison === '>=') return 'upward';
  if (comparison === '<' || comparison === '<=') return 'downward';
  return 'bounded';
}

interface Region {
  low: number;
  lowInclusive: boolean;
  high: number;
  highInclusive: boolean;
}

function regionOf(rule: ZoneThreshold): Region {
  switch (rule.comparison) {
    case '>':
      return { low: rule.minValue, lowInclusive: false, high: Infinity, highInclusive: false };
    case '>=':
      return { low: rule.minValue, lowInclusive: true, high: Infinity, highInclusive: false };
    case '<':
      return { low: -Infinity, lowInclusive: false, high: rule.minValue, highInclusive: false };
    case '<=':
      return { low: -Infinity, lowInclusive: false, high: rule.minValue, highInclusive: true };
    case 'between':
      return {
        low: rule.minValue,
        lowInclusive: true,
        high: rule.maxValue ?? rule.minValue,
        highInclusive: true,
      };
  }
}

/** True when some value satisfies both rules. */
export function regionsIntersect(a: ZoneThreshold, b: ZoneThreshold): boolean {
  const left = regionOf(a);
  const right = regionOf(b);

  let low = left.low;
  let lowInclusive = left.lowInclusive;
  if (right.low > low) {
    low = right.low;
    lowInclusive = right.lowInclusive;
  } else if (right.low === low) {
    lowInclusive = lowInclusive && right.lowInclusive;
  }

  let high = left.high;
  let highInclusive = left.highInclusive;
  if (right.high < high) {
    high = right.high;
    highInclusive = right.highInclusive;
  } else if (right.high === high) {
    highInclusive = highInclusive && right.highInclusive;
  }

  if (low < high) return true;
  return low === high && lowInclusive && highInclusive;
}
