export const COMPARISON_OPERATORS = ['>', '>=', '<', '<=', 'between'] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export const NEUTRAL_ZONE = 'neutral';

export const DEFAULT_ZONE_ORDER: readonly string[] = [
  'igr',
  'greed',
  'bull',
  'pos',
  NEUTRAL_ZONE,
  'neg',
  'bear',
  'fear',
  'panic',
];

/** Bar size is a magnitude, so only the bullish half of the scale applies. */
export const DEFAULT_BARS_ZONE_ORDER: readonly string[] = DEFAULT_ZONE_ORDER.slice(
  0,
  DEFAULT_ZONE_ORDER.indexOf(NEUTRAL_ZONE) + 1
);

export interface ZoneThreshold {
  /** Instrument id for instrument rules, market classification for templates. */
  ownerId: string;
  timeframe: string;
  indicatorName: string;
  zoneName: string;
  comparison: ComparisonOperator;
  minValue: number;
  maxValue: number | null;
}

export type ZoneSide = 'bullish' | 'bearish' | 'neutral';

export interface ZoneRank {
  side: ZoneSide;
  /** 0 for neutral, 1 for the most extreme zone on its side. */
  extremity: number;
  /** Position in the zone order, used to keep ties stable. */
  index: number;
}

export type RuleSource = 'instrument' | 'market' | 'none';

export interface ResolvedRules {
  source: RuleSource;
  /** Market classification used for the lookup, when the instrument had no rules. */
  market: string | null;
  /** Already ordered from most to least extreme. */
  rules: readonly ZoneThreshold[];
}

export interface InstrumentProfile {
  market?: string;
  exchange?: string;
}
