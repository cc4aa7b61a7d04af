export type Direction = 'BUY' | 'SELL' | 'NEUTRAL';

/** Ordered from most bearish to most bullish. */
export const SIGNAL_TYPES = [
  'STRONG_SELL',
  'SELL',
  'WEAK_SELL',
  'NEUTRAL',
  'WEAK_BUY',
  'BUY',
  'STRONG_BUY',
] as const;

export type SignalType = (typeof SIGNAL_TYPES)[number];

export type IndicatorKind = 'trend' | 'timing' | 'momentum';

export type ComponentDetail = string | number | boolean | null;

export interface SignalComponent {
  source: IndicatorKind;
  direction: Direction;
  strength: number;
  rationale: string;
  details: Readonly<Record<string, ComponentDetail>>;
}

export interface Signal {
  readonly direction: Direction;
  readonly strength: number;
  readonly signalType: SignalType;
  readonly confidence: number;
  readonly rationale: string;
  readonly components: readonly SignalComponent[];
  readonly instrumentId: string | null;
  readonly timeframe: string | null;
}

export interface AggregatedSignal {
  readonly instrumentId: string | null;
  readonly overallDirection: Direction;
  readonly overallConfidence: number;
  readonly overallStrength: number;
  readonly perTimeframe: readonly Signal[];
  readonly agreementRatio: number;
  readonly votes: Readonly<Record<Direction, number>>;
}

export type EmissionPolicy = 'majority' | 'unanimous';

/** Named scalars the trend and timing evaluators read from a reading. */
export interface ReadingScalars {
  price?: number | null;
  maShort1?: number | null;
  maShort2?: number | null;
  maShort3?: number | null;
  maLong?: number | null;
  macd?: number | null;
  macdSignal?: number | null;
  macdHistogram?: number | null;
}

export interface IndicatorReading {
  instrumentId: string;
  timeframe: string;
  timestamp: string | number;
  scalars: ReadingScalars;
}
