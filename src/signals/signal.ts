import type {
  ComponentDetail,
  Direction,
  IndicatorKind,
  Signal,
  SignalComponent,
  SignalType,
} from './types.js';

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function toFiniteOrNull(value: unknown): number | null {
  if (typeof value !== 'number') return null;
  return Number.isFinite(value) ? value : null;
}

export function directionOf(signalType: SignalType): Direction {
  switch (signalType) {
    case 'STRONG_BUY':
    case 'BUY':
    case 'WEAK_BUY':
      return 'BUY';
    case 'STRONG_SELL':
    case 'SELL':
    case 'WEAK_SELL':
      return 'SELL';
    case 'NEUTRAL':
      return 'NEUTRAL';
  }
}

export function oppositeOf(direction: Direction): Direction {
  if (direction === 'BUY') return 'SELL';
  if (direction === 'SELL') return 'BUY';
  return 'NEUTRAL';
}

export interface SignalInput {
  signalType: SignalType;
  strength: number;
  /** Defaults to the clamped strength. */
  confidence?: number;
  rationale: string;
  components?: readonly SignalComponent[];
  instrumentId?: string | null;
  timeframe?: string | null;
}

export function createSignal(input: SignalInput): Signal {
  const strength = clamp01(input.strength);
  const components = (input.components ?? []).map((component) =>
    Object.freeze({ ...component, details: Object.freeze({ ...component.details }) })
  );
  return Object.freeze({
    direction: directionOf(input.signalType),
    strength,
    signalType: input.signalType,
    confidence: clamp01(input.confidence ?? strength),
    rationale: input.rationale,
    components: Object.freeze(components),
    instrumentId: input.instrumentId ?? null,
    timeframe: input.timeframe ?? null,
  });
}

/**
 * Single-indicator signal: BUY/SELL/NEUTRAL map onto the plain signal types,
 * confidence mirrors strength, and the breakdown holds the one component.
 */
export function createIndicatorSignal(params: {
  source: IndicatorKind;
  direction: Direction;
  strength: number;
  rationale: string;
  details?: Record<string, ComponentDetail>;
  instrumentId?: string | null;
  timeframe?: string | null;
}): Signal {
  const strength = params.direction === 'NEUTRAL' ? 0 : clamp01(params.strength);
  return createSignal({
    signalType: params.direction,
    strength,
    rationale: params.rationale,
    components: [
      {
        source: params.source,
        direction: params.direction,
        strength,
        rationale: params.rationale,
        details: params.details ?? {},
      },
    ],
    instrumentId: params.instrumentId,
    timeframe: params.timeframe,
  });
}

export function neutralSignal(
  source: IndicatorKind,
  rationale: string,
  context: { instrumentId?: string | null; timeframe?: string | null } = {}
): Signal {
  return createIndicatorSignal({
    source,
    direction: 'NEUTRAL',
    strength: 0,
    rationale,
    instrumentId: context.instrumentId,
    timeframe: context.timeframe,
  });
}

export function withContext(
  signal: Signal,
  context: { instrumentId: string | null; timeframe: string | null }
): Signal {
  return createSignal({ ...signal, ...context });
}
