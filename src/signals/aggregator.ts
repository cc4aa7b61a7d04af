import type { AggregatedSignal, Direction, EmissionPolicy, Signal } from './types.js';

const DIRECTIONS: readonly Direction[] = ['BUY', 'SELL', 'NEUTRAL'];

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Merges per-timeframe hybrid signals for one instrument. Direction is a plain
 * majority vote (any tie for the top count resolves to NEUTRAL); confidence is
 * the arithmetic mean. No thresholds are applied here.
 */
export class TimeframeAggregator {
  aggregate(perTimeframeSignals: readonly Signal[]): AggregatedSignal {
    const signals = [...perTimeframeSignals];
    const votes: Record<Direction, number> = { BUY: 0, SELL: 0, NEUTRAL: 0 };
    for (const signal of signals) {
      votes[signal.direction] += 1;
    }

    const top = Math.max(...DIRECTIONS.map((direction) => votes[direction]));
    const leaders = DIRECTIONS.filter((direction) => votes[direction] === top);
    const overallDirection: Direction = signals.length > 0 && leaders.length === 1 ? leaders[0] : 'NEUTRAL';

    const agreeing = signals.filter((signal) => signal.direction === overallDirection);
    return Object.freeze({
      instrumentId: signals.find((signal) => signal.instrumentId !== null)?.instrumentId ?? null,
      overallDirection,
      overallConfidence: mean(signals.map((signal) => signal.confidence)),
      overallStrength:
        overallDirection === 'NEUTRAL' ? 0 : mean(agreeing.map((signal) => signal.strength)),
      perTimeframe: Object.freeze(signals),
      agreementRatio: signals.length === 0 ? 0 : agreeing.length / signals.length,
      votes: Object.freeze(votes),
    });
  }
}

/**
 * `unanimous` needs every timeframe on the overall direction, `majority` more
 * than half. A NEUTRAL aggregate never qualifies.
 */
export function meetsEmissionPolicy(aggregate: AggregatedSignal, policy: EmissionPolicy): boolean {
  if (aggregate.overallDirection === 'NEUTRAL') return false;
  if (policy === 'unanimous') return aggregate.agreementRatio === 1;
  return aggregate.agreementRatio > 0.5;
}
