import type { AggregatedSignal, Signal } from '../signals/types.js';

function fixed(value: number): string {
  return value.toFixed(2);
}

export function formatSignalMessage(signal: Signal): string {
  const lines = [
    `Signal: ${signal.signalType} (${signal.direction})`,
    `Instrument: ${signal.instrumentId ?? 'n/a'}`,
    `Timeframe: ${signal.timeframe ?? 'n/a'}`,
    `Strength: ${fixed(signal.strength)}`,
    `Confidence: ${fixed(signal.confidence)}`,
    `Rationale: ${signal.rationale}`,
  ];
  if (signal.components.length > 0) {
    lines.push('Components:');
    for (const component of signal.components) {
      lines.push(
        `- ${component.source} ${component.direction} ${fixed(component.strength)}: ${component.rationale}`
      );
    }
  }
  return lines.join('\n');
}

export function formatAggregateSummary(aggregate: AggregatedSignal): string {
  const votes = `BUY=${aggregate.votes.BUY} SELL=${aggregate.votes.SELL} NEUTRAL=${aggregate.votes.NEUTRAL}`;
  const lines = [
    `${aggregate.instrumentId ?? 'n/a'}: ${aggregate.overallDirection}` +
      ` (confidence ${fixed(aggregate.overallConfidence)}, agreement ${fixed(aggregate.agreementRatio)}, ${votes})`,
  ];
  for (const signal of aggregate.perTimeframe) {
    lines.push(
      `  ${signal.timeframe ?? 'n/a'}: ${signal.signalType} strength ${fixed(signal.strength)} - ${signal.rationale}`
    );
  }
  return lines.join('\n');
}
