import { clamp01, createSignal, oppositeOf } from './signal.js';
import type { Direction, Signal, SignalComponent, SignalType } from './types.js';

export interface CombinerOptions {
  /**
   * 2-of-3 majorities are downgraded to WEAK_* when the mean strength of the two
   * agreeing signals is below `dissent.strength * weakMajorityRatio` and the
   * third signal points the other way.
   */
  weakMajorityRatio?: number;
  /** Added to confidence when every directional input agrees. */
  agreementBonus?: number;
  /** Subtracted from confidence when inputs point in opposite directions. */
  conflictPenalty?: number;
}

const SINGLE_SOURCE_DAMPING = 0.7;
const CONFLICT_DAMPING = 0.3;
const MAJORITY_DAMPING = 0.8;

const LABELS: Record<Direction, string> = {
  BUY: 'bullish',
  SELL: 'bearish',
  NEUTRAL: 'neutral',
};

function strongOf(direction: Exclude<Direction, 'NEUTRAL'>): SignalType {
  return direction === 'BUY' ? 'STRONG_BUY' : 'STRONG_SELL';
}

function weakOf(direction: Exclude<Direction, 'NEUTRAL'>): SignalType {
  return direction === 'BUY' ? 'WEAK_BUY' : 'WEAK_SELL';
}

function componentsOf(signals: readonly Signal[]): SignalComponent[] {
  return signals.flatMap((signal) => signal.components);
}

function sourceName(signal: Signal, fallback: string): string {
  return signal.components.length === 1 ? signal.components[0].source : fallback;
}

function contextOf(signals: readonly Signal[]): { instrumentId: string | null; timeframe: string | null } {
  return {
    instrumentId: signals.find((signal) => signal.instrumentId !== null)?.instrumentId ?? null,
    timeframe: signals.find((signal) => signal.timeframe !== null)?.timeframe ?? null,
  };
}

/**
 * Merges per-indicator signals for one timeframe into a hybrid signal. The
 * two-input table and the three-input majority vote are fixed; only the
 * weak-majority boundary and the confidence adjustments are tunable.
 */
export class SignalCombiner {
  readonly weakMajorityRatio: number;
  readonly agreementBonus: number;
  readonly conflictPenalty: number;

  constructor(options: CombinerOptions = {}) {
    this.weakMajorityRatio = Math.max(0, options.weakMajorityRatio ?? 1);
    this.agreementBonus = clamp01(options.agreementBonus ?? 0.2);
    this.conflictPenalty = clamp01(options.conflictPenalty ?? 0.3);
  }

  combine(trend: Signal, timing: Signal): Signal {
    const t = trend.direction;
    const m = timing.direction;
    const trendName = sourceName(trend, 'trend');
    const timingName = sourceName(timing, 'timing');

    let signalType: SignalType;
    let strength: number;
    let rationale: string;

    if (t !== 'NEUTRAL' && t === m) {
      signalType = strongOf(t);
      strength = Math.min(trend.strength + timing.strength, 1);
      rationale = `Both ${trendName} and ${timingName} ${LABELS[t]}`;
    } else if (t !== 'NEUTRAL' && m === 'NEUTRAL') {
      signalType = t;
      strength = trend.strength * SINGLE_SOURCE_DAMPING;
      rationale = `${trendName} ${LABELS[t]}, ${timingName} neutral`;
    } else if (t === 'NEUTRAL' && m !== 'NEUTRAL') {
      signalType = m;
      strength = timing.strength * SINGLE_SOURCE_DAMPING;
      rationale = `${timingName} ${LABELS[m]}, ${trendName} neutral`;
    } else if (t !== 'NEUTRAL' && m !== 'NEUTRAL') {
      signalType = weakOf(t);
      strength = Math.abs(trend.strength - timing.strength) * CONFLICT_DAMPING;
      rationale = `${trendName} ${LABELS[t]}, ${timingName} ${LABELS[m]} (conflict)`;
    } else {
      signalType = 'NEUTRAL';
      strength = 0;
      rationale = `Both ${trendName} and ${timingName} neutral`;
    }

    return this.build([trend, timing], signalType, strength, rationale);
  }

  combineThree(trend: Signal, timing: Signal, momentum: Signal): Signal {
    const inputs = [trend, timing, momentum];
    const names = [sourceName(trend, 'trend'), sourceName(timing, 'timing'), sourceName(momentum, 'momentum')];
    const summary = inputs.map((signal, index) => `${names[index]} ${LABELS[signal.direction]}`).join(', ');
    const total = inputs.reduce((sum, signal) => sum + signal.strength, 0);
    const buys = inputs.filter((signal) => signal.direction === 'BUY').length;
    const sells = inputs.filter((signal) => signal.direction === 'SELL').length;

    if (buys === 3 || sells === 3) {
      const direction = buys === 3 ? 'BUY' : 'SELL';
      return this.build(
        inputs,
        strongOf(direction),
        Math.min(total, 1),
        `All three ${LABELS[direction]} (${summary})`
      );
    }

    if (buys === 2 || sells === 2) {
      const direction = buys === 2 ? 'BUY' : 'SELL';
      const agreeing = inputs.filter((signal) => signal.direction === direction);
      const dissent = inputs.find((signal) => signal.direction !== direction);
      const majorityStrength = (agreeing[0].strength + agreeing[1].strength) / 2;
      const weak =
        dissent !== undefined &&
        dissent.direction === oppositeOf(direction) &&
        majorityStrength < dissent.strength * this.weakMajorityRatio;
      return this.build(
        inputs,
        weak ? weakOf(direction) : direction,
        (total / 3) * MAJORITY_DAMPING,
        weak
          ? `2/3 ${LABELS[direction]} but outweighed by dissent (${summary})`
          : `2/3 ${LABELS[direction]} (${summary})`
      );
    }

    return this.build(inputs, 'NEUTRAL', 0, `No majority (${summary})`);
  }

  private build(inputs: readonly Signal[], signalType: SignalType, strength: number, rationale: string): Signal {
    const clamped = clamp01(strength);
    const directional = inputs.filter((signal) => signal.direction !== 'NEUTRAL');
    const hasBuy = directional.some((signal) => signal.direction === 'BUY');
    const hasSell = directional.some((signal) => signal.direction === 'SELL');

    let confidence = clamped;
    if (directional.length >= 2 && hasBuy !== hasSell) {
      confidence += this.agreementBonus;
    }
    if (hasBuy && hasSell) {
      confidence -= this.conflictPenalty;
    }

    return createSignal({
      signalType,
      strength: clamped,
      confidence,
      rationale,
      components: componentsOf(inputs),
      ...contextOf(inputs),
    });
  }
}
