import type { ZoneThresholdMatcher } from '../thresholds/matcher.js';
import type { IndicatorKind, IndicatorReading, Signal } from '../signals/types.js';
import { MomentumEvaluator } from './momentum.js';
import { TimingEvaluator, type TimingWeights } from './timing.js';
import { TrendEvaluator } from './trend.js';

export { MomentumEvaluator } from './momentum.js';
export { TimingEvaluator } from './timing.js';
export { TrendEvaluator, classifyTrendStack } from './trend.js';

type Scalar = number | null | undefined;

export type EvaluatorInput =
  | {
      kind: 'trend';
      price: Scalar;
      maShort1: Scalar;
      maShort2: Scalar;
      maShort3: Scalar;
      maLong: Scalar;
      confirmedByHigherTimeframe?: boolean;
    }
  | { kind: 'timing'; line: Scalar; signal: Scalar; histogram: Scalar }
  | { kind: 'momentum'; histogram: Scalar };

export interface EvaluatorSet {
  trend: TrendEvaluator;
  timing: TimingEvaluator;
  momentum: MomentumEvaluator;
}

export interface EvaluatorSettings {
  strengthScale?: number;
  timingWeights?: Partial<TimingWeights>;
}

export function createEvaluators(
  matcher: ZoneThresholdMatcher,
  settings: EvaluatorSettings = {}
): EvaluatorSet {
  return {
    trend: new TrendEvaluator({ strengthScale: settings.strengthScale }),
    timing: new TimingEvaluator(matcher, settings.timingWeights),
    momentum: new MomentumEvaluator(matcher),
  };
}

export function runEvaluator(
  evaluators: EvaluatorSet,
  input: EvaluatorInput,
  instrumentId: string,
  timeframe: string
): Signal {
  switch (input.kind) {
    case 'trend':
      return evaluators.trend.evaluate(
        input.price,
        input.maShort1,
        input.maShort2,
        input.maShort3,
        input.maLong,
        {
          instrumentId,
          timeframe,
          confirmedByHigherTimeframe: input.confirmedByHigherTimeframe,
        }
      );
    case 'timing':
      return evaluators.timing.evaluate(input.line, input.signal, input.histogram, instrumentId, timeframe);
    case 'momentum':
      return evaluators.momentum.evaluate(input.histogram, instrumentId, timeframe);
    default: {
      const unreachable: never = input;
      throw new Error(`Unknown evaluator input: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function inputFromReading(
  kind: IndicatorKind,
  reading: IndicatorReading,
  confirmedByHigherTimeframe?: boolean
): EvaluatorInput {
  const scalars = reading.scalars;
  switch (kind) {
    case 'trend':
      return {
        kind,
        price: scalars.price,
        maShort1: scalars.maShort1,
        maShort2: scalars.maShort2,
        maShort3: scalars.maShort3,
        maLong: scalars.maLong,
        confirmedByHigherTimeframe,
      };
    case 'timing':
      return {
        kind,
        line: scalars.macd,
        signal: scalars.macdSignal,
        histogram: scalars.macdHistogram,
      };
    case 'momentum':
      return { kind, histogram: scalars.macdHistogram };
  }
}
