import { DEFAULT_TIMEFRAMES, parseEngineSettings, type EngineSettings, type SignalEngineConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import {
  classifyTrendStack,
  createEvaluators,
  inputFromReading,
  runEvaluator,
  type EvaluatorSet,
} from '../evaluators/index.js';
import { SqliteDedupeStore } from '../memory/dedupe_store.js';
import { TimeframeAggregator, meetsEmissionPolicy } from '../signals/aggregator.js';
import { SignalCombiner } from '../signals/combiner.js';
import { DeduplicationCache, MemoryDedupeStore } from '../signals/dedupe.js';
import { toFiniteOrNull } from '../signals/signal.js';
import type { AggregatedSignal, IndicatorKind, IndicatorReading, Signal } from '../signals/types.js';
import { buildThresholdBook } from '../thresholds/loader.js';
import { ZoneThresholdMatcher } from '../thresholds/matcher.js';
import type { EmissionReport, PipelineResult, SignalNotifier, SignalRecorder } from './types.js';

const INDICATOR_ORDER: readonly IndicatorKind[] = ['trend', 'timing', 'momentum'];

export interface SignalPipelineOptions {
  matcher: ZoneThresholdMatcher;
  settings?: EngineSettings;
  /** Lowest to highest; readings on unlisted timeframes sort after these. */
  timeframes?: readonly string[];
  dedupe?: DeduplicationCache;
  recorder?: SignalRecorder;
  notifier?: SignalNotifier;
  logger?: Logger;
}

export interface TimeframeContext {
  confirmedByHigherTimeframe?: boolean;
}

function timestampOf(reading: IndicatorReading): number {
  if (typeof reading.timestamp === 'number') return reading.timestamp;
  const parsed = Date.parse(reading.timestamp);
  return Number.isNaN(parsed) ? 0 : parsed;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Local stack direction of a reading, or null when its averages are incomplete. */
function stackDirection(reading: IndicatorReading): Signal['direction'] | null {
  const { price, maShort1, maShort2, maShort3, maLong } = reading.scalars;
  const values = [price, maShort1, maShort2, maShort3, maLong].map(toFiniteOrNull);
  const [p, m1, m2, m3, long] = values;
  if (p === null || m1 === null || m2 === null || m3 === null || long === null) return null;
  return classifyTrendStack(p, m1, m2, m3, long).direction;
}

/**
 * Runs readings through evaluators, combiner, aggregator and the dedupe gate,
 * then hands qualifying signals to the recorder and notifier.
 */
export class SignalPipeline {
  readonly settings: EngineSettings;
  private readonly timeframes: readonly string[];
  private readonly evaluators: EvaluatorSet;
  private readonly combiner: SignalCombiner;
  private readonly aggregator = new TimeframeAggregator();
  private readonly indicators: IndicatorKind[];
  private readonly dedupe: DeduplicationCache;
  private readonly recorder?: SignalRecorder;
  private readonly notifier?: SignalNotifier;
  private readonly logger: Logger;

  constructor(options: SignalPipelineOptions) {
    this.settings = options.settings ?? parseEngineSettings();
    this.timeframes = options.timeframes ?? DEFAULT_TIMEFRAMES;
    this.logger = options.logger ?? new Logger('info', 'pipeline');
    this.evaluators = createEvaluators(options.matcher, {
      strengthScale: this.settings.trend.strengthScale,
      timingWeights: this.settings.timing.weights,
    });
    this.combiner = new SignalCombiner(this.settings.combine);
    this.indicators = INDICATOR_ORDER.filter((kind) => this.settings.indicators.includes(kind));
    if (this.indicators.length === 0) {
      throw new Error('SignalPipeline needs at least one indicator');
    }
    this.dedupe =
      options.dedupe ??
      new DeduplicationCache({
        ttlMs: this.settings.dedupe.ttlMinutes * 60 * 1000,
        failOpen: this.settings.dedupe.failOpen,
        logger: this.logger,
      });
    this.recorder = options.recorder;
    this.notifier = options.notifier;
  }

  evaluateTimeframe(reading: IndicatorReading, context: TimeframeContext = {}): Signal {
    const signals = this.indicators.map((kind) =>
      runEvaluator(
        this.evaluators,
        inputFromReading(kind, reading, context.confirmedByHigherTimeframe),
        reading.instrumentId,
        reading.timeframe
      )
    );
    if (signals.length === 3) {
      return this.combiner.combineThree(signals[0], signals[1], signals[2]);
    }
    if (signals.length === 2) {
      return this.combiner.combine(signals[0], signals[1]);
    }
    return signals[0];
  }

  evaluateInstrument(instrumentId: string, readings: readonly IndicatorReading[]): AggregatedSignal {
    const ordered = this.latestPerTimeframe(instrumentId, readings);
    const signals = ordered.map((reading, index) => {
      const context: TimeframeContext = {};
      if (this.settings.trend.requireConfirmation) {
        context.confirmedByHigherTimeframe = this.confirmation(reading, ordered[index + 1]);
      }
      return this.evaluateTimeframe(reading, context);
    });
    return this.aggregator.aggregate(signals);
  }

  async process(instrumentId: string, readings: readonly IndicatorReading[]): Promise<PipelineResult> {
    const aggregate = this.evaluateInstrument(instrumentId, readings);
    const { policy, minConfidence } = this.settings.aggregation;
    const qualified = meetsEmissionPolicy(aggregate, policy) && aggregate.overallConfidence >= minConfidence;
    if (!qualified) {
      this.logger.debug(
        `${instrumentId}: ${aggregate.overallDirection} aggregate not emitted` +
          ` (agreement ${aggregate.agreementRatio.toFixed(2)}, confidence ${aggregate.overallConfidence.toFixed(2)})`
      );
      return { aggregate, qualified, emissions: [] };
    }

    const emissions: EmissionReport[] = [];
    for (const signal of aggregate.perTimeframe) {
      if (signal.direction !== aggregate.overallDirection) continue;
      emissions.push(await this.emit(instrumentId, signal));
    }
    return { aggregate, qualified, emissions };
  }

  private async emit(instrumentId: string, signal: Signal): Promise<EmissionReport> {
    const timeframe = signal.timeframe ?? 'unknown';
    if (!this.dedupe.shouldEmit(instrumentId, signal.signalType, timeframe)) {
      this.logger.debug(`${instrumentId} ${signal.signalType} ${timeframe} suppressed as duplicate`);
      return { signal, timeframe, outcome: 'suppressed' };
    }

    let recordId: string | undefined;
    if (this.recorder) {
      try {
        recordId = await this.recorder.recordSignal(signal);
      } catch (error) {
        this.logger.error(`Failed to record ${instrumentId} ${signal.signalType} ${timeframe}`, error);
        return { signal, timeframe, outcome: 'record_failed', error: errorMessage(error) };
      }
    }

    if (this.notifier) {
      try {
        await this.notifier.notify(signal);
      } catch (error) {
        this.logger.error(`Failed to notify ${instrumentId} ${signal.signalType} ${timeframe}`, error);
        return { signal, timeframe, outcome: 'notify_failed', recordId, error: errorMessage(error) };
      }
    }

    this.logger.info(`Emitted ${instrumentId} ${signal.signalType} ${timeframe}`);
    return { signal, timeframe, outcome: 'emitted', recordId };
  }

  /** Latest reading per timeframe, ordered lowest timeframe first. */
  private latestPerTimeframe(
    instrumentId: string,
    readings: readonly IndicatorReading[]
  ): IndicatorReading[] {
    const latest = new Map<string, IndicatorReading>();
    for (const reading of readings) {
      if (reading.instrumentId !== instrumentId) {
        this.logger.warn(`Ignoring ${reading.instrumentId} reading passed for ${instrumentId}`);
        continue;
      }
      const existing = latest.get(reading.timeframe);
      if (!existing || timestampOf(reading) >= timestampOf(existing)) {
        latest.set(reading.timeframe, reading);
      }
    }

    const rank = (timeframe: string): number => {
      const index = this.timeframes.indexOf(timeframe);
      return index === -1 ? this.timeframes.length : index;
    };
    return [...latest.values()].sort(
      (a, b) => rank(a.timeframe) - rank(b.timeframe) || a.timeframe.localeCompare(b.timeframe)
    );
  }

  /**
   * The topmost timeframe has nothing above it and stays unconfirmed-but-local;
   * an incomplete higher reading counts as no confirmation.
   */
  private confirmation(reading: IndicatorReading, higher: IndicatorReading | undefined): boolean | undefined {
    if (!higher) return undefined;
    const local = stackDirection(reading);
    if (local === null || local === 'NEUTRAL') return undefined;
    return stackDirection(higher) === local;
  }
}

export interface SignalPipelineDependencies {
  recorder?: SignalRecorder;
  notifier?: SignalNotifier;
  now?: () => number;
  logger?: Logger;
}

export function createSignalPipeline(
  config: SignalEngineConfig,
  deps: SignalPipelineDependencies = {}
): SignalPipeline {
  const logger = deps.logger ?? new Logger(config.logLevel, 'pipeline');
  const book = buildThresholdBook(config.thresholds, {
    exchanges: config.exchanges,
    defaultMarket: config.defaultMarket,
    baseDir: config.baseDir,
  });
  const { dedupe } = config.engine;
  const store =
    dedupe.store === 'sqlite' ? new SqliteDedupeStore(config.memory.dbPath) : new MemoryDedupeStore();

  return new SignalPipeline({
    matcher: new ZoneThresholdMatcher(book),
    settings: config.engine,
    timeframes: config.timeframes,
    dedupe: new DeduplicationCache({
      ttlMs: dedupe.ttlMinutes * 60 * 1000,
      failOpen: dedupe.failOpen,
      store,
      now: deps.now,
      logger,
    }),
    recorder: deps.recorder,
    notifier: deps.notifier,
    logger,
  });
}
