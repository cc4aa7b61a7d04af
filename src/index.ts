export const VERSION = '0.1.0';

export * from './signals/types.js';
export {
  clamp01,
  createIndicatorSignal,
  createSignal,
  directionOf,
  neutralSignal,
  oppositeOf,
  withContext,
} from './signals/signal.js';
export { SignalCombiner, type CombinerOptions } from './signals/combiner.js';
export { TimeframeAggregator, meetsEmissionPolicy } from './signals/aggregator.js';
export {
  DEFAULT_DEDUPE_TTL_MS,
  DeduplicationCache,
  MemoryDedupeStore,
  dedupeKeyOf,
  type CacheEntry,
  type DedupeStore,
  type DeduplicationCacheOptions,
} from './signals/dedupe.js';

export * from './thresholds/types.js';
export { ThresholdBook, DEFAULT_MARKET, type ThresholdBookInput } from './thresholds/book.js';
export { ZoneThresholdMatcher, type ZoneClassification } from './thresholds/matcher.js';
export { ThresholdConfigError } from './thresholds/validate.js';
export { buildThresholdBook, loadInstrumentThresholdFiles } from './thresholds/loader.js';
export { ZoneOrder, ZoneOrderSet } from './thresholds/zones.js';

export {
  MomentumEvaluator,
  TimingEvaluator,
  TrendEvaluator,
  classifyTrendStack,
  createEvaluators,
  inputFromReading,
  runEvaluator,
  type EvaluatorInput,
  type EvaluatorSet,
} from './evaluators/index.js';

export { SignalPipeline, createSignalPipeline } from './pipeline/engine.js';
export { formatAggregateSummary, formatSignalMessage } from './pipeline/format.js';
export { parseReadings } from './pipeline/readings.js';
export type {
  EmissionReport,
  PipelineResult,
  SignalNotifier,
  SignalRecorder,
} from './pipeline/types.js';

export { loadConfig, parseConfig, parseEngineSettings, type SignalEngineConfig } from './core/config.js';
export { Logger, type LogLevel } from './core/logger.js';
export { openDatabase, closeDatabase } from './memory/db.js';
export { SqliteDedupeStore } from './memory/dedupe_store.js';
export { SqliteSignalRecorder, type SignalRecord } from './memory/signals.js';
