import type { AggregatedSignal, Signal } from '../signals/types.js';

export interface SignalRecorder {
  /** Persists an emitted signal and returns its record id. */
  recordSignal(signal: Signal): string | Promise<string>;
}

export interface SignalNotifier {
  notify(signal: Signal): void | Promise<void>;
}

export type EmissionOutcome = 'emitted' | 'suppressed' | 'record_failed' | 'notify_failed';

export interface EmissionReport {
  signal: Signal;
  timeframe: string;
  outcome: EmissionOutcome;
  recordId?: string;
  error?: string;
}

export interface PipelineResult {
  aggregate: AggregatedSignal;
  /** Whether the aggregate met the emission policy and the confidence floor. */
  qualified: boolean;
  emissions: EmissionReport[];
}
