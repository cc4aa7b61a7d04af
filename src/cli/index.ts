#!/usr/bin/env node
/**
 * signal-engine CLI
 *
 * Validates zone thresholds, evaluates indicator readings and lists emitted signals.
 */

import { readFileSync } from 'node:fs';

import { Command } from 'commander';

import { VERSION } from '../index.js';
import { loadConfig, type SignalEngineConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { SqliteSignalRecorder } from '../memory/signals.js';
import { createSignalPipeline } from '../pipeline/engine.js';
import { formatAggregateSummary, formatSignalMessage } from '../pipeline/format.js';
import { groupByInstrument, parseReadings } from '../pipeline/readings.js';
import { buildThresholdBook } from '../thresholds/loader.js';
import { ZoneThresholdMatcher } from '../thresholds/matcher.js';
import { ThresholdConfigError } from '../thresholds/validate.js';

const program = new Command();

program
  .name('signal-engine')
  .description('Hybrid multi-indicator, multi-timeframe signal engine')
  .version(VERSION)
  .option('-c, --config <path>', 'Config file path');

function currentConfig(): SignalEngineConfig {
  return loadConfig(program.opts<{ config?: string }>().config);
}

function reportFailure(error: unknown): void {
  if (error instanceof ThresholdConfigError) {
    console.error(`Threshold configuration has ${error.issues.length} issue(s):`);
    for (const issue of error.issues) {
      console.error(`  - ${issue}`);
    }
  } else {
    console.error(error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
}

// ============================================================================
// Thresholds
// ============================================================================

const thresholds = program.command('thresholds').description('Zone threshold tables');

thresholds
  .command('validate')
  .description('Load and validate every threshold table')
  .action(() => {
    try {
      const config = currentConfig();
      const book = buildThresholdBook(config.thresholds, {
        exchanges: config.exchanges,
        defaultMarket: config.defaultMarket,
        baseDir: config.baseDir,
      });
      const stats = book.stats();
      console.log(
        `Thresholds OK: ${stats.rules} rule(s) in ${stats.instrumentGroups} instrument` +
          ` and ${stats.marketGroups} market group(s)`
      );
    } catch (error) {
      reportFailure(error);
    }
  });

thresholds
  .command('match <instrument> <timeframe> <indicator> <value>')
  .description('Classify a single indicator value')
  .action((instrument: string, timeframe: string, indicator: string, value: string) => {
    try {
      const numeric = Number(value);
      if (!Number.isFinite(numeric)) {
        console.log('Value must be a finite number.');
        process.exitCode = 1;
        return;
      }
      const config = currentConfig();
      const matcher = new ZoneThresholdMatcher(
        buildThresholdBook(config.thresholds, {
          exchanges: config.exchanges,
          defaultMarket: config.defaultMarket,
          baseDir: config.baseDir,
        })
      );
      const result = matcher.classify(instrument, timeframe, indicator, numeric);
      console.log(`${result.zone} (source: ${result.source})`);
    } catch (error) {
      reportFailure(error);
    }
  });

// ============================================================================
// Evaluation
// ============================================================================

program
  .command('evaluate <file>')
  .description('Evaluate a JSON array of indicator readings')
  .option('--record', 'Record emitted signals in the database')
  .action(async (file: string, options: { record?: boolean }) => {
    try {
      const config = currentConfig();
      const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
      const readings = parseReadings(raw);
      const pipeline = createSignalPipeline(config, {
        logger: new Logger(config.logLevel, 'evaluate'),
        recorder: options.record ? new SqliteSignalRecorder(config.memory.dbPath) : undefined,
        notifier: {
          notify: (signal) => {
            console.log(formatSignalMessage(signal));
            console.log('');
          },
        },
      });

      for (const [instrumentId, group] of groupByInstrument(readings)) {
        const result = await pipeline.process(instrumentId, group);
        console.log(formatAggregateSummary(result.aggregate));
        const emitted = result.emissions.filter((report) => report.outcome === 'emitted').length;
        const suppressed = result.emissions.filter((report) => report.outcome === 'suppressed').length;
        console.log(
          result.qualified
            ? `  emitted ${emitted}, suppressed ${suppressed}`
            : '  below emission policy, nothing emitted'
        );
      }
    } catch (error) {
      reportFailure(error);
    }
  });

// ============================================================================
// History
// ============================================================================

program
  .command('history')
  .description('List recorded signals')
  .option('-i, --instrument <id>', 'Filter by instrument')
  .option('-l, --limit <number>', 'Limit results', '20')
  .action((options: { instrument?: string; limit: string }) => {
    const limit = Number(options.limit);
    if (!Number.isFinite(limit) || limit <= 0) {
      console.log('Limit must be a positive number.');
      return;
    }
    const config = currentConfig();
    const records = new SqliteSignalRecorder(config.memory.dbPath).listSignals({
      instrumentId: options.instrument,
      limit,
    });

    console.log('Recorded Signals');
    console.log('─'.repeat(80));
    for (const record of records) {
      console.log(
        `${record.createdAt} | ${record.instrumentId} | ${record.timeframe ?? '-'} | ` +
          `${record.signalType} | s=${record.strength.toFixed(2)} c=${record.confidence.toFixed(2)} | ${record.rationale}`
      );
    }
  });

// ============================================================================
// Parse and Run
// ============================================================================

program.parseAsync().catch(reportFailure);
