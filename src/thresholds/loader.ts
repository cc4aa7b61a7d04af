import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { basename, extname, isAbsolute, join, resolve } from 'node:path';

import yaml from 'yaml';

import { ThresholdBook } from './book.js';
import {
  instrumentThresholdsSchema,
  type InstrumentThresholdsConfig,
  type ThresholdsConfig,
  type TimeframeRulesConfig,
} from './schema.js';
import type { InstrumentProfile, ZoneThreshold } from './types.js';
import { ThresholdConfigError } from './validate.js';

const THRESHOLD_FILE_EXTENSIONS = new Set(['.yaml', '.yml']);

export interface BuildThresholdBookOptions {
  exchanges?: Record<string, string>;
  defaultMarket?: string;
  /** Directory that a relative `thresholds.directory` is resolved against. */
  baseDir?: string;
}

function flattenRules(ownerId: string, timeframes: TimeframeRulesConfig): ZoneThreshold[] {
  const rows: ZoneThreshold[] = [];
  for (const [timeframe, indicators] of Object.entries(timeframes)) {
    for (const [indicatorName, rules] of Object.entries(indicators)) {
      for (const rule of rules) {
        rows.push({
          ownerId,
          timeframe,
          indicatorName,
          zoneName: rule.zone,
          comparison: rule.op,
          minValue: rule.min,
          maxValue: rule.max ?? null,
        });
      }
    }
  }
  return rows;
}

/**
 * Reads `<instrumentId>.yaml` files from a directory. Each file has the same
 * shape as an entry under `thresholds.instruments`.
 */
export function loadInstrumentThresholdFiles(
  directory: string
): Record<string, InstrumentThresholdsConfig> {
  if (!existsSync(directory)) {
    throw new ThresholdConfigError([`threshold directory not found: ${directory}`]);
  }

  const entries: Record<string, InstrumentThresholdsConfig> = {};
  const issues: string[] = [];
  const files = readdirSync(directory)
    .filter((name) => THRESHOLD_FILE_EXTENSIONS.has(extname(name).toLowerCase()))
    .sort();

  for (const file of files) {
    const instrumentId = basename(file, extname(file));
    let raw: unknown;
    try {
      raw = yaml.parse(readFileSync(join(directory, file), 'utf-8')) ?? {};
    } catch (error) {
      issues.push(`${file}: ${error instanceof Error ? error.message : String(error)}`);
      continue;
    }
    const parsed = instrumentThresholdsSchema.safeParse(raw);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        issues.push(`${file}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
      }
      continue;
    }
    entries[instrumentId] = parsed.data;
  }

  if (issues.length > 0) {
    throw new ThresholdConfigError(issues);
  }
  return entries;
}

function mergeInstrumentEntries(
  fromFiles: Record<string, InstrumentThresholdsConfig>,
  inline: Record<string, InstrumentThresholdsConfig>
): Record<string, InstrumentThresholdsConfig> {
  const merged: Record<string, InstrumentThresholdsConfig> = { ...fromFiles };
  for (const [instrumentId, entry] of Object.entries(inline)) {
    const base = merged[instrumentId];
    merged[instrumentId] = base
      ? {
          market: entry.market ?? base.market,
          exchange: entry.exchange ?? base.exchange,
          timeframes: { ...base.timeframes, ...entry.timeframes },
        }
      : entry;
  }
  return merged;
}

export function buildThresholdBook(
  config: ThresholdsConfig,
  options: BuildThresholdBookOptions = {}
): ThresholdBook {
  let fromFiles: Record<string, InstrumentThresholdsConfig> = {};
  if (config.directory) {
    const directory = isAbsolute(config.directory)
      ? config.directory
      : resolve(options.baseDir ?? process.cwd(), config.directory);
    fromFiles = loadInstrumentThresholdFiles(directory);
  }
  const instruments = mergeInstrumentEntries(fromFiles, config.instruments);

  const profiles: Record<string, InstrumentProfile> = {};
  const instrumentRules: ZoneThreshold[] = [];
  for (const [instrumentId, entry] of Object.entries(instruments)) {
    profiles[instrumentId] = { market: entry.market, exchange: entry.exchange };
    instrumentRules.push(...flattenRules(instrumentId, entry.timeframes));
  }

  const marketRules: ZoneThreshold[] = [];
  for (const [market, timeframes] of Object.entries(config.markets)) {
    marketRules.push(...flattenRules(market, timeframes));
  }

  return new ThresholdBook({
    instrumentRules,
    marketRules,
    zoneOrders: config.zoneOrders,
    instruments: profiles,
    exchanges: options.exchanges,
    defaultMarket: options.defaultMarket,
  });
}
