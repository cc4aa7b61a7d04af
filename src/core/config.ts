import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';

import yaml from 'yaml';
import { z } from 'zod';

import { thresholdsConfigSchema } from '../thresholds/schema.js';

export const DEFAULT_TIMEFRAMES = ['1m', '2m', '5m', '15m', '30m', '1h', '4h'];

const indicatorKindSchema = z.enum(['trend', 'timing', 'momentum']);

const engineSchema = z
  .object({
    indicators: z
      .array(indicatorKindSchema)
      .min(1)
      .default(['trend', 'timing'])
      .refine((kinds) => new Set(kinds).size === kinds.length, {
        message: 'indicators must not repeat',
      }),
    trend: z
      .object({
        strengthScale: z.number().positive().default(10),
        requireConfirmation: z.boolean().default(false),
      })
      .default({}),
    timing: z
      .object({
        weights: z
          .object({
            line: z.number().min(0).default(0.4),
            signal: z.number().min(0).default(0.4),
            histogram: z.number().min(0).default(0.2),
          })
          .default({}),
      })
      .default({}),
    combine: z
      .object({
        weakMajorityRatio: z.number().min(0).default(1),
        agreementBonus: z.number().min(0).max(1).default(0.2),
        conflictPenalty: z.number().min(0).max(1).default(0.3),
      })
      .default({}),
    aggregation: z
      .object({
        policy: z.enum(['majority', 'unanimous']).default('majority'),
        minConfidence: z.number().min(0).max(1).default(0),
      })
      .default({}),
    dedupe: z
      .object({
        ttlMinutes: z.number().positive().default(30),
        failOpen: z.boolean().default(true),
        store: z.enum(['memory', 'sqlite']).default('memory'),
      })
      .default({}),
  })
  .default({});

const configSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  timeframes: z.array(z.string().min(1)).min(1).default(DEFAULT_TIMEFRAMES),
  defaultMarket: z.string().min(1).default('GLOBAL'),
  exchanges: z.record(z.string(), z.string()).default({ HOSE: 'VN', HNX: 'VN', NASDAQ: 'US', NYSE: 'US' }),
  engine: engineSchema,
  memory: z
    .object({
      dbPath: z.string().optional(),
    })
    .default({}),
  thresholds: thresholdsConfigSchema.default({}),
});

export type SignalEngineConfig = z.infer<typeof configSchema> & {
  /** Directory of the loaded file; relative paths in the config resolve against it. */
  baseDir: string;
};

export type EngineSettings = SignalEngineConfig['engine'];

/** Engine settings with every default applied. */
export function parseEngineSettings(raw: unknown = {}): EngineSettings {
  return engineSchema.parse(raw);
}

export function getConfigPath(): string {
  return process.env.SIGNAL_ENGINE_CONFIG_PATH ?? join(homedir(), '.signal-engine', 'config.yaml');
}

function expandHome(path: string): string {
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

function applyEnvOverrides(raw: Record<string, unknown>): void {
  const ttl = process.env.SIGNAL_ENGINE_DEDUPE_TTL_MINUTES;
  if (ttl !== undefined && ttl.trim() !== '') {
    const minutes = Number(ttl);
    if (Number.isFinite(minutes) && minutes > 0) {
      const engine = isRecord(raw.engine) ? raw.engine : {};
      const dedupe = isRecord(engine.dedupe) ? engine.dedupe : {};
      raw.engine = { ...engine, dedupe: { ...dedupe, ttlMinutes: minutes } };
    }
  }
  const level = process.env.SIGNAL_ENGINE_LOG_LEVEL;
  if (level) {
    raw.logLevel = level.trim().toLowerCase();
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseConfig(raw: unknown, baseDir: string = process.cwd()): SignalEngineConfig {
  const input = isRecord(raw) ? { ...raw } : {};
  applyEnvOverrides(input);
  const parsed = configSchema.parse(input);
  return {
    ...parsed,
    memory: {
      ...parsed.memory,
      dbPath: parsed.memory.dbPath ? expandHome(parsed.memory.dbPath) : undefined,
    },
    baseDir,
  };
}

/**
 * Loads the YAML config. A missing file yields the defaults; a file that does
 * not match the schema throws.
 */
export function loadConfig(configPath?: string): SignalEngineConfig {
  const path = expandHome(configPath ?? getConfigPath());
  if (!existsSync(path)) {
    return parseConfig({}, process.cwd());
  }
  const raw: unknown = yaml.parse(readFileSync(path, 'utf-8')) ?? {};
  return parseConfig(raw, dirname(path));
}
