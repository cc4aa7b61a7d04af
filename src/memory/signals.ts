import { randomUUID } from 'node:crypto';

import type Database from 'better-sqlite3';
import { z } from 'zod';

import { Logger } from '../core/logger.js';
import type { SignalRecorder } from '../pipeline/types.js';
import type { Direction, Signal, SignalComponent, SignalType } from '../signals/types.js';
import { openDatabase } from './db.js';

export interface SignalRecord {
  id: string;
  instrumentId: string;
  timeframe: string | null;
  direction: Direction;
  signalType: SignalType;
  strength: number;
  confidence: number;
  rationale: string;
  components: SignalComponent[];
  createdAt: string;
}

interface SignalRow {
  id: string;
  instrumentId: string;
  timeframe: string | null;
  direction: Direction;
  signalType: SignalType;
  strength: number;
  confidence: number;
  rationale: string;
  componentsJson: string | null;
  createdAt: string;
}

const componentsSchema = z.array(
  z.object({
    source: z.enum(['trend', 'timing', 'momentum']),
    direction: z.enum(['BUY', 'SELL', 'NEUTRAL']),
    strength: z.number(),
    rationale: z.string(),
    details: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
  })
);

function parseComponents(row: SignalRow, logger: Logger): SignalComponent[] {
  if (!row.componentsJson) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(row.componentsJson);
  } catch (error) {
    logger.warn(`Signal ${row.id} has unreadable components: ${error instanceof Error ? error.message : String(error)}`);
    return [];
  }
  const result = componentsSchema.safeParse(parsed);
  if (!result.success) {
    logger.warn(`Signal ${row.id} has invalid components: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
    return [];
  }
  return result.data;
}

function mapSignalRow(row: SignalRow, logger: Logger): SignalRecord {
  return {
    id: row.id,
    instrumentId: row.instrumentId,
    timeframe: row.timeframe,
    direction: row.direction,
    signalType: row.signalType,
    strength: row.strength,
    confidence: row.confidence,
    rationale: row.rationale,
    components: parseComponents(row, logger),
    createdAt: row.createdAt,
  };
}

export class SqliteSignalRecorder implements SignalRecorder {
  private readonly db: Database.Database;

  constructor(
    dbOrPath?: Database.Database | string,
    private readonly now: () => number = () => Date.now(),
    private readonly logger: Logger = new Logger('info', 'signals')
  ) {
    this.db = typeof dbOrPath === 'object' ? dbOrPath : openDatabase(dbOrPath);
  }

  recordSignal(signal: Signal): string {
    if (!signal.instrumentId) {
      throw new Error('Cannot record a signal without an instrument id');
    }
    const id = randomUUID();
    this.db
      .prepare(
        `
        INSERT INTO signals (
          id,
          instrument_id,
          timeframe,
          direction,
          signal_type,
          strength,
          confidence,
          rationale,
          components_json,
          created_at
        ) VALUES (
          @id,
          @instrumentId,
          @timeframe,
          @direction,
          @signalType,
          @strength,
          @confidence,
          @rationale,
          @componentsJson,
          @createdAt
        )
      `
      )
      .run({
        id,
        instrumentId: signal.instrumentId,
        timeframe: signal.timeframe,
        direction: signal.direction,
        signalType: signal.signalType,
        strength: signal.strength,
        confidence: signal.confidence,
        rationale: signal.rationale,
        componentsJson: JSON.stringify(signal.components),
        createdAt: new Date(this.now()).toISOString(),
      });
    return id;
  }

  listSignals(params: { instrumentId?: string; limit?: number } = {}): SignalRecord[] {
    const limit = Math.max(1, Math.min(500, Math.floor(params.limit ?? 50)));
    const where = params.instrumentId ? 'WHERE instrument_id = @instrumentId' : '';
    const rows = this.db
      .prepare(
        `
        SELECT
          id,
          instrument_id AS instrumentId,
          timeframe,
          direction,
          signal_type AS signalType,
          strength,
          confidence,
          rationale,
          components_json AS componentsJson,
          created_at AS createdAt
        FROM signals
        ${where}
        ORDER BY created_at DESC, rowid DESC
        LIMIT @limit
      `
      )
      .all(params.instrumentId ? { instrumentId: params.instrumentId, limit } : { limit }) as SignalRow[];
    return rows.map((row) => mapSignalRow(row, this.logger));
  }
}
