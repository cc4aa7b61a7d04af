import { z } from 'zod';

import type { IndicatorReading } from '../signals/types.js';

const scalar = z.number().nullable().optional();

export const readingSchema = z.object({
  instrumentId: z.string().min(1),
  timeframe: z.string().min(1),
  timestamp: z.union([z.string(), z.number()]),
  scalars: z
    .object({
      price: scalar,
      maShort1: scalar,
      maShort2: scalar,
      maShort3: scalar,
      maLong: scalar,
      macd: scalar,
      macdSignal: scalar,
      macdHistogram: scalar,
    })
    .default({}),
});

export const readingsFileSchema = z.array(readingSchema);

export function parseReadings(raw: unknown): IndicatorReading[] {
  return readingsFileSchema.parse(raw);
}

/** Groups readings by instrument, keeping first-seen instrument order. */
export function groupByInstrument(readings: readonly IndicatorReading[]): Map<string, IndicatorReading[]> {
  const groups = new Map<string, IndicatorReading[]>();
  for (const reading of readings) {
    const group = groups.get(reading.instrumentId) ?? [];
    group.push(reading);
    groups.set(reading.instrumentId, group);
  }
  return groups;
}
