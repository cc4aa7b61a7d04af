import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { groupByInstrument, parseReadings } from '../../src/pipeline/readings.js';

describe('parseReadings', () => {
  it('accepts readings with partial and null scalars', () => {
    const readings = parseReadings([
      { instrumentId: 'AAPL', timeframe: '1h', timestamp: '2026-03-02T10:00:00Z', scalars: { price: 101, macd: null } },
      { instrumentId: 'AAPL', timeframe: '4h', timestamp: 1_700_000_000_000 },
    ]);

    expect(readings).toEqual([
      { instrumentId: 'AAPL', timeframe: '1h', timestamp: '2026-03-02T10:00:00Z', scalars: { price: 101, macd: null } },
      { instrumentId: 'AAPL', timeframe: '4h', timestamp: 1_700_000_000_000, scalars: {} },
    ]);
  });

  it('rejects readings without an instrument id', () => {
    expect(() => parseReadings([{ timeframe: '1h', timestamp: 1 }])).toThrowError(ZodError);
  });

  it('rejects a non-array payload', () => {
    expect(() => parseReadings({ instrumentId: 'AAPL' })).toThrowError(ZodError);
  });
});

describe('groupByInstrument', () => {
  it('groups in first-seen order', () => {
    const readings = parseReadings([
      { instrumentId: 'MSFT', timeframe: '1h', timestamp: 1 },
      { instrumentId: 'AAPL', timeframe: '1h', timestamp: 1 },
      { instrumentId: 'MSFT', timeframe: '4h', timestamp: 1 },
    ]);
    const groups = groupByInstrument(readings);

    expect([...groups.keys()]).toEqual(['MSFT', 'AAPL']);
    expect(groups.get('MSFT')?.map((reading) => reading.timeframe)).toEqual(['1h', '4h']);
  });
});
