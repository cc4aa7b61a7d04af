import { z } from 'zod';

import { COMPARISON_OPERATORS } from './types.js';

export const zoneRuleSchema = z
  .object({
    zone: z.string().min(1),
    op: z.enum(COMPARISON_OPERATORS),
    min: z.number(),
    max: z.number().optional(),
  })
  .refine((rule) => rule.op !== 'between' || rule.max !== undefined, {
    message: 'between rules need a max value',
    path: ['max'],
  });

/** indicator name -> ordered zone rules */
export const indicatorRulesSchema = z.record(z.string(), z.array(zoneRuleSchema));

/** timeframe -> indicator rules */
export const timeframeRulesSchema = z.record(z.string(), indicatorRulesSchema);

export const instrumentThresholdsSchema = z.object({
  market: z.string().min(1).optional(),
  exchange: z.string().min(1).optional(),
  timeframes: timeframeRulesSchema.default({}),
});

export const thresholdsConfigSchema = z.object({
  directory: z.string().optional(),
  zoneOrders: z.record(z.string(), z.array(z.string().min(1))).default({}),
  markets: z.record(z.string(), timeframeRulesSchema).default({}),
  instruments: z.record(z.string(), instrumentThresholdsSchema).default({}),
});

export type ZoneRuleConfig = z.infer<typeof zoneRuleSchema>;
export type TimeframeRulesConfig = z.infer<typeof timeframeRulesSchema>;
export type InstrumentThresholdsConfig = z.infer<typeof instrumentThresholdsSchema>;
export type ThresholdsConfig = z.infer<typeof thresholdsConfigSchema>;
