/**
 * Balance.ts — Tunable combat constants loaded from balance.json.
 */

import { z } from 'zod';

import balanceData from '@/data/balance.json';
import { ContentValidationError } from '@/engine/errors';

const RangeSchema = z
  .object({ min: z.number().positive(), max: z.number().positive() })
  .refine((r) => r.min <= r.max, { message: 'min must not exceed max' });

const BalanceSchema = z.object({
  attackVariance: RangeSchema,
  skillVariance: RangeSchema,
  fleeChance: z.number().min(0).max(1),
  leveling: z.object({
    expPerLevel: z.number().int().positive(),
    growthRate: z.number().min(0),
    speedPerLevel: z.number().int().min(0),
  }),
});

export type BalanceConfig = z.infer<typeof BalanceSchema>;
export type VarianceRange = z.infer<typeof RangeSchema>;

/** Validate raw balance data.  Throws `ContentValidationError` on bad input. */
export function parseBalance(raw: unknown): BalanceConfig {
  const result = BalanceSchema.safeParse(raw);
  if (!result.success) {
    throw ContentValidationError.fromZodIssues('balance.json', result.error.issues);
  }
  return result.data;
}

export const BALANCE: Readonly<BalanceConfig> = parseBalance(balanceData);
