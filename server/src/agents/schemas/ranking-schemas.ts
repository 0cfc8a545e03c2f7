/**
 * Zod schema for strategic-ranking model output.
 *
 * Tiers arrive as "TIER 1", "Tier 1", "1" or 1; all normalize to the
 * numeric tier. An empty ranked list is a validation failure.
 */

import { z } from 'zod';
import type { Tier } from '../types.js';
import { boundedScore } from './domain-schemas.js';

export function parseTier(raw: unknown): Tier | undefined {
  const text = typeof raw === 'number' ? String(raw) : typeof raw === 'string' ? raw : '';
  const match = /^\s*(?:tier\s*)?([1-4])\s*$/i.exec(text);
  if (!match) return undefined;
  switch (match[1]) {
    case '1': return 1;
    case '2': return 2;
    case '3': return 3;
    default: return 4;
  }
}

const TierSchema = z.unknown().transform((value, ctx): Tier => {
  const tier = parseTier(value);
  if (tier === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unrecognized tier: ${String(value)}` });
    return z.NEVER;
  }
  return tier;
});

const positiveInt = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v ?? undefined),
  z.number().int().min(1).optional(),
);

export const RankedJobSchema = z.object({
  rank: positiveInt,
  job_number: positiveInt,
  job_title: z.string().optional().default(''),
  company: z.string().optional().default(''),
  tier: TierSchema,
  final_score: boundedScore(100),
  ranking_rationale: z.string().optional().default(''),
  action_recommendation: z.string().optional().default(''),
}).passthrough();

export type RankedJob = z.infer<typeof RankedJobSchema>;

export const RankingOutputSchema = z.object({
  ranked_jobs: z.array(RankedJobSchema).min(1, 'ranked_jobs must not be empty'),
  overall_strategy: z.string().optional().default(''),
  top_recommendation: z.string().optional().default(''),
}).passthrough();

export type RankingOutput = z.infer<typeof RankingOutputSchema>;
