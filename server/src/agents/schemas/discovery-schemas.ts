/**
 * Zod schema for the opportunity-discovery model output.
 * Older prompts called the identifier `job_id`; both spellings are accepted.
 */

import { z } from 'zod';

const optionalId = z.preprocess(
  (v) => (typeof v === 'number' ? String(v) : v ?? undefined),
  z.string().trim().min(1).optional(),
);

export const RecommendedJobSchema = z
  .object({
    opportunity_id: optionalId,
    job_id: optionalId,
    title: z.string().optional().default(''),
    company: z.string().optional().default(''),
    reason: z.string().optional().default(''),
  })
  .passthrough()
  .transform(({ job_id, ...rest }) => ({ ...rest, opportunity_id: rest.opportunity_id ?? job_id }));

export const DiscoveryOutputSchema = z.object({
  recommended_jobs: z.preprocess((v) => v ?? [], z.array(RecommendedJobSchema)),
  search_summary: z.string().optional().default(''),
}).passthrough();

export type DiscoveryOutput = z.infer<typeof DiscoveryOutputSchema>;
