/**
 * Stage 2: Opportunity Discovery
 *
 * Pulls live postings from the job-search collaborator, then asks the model
 * to pick the best N for the candidate. Availability beats selectivity here:
 * any failure after the search falls back to the raw top-N, and the stage
 * itself never throws (an empty list is a valid answer).
 */

import { DomainValidationError, errorMessage } from '../lib/errors.js';
import {
  MAX_SEARCH_RESULTS,
  isSearchError,
  type JobSearchClient,
  type JobSearchRecord,
  type RawJobRecord,
} from '../lib/job-search.js';
import type { GenerationResult } from '../lib/llm.js';
import { tryParseGenerated } from '../lib/structured-output.js';
import { createJobOpportunity } from './domain.js';
import { DiscoveryOutputSchema, type DiscoveryOutput } from './schemas/discovery-schemas.js';
import { inferLevelFromTitle } from './skill-taxonomy.js';
import type {
  CandidateProfile,
  DiscoveryResult,
  JobOpportunity,
  OpportunityDiscoveryInput,
  StageContext,
} from './types.js';

export const DEFAULT_OPPORTUNITY_COUNT = 5;
/** A recommendation that keeps fewer jobs than this is discarded. */
export const MIN_RECOMMENDED = 3;

export interface DiscoveryContext extends StageContext {
  search: JobSearchClient;
}

const SYSTEM_PROMPT = `You are a job-market researcher and career advisor. You know which titles are equivalent, which skills transfer, and what seniority companies really expect. You only recommend postings from the list you are given and you are selective: a realistic match beats a long list.`;

export function toJobOpportunity(record: RawJobRecord): JobOpportunity {
  return createJobOpportunity({
    opportunity_id: record.id,
    title: record.title,
    company: record.company,
    description: record.description,
    required_skills: record.required_skills,
    preferred_skills: [],
    required_experience_level: inferLevelFromTitle(record.title),
    location: record.location,
    salary_range: record.salary_range,
    remote_policy: record.remote_policy,
    posted_at: record.posted_at,
    url: record.url,
  });
}

function describeCandidate(profile: CandidateProfile, targetRole: string): string {
  return [
    `- Target Role: ${targetRole}`,
    `- Experience Level: ${profile.experience_level} (${profile.total_years_experience} years)`,
    `- Key Skills: ${profile.skills.slice(0, 10).map((s) => s.name).join(', ')}`,
    `- Previous Roles: ${profile.previous_roles.slice(0, 3).join(', ') || 'None listed'}`,
  ].join('\n');
}

function describeOpportunity(job: JobOpportunity): string {
  return [
    `[${job.opportunity_id}] ${job.title} at ${job.company}`,
    `  Location: ${job.location ?? 'Not specified'}${job.remote_policy ? ` (${job.remote_policy})` : ''}`,
    `  Level: ${job.required_experience_level}`,
    `  Skills: ${job.required_skills.join(', ') || 'Not listed'}`,
    `  Description: ${job.description.slice(0, 300).replace(/\s+/g, ' ')}`,
  ].join('\n');
}

export function buildDiscoveryPrompt(
  profile: CandidateProfile,
  targetRole: string,
  candidates: readonly JobOpportunity[],
  count: number,
): string {
  return `Select the ${count} best job opportunities for this candidate from the search results below.

CANDIDATE PROFILE:
${describeCandidate(profile, targetRole)}

SEARCH RESULTS:
${candidates.map(describeOpportunity).join('\n\n')}

EVALUATE EACH POSTING:
- Does it match the candidate's experience level?
- Do the required skills overlap with the candidate's skills?
- Is the title appropriate for their background?

SELECT:
- Drop postings that are far too senior or too junior.
- Drop postings with unrelated skill requirements.
- Prefer postings where the candidate covers 60% or more of the skills.
- Order by relevance, best first. Include variety across companies when possible.

Return ONLY valid JSON:
{
  "recommended_jobs": [
    {
      "opportunity_id": "the id in square brackets above",
      "title": "job title",
      "company": "company name",
      "reason": "1-2 sentences on why this is a good match"
    }
  ],
  "search_summary": "Brief summary of what you found"
}`;
}

/** Recommended opportunities in the model's order, unknown and repeated ids skipped. */
export function selectRecommended(
  output: DiscoveryOutput,
  candidates: readonly JobOpportunity[],
): JobOpportunity[] {
  const byId = new Map(candidates.map((job) => [job.opportunity_id, job]));
  const seen = new Set<string>();
  const selected: JobOpportunity[] = [];
  for (const rec of output.recommended_jobs) {
    const id = rec.opportunity_id;
    if (!id || seen.has(id)) continue;
    const job = byId.get(id);
    if (job) {
      seen.add(id);
      selected.push(job);
    }
  }
  return selected;
}

export async function runOpportunityDiscovery(
  input: OpportunityDiscoveryInput,
  ctx: DiscoveryContext,
): Promise<DiscoveryResult> {
  const count = Math.max(1, Math.min(input.count ?? DEFAULT_OPPORTUNITY_COUNT, MAX_SEARCH_RESULTS));
  const log = ctx.log.child({ stage: 'opportunity_discovery' });

  let records: JobSearchRecord[];
  try {
    records = await ctx.search.search(input.target_role, MAX_SEARCH_RESULTS, input.location);
  } catch (err) {
    log.warn({ error: errorMessage(err) }, 'Job search collaborator threw; returning no opportunities');
    return { opportunities: [], source: 'none', candidates_found: 0, search_errors: [errorMessage(err)], fallback_reason: 'search_failed' };
  }

  const searchErrors: string[] = [];
  const candidates: JobOpportunity[] = [];
  for (const record of records) {
    if (isSearchError(record)) {
      searchErrors.push(record.error);
      continue;
    }
    try {
      candidates.push(toJobOpportunity(record));
    } catch (err) {
      if (!(err instanceof DomainValidationError)) throw err;
      log.debug({ id: record.id, error: err.message }, 'Skipping unusable search record');
    }
  }
  if (searchErrors.length > 0) {
    log.warn({ errors: searchErrors }, 'Job search returned error records');
  }

  if (candidates.length === 0) {
    log.info({ target_role: input.target_role }, 'No opportunities found');
    return { opportunities: [], source: 'none', candidates_found: 0, search_errors: searchErrors, fallback_reason: 'no_results' };
  }

  const rawTopN = candidates.slice(0, count);
  const fallback = (reason: string): DiscoveryResult => {
    log.info({ reason, count: rawTopN.length }, 'Using raw search results');
    return {
      opportunities: rawTopN,
      source: 'search',
      candidates_found: candidates.length,
      search_errors: searchErrors,
      fallback_reason: reason,
    };
  };

  let response: GenerationResult;
  try {
    response = await ctx.generator.generate({
      system: SYSTEM_PROMPT,
      prompt: buildDiscoveryPrompt(input.profile, input.target_role, candidates, count),
      maxTokens: 2048,
      signal: ctx.signal,
    });
  } catch (err) {
    if (ctx.signal?.aborted) throw err;
    log.warn({ error: errorMessage(err) }, 'Discovery generation failed');
    return fallback('generation_failed');
  }

  const parsed = tryParseGenerated(response, DiscoveryOutputSchema);
  if (!parsed.success) {
    log.warn({ kind: parsed.error.kind, error: parsed.error.message }, 'Discovery output unparseable');
    return fallback('unparseable_output');
  }

  const selected = selectRecommended(parsed.data, candidates);
  if (selected.length < MIN_RECOMMENDED) {
    log.info({ recommended: selected.length }, 'Too few recommendations survived filtering');
    return fallback('too_few_recommendations');
  }

  log.info({ count: Math.min(selected.length, count), candidates: candidates.length }, 'Opportunities selected');
  return {
    opportunities: selected.slice(0, count),
    source: 'model',
    candidates_found: candidates.length,
    search_errors: searchErrors,
    search_summary: parsed.data.search_summary || undefined,
  };
}
