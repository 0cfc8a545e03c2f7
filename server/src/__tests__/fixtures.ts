import { vi } from 'vitest';
import pino from 'pino';
import { createCandidateProfile, createFitResult, createJobOpportunity } from '../agents/domain.js';
import { recommendationFor } from '../agents/fit-scoring.js';
import { RECOMMENDATION_LABELS, type CandidateProfile, type FitResult, type JobOpportunity, type StageContext } from '../agents/types.js';
import type { JobSearchClient, JobSearchRecord, RawJobRecord } from '../lib/job-search.js';
import type { GenerationRequest, GenerationResult } from '../lib/llm.js';

export const silentLogger = pino({ level: 'silent' });

export type ScriptedResponse = string | Error | { text?: string; structured?: Record<string, unknown> };

/**
 * Generator that answers from a script, one entry per call. Running off the
 * end of the script fails the call.
 */
export function scriptedGenerator(...script: ScriptedResponse[]) {
  const queue = [...script];
  const generate = vi.fn(async (_request: GenerationRequest): Promise<GenerationResult> => {
    const next = queue.shift();
    if (next === undefined) throw new Error('Unexpected generation call');
    if (next instanceof Error) throw next;
    const usage = { input_tokens: 100, output_tokens: 50 };
    if (typeof next === 'string') return { text: next, usage };
    return { text: next.text ?? '', ...(next.structured && { structured: next.structured }), usage };
  });
  return { generate };
}

export function stageContext(generator: ReturnType<typeof scriptedGenerator>): StageContext {
  return { generator, log: silentLogger };
}

export function fakeSearch(records: JobSearchRecord[] | Error) {
  const search = vi.fn(async (_query: string, _count: number, _location?: string): Promise<JobSearchRecord[]> => {
    if (records instanceof Error) throw records;
    return records;
  });
  return { search } satisfies JobSearchClient;
}

export function rawJob(id: string, title: string, company: string, skills: string[] = ['Python', 'SQL']): RawJobRecord {
  return {
    id,
    title,
    company,
    description: `${title} role at ${company}. Work with ${skills.join(', ')}.`,
    required_skills: skills,
    location: 'Austin',
    remote_policy: 'Remote',
  };
}

export const PROFILE_JSON = {
  name: 'Jane Doe',
  email: 'jane@example.com',
  summary: 'Backend engineer focused on data services.',
  skills: [
    { name: 'Python', category: 'programming_language', years_experience: 5, proficiency: 'Expert' },
    { name: 'SQL', category: 'database', years_experience: 4, proficiency: 'advanced' },
    { name: 'Docker', category: 'Containerization', years_experience: 2 },
  ],
  total_years_experience: 6,
  experience_level: 'senior',
  previous_roles: ['Software Engineer', 'Backend Engineer'],
  previous_companies: ['Acme Corp', 'Globex'],
  education: ['BSc Computer Science'],
};

export function makeProfile(overrides: Partial<typeof PROFILE_JSON> = {}): CandidateProfile {
  return createCandidateProfile({ ...PROFILE_JSON, ...overrides, raw_source_text: 'Jane Doe résumé' });
}

export function makeOpportunity(
  id: string,
  overrides: { title?: string; company?: string; level?: string; required?: string[]; preferred?: string[] } = {},
): JobOpportunity {
  return createJobOpportunity({
    opportunity_id: id,
    title: overrides.title ?? `Engineer ${id}`,
    company: overrides.company ?? `Company ${id}`,
    description: 'Build services.',
    required_skills: overrides.required ?? ['Python', 'SQL'],
    preferred_skills: overrides.preferred ?? [],
    required_experience_level: overrides.level ?? 'senior',
  });
}

/** A FitResult with overall score exactly `score`, split across the rubric sections. */
export function makeFitResult(opportunity: JobOpportunity, score: number, profile: CandidateProfile = makeProfile()): FitResult {
  const experience = Math.min(30, score);
  const skill = Math.min(60, score - experience);
  const strength = score - experience - skill;
  return createFitResult({
    candidate: profile,
    opportunity,
    skill_alignments: [],
    overall_fit_score: score,
    skill_match_score: skill,
    experience_match_score: experience,
    profile_strength_score: strength,
    recommendation: recommendationFor(score),
    score_check: { reported_overall: score, reported_skill: skill, reported_experience: experience, consistent: true },
    strengths: ['Python'],
    gaps: [],
    explanation: 'Fixture',
  });
}

/** A well-formed single-assessment payload whose numbers agree with the rubric. */
export function assessmentJson(overrides: Record<string, unknown> = {}) {
  return {
    skill_matches: [
      { skill_name: 'Python', candidate_has: true, candidate_years: 5, required_years: 3, match_strength: 1, is_required: true },
      { skill_name: 'SQL', candidate_has: true, candidate_years: 4, match_strength: 0.95, is_required: true },
    ],
    overall_fit_score: 75,
    skill_match_score: 40,
    experience_match_score: 30,
    strengths: ['Strong Python'],
    gaps: [],
    recommendation: RECOMMENDATION_LABELS.strong,
    explanation: 'Good fit.',
    ...overrides,
  };
}

// ─── Full-run script ─────────────────────────────────────────────────

export const SENIOR_JOBS = [
  rawJob('j1', 'Senior Backend Engineer', 'Acme'),
  rawJob('j2', 'Senior Data Engineer', 'Globex'),
  rawJob('j3', 'Senior Platform Engineer', 'Initech'),
];

export const RUN_OUTPUTS = {
  profile: JSON.stringify(PROFILE_JSON),
  discovery: JSON.stringify({
    recommended_jobs: SENIOR_JOBS.map((j) => ({ opportunity_id: j.id, title: j.title, company: j.company, reason: 'fits' })),
  }),
  fit: JSON.stringify(assessmentJson()),
  ranking: JSON.stringify({
    ranked_jobs: [
      { rank: 1, job_number: 2, tier: 'TIER 1', final_score: 80, ranking_rationale: 'Data platform growth' },
      { rank: 2, job_number: 1, tier: 'TIER 1', final_score: 76, ranking_rationale: 'Core backend role' },
      { rank: 3, job_number: 3, tier: 'TIER 2', final_score: 70, ranking_rationale: 'Good backup' },
    ],
    overall_strategy: 'Lead with data roles.',
    top_recommendation: 'Senior Data Engineer at Globex',
  }),
};

/** Model outputs for a successful three-job run with per-item scoring. */
export function fullRunScript(): ScriptedResponse[] {
  const { profile, discovery, fit, ranking } = RUN_OUTPUTS;
  return [profile, discovery, fit, fit, fit, ranking];
}
