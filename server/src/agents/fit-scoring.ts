/**
 * Stage 3: Fit Scoring (single and batch)
 *
 * The model judges skill alignment against an explicit rubric. Its arithmetic
 * is not trusted: experience points are recomputed from the level ladder,
 * skill points from the alignments it reported, and the recommendation label
 * from the reconciled total. Whatever the model claimed is kept in
 * `score_check` so disagreements stay visible.
 *
 * No fallback scorer exists. Unparseable output is a StageError.
 */

import {
  DomainValidationError,
  StageError,
  StructuredOutputError,
} from '../lib/errors.js';
import type { GenerationResult } from '../lib/llm.js';
import { parseGenerated, validateStructured } from '../lib/structured-output.js';
import { createFitResult, createSkillAlignment } from './domain.js';
import {
  BATCH_FIT_ASSESSMENT_TOOL,
  BatchFitOutputSchema,
  FIT_ASSESSMENT_TOOL,
  FitAssessmentSchema,
  JobIndexSchema,
  type FitAssessment,
} from './schemas/scoring-schemas.js';
import { experienceLevelDistance } from './skill-taxonomy.js';
import {
  RECOMMENDATION_LABELS,
  type BatchFitScoringOutput,
  type CandidateProfile,
  type ExperienceLevel,
  type FitResult,
  type JobOpportunity,
  type RecommendationLabel,
  type ScoreCheck,
  type SkillAlignment,
  type StageContext,
} from './types.js';

export const SKILL_POINTS_CAP = 60;
export const EXPERIENCE_POINTS_CAP = 30;
export const PROFILE_STRENGTH_CAP = 10;
/** Points of disagreement tolerated before a reported score is flagged. */
export const SCORE_TOLERANCE = 5;
/** match_strength at or above this counts as an exact match. */
export const EXACT_MATCH_STRENGTH = 0.9;

export const SCORING_RUBRIC = `EXPLICIT SCORING RULES (Total: 100 points):

1. SKILL MATCHING (60 points max):
   For each REQUIRED skill:
   - Exact match + sufficient experience: +20 points
   - Exact match + insufficient experience: +10 points
   - Similar/equivalent skill: +15 points
   - Missing: 0 points

   For each PREFERRED skill:
   - Has skill: +5 points
   - Missing: 0 points

   Cap at 60 points total for this section.

2. EXPERIENCE LEVEL MATCHING (30 points max):
   - Exact match: +30 points
   - One level above: +20 points
   - One level below: +15 points
   - Two+ levels different: +5 points

   Experience hierarchy: entry < junior < mid < senior < lead < principal

3. OVERALL PROFILE STRENGTH (10 points max):
   - Strong overall fit with job domain: +10 points
   - Moderate fit: +5 points
   - Weak fit: 0 points

overall_fit_score = sum of the three sections, between 0 and 100.

RECOMMENDATION (by overall_fit_score):
- "${RECOMMENDATION_LABELS.strong}" (score >= 75)
- "${RECOMMENDATION_LABELS.good}" (score 60-74)
- "${RECOMMENDATION_LABELS.moderate}" (score 50-59)
- "${RECOMMENDATION_LABELS.weak}" (score < 50)`;

const SYSTEM_PROMPT = `You are a meticulous technical recruiter. You score candidates against job requirements by following a fixed rubric exactly, showing your arithmetic. You recognise equivalent skills (Flask and FastAPI, PostgreSQL and MySQL) and you know what years of experience mean for different technologies.`;

// ─── Deterministic rubric ────────────────────────────────────────────

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Rubric section 2: 30 exact, 20 one above, 15 one below, 5 otherwise. */
export function experienceMatchPoints(candidate: ExperienceLevel, required: ExperienceLevel): number {
  const distance = experienceLevelDistance(candidate, required);
  if (distance === 0) return EXPERIENCE_POINTS_CAP;
  if (distance === 1) return 20;
  if (distance === -1) return 15;
  return 5;
}

function requiredSkillPoints(alignment: SkillAlignment): number {
  if (!alignment.candidate_has || alignment.match_strength <= 0) return 0;
  if (alignment.match_strength < EXACT_MATCH_STRENGTH) return 15;
  const sufficient = alignment.required_years === undefined
    || (alignment.candidate_years !== undefined && alignment.candidate_years >= alignment.required_years);
  return sufficient ? 20 : 10;
}

/** Rubric section 1, capped at 60. */
export function skillMatchPoints(alignments: readonly SkillAlignment[]): number {
  let total = 0;
  for (const alignment of alignments) {
    if (alignment.is_required) {
      total += requiredSkillPoints(alignment);
    } else if (alignment.candidate_has && alignment.match_strength > 0) {
      total += 5;
    }
  }
  return Math.min(total, SKILL_POINTS_CAP);
}

export function recommendationFor(score: number): RecommendationLabel {
  if (score >= 75) return RECOMMENDATION_LABELS.strong;
  if (score >= 60) return RECOMMENDATION_LABELS.good;
  if (score >= 50) return RECOMMENDATION_LABELS.moderate;
  return RECOMMENDATION_LABELS.weak;
}

export interface ReconciledScores {
  overall_fit_score: number;
  skill_match_score: number;
  experience_match_score: number;
  profile_strength_score: number;
  recommendation: RecommendationLabel;
  score_check: ScoreCheck;
}

/**
 * Combine the model's judgement with the rubric. Profile strength is the only
 * component the rubric cannot derive, so it is read off the model's totals.
 */
export function reconcileScores(
  assessment: Pick<FitAssessment, 'overall_fit_score' | 'skill_match_score' | 'experience_match_score'>,
  alignments: readonly SkillAlignment[],
  candidateLevel: ExperienceLevel,
  requiredLevel: ExperienceLevel,
): ReconciledScores {
  const experience = experienceMatchPoints(candidateLevel, requiredLevel);
  const skill = alignments.length > 0
    ? skillMatchPoints(alignments)
    : Math.round(clamp(assessment.skill_match_score, 0, SKILL_POINTS_CAP));
  const profileStrength = Math.round(clamp(
    assessment.overall_fit_score - assessment.skill_match_score - assessment.experience_match_score,
    0,
    PROFILE_STRENGTH_CAP,
  ));
  const overall = clamp(skill + experience + profileStrength, 0, 100);

  const consistent =
    Math.abs(assessment.overall_fit_score - overall) <= SCORE_TOLERANCE
    && Math.abs(assessment.skill_match_score - skill) <= SCORE_TOLERANCE
    && Math.abs(assessment.experience_match_score - experience) <= SCORE_TOLERANCE;

  return {
    overall_fit_score: overall,
    skill_match_score: skill,
    experience_match_score: experience,
    profile_strength_score: profileStrength,
    recommendation: recommendationFor(overall),
    score_check: {
      reported_overall: assessment.overall_fit_score,
      reported_skill: assessment.skill_match_score,
      reported_experience: assessment.experience_match_score,
      consistent,
    },
  };
}

// ─── Prompts ─────────────────────────────────────────────────────────

function describeCandidate(candidate: CandidateProfile): string {
  const skills = candidate.skills
    .map((s) => `  - ${s.name} (${s.category}): ${s.years_experience ?? 'unspecified'} years, ${s.proficiency ?? 'unspecified'} proficiency`)
    .join('\n');
  return `CANDIDATE INFORMATION:
- Name: ${candidate.name ?? 'Not provided'}
- Experience Level: ${candidate.experience_level}
- Total Years: ${candidate.total_years_experience}
- Skills:
${skills}`;
}

function describeJob(job: JobOpportunity): string {
  return `- Title: ${job.title}
- Company: ${job.company}
- Required Experience Level: ${job.required_experience_level}
- Required Skills: ${job.required_skills.join(', ') || 'Not listed'}
- Preferred Skills: ${job.preferred_skills.join(', ') || 'Not listed'}`;
}

const ANALYSIS_REQUIREMENTS = `ANALYSIS REQUIREMENTS:
1. One skill_matches entry per required and preferred skill:
   skill_name, candidate_has, candidate_years, required_years (if the posting states one),
   match_strength (0.0 none to 1.0 exact; use 0.9 or above only for an exact match),
   is_required.
2. skill_match_score (0-60), experience_match_score (0-30) and overall_fit_score (0-100) per the rules.
3. strengths: specific skills and experience that make the candidate a good fit.
4. gaps: missing required skills, level mismatches, significant weaknesses.
5. recommendation: one of the four labels above, chosen by overall_fit_score.
6. explanation: 2-3 short paragraphs covering the score breakdown, key strengths and whether the gaps are dealbreakers.`;

const ASSESSMENT_JSON = `  "skill_matches": [
    {
      "skill_name": "skill name",
      "candidate_has": true,
      "candidate_years": 3,
      "required_years": null,
      "match_strength": 0.95,
      "is_required": true
    }
  ],
  "overall_fit_score": 0,
  "skill_match_score": 0,
  "experience_match_score": 0,
  "strengths": ["strength"],
  "gaps": ["gap"],
  "recommendation": "label",
  "explanation": "explanation"`;

export function buildFitScoringPrompt(candidate: CandidateProfile, job: JobOpportunity): string {
  return `Perform a detailed skill match analysis between the candidate and the job posting.

${describeCandidate(candidate)}

JOB POSTING INFORMATION:
${describeJob(job)}

${SCORING_RUBRIC}

${ANALYSIS_REQUIREMENTS}

Return ONLY valid JSON:
{
${ASSESSMENT_JSON}
}`;
}

export function buildBatchFitScoringPrompt(candidate: CandidateProfile, jobs: readonly JobOpportunity[]): string {
  const postings = jobs
    .map((job, index) => `JOB job_index=${index}:\n${describeJob(job)}`)
    .join('\n\n');
  return `Perform a detailed skill match analysis between the candidate and EACH of the ${jobs.length} job postings below.

${describeCandidate(candidate)}

JOB POSTINGS:
${postings}

${SCORING_RUBRIC}

${ANALYSIS_REQUIREMENTS}

Return ONLY valid JSON with exactly one entry per posting, tagged with its job_index (0-based, as shown above):
{
  "matches": [
    {
      "job_index": 0,
${ASSESSMENT_JSON.replace(/^/gm, '  ')}
    }
  ]
}`;
}

// ─── Result construction ─────────────────────────────────────────────

function buildFitResult(
  candidate: CandidateProfile,
  job: JobOpportunity,
  assessment: FitAssessment,
  ctx: StageContext,
): FitResult {
  const alignments = assessment.skill_matches.map((m) => createSkillAlignment(m));
  const scores = reconcileScores(assessment, alignments, candidate.experience_level, job.required_experience_level);

  if (!scores.score_check.consistent) {
    ctx.log.warn(
      {
        stage: 'fit_scoring',
        opportunity_id: job.opportunity_id,
        reported: scores.score_check,
        kept: {
          overall: scores.overall_fit_score,
          skill: scores.skill_match_score,
          experience: scores.experience_match_score,
        },
      },
      'Reported scores disagree with the rubric',
    );
  }
  if (assessment.recommendation && assessment.recommendation !== scores.recommendation) {
    ctx.log.debug(
      { opportunity_id: job.opportunity_id, reported: assessment.recommendation, kept: scores.recommendation },
      'Recommendation label replaced',
    );
  }

  return createFitResult({
    candidate,
    opportunity: job,
    skill_alignments: alignments,
    ...scores,
    strengths: assessment.strengths,
    gaps: assessment.gaps,
    explanation: assessment.explanation,
  });
}

function toStageError(err: unknown, message: string, response: GenerationResult, ctx: StageContext): never {
  if (err instanceof StructuredOutputError || err instanceof DomainValidationError) {
    ctx.log.warn(
      { stage: 'fit_scoring', error: err.message, rawSnippet: response.text.slice(0, 500) },
      'Fit scoring output rejected',
    );
    throw new StageError('fit_scoring', `${message}: ${err.message}`, { cause: err });
  }
  throw err;
}

// ─── Stage entry points ──────────────────────────────────────────────

export interface FitScoringInput {
  profile: CandidateProfile;
  opportunity: JobOpportunity;
}

export async function runFitScoring(input: FitScoringInput, ctx: StageContext): Promise<FitResult> {
  const { profile, opportunity } = input;
  const response = await ctx.generator.generate({
    system: SYSTEM_PROMPT,
    prompt: buildFitScoringPrompt(profile, opportunity),
    maxTokens: 4096,
    structuredOutput: FIT_ASSESSMENT_TOOL,
    signal: ctx.signal,
  });

  try {
    const assessment = parseGenerated(response, FitAssessmentSchema);
    const result = buildFitResult(profile, opportunity, assessment, ctx);
    ctx.log.info(
      { stage: 'fit_scoring', opportunity_id: opportunity.opportunity_id, score: result.overall_fit_score },
      'Opportunity scored',
    );
    return result;
  } catch (err) {
    return toStageError(err, `Failed to score ${opportunity.title} at ${opportunity.company}`, response, ctx);
  }
}

export interface BatchFitScoringInput {
  profile: CandidateProfile;
  opportunities: readonly JobOpportunity[];
}

/** A batch item's tag, or null when it has no readable numeric `job_index`. */
function readJobIndex(item: unknown): number | null {
  if (typeof item !== 'object' || item === null) return null;
  const parsed = JobIndexSchema.safeParse(Reflect.get(item, 'job_index'));
  return parsed.success ? parsed.data : null;
}

/**
 * One generation call for every opportunity. An item whose tag is missing,
 * not an integer in [0, N), or already seen is dropped and reported before
 * its body is read, so `results.length <= N`. A kept item with an invalid
 * body fails the batch like a single assessment would.
 */
export async function runBatchFitScoring(
  input: BatchFitScoringInput,
  ctx: StageContext,
): Promise<BatchFitScoringOutput> {
  const { profile, opportunities } = input;
  if (opportunities.length === 0) {
    return { results: [], dropped: [] };
  }

  const response = await ctx.generator.generate({
    system: SYSTEM_PROMPT,
    prompt: buildBatchFitScoringPrompt(profile, opportunities),
    maxTokens: Math.min(16_384, 2048 + opportunities.length * 1500),
    structuredOutput: BATCH_FIT_ASSESSMENT_TOOL,
    signal: ctx.signal,
  });

  try {
    const output = parseGenerated(response, BatchFitOutputSchema);
    const byIndex = new Map<number, FitResult>();
    const dropped: Array<number | null> = [];

    for (const item of output.matches) {
      const index = readJobIndex(item);
      const job = index !== null && Number.isInteger(index) ? opportunities[index] : undefined;
      if (index === null || !job || byIndex.has(index)) {
        dropped.push(index);
        continue;
      }
      const assessment = validateStructured(item, FitAssessmentSchema, response.text || JSON.stringify(item));
      byIndex.set(index, buildFitResult(profile, job, assessment, ctx));
    }

    if (dropped.length > 0) {
      ctx.log.warn({ stage: 'fit_scoring', dropped, total: opportunities.length }, 'Dropped batch items with invalid or repeated job_index');
    }

    const results = [...byIndex.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, result]) => result);
    ctx.log.info({ stage: 'fit_scoring', scored: results.length, total: opportunities.length }, 'Batch scored');
    return { results, dropped };
  } catch (err) {
    return toStageError(err, 'Failed to score opportunity batch', response, ctx);
  }
}
