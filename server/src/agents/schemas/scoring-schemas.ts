/**
 * Zod schemas for fit-scoring model output, single and batch.
 *
 * Scores are range-checked against the rubric ceilings; a model that
 * reports 75/60 for skills fails validation rather than being clamped.
 */

import { z } from 'zod';
import { SkillAlignmentSchema, boundedScore, stringList } from './domain-schemas.js';

export const FitAssessmentSchema = z.object({
  skill_matches: z.preprocess((v) => v ?? [], z.array(SkillAlignmentSchema)),
  overall_fit_score: boundedScore(100),
  skill_match_score: boundedScore(60),
  experience_match_score: boundedScore(30),
  strengths: stringList,
  gaps: stringList,
  recommendation: z.string().optional(),
  explanation: z.preprocess((v) => v ?? '', z.string()),
}).passthrough();

export type FitAssessment = z.infer<typeof FitAssessmentSchema>;

/**
 * A batch item's `job_index`, read on its own so that an item with a bad tag
 * can be dropped without its body failing the whole batch.
 */
export const JobIndexSchema = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
  z.number().finite(),
);

export const BatchFitOutputSchema = z.object({
  matches: z.array(z.unknown()),
}).passthrough();

// ─── Tool definitions for providers with structured output ───────────

const SKILL_MATCH_JSON_SCHEMA = {
  type: 'object',
  properties: {
    skill_name: { type: 'string' },
    candidate_has: { type: 'boolean' },
    candidate_years: { type: ['number', 'null'] },
    required_years: { type: ['number', 'null'] },
    match_strength: { type: 'number', minimum: 0, maximum: 1 },
    is_required: { type: 'boolean' },
  },
  required: ['skill_name', 'candidate_has', 'match_strength', 'is_required'],
} as const;

const FIT_ASSESSMENT_PROPERTIES = {
  skill_matches: { type: 'array', items: SKILL_MATCH_JSON_SCHEMA },
  overall_fit_score: { type: 'number', minimum: 0, maximum: 100 },
  skill_match_score: { type: 'number', minimum: 0, maximum: 60 },
  experience_match_score: { type: 'number', minimum: 0, maximum: 30 },
  strengths: { type: 'array', items: { type: 'string' } },
  gaps: { type: 'array', items: { type: 'string' } },
  recommendation: { type: 'string' },
  explanation: { type: 'string' },
} as const;

const FIT_ASSESSMENT_REQUIRED = [
  'skill_matches',
  'overall_fit_score',
  'skill_match_score',
  'experience_match_score',
  'strengths',
  'gaps',
  'recommendation',
  'explanation',
];

export const FIT_ASSESSMENT_TOOL = {
  name: 'record_fit_assessment',
  description: 'Record the skill match analysis and rubric scores for one candidate/job pair.',
  input_schema: {
    type: 'object',
    properties: FIT_ASSESSMENT_PROPERTIES,
    required: FIT_ASSESSMENT_REQUIRED,
  },
};

export const BATCH_FIT_ASSESSMENT_TOOL = {
  name: 'record_fit_assessments',
  description: 'Record one skill match analysis per job, tagged with the job_index from the prompt.',
  input_schema: {
    type: 'object',
    properties: {
      matches: {
        type: 'array',
        items: {
          type: 'object',
          properties: { job_index: { type: 'integer', minimum: 0 }, ...FIT_ASSESSMENT_PROPERTIES },
          required: ['job_index', ...FIT_ASSESSMENT_REQUIRED],
        },
      },
    },
    required: ['matches'],
  },
};
