/**
 * Record factories. Every domain record enters the pipeline through one of
 * these: the input is validated against its schema and the result is frozen.
 */

import type { z } from 'zod';
import { DomainValidationError } from '../lib/errors.js';
import {
  CandidateProfileSchema,
  FitScoresSchema,
  JobOpportunitySchema,
  SkillAlignmentSchema,
  SkillSchema,
  type CandidateProfileInput,
  type JobOpportunityInput,
  type SkillInput,
} from './schemas/domain-schemas.js';
import type {
  CandidateProfile,
  FitResult,
  JobOpportunity,
  RecommendationLabel,
  ScoreCheck,
  Skill,
  SkillAlignment,
} from './types.js';

function parseOrThrow<S extends z.ZodTypeAny>(entity: string, schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new DomainValidationError(entity, result.error.issues);
  }
  return result.data;
}

function freezeSkill(skill: z.output<typeof SkillSchema>): Skill {
  return Object.freeze({ ...skill });
}

export function createSkill(input: SkillInput): Skill {
  return freezeSkill(parseOrThrow('Skill', SkillSchema, input));
}

/** Throws `DomainValidationError` when the skills list is empty. */
export function createCandidateProfile(input: CandidateProfileInput): CandidateProfile {
  const data = parseOrThrow('CandidateProfile', CandidateProfileSchema, input);
  return Object.freeze({
    ...data,
    skills: Object.freeze(data.skills.map(freezeSkill)),
    previous_roles: Object.freeze(data.previous_roles),
    previous_companies: Object.freeze(data.previous_companies),
    education: Object.freeze(data.education),
  });
}

export function createJobOpportunity(input: JobOpportunityInput): JobOpportunity {
  const data = parseOrThrow('JobOpportunity', JobOpportunitySchema, input);
  return Object.freeze({
    ...data,
    required_skills: Object.freeze(data.required_skills),
    preferred_skills: Object.freeze(data.preferred_skills),
  });
}

export function createSkillAlignment(input: unknown): SkillAlignment {
  return Object.freeze(parseOrThrow('SkillAlignment', SkillAlignmentSchema, input));
}

export interface FitResultInput {
  candidate: CandidateProfile;
  opportunity: JobOpportunity;
  skill_alignments: readonly SkillAlignment[];
  overall_fit_score: number;
  skill_match_score: number;
  experience_match_score: number;
  profile_strength_score: number;
  strengths: readonly string[];
  gaps: readonly string[];
  recommendation: RecommendationLabel;
  explanation: string;
  score_check: ScoreCheck;
  evaluated_at?: string;
}

export function createFitResult(input: FitResultInput): FitResult {
  const scores = parseOrThrow('FitResult', FitScoresSchema, input);
  return Object.freeze({
    candidate: input.candidate,
    opportunity: input.opportunity,
    skill_alignments: Object.freeze([...input.skill_alignments]),
    ...scores,
    strengths: Object.freeze([...input.strengths]),
    gaps: Object.freeze([...input.gaps]),
    explanation: input.explanation,
    evaluated_at: input.evaluated_at ?? new Date().toISOString(),
    score_check: Object.freeze({ ...input.score_check }),
  });
}
