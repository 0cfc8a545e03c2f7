/**
 * Zod schemas for the pipeline's domain records.
 *
 * Model output flows through these on its way into a record, so the field
 * parsers are lenient about shape (nulls, numeric strings, a lone string
 * where a list is expected) and strict about meaning (ranges, required
 * names). Categorical fields are normalized, never rejected.
 */

import { z } from 'zod';
import { RECOMMENDATION_LABELS } from '../types.js';
import {
  normalizeExperienceLevel,
  normalizeProficiency,
  normalizeSkillCategory,
  parseExperienceLevel,
} from '../skill-taxonomy.js';

// ─── Field parsers ───────────────────────────────────────────────────

function blankToUndefined(value: unknown): unknown {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

function numericStringToNumber(value: unknown): unknown {
  const v = blankToUndefined(value);
  return typeof v === 'string' ? Number(v.trim()) : v;
}

/** Optional trimmed text; null and blank become undefined. */
export const optionalText = z.preprocess(
  blankToUndefined,
  z.string().trim().optional(),
);

/** List of non-empty strings; null becomes [] and a lone string becomes [string]. */
export const stringList = z.preprocess(
  (value) => {
    const v = blankToUndefined(value);
    if (v === undefined) return [];
    return typeof v === 'string' ? [v] : v;
  },
  z.array(z.string()).transform((items) => items.map((s) => s.trim()).filter((s) => s.length > 0)),
);

/** Optional non-negative number; accepts numeric strings. */
export const optionalYears = z.preprocess(
  numericStringToNumber,
  z.number().finite().min(0).optional(),
);

/** Bounded score; accepts numeric strings. */
export const boundedScore = (max: number) =>
  z.preprocess(numericStringToNumber, z.number().finite().min(0).max(max));

export const RecommendationLabelSchema = z.enum([
  RECOMMENDATION_LABELS.strong,
  RECOMMENDATION_LABELS.good,
  RECOMMENDATION_LABELS.moderate,
  RECOMMENDATION_LABELS.weak,
]);

// ─── Skill ───────────────────────────────────────────────────────────

export const SkillSchema = z.object({
  name: z.string().trim().min(1, 'Skill name is required'),
  category: z.unknown().transform(normalizeSkillCategory),
  years_experience: optionalYears,
  proficiency: z.unknown().transform(normalizeProficiency),
});

export type SkillInput = z.input<typeof SkillSchema>;

// ─── CandidateProfile ────────────────────────────────────────────────

export const CandidateProfileSchema = z
  .object({
    name: optionalText,
    email: optionalText,
    summary: z.preprocess((v) => v ?? '', z.string()),
    skills: z.array(SkillSchema).min(1, 'Candidate must have at least one skill'),
    total_years_experience: z.preprocess(
      (v) => numericStringToNumber(v) ?? 0,
      z.number().finite().min(0),
    ),
    experience_level: z.unknown(),
    previous_roles: stringList,
    previous_companies: stringList,
    education: stringList,
    raw_source_text: z.string().default(''),
    created_at: z.string().datetime().optional(),
  })
  .transform((profile) => ({
    ...profile,
    experience_level: normalizeExperienceLevel(profile.experience_level, profile.total_years_experience),
    created_at: profile.created_at ?? new Date().toISOString(),
  }));

export type CandidateProfileInput = z.input<typeof CandidateProfileSchema>;

// ─── JobOpportunity ──────────────────────────────────────────────────

export const JobOpportunitySchema = z.object({
  opportunity_id: z.preprocess(
    (v) => (typeof v === 'number' ? String(v) : v),
    z.string().trim().min(1, 'opportunity_id is required'),
  ),
  title: z.string().trim().min(1, 'Job title is required'),
  company: z.preprocess((v) => blankToUndefined(v) ?? 'Unknown company', z.string().trim()),
  description: z.preprocess((v) => v ?? '', z.string()),
  required_skills: stringList,
  preferred_skills: stringList,
  required_experience_level: z.unknown().transform((v) => parseExperienceLevel(v) ?? 'mid'),
  location: optionalText,
  salary_range: optionalText,
  remote_policy: optionalText,
  posted_at: optionalText,
  url: optionalText,
});

export type JobOpportunityInput = z.input<typeof JobOpportunitySchema>;

// ─── SkillAlignment ──────────────────────────────────────────────────

export const SkillAlignmentSchema = z.object({
  skill_name: z.string().trim().min(1),
  candidate_has: z.boolean(),
  candidate_years: optionalYears,
  required_years: optionalYears,
  match_strength: boundedScore(1),
  is_required: z.boolean().default(true),
});

// ─── FitResult scores ────────────────────────────────────────────────

export const FitScoresSchema = z.object({
  overall_fit_score: boundedScore(100),
  skill_match_score: boundedScore(60),
  experience_match_score: boundedScore(30),
  profile_strength_score: boundedScore(10),
  recommendation: RecommendationLabelSchema,
});
