/**
 * Shared type definitions for the job-match pipeline.
 *
 * Each stage is a function: typed input → typed output. Records are
 * read-only once constructed; the orchestrator is the only holder of
 * mutable run state.
 */

import type { TextGenerator } from '../lib/llm.js';
import type { Logger } from '../lib/logger.js';

// ─── Vocabularies ────────────────────────────────────────────────────

export const EXPERIENCE_LEVELS = ['entry', 'junior', 'mid', 'senior', 'lead', 'principal'] as const;
export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number];

export const SKILL_CATEGORIES = [
  'programming_language',
  'framework',
  'library',
  'tool',
  'platform',
  'soft_skill',
  'domain_knowledge',
  'database',
  'cloud',
  'devops',
  'methodology',
  'other',
] as const;
export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

export const PROFICIENCY_LEVELS = ['beginner', 'intermediate', 'advanced', 'expert'] as const;
export type Proficiency = (typeof PROFICIENCY_LEVELS)[number];

export const RECOMMENDATION_LABELS = {
  strong: 'Strong Match - Recommend Interview',
  good: 'Good Match - Consider for Interview',
  moderate: 'Moderate Match - Review Carefully',
  weak: 'Weak Match - Likely Not Suitable',
} as const;
export type RecommendationLabel = (typeof RECOMMENDATION_LABELS)[keyof typeof RECOMMENDATION_LABELS];

export type Tier = 1 | 2 | 3 | 4;
export type TierLabel = `TIER ${Tier}`;

export const TIER_TITLES: Record<Tier, string> = {
  1: 'Top Priority',
  2: 'Strong Contender',
  3: 'Worth Considering',
  4: 'Backup Option',
};

// ─── Stage plumbing ──────────────────────────────────────────────────

/** Collaborators every stage receives from the orchestrator. */
export interface StageContext {
  generator: TextGenerator;
  log: Logger;
  signal?: AbortSignal;
}

// ─── Stage 1: Profile Extraction ─────────────────────────────────────

export interface Skill {
  readonly name: string;
  readonly category: SkillCategory;
  readonly years_experience?: number;
  readonly proficiency?: Proficiency;
}

export interface CandidateProfile {
  readonly name?: string;
  readonly email?: string;
  readonly summary: string;
  readonly skills: readonly Skill[];
  readonly total_years_experience: number;
  readonly experience_level: ExperienceLevel;
  readonly previous_roles: readonly string[];
  readonly previous_companies: readonly string[];
  readonly education: readonly string[];
  readonly raw_source_text: string;
  readonly created_at: string;
}

export interface ProfileExtractionInput {
  resume_text: string;
}

// ─── Stage 2: Opportunity Discovery ──────────────────────────────────

export interface JobOpportunity {
  readonly opportunity_id: string;
  readonly title: string;
  readonly company: string;
  readonly description: string;
  readonly required_skills: readonly string[];
  readonly preferred_skills: readonly string[];
  readonly required_experience_level: ExperienceLevel;
  readonly location?: string;
  readonly salary_range?: string;
  readonly remote_policy?: string;
  readonly posted_at?: string;
  readonly url?: string;
}

export interface OpportunityDiscoveryInput {
  profile: CandidateProfile;
  target_role: string;
  count?: number;
  location?: string;
}

export type DiscoverySource = 'model' | 'search' | 'none';

export interface DiscoveryResult {
  opportunities: JobOpportunity[];
  /** `model` when the recommendation was used, `search` for the raw top-N fallback. */
  source: DiscoverySource;
  candidates_found: number;
  search_errors: string[];
  search_summary?: string;
  fallback_reason?: string;
}

// ─── Stage 3: Fit Scoring ────────────────────────────────────────────

export interface SkillAlignment {
  readonly skill_name: string;
  readonly candidate_has: boolean;
  readonly candidate_years?: number;
  readonly required_years?: number;
  readonly match_strength: number;
  readonly is_required: boolean;
}

/**
 * What the model reported next to what was kept. `consistent` is false when
 * any reported score differs from the reconciled one by more than the
 * tolerance.
 */
export interface ScoreCheck {
  readonly reported_overall: number;
  readonly reported_skill: number;
  readonly reported_experience: number;
  readonly consistent: boolean;
}

export interface FitResult {
  readonly candidate: CandidateProfile;
  readonly opportunity: JobOpportunity;
  readonly skill_alignments: readonly SkillAlignment[];
  readonly overall_fit_score: number;
  readonly skill_match_score: number;
  readonly experience_match_score: number;
  readonly profile_strength_score: number;
  readonly strengths: readonly string[];
  readonly gaps: readonly string[];
  readonly recommendation: RecommendationLabel;
  readonly explanation: string;
  readonly evaluated_at: string;
  readonly score_check: ScoreCheck;
}

export interface BatchFitScoringOutput {
  /** At most one result per input opportunity, in input order. */
  results: FitResult[];
  /** Tags of dropped items: out of range, fractional or repeated; null when missing or unreadable. */
  dropped: Array<number | null>;
}

// ─── Stage 4: Strategic Ranking ──────────────────────────────────────

export interface RankingEntry {
  readonly rank: number;
  readonly title: string;
  readonly company: string;
  readonly opportunity_id?: string;
  readonly tier: Tier;
  readonly tier_label: TierLabel;
  readonly tier_title: string;
  readonly final_score: number;
  readonly rationale: string;
  readonly action: string;
}

export type RankingSource = 'model' | 'fallback' | 'single' | 'empty';

export interface RankingReport {
  readonly entries: readonly RankingEntry[];
  readonly overall_strategy: string;
  readonly top_recommendation: string;
  readonly source: RankingSource;
}

// ─── Pipeline Orchestration ──────────────────────────────────────────

export type PipelineState =
  | 'empty'
  | 'profile_ready'
  | 'opportunities_ready'
  | 'scores_ready'
  | 'ranking_ready'
  | 'report_ready';

export type PipelineStep =
  | 'analyze_resume'
  | 'discover_opportunities'
  | 'score_opportunities'
  | 'rank_opportunities'
  | 'generate_report';

export type TraceStatus = 'started' | 'succeeded' | 'failed' | 'rejected' | 'info';

export interface TraceEntry {
  readonly at: string;
  readonly step: PipelineStep;
  readonly status: TraceStatus;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

/** Progress events for streaming clients. */
export type PipelineEvent =
  | { type: 'trace'; entry: TraceEntry }
  | { type: 'pipeline_complete'; run_id: string; report: PipelineReport }
  | { type: 'pipeline_error'; run_id: string; error: string; state: PipelineState };

export type PipelineEmitter = (event: PipelineEvent) => void;

export interface PipelineRunRequest {
  resume_text: string;
  target_role: string;
  num_jobs?: number;
  location?: string;
  batch_scoring?: boolean;
}

export interface PipelineReport {
  run_id: string;
  candidate: {
    name?: string;
    email?: string;
    summary: string;
    experience_level: ExperienceLevel;
    total_years: number;
    skills_count: number;
    top_skills: string[];
  };
  job_search: {
    target_role: string;
    source: DiscoverySource;
    candidates_found: number;
    opportunities_found: number;
    opportunities_scored: number;
    average_fit_score: number;
    dropped_batch_items: number;
  };
  fit_results: Array<{
    opportunity_id: string;
    title: string;
    company: string;
    overall_fit_score: number;
    skill_match_score: number;
    experience_match_score: number;
    recommendation: RecommendationLabel;
    strengths: string[];
    gaps: string[];
    url?: string;
  }>;
  ranking: RankingReport;
  usage: {
    generation_calls: number;
    input_tokens: number;
    output_tokens: number;
  };
  trace: TraceEntry[];
  generated_at: string;
}
