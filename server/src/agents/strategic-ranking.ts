/**
 * Stage 4: Strategic Ranking
 *
 * Orders scored opportunities by more than the raw score: growth potential,
 * practical factors and strategic value carry weight too. Ranking always
 * terminates with a usable report. With fewer than two inputs the model is
 * never called, and any generation or parse failure falls back to a
 * score-sorted ranking.
 */

import { errorMessage } from '../lib/errors.js';
import type { GenerationResult } from '../lib/llm.js';
import { tryParseGenerated } from '../lib/structured-output.js';
import { RankingOutputSchema, type RankedJob, type RankingOutput } from './schemas/ranking-schemas.js';
import {
  TIER_TITLES,
  type FitResult,
  type RankingEntry,
  type RankingReport,
  type StageContext,
  type Tier,
} from './types.js';

export const TIER_ACTIONS: Record<Tier, string> = {
  1: 'Apply immediately',
  2: 'Apply this week',
  3: 'Consider applying',
  4: 'Keep as backup',
};

export const EMPTY_STRATEGY = 'No opportunities to rank';
export const EMPTY_TOP_RECOMMENDATION = 'Search for more opportunities';
export const SINGLE_STRATEGY = 'This is your primary opportunity - focus on a strong application';
export const FALLBACK_STRATEGY = 'Jobs ranked by match score. Focus on highest scoring opportunities first.';

/** Score at or above which a lone opportunity is tier 1. */
export const SINGLE_TIER_ONE_THRESHOLD = 70;

const SYSTEM_PROMPT = `You are a senior career strategist with twenty years of experience advising professionals on which offers to pursue. The best job is not always the highest-scoring one: you weigh growth, practical factors and long-term strategic value, and you can spot an opportunity that scores slightly lower but is worth more over five years.`;

export function tierForScore(score: number): Tier {
  if (score >= 75) return 1;
  if (score >= 60) return 2;
  if (score >= 50) return 3;
  return 4;
}

function entryFor(result: FitResult, rank: number, tier: Tier, rationale: string, action: string, finalScore: number): RankingEntry {
  return Object.freeze({
    rank,
    title: result.opportunity.title,
    company: result.opportunity.company,
    opportunity_id: result.opportunity.opportunity_id,
    tier,
    tier_label: `TIER ${tier}` as const,
    tier_title: TIER_TITLES[tier],
    final_score: finalScore,
    rationale,
    action,
  });
}

function report(
  entries: RankingEntry[],
  overall_strategy: string,
  top_recommendation: string,
  source: RankingReport['source'],
): RankingReport {
  return Object.freeze({ entries: Object.freeze(entries), overall_strategy, top_recommendation, source });
}

// ─── Deterministic paths ─────────────────────────────────────────────

export function emptyRanking(): RankingReport {
  return report([], EMPTY_STRATEGY, EMPTY_TOP_RECOMMENDATION, 'empty');
}

export function singleRanking(result: FitResult): RankingReport {
  const score = result.overall_fit_score;
  const tier: Tier = score >= SINGLE_TIER_ONE_THRESHOLD ? 1 : 2;
  const entry = entryFor(result, 1, tier, `Only opportunity available. Score: ${score}/100`, 'Apply immediately', score);
  return report(
    [entry],
    SINGLE_STRATEGY,
    `Apply to ${entry.title} at ${entry.company}`,
    'single',
  );
}

/** Sort by overall score, highest first, and bucket into tiers by fixed thresholds. */
export function fallbackRanking(results: readonly FitResult[]): RankingReport {
  if (results.length === 0) return emptyRanking();
  const sorted = [...results].sort((a, b) => b.overall_fit_score - a.overall_fit_score);
  const entries = sorted.map((result, i) => {
    const score = result.overall_fit_score;
    const tier = tierForScore(score);
    return entryFor(result, i + 1, tier, `Ranked by match score (${score}/100)`, TIER_ACTIONS[tier], score);
  });
  return report(
    entries,
    FALLBACK_STRATEGY,
    `Start with ${entries[0].title} at ${entries[0].company}`,
    'fallback',
  );
}

// ─── Model path ──────────────────────────────────────────────────────

function describeResult(result: FitResult, jobNumber: number): string {
  const job = result.opportunity;
  return `Job ${jobNumber}:
  Title: ${job.title}
  Company: ${job.company}
  Location: ${job.location ?? 'Not specified'}
  Overall Score: ${result.overall_fit_score}/100
  Skill Match: ${result.skill_match_score}/60
  Experience Match: ${result.experience_match_score}/30
  Strengths: ${result.strengths.slice(0, 3).join(', ') || 'None listed'}
  Gaps: ${result.gaps.slice(0, 2).join(', ') || 'None'}
  Recommendation: ${result.recommendation}
  Remote Policy: ${job.remote_policy ?? 'Unknown'}
  Salary: ${job.salary_range ?? 'Not disclosed'}`;
}

export function buildRankingPrompt(results: readonly FitResult[]): string {
  return `Rank these ${results.length} job opportunities strategically for the candidate.

JOB OPPORTUNITIES TO RANK:
${results.map((r, i) => describeResult(r, i + 1)).join('\n\n')}

RANKING METHODOLOGY:
1. BASE SCORE (40% weight): use the overall score as the foundation.
2. CAREER GROWTH POTENTIAL (25% weight): advancement, company growth, resume value.
3. PRACTICAL FACTORS (20% weight): remote or on-site, location, work-life balance, salary if disclosed.
4. STRATEGIC VALUE (15% weight): fills skill gaps, stretch opportunity, company stability, sector trends.

TIERS (assign every job to exactly one):
- TIER 1 "${TIER_TITLES[1]}": apply immediately, excellent fit
- TIER 2 "${TIER_TITLES[2]}": definitely apply, very good fit
- TIER 3 "${TIER_TITLES[3]}": apply if time permits, decent fit
- TIER 4 "${TIER_TITLES[4]}": keep on radar, apply if nothing better

Return ONLY valid JSON:
{
  "ranked_jobs": [
    {
      "rank": 1,
      "job_number": 1,
      "job_title": "title",
      "company": "company name",
      "tier": "TIER 1",
      "final_score": 0,
      "ranking_rationale": "2-3 sentences explaining the rank",
      "action_recommendation": "${TIER_ACTIONS[1]}|${TIER_ACTIONS[2]}|${TIER_ACTIONS[3]}|${TIER_ACTIONS[4]}"
    }
  ],
  "overall_strategy": "2-3 sentences of strategic advice",
  "top_recommendation": "Which single job to prioritize and why"
}`;
}

function normalizeKey(value: string): string {
  return value.trim().toLowerCase();
}

/** Index into `results` for a ranked item: by job_number, then by title and company. */
function resolveIndex(item: RankedJob, results: readonly FitResult[]): number {
  if (item.job_number !== undefined && item.job_number <= results.length) {
    return item.job_number - 1;
  }
  const title = normalizeKey(item.job_title);
  const company = normalizeKey(item.company);
  return results.findIndex((r) =>
    normalizeKey(r.opportunity.title) === title && normalizeKey(r.opportunity.company) === company);
}

/**
 * Map the model's ranking onto the scored opportunities. Unresolvable and
 * repeated items are discarded; opportunities the model left out are appended
 * in score order with threshold tiers. Returns undefined when nothing resolves.
 */
export function assembleModelRanking(
  output: RankingOutput,
  results: readonly FitResult[],
  ctx: StageContext,
): RankingReport | undefined {
  const ordered = output.ranked_jobs
    .map((item, position) => ({ item, position }))
    .sort((a, b) => (a.item.rank ?? Infinity) - (b.item.rank ?? Infinity) || a.position - b.position);

  const used = new Set<number>();
  const entries: RankingEntry[] = [];
  let discarded = 0;

  for (const { item } of ordered) {
    const index = resolveIndex(item, results);
    if (index < 0 || used.has(index)) {
      discarded++;
      continue;
    }
    used.add(index);
    const action = item.action_recommendation.trim() || TIER_ACTIONS[item.tier];
    entries.push(entryFor(results[index], entries.length + 1, item.tier, item.ranking_rationale, action, item.final_score));
  }

  if (entries.length === 0) return undefined;

  const missing = results
    .map((result, index) => ({ result, index }))
    .filter(({ index }) => !used.has(index))
    .sort((a, b) => b.result.overall_fit_score - a.result.overall_fit_score);
  for (const { result } of missing) {
    const score = result.overall_fit_score;
    const tier = tierForScore(score);
    entries.push(entryFor(result, entries.length + 1, tier, `Ranked by match score (${score}/100)`, TIER_ACTIONS[tier], score));
  }

  if (discarded > 0 || missing.length > 0) {
    ctx.log.warn({ stage: 'strategic_ranking', discarded, appended: missing.length }, 'Model ranking did not cover every opportunity');
  }

  return report(
    entries,
    output.overall_strategy.trim() || FALLBACK_STRATEGY,
    output.top_recommendation.trim() || `Start with ${entries[0].title} at ${entries[0].company}`,
    'model',
  );
}

export interface StrategicRankingInput {
  fit_results: readonly FitResult[];
}

export async function runStrategicRanking(
  input: StrategicRankingInput,
  ctx: StageContext,
): Promise<RankingReport> {
  const results = input.fit_results;
  if (results.length === 0) return emptyRanking();
  if (results.length === 1) return singleRanking(results[0]);

  let response: GenerationResult;
  try {
    response = await ctx.generator.generate({
      system: SYSTEM_PROMPT,
      prompt: buildRankingPrompt(results),
      maxTokens: 4096,
      signal: ctx.signal,
    });
  } catch (err) {
    if (ctx.signal?.aborted) throw err;
    ctx.log.warn({ stage: 'strategic_ranking', error: errorMessage(err) }, 'Ranking generation failed; using score order');
    return fallbackRanking(results);
  }

  const parsed = tryParseGenerated(response, RankingOutputSchema);
  if (!parsed.success) {
    ctx.log.warn(
      { stage: 'strategic_ranking', kind: parsed.error.kind, error: parsed.error.message },
      'Ranking output unparseable; using score order',
    );
    return fallbackRanking(results);
  }

  const ranking = assembleModelRanking(parsed.data, results, ctx);
  if (!ranking) {
    ctx.log.warn({ stage: 'strategic_ranking' }, 'No ranked item matched a scored opportunity; using score order');
    return fallbackRanking(results);
  }

  ctx.log.info({ stage: 'strategic_ranking', count: ranking.entries.length }, 'Opportunities ranked');
  return ranking;
}
