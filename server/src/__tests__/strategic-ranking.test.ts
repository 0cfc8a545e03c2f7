import { describe, it, expect } from 'vitest';
import {
  EMPTY_STRATEGY,
  FALLBACK_STRATEGY,
  SINGLE_STRATEGY,
  fallbackRanking,
  runStrategicRanking,
  tierForScore,
} from '../agents/strategic-ranking.js';
import { makeFitResult, makeOpportunity, scriptedGenerator, silentLogger, stageContext } from './fixtures.js';

const a = makeFitResult(makeOpportunity('a'), 80);
const b = makeFitResult(makeOpportunity('b'), 65);
const c = makeFitResult(makeOpportunity('c'), 55);

describe('tierForScore', () => {
  it.each([
    [75, 1],
    [74, 2],
    [60, 2],
    [59, 3],
    [50, 3],
    [49, 4],
  ])('puts %i in tier %i', (score, tier) => {
    expect(tierForScore(score)).toBe(tier);
  });
});

describe('runStrategicRanking without the model', () => {
  it('returns the empty report for no results', async () => {
    const generator = scriptedGenerator();
    const ranking = await runStrategicRanking({ fit_results: [] }, stageContext(generator));

    expect(ranking.entries).toEqual([]);
    expect(ranking.overall_strategy).toBe(EMPTY_STRATEGY);
    expect(ranking.source).toBe('empty');
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it('puts a lone result at 70 or above in tier 1', async () => {
    const generator = scriptedGenerator();
    const ranking = await runStrategicRanking(
      { fit_results: [makeFitResult(makeOpportunity('a'), 70)] },
      stageContext(generator),
    );

    expect(ranking.source).toBe('single');
    expect(ranking.overall_strategy).toBe(SINGLE_STRATEGY);
    expect(ranking.top_recommendation).toBe('Apply to Engineer a at Company a');
    expect(ranking.entries[0]).toMatchObject({
      rank: 1,
      tier: 1,
      tier_label: 'TIER 1',
      tier_title: 'Top Priority',
      final_score: 70,
      rationale: 'Only opportunity available. Score: 70/100',
      action: 'Apply immediately',
    });
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it('puts a lone result below 70 in tier 2', async () => {
    const ranking = await runStrategicRanking(
      { fit_results: [makeFitResult(makeOpportunity('a'), 69)] },
      stageContext(scriptedGenerator()),
    );
    expect(ranking.entries[0].tier).toBe(2);
    expect(ranking.entries[0].tier_title).toBe('Strong Contender');
  });
});

describe('fallbackRanking', () => {
  it('sorts by score and assigns threshold tiers', () => {
    const results = [
      makeFitResult(makeOpportunity('mid'), 60),
      makeFitResult(makeOpportunity('top'), 85),
      makeFitResult(makeOpportunity('low'), 40),
    ];
    const ranking = fallbackRanking(results);

    expect(ranking.entries.map((e) => [e.rank, e.opportunity_id, e.tier, e.action])).toEqual([
      [1, 'top', 1, 'Apply immediately'],
      [2, 'mid', 2, 'Apply this week'],
      [3, 'low', 4, 'Keep as backup'],
    ]);
    expect(ranking.entries[0].rationale).toBe('Ranked by match score (85/100)');
    expect(ranking.top_recommendation).toBe('Start with Engineer top at Company top');
    expect(ranking.overall_strategy).toBe(FALLBACK_STRATEGY);
    expect(ranking.source).toBe('fallback');
  });
});

describe('runStrategicRanking with the model', () => {
  it('follows the model order and appends opportunities it left out', async () => {
    const generator = scriptedGenerator(JSON.stringify({
      ranked_jobs: [
        { rank: 2, job_number: 1, tier: 'TIER 2', final_score: 78, ranking_rationale: 'Solid but slow growth' },
        { rank: 1, job_number: 3, tier: 'Tier 1', final_score: 70, ranking_rationale: 'Fast-growing team', action_recommendation: 'Apply immediately' },
        { rank: 3, job_number: 9, tier: 3, final_score: 50 },
      ],
      top_recommendation: 'Prioritize Company c',
    }));
    const ranking = await runStrategicRanking({ fit_results: [a, b, c] }, stageContext(generator));

    expect(ranking.source).toBe('model');
    expect(ranking.entries.map((e) => [e.rank, e.opportunity_id, e.tier, e.final_score, e.action])).toEqual([
      [1, 'c', 1, 70, 'Apply immediately'],
      [2, 'a', 2, 78, 'Apply this week'],
      [3, 'b', 2, 65, 'Apply this week'],
    ]);
    expect(ranking.entries[2].rationale).toBe('Ranked by match score (65/100)');
    expect(ranking.overall_strategy).toBe(FALLBACK_STRATEGY);
    expect(ranking.top_recommendation).toBe('Prioritize Company c');
  });

  it('resolves items by title and company when there is no job number', async () => {
    const generator = scriptedGenerator(JSON.stringify({
      ranked_jobs: [
        { job_title: ' ENGINEER B ', company: 'company b', tier: '1', final_score: 90 },
        { job_title: 'Engineer b', company: 'Company b', tier: '2', final_score: 60 },
      ],
      overall_strategy: 'Go for growth.',
    }));
    const ranking = await runStrategicRanking({ fit_results: [a, b] }, stageContext(generator));

    expect(ranking.entries.map((e) => e.opportunity_id)).toEqual(['b', 'a']);
    expect(ranking.entries[0].final_score).toBe(90);
    expect(ranking.overall_strategy).toBe('Go for growth.');
    expect(ranking.top_recommendation).toBe('Start with Engineer b at Company b');
  });

  it('falls back to score order when nothing resolves', async () => {
    const generator = scriptedGenerator(JSON.stringify({
      ranked_jobs: [{ job_title: 'Astronaut', company: 'NASA', tier: 1, final_score: 99 }],
    }));
    const ranking = await runStrategicRanking({ fit_results: [c, a] }, stageContext(generator));
    expect(ranking.source).toBe('fallback');
    expect(ranking.entries.map((e) => e.opportunity_id)).toEqual(['a', 'c']);
  });

  it('falls back to score order on an empty ranked list', async () => {
    const generator = scriptedGenerator(JSON.stringify({ ranked_jobs: [] }));
    const ranking = await runStrategicRanking({ fit_results: [a, b] }, stageContext(generator));
    expect(ranking.source).toBe('fallback');
  });

  it('falls back to score order when generation fails', async () => {
    const generator = scriptedGenerator(new Error('rate limited'));
    const ranking = await runStrategicRanking({ fit_results: [b, a] }, stageContext(generator));
    expect(ranking.source).toBe('fallback');
    expect(ranking.entries.map((e) => e.opportunity_id)).toEqual(['a', 'b']);
  });

  it('rethrows when the run was aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const aborted = new Error('aborted');
    const generator = scriptedGenerator(aborted);
    await expect(
      runStrategicRanking({ fit_results: [a, b] }, { generator, log: silentLogger, signal: controller.signal }),
    ).rejects.toBe(aborted);
  });
});
