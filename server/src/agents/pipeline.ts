/**
 * Pipeline Orchestrator
 *
 * One JobMatchPipeline instance per run. Sequences the four stages plus the
 * report, guards every transition on the current state, and appends each
 * attempt to an execution trace that is never truncated. Stage failures are
 * recorded and re-thrown; retry policy belongs to the caller.
 *
 *   empty → profile_ready → opportunities_ready → scores_ready → ranking_ready → report_ready
 */

import { PreconditionError, StageError, errorMessage } from '../lib/errors.js';
import type { JobSearchClient } from '../lib/job-search.js';
import { UsageTracker, type TextGenerator, type UsageSnapshot } from '../lib/llm.js';
import logger, { type Logger } from '../lib/logger.js';
import { runBatchFitScoring, runFitScoring } from './fit-scoring.js';
import { DEFAULT_OPPORTUNITY_COUNT, runOpportunityDiscovery } from './opportunity-discovery.js';
import { runProfileExtraction } from './profile-extraction.js';
import { runStrategicRanking } from './strategic-ranking.js';
import type {
  CandidateProfile,
  DiscoveryResult,
  FitResult,
  JobOpportunity,
  PipelineEmitter,
  PipelineReport,
  PipelineRunRequest,
  PipelineState,
  PipelineStep,
  RankingReport,
  StageContext,
  TraceEntry,
  TraceStatus,
} from './types.js';

export interface JobMatchPipelineOptions {
  runId: string;
  generator: TextGenerator;
  search: JobSearchClient;
  log?: Logger;
  emit?: PipelineEmitter;
  signal?: AbortSignal;
  /** Default for `scoreOpportunities` when the caller does not choose. */
  batchScoring?: boolean;
}

export interface DiscoverOptions {
  count?: number;
  location?: string;
}

export class JobMatchPipeline {
  readonly runId: string;
  private currentState: PipelineState = 'empty';
  private readonly trace: TraceEntry[] = [];
  private readonly usage: UsageTracker;
  private readonly search: JobSearchClient;
  private readonly log: Logger;
  private readonly emit?: PipelineEmitter;
  private readonly signal?: AbortSignal;
  private readonly batchScoring: boolean;

  private targetRole = '';
  private profile?: CandidateProfile;
  private discovery?: DiscoveryResult;
  private fitResults: FitResult[] = [];
  private droppedBatchItems: Array<number | null> = [];
  private ranking?: RankingReport;
  private finalReport?: PipelineReport;

  constructor(options: JobMatchPipelineOptions) {
    this.runId = options.runId;
    this.usage = new UsageTracker(options.generator);
    this.search = options.search;
    this.log = options.log ?? logger.child({ runId: options.runId });
    this.emit = options.emit;
    this.signal = options.signal;
    this.batchScoring = options.batchScoring ?? false;
  }

  get state(): PipelineState {
    return this.currentState;
  }

  getTrace(): TraceEntry[] {
    return [...this.trace];
  }

  getUsage(): UsageSnapshot {
    return this.usage.snapshot();
  }

  getReport(): PipelineReport | undefined {
    return this.finalReport;
  }

  // ─── Transitions ─────────────────────────────────────────────────

  async analyzeResume(resumeText: string): Promise<CandidateProfile> {
    const step: PipelineStep = 'analyze_resume';
    this.guard(step, this.currentState === 'empty', 'a résumé can only be analyzed once per run');

    const profile = await this.runStep(step, 'Step 1/5: Analyzing resume', () =>
      runProfileExtraction({ resume_text: resumeText }, this.stageContext()));

    this.profile = profile;
    this.advance('profile_ready', step, `Resume analyzed: ${profile.name ?? 'unnamed candidate'}`, {
      skills: profile.skills.length,
      experience_level: profile.experience_level,
      total_years: profile.total_years_experience,
    });
    return profile;
  }

  async discoverOpportunities(targetRole: string, options: DiscoverOptions = {}): Promise<DiscoveryResult> {
    const step: PipelineStep = 'discover_opportunities';
    const profile = this.profile;
    this.guard(step, this.currentState === 'profile_ready' && profile !== undefined, 'requires an analyzed résumé');

    const discovery = await this.runStep(step, `Step 2/5: Searching for '${targetRole}' jobs`, () =>
      runOpportunityDiscovery(
        {
          profile,
          target_role: targetRole,
          count: options.count ?? DEFAULT_OPPORTUNITY_COUNT,
          location: options.location,
        },
        { ...this.stageContext(), search: this.search },
      ));

    this.targetRole = targetRole;
    this.discovery = discovery;
    this.advance('opportunities_ready', step, `Found ${discovery.opportunities.length} job opportunities`, {
      source: discovery.source,
      candidates_found: discovery.candidates_found,
      ...(discovery.fallback_reason && { fallback_reason: discovery.fallback_reason }),
      ...(discovery.search_errors.length > 0 && { search_errors: discovery.search_errors }),
    });
    return discovery;
  }

  async scoreOpportunities(options: { batch?: boolean } = {}): Promise<FitResult[]> {
    const step: PipelineStep = 'score_opportunities';
    const profile = this.profile;
    const opportunities = this.discovery?.opportunities ?? [];
    this.guard(
      step,
      this.currentState === 'opportunities_ready' && profile !== undefined && opportunities.length > 0,
      'requires an analyzed résumé and at least one discovered opportunity',
    );

    const batch = options.batch ?? this.batchScoring;
    const results = await this.runStep(
      step,
      `Step 3/5: Matching candidate to ${opportunities.length} jobs${batch ? ' (batch)' : ''}`,
      async () => {
        if (batch) {
          const output = await runBatchFitScoring({ profile, opportunities }, this.stageContext());
          this.droppedBatchItems = output.dropped;
          if (output.dropped.length > 0) {
            this.record(step, 'info', `Dropped ${output.dropped.length} batch items with invalid job_index`, {
              dropped: output.dropped,
            });
          }
          if (output.results.length === 0) {
            throw new StageError('fit_scoring', 'Batch scoring returned no usable results');
          }
          return output.results;
        }
        return this.scoreEach(profile, opportunities);
      },
    );

    this.fitResults = results;
    this.advance('scores_ready', step, `Completed ${results.length} job matches`, {
      scored: results.length,
      total: opportunities.length,
    });
    return [...results];
  }

  async rankOpportunities(): Promise<RankingReport> {
    const step: PipelineStep = 'rank_opportunities';
    this.guard(step, this.currentState === 'scores_ready', 'requires scored opportunities');

    const ranking = await this.runStep(step, `Step 4/5: Ranking ${this.fitResults.length} opportunities`, () =>
      runStrategicRanking({ fit_results: this.fitResults }, this.stageContext()));

    this.ranking = ranking;
    this.advance('ranking_ready', step, 'Jobs ranked and prioritized', {
      source: ranking.source,
      entries: ranking.entries.length,
    });
    return ranking;
  }

  async generateReport(): Promise<PipelineReport> {
    const step: PipelineStep = 'generate_report';
    const { profile, discovery, ranking } = this;
    this.guard(
      step,
      this.currentState === 'ranking_ready' && profile !== undefined && discovery !== undefined && ranking !== undefined,
      'requires a completed ranking',
    );

    this.record(step, 'started', 'Step 5/5: Generating final report');
    this.advance('report_ready', step, 'Report generated successfully');

    const scores = this.fitResults.map((r) => r.overall_fit_score);
    const average = scores.length > 0 ? scores.reduce((a, b) => a + b, 0) / scores.length : 0;

    const report: PipelineReport = {
      run_id: this.runId,
      candidate: {
        name: profile.name,
        email: profile.email,
        summary: profile.summary,
        experience_level: profile.experience_level,
        total_years: profile.total_years_experience,
        skills_count: profile.skills.length,
        top_skills: profile.skills.slice(0, 5).map((s) => s.name),
      },
      job_search: {
        target_role: this.targetRole,
        source: discovery.source,
        candidates_found: discovery.candidates_found,
        opportunities_found: discovery.opportunities.length,
        opportunities_scored: this.fitResults.length,
        average_fit_score: Math.round(average * 10) / 10,
        dropped_batch_items: this.droppedBatchItems.length,
      },
      fit_results: this.fitResults.map((r) => ({
        opportunity_id: r.opportunity.opportunity_id,
        title: r.opportunity.title,
        company: r.opportunity.company,
        overall_fit_score: r.overall_fit_score,
        skill_match_score: r.skill_match_score,
        experience_match_score: r.experience_match_score,
        recommendation: r.recommendation,
        strengths: [...r.strengths],
        gaps: [...r.gaps],
        url: r.opportunity.url,
      })),
      ranking,
      usage: this.usage.snapshot(),
      trace: this.getTrace(),
      generated_at: new Date().toISOString(),
    };

    this.finalReport = report;
    return report;
  }

  /**
   * All five transitions in order. A discovery that finds nothing ends the
   * run with a StageError rather than a scoring precondition failure.
   */
  async run(request: PipelineRunRequest): Promise<PipelineReport> {
    this.log.info({ target_role: request.target_role, num_jobs: request.num_jobs }, 'Starting job match pipeline');
    await this.analyzeResume(request.resume_text);
    const discovery = await this.discoverOpportunities(request.target_role, {
      count: request.num_jobs,
      location: request.location,
    });
    if (discovery.opportunities.length === 0) {
      const err = new StageError('opportunity_discovery', `No job opportunities found for '${request.target_role}'`);
      this.record('discover_opportunities', 'failed', err.message);
      throw err;
    }
    await this.scoreOpportunities({ batch: request.batch_scoring });
    await this.rankOpportunities();
    const report = await this.generateReport();
    this.log.info(
      { scored: report.job_search.opportunities_scored, average: report.job_search.average_fit_score, ...report.usage },
      'Pipeline completed',
    );
    return report;
  }

  // ─── Internals ───────────────────────────────────────────────────

  private stageContext(): StageContext {
    return { generator: this.usage, log: this.log, signal: this.signal };
  }

  /** Per-opportunity scoring, in order. The first failure ends the transition. */
  private async scoreEach(profile: CandidateProfile, opportunities: readonly JobOpportunity[]): Promise<FitResult[]> {
    const step: PipelineStep = 'score_opportunities';
    const results: FitResult[] = [];

    for (const [i, opportunity] of opportunities.entries()) {
      const result = await runFitScoring({ profile, opportunity }, this.stageContext());
      results.push(result);
      this.record(step, 'info', `Scored job ${i + 1}/${opportunities.length}: ${opportunity.title} (${result.overall_fit_score}/100)`, {
        opportunity_id: opportunity.opportunity_id,
        score: result.overall_fit_score,
        consistent: result.score_check.consistent,
      });
    }
    return results;
  }

  private guard(step: PipelineStep, satisfied: boolean, requirement: string): asserts satisfied {
    if (satisfied) return;
    const err = new PreconditionError(step, this.currentState, requirement);
    this.record(step, 'rejected', err.message);
    this.log.warn({ step, state: this.currentState }, 'Pipeline precondition failed');
    throw err;
  }

  private async runStep<T>(step: PipelineStep, message: string, fn: () => Promise<T>): Promise<T> {
    this.record(step, 'started', message);
    try {
      return await fn();
    } catch (err) {
      this.record(step, 'failed', errorMessage(err), {
        error: err instanceof Error ? err.name : 'Error',
        ...(err instanceof StageError && { stage: err.stage }),
      });
      this.log.error({ step, error: errorMessage(err) }, 'Pipeline step failed');
      throw err;
    }
  }

  private advance(next: PipelineState, step: PipelineStep, message: string, details?: Record<string, unknown>): void {
    this.currentState = next;
    this.record(step, 'succeeded', message, details);
  }

  private record(step: PipelineStep, status: TraceStatus, message: string, details?: Record<string, unknown>): void {
    const entry: TraceEntry = Object.freeze({
      at: new Date().toISOString(),
      step,
      status,
      message,
      ...(details && { details: Object.freeze({ ...details }) }),
    });
    this.trace.push(entry);
    this.log.debug({ step, status }, message);
    this.emit?.({ type: 'trace', entry });
  }
}
