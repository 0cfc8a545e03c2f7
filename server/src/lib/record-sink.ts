/**
 * Record sinks for candidate intakes and ranked opportunities.
 *
 * Each write is independent: a candidate row can land without its ranked
 * rows and vice versa. Callers log a failed write and carry on.
 */

import { appendFile, mkdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { RankingEntry } from '../agents/types.js';
import type { PersistenceConfig } from './config.js';
import { ConfigError } from './errors.js';
import logger from './logger.js';

export interface CandidateIntakeRecord {
  full_name: string;
  experience_level: string;
  work_preference: string;
  location: string;
  country: string;
  target_role: string;
  skills_count: number;
  total_experience_years: number;
}

export interface RecordSink {
  readonly name: string;
  saveCandidate(record: CandidateIntakeRecord): Promise<void>;
  saveRankedOpportunities(candidateName: string, entries: readonly RankingEntry[]): Promise<void>;
}

export const CANDIDATE_COLUMNS = [
  'timestamp',
  'full_name',
  'experience_level',
  'work_preference',
  'location',
  'country',
  'target_role',
  'skills_count',
  'total_experience_years',
] as const;

export const RESULT_COLUMNS = [
  'timestamp',
  'candidate_name',
  'job_rank',
  'company',
  'job_title',
  'tier',
  'score',
  'action',
  'rationale',
] as const;

type Clock = () => Date;

function candidateRow(record: CandidateIntakeRecord, timestamp: string) {
  return {
    timestamp,
    full_name: record.full_name,
    experience_level: record.experience_level,
    work_preference: record.work_preference,
    location: record.location,
    country: record.country,
    target_role: record.target_role,
    skills_count: record.skills_count,
    total_experience_years: record.total_experience_years,
  } satisfies Record<(typeof CANDIDATE_COLUMNS)[number], string | number>;
}

function resultRow(candidateName: string, entry: RankingEntry, timestamp: string) {
  return {
    timestamp,
    candidate_name: candidateName,
    job_rank: entry.rank,
    company: entry.company,
    job_title: entry.title,
    tier: entry.tier_label,
    score: entry.final_score,
    action: entry.action,
    rationale: entry.rationale,
  } satisfies Record<(typeof RESULT_COLUMNS)[number], string | number>;
}

// ─── CSV ─────────────────────────────────────────────────────────────

/** RFC 4180 field: quoted when it holds a comma, quote, CR or LF. */
export function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function csvLine(values: ReadonlyArray<string | number>): string {
  return `${values.map(csvField).join(',')}\r\n`;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return false;
    throw err;
  }
}

export class CsvRecordSink implements RecordSink {
  readonly name = 'csv';
  readonly candidatesFile: string;
  readonly resultsFile: string;

  constructor(private readonly dataDir: string, private readonly now: Clock = () => new Date()) {
    this.candidatesFile = join(dataDir, 'candidates.csv');
    this.resultsFile = join(dataDir, 'results.csv');
  }

  async saveCandidate(record: CandidateIntakeRecord): Promise<void> {
    const row = candidateRow(record, this.now().toISOString());
    await this.append(this.candidatesFile, CANDIDATE_COLUMNS, [CANDIDATE_COLUMNS.map((col) => row[col])]);
  }

  async saveRankedOpportunities(candidateName: string, entries: readonly RankingEntry[]): Promise<void> {
    if (entries.length === 0) return;
    const timestamp = this.now().toISOString();
    const rows = entries.map((entry) => {
      const row = resultRow(candidateName, entry, timestamp);
      return RESULT_COLUMNS.map((col) => row[col]);
    });
    await this.append(this.resultsFile, RESULT_COLUMNS, rows);
  }

  private async append(
    file: string,
    header: readonly string[],
    rows: ReadonlyArray<ReadonlyArray<string | number>>,
  ): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    const lines = rows.map(csvLine);
    if (!(await exists(file))) lines.unshift(csvLine(header));
    await appendFile(file, lines.join(''), 'utf-8');
  }
}

// ─── Supabase ────────────────────────────────────────────────────────

export class SupabaseRecordSink implements RecordSink {
  readonly name = 'supabase';

  constructor(private readonly client: SupabaseClient, private readonly now: Clock = () => new Date()) {}

  async saveCandidate(record: CandidateIntakeRecord): Promise<void> {
    const { error } = await this.client
      .from('candidate_intakes')
      .insert(candidateRow(record, this.now().toISOString()));
    if (error) throw new Error(`Failed to save candidate intake: ${error.message}`);
  }

  async saveRankedOpportunities(candidateName: string, entries: readonly RankingEntry[]): Promise<void> {
    if (entries.length === 0) return;
    const timestamp = this.now().toISOString();
    const { error } = await this.client
      .from('ranked_opportunities')
      .insert(entries.map((entry) => resultRow(candidateName, entry, timestamp)));
    if (error) throw new Error(`Failed to save ranked opportunities: ${error.message}`);
  }
}

// ─── None ────────────────────────────────────────────────────────────

export class NoopRecordSink implements RecordSink {
  readonly name = 'none';

  async saveCandidate(): Promise<void> {}

  async saveRankedOpportunities(): Promise<void> {}
}

export function createRecordSink(config: PersistenceConfig): RecordSink {
  switch (config.backend) {
    case 'csv':
      logger.info({ dataDir: config.dataDir }, 'Persisting records to CSV');
      return new CsvRecordSink(config.dataDir);
    case 'supabase': {
      const { supabaseUrl, supabaseServiceKey } = config;
      if (!supabaseUrl || !supabaseServiceKey) {
        throw new ConfigError(['SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the supabase record sink']);
      }
      return new SupabaseRecordSink(createClient(supabaseUrl, supabaseServiceKey));
    }
    case 'none':
      return new NoopRecordSink();
  }
}
