import { z } from 'zod';
import type { JobSearchConfig } from './config.js';
import { JobSearchError, errorMessage } from './errors.js';
import logger from './logger.js';

// ─── Collaborator contract ───────────────────────────────────────────

/** One live job posting, flattened from the search provider's payload. */
export interface RawJobRecord {
  id: string;
  title: string;
  company: string;
  description: string;
  required_skills: string[];
  location?: string;
  url?: string;
  posted_at?: string;
  employment_type?: string;
  remote_policy?: string;
  salary_range?: string;
}

/** In-band failure marker. Callers filter these out rather than catching. */
export interface JobSearchErrorRecord {
  error: string;
}

export type JobSearchRecord = RawJobRecord | JobSearchErrorRecord;

export interface JobSearchClient {
  search(query: string, count: number, location?: string): Promise<JobSearchRecord[]>;
}

export function isSearchError(record: JobSearchRecord): record is JobSearchErrorRecord {
  return 'error' in record;
}

export const MAX_SEARCH_RESULTS = 10;
const DESCRIPTION_LIMIT = 1000;
const MAX_INFERRED_SKILLS = 10;

// ─── Keyword skill scan ──────────────────────────────────────────────

const SKILL_KEYWORDS: ReadonlyArray<readonly [keyword: string, display: string]> = [
  ['python', 'Python'],
  ['java', 'Java'],
  ['javascript', 'JavaScript'],
  ['typescript', 'TypeScript'],
  ['react', 'React'],
  ['angular', 'Angular'],
  ['vue', 'Vue'],
  ['node.js', 'Node.js'],
  ['django', 'Django'],
  ['flask', 'Flask'],
  ['fastapi', 'FastAPI'],
  ['spring', 'Spring'],
  ['kubernetes', 'Kubernetes'],
  ['docker', 'Docker'],
  ['aws', 'AWS'],
  ['azure', 'Azure'],
  ['gcp', 'GCP'],
  ['sql', 'SQL'],
  ['postgresql', 'PostgreSQL'],
  ['mongodb', 'MongoDB'],
  ['redis', 'Redis'],
  ['machine learning', 'Machine Learning'],
  ['deep learning', 'Deep Learning'],
  ['tensorflow', 'TensorFlow'],
  ['pytorch', 'PyTorch'],
  ['git', 'Git'],
  ['ci/cd', 'CI/CD'],
  ['agile', 'Agile'],
  ['scrum', 'Scrum'],
  ['rest api', 'REST API'],
  ['graphql', 'GraphQL'],
];

function keywordPattern(keyword: string): RegExp {
  const escaped = keyword.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
  return new RegExp(`(?<![a-z0-9])${escaped}(?![a-z0-9])`, 'i');
}

const SKILL_PATTERNS = SKILL_KEYWORDS.map(([keyword, display]) => [keywordPattern(keyword), display] as const);

/** Skills named in a job description, in keyword-list order, at most ten. */
export function inferSkillsFromDescription(description: string): string[] {
  const found: string[] = [];
  for (const [pattern, display] of SKILL_PATTERNS) {
    if (pattern.test(description)) found.push(display);
    if (found.length >= MAX_INFERRED_SKILLS) break;
  }
  return found;
}

// ─── JSearch payload ─────────────────────────────────────────────────

const nullableString = z.string().nullish().transform((v) => (v && v.trim() ? v.trim() : undefined));
const nullableNumber = z.number().nullish().transform((v) => v ?? undefined);

const JSearchJobSchema = z.object({
  job_id: z.union([z.string(), z.number()]).transform(String),
  job_title: nullableString,
  employer_name: nullableString,
  job_description: nullableString,
  job_city: nullableString,
  job_country: nullableString,
  job_apply_link: nullableString,
  job_posted_at_datetime_utc: nullableString,
  job_employment_type: nullableString,
  job_is_remote: z.boolean().nullish(),
  job_min_salary: nullableNumber,
  job_max_salary: nullableNumber,
  job_salary_currency: nullableString,
  job_salary_period: nullableString,
}).passthrough();

type JSearchJob = z.infer<typeof JSearchJobSchema>;

const JSearchResponseSchema = z.object({
  data: z.array(z.unknown()).nullish().transform((v) => v ?? []),
}).passthrough();

const amount = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

export function formatSalaryRange(
  min: number | undefined,
  max: number | undefined,
  currency = 'USD',
  period?: string,
): string | undefined {
  if (min === undefined && max === undefined) return undefined;
  const range = min !== undefined && max !== undefined
    ? `${amount.format(min)} - ${amount.format(max)}`
    : min !== undefined
      ? `${amount.format(min)}+`
      : `up to ${amount.format(max ?? 0)}`;
  return `${currency} ${range}${period ? ` per ${period.toLowerCase()}` : ''}`;
}

function toRawRecord(job: JSearchJob): RawJobRecord {
  const description = job.job_description ?? '';
  return {
    id: job.job_id,
    title: job.job_title ?? '',
    company: job.employer_name ?? '',
    description: description.slice(0, DESCRIPTION_LIMIT),
    required_skills: inferSkillsFromDescription(description),
    location: job.job_city ?? job.job_country,
    url: job.job_apply_link,
    posted_at: job.job_posted_at_datetime_utc,
    employment_type: job.job_employment_type,
    remote_policy: job.job_is_remote === true ? 'Remote' : job.job_is_remote === false ? 'On-site' : undefined,
    salary_range: formatSalaryRange(job.job_min_salary, job.job_max_salary, job.job_salary_currency, job.job_salary_period),
  };
}

// ─── Client ──────────────────────────────────────────────────────────

/**
 * RapidAPI JSearch client. Never throws: transport failures, non-2xx
 * responses and unusable payloads come back as a single `{ error }` record.
 */
export class JSearchClient implements JobSearchClient {
  constructor(
    private readonly config: JobSearchConfig,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async search(query: string, count: number, location?: string): Promise<JobSearchRecord[]> {
    try {
      return await this.fetchJobs(query, count, location);
    } catch (err) {
      const status = err instanceof JobSearchError ? err.status : undefined;
      logger.warn({ query, location, status, error: errorMessage(err) }, 'Job search failed');
      return [{ error: `Job search failed: ${errorMessage(err)}` }];
    }
  }

  private async fetchJobs(query: string, count: number, location?: string): Promise<RawJobRecord[]> {
    if (!this.config.apiKey) {
      throw new JobSearchError('RAPIDAPI_KEY is not configured');
    }

    const url = new URL(`https://${this.config.host}/search`);
    url.searchParams.set('query', location ? `${query} ${location}` : query);
    url.searchParams.set('page', '1');
    url.searchParams.set('num_pages', '1');

    const doFetch = this.fetchImpl;
    const response = await doFetch(url, {
      headers: {
        'X-RapidAPI-Key': this.config.apiKey,
        'X-RapidAPI-Host': this.config.host,
      },
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new JobSearchError(`JSearch API error ${response.status}: ${body.slice(0, 200)}`, response.status);
    }

    const payload = JSearchResponseSchema.safeParse(await response.json());
    if (!payload.success) {
      throw new JobSearchError('JSearch response did not contain a data array');
    }

    const limit = Math.max(0, Math.min(count, MAX_SEARCH_RESULTS));
    const records: RawJobRecord[] = [];
    for (const item of payload.data.data) {
      if (records.length >= limit) break;
      const job = JSearchJobSchema.safeParse(item);
      if (job.success) {
        records.push(toRawRecord(job.data));
      } else {
        logger.debug({ issues: job.error.issues.length }, 'Skipping unparseable JSearch job');
      }
    }
    return records;
  }
}
