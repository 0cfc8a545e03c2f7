import { describe, it, expect, vi } from 'vitest';
import { JSearchClient, formatSalaryRange, inferSkillsFromDescription } from '../lib/job-search.js';

const CONFIG = { apiKey: 'test-secret', host: 'jsearch.example', timeoutMs: 1_000 };

function fetchReturning(body: unknown, status = 200) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
    new Response(typeof body === 'string' ? body : JSON.stringify(body), { status }));
}

const PAYLOAD = {
  status: 'OK',
  data: [
    {
      job_id: 'abc',
      job_title: '  Senior Data Engineer ',
      employer_name: 'Globex',
      job_description: 'We use Python, SQL and Kubernetes. Java is a plus; JavaScript too.',
      job_city: 'Austin',
      job_country: 'US',
      job_is_remote: true,
      job_min_salary: 120000,
      job_max_salary: 150000,
      job_salary_currency: 'USD',
      job_salary_period: 'YEAR',
    },
    { job_title: 'Missing id' },
    {
      job_id: 42,
      job_title: 'Backend Engineer',
      employer_name: 'Initech',
      job_description: null,
      job_city: null,
      job_country: 'US',
      job_is_remote: false,
    },
  ],
};

describe('JSearchClient', () => {
  it('maps postings and skips items it cannot parse', async () => {
    const fetchImpl = fetchReturning(PAYLOAD);
    const records = await new JSearchClient(CONFIG, fetchImpl).search('Data Engineer', 10, 'Austin');

    expect(records).toEqual([
      {
        id: 'abc',
        title: 'Senior Data Engineer',
        company: 'Globex',
        description: 'We use Python, SQL and Kubernetes. Java is a plus; JavaScript too.',
        required_skills: ['Python', 'Java', 'JavaScript', 'Kubernetes', 'SQL'],
        location: 'Austin',
        url: undefined,
        posted_at: undefined,
        employment_type: undefined,
        remote_policy: 'Remote',
        salary_range: 'USD 120,000 - 150,000 per year',
      },
      {
        id: '42',
        title: 'Backend Engineer',
        company: 'Initech',
        description: '',
        required_skills: [],
        location: 'US',
        url: undefined,
        posted_at: undefined,
        employment_type: undefined,
        remote_policy: 'On-site',
        salary_range: undefined,
      },
    ]);

    const [input, init] = fetchImpl.mock.calls[0];
    const url = new URL(String(input));
    expect(url.host).toBe('jsearch.example');
    expect(url.searchParams.get('query')).toBe('Data Engineer Austin');
    expect(new Headers(init?.headers).get('X-RapidAPI-Key')).toBe('test-secret');
  });

  it('stops at the requested count', async () => {
    const records = await new JSearchClient(CONFIG, fetchReturning(PAYLOAD)).search('Engineer', 1);
    expect(records).toHaveLength(1);
  });

  it('returns an error record without an API key', async () => {
    const fetchImpl = fetchReturning(PAYLOAD);
    const records = await new JSearchClient({ ...CONFIG, apiKey: undefined }, fetchImpl).search('Engineer', 5);

    expect(records).toEqual([{ error: 'Job search failed: RAPIDAPI_KEY is not configured' }]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('returns an error record for a failed response', async () => {
    const records = await new JSearchClient(CONFIG, fetchReturning('quota exceeded', 429)).search('Engineer', 5);
    expect(records).toEqual([{ error: 'Job search failed: JSearch API error 429: quota exceeded' }]);
  });

  it('returns an error record for a payload without data', async () => {
    const records = await new JSearchClient(CONFIG, fetchReturning({ data: 'nothing' })).search('Engineer', 5);
    expect(records).toEqual([{ error: 'Job search failed: JSearch response did not contain a data array' }]);
  });

  it('returns an error record when the request throws', async () => {
    const fetchImpl = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const records = await new JSearchClient(CONFIG, fetchImpl).search('Engineer', 5);
    expect(records).toEqual([{ error: 'Job search failed: fetch failed' }]);
  });
});

describe('inferSkillsFromDescription', () => {
  it('matches keywords on word boundaries in list order', () => {
    expect(inferSkillsFromDescription('CI/CD with Git and Node.js; GitHub optional')).toEqual(['Node.js', 'Git', 'CI/CD']);
    expect(inferSkillsFromDescription('Experience with Javanese art')).toEqual([]);
  });

  it('returns at most ten skills', () => {
    const text = 'python java javascript typescript react angular vue node.js django flask fastapi spring';
    expect(inferSkillsFromDescription(text)).toHaveLength(10);
  });
});

describe('formatSalaryRange', () => {
  it('formats open-ended and missing ranges', () => {
    expect(formatSalaryRange(undefined, undefined)).toBeUndefined();
    expect(formatSalaryRange(50000, undefined)).toBe('USD 50,000+');
    expect(formatSalaryRange(undefined, 90000, 'EUR')).toBe('EUR up to 90,000');
    expect(formatSalaryRange(40, 55, 'USD', 'HOUR')).toBe('USD 40 - 55 per hour');
  });
});
