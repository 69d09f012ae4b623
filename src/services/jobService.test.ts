import { describe, expect, it } from 'vitest';
import {
  DummyDriver,
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  type CompiledQuery,
} from 'kysely';
import type { Database, JobRow } from '../types/database.js';
import { JobService, toJobRecord } from './jobService.js';

function row(overrides: Partial<JobRow> = {}): JobRow {
  return {
    id: 4821,
    title: 'Data Engineer',
    company_name: 'Acme Corp',
    statename: 'TX',
    cityname: 'Austin',
    is_remote: 2,
    joblink: 'https://jobs.example.com/4821',
    ai_skills: 'Python, SQL,  Apache Spark',
    modified: new Date('2026-10-18T08:00:00Z'),
    ...overrides,
  };
}

describe('toJobRecord', () => {
  it('maps columns to the record fields', () => {
    expect(toJobRecord(row())).toEqual({
      id: 4821,
      title: 'Data Engineer',
      company_name: 'Acme Corp',
      city_name: 'Austin',
      state_name: 'TX',
      work_mode: 'Hybrid',
      work_mode_error: null,
      ai_skills: ['Python', 'SQL', 'Apache Spark'],
      job_link: 'https://jobs.example.com/4821',
      modified: new Date('2026-10-18T08:00:00Z'),
    });
  });

  it('treats blank columns as absent', () => {
    const record = toJobRecord(row({ cityname: '  ', statename: null, is_remote: null, ai_skills: null }));
    expect(record.city_name).toBeNull();
    expect(record.state_name).toBeNull();
    expect(record.work_mode).toBeNull();
    expect(record.ai_skills).toEqual([]);
  });

  it('keeps an unknown remote code instead of failing the row', () => {
    const record = toJobRecord(row({ is_remote: 7 }));
    expect(record.work_mode).toBeNull();
    expect(record.work_mode_error).toBe('7');
    expect(record.title).toBe('Data Engineer');
  });
});

describe('JobService', () => {
  it('selects jobs modified inside the window', async () => {
    const queries: CompiledQuery[] = [];
    const db = new Kysely<Database>({
      dialect: {
        createAdapter: () => new PostgresAdapter(),
        createDriver: () => new DummyDriver(),
        createIntrospector: (k) => new PostgresIntrospector(k),
        createQueryCompiler: () => new PostgresQueryCompiler(),
      },
      log: (event) => {
        if (event.level === 'query') queries.push(event.query);
      },
    });

    const now = new Date('2026-10-18T12:00:00Z');
    const jobs = await new JobService(db).fetchRecentJobs(6, now);

    expect(jobs).toEqual([]);
    expect(queries).toHaveLength(1);
    expect(queries[0].sql).toContain('from "jnp_jobs" where "modified" >= $1');
    expect(queries[0].parameters).toEqual([new Date('2026-10-18T06:00:00Z')]);
    await db.destroy();
  });
});
