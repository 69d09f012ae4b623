import pino from 'pino';
import type { IndexRecord, JobRecord } from '../types/job.js';
import type { VerifierContext } from '../verifier/syncVerifier.js';
import { DEFAULT_VERIFIER_OPTIONS, type VerifierOptions } from '../verifier/syncVerifier.js';

export function makeJob(overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    id: 1,
    title: 'Data Engineer',
    company_name: 'Acme Corp',
    city_name: 'Austin',
    state_name: 'TX',
    work_mode: 'Not Remote',
    work_mode_error: null,
    ai_skills: ['Python', 'SQL'],
    job_link: 'https://jobs.example.com/1',
    modified: new Date('2026-10-17T12:00:00Z'),
    ...overrides,
  };
}

/** The index document that matches {@link makeJob} with the same overrides. */
export function makeIndexRecord(overrides: Partial<IndexRecord> = {}): IndexRecord {
  return {
    id: '1',
    title: 'Data Engineer',
    company_name: 'Acme Corp',
    city_name: 'Austin',
    state_name: 'TX',
    workmode: 'Not Remote',
    remote: null,
    ai_skills: ['python', 'sql'],
    job_link: 'https://jobs.example.com/1',
    ...overrides,
  };
}

export function silentLogger(): pino.Logger {
  return pino({ level: 'silent' });
}

export function makeContext(options: Partial<VerifierOptions> = {}): VerifierContext {
  return { logger: silentLogger(), options: { ...DEFAULT_VERIFIER_OPTIONS, ...options } };
}
