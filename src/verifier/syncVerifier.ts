import type pino from 'pino';
import type { IndexRecord, JobRecord } from '../types/job.js';
import type { FailureReport, FieldMismatch, JobFailure } from '../types/report.js';
import { compareJob, missingIndexRecord, DEFAULT_COMPARATOR_OPTIONS, type ComparatorOptions } from './comparator.js';

export interface VerifierOptions extends ComparatorOptions {
  /** Cap on the number of jobs compared; 0 compares the whole window. */
  maxJobs: number;
}

export const DEFAULT_VERIFIER_OPTIONS: VerifierOptions = {
  ...DEFAULT_COMPARATOR_OPTIONS,
  maxJobs: 0,
};

/** Everything a run needs besides its data, passed in explicitly. */
export interface VerifierContext {
  logger: pino.Logger;
  options: VerifierOptions;
}

/**
 * Source of index documents, keyed by job id as a string. Jobs absent from
 * the returned map have no index document.
 */
export interface IndexLookup {
  fetchByIds(ids: readonly string[]): Promise<Map<string, IndexRecord>>;
}

export interface JobSource {
  fetchRecentJobs(windowHours: number): Promise<JobRecord[]>;
}

function toFailure(job: JobRecord, mismatches: FieldMismatch[]): JobFailure {
  return {
    id: job.id,
    db_title: job.title,
    msg: mismatches.map((m) => m.message).join(' | '),
    mismatches,
  };
}

/**
 * Keeps the first occurrence of each job id and applies the job cap, in
 * the order the jobs were given.
 */
export function selectJobsToCheck(jobs: readonly JobRecord[], maxJobs: number): JobRecord[] {
  const seen = new Set<number>();
  const selected: JobRecord[] = [];
  for (const job of jobs) {
    if (seen.has(job.id)) continue;
    seen.add(job.id);
    selected.push(job);
    if (maxJobs > 0 && selected.length >= maxJobs) break;
  }
  return selected;
}

/**
 * Compares every selected job with its index document and aggregates the
 * failures. The result depends only on the two snapshots: failures are
 * ordered by job id and mismatches by field.
 */
export function verifySync(
  jobs: readonly JobRecord[],
  indexRecords: ReadonlyMap<string, IndexRecord>,
  context: VerifierContext,
): FailureReport {
  const { logger, options } = context;
  const toCheck = selectJobsToCheck(jobs, options.maxJobs);
  const failures: JobFailure[] = [];
  let missing = 0;
  let malformed = 0;

  for (const job of toCheck) {
    const doc = indexRecords.get(String(job.id));
    if (!doc) {
      missing++;
      failures.push(toFailure(job, [missingIndexRecord(job)]));
      continue;
    }

    const mismatches = compareJob(job, doc, options);
    if (mismatches.length === 0) continue;

    for (const m of mismatches) {
      if (m.category === 'malformed_value') {
        malformed++;
        logger.error({ jobId: job.id, dbValue: m.db_value, indexValue: m.index_value, field: m.source_field_used }, m.message);
      }
    }
    failures.push(toFailure(job, mismatches));
  }

  failures.sort((a, b) => a.id - b.id);

  logger.info(
    {
      available: jobs.length,
      checked: toCheck.length,
      failures: failures.length,
      missingInIndex: missing,
      malformedValues: malformed,
    },
    'Sync verification finished',
  );

  return {
    total_jobs_available: jobs.length,
    total_jobs_checked: toCheck.length,
    total_failures: failures.length,
    failures,
  };
}

/**
 * Runs one verification pass: reads the candidate window from the
 * database, looks the jobs up in the index, compares them.
 */
export async function runSyncVerification(
  source: JobSource,
  index: IndexLookup,
  windowHours: number,
  context: VerifierContext,
): Promise<FailureReport> {
  const { logger, options } = context;

  logger.info({ windowHours }, 'Fetching candidate jobs from database');
  const jobs = await source.fetchRecentJobs(windowHours);
  logger.info(`Retrieved ${jobs.length} jobs modified in the last ${windowHours} hours`);

  const ids = selectJobsToCheck(jobs, options.maxJobs).map((job) => String(job.id));
  const indexRecords = ids.length > 0 ? await index.fetchByIds(ids) : new Map<string, IndexRecord>();
  logger.info(`Found ${indexRecords.size}/${ids.length} jobs in index`);

  return verifySync(jobs, indexRecords, context);
}
