import fs from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { FailureReport, JobFailure } from '../types/report.js';
import { removeIfExists, writeFileAtomic } from '../utils/files.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger(import.meta.url);

export const REPORT_JSON_FILE = 'db_solr_sync_failures.json';
export const REPORT_CSV_FILE = 'db_solr_sync_failures.csv';

const FieldMismatchSchema = z.object({
  job_id: z.number(),
  field_name: z.enum(['title', 'company_name', 'city_name', 'state_name', 'work_mode', 'job_link', 'ai_skills', 'index_record']),
  category: z.enum(['field_mismatch', 'missing_index_record', 'malformed_value']),
  db_value: z.string().nullable(),
  index_value: z.string().nullable(),
  source_field_used: z.enum(['workmode', 'remote', 'none']).nullable(),
  message: z.string(),
});

export const JobFailureSchema = z.object({
  id: z.number(),
  db_title: z.string(),
  msg: z.string(),
  mismatches: z.array(FieldMismatchSchema).default([]),
});

export const FailureReportSchema = z.object({
  total_jobs_available: z.number().int().min(0),
  total_jobs_checked: z.number().int().min(0),
  total_failures: z.number().int().min(0),
  failures: z.array(JobFailureSchema),
});

export interface WrittenReport {
  jsonPath: string;
  csvPath: string | null;
}

export function failureStatus(failure: JobFailure): 'FAIL' | 'MISSING' {
  return failure.mismatches.every((m) => m.category === 'missing_index_record') ? 'MISSING' : 'FAIL';
}

export function toCsv(failures: readonly JobFailure[]): string {
  return stringify(
    failures.map((f) => [f.id, f.db_title, failureStatus(f), f.msg]),
    { header: true, columns: ['id', 'title', 'status', 'error'], quoted: true },
  );
}

/**
 * Replaces the previous report wholesale. The CSV companion exists only
 * while there are failures.
 */
export async function writeFailureReport(report: FailureReport, reportsDir: string): Promise<WrittenReport> {
  const jsonPath = path.join(reportsDir, REPORT_JSON_FILE);
  const csvPath = path.join(reportsDir, REPORT_CSV_FILE);

  const payload: FailureReport = {
    total_jobs_available: report.total_jobs_available,
    total_jobs_checked: report.total_jobs_checked,
    total_failures: report.failures.length,
    failures: report.failures,
  };

  await writeFileAtomic(jsonPath, `${JSON.stringify(payload, null, 2)}\n`);
  logger.info({ path: jsonPath, failures: payload.total_failures }, 'Failure report saved');

  if (payload.failures.length > 0) {
    await writeFileAtomic(csvPath, toCsv(payload.failures));
    logger.info({ path: csvPath }, 'CSV report saved');
    return { jsonPath, csvPath };
  }

  if (await removeIfExists(csvPath)) {
    logger.info({ path: csvPath }, 'Removed stale CSV report');
  }
  return { jsonPath, csvPath: null };
}

export async function readFailureReport(filePath: string): Promise<FailureReport> {
  const content = await fs.promises.readFile(filePath, 'utf8');
  const parsed = FailureReportSchema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    throw new Error(`Invalid failure report ${filePath}: ${parsed.error.message}`);
  }
  return parsed.data;
}
