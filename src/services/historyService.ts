import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { FailureReport, HistoryEntry, HistoryStore } from '../types/report.js';
import { HistoryStoreError } from '../verifier/errors.js';
import { isMissingFileError, writeFileAtomic } from '../utils/files.js';
import { getLogger } from '../utils/logger.js';
import { JobFailureSchema } from './reportWriter.js';

const logger = getLogger(import.meta.url);

export const FAILURE_MESSAGE_MAX_LENGTH = 2000;
const FAILURE_MESSAGE_LINES = 20;

const HistoryEntrySchema = z.object({
  test_name: z.string(),
  status: z.enum(['PASS', 'FAIL']),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  datetime: z.string(),
  total_jobs: z.number().int().min(0),
  error_jobs_count: z.number().int().min(0),
  error_jobs: z.array(JobFailureSchema),
  failure_message: z.string(),
});

const HistoryStoreSchema = z.record(z.array(HistoryEntrySchema));

export interface RetentionOptions {
  retentionDays: number;
  keepLatestOnly: boolean;
}

export interface HistoryServiceOptions extends RetentionOptions {
  dir: string;
  module: string;
}

export interface DailyHistoryRow {
  date: string;
  status: HistoryEntry['status'] | 'NOT_RUN';
  entry: HistoryEntry | null;
}

/** Calendar date in local time, as YYYY-MM-DD. */
export function toLocalDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

function daysBefore(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() - days);
}

function byRecency(a: HistoryEntry, b: HistoryEntry): number {
  if (a.date !== b.date) return a.date < b.date ? 1 : -1;
  if (a.datetime !== b.datetime) return a.datetime < b.datetime ? 1 : -1;
  return 0;
}

function truncateMessage(message: string): string {
  if (message.length <= FAILURE_MESSAGE_MAX_LENGTH) return message;
  return `${message.slice(0, FAILURE_MESSAGE_MAX_LENGTH - 3)}...`;
}

export interface HistoryEntryOptions {
  /** Failures copied into `error_jobs`. */
  errorJobsSampleSize?: number;
}

export function buildHistoryEntry(
  report: FailureReport,
  testName: string,
  now: Date,
  options: HistoryEntryOptions = {},
): HistoryEntry {
  const sampleSize = options.errorJobsSampleSize ?? 50;
  const failed = report.total_failures > 0;
  let failureMessage = '';
  if (failed) {
    const lines = report.failures.slice(0, FAILURE_MESSAGE_LINES).map((f) => `${f.id}: ${f.msg}`);
    failureMessage = truncateMessage(
      [`DB/Solr sync failed for ${report.total_failures}/${report.total_jobs_checked} jobs checked`, ...lines].join('\n'),
    );
  }

  return {
    test_name: testName,
    status: failed ? 'FAIL' : 'PASS',
    date: toLocalDate(now),
    datetime: now.toISOString(),
    total_jobs: report.total_jobs_checked,
    error_jobs_count: report.total_failures,
    error_jobs: report.failures.slice(0, sampleSize),
    failure_message: failureMessage,
  };
}

/** Drops entries dated before `today - retentionDays`. */
export function pruneEntries(entries: readonly HistoryEntry[], today: Date, retentionDays: number): HistoryEntry[] {
  const cutoff = toLocalDate(daysBefore(today, retentionDays));
  return entries.filter((entry) => entry.date >= cutoff);
}

/**
 * Applies one finished run to the entries of a test: a same-day entry is
 * replaced, otherwise the run becomes the new head. Retention runs after.
 */
export function applyRun(
  entries: readonly HistoryEntry[],
  entry: HistoryEntry,
  today: Date,
  options: RetentionOptions,
): HistoryEntry[] {
  const updated = [entry, ...entries.filter((existing) => existing.date !== entry.date)].sort(byRecency);
  const kept = pruneEntries(updated, today, options.retentionDays);
  return options.keepLatestOnly ? kept.slice(0, 1) : kept;
}

/**
 * One row per day for the last `days` days, newest first. Days without a
 * run are marked NOT_RUN.
 */
export function buildDailyView(entries: readonly HistoryEntry[], days: number, today: Date): DailyHistoryRow[] {
  const rows: DailyHistoryRow[] = [];
  for (let i = 0; i < days; i++) {
    const date = toLocalDate(daysBefore(today, i));
    const entry = entries.find((e) => e.date === date) ?? null;
    rows.push({ date, status: entry ? entry.status : 'NOT_RUN', entry });
  }
  return rows;
}

export class HistoryService {
  readonly filePath: string;
  readonly backupPath: string;

  constructor(private options: HistoryServiceOptions) {
    this.filePath = path.join(options.dir, `${options.module}_history.json`);
    this.backupPath = `${this.filePath}.backup`;
  }

  private async readStore(filePath: string): Promise<HistoryStore | null> {
    let content: string;
    try {
      content = await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) return null;
      throw new HistoryStoreError(`Cannot read history file ${filePath}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new HistoryStoreError(`History file ${filePath} is not valid JSON`, { cause: error });
    }

    const parsed = HistoryStoreSchema.safeParse(json);
    if (!parsed.success) {
      throw new HistoryStoreError(`History file ${filePath} has an invalid structure: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  /**
   * Loads the store, falling back to the backup when the main file is
   * missing or unreadable. An absent store is empty.
   */
  async load(): Promise<HistoryStore> {
    let mainError: HistoryStoreError | null = null;
    try {
      const main = await this.readStore(this.filePath);
      if (main) return main;
    } catch (error) {
      if (!(error instanceof HistoryStoreError)) throw error;
      mainError = error;
      logger.warn({ err: error, path: this.filePath }, 'History file unusable, trying backup');
    }

    try {
      const backup = await this.readStore(this.backupPath);
      if (backup) {
        logger.info({ path: this.backupPath }, 'Loaded history from backup');
        return backup;
      }
    } catch (error) {
      logger.error({ err: error, path: this.backupPath }, 'History backup unusable');
      throw mainError ?? error;
    }

    if (mainError) throw mainError;
    return {};
  }

  private async save(store: HistoryStore): Promise<void> {
    try {
      await fs.promises.copyFile(this.filePath, this.backupPath);
    } catch (error) {
      if (!isMissingFileError(error)) throw error;
    }
    await writeFileAtomic(this.filePath, `${JSON.stringify(store, null, 2)}\n`);
  }

  /**
   * Records a finished run and applies retention to every test in the file.
   * Assumes a single writer per module file.
   */
  async recordRun(entry: HistoryEntry, now: Date = new Date()): Promise<HistoryEntry[]> {
    const store = await this.load();
    const next: HistoryStore = {};

    for (const [testName, entries] of Object.entries(store)) {
      if (testName === entry.test_name) continue;
      const kept = pruneEntries(entries, now, this.options.retentionDays);
      if (kept.length > 0) next[testName] = kept;
    }

    const updated = applyRun(store[entry.test_name] ?? [], entry, now, this.options);
    next[entry.test_name] = updated;

    await this.save(next);
    logger.info(
      { path: this.filePath, testName: entry.test_name, status: entry.status, entries: updated.length },
      'History updated',
    );
    return updated;
  }

  async getHistory(testName: string): Promise<HistoryEntry[]> {
    const store = await this.load();
    return store[testName] ?? [];
  }
}
