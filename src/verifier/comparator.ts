import type { IndexRecord, JobRecord, RawFlagValue, WorkMode } from '../types/job.js';
import type { FieldMismatch, FieldName, SourceFieldUsed } from '../types/report.js';
import { MalformedSourceValueError } from './errors.js';
import {
  collapseWhitespace,
  isEmptyValue,
  normalizeLocation,
  normalizeSkillSet,
  normalizeTitle,
  normalizeWorkMode,
} from './normalizer.js';

export interface ComparatorOptions {
  /** How many differing positions a title message lists. */
  titleDiffPositions: number;
  /** Share of database skills that may be absent from the index, 0..1. */
  skillsMaxMissingRatio: number;
  /** Raw values longer than this are cut in messages. */
  maxValueLength: number;
}

export const DEFAULT_COMPARATOR_OPTIONS: ComparatorOptions = {
  titleDiffPositions: 5,
  skillsMaxMissingRatio: 0,
  maxValueLength: 100,
};

export interface ResolvedWorkMode {
  mode: WorkMode | null;
  source: SourceFieldUsed;
  raw: RawFlagValue;
}

export interface CharDiff {
  index: number;
  db: string;
  idx: string;
}

// lengths and positions count code points, not UTF-16 units
function truncate(value: string, max: number): string {
  const chars = Array.from(value);
  return chars.length > max ? `${chars.slice(0, max).join('')}...` : value;
}

function quoted(value: string | null, max: number): string {
  return value === null ? "'N/A'" : `'${truncate(value, max)}'`;
}

function mismatch(
  job: JobRecord,
  field_name: FieldName,
  db_value: string | null,
  index_value: string | null,
  message: string,
  extra: Partial<Pick<FieldMismatch, 'category' | 'source_field_used'>> = {},
): FieldMismatch {
  return Object.freeze({
    job_id: job.id,
    field_name,
    category: extra.category ?? 'field_mismatch',
    db_value,
    index_value,
    source_field_used: extra.source_field_used ?? null,
    message,
  });
}

/**
 * Lists the first `limit` positions at which two strings differ. A position
 * past the end of the shorter string reports an empty character.
 */
export function firstDifferences(a: string, b: string, limit: number): CharDiff[] {
  const left = Array.from(a);
  const right = Array.from(b);
  const diffs: CharDiff[] = [];
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length && diffs.length < limit; i++) {
    const db = left[i] ?? '';
    const idx = right[i] ?? '';
    if (db !== idx) {
      diffs.push({ index: i, db, idx });
    }
  }
  return diffs;
}

/**
 * Picks the index field that carries work-mode: `workmode` when it holds a
 * value, otherwise `remote`. Throws {@link MalformedSourceValueError} when
 * the chosen field holds an unrecognised value.
 */
export function resolveIndexWorkMode(index: IndexRecord): ResolvedWorkMode {
  if (!isEmptyValue(index.workmode)) {
    return { mode: normalizeWorkMode(index.workmode, 'workmode'), source: 'workmode', raw: index.workmode };
  }
  if (!isEmptyValue(index.remote)) {
    return { mode: normalizeWorkMode(index.remote, 'remote'), source: 'remote', raw: index.remote };
  }
  return { mode: null, source: 'none', raw: null };
}

function compareTitle(db: JobRecord, index: IndexRecord, options: ComparatorOptions): FieldMismatch | null {
  const a = normalizeTitle(db.title);
  const b = normalizeTitle(index.title);
  if (a === b) return null;

  const diffs = firstDifferences(a, b, options.titleDiffPositions)
    .map((d) => `${d.index}:'${d.db}'/'${d.idx}'`)
    .join(', ');
  const max = options.maxValueLength;
  const message = `title: DB=${quoted(db.title, max)} != Index=${quoted(index.title, max)} | first diffs: [${diffs}]`;
  return mismatch(db, 'title', db.title, index.title, message);
}

function compareExact(
  db: JobRecord,
  field: 'company_name' | 'job_link',
  dbValue: string | null,
  indexValue: string | null,
  normalize: (value: string) => string,
  options: ComparatorOptions,
): FieldMismatch | null {
  const a = dbValue === null ? '' : normalize(dbValue);
  const b = indexValue === null ? '' : normalize(indexValue);
  if (a === b) return null;

  const max = options.maxValueLength;
  return mismatch(db, field, dbValue, indexValue, `${field}: DB=${quoted(dbValue, max)} != Index=${quoted(indexValue, max)}`);
}

function compareLocation(
  db: JobRecord,
  field: 'city_name' | 'state_name',
  dbValue: string | null,
  indexValue: string | null,
  options: ComparatorOptions,
): FieldMismatch | null {
  // remote jobs carry placeholder or empty locations in one system or the other
  if (db.work_mode === 'Remote') return null;
  if (normalizeLocation(dbValue) === normalizeLocation(indexValue)) return null;

  const max = options.maxValueLength;
  return mismatch(db, field, dbValue, indexValue, `${field}: DB=${quoted(dbValue, max)} != Index=${quoted(indexValue, max)}`);
}

function compareWorkMode(db: JobRecord, index: IndexRecord): FieldMismatch | null {
  if (db.work_mode_error !== null) {
    return mismatch(
      db,
      'work_mode',
      db.work_mode_error,
      null,
      `work_mode: unrecognized database value '${db.work_mode_error}' in field is_remote`,
      { category: 'malformed_value' },
    );
  }

  let resolved: ResolvedWorkMode;
  try {
    resolved = resolveIndexWorkMode(index);
  } catch (error) {
    if (error instanceof MalformedSourceValueError && error.field !== 'is_remote') {
      const raw = String(error.rawValue);
      return mismatch(
        db,
        'work_mode',
        db.work_mode,
        raw,
        `work_mode: unrecognized index value '${raw}' in field ${error.field}`,
        { category: 'malformed_value', source_field_used: error.field },
      );
    }
    throw error;
  }

  if (db.work_mode === resolved.mode) return null;

  const message = `work_mode: DB=${db.work_mode ?? 'N/A'}, Index=${resolved.mode ?? 'N/A'} (source_field_used=${resolved.source})`;
  return mismatch(db, 'work_mode', db.work_mode, resolved.mode, message, { source_field_used: resolved.source });
}

function compareSkills(db: JobRecord, index: IndexRecord, options: ComparatorOptions): FieldMismatch | null {
  const expected = normalizeSkillSet(db.ai_skills);
  if (expected.size === 0) return null;

  const present = normalizeSkillSet(index.ai_skills);
  const missing = [...expected].filter((skill) => !present.has(skill));
  if (missing.length === 0) return null;
  if (missing.length / expected.size <= options.skillsMaxMissingRatio) return null;

  const dbList = [...expected].join(', ');
  const indexList = [...present].join(', ');
  const max = options.maxValueLength;
  const message = `ai_skills: missing in index [${missing.join(', ')}] (DB=[${truncate(dbList, max)}], Index=[${truncate(indexList, max)}])`;
  return mismatch(db, 'ai_skills', dbList, indexList === '' ? null : indexList, message);
}

/**
 * Compares one database job with its index document. Returns one mismatch
 * per failing field, in a fixed field order; an empty list is a pass.
 */
export function compareJob(
  db: JobRecord,
  index: IndexRecord,
  options: ComparatorOptions = DEFAULT_COMPARATOR_OPTIONS,
): FieldMismatch[] {
  const results = [
    compareTitle(db, index, options),
    compareExact(db, 'company_name', db.company_name, index.company_name, collapseWhitespace, options),
    compareLocation(db, 'city_name', db.city_name, index.city_name, options),
    compareLocation(db, 'state_name', db.state_name, index.state_name, options),
    compareWorkMode(db, index),
    compareExact(db, 'job_link', db.job_link, index.job_link, (value) => value.trim(), options),
    compareSkills(db, index, options),
  ];

  return results.filter((result): result is FieldMismatch => result !== null);
}

/** The mismatch recorded for a job that has no index document. */
export function missingIndexRecord(db: JobRecord): FieldMismatch {
  return mismatch(db, 'index_record', String(db.id), null, `index_record: job ${db.id} not found in index`, {
    category: 'missing_index_record',
  });
}
