import type { RawFlagValue, WorkMode, WorkModeSourceField } from '../types/job.js';
import { MalformedSourceValueError } from './errors.js';

// \s covers the non-breaking, thin and other Unicode space variants
const WHITESPACE_RUN = /\s+/g;

const WORKMODE_STRINGS = new Map<string, WorkMode>([
  ['remote', 'Remote'],
  ['hybrid', 'Hybrid'],
  ['not remote', 'Not Remote'],
  ['onsite', 'Not Remote'],
  ['on-site', 'Not Remote'],
  ['true', 'Remote'],
  ['false', 'Not Remote'],
  ['0', 'Not Remote'],
  ['1', 'Remote'],
  ['2', 'Hybrid'],
]);

const REMOTE_FLAG_STRINGS = new Map<string, WorkMode>([
  ['true', 'Remote'],
  ['1', 'Remote'],
  ['false', 'Not Remote'],
  ['0', 'Not Remote'],
]);

const MODE_CODES = new Map<number, WorkMode>([
  [0, 'Not Remote'],
  [1, 'Remote'],
  [2, 'Hybrid'],
]);

export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

export function collapseWhitespace(value: string): string {
  return value.replace(WHITESPACE_RUN, ' ').trim();
}

/** Whitespace-insensitive, case-sensitive canonical title. */
export function normalizeTitle(value: string | null | undefined): string {
  return value ? collapseWhitespace(value) : '';
}

/** Comparison form only; reports keep the original casing. */
export function normalizeLocation(value: string | null | undefined): string {
  return value ? value.trim().toLowerCase() : '';
}

export function normalizeSkill(value: string): string {
  return collapseWhitespace(value).toLowerCase();
}

export function normalizeSkillSet(values: readonly string[]): Set<string> {
  const normalized = new Set<string>();
  for (const value of values) {
    const skill = normalizeSkill(value);
    if (skill) normalized.add(skill);
  }
  return normalized;
}

/** Splits the comma-separated skills column of the database. */
export function parseSkillList(value: string | null | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => collapseWhitespace(item))
    .filter((item) => item.length > 0);
}

/**
 * Maps a raw work-mode value to the three-valued enum.
 *
 * The `remote` flag is boolean-like and cannot express Hybrid. `workmode`
 * accepts the enum names (any case), the on-site aliases, booleans and the
 * numeric codes. `is_remote` is the database code column (0, 1, 2).
 *
 * Returns null for an empty value; throws {@link MalformedSourceValueError}
 * for anything else that is not recognised.
 */
export function normalizeWorkMode(
  value: RawFlagValue | undefined,
  field: WorkModeSourceField | 'is_remote',
): WorkMode | null {
  if (value === null || value === undefined) return null;

  if (typeof value === 'boolean') {
    if (field === 'is_remote') throw new MalformedSourceValueError(field, value);
    return value ? 'Remote' : 'Not Remote';
  }

  if (typeof value === 'number') {
    const mode = MODE_CODES.get(value);
    if (!mode || (field === 'remote' && mode === 'Hybrid')) {
      throw new MalformedSourceValueError(field, value);
    }
    return mode;
  }

  const key = collapseWhitespace(value).toLowerCase();
  if (key === '') return null;

  let mode: WorkMode | undefined;
  if (field === 'workmode') {
    mode = WORKMODE_STRINGS.get(key);
  } else if (field === 'remote') {
    mode = REMOTE_FLAG_STRINGS.get(key);
  } else if (/^\d+$/.test(key)) {
    mode = MODE_CODES.get(Number(key));
  }

  if (!mode) {
    throw new MalformedSourceValueError(field, value);
  }
  return mode;
}
