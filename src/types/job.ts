export const WORK_MODES = ['Remote', 'Hybrid', 'Not Remote'] as const;

export type WorkMode = (typeof WORK_MODES)[number];

/** Index fields that can carry the work-mode of a job. */
export type WorkModeSourceField = 'workmode' | 'remote';

export type RawFlagValue = string | boolean | number | null;

/**
 * A job as stored in the database, the source of truth.
 */
export interface JobRecord {
  readonly id: number;
  readonly title: string;
  readonly company_name: string | null;
  readonly city_name: string | null;
  readonly state_name: string | null;
  readonly work_mode: WorkMode | null;
  /** Raw `is_remote` code that maps to no work-mode; null when the code is valid. */
  readonly work_mode_error: string | null;
  readonly ai_skills: readonly string[];
  readonly job_link: string | null;
  readonly modified: Date | null;
}

/**
 * The same job as found in the search index. Work-mode may live in either
 * `workmode` or `remote`; both are kept raw and resolved by the comparator.
 */
export interface IndexRecord {
  readonly id: string;
  readonly title: string | null;
  readonly company_name: string | null;
  readonly city_name: string | null;
  readonly state_name: string | null;
  readonly workmode: RawFlagValue;
  readonly remote: RawFlagValue;
  readonly ai_skills: readonly string[];
  readonly job_link: string | null;
}
