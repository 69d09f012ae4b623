export type FieldName =
  | 'title'
  | 'company_name'
  | 'city_name'
  | 'state_name'
  | 'work_mode'
  | 'job_link'
  | 'ai_skills'
  | 'index_record';

export type MismatchCategory = 'field_mismatch' | 'missing_index_record' | 'malformed_value';

export type SourceFieldUsed = 'workmode' | 'remote' | 'none';

export type FieldMismatch = Readonly<{
  job_id: number;
  field_name: FieldName;
  category: MismatchCategory;
  db_value: string | null;
  index_value: string | null;
  source_field_used: SourceFieldUsed | null;
  message: string;
}>;

/** All mismatches of one job; `msg` joins their messages. */
export interface JobFailure {
  id: number;
  db_title: string;
  msg: string;
  mismatches: FieldMismatch[];
}

export interface FailureReport {
  total_jobs_available: number;
  total_jobs_checked: number;
  total_failures: number;
  failures: JobFailure[];
}

export type HistoryStatus = 'PASS' | 'FAIL';

export interface HistoryEntry {
  test_name: string;
  status: HistoryStatus;
  date: string;
  datetime: string;
  total_jobs: number;
  error_jobs_count: number;
  error_jobs: JobFailure[];
  failure_message: string;
}

/** Keyed by test name, entries most recent first. */
export type HistoryStore = Record<string, HistoryEntry[]>;
