import type { ColumnType } from 'kysely';

export interface Database {
  jnp_jobs: JobsTable;
}

/**
 * Read-only view of the job postings table. Column names follow the
 * production schema, not the record types used by the verifier.
 */
export interface JobsTable {
  id: ColumnType<number, never, never>;
  title: string;
  company_name: string | null;
  statename: string | null;
  cityname: string | null;
  is_remote: number | null;
  joblink: string | null;
  ai_skills: string | null;
  slug: string | null;
  modified: Date | null;
}

export interface JobRow {
  id: number;
  title: string;
  company_name: string | null;
  statename: string | null;
  cityname: string | null;
  is_remote: number | null;
  joblink: string | null;
  ai_skills: string | null;
  modified: Date | null;
}
