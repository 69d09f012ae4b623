import type { Kysely } from 'kysely';
import type { Database, JobRow } from '../types/database.js';
import type { JobRecord } from '../types/job.js';
import type { JobSource } from '../verifier/syncVerifier.js';
import { normalizeWorkMode, parseSkillList } from '../verifier/normalizer.js';
import { MalformedSourceValueError } from '../verifier/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger(import.meta.url);

function emptyToNull(value: string | null): string | null {
  return value === null || value.trim() === '' ? null : value;
}

function dbWorkMode(row: JobRow): Pick<JobRecord, 'work_mode' | 'work_mode_error'> {
  try {
    return { work_mode: normalizeWorkMode(row.is_remote, 'is_remote'), work_mode_error: null };
  } catch (error) {
    if (error instanceof MalformedSourceValueError) {
      logger.error({ jobId: row.id, isRemote: row.is_remote }, 'Unrecognized is_remote code in database');
      return { work_mode: null, work_mode_error: String(row.is_remote) };
    }
    throw error;
  }
}

/**
 * Maps a database row to the verifier's record type. An `is_remote` code
 * outside 0..2 is kept in `work_mode_error` and reported by the comparator.
 */
export function toJobRecord(row: JobRow): JobRecord {
  return {
    id: row.id,
    title: row.title,
    company_name: emptyToNull(row.company_name),
    city_name: emptyToNull(row.cityname),
    state_name: emptyToNull(row.statename),
    ...dbWorkMode(row),
    ai_skills: parseSkillList(row.ai_skills),
    job_link: emptyToNull(row.joblink),
    modified: row.modified,
  };
}

export class JobService implements JobSource {
  constructor(private db: Kysely<Database>) {}

  /**
   * Jobs modified within the last `windowHours`, newest first.
   */
  async fetchRecentJobs(windowHours: number, now: Date = new Date()): Promise<JobRecord[]> {
    const since = new Date(now.getTime() - windowHours * 60 * 60 * 1000);

    try {
      const rows = await this.db
        .selectFrom('jnp_jobs')
        .select(['id', 'title', 'company_name', 'statename', 'cityname', 'is_remote', 'joblink', 'ai_skills', 'modified'])
        .where('modified', '>=', since)
        .orderBy('modified', 'desc')
        .orderBy('id', 'asc')
        .execute();

      logger.info({ since: since.toISOString(), count: rows.length }, 'Fetched recently modified jobs');
      return rows.map(toJobRecord);
    } catch (error) {
      logger.error(error, 'Failed to fetch recently modified jobs');
      throw error;
    }
  }
}
