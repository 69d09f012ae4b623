import { describe, expect, it } from 'vitest';
import { compareJob, firstDifferences, missingIndexRecord, resolveIndexWorkMode, DEFAULT_COMPARATOR_OPTIONS } from './comparator.js';
import { MalformedSourceValueError } from './errors.js';
import { makeIndexRecord, makeJob } from '../testing/fixtures.js';

describe('comparator', () => {
  it('passes a job whose index document matches', () => {
    expect(compareJob(makeJob(), makeIndexRecord())).toEqual([]);
  });

  describe('title', () => {
    it('ignores surrounding and repeated whitespace', () => {
      const db = makeJob({ id: 101, title: '  Java Dev  ' });
      const index = makeIndexRecord({ id: '101', title: 'Java Dev' });
      expect(compareJob(db, index)).toEqual([]);
    });

    it('lists the first differing positions', () => {
      const [mismatch] = compareJob(makeJob({ title: 'Java Dev' }), makeIndexRecord({ title: 'Jave Dex' }));
      expect(mismatch.field_name).toBe('title');
      expect(mismatch.message).toBe("title: DB='Java Dev' != Index='Jave Dex' | first diffs: [3:'a'/'e', 7:'v'/'x']");
    });

    it('reports positions past the shorter title as empty', () => {
      const [mismatch] = compareJob(makeJob(), makeIndexRecord({ title: 'Data Engineers' }));
      expect(mismatch.message).toBe("title: DB='Data Engineer' != Index='Data Engineers' | first diffs: [13:''/'s']");
      expect(mismatch.db_value).toBe('Data Engineer');
      expect(mismatch.index_value).toBe('Data Engineers');
    });

    it('is case sensitive', () => {
      const mismatches = compareJob(makeJob(), makeIndexRecord({ title: 'data engineer' }));
      expect(mismatches.map((m) => m.field_name)).toEqual(['title']);
    });

    it('truncates long values in messages', () => {
      const [mismatch] = compareJob(makeJob(), makeIndexRecord({ title: 'Data Engineers' }), {
        ...DEFAULT_COMPARATOR_OPTIONS,
        maxValueLength: 5,
      });
      expect(mismatch.message).toBe("title: DB='Data ...' != Index='Data ...' | first diffs: [13:''/'s']");
    });
  });

  it('counts title positions in code points', () => {
    expect(firstDifferences('Dev 🚀 Lead', 'Dev 🎯 Lead', 5)).toEqual([{ index: 4, db: '🚀', idx: '🎯' }]);

    const [mismatch] = compareJob(makeJob({ title: '🚀🚀🚀🚀🚀🚀' }), makeIndexRecord({ title: '🚀🚀🚀🚀🚀🎯' }), {
      ...DEFAULT_COMPARATOR_OPTIONS,
      maxValueLength: 5,
    });
    expect(mismatch.message).toBe("title: DB='🚀🚀🚀🚀🚀...' != Index='🚀🚀🚀🚀🚀...' | first diffs: [5:'🚀'/'🎯']");
  });

  it('firstDifferences stops at the limit', () => {
    expect(firstDifferences('abcd', 'wxyz', 2)).toEqual([
      { index: 0, db: 'a', idx: 'w' },
      { index: 1, db: 'b', idx: 'x' },
    ]);
    expect(firstDifferences('same', 'same', 5)).toEqual([]);
  });

  it('compares company names exactly after collapsing whitespace', () => {
    expect(compareJob(makeJob(), makeIndexRecord({ company_name: 'Acme  Corp ' }))).toEqual([]);

    const [mismatch] = compareJob(makeJob({ company_name: 'Acme' }), makeIndexRecord({ company_name: 'ACME' }));
    expect(mismatch.message).toBe("company_name: DB='Acme' != Index='ACME'");
  });

  describe('location', () => {
    it('compares city and state case-insensitively', () => {
      expect(compareJob(makeJob(), makeIndexRecord({ city_name: ' AUSTIN', state_name: 'tx' }))).toEqual([]);
    });

    it('reports a different city', () => {
      const [mismatch] = compareJob(makeJob(), makeIndexRecord({ city_name: 'Dallas' }));
      expect(mismatch.field_name).toBe('city_name');
      expect(mismatch.message).toBe("city_name: DB='Austin' != Index='Dallas'");
    });

    it('shows a missing value as N/A', () => {
      const [mismatch] = compareJob(makeJob(), makeIndexRecord({ state_name: null }));
      expect(mismatch.message).toBe("state_name: DB='TX' != Index='N/A'");
      expect(mismatch.index_value).toBeNull();
    });

    it('skips location for remote jobs without a database location', () => {
      const db = makeJob({ work_mode: 'Remote', city_name: null, state_name: '' });
      const index = makeIndexRecord({ workmode: 'Remote', city_name: 'Austin', state_name: 'TX' });
      expect(compareJob(db, index)).toEqual([]);
    });

    it('skips location for remote jobs', () => {
      const db = makeJob({ work_mode: 'Remote', city_name: 'Austin', state_name: 'TX' });
      const index = makeIndexRecord({ workmode: 'Remote', city_name: null, state_name: 'Anywhere' });
      expect(compareJob(db, index)).toEqual([]);
    });
  });

  describe('work mode', () => {
    it('reports the index field the value came from', () => {
      const db = makeJob({ id: 4821, work_mode: 'Hybrid' });
      const index = makeIndexRecord({ id: '4821', workmode: 'Not Remote' });
      const mismatches = compareJob(db, index);

      expect(mismatches).toEqual([
        {
          job_id: 4821,
          field_name: 'work_mode',
          category: 'field_mismatch',
          db_value: 'Hybrid',
          index_value: 'Not Remote',
          source_field_used: 'workmode',
          message: 'work_mode: DB=Hybrid, Index=Not Remote (source_field_used=workmode)',
        },
      ]);
    });

    it('falls back to the remote flag when workmode is empty', () => {
      const index = makeIndexRecord({ workmode: '', remote: 'true' });
      expect(resolveIndexWorkMode(index)).toEqual({ mode: 'Remote', source: 'remote', raw: 'true' });

      const [mismatch] = compareJob(makeJob(), index);
      expect(mismatch.message).toBe('work_mode: DB=Not Remote, Index=Remote (source_field_used=remote)');
      expect(mismatch.source_field_used).toBe('remote');
    });

    it('compares against workmode when both index fields are set', () => {
      const mismatches = compareJob(makeJob({ work_mode: 'Remote' }), makeIndexRecord({ workmode: 'Hybrid', remote: true }));
      expect(mismatches).toHaveLength(1);
      expect(mismatches[0].message).toBe('work_mode: DB=Remote, Index=Hybrid (source_field_used=workmode)');
      expect(mismatches[0].message).toContain('source_field_used=workmode');
    });

    it('reports an unrecognised database code as malformed', () => {
      const db = makeJob({ work_mode: null, work_mode_error: '7' });
      expect(compareJob(db, makeIndexRecord())).toEqual([
        {
          job_id: 1,
          field_name: 'work_mode',
          category: 'malformed_value',
          db_value: '7',
          index_value: null,
          source_field_used: null,
          message: "work_mode: unrecognized database value '7' in field is_remote",
        },
      ]);
    });

    it('prefers workmode over the remote flag', () => {
      expect(resolveIndexWorkMode(makeIndexRecord({ workmode: 'Hybrid', remote: false }))).toEqual({
        mode: 'Hybrid',
        source: 'workmode',
        raw: 'Hybrid',
      });
    });

    it('treats a value absent from both fields as N/A', () => {
      const db = makeJob({ work_mode: 'Hybrid' });
      const [mismatch] = compareJob(db, makeIndexRecord({ workmode: null, remote: null }));
      expect(mismatch.message).toBe('work_mode: DB=Hybrid, Index=N/A (source_field_used=none)');
      expect(mismatch.index_value).toBeNull();

      expect(compareJob(makeJob({ work_mode: null }), makeIndexRecord({ workmode: null }))).toEqual([]);
    });

    it('reports an unrecognised index value as malformed', () => {
      const [mismatch] = compareJob(makeJob(), makeIndexRecord({ workmode: 'flexible' }));
      expect(mismatch).toEqual({
        job_id: 1,
        field_name: 'work_mode',
        category: 'malformed_value',
        db_value: 'Not Remote',
        index_value: 'flexible',
        source_field_used: 'workmode',
        message: "work_mode: unrecognized index value 'flexible' in field workmode",
      });
    });

    it('resolveIndexWorkMode throws on malformed values', () => {
      expect(() => resolveIndexWorkMode(makeIndexRecord({ workmode: null, remote: 'maybe' }))).toThrow(
        MalformedSourceValueError,
      );
    });
  });

  describe('skills', () => {
    it('reports database skills missing from the index', () => {
      const [mismatch] = compareJob(makeJob(), makeIndexRecord({ ai_skills: ['Python'] }));
      expect(mismatch.field_name).toBe('ai_skills');
      expect(mismatch.message).toBe('ai_skills: missing in index [sql] (DB=[python, sql], Index=[python])');
      expect(mismatch.db_value).toBe('python, sql');
      expect(mismatch.index_value).toBe('python');
    });

    it('accepts extra index skills', () => {
      expect(compareJob(makeJob(), makeIndexRecord({ ai_skills: ['SQL', 'Python', 'Airflow'] }))).toEqual([]);
    });

    it('passes when the database has no skills', () => {
      expect(compareJob(makeJob({ ai_skills: [] }), makeIndexRecord({ ai_skills: [] }))).toEqual([]);
    });

    it('tolerates missing skills up to the configured ratio', () => {
      const options = { ...DEFAULT_COMPARATOR_OPTIONS, skillsMaxMissingRatio: 0.5 };
      expect(compareJob(makeJob(), makeIndexRecord({ ai_skills: ['python'] }), options)).toEqual([]);

      const [mismatch] = compareJob(makeJob(), makeIndexRecord({ ai_skills: [] }), options);
      expect(mismatch.message).toBe('ai_skills: missing in index [python, sql] (DB=[python, sql], Index=[])');
      expect(mismatch.index_value).toBeNull();
    });
  });

  it('orders mismatches by field', () => {
    const index = makeIndexRecord({
      ai_skills: [],
      job_link: 'https://jobs.example.com/2',
      workmode: 'Remote',
      title: 'Data Engineering',
    });
    expect(compareJob(makeJob(), index).map((m) => m.field_name)).toEqual(['title', 'work_mode', 'job_link', 'ai_skills']);
  });

  it('missingIndexRecord describes the absent document', () => {
    expect(missingIndexRecord(makeJob({ id: 9999 }))).toEqual({
      job_id: 9999,
      field_name: 'index_record',
      category: 'missing_index_record',
      db_value: '9999',
      index_value: null,
      source_field_used: null,
      message: 'index_record: job 9999 not found in index',
    });
  });
});
