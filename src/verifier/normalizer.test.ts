import { describe, expect, it } from 'vitest';
import {
  collapseWhitespace,
  isEmptyValue,
  normalizeLocation,
  normalizeSkillSet,
  normalizeTitle,
  normalizeWorkMode,
  parseSkillList,
} from './normalizer.js';
import { MalformedSourceValueError } from './errors.js';

describe('normalizer', () => {
  describe('normalizeTitle', () => {
    it('collapses whitespace runs and trims', () => {
      expect(normalizeTitle('  Java   Dev  ')).toBe('Java Dev');
      expect(normalizeTitle('Senior Engineer\t(Remote)\n')).toBe('Senior Engineer (Remote)');
    });

    it('keeps case', () => {
      expect(normalizeTitle('data engineer')).not.toBe(normalizeTitle('Data Engineer'));
    });

    it('is idempotent', () => {
      const once = normalizeTitle(' \t Lead  QA Analyst ');
      expect(normalizeTitle(once)).toBe(once);
    });

    it('maps absent values to an empty string', () => {
      expect(normalizeTitle(null)).toBe('');
      expect(normalizeTitle(undefined)).toBe('');
    });
  });

  it('normalizeLocation trims and lowercases', () => {
    expect(normalizeLocation('  Austin ')).toBe('austin');
    expect(normalizeLocation('TX')).toBe(normalizeLocation('tx'));
    expect(normalizeLocation(null)).toBe('');
  });

  it('collapseWhitespace leaves single spaces alone', () => {
    expect(collapseWhitespace('Acme Corp')).toBe('Acme Corp');
  });

  it('isEmptyValue treats blank strings and empty arrays as empty', () => {
    expect(isEmptyValue(null)).toBe(true);
    expect(isEmptyValue(undefined)).toBe(true);
    expect(isEmptyValue('   ')).toBe(true);
    expect(isEmptyValue([])).toBe(true);
    expect(isEmptyValue(false)).toBe(false);
    expect(isEmptyValue(0)).toBe(false);
    expect(isEmptyValue('Remote')).toBe(false);
  });

  describe('skills', () => {
    it('parseSkillList splits on commas and drops blanks', () => {
      expect(parseSkillList('Python,  SQL ,, Apache  Spark')).toEqual(['Python', 'SQL', 'Apache Spark']);
      expect(parseSkillList(null)).toEqual([]);
      expect(parseSkillList('')).toEqual([]);
    });

    it('normalizeSkillSet lowercases and dedupes', () => {
      expect([...normalizeSkillSet(['SQL', 'sql ', ' Python', ''])]).toEqual(['sql', 'python']);
    });
  });

  describe('normalizeWorkMode', () => {
    it('maps workmode strings case-insensitively', () => {
      expect(normalizeWorkMode('Remote', 'workmode')).toBe('Remote');
      expect(normalizeWorkMode('HYBRID', 'workmode')).toBe('Hybrid');
      expect(normalizeWorkMode(' not  remote ', 'workmode')).toBe('Not Remote');
      expect(normalizeWorkMode('On-Site', 'workmode')).toBe('Not Remote');
      expect(normalizeWorkMode('2', 'workmode')).toBe('Hybrid');
    });

    it('maps boolean-like remote flags', () => {
      expect(normalizeWorkMode(true, 'remote')).toBe('Remote');
      expect(normalizeWorkMode(false, 'remote')).toBe('Not Remote');
      expect(normalizeWorkMode('true', 'remote')).toBe('Remote');
      expect(normalizeWorkMode('0', 'remote')).toBe('Not Remote');
      expect(normalizeWorkMode(1, 'remote')).toBe('Remote');
    });

    it('maps database codes', () => {
      expect(normalizeWorkMode(0, 'is_remote')).toBe('Not Remote');
      expect(normalizeWorkMode(1, 'is_remote')).toBe('Remote');
      expect(normalizeWorkMode(2, 'is_remote')).toBe('Hybrid');
      expect(normalizeWorkMode('2', 'is_remote')).toBe('Hybrid');
    });

    it('returns null for empty values', () => {
      expect(normalizeWorkMode(null, 'workmode')).toBeNull();
      expect(normalizeWorkMode(undefined, 'remote')).toBeNull();
      expect(normalizeWorkMode('  ', 'workmode')).toBeNull();
    });

    it('is idempotent on canonical values', () => {
      for (const mode of ['Remote', 'Hybrid', 'Not Remote'] as const) {
        expect(normalizeWorkMode(mode, 'workmode')).toBe(mode);
      }
    });

    it('rejects values it cannot map', () => {
      expect(() => normalizeWorkMode('sometimes', 'workmode')).toThrow(MalformedSourceValueError);
      expect(() => normalizeWorkMode('hybrid', 'remote')).toThrow(MalformedSourceValueError);
      expect(() => normalizeWorkMode(2, 'remote')).toThrow(MalformedSourceValueError);
      expect(() => normalizeWorkMode(5, 'is_remote')).toThrow(MalformedSourceValueError);
      expect(() => normalizeWorkMode(true, 'is_remote')).toThrow(MalformedSourceValueError);
      expect(() => normalizeWorkMode('yes', 'is_remote')).toThrow('Unrecognized is_remote value: "yes"');
    });

    it('does not resolve inherited object keys', () => {
      expect(() => normalizeWorkMode('constructor', 'workmode')).toThrow(MalformedSourceValueError);
    });
  });
});
