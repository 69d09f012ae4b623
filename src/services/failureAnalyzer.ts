import type { FailureReport, FieldName, JobFailure, MismatchCategory, SourceFieldUsed } from '../types/report.js';

const SAMPLES_PER_FIELD = 3;

export interface FailureAnalysis {
  totalChecked: number;
  totalFailures: number;
  successRate: number;
  byCategory: Partial<Record<MismatchCategory, number>>;
  byField: Partial<Record<FieldName, number>>;
  workMode: {
    bySourceField: Partial<Record<SourceFieldUsed, number>>;
    byDbValue: Record<string, number>;
  };
  samples: Partial<Record<FieldName, JobFailure[]>>;
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Counts the mismatches of a stored report by category and field, with a
 * breakdown of work-mode mismatches and a few sample jobs per field.
 */
export function analyzeFailures(report: FailureReport): FailureAnalysis {
  const analysis: FailureAnalysis = {
    totalChecked: report.total_jobs_checked,
    totalFailures: report.total_failures,
    successRate:
      report.total_jobs_checked === 0
        ? 100
        : ((report.total_jobs_checked - report.total_failures) / report.total_jobs_checked) * 100,
    byCategory: {},
    byField: {},
    workMode: { bySourceField: {}, byDbValue: {} },
    samples: {},
  };

  for (const failure of report.failures) {
    for (const mismatch of failure.mismatches) {
      increment(analysis.byCategory, mismatch.category);
      increment(analysis.byField, mismatch.field_name);

      if (mismatch.field_name === 'work_mode') {
        increment(analysis.workMode.bySourceField, mismatch.source_field_used ?? 'none');
        increment(analysis.workMode.byDbValue, mismatch.db_value ?? 'N/A');
      }

      const samples = analysis.samples[mismatch.field_name] ?? [];
      if (samples.length < SAMPLES_PER_FIELD && !samples.includes(failure)) {
        samples.push(failure);
      }
      analysis.samples[mismatch.field_name] = samples;
    }
  }

  return analysis;
}

function sortedCounts(counts: Partial<Record<string, number>>): Array<[string, number]> {
  return Object.entries(counts)
    .filter((entry): entry is [string, number] => entry[1] !== undefined)
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

export function formatAnalysis(analysis: FailureAnalysis): string {
  const lines: string[] = [];
  const pct = (n: number) => (analysis.totalFailures === 0 ? 0 : (n / analysis.totalFailures) * 100).toFixed(1);

  lines.push(`Jobs checked: ${analysis.totalChecked}`);
  lines.push(`Failing jobs: ${analysis.totalFailures}`);
  lines.push(`Success rate: ${analysis.successRate.toFixed(2)}%`);

  lines.push('', 'By category:');
  for (const [category, count] of sortedCounts(analysis.byCategory)) {
    lines.push(`  ${category.padEnd(24)} ${String(count).padStart(6)}`);
  }

  lines.push('', 'By field:');
  for (const [field, count] of sortedCounts(analysis.byField)) {
    lines.push(`  ${field.padEnd(24)} ${String(count).padStart(6)} (${pct(count)}%)`);
  }

  const sourceCounts = sortedCounts(analysis.workMode.bySourceField);
  if (sourceCounts.length > 0) {
    lines.push('', 'Work mode by index field:');
    for (const [field, count] of sourceCounts) {
      lines.push(`  ${field.padEnd(24)} ${String(count).padStart(6)}`);
    }
    lines.push('', 'Work mode by DB value:');
    for (const [value, count] of sortedCounts(analysis.workMode.byDbValue)) {
      lines.push(`  ${value.padEnd(24)} ${String(count).padStart(6)}`);
    }
  }

  for (const [field, samples] of Object.entries(analysis.samples)) {
    if (!samples || samples.length === 0) continue;
    lines.push('', `Samples - ${field}:`);
    for (const sample of samples) {
      lines.push(`  [${sample.id}] ${sample.db_title.slice(0, 60)}`);
      lines.push(`      ${sample.msg}`);
    }
  }

  return lines.join('\n');
}
