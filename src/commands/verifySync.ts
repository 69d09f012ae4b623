import type pino from 'pino';
import type { AppConfig } from '../utils/config.js';
import type { FailureReport, HistoryEntry } from '../types/report.js';
import { buildHistoryEntry, type HistoryService } from '../services/historyService.js';
import { writeFailureReport, type WrittenReport } from '../services/reportWriter.js';
import {
	runSyncVerification,
	type IndexLookup,
	type JobSource,
	type VerifierContext,
} from '../verifier/syncVerifier.js';
import { DEFAULT_COMPARATOR_OPTIONS } from '../verifier/comparator.js';

const TABLE_ID_WIDTH = 12;
const TABLE_TITLE_WIDTH = 50;
const TABLE_ERROR_WIDTH = 80;
const DETAILED_FAILURES = 20;

export interface VerifySyncDeps {
	jobs: JobSource;
	index: IndexLookup & { ping?: () => Promise<boolean> };
	history: HistoryService;
	logger: pino.Logger;
	now?: () => Date;
}

export interface VerifySyncResult {
	report: FailureReport;
	entry: HistoryEntry;
	written: WrittenReport;
	exitCode: number;
}

function cell(value: string, width: number): string {
	const flat = value.replace(/[\r\n]+/g, ' ');
	const cut = flat.length > width ? `${flat.slice(0, width - 3)}...` : flat;
	return cut.padEnd(width);
}

function logFailureTable(report: FailureReport, logger: pino.Logger): void {
	const header = `${cell('ID', TABLE_ID_WIDTH)} | ${cell('Title', TABLE_TITLE_WIDTH)} | ${cell('Error', TABLE_ERROR_WIDTH)}`;
	const separator = '-'.repeat(header.length);
	logger.error(separator);
	logger.error(header);
	logger.error(separator);
	for (const failure of report.failures) {
		logger.error(
			`${cell(String(failure.id), TABLE_ID_WIDTH)} | ${cell(failure.db_title, TABLE_TITLE_WIDTH)} | ${cell(failure.msg, TABLE_ERROR_WIDTH)}`,
		);
	}
	logger.error(separator);

	for (const failure of report.failures.slice(0, DETAILED_FAILURES)) {
		logger.error({ jobId: failure.id, title: failure.db_title, mismatches: failure.mismatches.map((m) => m.message) }, 'Sync failure');
	}
	if (report.failures.length > DETAILED_FAILURES) {
		logger.error(`${report.failures.length - DETAILED_FAILURES} more failures are in the report file`);
	}
}

export function verifierContextFromConfig(config: AppConfig, logger: pino.Logger): VerifierContext {
	return {
		logger,
		options: {
			...DEFAULT_COMPARATOR_OPTIONS,
			titleDiffPositions: config.sync.titleDiffPositions,
			skillsMaxMissingRatio: config.sync.skillsMaxMissingRatio,
			maxJobs: config.sync.maxJobs,
		},
	};
}

/**
 * One full verification run: compare, replace the report, record history.
 * Returns exit code 1 when jobs are out of sync and failures are not allowed.
 */
export async function verifyDbSolrSync(config: AppConfig, deps: VerifySyncDeps): Promise<VerifySyncResult> {
	const { logger } = deps;
	const now = deps.now ?? (() => new Date());

	if (deps.index.ping) {
		const reachable = await deps.index.ping();
		if (!reachable) {
			logger.warn('Search index did not answer its ping; lookups may fail');
		}
	}

	const context = verifierContextFromConfig(config, logger);
	const report = await runSyncVerification(deps.jobs, deps.index, config.sync.windowHours, context);

	const written = await writeFailureReport(report, config.reportsDir);
	const entry = buildHistoryEntry(report, config.history.testName, now());
	await deps.history.recordRun(entry, now());

	if (report.total_failures === 0) {
		logger.info(`All ${report.total_jobs_checked} jobs are in sync`);
		return { report, entry, written, exitCode: 0 };
	}

	logger.error(
		{
			available: report.total_jobs_available,
			checked: report.total_jobs_checked,
			failures: report.total_failures,
		},
		`DB/Solr sync failed for ${report.total_failures}/${report.total_jobs_checked} jobs checked`,
	);
	logFailureTable(report, logger);

	if (config.sync.allowFailures) {
		logger.warn('ALLOW_SYNC_FAILURES is set; exiting successfully and relying on the report');
		return { report, entry, written, exitCode: 0 };
	}
	return { report, entry, written, exitCode: 1 };
}
