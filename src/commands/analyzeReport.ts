import path from 'path';
import { readFailureReport, REPORT_JSON_FILE } from '../services/reportWriter.js';
import { analyzeFailures, formatAnalysis, type FailureAnalysis } from '../services/failureAnalyzer.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger(import.meta.url);

export interface AnalyzeReportResult {
	file: string;
	analysis: FailureAnalysis;
	text: string;
}

export function defaultReportPath(reportsDir: string): string {
	return path.join(reportsDir, REPORT_JSON_FILE);
}

/** Loads a stored failure report and summarizes it by category and field. */
export async function analyzeReport(file: string): Promise<AnalyzeReportResult> {
	logger.info({ file }, 'Analyzing failure report');
	const report = await readFailureReport(file);
	const analysis = analyzeFailures(report);
	return { file, analysis, text: formatAnalysis(analysis) };
}
