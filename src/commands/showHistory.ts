import { buildDailyView, type DailyHistoryRow, type HistoryService } from '../services/historyService.js';
import type { HistoryEntry } from '../types/report.js';

export interface HistoryView {
	testName: string;
	entries: HistoryEntry[];
	days: DailyHistoryRow[];
}

export async function loadHistoryView(
	history: Pick<HistoryService, 'getHistory'>,
	testName: string,
	days: number,
	today: Date = new Date(),
): Promise<HistoryView> {
	const entries = await history.getHistory(testName);
	return { testName, entries, days: buildDailyView(entries, days, today) };
}

/** One line per day, newest first: date, status, then counts for days that ran. */
export function formatHistoryView(view: HistoryView): string {
	const lines = [`History for ${view.testName}`];
	for (const row of view.days) {
		if (!row.entry) {
			lines.push(`${row.date}  ${row.status}`);
			continue;
		}
		const counts = `${row.entry.error_jobs_count}/${row.entry.total_jobs} failing`;
		lines.push(`${row.date}  ${row.status.padEnd(7)} ${counts}  (${row.entry.datetime})`);
	}
	return lines.join('\n');
}
