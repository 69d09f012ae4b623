import { parseCsvFile } from '../utils/csv.js';
import type { SolrDoc, SolrService } from '../services/solrService.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger(import.meta.url);

const KEY_FIELDS: Array<[label: string, field: string]> = [
	['Title', 'title'],
	['Company', 'company_name'],
	['City', 'city_name'],
	['State', 'state_name'],
	['Work Mode', 'workmode'],
	['Remote Flag', 'remote'],
	['Job Link', 'joblink'],
	['AI Skills', 'ai_skills'],
	['Modified', 'modified'],
];

export interface CheckIdsResult {
	found: SolrDoc[];
	notFound: string[];
}

/** Splits a comma or whitespace separated id list, dropping blanks and repeats. */
export function parseIdList(value: string): string[] {
	const ids = value
		.split(/[\s,]+/)
		.map((id) => id.trim())
		.filter((id) => id.length > 0);
	return [...new Set(ids)];
}

/** Reads ids from the `id` column of a CSV file, or its first column when there is none. */
export async function readIdsFromCsv(file: string): Promise<string[]> {
	const records = await parseCsvFile(file);
	const ids: string[] = [];
	for (const record of records) {
		const value = record['id'] ?? Object.values(record)[0] ?? '';
		if (value.trim()) ids.push(value.trim());
	}
	return [...new Set(ids)];
}

export function formatFieldValue(value: unknown): string {
	if (Array.isArray(value)) {
		return value.map(String).join(', ');
	}
	if (value === null || value === undefined) {
		return '';
	}
	return String(value);
}

/** Renders one index document with the key fields first, then the rest sorted. */
export function formatDocument(doc: SolrDoc): string {
	const lines = [`JOB ID: ${doc.id}`];
	const shown = new Set<string>(['id']);

	for (const [label, field] of KEY_FIELDS) {
		shown.add(field);
		const formatted = formatFieldValue(doc[field]);
		if (formatted.trim()) {
			lines.push(`${label.padEnd(25)} : ${formatted}`);
		}
	}

	const rest = Object.keys(doc)
		.filter((key) => !shown.has(key))
		.sort();
	for (const key of rest) {
		const formatted = formatFieldValue(doc[key]);
		if (formatted.trim() && formatted !== 'null') {
			lines.push(`${key.padEnd(25)} : ${formatted}`);
		}
	}
	return lines.join('\n');
}

export async function checkJobIds(solr: Pick<SolrService, 'searchByIds'>, ids: readonly string[]): Promise<CheckIdsResult> {
	logger.info(`Checking ${ids.length} job id(s) in index`);
	const docs = await solr.searchByIds(ids);
	const byId = new Map(docs.map((doc) => [doc.id, doc]));

	const found: SolrDoc[] = [];
	const notFound: string[] = [];
	for (const id of ids) {
		const doc = byId.get(id);
		if (doc) {
			found.push(doc);
		} else {
			notFound.push(id);
		}
	}

	logger.info({ found: found.length, notFound: notFound.length }, 'Index id check finished');
	return { found, notFound };
}
