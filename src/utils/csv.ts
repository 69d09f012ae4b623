import { parse } from 'csv-parse/sync';
import fs from 'fs';

export async function parseCsvFile(filePath: string): Promise<Array<Record<string, string>>> {
	const content = await fs.promises.readFile(filePath, 'utf8');
	return parseCsv(content);
}

export function parseCsv(content: string): Array<Record<string, string>> {
	const records: unknown = parse(content, {
		columns: true,
		delimiter: detectDelimiter(content),
		trim: true,
		skip_empty_lines: true,
		relax_column_count: true,
	});
	if (!Array.isArray(records)) {
		return [];
	}
	return records.filter(isStringRecord);
}

function isStringRecord(value: unknown): value is Record<string, string> {
	return typeof value === 'object' && value !== null && Object.values(value).every((v) => typeof v === 'string');
}

function detectDelimiter(content: string): string {
	const firstLine = content.split(/\r?\n/)[0] || '';
	const commaCount = (firstLine.match(/,/g) || []).length;
	const tabCount = (firstLine.match(/\t/g) || []).length;
	return tabCount > commaCount ? '\t' : ',';
}
