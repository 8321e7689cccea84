import type { UnixSeconds } from "../types";

export const REQUIRED_COLUMNS = ["timestamp", "machine_id", "sensor", "value"] as const;

export type RawReading = Record<(typeof REQUIRED_COLUMNS)[number], unknown>;

export interface CsvParseResult {
	records: RawReading[];
	issues: string[];
}

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

// Date and time with no zone designator; read as UTC.
const ZONELESS_DATETIME = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}(:\d{2}(\.\d+)?)?)$/;

function normalizeEpoch(value: number): UnixSeconds | undefined {
	if (!Number.isFinite(value) || value <= 0) return undefined;
	if (value > 1e15) return Math.floor(value / 1e9);
	if (value > 1e12) return Math.floor(value / 1e3);
	return Math.floor(value);
}

/**
 * Accepts epoch seconds, milliseconds or nanoseconds (as numbers or digit
 * strings) and ISO-8601 text. Text without a zone is UTC. Returns undefined
 * for anything else.
 */
export function normalizeToUnixSeconds(ts: unknown): UnixSeconds | undefined {
	if (typeof ts === "number") return normalizeEpoch(ts);
	if (typeof ts !== "string") return undefined;

	const text = ts.trim();
	if (text.length === 0) return undefined;
	if (NUMERIC.test(text)) return normalizeEpoch(Number(text));

	const zoneless = ZONELESS_DATETIME.exec(text);
	const ms = Date.parse(zoneless ? `${zoneless[1]}T${zoneless[2]}Z` : text);
	return Number.isNaN(ms) ? undefined : Math.floor(ms / 1000);
}

function parseCell(text: string): string | number {
	const trimmed = text.trim();
	return trimmed.length > 0 && NUMERIC.test(trimmed) ? Number(trimmed) : trimmed;
}

/**
 * Splits `timestamp,machine_id,sensor,value` CSV text. Columns may appear in
 * any order; extra columns are ignored. No quoting: none of the fields can
 * contain a comma.
 */
export function parseReadingsCsv(text: string): CsvParseResult {
	const lines = text
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0);

	const [headerLine, ...body] = lines;
	if (headerLine === undefined) {
		return { records: [], issues: ["Empty CSV file"] };
	}

	const header = headerLine.split(",").map((name) => name.trim());
	const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
	if (missing.length > 0) {
		return {
			records: [],
			issues: [`Missing required columns: ${missing.join(", ")}`],
		};
	}

	const index = {
		timestamp: header.indexOf("timestamp"),
		machine_id: header.indexOf("machine_id"),
		sensor: header.indexOf("sensor"),
		value: header.indexOf("value"),
	};

	const records: RawReading[] = [];
	const issues: string[] = [];
	body.forEach((line, i) => {
		const cells = line.split(",");
		if (cells.length < header.length) {
			issues.push(`Row ${i + 1}: expected ${header.length} fields, got ${cells.length}`);
			return;
		}
		records.push({
			timestamp: parseCell(cells[index.timestamp]),
			machine_id: cells[index.machine_id].trim(),
			sensor: cells[index.sensor].trim(),
			value: parseCell(cells[index.value]),
		});
	});

	return { records, issues };
}
