import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { normalizeToUnixSeconds, parseReadingsCsv } from "./ingestion-helpers";

const NEW_YEAR_2026 = 1_767_225_600;

describe("normalizeToUnixSeconds", () => {
	it("accepts seconds, milliseconds and nanoseconds", () => {
		expect(normalizeToUnixSeconds(NEW_YEAR_2026)).toBe(NEW_YEAR_2026);
		expect(normalizeToUnixSeconds(1_767_225_600_123)).toBe(NEW_YEAR_2026);
		expect(normalizeToUnixSeconds("1767225600000000000")).toBe(NEW_YEAR_2026);
		expect(normalizeToUnixSeconds("1767225600.9")).toBe(NEW_YEAR_2026);
	});

	it("parses ISO-8601 text", () => {
		expect(normalizeToUnixSeconds("2026-01-01T00:00:00Z")).toBe(NEW_YEAR_2026);
		expect(normalizeToUnixSeconds(" 2026-01-01T01:00:00+01:00 ")).toBe(NEW_YEAR_2026);
	});

	describe("away from UTC", () => {
		beforeEach(() => {
			vi.stubEnv("TZ", "America/New_York");
		});

		afterEach(() => {
			vi.unstubAllEnvs();
		});

		it("reads date-times without a zone as UTC", () => {
			// The host zone really is five hours behind UTC here.
			expect(new Date(2026, 0, 1).getTimezoneOffset()).toBe(300);

			expect(normalizeToUnixSeconds("2026-01-01 00:00:00")).toBe(NEW_YEAR_2026);
			expect(normalizeToUnixSeconds("2026-01-01T00:00:00")).toBe(NEW_YEAR_2026);
			expect(normalizeToUnixSeconds("2026-01-01T00:00")).toBe(NEW_YEAR_2026);
			expect(normalizeToUnixSeconds("2026-01-01T00:00:00.750")).toBe(NEW_YEAR_2026);
			expect(normalizeToUnixSeconds("2026-01-01")).toBe(NEW_YEAR_2026);
		});

		it("keeps explicit offsets", () => {
			expect(normalizeToUnixSeconds("2026-01-01T00:00:00Z")).toBe(NEW_YEAR_2026);
			expect(normalizeToUnixSeconds("2025-12-31T19:00:00-05:00")).toBe(NEW_YEAR_2026);
		});
	});

	it("rejects values it cannot place in time", () => {
		expect(normalizeToUnixSeconds("yesterday-ish")).toBeUndefined();
		expect(normalizeToUnixSeconds("")).toBeUndefined();
		expect(normalizeToUnixSeconds(0)).toBeUndefined();
		expect(normalizeToUnixSeconds(-5)).toBeUndefined();
		expect(normalizeToUnixSeconds(Number.NaN)).toBeUndefined();
		expect(normalizeToUnixSeconds(null)).toBeUndefined();
	});
});

describe("parseReadingsCsv", () => {
	it("maps columns by header name", () => {
		const csv = "machine_id,value,sensor,timestamp,site\nM-001,71.5,temperature,1767225600,plant-a\n";
		expect(parseReadingsCsv(csv)).toEqual({
			records: [
				{
					timestamp: 1767225600,
					machine_id: "M-001",
					sensor: "temperature",
					value: 71.5,
				},
			],
			issues: [],
		});
	});

	it("keeps non-numeric cells as text", () => {
		const { records } = parseReadingsCsv(
			"timestamp,machine_id,sensor,value\r\n2026-01-01T00:00:00Z,M-001,rpm,n/a\r\n",
		);
		expect(records[0].timestamp).toBe("2026-01-01T00:00:00Z");
		expect(records[0].value).toBe("n/a");
	});

	it("reads every plain decimal form as a number", () => {
		const { records } = parseReadingsCsv(
			"timestamp,machine_id,sensor,value\n1767225600,M-001,vibration,.5\n" +
				"1767225600,M-001,current,5.\n1767225600,M-001,rpm,+1750\n" +
				"1767225600,M-001,pressure,1.2e2\n",
		);
		expect(records.map((r) => r.value)).toEqual([0.5, 5, 1750, 120]);
	});

	it("reports structural problems", () => {
		expect(parseReadingsCsv("  \n").issues).toEqual(["Empty CSV file"]);
		expect(parseReadingsCsv("timestamp,value\n1,2").issues).toEqual([
			"Missing required columns: machine_id, sensor",
		]);
		expect(
			parseReadingsCsv("timestamp,machine_id,sensor,value\n1,M-001,rpm").issues,
		).toEqual(["Row 1: expected 4 fields, got 3"]);
	});
});
