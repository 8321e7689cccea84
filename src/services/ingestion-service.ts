import { z } from "zod";
import type { Tunables } from "../config/settings";
import { ReadingValidationError } from "../core/errors";
import type { MachineStore, ReadingStore } from "../db/stores";
import { SENSOR_TYPES, type Reading } from "../types";
import { logger } from "../utils/logger";
import { normalizeToUnixSeconds, parseReadingsCsv } from "./ingestion-helpers";

export interface MachineEnqueuer {
	enqueue(machineIds: readonly string[]): { accepted: number; dropped: number };
}

export interface IngestionSummary {
	rowsIngested: number;
	machines: string[];
	newMachines: number;
	queuedMachines: number;
}

function readingSchema(config: Tunables<"ingestion">) {
	return z.object({
		timestamp: z.union([z.string(), z.number()]),
		machine_id: z
			.string()
			.regex(
				/^[A-Za-z0-9_-]{1,50}$/,
				"must be 1-50 alphanumeric characters, hyphens or underscores",
			),
		sensor: z.enum(SENSOR_TYPES),
		value: z.number().finite().min(config.minValue).max(config.maxValue),
	});
}

export class IngestionService {
	private readonly schema: ReturnType<typeof readingSchema>;

	constructor(
		private readonly stores: MachineStore & ReadingStore,
		private readonly queue: MachineEnqueuer,
		config: Tunables<"ingestion">,
	) {
		this.schema = readingSchema(config);
	}

	/**
	 * Validates every record first; a single bad record rejects the whole
	 * upload with the full list of issues.
	 */
	validate(records: readonly unknown[]): Reading[] {
		const readings: Reading[] = [];
		const issues: string[] = [];

		records.forEach((raw, i) => {
			const result = this.schema.safeParse(raw);
			if (!result.success) {
				for (const issue of result.error.issues) {
					const field = issue.path.join(".") || "record";
					issues.push(`Row ${i + 1}: ${field}: ${issue.message}`);
				}
				return;
			}
			const timestamp = normalizeToUnixSeconds(result.data.timestamp);
			if (timestamp === undefined) {
				issues.push(
					`Row ${i + 1}: timestamp: unrecognised timestamp ${String(result.data.timestamp)}`,
				);
				return;
			}
			readings.push({
				timestamp,
				machineId: result.data.machine_id,
				sensor: result.data.sensor,
				value: result.data.value,
			});
		});

		if (issues.length > 0) {
			throw new ReadingValidationError(issues);
		}
		return readings;
	}

	async ingestRecords(records: readonly unknown[]): Promise<IngestionSummary> {
		return this.ingestReadings(this.validate(records));
	}

	/** Stores already-typed readings, e.g. from the simulator. */
	async ingestReadings(readings: readonly Reading[]): Promise<IngestionSummary> {
		const machines = [...new Set(readings.map((r) => r.machineId))].sort();

		const newMachines = await this.stores.ensureMachines(machines);
		if (newMachines > 0) {
			logger.warn("Registered unknown machines", { count: newMachines });
		}
		const rowsIngested = await this.stores.insertReadings(readings);
		const { accepted, dropped } = this.queue.enqueue(machines);
		if (dropped > 0) {
			logger.warn("Scoring queue rejected machines", { dropped });
		}

		logger.info("Sensor data ingested", {
			rows_ingested: rowsIngested,
			machines,
			new_machines: newMachines,
		});

		return { rowsIngested, machines, newMachines, queuedMachines: accepted };
	}

	async ingestCsv(text: string): Promise<IngestionSummary> {
		const { records, issues } = parseReadingsCsv(text);
		if (issues.length > 0) {
			throw new ReadingValidationError(issues);
		}
		if (records.length === 0) {
			throw new ReadingValidationError(["CSV file contains no readings"]);
		}
		return this.ingestRecords(records);
	}
}
