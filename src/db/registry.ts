import { and, desc, eq, gte, type SQL } from "drizzle-orm";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import type { Settings } from "../config/settings";
import {
	type AlertEvent,
	isSensorType,
	isSeverity,
	type Machine,
	type NewAlert,
	type Reading,
	type Score,
	type Severity,
} from "../types";
import { logger } from "../utils/logger";
import type { AlertRow, MachineRow, PredictionRow } from "./schema";
import * as schema from "./schema";
import type { AlertFilter, Registry } from "./stores";

function toMachine(row: MachineRow): Machine {
	return {
		machineId: row.machineId,
		name: row.name,
		line: row.line,
		criticality: row.criticality,
		createdAt: row.createdTs,
	};
}

function toSeverity(value: string): Severity {
	if (!isSeverity(value)) {
		throw new Error(`Unknown alert severity in storage: ${value}`);
	}
	return value;
}

function toAlert(row: AlertRow): AlertEvent {
	return {
		id: row.id,
		machineId: row.machineId,
		severity: toSeverity(row.severity),
		message: row.message,
		failureProbability: row.failureProbability,
		anomalyScore: row.anomalyScore,
		createdAt: row.createdTs,
		resolved: row.resolved,
		resolvedAt: row.resolvedTs,
	};
}

function toScore(row: PredictionRow): Score {
	return {
		machineId: row.machineId,
		timestamp: row.ts,
		horizonHours: row.horizonHours,
		failureProbability: row.failureProb,
		anomalyScore: row.anomalyScore,
		confidence: row.confidence,
		topFactors: row.topFactors,
	};
}

export class PostgresRegistry implements Registry {
	private readonly pool: Pool;
	private readonly db: NodePgDatabase<typeof schema>;

	constructor(
		config: Settings["postgres"],
		private readonly insertChunkSize = 1000,
	) {
		this.pool = new Pool({
			host: config.host,
			port: config.port,
			database: config.database,
			user: config.user,
			password: config.password,
			ssl: false,
		});
		this.db = drizzle(this.pool, { schema });
	}

	async initialize(): Promise<void> {
		await this.pool.query(`
			CREATE TABLE IF NOT EXISTS machines (
				id SERIAL PRIMARY KEY,
				machine_id TEXT NOT NULL UNIQUE,
				name TEXT,
				line TEXT,
				criticality INTEGER NOT NULL DEFAULT 3,
				created_ts INTEGER NOT NULL
			);

			CREATE TABLE IF NOT EXISTS sensor_readings (
				id SERIAL PRIMARY KEY,
				machine_id TEXT NOT NULL,
				ts INTEGER NOT NULL,
				sensor TEXT NOT NULL,
				value DOUBLE PRECISION NOT NULL,
				created_at TIMESTAMP DEFAULT NOW()
			);
			CREATE INDEX IF NOT EXISTS ix_sensor_readings_machine_ts
				ON sensor_readings (machine_id, ts);

			CREATE TABLE IF NOT EXISTS predictions (
				id SERIAL PRIMARY KEY,
				machine_id TEXT NOT NULL,
				ts INTEGER NOT NULL,
				horizon_hours INTEGER NOT NULL,
				failure_prob DOUBLE PRECISION NOT NULL,
				anomaly_score DOUBLE PRECISION,
				confidence DOUBLE PRECISION NOT NULL,
				top_factors JSONB NOT NULL,
				model_version TEXT NOT NULL,
				created_at TIMESTAMP DEFAULT NOW()
			);
			CREATE INDEX IF NOT EXISTS ix_predictions_machine_ts
				ON predictions (machine_id, ts);

			CREATE TABLE IF NOT EXISTS alerts (
				id SERIAL PRIMARY KEY,
				machine_id TEXT NOT NULL,
				severity TEXT NOT NULL,
				message TEXT NOT NULL,
				failure_probability DOUBLE PRECISION,
				anomaly_score DOUBLE PRECISION,
				created_ts INTEGER NOT NULL,
				resolved BOOLEAN NOT NULL DEFAULT FALSE,
				resolved_ts INTEGER
			);
			CREATE INDEX IF NOT EXISTS ix_alerts_machine_severity
				ON alerts (machine_id, severity, resolved, created_ts);
		`);
		logger.info("Postgres registry initialized");
	}

	async close(): Promise<void> {
		await this.pool.end();
	}

	async ensureMachines(machineIds: readonly string[]): Promise<number> {
		if (machineIds.length === 0) return 0;
		const createdTs = Math.floor(Date.now() / 1000);
		const inserted = await this.db
			.insert(schema.machines)
			.values(
				[...new Set(machineIds)].map((machineId) => ({
					machineId,
					line: "unknown",
					criticality: 3,
					createdTs,
				})),
			)
			.onConflictDoNothing({ target: schema.machines.machineId })
			.returning({ machineId: schema.machines.machineId });
		return inserted.length;
	}

	async getMachine(machineId: string): Promise<Machine | undefined> {
		const row = await this.db.query.machines.findFirst({
			where: eq(schema.machines.machineId, machineId),
		});
		return row ? toMachine(row) : undefined;
	}

	async listMachines(): Promise<Machine[]> {
		const rows = await this.db.query.machines.findMany({
			orderBy: [schema.machines.machineId],
		});
		return rows.map(toMachine);
	}

	async insertReadings(readings: readonly Reading[]): Promise<number> {
		for (let i = 0; i < readings.length; i += this.insertChunkSize) {
			const chunk = readings.slice(i, i + this.insertChunkSize);
			await this.db.insert(schema.sensorReadings).values(
				chunk.map((reading) => ({
					machineId: reading.machineId,
					ts: reading.timestamp,
					sensor: reading.sensor,
					value: reading.value,
				})),
			);
		}
		return readings.length;
	}

	async getRecentReadings(machineId: string, since: number): Promise<Reading[]> {
		const rows = await this.db.query.sensorReadings.findMany({
			where: and(
				eq(schema.sensorReadings.machineId, machineId),
				gte(schema.sensorReadings.ts, since),
			),
			orderBy: [schema.sensorReadings.ts, schema.sensorReadings.id],
		});

		const readings: Reading[] = [];
		for (const row of rows) {
			if (!isSensorType(row.sensor)) {
				logger.warn("Skipping reading with unknown sensor", {
					machineId,
					sensor: row.sensor,
				});
				continue;
			}
			readings.push({
				timestamp: row.ts,
				machineId: row.machineId,
				sensor: row.sensor,
				value: row.value,
			});
		}
		return readings;
	}

	async savePredictions(
		scores: readonly Score[],
		modelVersion: string,
	): Promise<void> {
		if (scores.length === 0) return;
		await this.db.insert(schema.predictions).values(
			scores.map((score) => ({
				machineId: score.machineId,
				ts: score.timestamp,
				horizonHours: score.horizonHours,
				failureProb: score.failureProbability,
				anomalyScore: score.anomalyScore,
				confidence: score.confidence,
				topFactors: score.topFactors,
				modelVersion,
			})),
		);
	}

	async getRecentPredictions(since: number): Promise<Score[]> {
		const rows = await this.db.query.predictions.findMany({
			where: gte(schema.predictions.ts, since),
			orderBy: [desc(schema.predictions.ts), desc(schema.predictions.id)],
		});
		return rows.map(toScore);
	}

	async createAlert(alert: NewAlert, createdAt: number): Promise<AlertEvent> {
		const [row] = await this.db
			.insert(schema.alerts)
			.values({
				machineId: alert.machineId,
				severity: alert.severity,
				message: alert.message,
				failureProbability: alert.failureProbability ?? null,
				anomalyScore: alert.anomalyScore ?? null,
				createdTs: createdAt,
			})
			.returning();
		if (!row) {
			throw new Error(`Alert insert for ${alert.machineId} returned no row`);
		}
		return toAlert(row);
	}

	async mostRecentUnresolved(
		machineId: string,
		severity: Severity,
	): Promise<AlertEvent | undefined> {
		const row = await this.db.query.alerts.findFirst({
			where: and(
				eq(schema.alerts.machineId, machineId),
				eq(schema.alerts.severity, severity),
				eq(schema.alerts.resolved, false),
			),
			orderBy: [desc(schema.alerts.createdTs), desc(schema.alerts.id)],
		});
		return row ? toAlert(row) : undefined;
	}

	async listAlerts(filter: AlertFilter): Promise<AlertEvent[]> {
		const conditions: SQL[] = [];
		if (filter.machineId !== undefined) {
			conditions.push(eq(schema.alerts.machineId, filter.machineId));
		}
		if (filter.severity !== undefined) {
			conditions.push(eq(schema.alerts.severity, filter.severity));
		}
		if (filter.resolved !== undefined) {
			conditions.push(eq(schema.alerts.resolved, filter.resolved));
		}
		if (filter.since !== undefined) {
			conditions.push(gte(schema.alerts.createdTs, filter.since));
		}

		const rows = await this.db.query.alerts.findMany({
			where: conditions.length > 0 ? and(...conditions) : undefined,
			orderBy: [desc(schema.alerts.createdTs), desc(schema.alerts.id)],
			limit: filter.limit,
			offset: filter.offset,
		});
		return rows.map(toAlert);
	}

	async getAlertById(id: number): Promise<AlertEvent | undefined> {
		const row = await this.db.query.alerts.findFirst({
			where: eq(schema.alerts.id, id),
		});
		return row ? toAlert(row) : undefined;
	}

	async resolveAlert(
		id: number,
		resolvedAt: number,
	): Promise<AlertEvent | undefined> {
		const [row] = await this.db
			.update(schema.alerts)
			.set({ resolved: true, resolvedTs: resolvedAt })
			.where(eq(schema.alerts.id, id))
			.returning();
		return row ? toAlert(row) : undefined;
	}

}
