import {
	boolean,
	doublePrecision,
	index,
	integer,
	jsonb,
	pgTable,
	serial,
	text,
	timestamp,
} from "drizzle-orm/pg-core";
import type { FactorImportance } from "../types";

export const machines = pgTable("machines", {
	id: serial("id").primaryKey(),
	machineId: text("machine_id").notNull().unique(),
	name: text("name"),
	line: text("line"),
	criticality: integer("criticality").notNull().default(3),
	createdTs: integer("created_ts").notNull(),
});

export const sensorReadings = pgTable(
	"sensor_readings",
	{
		id: serial("id").primaryKey(),
		machineId: text("machine_id").notNull(),
		ts: integer("ts").notNull(),
		sensor: text("sensor").notNull(),
		value: doublePrecision("value").notNull(),
		createdAt: timestamp("created_at").defaultNow(),
	},
	(table) => ({
		machineTsIdx: index("ix_sensor_readings_machine_ts").on(
			table.machineId,
			table.ts,
		),
	}),
);

export const predictions = pgTable(
	"predictions",
	{
		id: serial("id").primaryKey(),
		machineId: text("machine_id").notNull(),
		ts: integer("ts").notNull(),
		horizonHours: integer("horizon_hours").notNull(),
		failureProb: doublePrecision("failure_prob").notNull(),
		anomalyScore: doublePrecision("anomaly_score"),
		confidence: doublePrecision("confidence").notNull(),
		topFactors: jsonb("top_factors").$type<FactorImportance[]>().notNull(),
		modelVersion: text("model_version").notNull(),
		createdAt: timestamp("created_at").defaultNow(),
	},
	(table) => ({
		machineTsIdx: index("ix_predictions_machine_ts").on(
			table.machineId,
			table.ts,
		),
	}),
);

// Severity is one of LOW | MEDIUM | HIGH | CRITICAL.
export const alerts = pgTable("alerts", {
	id: serial("id").primaryKey(),
	machineId: text("machine_id").notNull(),
	severity: text("severity").notNull(),
	message: text("message").notNull(),
	failureProbability: doublePrecision("failure_probability"),
	anomalyScore: doublePrecision("anomaly_score"),
	createdTs: integer("created_ts").notNull(),
	resolved: boolean("resolved").notNull().default(false),
	resolvedTs: integer("resolved_ts"),
});

export type MachineRow = typeof machines.$inferSelect;
export type SensorReadingRow = typeof sensorReadings.$inferSelect;
export type PredictionRow = typeof predictions.$inferSelect;
export type AlertRow = typeof alerts.$inferSelect;
