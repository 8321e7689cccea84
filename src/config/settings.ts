import { fileURLToPath } from "node:url";
import { z } from "zod";

const EnvSchema = z.object({
	PORT: z.coerce.number().int().positive().optional(),
	HOST: z.string().min(1).optional(),
	STORAGE_DRIVER: z.enum(["postgres", "memory"]).optional(),
	PGHOST: z.string().min(1).optional(),
	PGPORT: z.coerce.number().int().positive().optional(),
	PGDATABASE: z.string().min(1).optional(),
	PGUSER: z.string().min(1).optional(),
	PGPASSWORD: z.string().optional(),
	ARTIFACTS_DIR: z.string().min(1).optional(),
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
});

const env = EnvSchema.parse(process.env);

export const settings = {
	features: {
		lags: [1, 2, 3, 6, 12],
		rollingWindows: [3, 6, 12],
	},
	prediction: {
		lookbackHours: 48,
		defaultHorizonHours: 24,
		// A request for the default horizon is answered for all of these.
		expandedHorizons: [24, 48, 72],
		maxBatchMachines: 50,
		modelVersion: "1.0.0",
	},
	scoring: {
		normalizationEpsilon: 1e-9,
		topFactors: 10,
	},
	confidence: {
		base: 0.8,
		fallback: 0.5,
		staleAfterHours: 24,
		stalePenalty: 0.2,
		agingAfterHours: 12,
		agingPenalty: 0.1,
		expectedSensors: ["vibration", "temperature", "pressure", "rpm"],
		longHorizonHours: 48,
		longHorizonFactor: 0.9,
		mediumHorizonHours: 24,
		mediumHorizonFactor: 0.95,
		min: 0.1,
		max: 1.0,
	},
	alerts: {
		criticalThreshold: 0.9,
		highThreshold: 0.75,
		mediumThreshold: 0.5,
		anomalyEscalationThreshold: 0.9,
		dedupWindowSec: 3600,
		feedLookbackHours: 24,
	},
	ingestion: {
		minValue: -1000,
		maxValue: 10000,
		maxBatchReadings: 1000,
		insertChunkSize: 1000,
	},
	queue: {
		maxSize: 10000,
		batchSize: 100,
		flushInterval: 5000,
	},
	server: {
		port: env.PORT ?? 3000,
		host: env.HOST ?? "0.0.0.0",
	},
	storage: {
		driver: env.STORAGE_DRIVER ?? "postgres",
	},
	postgres: {
		host: env.PGHOST ?? "localhost",
		port: env.PGPORT ?? 5432,
		database: env.PGDATABASE ?? "pdm",
		user: env.PGUSER ?? "pdm",
		password: env.PGPASSWORD ?? "pdm",
	},
	models: {
		artifactsDir:
			env.ARTIFACTS_DIR ??
			fileURLToPath(new URL("../../artifacts", import.meta.url)),
		failureArtifact: "failure_clf.json",
		anomalyArtifact: "anomaly_ensemble.json",
	},
	logging: {
		level: env.LOG_LEVEL ?? "info",
	},
} as const;

export type Settings = typeof settings;

type Widen<T> = T extends string
	? string
	: T extends number
		? number
		: T extends boolean
			? boolean
			: T extends readonly (infer U)[]
				? readonly Widen<U>[]
				: { readonly [K in keyof T]: Widen<T[K]> };

/** A settings section with its literal types widened, for injecting overrides. */
export type Tunables<K extends keyof Settings> = Widen<Settings[K]>;

export type AlertThresholds = Tunables<"alerts">;
export type ConfidenceSettings = Tunables<"confidence">;
