export const SENSOR_TYPES = [
	"vibration",
	"temperature",
	"pressure",
	"rpm",
	"current",
	"voltage",
	"speed",
] as const;

export type SensorType = (typeof SENSOR_TYPES)[number];

export const SEVERITY_LEVELS = ["LOW", "MEDIUM", "HIGH", "CRITICAL"] as const;

export type Severity = (typeof SEVERITY_LEVELS)[number];

/** Unix seconds. */
export type UnixSeconds = number;

export type Clock = () => UnixSeconds;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface Reading {
	timestamp: UnixSeconds;
	machineId: string;
	sensor: SensorType;
	value: number;
}

/**
 * One wide row per (timestamp, machineId). `features` holds the current value
 * of every sensor channel plus its `{sensor}_lag{L}`, `{sensor}_roll{R}_mean`
 * and `{sensor}_roll{R}_std` columns.
 */
export interface FeatureRow {
	timestamp: UnixSeconds;
	machineId: string;
	features: Record<string, number>;
}

export interface FeatureFrame {
	columns: string[];
	rows: FeatureRow[];
}

export interface FactorImportance {
	feature: string;
	importance: number;
}

export interface Score {
	machineId: string;
	timestamp: UnixSeconds;
	horizonHours: number;
	failureProbability: number;
	anomalyScore: number | null;
	confidence: number;
	topFactors: FactorImportance[];
}

export interface Machine {
	machineId: string;
	name: string | null;
	line: string | null;
	criticality: number;
	createdAt: UnixSeconds;
}

export interface AlertEvent {
	id: number;
	machineId: string;
	severity: Severity;
	message: string;
	failureProbability: number | null;
	anomalyScore: number | null;
	createdAt: UnixSeconds;
	resolved: boolean;
	resolvedAt: UnixSeconds | null;
}

export interface NewAlert {
	machineId: string;
	severity: Severity;
	message: string;
	failureProbability?: number | null;
	anomalyScore?: number | null;
}

const sensorTypes: ReadonlySet<string> = new Set(SENSOR_TYPES);
const severityLevels: ReadonlySet<string> = new Set(SEVERITY_LEVELS);

export function isSensorType(value: string): value is SensorType {
	return sensorTypes.has(value);
}

export function isSeverity(value: string): value is Severity {
	return severityLevels.has(value);
}
