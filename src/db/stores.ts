import type {
	AlertEvent,
	Machine,
	NewAlert,
	Reading,
	Score,
	Severity,
	UnixSeconds,
} from "../types";

export interface AlertFilter {
	machineId?: string;
	severity?: Severity;
	resolved?: boolean;
	since?: UnixSeconds;
	limit?: number;
	offset?: number;
}

export interface MachineStore {
	/** Registers unknown machine ids; returns how many were new. */
	ensureMachines(machineIds: readonly string[]): Promise<number>;
	getMachine(machineId: string): Promise<Machine | undefined>;
	listMachines(): Promise<Machine[]>;
}

export interface ReadingStore {
	insertReadings(readings: readonly Reading[]): Promise<number>;
	/** Readings at or after `since`, oldest first. */
	getRecentReadings(machineId: string, since: UnixSeconds): Promise<Reading[]>;
}

export interface PredictionStore {
	savePredictions(scores: readonly Score[], modelVersion: string): Promise<void>;
	/** Predictions at or after `since`, newest first. */
	getRecentPredictions(since: UnixSeconds): Promise<Score[]>;
}

export interface AlertStore {
	createAlert(alert: NewAlert, createdAt: UnixSeconds): Promise<AlertEvent>;
	mostRecentUnresolved(
		machineId: string,
		severity: Severity,
	): Promise<AlertEvent | undefined>;
	/** Newest first. */
	listAlerts(filter: AlertFilter): Promise<AlertEvent[]>;
	getAlertById(id: number): Promise<AlertEvent | undefined>;
	resolveAlert(id: number, resolvedAt: UnixSeconds): Promise<AlertEvent | undefined>;
}

export interface Registry
	extends MachineStore,
		ReadingStore,
		PredictionStore,
		AlertStore {
	initialize(): Promise<void>;
	close(): Promise<void>;
}
