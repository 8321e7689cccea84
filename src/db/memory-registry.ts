import type {
	AlertEvent,
	Clock,
	Machine,
	NewAlert,
	Reading,
	Score,
	Severity,
} from "../types";
import { systemClock } from "../types";
import type { AlertFilter, Registry } from "./stores";

interface StoredReading extends Reading {
	id: number;
}

interface StoredPrediction {
	id: number;
	score: Score;
	modelVersion: string;
}

function newestAlertFirst(a: AlertEvent, b: AlertEvent): number {
	return b.createdAt - a.createdAt || b.id - a.id;
}

/**
 * Process-local registry with the same ordering contract as the Postgres one.
 * Used for local runs without a database and by the tests.
 */
export class MemoryRegistry implements Registry {
	private readonly machines = new Map<string, Machine>();
	private readonly readings: StoredReading[] = [];
	private readonly predictions: StoredPrediction[] = [];
	private readonly alerts: AlertEvent[] = [];
	private nextReadingId = 1;
	private nextPredictionId = 1;
	private nextAlertId = 1;

	constructor(private readonly clock: Clock = systemClock) {}

	async initialize(): Promise<void> {}

	async close(): Promise<void> {}

	async ensureMachines(machineIds: readonly string[]): Promise<number> {
		let created = 0;
		for (const machineId of new Set(machineIds)) {
			if (this.machines.has(machineId)) continue;
			this.machines.set(machineId, {
				machineId,
				name: null,
				line: "unknown",
				criticality: 3,
				createdAt: this.clock(),
			});
			created++;
		}
		return created;
	}

	async getMachine(machineId: string): Promise<Machine | undefined> {
		const machine = this.machines.get(machineId);
		return machine ? { ...machine } : undefined;
	}

	async listMachines(): Promise<Machine[]> {
		return [...this.machines.values()]
			.sort((a, b) => (a.machineId < b.machineId ? -1 : a.machineId > b.machineId ? 1 : 0))
			.map((machine) => ({ ...machine }));
	}

	async insertReadings(readings: readonly Reading[]): Promise<number> {
		for (const reading of readings) {
			this.readings.push({ ...reading, id: this.nextReadingId++ });
		}
		return readings.length;
	}

	async getRecentReadings(machineId: string, since: number): Promise<Reading[]> {
		return this.readings
			.filter((r) => r.machineId === machineId && r.timestamp >= since)
			.sort((a, b) => a.timestamp - b.timestamp || a.id - b.id)
			.map(({ timestamp, machineId: id, sensor, value }) => ({
				timestamp,
				machineId: id,
				sensor,
				value,
			}));
	}

	async savePredictions(
		scores: readonly Score[],
		modelVersion: string,
	): Promise<void> {
		for (const score of scores) {
			this.predictions.push({
				id: this.nextPredictionId++,
				score: { ...score, topFactors: [...score.topFactors] },
				modelVersion,
			});
		}
	}

	async getRecentPredictions(since: number): Promise<Score[]> {
		return this.predictions
			.filter((p) => p.score.timestamp >= since)
			.sort((a, b) => b.score.timestamp - a.score.timestamp || b.id - a.id)
			.map((p) => ({ ...p.score }));
	}

	async createAlert(alert: NewAlert, createdAt: number): Promise<AlertEvent> {
		const stored: AlertEvent = {
			id: this.nextAlertId++,
			machineId: alert.machineId,
			severity: alert.severity,
			message: alert.message,
			failureProbability: alert.failureProbability ?? null,
			anomalyScore: alert.anomalyScore ?? null,
			createdAt,
			resolved: false,
			resolvedAt: null,
		};
		this.alerts.push(stored);
		return { ...stored };
	}

	async mostRecentUnresolved(
		machineId: string,
		severity: Severity,
	): Promise<AlertEvent | undefined> {
		const [latest] = this.alerts
			.filter(
				(a) => a.machineId === machineId && a.severity === severity && !a.resolved,
			)
			.sort(newestAlertFirst);
		return latest ? { ...latest } : undefined;
	}

	async listAlerts(filter: AlertFilter): Promise<AlertEvent[]> {
		const matching = this.alerts
			.filter(
				(a) =>
					(filter.machineId === undefined || a.machineId === filter.machineId) &&
					(filter.severity === undefined || a.severity === filter.severity) &&
					(filter.resolved === undefined || a.resolved === filter.resolved) &&
					(filter.since === undefined || a.createdAt >= filter.since),
			)
			.sort(newestAlertFirst);
		const offset = filter.offset ?? 0;
		const end = filter.limit === undefined ? undefined : offset + filter.limit;
		return matching.slice(offset, end).map((a) => ({ ...a }));
	}

	async getAlertById(id: number): Promise<AlertEvent | undefined> {
		const alert = this.alerts.find((a) => a.id === id);
		return alert ? { ...alert } : undefined;
	}

	async resolveAlert(
		id: number,
		resolvedAt: number,
	): Promise<AlertEvent | undefined> {
		const alert = this.alerts.find((a) => a.id === id);
		if (!alert) return undefined;
		alert.resolved = true;
		alert.resolvedAt = resolvedAt;
		return { ...alert };
	}
}
