import type { AlertThresholds } from "../config/settings";
import {
	AlertAlreadyResolvedError,
	AlertNotFoundError,
	MachineNotFoundError,
} from "../core/errors";
import type { AlertFilter, AlertStore, MachineStore, PredictionStore } from "../db/stores";
import type { AlertEvent, Clock, NewAlert, Severity, UnixSeconds } from "../types";
import { systemClock } from "../types";
import { logger } from "../utils/logger";
import type { AlertEngine, DetectionCycleResult } from "./alert-engine";

const HOUR = 3600;
const DAY = 24 * HOUR;

export interface AlertPage {
	alerts: AlertEvent[];
	totalCount: number;
	unresolvedCount: number;
}

export interface ResolutionTime {
	averageHours: number;
	medianHours: number;
	maxHours: number;
}

export interface AlertStatistics {
	periodDays: number;
	totalAlerts: number;
	unresolvedAlerts: number;
	bySeverity: Record<Severity, number>;
	byMachine: Record<string, number>;
	resolutionTime: ResolutionTime | null;
	trends: {
		alertsToday: number;
		alertsYesterday: number;
		alertsThisWeek: number;
		alertsLastWeek: number;
	};
}

type AlertServiceStores = AlertStore & MachineStore & PredictionStore;

function median(sorted: readonly number[]): number {
	const mid = Math.floor(sorted.length / 2);
	if (sorted.length % 2 === 1) return sorted[mid];
	return (sorted[mid - 1] + sorted[mid]) / 2;
}

function resolutionTime(alerts: readonly AlertEvent[]): ResolutionTime | null {
	const hours = alerts
		.flatMap((a) => (a.resolvedAt === null ? [] : [(a.resolvedAt - a.createdAt) / HOUR]))
		.sort((a, b) => a - b);
	if (hours.length === 0) return null;
	return {
		averageHours: hours.reduce((sum, h) => sum + h, 0) / hours.length,
		medianHours: median(hours),
		maxHours: hours[hours.length - 1],
	};
}

function countBetween(
	alerts: readonly AlertEvent[],
	from: UnixSeconds,
	to: UnixSeconds,
): number {
	return alerts.filter((a) => a.createdAt >= from && a.createdAt < to).length;
}

export class AlertService {
	constructor(
		private readonly stores: AlertServiceStores,
		private readonly engine: AlertEngine,
		private readonly thresholds: AlertThresholds,
		private readonly clock: Clock = systemClock,
	) {}

	async listAlerts(filter: AlertFilter): Promise<AlertPage> {
		const alerts = await this.stores.listAlerts(filter);
		return {
			alerts,
			totalCount: alerts.length,
			unresolvedCount: alerts.filter((a) => !a.resolved).length,
		};
	}

	async getAlert(id: number): Promise<AlertEvent> {
		const alert = await this.stores.getAlertById(id);
		if (!alert) throw new AlertNotFoundError(id);
		return alert;
	}

	/** Manual alert; bypasses classification and the recurrence window. */
	async createAlert(alert: NewAlert): Promise<AlertEvent> {
		const machine = await this.stores.getMachine(alert.machineId);
		if (!machine) throw new MachineNotFoundError(alert.machineId);

		const created = await this.stores.createAlert(alert, this.clock());
		logger.info("Alert created", {
			alert_id: created.id,
			machine_id: created.machineId,
			severity: created.severity,
		});
		return created;
	}

	async resolveAlert(id: number): Promise<AlertEvent> {
		const alert = await this.getAlert(id);
		if (alert.resolved) throw new AlertAlreadyResolvedError(id);

		const resolved = await this.stores.resolveAlert(id, this.clock());
		if (!resolved) throw new AlertNotFoundError(id);
		logger.info("Alert resolved", { alert_id: id, machine_id: resolved.machineId });
		return resolved;
	}

	async getStatistics(days: number): Promise<AlertStatistics> {
		const now = this.clock();
		const trendWindow = await this.stores.listAlerts({ since: now - 14 * DAY });
		const period =
			days >= 14
				? await this.stores.listAlerts({ since: now - days * DAY })
				: trendWindow.filter((a) => a.createdAt >= now - days * DAY);

		const bySeverity: Record<Severity, number> = {
			LOW: 0,
			MEDIUM: 0,
			HIGH: 0,
			CRITICAL: 0,
		};
		const byMachine: Record<string, number> = {};
		for (const alert of period) {
			bySeverity[alert.severity] += 1;
			byMachine[alert.machineId] = (byMachine[alert.machineId] ?? 0) + 1;
		}

		return {
			periodDays: days,
			totalAlerts: period.length,
			unresolvedAlerts: period.filter((a) => !a.resolved).length,
			bySeverity,
			byMachine,
			resolutionTime: resolutionTime(period),
			trends: {
				alertsToday: countBetween(trendWindow, now - DAY, now + 1),
				alertsYesterday: countBetween(trendWindow, now - 2 * DAY, now - DAY),
				alertsThisWeek: countBetween(trendWindow, now - 7 * DAY, now + 1),
				alertsLastWeek: countBetween(trendWindow, now - 14 * DAY, now - 7 * DAY),
			},
		};
	}

	/** Feeds the recent predictions into one detection cycle. */
	async autoGenerate(): Promise<DetectionCycleResult> {
		const since = this.clock() - this.thresholds.feedLookbackHours * HOUR;
		const scores = await this.stores.getRecentPredictions(since);
		return this.engine.runDetectionCycle(scores);
	}
}
