import type { AlertThresholds } from "../config/settings";
import type { AlertStore } from "../db/stores";
import type { AlertEvent, Clock, Score, Severity } from "../types";
import { systemClock } from "../types";
import { logger } from "../utils/logger";
import { Metrics } from "../utils/metrics";

export interface AlertDecision {
	severity: Severity;
	message: string;
}

export interface DetectionCycleResult {
	alertsCreated: number;
	predictionsChecked: number;
	alerts: AlertEvent[];
}

function percent(value: number): string {
	return `${(value * 100).toFixed(1)}%`;
}

function failureMessage(severity: Severity, score: Score): string {
	return `${severity}: Machine ${score.machineId} has ${percent(score.failureProbability)} failure probability in next ${score.horizonHours}h`;
}

/**
 * Maps one score to at most one alert. Failure tiers are strict `>`
 * comparisons. A high anomaly score only takes over when no failure tier
 * fired or the selected tier is LOW; it never replaces MEDIUM or above.
 */
export function classifyScore(
	score: Score,
	thresholds: AlertThresholds,
): AlertDecision | null {
	const p = score.failureProbability;
	let decision: AlertDecision | null = null;

	if (p > thresholds.criticalThreshold) {
		decision = { severity: "CRITICAL", message: failureMessage("CRITICAL", score) };
	} else if (p > thresholds.highThreshold) {
		decision = { severity: "HIGH", message: failureMessage("HIGH", score) };
	} else if (p > thresholds.mediumThreshold) {
		decision = { severity: "MEDIUM", message: failureMessage("MEDIUM", score) };
	}

	const anomaly = score.anomalyScore;
	if (anomaly !== null && anomaly > thresholds.anomalyEscalationThreshold) {
		if (decision === null || decision.severity === "LOW") {
			decision = {
				severity: "HIGH",
				message: `HIGH: Machine ${score.machineId} showing anomalous behavior (anomaly score ${percent(anomaly)}) in next ${score.horizonHours}h`,
			};
		}
	}

	return decision;
}

export class AlertEngine {
	// Tail of the pending check-and-create chain per machine:severity.
	private readonly pairLocks = new Map<string, Promise<void>>();

	constructor(
		private readonly store: AlertStore,
		private readonly thresholds: AlertThresholds,
		private readonly clock: Clock = systemClock,
		private readonly metrics: Metrics = new Metrics(),
	) {}

	/**
	 * Runs `task` after every earlier task for the same key has settled, so a
	 * read-then-create on one pair never interleaves within this process.
	 */
	private async withPairLock<T>(key: string, task: () => Promise<T>): Promise<T> {
		const previous = this.pairLocks.get(key) ?? Promise.resolve();
		let release: () => void = () => {};
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		this.pairLocks.set(key, tail);

		await previous;
		try {
			return await task();
		} finally {
			release();
			if (this.pairLocks.get(key) === tail) {
				this.pairLocks.delete(key);
			}
		}
	}

	private async createUnlessRecent(
		score: Score,
		decision: AlertDecision,
	): Promise<AlertEvent | null> {
		return this.withPairLock(`${score.machineId}:${decision.severity}`, async () => {
			const now = this.clock();
			const existing = await this.store.mostRecentUnresolved(
				score.machineId,
				decision.severity,
			);
			if (existing && now - existing.createdAt < this.thresholds.dedupWindowSec) {
				logger.debug("Alert suppressed by recurrence window", {
					machine_id: score.machineId,
					severity: decision.severity,
					existing_alert_id: existing.id,
				});
				return null;
			}
			const alert = await this.store.createAlert(
				{
					machineId: score.machineId,
					severity: decision.severity,
					message: decision.message,
					failureProbability: score.failureProbability,
					anomalyScore: score.anomalyScore,
				},
				now,
			);
			this.metrics.alertsCreatedTotal.inc({
				severity: alert.severity,
				machine_id: alert.machineId,
			});
			return alert;
		});
	}

	/**
	 * One pass over a feed of scores, in feed order. Scores that map to no
	 * severity, or whose pair already has a fresh unresolved alert, are only
	 * counted as checked.
	 */
	async runDetectionCycle(scores: readonly Score[]): Promise<DetectionCycleResult> {
		const alerts: AlertEvent[] = [];

		for (const score of scores) {
			const decision = classifyScore(score, this.thresholds);
			if (!decision) continue;
			const alert = await this.createUnlessRecent(score, decision);
			if (alert) alerts.push(alert);
		}

		logger.info("Detection cycle finished", {
			alerts_created: alerts.length,
			predictions_checked: scores.length,
		});

		return {
			alertsCreated: alerts.length,
			predictionsChecked: scores.length,
			alerts,
		};
	}
}
