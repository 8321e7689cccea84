import type { AlertEvent, Score } from "../types";

export function scoreToWire(score: Score) {
	return {
		machine_id: score.machineId,
		timestamp: score.timestamp,
		horizon_hours: score.horizonHours,
		failure_probability: score.failureProbability,
		anomaly_score: score.anomalyScore,
		confidence: score.confidence,
		top_factors: score.topFactors,
	};
}

export function alertToWire(alert: AlertEvent) {
	return {
		id: alert.id,
		machine_id: alert.machineId,
		severity: alert.severity,
		message: alert.message,
		failure_probability: alert.failureProbability,
		anomaly_score: alert.anomalyScore,
		created_at: alert.createdAt,
		resolved: alert.resolved,
		resolved_at: alert.resolvedAt,
	};
}
