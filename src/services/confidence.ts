import type { ConfidenceSettings } from "../config/settings";
import { ConfidenceComputationFailure } from "../core/errors";
import type { Reading, UnixSeconds } from "../types";
import { logger } from "../utils/logger";

function latestTimestamp(readings: readonly Reading[]): UnixSeconds {
	if (readings.length === 0) {
		throw new ConfidenceComputationFailure("no readings to assess");
	}
	let latest = Number.NEGATIVE_INFINITY;
	for (const reading of readings) {
		if (!Number.isFinite(reading.timestamp)) {
			throw new ConfidenceComputationFailure(
				`non-finite reading timestamp ${reading.timestamp}`,
				{ machineId: reading.machineId },
			);
		}
		latest = Math.max(latest, reading.timestamp);
	}
	return latest;
}

function heuristicConfidence(
	readings: readonly Reading[],
	horizonHours: number,
	now: UnixSeconds,
	config: ConfidenceSettings,
): number {
	let confidence = config.base;

	const ageHours = (now - latestTimestamp(readings)) / 3600;
	if (ageHours > config.staleAfterHours) {
		confidence -= config.stalePenalty;
	} else if (ageHours > config.agingAfterHours) {
		confidence -= config.agingPenalty;
	}

	const expected = new Set<string>(config.expectedSensors);
	if (expected.size === 0) {
		throw new ConfidenceComputationFailure("no expected sensors configured");
	}
	const present = new Set<string>();
	for (const reading of readings) {
		if (expected.has(reading.sensor)) present.add(reading.sensor);
	}
	confidence *= present.size / expected.size;

	if (horizonHours > config.longHorizonHours) {
		confidence *= config.longHorizonFactor;
	} else if (horizonHours > config.mediumHorizonHours) {
		confidence *= config.mediumHorizonFactor;
	}

	if (!Number.isFinite(confidence)) {
		throw new ConfidenceComputationFailure(`non-finite confidence ${confidence}`);
	}
	return Math.max(config.min, Math.min(config.max, confidence));
}

/**
 * Data-quality confidence for a prediction: freshness of the latest reading,
 * coverage of the expected sensor set and horizon length. Never throws; any
 * failure yields the configured fallback.
 */
export function calculateConfidence(
	readings: readonly Reading[],
	horizonHours: number,
	now: UnixSeconds,
	config: ConfidenceSettings,
): number {
	try {
		return heuristicConfidence(readings, horizonHours, now, config);
	} catch (error) {
		logger.warn("Confidence computation failed, using fallback", {
			horizon_hours: horizonHours,
			fallback: config.fallback,
			reason: error instanceof Error ? error.message : String(error),
		});
		return config.fallback;
	}
}
