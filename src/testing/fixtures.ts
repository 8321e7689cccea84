import {
	type ModelArtifacts,
	parseAnomalyArtifact,
	parseFailureArtifact,
} from "../models";
import type { AnomalyArtifactJson, FailureArtifactJson } from "../models/artifact";
import type { Clock, Reading, SensorType, UnixSeconds } from "../types";

export const HOUR = 3600;

/** Mutable clock for tests that step through time. */
export class ManualClock {
	constructor(public now: UnixSeconds) {}

	advance(seconds: number): void {
		this.now += seconds;
	}

	readonly clock: Clock = () => this.now;
}

/** One reading per hour, the first at `start`. */
export function hourlySeries(
	machineId: string,
	sensor: SensorType,
	values: readonly number[],
	start: UnixSeconds = 0,
): Reading[] {
	return values.map((value, i) => ({
		timestamp: start + i * HOUR,
		machineId,
		sensor,
		value,
	}));
}

/**
 * Small artifacts over the `temperature` and `temperature_lag1` columns. Any
 * configuration with lag 1 on a temperature channel supplies both.
 */
export function testArtifacts(
	failure: Partial<FailureArtifactJson> = {},
	anomaly: Partial<AnomalyArtifactJson> = {},
): ModelArtifacts {
	return {
		failure: parseFailureArtifact("test_failure.json", {
			kind: "logistic",
			version: "test-1",
			feature_cols: ["temperature", "temperature_lag1"],
			mean: [0, 0],
			scale: [1, 1],
			coefficients: [1, 0],
			intercept: 0,
			feature_importances: [0.3, 0.7],
			...failure,
		}),
		anomaly: parseAnomalyArtifact("test_anomaly.json", {
			kind: "gaussian_ensemble",
			version: "test-2",
			feature_cols: ["temperature"],
			members: [{ feature_indices: [0], mean: [0], scale: [1] }],
			...anomaly,
		}),
	};
}
