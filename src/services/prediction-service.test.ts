import { beforeEach, describe, expect, it } from "vitest";
import { settings } from "../config/settings";
import {
	BatchTooLargeError,
	EmptyInputError,
	InsufficientHistoryError,
	MachineNotFoundError,
	ScoringFailure,
} from "../core/errors";
import { MemoryRegistry } from "../db/memory-registry";
import { HOUR, ManualClock, hourlySeries, testArtifacts } from "../testing/fixtures";
import { PredictionService } from "./prediction-service";
import { ScoringService } from "./scoring-service";

const config = {
	features: { lags: [1], rollingWindows: [3] },
	prediction: settings.prediction,
	confidence: settings.confidence,
};

const sigmoid = (x: number) => 1 / (1 + Math.exp(-x));

describe("PredictionService", () => {
	let registry: MemoryRegistry;
	let time: ManualClock;
	let service: PredictionService;

	beforeEach(async () => {
		time = new ManualClock(5 * HOUR);
		registry = new MemoryRegistry(time.clock);
		service = new PredictionService(
			registry,
			new ScoringService(testArtifacts(), settings.scoring),
			config,
			time.clock,
		);
		await registry.ensureMachines(["M-001", "M-002", "M-003"]);
		await registry.insertReadings(hourlySeries("M-001", "temperature", [1, 2, 3, 4, 5]));
		await registry.insertReadings(hourlySeries("M-003", "temperature", [1, 2]));
	});

	it("expands only the default horizon", () => {
		expect(service.expandHorizons(24)).toEqual([24, 48, 72]);
		expect(service.expandHorizons(12)).toEqual([12]);
	});

	it("scores every expanded horizon from one feature frame", async () => {
		const result = await service.predictMachine({
			machineId: "M-001",
			horizonHours: 24,
			includeAnomaly: true,
			includeFactors: true,
		});

		expect(result.modelVersion).toBe("1.0.0");
		expect(result.failures).toEqual([]);
		expect(result.scores.map((s) => s.horizonHours)).toEqual([24, 48, 72]);

		const [day, twoDays, threeDays] = result.scores;
		expect(day.machineId).toBe("M-001");
		expect(day.timestamp).toBe(4 * HOUR);
		expect(day.failureProbability).toBeCloseTo(sigmoid(5), 12);
		expect(day.anomalyScore).toBeCloseTo(1, 6);
		expect(day.topFactors).toEqual([
			{ feature: "temperature_lag1", importance: 0.7 },
			{ feature: "temperature", importance: 0.3 },
		]);
		// One of four expected sensors present.
		expect(day.confidence).toBeCloseTo(0.2, 10);
		expect(twoDays.confidence).toBeCloseTo(0.19, 10);
		expect(threeDays.confidence).toBeCloseTo(0.18, 10);

		expect(await registry.getRecentPredictions(0)).toHaveLength(3);
	});

	it("omits optional outputs when not requested", async () => {
		const { scores } = await service.predictMachine({
			machineId: "M-001",
			horizonHours: 12,
			includeAnomaly: false,
			includeFactors: false,
		});
		expect(scores).toHaveLength(1);
		expect(scores[0].anomalyScore).toBeNull();
		expect(scores[0].topFactors).toEqual([]);
	});

	it("distinguishes unknown machines, missing data and short history", async () => {
		const request = { horizonHours: 12, includeAnomaly: false, includeFactors: false };
		await expect(
			service.predictMachine({ ...request, machineId: "M-404" }),
		).rejects.toBeInstanceOf(MachineNotFoundError);
		await expect(
			service.predictMachine({ ...request, machineId: "M-002" }),
		).rejects.toBeInstanceOf(EmptyInputError);
		await expect(
			service.predictMachine({ ...request, machineId: "M-003" }),
		).rejects.toBeInstanceOf(InsufficientHistoryError);
	});

	it("ignores readings older than the lookback", async () => {
		time.advance(60 * HOUR);
		await expect(
			service.predictMachine({
				machineId: "M-001",
				horizonHours: 12,
				includeAnomaly: false,
				includeFactors: false,
			}),
		).rejects.toBeInstanceOf(EmptyInputError);
	});

	it("raises a scoring failure when every horizon fails", async () => {
		const broken = new PredictionService(
			registry,
			new ScoringService(
				testArtifacts({
					feature_cols: ["temperature", "vibration"],
				}),
				settings.scoring,
			),
			config,
			time.clock,
		);

		await expect(
			broken.predictMachine({
				machineId: "M-001",
				horizonHours: 24,
				includeAnomaly: false,
				includeFactors: false,
			}),
		).rejects.toBeInstanceOf(ScoringFailure);
		expect(await registry.getRecentPredictions(0)).toEqual([]);
	});

	it("skips machines it cannot score in a batch", async () => {
		const result = await service.predictBatch(["M-001", "M-002", "M-003"], 24, false);

		expect(result.scores.map((s) => s.machineId)).toEqual(["M-001"]);
		expect(result.scores[0].horizonHours).toBe(24);
		expect(result.scores[0].anomalyScore).toBeNull();
		expect(result.scores[0].topFactors).toEqual([]);
		expect(result.skipped).toEqual(["M-002", "M-003"]);
	});

	it("rejects oversized batches", async () => {
		const ids = Array.from({ length: 51 }, (_, i) => `M-${i}`);
		await expect(service.predictBatch(ids, 24, true)).rejects.toBeInstanceOf(
			BatchTooLargeError,
		);
	});
});
