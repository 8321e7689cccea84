import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { settings } from "../config/settings";
import { MemoryRegistry } from "../db/memory-registry";
import { AlertEngine } from "../services/alert-engine";
import { PredictionService } from "../services/prediction-service";
import { ScoringService } from "../services/scoring-service";
import { HOUR, ManualClock, hourlySeries, testArtifacts } from "../testing/fixtures";
import { Metrics } from "../utils/metrics";
import { ScoringWorker } from "./worker";

describe("ScoringWorker", () => {
	let registry: MemoryRegistry;
	let worker: ScoringWorker;

	function createWorker(overrides: Partial<{ maxSize: number; batchSize: number }> = {}) {
		const time = new ManualClock(5 * HOUR);
		const predictions = new PredictionService(
			registry,
			new ScoringService(testArtifacts(), settings.scoring),
			{
				features: { lags: [1], rollingWindows: [3] },
				prediction: settings.prediction,
				confidence: settings.confidence,
			},
			time.clock,
		);
		const engine = new AlertEngine(registry, settings.alerts, time.clock);
		return new ScoringWorker(predictions, engine, {
			...settings.queue,
			...overrides,
			horizonHours: 24,
		});
	}

	beforeEach(async () => {
		registry = new MemoryRegistry(() => 0);
		await registry.ensureMachines(["M-001", "M-002"]);
		await registry.insertReadings(hourlySeries("M-001", "temperature", [1, 2, 3, 4, 5]));
		worker = createWorker();
	});

	afterEach(() => {
		worker.stop();
		vi.useRealTimers();
	});

	it("scores queued machines and raises alerts", async () => {
		worker.enqueue(["M-001", "M-002", "M-001"]);
		expect(worker.getStats().queued).toBe(2);

		const result = await worker.flush();

		// Three horizons at the same severity collapse into one alert.
		expect(result).toEqual({ machinesScored: 1, machinesFailed: 1, alertsCreated: 1 });
		expect(await registry.getRecentPredictions(0)).toHaveLength(3);
		const [alert] = await registry.listAlerts({});
		expect(alert.severity).toBe("CRITICAL");
		expect(worker.getStats()).toEqual({
			queued: 0,
			processed: 1,
			failed: 1,
			dropped: 0,
			alertsCreated: 1,
		});
	});

	it("reports the scoring queue size", async () => {
		const metrics = new Metrics();
		const time = new ManualClock(5 * HOUR);
		const predictions = new PredictionService(
			registry,
			new ScoringService(testArtifacts(), settings.scoring),
			{
				features: { lags: [1], rollingWindows: [3] },
				prediction: settings.prediction,
				confidence: settings.confidence,
			},
			time.clock,
		);
		const engine = new AlertEngine(registry, settings.alerts, time.clock);
		worker = new ScoringWorker(
			predictions,
			engine,
			{ ...settings.queue, horizonHours: 24 },
			metrics,
		);
		const queued = async () => {
			const { values } = await metrics.queueSize.get();
			return values.find((v) => v.labels.queue_name === "scoring")?.value;
		};

		worker.enqueue(["M-001", "M-002"]);
		expect(await queued()).toBe(2);

		await worker.flush();
		expect(await queued()).toBe(0);
	});

	it("shares a flush that is already running", async () => {
		worker.enqueue(["M-001"]);
		const first = worker.flush();
		const second = worker.flush();
		expect(second).toBe(first);
		await first;
		expect(worker.getStats().processed).toBe(1);
	});

	it("counts machines dropped by a full queue", () => {
		worker = createWorker({ maxSize: 1 });
		expect(worker.enqueue(["M-001", "M-002"])).toEqual({ accepted: 1, dropped: 1 });
		expect(worker.getStats().dropped).toBe(1);
	});

	it("drains in batches", async () => {
		worker = createWorker({ batchSize: 1 });
		worker.enqueue(["M-002", "M-001"]);
		const result = await worker.flush();
		expect(result.machinesScored + result.machinesFailed).toBe(2);
		expect(worker.getStats().queued).toBe(0);
	});

	it("flushes on its interval once started", async () => {
		vi.useFakeTimers();
		worker.enqueue(["M-001"]);
		worker.start();

		await vi.advanceTimersByTimeAsync(settings.queue.flushInterval);
		// Joins the timer's pass if it is still running.
		await worker.flush();

		expect(worker.getStats().processed).toBe(1);
	});
});
