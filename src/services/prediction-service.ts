import type { ConfidenceSettings, Tunables } from "../config/settings";
import {
	BatchTooLargeError,
	EmptyInputError,
	InsufficientHistoryError,
	MachineNotFoundError,
	ScoringFailure,
} from "../core/errors";
import { buildFeatures } from "../core/feature-builder";
import type { MachineStore, PredictionStore, ReadingStore } from "../db/stores";
import type { Clock, FeatureRow, Reading, Score, UnixSeconds } from "../types";
import { systemClock } from "../types";
import { logger } from "../utils/logger";
import { Metrics } from "../utils/metrics";
import { calculateConfidence } from "./confidence";
import type { ScoringService } from "./scoring-service";

export interface PredictRequest {
	machineId: string;
	horizonHours: number;
	includeAnomaly: boolean;
	includeFactors: boolean;
}

export interface PredictionResult {
	scores: Score[];
	modelVersion: string;
	failures: ScoringFailure[];
}

export interface BatchPredictionResult {
	scores: Score[];
	modelVersion: string;
	skipped: string[];
}

type PredictionStores = MachineStore & ReadingStore & PredictionStore;

export interface PredictionSettings {
	features: Tunables<"features">;
	prediction: Tunables<"prediction">;
	confidence: ConfidenceSettings;
}

function latestReadingTime(readings: readonly Reading[]): UnixSeconds {
	return readings.reduce(
		(latest, r) => Math.max(latest, r.timestamp),
		Number.NEGATIVE_INFINITY,
	);
}

/**
 * Glue between storage and the scoring core: loads a machine's recent
 * readings, builds features once and scores every requested horizon.
 */
export class PredictionService {
	constructor(
		private readonly stores: PredictionStores,
		private readonly scoring: ScoringService,
		private readonly config: PredictionSettings,
		private readonly clock: Clock = systemClock,
		private readonly metrics: Metrics = new Metrics(),
	) {}

	private async persist(scores: readonly Score[]): Promise<void> {
		await this.stores.savePredictions(scores, this.modelVersion);
		for (const score of scores) {
			this.metrics.predictionsTotal.inc({
				model_type: "failure_prediction",
				machine_id: score.machineId,
			});
			if (score.anomalyScore !== null) {
				this.metrics.predictionsTotal.inc({
					model_type: "anomaly_detection",
					machine_id: score.machineId,
				});
			}
		}
	}

	get modelVersion(): string {
		return this.config.prediction.modelVersion;
	}

	/** The default horizon fans out to the configured horizon set. */
	expandHorizons(horizonHours: number): number[] {
		return horizonHours === this.config.prediction.defaultHorizonHours
			? [...this.config.prediction.expandedHorizons]
			: [horizonHours];
	}

	private async loadFeatures(
		machineId: string,
		now: UnixSeconds,
	): Promise<{ readings: Reading[]; rows: FeatureRow[] }> {
		const since = now - this.config.prediction.lookbackHours * 3600;
		const readings = await this.stores.getRecentReadings(machineId, since);
		if (readings.length === 0) {
			throw new EmptyInputError({ machineId });
		}
		const { rows } = buildFeatures(readings, this.config.features);
		if (rows.length === 0) {
			throw new InsufficientHistoryError({ machineId });
		}
		return { readings, rows };
	}

	private scoreHorizon(
		readings: readonly Reading[],
		rows: readonly FeatureRow[],
		request: PredictRequest,
		horizonHours: number,
		now: UnixSeconds,
	): Score {
		return {
			machineId: request.machineId,
			timestamp: latestReadingTime(readings),
			horizonHours,
			failureProbability: this.scoring.predictFailureProbability(rows, horizonHours),
			anomalyScore: request.includeAnomaly ? this.scoring.detectAnomaly(rows) : null,
			confidence: calculateConfidence(readings, horizonHours, now, this.config.confidence),
			topFactors: request.includeFactors ? this.scoring.getFeatureImportance(rows) : [],
		};
	}

	async predictMachine(request: PredictRequest): Promise<PredictionResult> {
		const machine = await this.stores.getMachine(request.machineId);
		if (!machine) {
			throw new MachineNotFoundError(request.machineId);
		}

		const now = this.clock();
		const { readings, rows } = await this.loadFeatures(request.machineId, now);

		const scores: Score[] = [];
		const failures: ScoringFailure[] = [];
		for (const horizonHours of this.expandHorizons(request.horizonHours)) {
			try {
				scores.push(this.scoreHorizon(readings, rows, request, horizonHours, now));
			} catch (error) {
				const failure = new ScoringFailure(
					{ machineId: request.machineId, horizonHours },
					error,
				);
				logger.error("Prediction failed for horizon", failure);
				failures.push(failure);
			}
		}

		const [firstFailure] = failures;
		if (scores.length === 0 && firstFailure) {
			throw firstFailure;
		}

		await this.persist(scores);

		logger.info("Failure prediction completed", {
			machine_id: request.machineId,
			horizon_hours: request.horizonHours,
			predictions_count: scores.length,
			failed_horizons: failures.length,
			max_failure_prob: Math.max(...scores.map((s) => s.failureProbability)),
		});

		return { scores, modelVersion: this.modelVersion, failures };
	}

	/**
	 * Scores each machine at a single horizon without factors. Machines with no
	 * data, too little history or a failing model call are skipped.
	 */
	async predictBatch(
		machineIds: readonly string[],
		horizonHours: number,
		includeAnomaly: boolean,
	): Promise<BatchPredictionResult> {
		const limit = this.config.prediction.maxBatchMachines;
		if (machineIds.length > limit) {
			throw new BatchTooLargeError(limit);
		}

		const now = this.clock();
		const scores: Score[] = [];
		const skipped: string[] = [];

		for (const machineId of machineIds) {
			try {
				const { readings, rows } = await this.loadFeatures(machineId, now);
				scores.push(
					this.scoreHorizon(
						readings,
						rows,
						{ machineId, horizonHours, includeAnomaly, includeFactors: false },
						horizonHours,
						now,
					),
				);
			} catch (error) {
				if (error instanceof EmptyInputError) {
					logger.warn("No data for machine", { machine_id: machineId });
				} else {
					logger.error("Batch prediction failed for machine", error, {
						machine_id: machineId,
					});
				}
				skipped.push(machineId);
			}
		}

		await this.persist(scores);

		logger.info("Batch prediction completed", {
			machine_count: machineIds.length,
			successful_predictions: scores.length,
			horizon_hours: horizonHours,
		});

		return { scores, modelVersion: this.modelVersion, skipped };
	}
}
