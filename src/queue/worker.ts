import type { Tunables } from "../config/settings";
import type { AlertEngine } from "../services/alert-engine";
import type { MachineEnqueuer } from "../services/ingestion-service";
import type { PredictionService } from "../services/prediction-service";
import type { Score } from "../types";
import { logger } from "../utils/logger";
import { Metrics } from "../utils/metrics";
import { DedupQueue } from "./queue";

export interface FlushResult {
	machinesScored: number;
	machinesFailed: number;
	alertsCreated: number;
}

export interface WorkerStats {
	queued: number;
	processed: number;
	failed: number;
	dropped: number;
	alertsCreated: number;
}

/**
 * Background scoring for freshly ingested machines. Each flush predicts every
 * queued machine at the default horizon set and runs one detection cycle over
 * the resulting scores.
 */
export class ScoringWorker implements MachineEnqueuer {
	private readonly queue: DedupQueue<string>;
	private flushTimer: NodeJS.Timeout | null = null;
	private inFlight: Promise<FlushResult> | null = null;
	private stats: WorkerStats = {
		queued: 0,
		processed: 0,
		failed: 0,
		dropped: 0,
		alertsCreated: 0,
	};

	constructor(
		private readonly predictions: PredictionService,
		private readonly engine: AlertEngine,
		private readonly options: Tunables<"queue"> & { horizonHours: number },
		private readonly metrics: Metrics = new Metrics(),
	) {
		this.queue = new DedupQueue(options.maxSize);
	}

	private reportQueueSize(): void {
		this.metrics.queueSize.set({ queue_name: "scoring" }, this.queue.size);
	}

	enqueue(machineIds: readonly string[]): { accepted: number; dropped: number } {
		let accepted = 0;
		let dropped = 0;
		for (const machineId of machineIds) {
			if (this.queue.put(machineId) === "full") {
				dropped += 1;
			} else {
				accepted += 1;
			}
		}
		this.stats.dropped += dropped;
		this.reportQueueSize();
		return { accepted, dropped };
	}

	start(): void {
		if (this.flushTimer) {
			return;
		}
		this.flushTimer = setInterval(() => {
			void this.flush();
		}, this.options.flushInterval);
	}

	stop(): void {
		if (this.flushTimer) {
			clearInterval(this.flushTimer);
			this.flushTimer = null;
		}
	}

	/** Drains the queue. Overlapping calls share the pass already running. */
	flush(): Promise<FlushResult> {
		if (!this.inFlight) {
			this.inFlight = this.drain().finally(() => {
				this.inFlight = null;
			});
		}
		return this.inFlight;
	}

	private async drain(): Promise<FlushResult> {
		const result: FlushResult = { machinesScored: 0, machinesFailed: 0, alertsCreated: 0 };

		while (!this.queue.isEmpty) {
			const batch = this.queue.take(this.options.batchSize);
			this.reportQueueSize();
			const scores: Score[] = [];

			for (const machineId of batch) {
				try {
					const prediction = await this.predictions.predictMachine({
						machineId,
						horizonHours: this.options.horizonHours,
						includeAnomaly: true,
						includeFactors: false,
					});
					scores.push(...prediction.scores);
					result.machinesScored += 1;
				} catch (error) {
					logger.error("Background scoring failed", error, { machine_id: machineId });
					result.machinesFailed += 1;
				}
			}

			if (scores.length === 0) continue;
			try {
				const cycle = await this.engine.runDetectionCycle(scores);
				result.alertsCreated += cycle.alertsCreated;
			} catch (error) {
				logger.error("Detection cycle failed", error, { scores: scores.length });
			}
		}

		this.stats.processed += result.machinesScored;
		this.stats.failed += result.machinesFailed;
		this.stats.alertsCreated += result.alertsCreated;
		if (result.machinesScored + result.machinesFailed > 0) {
			logger.info("Scoring worker flushed", {
				machines_scored: result.machinesScored,
				machines_failed: result.machinesFailed,
				alerts_created: result.alertsCreated,
			});
		}
		return result;
	}

	getStats(): WorkerStats {
		return { ...this.stats, queued: this.queue.size };
	}
}
