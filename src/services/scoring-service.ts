import { minMaxNormalize } from "../algorithms";
import type { Tunables } from "../config/settings";
import {
	type ErrorContext,
	FeatureMismatchError,
	InsufficientHistoryError,
} from "../core/errors";
import type { ModelArtifact, ModelArtifacts } from "../models";
import type { FactorImportance, FeatureRow } from "../types";

export interface ModelInfo {
	failure_model_version: string;
	anomaly_model_version: string;
	failure_feature_count: number;
	anomaly_feature_count: number;
	failure_trained_at: string | null;
	anomaly_trained_at: string | null;
	failure_metrics: Record<string, number>;
	anomaly_metrics: Record<string, number>;
}

function chronological(rows: readonly FeatureRow[]): FeatureRow[] {
	return [...rows].sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * Wraps the failure classifier and the outlier ensemble. Expects rows for a
 * single machine; every score describes the most recent row.
 */
export class ScoringService {
	constructor(
		private readonly artifacts: ModelArtifacts,
		private readonly config: Tunables<"scoring">,
	) {}

	private selectColumns(
		rows: readonly FeatureRow[],
		artifact: ModelArtifact<unknown>,
		context: ErrorContext,
	): number[][] {
		return rows.map((row) =>
			artifact.featureCols.map((column) => {
				const value = row.features[column];
				if (value === undefined) {
					throw new FeatureMismatchError(column, artifact.name, {
						...context,
						machineId: context.machineId ?? row.machineId,
					});
				}
				return value;
			}),
		);
	}

	private requireRows(
		rows: readonly FeatureRow[],
		context: ErrorContext,
	): FeatureRow[] {
		if (rows.length === 0) {
			throw new InsufficientHistoryError(context);
		}
		return chronological(rows);
	}

	predictFailureProbability(
		rows: readonly FeatureRow[],
		horizonHours: number,
	): number {
		const ordered = this.requireRows(rows, { horizonHours });
		const latest = ordered[ordered.length - 1];
		const context = { machineId: latest.machineId, horizonHours };
		const matrix = this.selectColumns([latest], this.artifacts.failure, context);
		const [probability] = this.artifacts.failure.model.predictProbability(matrix);
		return probability;
	}

	/**
	 * Batch-relative anomaly score of the most recent row in [0, 1]. Scores are
	 * comparable only within one call's batch.
	 */
	detectAnomaly(rows: readonly FeatureRow[]): number {
		const ordered = this.requireRows(rows, {});
		const latest = ordered[ordered.length - 1];
		const matrix = this.selectColumns(ordered, this.artifacts.anomaly, {
			machineId: latest.machineId,
		});
		const raw = this.artifacts.anomaly.model
			.scoreSamples(matrix)
			.map((score) => -score);
		const normalized = minMaxNormalize(raw, this.config.normalizationEpsilon);
		return normalized[normalized.length - 1];
	}

	/**
	 * Global classifier importances for the columns the rows supply, highest
	 * first. Not a per-row explanation.
	 */
	getFeatureImportance(rows: readonly FeatureRow[]): FactorImportance[] {
		const ordered = this.requireRows(rows, {});
		const latest = ordered[ordered.length - 1];
		this.selectColumns([latest], this.artifacts.failure, {
			machineId: latest.machineId,
		});

		const importances = this.artifacts.failure.model.featureImportances();
		return this.artifacts.failure.featureCols
			.map((feature, i) => ({ feature, importance: importances[i] ?? 0 }))
			.sort((a, b) => b.importance - a.importance)
			.slice(0, this.config.topFactors);
	}

	getModelInfo(): ModelInfo {
		const { failure, anomaly } = this.artifacts;
		return {
			failure_model_version: failure.version,
			anomaly_model_version: anomaly.version,
			failure_feature_count: failure.featureCols.length,
			anomaly_feature_count: anomaly.featureCols.length,
			failure_trained_at: failure.trainedAt,
			anomaly_trained_at: anomaly.trainedAt,
			failure_metrics: failure.metrics,
			anomaly_metrics: anomaly.metrics,
		};
	}
}
