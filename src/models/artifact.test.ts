import { describe, expect, it } from "vitest";
import { settings } from "../config/settings";
import { ModelArtifactError } from "../core/errors";
import {
	GaussianOutlierEnsemble,
	LogisticClassifier,
	loadModelArtifacts,
	parseAnomalyArtifact,
	parseFailureArtifact,
} from "./index";

describe("LogisticClassifier", () => {
	const classifier = new LogisticClassifier({
		mean: [10],
		scale: [2],
		coefficients: [1],
		intercept: 0,
		importances: [1],
	});

	it("returns one half at the training mean", () => {
		expect(classifier.predictProbability([[10]])).toEqual([0.5]);
	});

	it("stays finite and inside [0, 1] for extreme inputs", () => {
		const [low, high] = classifier.predictProbability([[-1e6], [1e6]]);
		expect(low).toBeGreaterThanOrEqual(0);
		expect(low).toBeCloseTo(0, 10);
		expect(high).toBeCloseTo(1, 10);
	});
});

describe("GaussianOutlierEnsemble", () => {
	it("scores the negated mean squared z-score", () => {
		const ensemble = new GaussianOutlierEnsemble([
			{ featureIndices: [0, 1], mean: [0, 0], scale: [1, 2] },
		]);
		const [atMean, away] = ensemble.scoreSamples([
			[0, 0],
			[1, 2],
		]);
		expect(atMean).toBeCloseTo(0, 12);
		expect(away).toBe(-1);
	});
});

describe("artifact parsing", () => {
	it("rejects arrays that disagree with feature_cols", () => {
		expect(() =>
			parseFailureArtifact("broken.json", {
				kind: "logistic",
				version: "1",
				feature_cols: ["a", "b"],
				mean: [0],
				scale: [1, 1],
				coefficients: [1, 1],
				intercept: 0,
				feature_importances: [0.5, 0.5],
			}),
		).toThrow(ModelArtifactError);
	});

	it("rejects ensemble members pointing outside feature_cols", () => {
		expect(() =>
			parseAnomalyArtifact("broken.json", {
				kind: "gaussian_ensemble",
				version: "1",
				feature_cols: ["a"],
				members: [{ feature_indices: [1], mean: [0], scale: [1] }],
			}),
		).toThrow(/index 1 is outside feature_cols/);
	});

	it("loads the bundled artifacts", async () => {
		const artifacts = await loadModelArtifacts(settings.models);

		expect(artifacts.failure.version).toBe("1.0.0");
		expect(artifacts.failure.featureCols).toHaveLength(8);
		expect(artifacts.failure.metrics.accuracy).toBe(0.85);
		expect(artifacts.anomaly.featureCols[0]).toBe("temperature");
		expect(artifacts.anomaly.trainedAt).toBe("2026-09-28T03:00:00Z");
	});

	it("fails with a model artifact error for a missing directory", async () => {
		await expect(
			loadModelArtifacts({ ...settings.models, artifactsDir: "/nonexistent/artifacts" }),
		).rejects.toBeInstanceOf(ModelArtifactError);
	});
});
