import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ModelArtifactError } from "../core/errors";
import { logger } from "../utils/logger";
import { LogisticClassifier } from "./logistic-classifier";
import { GaussianOutlierEnsemble } from "./outlier-ensemble";

export interface FailureClassifier {
	/** Probability of the positive (failure) class for each row. */
	predictProbability(features: readonly (readonly number[])[]): number[];
	/** One weight per trained feature column, in `featureCols` order. */
	featureImportances(): number[];
}

export interface OutlierScorer {
	/** Raw per-row score; lower is more atypical. */
	scoreSamples(features: readonly (readonly number[])[]): number[];
}

/**
 * A trained model with the exact, ordered feature columns it was fitted on.
 */
export interface ModelArtifact<M> {
	name: string;
	version: string;
	featureCols: string[];
	trainedAt: string | null;
	metrics: Record<string, number>;
	model: M;
}

export interface ModelArtifacts {
	failure: ModelArtifact<FailureClassifier>;
	anomaly: ModelArtifact<OutlierScorer>;
}

const positive = z.number().positive();

export const FailureArtifactSchema = z
	.object({
		kind: z.literal("logistic"),
		version: z.string().min(1),
		trained_at: z.string().optional(),
		feature_cols: z.array(z.string().min(1)).min(1),
		mean: z.array(z.number()),
		scale: z.array(positive),
		coefficients: z.array(z.number()),
		intercept: z.number(),
		feature_importances: z.array(z.number().nonnegative()),
		metrics: z.record(z.string(), z.number()).optional(),
	})
	.superRefine((artifact, ctx) => {
		const n = artifact.feature_cols.length;
		for (const key of [
			"mean",
			"scale",
			"coefficients",
			"feature_importances",
		] as const) {
			if (artifact[key].length !== n) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: [key],
					message: `expected ${n} entries to match feature_cols, got ${artifact[key].length}`,
				});
			}
		}
	});

const EnsembleMemberSchema = z.object({
	feature_indices: z.array(z.number().int().nonnegative()).min(1),
	mean: z.array(z.number()),
	scale: z.array(positive),
});

export const AnomalyArtifactSchema = z
	.object({
		kind: z.literal("gaussian_ensemble"),
		version: z.string().min(1),
		trained_at: z.string().optional(),
		feature_cols: z.array(z.string().min(1)).min(1),
		members: z.array(EnsembleMemberSchema).min(1),
		metrics: z.record(z.string(), z.number()).optional(),
	})
	.superRefine((artifact, ctx) => {
		artifact.members.forEach((member, i) => {
			const n = member.feature_indices.length;
			if (member.mean.length !== n || member.scale.length !== n) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["members", i],
					message: "mean and scale must match feature_indices",
				});
			}
			for (const index of member.feature_indices) {
				if (index >= artifact.feature_cols.length) {
					ctx.addIssue({
						code: z.ZodIssueCode.custom,
						path: ["members", i, "feature_indices"],
						message: `index ${index} is outside feature_cols`,
					});
				}
			}
		});
	});

export type FailureArtifactJson = z.input<typeof FailureArtifactSchema>;
export type AnomalyArtifactJson = z.input<typeof AnomalyArtifactSchema>;

function describeIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
		.join("; ");
}

export function parseFailureArtifact(
	name: string,
	raw: unknown,
): ModelArtifact<FailureClassifier> {
	const result = FailureArtifactSchema.safeParse(raw);
	if (!result.success) {
		throw new ModelArtifactError(
			`Invalid failure model artifact ${name}: ${describeIssues(result.error)}`,
		);
	}
	const artifact = result.data;
	return {
		name,
		version: artifact.version,
		featureCols: artifact.feature_cols,
		trainedAt: artifact.trained_at ?? null,
		metrics: artifact.metrics ?? {},
		model: new LogisticClassifier({
			mean: artifact.mean,
			scale: artifact.scale,
			coefficients: artifact.coefficients,
			intercept: artifact.intercept,
			importances: artifact.feature_importances,
		}),
	};
}

export function parseAnomalyArtifact(
	name: string,
	raw: unknown,
): ModelArtifact<OutlierScorer> {
	const result = AnomalyArtifactSchema.safeParse(raw);
	if (!result.success) {
		throw new ModelArtifactError(
			`Invalid anomaly model artifact ${name}: ${describeIssues(result.error)}`,
		);
	}
	const artifact = result.data;
	return {
		name,
		version: artifact.version,
		featureCols: artifact.feature_cols,
		trainedAt: artifact.trained_at ?? null,
		metrics: artifact.metrics ?? {},
		model: new GaussianOutlierEnsemble(
			artifact.members.map((member) => ({
				featureIndices: member.feature_indices,
				mean: member.mean,
				scale: member.scale,
			})),
		),
	};
}

async function readJson(file: string): Promise<unknown> {
	let text: string;
	try {
		text = await readFile(file, "utf8");
	} catch (error) {
		throw new ModelArtifactError(`Cannot read model artifact ${file}`, {}, {
			cause: error,
		});
	}
	try {
		return JSON.parse(text);
	} catch (error) {
		throw new ModelArtifactError(`Model artifact ${file} is not valid JSON`, {}, {
			cause: error,
		});
	}
}

/**
 * Loads both artifacts once; the result is shared read-only by every caller.
 */
export async function loadModelArtifacts(options: {
	artifactsDir: string;
	failureArtifact: string;
	anomalyArtifact: string;
}): Promise<ModelArtifacts> {
	const failurePath = path.join(options.artifactsDir, options.failureArtifact);
	const anomalyPath = path.join(options.artifactsDir, options.anomalyArtifact);

	const failure = parseFailureArtifact(
		options.failureArtifact,
		await readJson(failurePath),
	);
	const anomaly = parseAnomalyArtifact(
		options.anomalyArtifact,
		await readJson(anomalyPath),
	);

	logger.info("Model artifacts loaded", {
		failure_model_version: failure.version,
		failure_features: failure.featureCols.length,
		anomaly_model_version: anomaly.version,
		anomaly_features: anomaly.featureCols.length,
	});

	return { failure, anomaly };
}
