import type { FailureClassifier } from "./artifact";

export interface LogisticClassifierParams {
	mean: readonly number[];
	scale: readonly number[];
	coefficients: readonly number[];
	intercept: number;
	importances: readonly number[];
}

function sigmoid(z: number): number {
	if (z >= 0) {
		return 1 / (1 + Math.exp(-z));
	}
	const e = Math.exp(z);
	return e / (1 + e);
}

/**
 * Standardised logistic regression: p = sigmoid(b + sum(w_i * (x_i - mu_i) / s_i)).
 */
export class LogisticClassifier implements FailureClassifier {
	constructor(private readonly params: LogisticClassifierParams) {}

	predictProbability(features: readonly (readonly number[])[]): number[] {
		const { mean, scale, coefficients, intercept } = this.params;
		return features.map((row) => {
			let z = intercept;
			for (let i = 0; i < coefficients.length; i++) {
				z += (coefficients[i] * (row[i] - mean[i])) / scale[i];
			}
			return sigmoid(z);
		});
	}

	featureImportances(): number[] {
		return [...this.params.importances];
	}
}
