import type { OutlierScorer } from "./artifact";

export interface GaussianMember {
	featureIndices: readonly number[];
	mean: readonly number[];
	scale: readonly number[];
}

/**
 * Ensemble of independent Gaussian profiles over feature subsets. The raw
 * score of a row is the negated mean, across members, of the member's mean
 * squared z-score, so lower means more atypical.
 */
export class GaussianOutlierEnsemble implements OutlierScorer {
	constructor(private readonly members: readonly GaussianMember[]) {}

	scoreSamples(features: readonly (readonly number[])[]): number[] {
		return features.map((row) => {
			let total = 0;
			for (const member of this.members) {
				let squares = 0;
				member.featureIndices.forEach((featureIndex, j) => {
					const z = (row[featureIndex] - member.mean[j]) / member.scale[j];
					squares += z * z;
				});
				total += squares / member.featureIndices.length;
			}
			return -(total / this.members.length);
		});
	}
}
