export {
	type FailureClassifier,
	type ModelArtifact,
	type ModelArtifacts,
	type OutlierScorer,
	loadModelArtifacts,
	parseAnomalyArtifact,
	parseFailureArtifact,
} from "./artifact";
export { LogisticClassifier } from "./logistic-classifier";
export { GaussianOutlierEnsemble } from "./outlier-ensemble";
