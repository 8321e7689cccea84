export { AlertEngine, classifyScore } from "./alert-engine";
export { AlertService } from "./alert-service";
export { calculateConfidence } from "./confidence";
export { IngestionService } from "./ingestion-service";
export { PredictionService } from "./prediction-service";
export { ScoringService } from "./scoring-service";
