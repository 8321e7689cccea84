import { Hono } from "hono";
import { z } from "zod";
import { settings } from "../../config/settings";
import type { PredictionService } from "../../services/prediction-service";
import type { ScoringService } from "../../services/scoring-service";
import type { Clock } from "../../types";
import { scoreToWire } from "../wire";

const app = new Hono();

declare module "hono" {
	interface ContextVariableMap {
		predictionService: PredictionService;
		scoringService: ScoringService;
		clock: Clock;
	}
}

const horizonHours = z.number().int().min(1).max(168);

const PredictRequestSchema = z.object({
	machine_id: z.string().min(1).max(50),
	horizon_hours: horizonHours.default(settings.prediction.defaultHorizonHours),
	include_anomaly: z.boolean().default(true),
	include_factors: z.boolean().default(true),
});

const BatchQuerySchema = z.object({
	machine_ids: z.array(z.string().min(1)).min(1),
	horizon_hours: z.coerce
		.number()
		.pipe(horizonHours)
		.default(settings.prediction.defaultHorizonHours),
	include_anomaly: z
		.enum(["true", "false"])
		.default("true")
		.transform((value) => value === "true"),
});

app.post("/", async (c) => {
	const predictionService = c.get("predictionService");
	const body = await c.req.json().catch(() => null);
	if (!body) {
		return c.json({ error: "Invalid JSON body" }, 400);
	}

	const result = PredictRequestSchema.safeParse(body);
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}

	const prediction = await predictionService.predictMachine({
		machineId: result.data.machine_id,
		horizonHours: result.data.horizon_hours,
		includeAnomaly: result.data.include_anomaly,
		includeFactors: result.data.include_factors,
	});

	return c.json({
		predictions: prediction.scores.map(scoreToWire),
		model_version: prediction.modelVersion,
		prediction_time: c.get("clock")(),
		failed_horizons: prediction.failures.flatMap((f) =>
			f.context.horizonHours === undefined ? [] : [f.context.horizonHours],
		),
	});
});

app.get("/batch", async (c) => {
	const predictionService = c.get("predictionService");
	const machineIds = (c.req.queries("machine_ids") ?? [])
		.flatMap((value) => value.split(","))
		.map((value) => value.trim())
		.filter((value) => value.length > 0);

	const result = BatchQuerySchema.safeParse({
		machine_ids: machineIds,
		horizon_hours: c.req.query("horizon_hours"),
		include_anomaly: c.req.query("include_anomaly"),
	});
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}

	const batch = await predictionService.predictBatch(
		result.data.machine_ids,
		result.data.horizon_hours,
		result.data.include_anomaly,
	);

	return c.json({
		predictions: batch.scores.map(scoreToWire),
		model_version: batch.modelVersion,
		prediction_time: c.get("clock")(),
		skipped_machines: batch.skipped,
	});
});

app.get("/models/status", (c) => {
	const info = c.get("scoringService").getModelInfo();
	return c.json({
		models: {
			failure_prediction: {
				version: info.failure_model_version,
				status: "loaded",
				last_trained: info.failure_trained_at,
				feature_count: info.failure_feature_count,
				performance: info.failure_metrics,
			},
			anomaly_detection: {
				version: info.anomaly_model_version,
				status: "loaded",
				last_trained: info.anomaly_trained_at,
				feature_count: info.anomaly_feature_count,
				performance: info.anomaly_metrics,
			},
		},
	});
});

export const predictRoutes = app;
