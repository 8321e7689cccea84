import { type Context, Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { alertRoutes } from "./api/routes/alerts";
import { healthRoutes } from "./api/routes/health";
import { ingestRoutes } from "./api/routes/ingest";
import { metricsRoutes } from "./api/routes/metrics";
import { predictRoutes } from "./api/routes/predict";
import { simulationRoutes } from "./api/routes/simulation";
import {
	AlertAlreadyResolvedError,
	AlertNotFoundError,
	BatchTooLargeError,
	EmptyInputError,
	FeatureConfigError,
	InsufficientHistoryError,
	MachineNotFoundError,
	ReadingValidationError,
	ScenarioNotFoundError,
} from "./core/errors";
import type { ScoringWorker } from "./queue/worker";
import type {
	AlertService,
	IngestionService,
	PredictionService,
	ScoringService,
} from "./services";
import type { Simulator } from "./simulation/simulator";
import type { Clock } from "./types";
import { logger } from "./utils/logger";
import type { Metrics } from "./utils/metrics";

export interface AppServices {
	predictionService: PredictionService;
	scoringService: ScoringService;
	alertService: AlertService;
	ingestionService: IngestionService;
	scoringWorker: ScoringWorker;
	simulator: Simulator;
	clock: Clock;
	metrics: Metrics;
}

/** Route pattern of the handler that answered, so `/alerts/7` counts as `/alerts/:id`. */
function endpointOf(c: Context): string {
	const handlers = c.req.matchedRoutes.filter((route) => route.method !== "ALL");
	return handlers[handlers.length - 1]?.path ?? "unmatched";
}

function statusFor(err: Error): 400 | 404 | 409 | 500 {
	if (
		err instanceof ReadingValidationError ||
		err instanceof EmptyInputError ||
		err instanceof InsufficientHistoryError ||
		err instanceof BatchTooLargeError ||
		err instanceof FeatureConfigError
	) {
		return 400;
	}
	if (
		err instanceof MachineNotFoundError ||
		err instanceof AlertNotFoundError ||
		err instanceof ScenarioNotFoundError
	) {
		return 404;
	}
	if (err instanceof AlertAlreadyResolvedError) {
		return 409;
	}
	return 500;
}

export function createApp(services: AppServices): Hono {
	const app = new Hono();

	app.onError((err, c) => {
		if (err instanceof HTTPException) {
			return err.getResponse();
		}
		const status = statusFor(err);
		if (status === 500) {
			logger.error("Unhandled request error", err, { path: c.req.path });
			return c.json({ error: "internal_error" }, 500);
		}
		logger.warn("Request rejected", { path: c.req.path, status, error: err.message });
		if (err instanceof ReadingValidationError) {
			return c.json({ error: err.message, details: err.issues }, status);
		}
		return c.json({ error: err.message }, status);
	});

	app.notFound((c) => c.json({ error: "not_found" }, 404));

	app.use("*", async (c, next) => {
		const endTimer = services.metrics.requestDuration.startTimer({ method: c.req.method });
		await next();
		const endpoint = endpointOf(c);
		endTimer({ endpoint });
		services.metrics.requestsTotal.inc({
			method: c.req.method,
			endpoint,
			status: String(c.res.status),
		});
	});

	// Middleware to inject services
	app.use("*", async (c, next) => {
		c.set("predictionService", services.predictionService);
		c.set("scoringService", services.scoringService);
		c.set("alertService", services.alertService);
		c.set("ingestionService", services.ingestionService);
		c.set("scoringWorker", services.scoringWorker);
		c.set("simulator", services.simulator);
		c.set("clock", services.clock);
		c.set("metrics", services.metrics);
		await next();
	});

	app.route("/", healthRoutes);
	app.route("/ingest", ingestRoutes);
	app.route("/predict", predictRoutes);
	app.route("/alerts", alertRoutes);
	app.route("/simulation", simulationRoutes);
	app.route("/metrics", metricsRoutes);

	return app;
}
