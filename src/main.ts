import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { settings } from "./config/settings";
import { MemoryRegistry } from "./db/memory-registry";
import { PostgresRegistry } from "./db/registry";
import type { Registry } from "./db/stores";
import { loadModelArtifacts } from "./models";
import { ScoringWorker } from "./queue/worker";
import {
	AlertEngine,
	AlertService,
	IngestionService,
	PredictionService,
	ScoringService,
} from "./services";
import { Simulator } from "./simulation/simulator";
import { systemClock } from "./types";
import { logger } from "./utils/logger";
import { Metrics } from "./utils/metrics";

function createRegistry(): Registry {
	if (settings.storage.driver === "memory") {
		logger.warn("Using in-memory storage; data is lost on restart");
		return new MemoryRegistry(systemClock);
	}
	return new PostgresRegistry(settings.postgres, settings.ingestion.insertChunkSize);
}

async function startServer() {
	logger.info("Initializing predictive maintenance backend", {
		storage: settings.storage.driver,
	});

	const registry = createRegistry();
	await registry.initialize();

	// Loaded once; every service shares the same read-only artifacts.
	const artifacts = await loadModelArtifacts(settings.models);

	const metrics = new Metrics();
	const scoringService = new ScoringService(artifacts, settings.scoring);
	const predictionService = new PredictionService(
		registry,
		scoringService,
		settings,
		systemClock,
		metrics,
	);
	const alertEngine = new AlertEngine(registry, settings.alerts, systemClock, metrics);
	const alertService = new AlertService(registry, alertEngine, settings.alerts, systemClock);
	const scoringWorker = new ScoringWorker(
		predictionService,
		alertEngine,
		{
			...settings.queue,
			horizonHours: settings.prediction.defaultHorizonHours,
		},
		metrics,
	);
	const ingestionService = new IngestionService(
		registry,
		scoringWorker,
		settings.ingestion,
	);

	const app = createApp({
		predictionService,
		scoringService,
		alertService,
		ingestionService,
		scoringWorker,
		simulator: new Simulator(),
		clock: systemClock,
		metrics,
	});

	scoringWorker.start();

	const { port, host } = settings.server;
	logger.info("Starting server", { host, port });

	const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
		logger.info("Server running", { url: `http://${host}:${info.port}` });
	});

	const shutdown = (signal: string) => {
		logger.info("Shutting down gracefully", { signal });
		scoringWorker.stop();
		server.close(() => {
			registry
				.close()
				.then(() => process.exit(0))
				.catch((error: unknown) => {
					logger.error("Failed to close registry", error);
					process.exit(1);
				});
		});
	};
	process.once("SIGINT", () => shutdown("SIGINT"));
	process.once("SIGTERM", () => shutdown("SIGTERM"));
}

startServer().catch((error: unknown) => {
	logger.error("Failed to start server", error);
	process.exit(1);
});
