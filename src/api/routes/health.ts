import { Hono } from "hono";
import type { ScoringWorker } from "../../queue/worker";

const app = new Hono();
const SERVICE_VERSION = "1.0.0";

declare module "hono" {
	interface ContextVariableMap {
		scoringWorker: ScoringWorker;
	}
}

app.get("/", (c) => {
	return c.json({
		status: "ok",
		service: "pdm-backend",
		version: SERVICE_VERSION,
	});
});

app.get("/health", (c) => {
	const stats = c.get("scoringWorker").getStats();
	return c.json({
		status: "healthy",
		version: SERVICE_VERSION,
		timestamp: new Date().toISOString(),
		scoring_queue: {
			queued: stats.queued,
			processed: stats.processed,
			failed: stats.failed,
			dropped: stats.dropped,
			alerts_created: stats.alertsCreated,
		},
	});
});

export const healthRoutes = app;
