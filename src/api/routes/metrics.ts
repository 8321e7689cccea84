import { Hono } from "hono";
import type { Metrics } from "../../utils/metrics";

const app = new Hono();

declare module "hono" {
	interface ContextVariableMap {
		metrics: Metrics;
	}
}

app.get("/", async (c) => {
	const metrics = c.get("metrics");
	return c.body(await metrics.render(), 200, { "Content-Type": metrics.contentType });
});

export const metricsRoutes = app;
