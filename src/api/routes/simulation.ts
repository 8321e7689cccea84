import { Hono } from "hono";
import { z } from "zod";
import type { Simulator } from "../../simulation/simulator";

const app = new Hono();

declare module "hono" {
	interface ContextVariableMap {
		simulator: Simulator;
	}
}

const SeedRequestSchema = z.object({
	scenario: z.string().min(1),
	machines: z.number().int().min(1).max(50).default(5),
	hours: z.number().int().min(1).max(720).default(48),
	interval_minutes: z.number().int().min(1).max(1440).default(60),
});

app.get("/scenarios", (c) => {
	return c.json({ scenarios: c.get("simulator").listScenarios() });
});

app.post("/seed", async (c) => {
	const body = await c.req.json().catch(() => null);
	if (!body) {
		return c.json({ error: "Invalid JSON body" }, 400);
	}

	const result = SeedRequestSchema.safeParse(body);
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}

	const { scenario, machines, hours, interval_minutes } = result.data;
	const readings = c.get("simulator").generate({
		scenario,
		machines,
		hours,
		intervalMinutes: interval_minutes,
		endTime: c.get("clock")(),
	});
	const summary = await c.get("ingestionService").ingestReadings(readings);

	return c.json({
		message: `Scenario ${scenario} seeded`,
		readings_generated: readings.length,
		rows_ingested: summary.rowsIngested,
		machines: summary.machines,
	});
});

export const simulationRoutes = app;
