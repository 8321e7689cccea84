import { Hono } from "hono";
import { z } from "zod";
import { settings } from "../../config/settings";
import type { IngestionService, IngestionSummary } from "../../services/ingestion-service";

const app = new Hono();

// Type definitions for Hono context
declare module "hono" {
	interface ContextVariableMap {
		ingestionService: IngestionService;
	}
}

const BatchRequestSchema = z.object({
	readings: z.array(z.unknown()).min(1).max(settings.ingestion.maxBatchReadings),
});

function toResponse(summary: IngestionSummary) {
	return {
		status: "ok",
		rows_ingested: summary.rowsIngested,
		machines: summary.machines,
		new_machines: summary.newMachines,
		queued_machines: summary.queuedMachines,
	};
}

app.post("/", async (c) => {
	const ingestionService = c.get("ingestionService");
	const contentType = c.req.header("content-type") ?? "";

	if (contentType.startsWith("text/csv") || contentType.startsWith("text/plain")) {
		const summary = await ingestionService.ingestCsv(await c.req.text());
		return c.json(toResponse(summary));
	}

	const body = await c.req.json().catch(() => null);
	if (!body) {
		return c.json({ error: "Invalid JSON body" }, 400);
	}

	const result = BatchRequestSchema.safeParse(body);
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}

	const summary = await ingestionService.ingestRecords(result.data.readings);
	return c.json(toResponse(summary));
});

export const ingestRoutes = app;
