import { Hono } from "hono";
import { z } from "zod";
import type { AlertService } from "../../services/alert-service";
import { SEVERITY_LEVELS } from "../../types";
import { alertToWire } from "../wire";

const app = new Hono();

declare module "hono" {
	interface ContextVariableMap {
		alertService: AlertService;
	}
}

const ListQuerySchema = z.object({
	machine_id: z.string().min(1).optional(),
	severity: z.enum(SEVERITY_LEVELS).optional(),
	resolved: z
		.enum(["true", "false"])
		.optional()
		.transform((value) => (value === undefined ? undefined : value === "true")),
	limit: z.coerce.number().int().min(1).max(1000).default(100),
	offset: z.coerce.number().int().min(0).default(0),
});

const CreateAlertSchema = z.object({
	machine_id: z.string().min(1).max(50),
	severity: z.enum(SEVERITY_LEVELS),
	message: z.string().min(1).max(500),
	failure_probability: z.number().min(0).max(1).nullable().optional(),
	anomaly_score: z.number().min(0).max(1).nullable().optional(),
});

const StatsQuerySchema = z.object({
	days: z.coerce.number().int().min(1).max(90).default(7),
});

const AlertIdSchema = z.coerce.number().int().positive();

app.get("/", async (c) => {
	const alertService = c.get("alertService");
	const result = ListQuerySchema.safeParse(c.req.query());
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}

	const page = await alertService.listAlerts({
		machineId: result.data.machine_id,
		severity: result.data.severity,
		resolved: result.data.resolved,
		limit: result.data.limit,
		offset: result.data.offset,
	});

	return c.json({
		alerts: page.alerts.map(alertToWire),
		total_count: page.totalCount,
		unresolved_count: page.unresolvedCount,
	});
});

app.post("/", async (c) => {
	const alertService = c.get("alertService");
	const body = await c.req.json().catch(() => null);
	if (!body) {
		return c.json({ error: "Invalid JSON body" }, 400);
	}

	const result = CreateAlertSchema.safeParse(body);
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}

	const alert = await alertService.createAlert({
		machineId: result.data.machine_id,
		severity: result.data.severity,
		message: result.data.message,
		failureProbability: result.data.failure_probability,
		anomalyScore: result.data.anomaly_score,
	});
	return c.json(alertToWire(alert), 201);
});

app.get("/stats", async (c) => {
	const result = StatsQuerySchema.safeParse(c.req.query());
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}

	const stats = await c.get("alertService").getStatistics(result.data.days);
	return c.json({
		period_days: stats.periodDays,
		total_alerts: stats.totalAlerts,
		unresolved_alerts: stats.unresolvedAlerts,
		by_severity: stats.bySeverity,
		by_machine: stats.byMachine,
		resolution_time: stats.resolutionTime && {
			average_hours: stats.resolutionTime.averageHours,
			median_hours: stats.resolutionTime.medianHours,
			max_hours: stats.resolutionTime.maxHours,
		},
		trends: {
			alerts_today: stats.trends.alertsToday,
			alerts_yesterday: stats.trends.alertsYesterday,
			alerts_this_week: stats.trends.alertsThisWeek,
			alerts_last_week: stats.trends.alertsLastWeek,
		},
	});
});

app.post("/auto-generate", async (c) => {
	const cycle = await c.get("alertService").autoGenerate();
	return c.json({
		alerts_created: cycle.alertsCreated,
		predictions_checked: cycle.predictionsChecked,
		timestamp: c.get("clock")(),
	});
});

app.get("/:id", async (c) => {
	const id = AlertIdSchema.safeParse(c.req.param("id"));
	if (!id.success) {
		return c.json({ error: "Invalid request", details: id.error }, 400);
	}
	const alert = await c.get("alertService").getAlert(id.data);
	return c.json(alertToWire(alert));
});

app.put("/:id/resolve", async (c) => {
	const id = AlertIdSchema.safeParse(c.req.param("id"));
	if (!id.success) {
		return c.json({ error: "Invalid request", details: id.error }, 400);
	}
	const alert = await c.get("alertService").resolveAlert(id.data);
	return c.json(alertToWire(alert));
});

export const alertRoutes = app;
