import { beforeEach, describe, expect, it } from "vitest";
import { settings } from "../config/settings";
import {
	AlertAlreadyResolvedError,
	AlertNotFoundError,
	MachineNotFoundError,
} from "../core/errors";
import { MemoryRegistry } from "../db/memory-registry";
import { HOUR, ManualClock } from "../testing/fixtures";
import type { Score } from "../types";
import { AlertEngine } from "./alert-engine";
import { AlertService } from "./alert-service";

const DAY = 24 * HOUR;

describe("AlertService", () => {
	let registry: MemoryRegistry;
	let time: ManualClock;
	let service: AlertService;

	beforeEach(async () => {
		time = new ManualClock(100 * DAY);
		registry = new MemoryRegistry(time.clock);
		const engine = new AlertEngine(registry, settings.alerts, time.clock);
		service = new AlertService(registry, engine, settings.alerts, time.clock);
		await registry.ensureMachines(["M-001", "M-002"]);
	});

	it("creates manual alerts only for known machines", async () => {
		const alert = await service.createAlert({
			machineId: "M-001",
			severity: "LOW",
			message: "Inspect coupling",
		});
		expect(alert).toEqual({
			id: 1,
			machineId: "M-001",
			severity: "LOW",
			message: "Inspect coupling",
			failureProbability: null,
			anomalyScore: null,
			createdAt: 100 * DAY,
			resolved: false,
			resolvedAt: null,
		});

		await expect(
			service.createAlert({ machineId: "M-404", severity: "LOW", message: "x" }),
		).rejects.toBeInstanceOf(MachineNotFoundError);
	});

	it("resolves an alert once", async () => {
		const alert = await service.createAlert({
			machineId: "M-001",
			severity: "HIGH",
			message: "Bearing temperature rising",
		});
		time.advance(HOUR);

		const resolved = await service.resolveAlert(alert.id);
		expect(resolved.resolved).toBe(true);
		expect(resolved.resolvedAt).toBe(100 * DAY + HOUR);

		await expect(service.resolveAlert(alert.id)).rejects.toBeInstanceOf(
			AlertAlreadyResolvedError,
		);
		await expect(service.resolveAlert(999)).rejects.toBeInstanceOf(AlertNotFoundError);
		await expect(service.getAlert(999)).rejects.toBeInstanceOf(AlertNotFoundError);
	});

	it("lists alerts with counts", async () => {
		const first = await service.createAlert({ machineId: "M-001", severity: "LOW", message: "a" });
		await service.createAlert({ machineId: "M-002", severity: "HIGH", message: "b" });
		await service.resolveAlert(first.id);

		const all = await service.listAlerts({});
		expect(all.totalCount).toBe(2);
		expect(all.unresolvedCount).toBe(1);

		const open = await service.listAlerts({ resolved: false });
		expect(open.alerts.map((a) => a.machineId)).toEqual(["M-002"]);
	});

	it("summarizes alerts over a period", async () => {
		const now = time.now;
		const recent = await registry.createAlert(
			{ machineId: "M-001", severity: "HIGH", message: "recent" },
			now - HOUR,
		);
		await registry.resolveAlert(recent.id, now - HOUR / 2);
		const yesterday = await registry.createAlert(
			{ machineId: "M-001", severity: "CRITICAL", message: "yesterday" },
			now - DAY - HOUR,
		);
		await registry.resolveAlert(yesterday.id, now - DAY + HOUR);
		await registry.createAlert(
			{ machineId: "M-002", severity: "MEDIUM", message: "last week" },
			now - 10 * DAY,
		);

		const stats = await service.getStatistics(7);

		expect(stats).toEqual({
			periodDays: 7,
			totalAlerts: 2,
			unresolvedAlerts: 0,
			bySeverity: { LOW: 0, MEDIUM: 0, HIGH: 1, CRITICAL: 1 },
			byMachine: { "M-001": 2 },
			resolutionTime: { averageHours: 1.25, medianHours: 1.25, maxHours: 2 },
			trends: {
				alertsToday: 1,
				alertsYesterday: 1,
				alertsThisWeek: 2,
				alertsLastWeek: 1,
			},
		});
	});

	it("reports no resolution time without resolved alerts", async () => {
		await service.createAlert({ machineId: "M-001", severity: "LOW", message: "a" });
		const stats = await service.getStatistics(1);
		expect(stats.resolutionTime).toBeNull();
		expect(stats.unresolvedAlerts).toBe(1);
	});

	it("auto-generates alerts from the last day of predictions", async () => {
		const prediction = (machineId: string, timestamp: number): Score => ({
			machineId,
			timestamp,
			horizonHours: 24,
			failureProbability: 0.95,
			anomalyScore: 0.2,
			confidence: 0.8,
			topFactors: [],
		});
		await registry.savePredictions(
			[prediction("M-001", time.now - HOUR), prediction("M-002", time.now - 25 * HOUR)],
			"1.0.0",
		);

		const result = await service.autoGenerate();

		expect(result.predictionsChecked).toBe(1);
		expect(result.alertsCreated).toBe(1);
		expect(result.alerts[0].machineId).toBe("M-001");
	});
});
