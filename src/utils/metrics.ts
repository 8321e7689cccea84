import { Counter, Gauge, Histogram, Registry } from "prom-client";

/**
 * Prometheus instruments on a registry owned by this instance. The
 * composition root builds one and hands it to every service.
 */
export class Metrics {
	readonly registry = new Registry();

	readonly requestsTotal = new Counter({
		name: "pdm_requests_total",
		help: "Total API requests",
		labelNames: ["method", "endpoint", "status"] as const,
		registers: [this.registry],
	});

	readonly requestDuration = new Histogram({
		name: "pdm_request_duration_seconds",
		help: "Request duration in seconds",
		labelNames: ["method", "endpoint"] as const,
		registers: [this.registry],
	});

	readonly predictionsTotal = new Counter({
		name: "pdm_predictions_total",
		help: "Total number of predictions made",
		labelNames: ["model_type", "machine_id"] as const,
		registers: [this.registry],
	});

	readonly alertsCreatedTotal = new Counter({
		name: "pdm_alerts_created_total",
		help: "Total number of alerts created",
		labelNames: ["severity", "machine_id"] as const,
		registers: [this.registry],
	});

	readonly queueSize = new Gauge({
		name: "pdm_queue_size",
		help: "Number of items in processing queue",
		labelNames: ["queue_name"] as const,
		registers: [this.registry],
	});

	get contentType(): string {
		return this.registry.contentType;
	}

	render(): Promise<string> {
		return this.registry.metrics();
	}
}
