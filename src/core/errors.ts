export interface ErrorContext {
	machineId?: string;
	horizonHours?: number;
	column?: string;
}

export class MaintenanceError extends Error {
	readonly context: ErrorContext;

	constructor(message: string, context: ErrorContext = {}, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
		this.context = context;
	}
}

/** No readings were supplied. Callers treat it as an empty result. */
export class EmptyInputError extends MaintenanceError {
	constructor(context: ErrorContext = {}) {
		super(
			context.machineId
				? `No sensor data available for machine ${context.machineId}`
				: "No sensor data available",
			context,
		);
	}
}

/** Every row was consumed by lag and rolling-window warm-up. */
export class InsufficientHistoryError extends MaintenanceError {
	constructor(context: ErrorContext = {}) {
		super(
			context.machineId
				? `No usable features for machine ${context.machineId}: not enough history to fill lag and rolling windows`
				: "No usable features: not enough history to fill lag and rolling windows",
			context,
		);
	}
}

export class FeatureMismatchError extends MaintenanceError {
	constructor(column: string, artifact: string, context: ErrorContext = {}) {
		super(
			`Model artifact "${artifact}" expects feature column "${column}" which the computed features do not contain`,
			{ ...context, column },
		);
	}
}

export class ScoringFailure extends MaintenanceError {
	constructor(context: ErrorContext, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(
			`Scoring failed for machine ${context.machineId ?? "unknown"} at horizon ${context.horizonHours ?? "?"}h: ${reason}`,
			context,
			{ cause },
		);
	}
}

export class ConfidenceComputationFailure extends MaintenanceError {}

export class FeatureConfigError extends MaintenanceError {}

export class ModelArtifactError extends MaintenanceError {}

export class ReadingValidationError extends MaintenanceError {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Data validation errors: ${issues.join("; ")}`);
		this.issues = issues;
	}
}

export class BatchTooLargeError extends MaintenanceError {
	constructor(limit: number) {
		super(`Maximum ${limit} machines per batch request`);
	}
}

export class MachineNotFoundError extends MaintenanceError {
	constructor(machineId: string) {
		super(`Machine ${machineId} not found`, { machineId });
	}
}

export class AlertNotFoundError extends MaintenanceError {
	constructor(alertId: number) {
		super(`Alert ${alertId} not found`);
	}
}

export class AlertAlreadyResolvedError extends MaintenanceError {
	constructor(alertId: number) {
		super(`Alert ${alertId} is already resolved`);
	}
}

export class ScenarioNotFoundError extends MaintenanceError {
	constructor(name: string) {
		super(`Scenario ${name} not found`);
	}
}
