import { settings } from "../config/settings";
import { MaintenanceError } from "../core/errors";

type Level = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<Level | "silent", number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

function enabled(level: Level): boolean {
	return LEVEL_ORDER[level] >= LEVEL_ORDER[settings.logging.level];
}

function describeError(error: unknown): Record<string, unknown> {
	if (error instanceof MaintenanceError) {
		return {
			error: error.message,
			error_name: error.name,
			...error.context,
			...(error.cause !== undefined ? { cause: String(error.cause) } : {}),
		};
	}
	if (error instanceof Error) {
		return { error: error.message, error_name: error.name };
	}
	return { error: String(error) };
}

function write(level: Level, msg: string, meta?: object): void {
	if (!enabled(level)) return;
	const line = JSON.stringify({
		level,
		message: msg,
		...meta,
		timestamp: Date.now(),
	});
	if (level === "error") {
		console.error(line);
	} else if (level === "warn") {
		console.warn(line);
	} else {
		console.log(line);
	}
}

export const logger = {
	debug: (msg: string, meta?: object) => write("debug", msg, meta),
	info: (msg: string, meta?: object) => write("info", msg, meta),
	warn: (msg: string, meta?: object) => write("warn", msg, meta),
	error: (msg: string, error?: unknown, meta?: object) =>
		write("error", msg, {
			...(error !== undefined ? describeError(error) : {}),
			...meta,
		}),
};
