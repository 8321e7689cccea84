import { mean, sampleStdDev, trailingWindow } from "../algorithms";
import type { FeatureFrame, FeatureRow, Reading, SensorType } from "../types";
import { FeatureConfigError } from "./errors";

export interface FeatureOptions {
	lags: readonly number[];
	rollingWindows: readonly number[];
}

interface WideRow {
	timestamp: number;
	machineId: string;
	values: Map<SensorType, number>;
}

export function lagColumn(sensor: string, lag: number): string {
	return `${sensor}_lag${lag}`;
}

export function rollingMeanColumn(sensor: string, window: number): string {
	return `${sensor}_roll${window}_mean`;
}

export function rollingStdColumn(sensor: string, window: number): string {
	return `${sensor}_roll${window}_std`;
}

/**
 * Rows each machine loses before every lag and rolling column is defined.
 */
export function warmupRows(options: FeatureOptions): number {
	const maxLag = Math.max(0, ...options.lags);
	const maxWindow = Math.max(1, ...options.rollingWindows);
	return Math.max(maxLag, maxWindow - 1);
}

function assertPeriods(name: string, periods: readonly number[]): void {
	for (const period of periods) {
		if (!Number.isInteger(period) || period <= 0) {
			throw new FeatureConfigError(
				`${name} must be positive integers, got ${period}`,
			);
		}
	}
}

function compareKeys(
	a: { timestamp: number; machineId: string },
	b: { timestamp: number; machineId: string },
): number {
	if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
	if (a.machineId === b.machineId) return 0;
	return a.machineId < b.machineId ? -1 : 1;
}

/**
 * Pivots readings into one row per (timestamp, machineId), averaging readings
 * that share a (timestamp, machineId, sensor) key. Rows come out ordered by
 * timestamp then machine id.
 */
function pivot(readings: readonly Reading[]): {
	sensors: SensorType[];
	rows: WideRow[];
} {
	const sorted = [...readings].sort(compareKeys);
	const sums = new Map<
		string,
		{
			timestamp: number;
			machineId: string;
			totals: Map<SensorType, { sum: number; count: number }>;
		}
	>();
	const sensors = new Set<SensorType>();

	for (const reading of sorted) {
		const key = `${reading.timestamp}\u0000${reading.machineId}`;
		let entry = sums.get(key);
		if (!entry) {
			entry = {
				timestamp: reading.timestamp,
				machineId: reading.machineId,
				totals: new Map(),
			};
			sums.set(key, entry);
		}
		const total = entry.totals.get(reading.sensor) ?? { sum: 0, count: 0 };
		total.sum += reading.value;
		total.count += 1;
		entry.totals.set(reading.sensor, total);
		sensors.add(reading.sensor);
	}

	const rows: WideRow[] = [];
	for (const entry of sums.values()) {
		const values = new Map<SensorType, number>();
		for (const [sensor, total] of entry.totals) {
			values.set(sensor, total.sum / total.count);
		}
		rows.push({
			timestamp: entry.timestamp,
			machineId: entry.machineId,
			values,
		});
	}

	return { sensors: [...sensors].sort(), rows };
}

function featureColumns(
	sensors: readonly SensorType[],
	options: FeatureOptions,
): string[] {
	const columns: string[] = [...sensors];
	for (const sensor of sensors) {
		for (const lag of options.lags) {
			columns.push(lagColumn(sensor, lag));
		}
		for (const window of options.rollingWindows) {
			columns.push(rollingMeanColumn(sensor, window));
			columns.push(rollingStdColumn(sensor, window));
		}
	}
	return columns;
}

function rowFeatures(
	index: number,
	row: WideRow,
	channels: ReadonlyMap<SensorType, ReadonlyArray<number | undefined>>,
	options: FeatureOptions,
): Record<string, number> | undefined {
	const features: Record<string, number> = {};

	for (const [sensor] of channels) {
		const value = row.values.get(sensor);
		if (value === undefined) return undefined;
		features[sensor] = value;
	}

	for (const [sensor, channel] of channels) {
		for (const lag of options.lags) {
			const lagged = index - lag >= 0 ? channel[index - lag] : undefined;
			if (lagged === undefined) return undefined;
			features[lagColumn(sensor, lag)] = lagged;
		}
		for (const size of options.rollingWindows) {
			const window = trailingWindow(channel, index, size);
			if (!window) return undefined;
			const std = sampleStdDev(window);
			if (std === undefined) return undefined;
			features[rollingMeanColumn(sensor, size)] = mean(window);
			features[rollingStdColumn(sensor, size)] = std;
		}
	}

	return features;
}

function machineFeatures(
	series: readonly WideRow[],
	sensors: readonly SensorType[],
	options: FeatureOptions,
): FeatureRow[] {
	const channels = new Map<SensorType, Array<number | undefined>>();
	for (const sensor of sensors) {
		channels.set(
			sensor,
			series.map((row) => row.values.get(sensor)),
		);
	}

	const out: FeatureRow[] = [];
	series.forEach((row, index) => {
		const features = rowFeatures(index, row, channels, options);
		if (features) {
			out.push({ timestamp: row.timestamp, machineId: row.machineId, features });
		}
	});
	return out;
}

/**
 * Reshapes tall readings into per-timestamp feature rows with lag and trailing
 * rolling statistics per sensor channel, computed within each machine's series.
 *
 * Lags and windows are row offsets and assume uniform sampling; irregular
 * intervals produce lags that are not a fixed time apart. Rows without every
 * column defined (warm-up, or a channel missing at that instant) are dropped.
 */
export function buildFeatures(
	readings: readonly Reading[],
	options: FeatureOptions,
): FeatureFrame {
	assertPeriods("lags", options.lags);
	assertPeriods("rolling windows", options.rollingWindows);

	if (readings.length === 0) {
		return { columns: [], rows: [] };
	}

	const { sensors, rows } = pivot(readings);

	const byMachine = new Map<string, WideRow[]>();
	for (const row of rows) {
		const series = byMachine.get(row.machineId);
		if (series) {
			series.push(row);
		} else {
			byMachine.set(row.machineId, [row]);
		}
	}

	const out: FeatureRow[] = [];
	for (const series of byMachine.values()) {
		out.push(...machineFeatures(series, sensors, options));
	}
	out.sort(compareKeys);

	return { columns: featureColumns(sensors, options), rows: out };
}
