/**
 * Values of the trailing window of `size` entries ending at `end` (inclusive),
 * or undefined when the window runs past the start of the series or contains
 * a missing value.
 */
export function trailingWindow(
	series: ReadonlyArray<number | undefined>,
	end: number,
	size: number,
): number[] | undefined {
	const start = end - size + 1;
	if (start < 0 || end >= series.length) return undefined;

	const window: number[] = [];
	for (let i = start; i <= end; i++) {
		const value = series[i];
		if (value === undefined) return undefined;
		window.push(value);
	}
	return window;
}

export function mean(values: readonly number[]): number {
	let sum = 0;
	for (const value of values) sum += value;
	return sum / values.length;
}

/** Sample standard deviation (n - 1). Undefined for fewer than two values. */
export function sampleStdDev(values: readonly number[]): number | undefined {
	if (values.length < 2) return undefined;
	const m = mean(values);
	let squares = 0;
	for (const value of values) {
		const diff = value - m;
		squares += diff * diff;
	}
	return Math.sqrt(squares / (values.length - 1));
}
