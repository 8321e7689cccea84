/**
 * Batch-relative min-max scaling: (x - min) / (max - min + epsilon).
 * A batch of identical values maps to 0.
 */
export function minMaxNormalize(
	values: readonly number[],
	epsilon: number,
): number[] {
	if (values.length === 0) return [];

	let min = Number.POSITIVE_INFINITY;
	let max = Number.NEGATIVE_INFINITY;
	for (const value of values) {
		if (value < min) min = value;
		if (value > max) max = value;
	}

	const span = max - min + epsilon;
	return values.map((value) => (value - min) / span);
}
