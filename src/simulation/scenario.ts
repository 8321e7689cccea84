/** Uniform source in [0, 1), swappable for a seeded one in tests. */
export type RandomSource = () => number;

export const SIMULATED_SENSORS = [
	"temperature",
	"vibration",
	"current",
	"pressure",
	"rpm",
] as const;

export type SimulatedSensor = (typeof SIMULATED_SENSORS)[number];

export type SensorSample = Record<SimulatedSensor, number>;

export interface StepContext {
	/** Zero-based sample index within the run. */
	step: number;
	totalSteps: number;
	stepsPerDay: number;
}

const BOUNDS: Record<SimulatedSensor, { min: number; max: number; decimals: number }> = {
	temperature: { min: 50, max: 95, decimals: 2 },
	vibration: { min: 0.05, max: 1.5, decimals: 3 },
	current: { min: 3, max: 12, decimals: 2 },
	pressure: { min: 80, max: 130, decimals: 1 },
	rpm: { min: 1500, max: 2000, decimals: 0 },
};

/** Box-Muller draw from N(mean, sd). */
export function gaussian(random: RandomSource, mean: number, sd: number): number {
	const u = 1 - random();
	const v = random();
	return mean + sd * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

export function baselineSample(random: RandomSource): SensorSample {
	return {
		temperature: gaussian(random, 65, 2),
		vibration: gaussian(random, 0.15, 0.02),
		current: gaussian(random, 5.0, 0.3),
		pressure: gaussian(random, 100, 3),
		rpm: gaussian(random, 1750, 25),
	};
}

/** Clamps each channel to its physical range and rounds to sensor precision. */
export function boundSample(sample: SensorSample): SensorSample {
	const bounded = { ...sample };
	for (const sensor of SIMULATED_SENSORS) {
		const { min, max, decimals } = BOUNDS[sensor];
		const factor = 10 ** decimals;
		const clamped = Math.max(min, Math.min(sample[sensor], max));
		bounded[sensor] = Math.round(clamped * factor) / factor;
	}
	return bounded;
}

export abstract class Scenario {
	protected name: string;
	protected description: string;

	constructor(name: string, description: string) {
		this.name = name;
		this.description = description;
	}

	/** Raw, unbounded sample for one machine at one step. */
	abstract generateStep(context: StepContext, random: RandomSource): SensorSample;

	getName(): string {
		return this.name;
	}

	getDescription(): string {
		return this.description;
	}
}
