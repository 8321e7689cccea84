import {
	baselineSample,
	gaussian,
	type RandomSource,
	Scenario,
	type SensorSample,
	type StepContext,
} from "../scenario";

export class DegradationScenario extends Scenario {
	constructor(private readonly spikeProbability = 0.05) {
		super(
			"degradation",
			"Bearing wear: temperature, vibration and current drift upward over the run with a daily stress cycle and occasional spikes",
		);
	}

	generateStep(context: StepContext, random: RandomSource): SensorSample {
		const sample = baselineSample(random);

		// Reaches 0.5 at the end of the run.
		const degradation = (context.step / context.totalSteps) * 0.5;
		const cycle = Math.sin((2 * Math.PI * context.step) / context.stepsPerDay) * 0.2;

		if (random() < this.spikeProbability) {
			sample.temperature += gaussian(random, 15, 5);
			sample.vibration += gaussian(random, 0.3, 0.1);
			sample.current += gaussian(random, 2, 0.5);
		}

		sample.temperature += degradation * 20 + cycle * 10;
		sample.vibration += degradation * 0.4 + Math.abs(cycle) * 0.2;
		sample.current += degradation * 3 + cycle * 1.5;
		return sample;
	}
}
