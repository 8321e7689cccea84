import {
	baselineSample,
	type RandomSource,
	Scenario,
	type SensorSample,
	type StepContext,
} from "../scenario";

export class NormalOperationScenario extends Scenario {
	constructor() {
		super("normal", "Healthy machines: every channel holds its nominal level with small noise");
	}

	generateStep(_context: StepContext, random: RandomSource): SensorSample {
		return baselineSample(random);
	}
}
