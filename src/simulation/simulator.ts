import { ScenarioNotFoundError } from "../core/errors";
import type { Reading, UnixSeconds } from "../types";
import {
	boundSample,
	type RandomSource,
	type Scenario,
	SIMULATED_SENSORS,
} from "./scenario";
import { DegradationScenario } from "./scenarios/degradation";
import { NormalOperationScenario } from "./scenarios/normal";

export interface SimulationRequest {
	scenario: string;
	machines: number;
	hours: number;
	intervalMinutes: number;
	/** Timestamp of the last sample of every machine. */
	endTime: UnixSeconds;
}

export function simulatedMachineId(index: number): string {
	return `M-${String(index + 1).padStart(3, "0")}`;
}

/**
 * Produces tall readings for a fleet of machines from a named scenario.
 * Deterministic for a deterministic random source.
 */
export class Simulator {
	private scenarios: Map<string, Scenario> = new Map();

	constructor(private readonly random: RandomSource = Math.random) {
		this.registerScenario(new NormalOperationScenario());
		this.registerScenario(new DegradationScenario());
	}

	private registerScenario(scenario: Scenario) {
		this.scenarios.set(scenario.getName(), scenario);
	}

	listScenarios() {
		return Array.from(this.scenarios.values()).map((s) => ({
			name: s.getName(),
			description: s.getDescription(),
		}));
	}

	generate(request: SimulationRequest): Reading[] {
		const scenario = this.scenarios.get(request.scenario);
		if (!scenario) {
			throw new ScenarioNotFoundError(request.scenario);
		}

		const intervalSec = request.intervalMinutes * 60;
		const totalSteps = Math.floor((request.hours * 60) / request.intervalMinutes);
		const stepsPerDay = (24 * 60) / request.intervalMinutes;
		const readings: Reading[] = [];

		for (let m = 0; m < request.machines; m++) {
			const machineId = simulatedMachineId(m);
			for (let step = 0; step < totalSteps; step++) {
				const timestamp = request.endTime - (totalSteps - 1 - step) * intervalSec;
				const sample = boundSample(
					scenario.generateStep({ step, totalSteps, stepsPerDay }, this.random),
				);
				for (const sensor of SIMULATED_SENSORS) {
					readings.push({ timestamp, machineId, sensor, value: sample[sensor] });
				}
			}
		}

		return readings;
	}
}
