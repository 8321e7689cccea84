import { describe, expect, it } from "vitest";
import { mean, sampleStdDev, trailingWindow } from "./rolling-window";

describe("trailingWindow", () => {
	it("returns the window ending at the given index", () => {
		expect(trailingWindow([1, 2, 3, 4], 2, 3)).toEqual([1, 2, 3]);
		expect(trailingWindow([1, 2, 3, 4], 3, 1)).toEqual([4]);
	});

	it("is undefined before enough history exists", () => {
		expect(trailingWindow([1, 2, 3], 1, 3)).toBeUndefined();
	});

	it("is undefined when the window holds a gap", () => {
		expect(trailingWindow([1, undefined, 3, 4], 3, 3)).toBeUndefined();
		expect(trailingWindow([1, undefined, 3, 4], 3, 2)).toEqual([3, 4]);
	});
});

describe("mean and sampleStdDev", () => {
	it("matches hand-computed values", () => {
		expect(mean([20, 30, 40])).toBe(30);
		expect(sampleStdDev([20, 30, 40])).toBe(10);
		expect(sampleStdDev([2, 2, 2])).toBe(0);
	});

	it("has no deviation for a single value", () => {
		expect(sampleStdDev([5])).toBeUndefined();
	});
});
