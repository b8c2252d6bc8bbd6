/**
 * Component Scoring Tests
 */

import {
	calculateComplexityScore,
	calculateReusabilityScore,
	detectAccessibilityFeatures,
	determineUsagePattern,
	extractComponentProperties,
} from "../../src/core/scorer";
import type { UsagePattern } from "../../src/core/types/index";
import { makeObject } from "../helpers/fixtures";

describe("calculateReusabilityScore", () => {
	it("scales with instance count and saturates at ten", () => {
		expect(calculateReusabilityScore(1)).toBeCloseTo(0.1);
		expect(calculateReusabilityScore(2)).toBeCloseTo(0.2);
		expect(calculateReusabilityScore(10)).toBe(1);
		expect(calculateReusabilityScore(11)).toBe(1);
	});
});

describe("calculateComplexityScore", () => {
	it("starts at 0.1 for a bare object", () => {
		expect(calculateComplexityScore(makeObject())).toBeCloseTo(0.1);
	});

	it("adds 0.1 per child and 0.05 per property", () => {
		const object = makeObject({
			children: ["a", "b", "c"],
			properties: { radius: 4, opacity: 1 },
		});
		expect(calculateComplexityScore(object)).toBeCloseTo(0.5);
	});

	it("is capped at 1", () => {
		const children = Array.from({ length: 12 }, (_, i) => `child-${i}`);
		expect(calculateComplexityScore(makeObject({ children }))).toBe(1);
	});
});

describe("determineUsagePattern", () => {
	const cases: Array<[number, UsagePattern]> = [
		[1, "single_use"],
		[2, "lightly_reused"],
		[3, "lightly_reused"],
		[4, "moderately_reused"],
		[10, "moderately_reused"],
		[11, "heavily_reused"],
	];

	it.each(cases)("classifies %i instances as %s", (count, expected) => {
		expect(determineUsagePattern(count)).toBe(expected);
	});
});

describe("detectAccessibilityFeatures", () => {
	it("reads hints from the object name", () => {
		expect(detectAccessibilityFeatures(makeObject({ name: "alt-text" }))).toEqual([
			"aria_labels",
		]);
		expect(
			detectAccessibilityFeatures(makeObject({ name: "ARIA Role Focus Ring" })),
		).toEqual(["aria_labels", "semantic_roles", "focus_management"]);
	});

	it("flags hidden objects as screen-reader only", () => {
		expect(
			detectAccessibilityFeatures(makeObject({ name: "plain", visible: false })),
		).toEqual(["screen_reader_only"]);
	});

	it("returns nothing for unremarkable objects", () => {
		expect(detectAccessibilityFeatures(makeObject({ name: "Card" }))).toEqual([]);
	});
});

describe("extractComponentProperties", () => {
	it("snapshots the salient fields", () => {
		const object = makeObject({
			type: "group",
			name: "Card",
			width: 300,
			height: 200,
			x: 16,
			y: 24,
			locked: true,
			children: ["title"],
		});

		expect(extractComponentProperties(object)).toEqual({
			type: "group",
			width: 300,
			height: 200,
			name: "Card",
			visible: true,
			locked: true,
			hasChildren: true,
			position: { x: 16, y: 24 },
		});
	});
});
