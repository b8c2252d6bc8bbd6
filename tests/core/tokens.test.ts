/**
 * Design Token Tests
 *
 * Validates per-object token extraction and corpus-wide ranking.
 */

import {
	aggregateDesignTokens,
	extractObjectDesignTokens,
	formatTokenValue,
	rankCounts,
} from "../../src/core/tokens";
import { makeContext, makeObject } from "../helpers/fixtures";

describe("extractObjectDesignTokens", () => {
	it("extracts colors and spacing from a shape", () => {
		const tokens = extractObjectDesignTokens(
			makeObject({ width: 120, height: 40, fill: "#ff0000", stroke: "#000000" }),
		);

		expect(tokens).toEqual({
			spacing: { width: 120, height: 40 },
			colors: { fill: "#ff0000", stroke: "#000000" },
		});
	});

	it("extracts typography only from text objects", () => {
		const text = extractObjectDesignTokens(
			makeObject({ type: "text", font_family: "Inter", font_size: 16 }),
		);
		const shape = extractObjectDesignTokens(
			makeObject({ type: "rectangle", font_family: "Inter" }),
		);

		expect(text.typography).toEqual({
			font_family: "Inter",
			font_size: 16,
			font_weight: null,
			line_height: null,
		});
		expect(shape.typography).toBeUndefined();
	});

	it("extracts effects when either shadow or blur is present", () => {
		expect(extractObjectDesignTokens(makeObject({ blur: 4 })).effects).toEqual({
			shadow: null,
			blur: 4,
		});
		expect(extractObjectDesignTokens(makeObject()).effects).toBeUndefined();
	});

	it("always extracts spacing", () => {
		expect(extractObjectDesignTokens(makeObject()).spacing).toEqual({
			width: 0,
			height: 0,
		});
	});
});

describe("formatTokenValue", () => {
	it("renders values into key form", () => {
		expect(formatTokenValue("#fff")).toBe("#fff");
		expect(formatTokenValue(1.5)).toBe("1.5");
		expect(formatTokenValue(true)).toBe("true");
		expect(formatTokenValue({ r: 1, g: 0 })).toBe('{"r":1,"g":0}');
	});
});

describe("rankCounts", () => {
	it("orders by count and keeps first-seen order on ties", () => {
		const counts = new Map([
			["a", 1],
			["b", 3],
			["c", 1],
			["d", 3],
		]);
		expect(rankCounts(counts)).toEqual([
			["b", 3],
			["d", 3],
			["a", 1],
			["c", 1],
		]);
		expect(rankCounts(counts, 2)).toEqual([
			["b", 3],
			["d", 3],
		]);
	});
});

describe("aggregateDesignTokens", () => {
	it("returns empty rankings for an empty corpus", () => {
		expect(aggregateDesignTokens([])).toEqual({
			colors: [],
			typography: [],
			spacing: [],
			effects: [],
		});
	});

	it("counts field_value keys per category", () => {
		const objects = [
			makeObject({ width: 100, height: 40, fill: "#fff", context: makeContext("a") }),
			makeObject({ width: 100, height: 40, fill: "#fff", context: makeContext("b") }),
			makeObject({ width: 0, height: 20, fill: "#000", context: makeContext("c") }),
			makeObject({
				type: "text",
				width: 50,
				height: 20,
				font_family: "Inter",
				font_size: 16,
				context: makeContext("d"),
			}),
		];

		expect(aggregateDesignTokens(objects)).toEqual({
			colors: [
				["fill_#fff", 2],
				["fill_#000", 1],
			],
			typography: [
				["font_family_Inter", 1],
				["font_size_16", 1],
			],
			spacing: [
				["width_100", 2],
				["height_40", 2],
				["height_20", 2],
				["width_50", 1],
			],
			effects: [],
		});
	});

	it("skips empty, zero and false values", () => {
		const objects = [makeObject({ fill: "", stroke: 0, shadow: false, blur: [] })];
		const aggregate = aggregateDesignTokens(objects);

		expect(aggregate.colors).toEqual([]);
		expect(aggregate.effects).toEqual([]);
	});

	it("keeps only the ten most used tokens", () => {
		const objects = Array.from({ length: 12 }, (_, i) =>
			makeObject({ fill: `color-${i}`, context: makeContext(`obj-${i}`) }),
		);
		objects.push(makeObject({ fill: "color-11", context: makeContext("obj-extra") }));

		const { colors } = aggregateDesignTokens(objects);

		expect(colors).toHaveLength(10);
		expect(colors[0]).toEqual(["fill_color-11", 2]);
		expect(colors[1]).toEqual(["fill_color-0", 1]);
		expect(colors[9]).toEqual(["fill_color-8", 1]);
	});
});
