/**
 * Document Collection Tests
 *
 * Validates flattening of the files → pages → objects export, provenance
 * tagging, iteration order and field defaults.
 */

import {
	collectObjects,
	normalizeDesignObject,
	objectKey,
} from "../../src/core/document";
import { makeContext } from "../helpers/fixtures";

describe("collectObjects", () => {
	it("returns no objects for an empty document", () => {
		expect(collectObjects({})).toEqual([]);
	});

	it("treats missing or malformed containers as empty", () => {
		expect(collectObjects(null)).toEqual([]);
		expect(collectObjects({ files: null })).toEqual([]);
		expect(collectObjects({ files: { "file-a": {} } })).toEqual([]);
		expect(
			collectObjects({ files: { "file-a": { pages: { "page-a": {} } } } }),
		).toEqual([]);
		expect(collectObjects({ files: ["not", "a", "map"] })).toEqual([]);
	});

	it("preserves file × page × object order and attaches provenance", () => {
		const document = {
			files: {
				"file-a": {
					pages: {
						"page-a": { objects: { "obj-a": { type: "group" }, "obj-b": { type: "text" } } },
						"page-b": { objects: { "obj-c": { type: "rectangle" } } },
					},
				},
				"file-b": {
					pages: {
						"page-a": { objects: { "obj-d": { type: "image" } } },
					},
				},
			},
		};

		const objects = collectObjects(document);

		expect(objects.map((o) => o.type)).toEqual([
			"group",
			"text",
			"rectangle",
			"image",
		]);
		expect(objects.map((o) => o.context)).toEqual([
			{ file_id: "file-a", page_id: "page-a", object_id: "obj-a" },
			{ file_id: "file-a", page_id: "page-a", object_id: "obj-b" },
			{ file_id: "file-a", page_id: "page-b", object_id: "obj-c" },
			{ file_id: "file-b", page_id: "page-a", object_id: "obj-d" },
		]);
	});

	it("does not deduplicate identical objects", () => {
		const raw = { type: "rectangle", name: "btn", width: 10, height: 10 };
		const objects = collectObjects({
			files: { f: { pages: { p: { objects: { "obj-a": raw, "obj-b": raw } } } } },
		});
		expect(objects).toHaveLength(2);
	});

	it("leaves the input document untouched", () => {
		const document = {
			files: {
				f: {
					pages: {
						p: { objects: { "obj-a": { type: "text", name: "Title", fill: "#111" } } },
					},
				},
			},
		};
		const before = JSON.stringify(document);
		collectObjects(document);
		expect(JSON.stringify(document)).toBe(before);
	});
});

describe("normalizeDesignObject", () => {
	const context = makeContext("obj-1");

	it("fills absent fields with defaults", () => {
		const object = normalizeDesignObject({ type: "rectangle" }, context);

		expect(object).toEqual({
			type: "rectangle",
			name: "",
			width: 0,
			height: 0,
			x: 0,
			y: 0,
			children: [],
			visible: true,
			locked: false,
			properties: {},
			context,
		});
	});

	it("replaces mistyped fields with defaults instead of throwing", () => {
		const object = normalizeDesignObject(
			{ type: 5, name: null, width: "120", visible: "no", children: "abc" },
			context,
		);

		expect(object.type).toBe("");
		expect(object.name).toBe("");
		expect(object.width).toBe(0);
		expect(object.visible).toBe(true);
		expect(object.children).toEqual([]);
	});

	it("normalizes a non-object entry to an empty object", () => {
		const object = normalizeDesignObject(null, context);
		expect(object.type).toBe("");
		expect(object.context).toBe(context);
	});

	it("keeps style fields only when the source carries them", () => {
		const object = normalizeDesignObject(
			{ type: "rectangle", fill: "#ff0000", shadow: null },
			context,
		);

		expect(Object.hasOwn(object, "fill")).toBe(true);
		expect(object.fill).toBe("#ff0000");
		expect(Object.hasOwn(object, "shadow")).toBe(true);
		expect(object.shadow).toBeNull();
		expect(Object.hasOwn(object, "stroke")).toBe(false);
		expect(Object.hasOwn(object, "blur")).toBe(false);
	});

	it("keeps the extra properties map and drops unknown keys", () => {
		const object = normalizeDesignObject(
			{ type: "group", properties: { radius: 4 }, opacity: 0.5 },
			context,
		);

		expect(object.properties).toEqual({ radius: 4 });
		expect(Object.hasOwn(object, "opacity")).toBe(false);
	});
});

describe("objectKey", () => {
	it("distinguishes equal object ids on different pages", () => {
		const a = objectKey(makeContext("1", { page_id: "page-1" }));
		const b = objectKey(makeContext("1", { page_id: "page-2" }));
		expect(a).not.toBe(b);
	});
});
