/**
 * Builders shared by the detection test suites.
 */

import type {
	DesignObject,
	DetectedComponent,
	ObjectContext,
} from "../../src/core/types/index";

export function makeContext(
	objectId: string,
	overrides: Partial<ObjectContext> = {},
): ObjectContext {
	return { file_id: "file-1", page_id: "page-1", object_id: objectId, ...overrides };
}

export function makeObject(overrides: Partial<DesignObject> = {}): DesignObject {
	return {
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
		context: makeContext("obj-1"),
		...overrides,
	};
}

export function makeComponent(
	overrides: Partial<DetectedComponent> = {},
): DetectedComponent {
	return {
		id: "component-1",
		name: "Button",
		componentType: "button",
		category: "atoms",
		instances: [makeContext("obj-1")],
		properties: {
			type: "rectangle",
			width: 0,
			height: 0,
			name: "button",
			visible: true,
			locked: false,
			hasChildren: false,
			position: { x: 0, y: 0 },
		},
		usagePattern: "single_use",
		reusabilityScore: 0.1,
		complexityScore: 0.1,
		designTokens: { spacing: { width: 0, height: 0 } },
		relationships: [],
		accessibilityFeatures: [],
		...overrides,
	};
}

/** Single-file, single-page export holding the given raw objects. */
export function makeDocument(
	objects: Record<string, Record<string, unknown>>,
): Record<string, unknown> {
	return {
		files: {
			"file-1": {
				pages: {
					"page-1": { objects },
				},
			},
		},
	};
}

/** Deterministic id factory: component-1, component-2, ... */
export function sequentialIds(prefix = "component"): () => string {
	let next = 0;
	return () => {
		next += 1;
		return `${prefix}-${next}`;
	};
}
