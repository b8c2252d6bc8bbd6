/**
 * Per-component scoring: reusability, complexity, usage pattern,
 * accessibility hints and the property snapshot.
 */

import type {
	AccessibilityFeature,
	ComponentProperties,
	DesignObject,
	UsagePattern,
} from "./types/index.js";

/** Instance count at which reusability saturates. */
const REUSE_SATURATION = 10;

/** Reusability assigned to objects detected on their own. */
export const SINGLE_OBJECT_REUSABILITY = 0.1;

export function calculateReusabilityScore(instanceCount: number): number {
	return Math.min(instanceCount / REUSE_SATURATION, 1.0);
}

/** 0.1 base, +0.1 per child, +0.05 per extra property, capped at 1. */
export function calculateComplexityScore(
	object: Pick<DesignObject, "children" | "properties">,
): number {
	const childCount = object.children.length;
	const propertyCount = Object.keys(object.properties).length;
	return Math.min(0.1 + childCount * 0.1 + propertyCount * 0.05, 1.0);
}

export function determineUsagePattern(instanceCount: number): UsagePattern {
	if (instanceCount > 10) return "heavily_reused";
	if (instanceCount > 3) return "moderately_reused";
	if (instanceCount > 1) return "lightly_reused";
	return "single_use";
}

/**
 * Naming and visibility hints only. A hit here says nothing about whether
 * the rendered component is actually accessible.
 */
export function detectAccessibilityFeatures(
	object: Pick<DesignObject, "name" | "visible">,
): AccessibilityFeature[] {
	const features: AccessibilityFeature[] = [];
	const name = object.name.toLowerCase();

	if (name.includes("alt") || name.includes("aria")) {
		features.push("aria_labels");
	}
	if (name.includes("role")) {
		features.push("semantic_roles");
	}
	if (name.includes("focus")) {
		features.push("focus_management");
	}
	if (object.visible === false) {
		features.push("screen_reader_only");
	}

	return features;
}

export function extractComponentProperties(
	object: DesignObject,
): ComponentProperties {
	return {
		type: object.type,
		width: object.width,
		height: object.height,
		name: object.name,
		visible: object.visible,
		locked: object.locked,
		hasChildren: object.children.length > 0,
		position: { x: object.x, y: object.y },
	};
}
