/**
 * Component detection
 *
 * Two passes over the collected objects:
 *   1. candidate groups (see `groupSimilarObjects`) become one component
 *      each, classified through their representative (first member);
 *   2. objects no group claimed are matched one by one against the
 *      registry's name patterns and become single-use components.
 * Every object ends up in at most one component.
 */

import { nanoid } from "nanoid";
import {
	categorizeComponent,
	classifyComponentType,
	matchSignatureByName,
	suggestComponentName,
} from "./classifier.js";
import {
	SINGLE_OBJECT_REUSABILITY,
	calculateComplexityScore,
	calculateReusabilityScore,
	detectAccessibilityFeatures,
	determineUsagePattern,
	extractComponentProperties,
} from "./scorer.js";
import type { ObjectGroup } from "./signature.js";
import { groupSimilarObjects } from "./signature.js";
import { extractObjectDesignTokens } from "./tokens.js";
import type {
	DesignCategoryTable,
	DesignObject,
	DetectedComponent,
	SignatureRegistry,
} from "./types/index.js";

/** Components are frozen once built, down to their lists. */
function freezeComponent(component: DetectedComponent): DetectedComponent {
	return Object.freeze({
		...component,
		instances: Object.freeze(component.instances.map((c) => Object.freeze(c))),
		relationships: Object.freeze([...component.relationships]),
		accessibilityFeatures: Object.freeze([...component.accessibilityFeatures]),
	});
}

export interface DetectionOptions {
	registry: SignatureRegistry;
	designCategories: DesignCategoryTable;
	/** Produces opaque component ids. Defaults to nanoid. */
	createId?: () => string;
}

/** Build the component for a candidate group. */
export function analyzeObjectGroup(
	group: ObjectGroup,
	options: DetectionOptions,
): DetectedComponent {
	const createId = options.createId ?? nanoid;
	const representative = group.objects[0];
	const instanceCount = group.objects.length;
	const componentType = classifyComponentType(
		representative,
		options.registry,
	);

	return freezeComponent({
		id: createId(),
		name: suggestComponentName(representative.name, componentType),
		componentType,
		category: categorizeComponent(componentType, options.designCategories),
		instances: group.objects.map((object) => ({ ...object.context })),
		properties: extractComponentProperties(representative),
		usagePattern: determineUsagePattern(instanceCount),
		reusabilityScore: calculateReusabilityScore(instanceCount),
		complexityScore: calculateComplexityScore(representative),
		designTokens: extractObjectDesignTokens(representative),
		relationships: [],
		accessibilityFeatures: detectAccessibilityFeatures(representative),
	});
}

/**
 * Build a single-use component for an unclaimed object, or `undefined`
 * when no registry name pattern matches it.
 */
export function analyzeIndividualObject(
	object: DesignObject,
	options: DetectionOptions,
): DetectedComponent | undefined {
	const signature = matchSignatureByName(object.name, options.registry);
	if (!signature) return undefined;

	const createId = options.createId ?? nanoid;
	const componentType = signature.name;

	return freezeComponent({
		id: createId(),
		name: suggestComponentName(object.name.toLowerCase(), componentType),
		componentType,
		category: categorizeComponent(componentType, options.designCategories),
		instances: [{ ...object.context }],
		properties: extractComponentProperties(object),
		usagePattern: "single_use",
		reusabilityScore: SINGLE_OBJECT_REUSABILITY,
		complexityScore: calculateComplexityScore(object),
		designTokens: extractObjectDesignTokens(object),
		relationships: [],
		accessibilityFeatures: detectAccessibilityFeatures(object),
	});
}

export function detectComponents(
	objects: readonly DesignObject[],
	options: DetectionOptions,
): DetectedComponent[] {
	const { candidates, unclaimed } = groupSimilarObjects(
		objects,
		options.registry,
	);

	const components = candidates.map((group) =>
		analyzeObjectGroup(group, options),
	);

	for (const object of unclaimed) {
		const component = analyzeIndividualObject(object, options);
		if (component) components.push(component);
	}

	return components;
}
