/**
 * Component classification
 *
 * Assigns a component type, an atomic-design tier and a display name.
 * Registry entries are scored in order and the first entry at or over its
 * confidence threshold wins, even if a later entry would score higher.
 */

import { matchesNamePattern, matchesTypePattern } from "./registry.js";
import type {
	AtomicCategory,
	ComponentSignatureDef,
	DesignCategoryTable,
	DesignObject,
	SignatureRegistry,
} from "./types/index.js";
import { ATOMIC_CATEGORIES, DEFAULT_CATEGORY } from "./types/index.js";

const NAME_MATCH_WEIGHT = 0.4;
const TYPE_MATCH_WEIGHT = 0.3;

/** Substring fallbacks tried when no registry entry reaches its threshold. */
const FALLBACK_CASCADE: ReadonlyArray<{
	substrings: readonly string[];
	componentType: string;
}> = [
	{ substrings: ["button", "btn"], componentType: "button" },
	{ substrings: ["input", "field"], componentType: "input" },
	{ substrings: ["card", "panel"], componentType: "card" },
];

const LEADING_PREFIX_RE = /^(v\d+[-_]?|component[-_]?|comp[-_]?)/i;
const TRAILING_NUMBER_RE = /[-_]\d+$/;

/** Confidence of one registry entry for an object. */
export function scoreSignature(
	signature: ComponentSignatureDef,
	object: Pick<DesignObject, "name" | "type">,
): number {
	let score = 0;
	if (matchesNamePattern(signature, object.name.toLowerCase())) {
		score += NAME_MATCH_WEIGHT;
	}
	if (matchesTypePattern(signature, object.type)) {
		score += TYPE_MATCH_WEIGHT;
	}
	return score;
}

export function classifyComponentType(
	object: Pick<DesignObject, "name" | "type">,
	registry: SignatureRegistry,
): string {
	for (const signature of registry) {
		if (scoreSignature(signature, object) >= signature.confidenceThreshold) {
			return signature.name;
		}
	}

	const lowerName = object.name.toLowerCase();
	for (const fallback of FALLBACK_CASCADE) {
		if (fallback.substrings.some((s) => lowerName.includes(s))) {
			return fallback.componentType;
		}
	}

	return object.type || "component";
}

/**
 * First registry entry whose name patterns appear in the name. Used for
 * objects that were not claimed by any candidate group.
 */
export function matchSignatureByName(
	name: string,
	registry: SignatureRegistry,
): ComponentSignatureDef | undefined {
	const lowerName = name.toLowerCase();
	return registry.find((signature) => matchesNamePattern(signature, lowerName));
}

export function categorizeComponent(
	componentType: string,
	designCategories: DesignCategoryTable,
): AtomicCategory {
	for (const category of ATOMIC_CATEGORIES) {
		if (designCategories[category].includes(componentType)) {
			return category;
		}
	}
	return DEFAULT_CATEGORY;
}

/**
 * Title-case every run of letters: first letter upper, rest lower.
 * "nav item" → "Nav Item", "search-bar" → "Search-Bar", "2col" → "2Col".
 */
export function toTitleCase(value: string): string {
	return value.replace(
		/\p{L}+/gu,
		(word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
	);
}

/**
 * Clean an object name into a display name. Strips a leading version or
 * "component"/"comp" prefix and a trailing numeric suffix; falls back to the
 * component type when fewer than two characters remain.
 */
export function suggestComponentName(
	originalName: string,
	componentType: string,
): string {
	const cleaned = originalName
		.replace(LEADING_PREFIX_RE, "")
		.replace(TRAILING_NUMBER_RE, "");

	if (cleaned.length < 2) {
		return toTitleCase(componentType);
	}

	return toTitleCase(cleaned.replace(/_/g, " ").replace(/-/g, " "));
}
