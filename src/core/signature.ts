/**
 * Object signatures and grouping
 *
 * A signature is a deliberately fuzzy key: objects that differ only by a
 * numeric suffix or by a few pixels of size collapse onto the same key.
 */

import { objectKey } from "./document.js";
import { matchesNamePattern, matchesTypePattern } from "./registry.js";
import type { DesignObject, SignatureRegistry } from "./types/index.js";

export interface ObjectGroup {
	signature: string;
	objects: DesignObject[];
}

export interface GroupingResult {
	/** Groups that qualify as component candidates, in first-seen order. */
	candidates: ObjectGroup[];
	/** Objects not claimed by any candidate group, in collection order. */
	unclaimed: DesignObject[];
	/** Keys (see `objectKey`) of every object owned by a candidate group. */
	claimed: ReadonlySet<string>;
}

/** Lower-case, decimal digit runs (any script) → `N`, separator runs → `_`. */
export function normalizeName(name: string): string {
	return name
		.toLowerCase()
		.replace(/\p{Nd}+/gu, "N")
		.replace(/[_-]+/g, "_");
}

export function createObjectSignature(object: DesignObject): string {
	return [
		object.type,
		normalizeName(object.name),
		Math.floor(object.width / 10),
		Math.floor(object.height / 10),
	].join("_");
}

/**
 * True when a lone object still looks like a component: its name contains
 * any registry name pattern, or its type is any registry type pattern.
 */
export function hasComponentCharacteristics(
	object: DesignObject,
	registry: SignatureRegistry,
): boolean {
	const lowerName = object.name.toLowerCase();
	return registry.some(
		(signature) =>
			matchesNamePattern(signature, lowerName) ||
			matchesTypePattern(signature, object.type),
	);
}

/**
 * Cluster objects by signature and keep the groups that qualify as
 * component candidates: more than one member, or a representative with
 * component characteristics.
 */
export function groupSimilarObjects(
	objects: readonly DesignObject[],
	registry: SignatureRegistry,
): GroupingResult {
	const groups = new Map<string, DesignObject[]>();
	for (const object of objects) {
		const signature = createObjectSignature(object);
		const members = groups.get(signature);
		if (members) {
			members.push(object);
		} else {
			groups.set(signature, [object]);
		}
	}

	const candidates: ObjectGroup[] = [];
	const claimed = new Set<string>();
	for (const [signature, members] of groups) {
		const qualifies =
			members.length > 1 ||
			hasComponentCharacteristics(members[0], registry);
		if (!qualifies) continue;

		candidates.push({ signature, objects: members });
		for (const member of members) {
			claimed.add(objectKey(member.context));
		}
	}

	const unclaimed = objects.filter(
		(object) => !claimed.has(objectKey(object.context)),
	);

	return { candidates, unclaimed, claimed };
}
