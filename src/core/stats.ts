/**
 * Small numeric helpers shared by the aggregate analyzers. Every ratio
 * guards its denominator: an empty corpus scores 0.
 */

export function average(values: readonly number[]): number {
	if (values.length === 0) return 0;
	return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Share of `items` satisfying `predicate`; 0 for an empty list. */
export function share<T>(
	items: readonly T[],
	predicate: (item: T) => boolean,
): number {
	if (items.length === 0) return 0;
	return items.filter(predicate).length / items.length;
}

/** Occurrence counts in first-seen order. */
export function countBy<T, K>(
	items: readonly T[],
	keyOf: (item: T) => K,
): Map<K, number> {
	const counts = new Map<K, number>();
	for (const item of items) {
		const key = keyOf(item);
		counts.set(key, (counts.get(key) ?? 0) + 1);
	}
	return counts;
}
