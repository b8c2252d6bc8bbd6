/**
 * Cross-component pattern analysis: type frequencies, reusability and
 * complexity distributions, naming patterns and tier distribution.
 */

import { analyzeNamingPatterns } from "./naming.js";
import { average, countBy, share } from "./stats.js";
import { rankCounts } from "./tokens.js";
import type {
	AtomicCategory,
	ComplexityAnalysis,
	ComponentPatterns,
	DetectedComponent,
	ReusabilityDistribution,
} from "./types/index.js";

const MOST_COMMON_TYPES = 5;
const MOST_COMPLEX = 3;

export function calculateReusabilityDistribution(
	components: readonly DetectedComponent[],
): ReusabilityDistribution {
	const scores = components.map((c) => c.reusabilityScore);
	return {
		highReusability: share(scores, (s) => s > 0.7),
		mediumReusability: share(scores, (s) => s >= 0.3 && s <= 0.7),
		lowReusability: share(scores, (s) => s < 0.3),
		averageReusability: average(scores),
	};
}

export function analyzeComplexityPatterns(
	components: readonly DetectedComponent[],
): ComplexityAnalysis {
	const scores = components.map((c) => c.complexityScore);
	const mostComplex = [...components]
		.sort((a, b) => b.complexityScore - a.complexityScore)
		.slice(0, MOST_COMPLEX);

	return {
		averageComplexity: average(scores),
		complexityDistribution: {
			simple: share(scores, (s) => s < 0.3),
			moderate: share(scores, (s) => s >= 0.3 && s <= 0.7),
			complex: share(scores, (s) => s > 0.7),
		},
		mostComplexComponents: mostComplex.map((c) => ({
			id: c.id,
			name: c.name,
			complexityScore: c.complexityScore,
		})),
	};
}

/** Component count per tier, in first-seen order. */
export function countByCategory(
	components: readonly DetectedComponent[],
): Partial<Record<AtomicCategory, number>> {
	const distribution: Partial<Record<AtomicCategory, number>> = {};
	for (const [category, count] of countBy(components, (c) => c.category)) {
		distribution[category] = count;
	}
	return distribution;
}

export function analyzeComponentPatterns(
	components: readonly DetectedComponent[],
): ComponentPatterns {
	return {
		mostCommonTypes: rankCounts(
			countBy(components, (c) => c.componentType),
			MOST_COMMON_TYPES,
		),
		reusabilityDistribution: calculateReusabilityDistribution(components),
		complexityAnalysis: analyzeComplexityPatterns(components),
		namingPatterns: analyzeNamingPatterns(components.map((c) => c.name)),
		categoryDistribution: countByCategory(components),
	};
}
