/**
 * Design system analysis
 *
 * Measures how complete and mature the detected component set is as a
 * design system: atomic-design tier coverage, naming consistency,
 * reusability, token coverage and the catalog grouped by tier.
 *
 * Maturity = mean(tier coverage, average reusability, naming consistency).
 */

import { calculateNamingConsistency, countDistinctFirstWords } from "./naming.js";
import { countByCategory } from "./patterns.js";
import { average, countBy } from "./stats.js";
import type {
	AtomicCategory,
	ComponentCatalog,
	ComponentPatterns,
	DesignSystemReport,
	DetectedComponent,
	ReusabilityAnalysis,
	TokenCategory,
} from "./types/index.js";
import { ATOMIC_CATEGORIES, TOKEN_CATEGORIES } from "./types/index.js";

/** Below this a component counts as poorly reusable. */
const LOW_REUSE = 0.3;
/** Above this a component counts as highly reusable. */
const HIGH_REUSE = 0.7;
/** Distinct first words above this share of components means naming drift. */
const NAMING_DRIFT_RATIO = 0.7;

/** Tiers present among the components, in tier order. */
export function findCategories(
	components: readonly DetectedComponent[],
): AtomicCategory[] {
	const present = new Set(components.map((c) => c.category));
	return ATOMIC_CATEGORIES.filter((category) => present.has(category));
}

export function calculateDesignSystemMaturity(
	components: readonly DetectedComponent[],
	namingConsistency: number,
): number {
	const coverage = findCategories(components).length / ATOMIC_CATEGORIES.length;
	const reusability = average(components.map((c) => c.reusabilityScore));
	return average([coverage, reusability, namingConsistency]);
}

/** Token categories present on each component's token snapshot. */
export function tokenCategoriesOf(
	component: DetectedComponent,
): TokenCategory[] {
	return TOKEN_CATEGORIES.filter(
		(category) => component.designTokens[category] !== undefined,
	);
}

export function analyzeDesignTokenCoverage(
	components: readonly DetectedComponent[],
): Partial<Record<TokenCategory, number>> {
	const coverage: Partial<Record<TokenCategory, number>> = {};
	if (components.length === 0) return coverage;

	const counts = countBy(components.flatMap(tokenCategoriesOf), (c) => c);
	for (const [category, count] of counts) {
		coverage[category] = count / components.length;
	}
	return coverage;
}

export function generateDesignSystemRecommendations(
	components: readonly DetectedComponent[],
	missingCategories: readonly AtomicCategory[],
): string[] {
	const recommendations: string[] = [];

	if (missingCategories.length > 0) {
		recommendations.push(
			`Consider developing ${missingCategories.join(", ")} components to complete atomic design hierarchy`,
		);
	}

	const lowReuse = components.filter((c) => c.reusabilityScore < LOW_REUSE);
	if (lowReuse.length > 0) {
		recommendations.push(
			`Review ${lowReuse.length} components with low reusability scores`,
		);
	}

	const distinctFirstWords = countDistinctFirstWords(
		components.map((c) => c.name),
	);
	if (distinctFirstWords > components.length * NAMING_DRIFT_RATIO) {
		recommendations.push(
			"Establish consistent naming conventions for components",
		);
	}

	return recommendations;
}

export function analyzeDesignSystem(
	components: readonly DetectedComponent[],
	patterns?: Pick<ComponentPatterns, "namingPatterns">,
): DesignSystemReport {
	const categoriesFound = findCategories(components);
	const missingCategories = ATOMIC_CATEGORIES.filter(
		(category) => !categoriesFound.includes(category),
	);
	const namingConsistency =
		patterns?.namingPatterns.namingConsistency ??
		calculateNamingConsistency(components.map((c) => c.name));

	return {
		categoriesFound,
		missingCategories,
		maturityScore: calculateDesignSystemMaturity(components, namingConsistency),
		componentDistribution: countByCategory(components),
		designTokenCoverage: analyzeDesignTokenCoverage(components),
		namingConsistency,
		consistencyScore: namingConsistency,
		recommendations: generateDesignSystemRecommendations(
			components,
			missingCategories,
		),
	};
}

/** Suggest unifying components that share both type and tier. */
export function identifyReuseOpportunities(
	components: readonly DetectedComponent[],
): string[] {
	const groups = countBy(components, (c) => `${c.componentType}_${c.category}`);
	const opportunities: string[] = [];
	for (const [key, count] of groups) {
		if (count > 1) {
			opportunities.push(
				`Consider unifying ${count} similar ${key.replace(/_/g, " ")} components`,
			);
		}
	}
	return opportunities;
}

export function analyzeReusability(
	components: readonly DetectedComponent[],
): ReusabilityAnalysis {
	return {
		averageReusability: average(components.map((c) => c.reusabilityScore)),
		highlyReusable: components
			.filter((c) => c.reusabilityScore > HIGH_REUSE)
			.map((c) => c.name),
		poorlyReusable: components
			.filter((c) => c.reusabilityScore < LOW_REUSE)
			.map((c) => c.name),
		reuseOpportunities: identifyReuseOpportunities(components),
	};
}

export function generateComponentCatalog(
	components: readonly DetectedComponent[],
	designSystem: Pick<DesignSystemReport, "categoriesFound">,
): ComponentCatalog {
	const catalog: ComponentCatalog = {};
	for (const category of designSystem.categoriesFound) {
		catalog[category] = components
			.filter((c) => c.category === category)
			.map((c) => ({
				name: c.name,
				type: c.componentType,
				instances: c.instances.length,
				reusabilityScore: c.reusabilityScore,
				complexityScore: c.complexityScore,
				designTokens: tokenCategoriesOf(c),
				accessibilityFeatures: [...c.accessibilityFeatures],
			}));
	}
	return catalog;
}
