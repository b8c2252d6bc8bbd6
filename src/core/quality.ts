/**
 * Component quality assessment
 *
 * overall = mean(average reusability, naming consistency, maturity,
 * accessibility coverage), graded A-F in steps of 0.1 from 0.9 down.
 */

import { average, share } from "./stats.js";
import type {
	DesignSystemReport,
	DetectedComponent,
	QualityAssessment,
	QualityGrade,
	QualityThresholds,
} from "./types/index.js";

const GRADE_STEPS: ReadonlyArray<[number, QualityGrade]> = [
	[0.9, "A"],
	[0.8, "B"],
	[0.7, "C"],
	[0.6, "D"],
];

export function calculateQualityGrade(score: number): QualityGrade {
	for (const [minimum, grade] of GRADE_STEPS) {
		if (score >= minimum) return grade;
	}
	return "F";
}

export function assessComponentQuality(
	components: readonly DetectedComponent[],
	designSystem: Pick<DesignSystemReport, "consistencyScore" | "maturityScore">,
): QualityAssessment {
	if (components.length === 0) {
		return {
			overallScore: 0,
			reusabilityScore: 0,
			consistencyScore: 0,
			maturityScore: 0,
			accessibilityCoverage: 0,
			qualityGrade: "F",
		};
	}

	const reusabilityScore = average(components.map((c) => c.reusabilityScore));
	const { consistencyScore, maturityScore } = designSystem;
	const accessibilityCoverage = share(
		components,
		(c) => c.accessibilityFeatures.length > 0,
	);
	const overallScore = average([
		reusabilityScore,
		consistencyScore,
		maturityScore,
		accessibilityCoverage,
	]);

	return {
		overallScore,
		reusabilityScore,
		consistencyScore,
		maturityScore,
		accessibilityCoverage,
		qualityGrade: calculateQualityGrade(overallScore),
	};
}

/**
 * Threshold-triggered messages in fixed order (overall, reusability,
 * accessibility), then the design-system recommendations when maturity is
 * below its threshold.
 */
export function generateComponentRecommendations(
	quality: QualityAssessment,
	designSystem: Pick<DesignSystemReport, "maturityScore" | "recommendations">,
	thresholds: QualityThresholds,
): string[] {
	const recommendations: string[] = [];

	if (quality.overallScore < thresholds.overall) {
		recommendations.push(
			"Component quality is below recommended threshold - focus on improving reusability and consistency",
		);
	}

	if (quality.reusabilityScore < thresholds.reusability) {
		recommendations.push(
			"Low component reusability detected - consider consolidating similar components",
		);
	}

	if (quality.accessibilityCoverage < thresholds.accessibility) {
		recommendations.push(
			"Improve accessibility features across components - consider adding ARIA labels and semantic roles",
		);
	}

	if (designSystem.maturityScore < thresholds.maturity) {
		recommendations.push(...designSystem.recommendations);
	}

	return recommendations;
}
