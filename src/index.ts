/**
 * design-catalog
 *
 * Detects reusable UI components in a design-document export and scores
 * them as a design system.
 */

export {
	ConfigValidationError,
	DEFAULT_CONFIG,
	getConfig,
	mergeConfig,
	validateConfig,
} from "./config.js";
export type { DetectorConfigOverrides } from "./config.js";
export { createChildLogger, createLogger, logger } from "./logger.js";
export type { LogLevel } from "./logger.js";

export { analyzeDesignDocument } from "./core/engine.js";
export type { AnalyzeOptions } from "./core/engine.js";
export { collectObjects, normalizeDesignObject } from "./core/document.js";
export type { DesignDocumentInput } from "./core/document.js";
export {
	DEFAULT_DESIGN_CATEGORIES,
	DEFAULT_SIGNATURE_REGISTRY,
} from "./core/registry.js";
export {
	createObjectSignature,
	groupSimilarObjects,
	hasComponentCharacteristics,
	normalizeName,
} from "./core/signature.js";
export type { GroupingResult, ObjectGroup } from "./core/signature.js";
export {
	categorizeComponent,
	classifyComponentType,
	matchSignatureByName,
	scoreSignature,
	suggestComponentName,
} from "./core/classifier.js";
export {
	calculateComplexityScore,
	calculateReusabilityScore,
	detectAccessibilityFeatures,
	determineUsagePattern,
} from "./core/scorer.js";
export {
	aggregateDesignTokens,
	extractObjectDesignTokens,
} from "./core/tokens.js";
export {
	analyzeIndividualObject,
	analyzeObjectGroup,
	detectComponents,
} from "./core/detector.js";
export type { DetectionOptions } from "./core/detector.js";
export { analyzeComponentPatterns } from "./core/patterns.js";
export { analyzeNamingPatterns, getCasePattern } from "./core/naming.js";
export {
	analyzeDesignSystem,
	analyzeReusability,
	generateComponentCatalog,
} from "./core/design-system.js";
export {
	assessComponentQuality,
	calculateQualityGrade,
	generateComponentRecommendations,
} from "./core/quality.js";

export * from "./core/types/index.js";
