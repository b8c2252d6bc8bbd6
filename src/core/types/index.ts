/**
 * Type definitions for the component detection pipeline
 *
 * Input shapes keep the wire names of the design-document export
 * (`file_id`, `font_family`, ...). Everything the pipeline produces uses
 * camelCase fields.
 */

// ---------------------------------------------------------------------------
// Input document
// ---------------------------------------------------------------------------

/** Provenance of one design object inside the export. */
export interface ObjectContext {
	file_id: string;
	page_id: string;
	object_id: string;
}

/** Style fields that feed design-token extraction. */
export const STYLE_FIELDS = [
	"fill",
	"stroke",
	"font_family",
	"font_size",
	"font_weight",
	"line_height",
	"shadow",
	"blur",
] as const;

export type StyleField = (typeof STYLE_FIELDS)[number];

/**
 * A normalized design object. Style values are arbitrary JSON values and
 * are only present when the source object carried the key.
 */
export interface DesignObject extends Partial<Record<StyleField, unknown>> {
	type: string;
	name: string;
	width: number;
	height: number;
	x: number;
	y: number;
	children: string[];
	visible: boolean;
	locked: boolean;
	properties: Record<string, unknown>;
	context: ObjectContext;
}

// ---------------------------------------------------------------------------
// Static configuration
// ---------------------------------------------------------------------------

export const ATOMIC_CATEGORIES = [
	"atoms",
	"molecules",
	"organisms",
	"templates",
	"pages",
] as const;

export type AtomicCategory = (typeof ATOMIC_CATEGORIES)[number];

/** Fallback tier for component types the atomic-design table does not list. */
export const DEFAULT_CATEGORY: AtomicCategory = "molecules";

/** Component types per atomic-design tier. */
export type DesignCategoryTable = Readonly<
	Record<AtomicCategory, readonly string[]>
>;

/** One registry entry used to recognize a component type. */
export interface ComponentSignatureDef {
	/** Component type assigned when this entry wins. */
	name: string;
	/** Substrings matched against the lower-cased object name. */
	namePatterns: readonly string[];
	/** Structural object types. */
	typePatterns: readonly string[];
	/** Informational only; not scored. */
	propertyPatterns: Readonly<Record<string, unknown>>;
	/** Informational only; not scored. */
	structuralPatterns: readonly string[];
	confidenceThreshold: number;
}

/** Ordered registry. Order decides which entry wins a classification. */
export type SignatureRegistry = readonly ComponentSignatureDef[];

export interface QualityThresholds {
	overall: number;
	reusability: number;
	accessibility: number;
	maturity: number;
}

export interface DetectorConfig {
	registry: SignatureRegistry;
	designCategories: DesignCategoryTable;
	qualityThresholds: QualityThresholds;
}

// ---------------------------------------------------------------------------
// Detection output
// ---------------------------------------------------------------------------

export type UsagePattern =
	| "heavily_reused"
	| "moderately_reused"
	| "lightly_reused"
	| "single_use";

export type AccessibilityFeature =
	| "aria_labels"
	| "semantic_roles"
	| "focus_management"
	| "screen_reader_only";

/** Snapshot of the representative object's salient fields. */
export interface ComponentProperties {
	type: string;
	width: number;
	height: number;
	name: string;
	visible: boolean;
	locked: boolean;
	hasChildren: boolean;
	position: { x: number; y: number };
}

/** Design tokens carried by a single object. */
export interface ObjectDesignTokens {
	colors?: { fill?: unknown; stroke?: unknown };
	typography?: {
		font_family: unknown;
		font_size: unknown;
		font_weight: unknown;
		line_height: unknown;
	};
	spacing: { width: number; height: number };
	effects?: { shadow: unknown; blur: unknown };
}

export type TokenCategory = "colors" | "typography" | "spacing" | "effects";

export const TOKEN_CATEGORIES: readonly TokenCategory[] = [
	"colors",
	"typography",
	"spacing",
	"effects",
];

/** Immutable once produced; the detector freezes every instance. */
export interface DetectedComponent {
	readonly id: string;
	readonly name: string;
	readonly componentType: string;
	readonly category: AtomicCategory;
	readonly instances: readonly Readonly<ObjectContext>[];
	readonly properties: ComponentProperties;
	readonly usagePattern: UsagePattern;
	readonly reusabilityScore: number; // 0-1
	readonly complexityScore: number; // 0-1
	readonly designTokens: ObjectDesignTokens;
	readonly relationships: readonly string[];
	readonly accessibilityFeatures: readonly AccessibilityFeature[];
}

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

/** `[key, count]` pairs, most frequent first. */
export type RankedCounts = Array<[string, number]>;

export type DesignTokenAggregate = Record<TokenCategory, RankedCounts>;

export interface ReusabilityDistribution {
	highReusability: number;
	mediumReusability: number;
	lowReusability: number;
	averageReusability: number;
}

export interface ComplexityAnalysis {
	averageComplexity: number;
	complexityDistribution: {
		simple: number;
		moderate: number;
		complex: number;
	};
	mostComplexComponents: Array<{
		id: string;
		name: string;
		complexityScore: number;
	}>;
}

export type CasePattern =
	| "UPPER_CASE"
	| "lower_case"
	| "snake_case"
	| "kebab-case"
	| "camelCase"
	| "unknown";

export interface NamingPatterns {
	namingConsistency: number;
	commonPrefixes: RankedCounts;
	commonSuffixes: RankedCounts;
	namingConventions: CasePattern[];
}

export interface ComponentPatterns {
	mostCommonTypes: RankedCounts;
	reusabilityDistribution: ReusabilityDistribution;
	complexityAnalysis: ComplexityAnalysis;
	namingPatterns: NamingPatterns;
	categoryDistribution: Partial<Record<AtomicCategory, number>>;
}

export interface DesignSystemReport {
	categoriesFound: AtomicCategory[];
	missingCategories: AtomicCategory[];
	maturityScore: number;
	componentDistribution: Partial<Record<AtomicCategory, number>>;
	designTokenCoverage: Partial<Record<TokenCategory, number>>;
	namingConsistency: number;
	consistencyScore: number;
	recommendations: string[];
}

export interface ReusabilityAnalysis {
	averageReusability: number;
	highlyReusable: string[];
	poorlyReusable: string[];
	reuseOpportunities: string[];
}

export interface CatalogEntry {
	name: string;
	type: string;
	instances: number;
	reusabilityScore: number;
	complexityScore: number;
	designTokens: TokenCategory[];
	accessibilityFeatures: AccessibilityFeature[];
}

export type ComponentCatalog = Partial<Record<AtomicCategory, CatalogEntry[]>>;

export type QualityGrade = "A" | "B" | "C" | "D" | "F";

export interface QualityAssessment {
	overallScore: number;
	reusabilityScore: number;
	consistencyScore: number;
	maturityScore: number;
	accessibilityCoverage: number;
	qualityGrade: QualityGrade;
}

export interface AnalysisSummary {
	totalObjectsAnalyzed: number;
	componentsDetected: number;
	componentTypes: number;
	designSystemCoverage: number;
	reusabilityScore: number;
}

/** Complete catalog handed to report generators. */
export interface ComponentAnalysis {
	summary: AnalysisSummary;
	detectedComponents: DetectedComponent[];
	componentPatterns: ComponentPatterns;
	designSystem: DesignSystemReport;
	designTokens: DesignTokenAggregate;
	reusabilityAnalysis: ReusabilityAnalysis;
	componentCatalog: ComponentCatalog;
	qualityAssessment: QualityAssessment;
	recommendations: string[];
}
