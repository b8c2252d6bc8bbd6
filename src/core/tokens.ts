/**
 * Design token extraction and aggregation
 *
 * Each object contributes `{field}_{value}` keys per token category; the
 * corpus-wide counts are ranked per category and cut to the top ten.
 */

import type {
	DesignObject,
	DesignTokenAggregate,
	ObjectDesignTokens,
	RankedCounts,
	TokenCategory,
} from "./types/index.js";
import { TOKEN_CATEGORIES } from "./types/index.js";

const TOP_TOKENS = 10;

export function extractObjectDesignTokens(
	object: DesignObject,
): ObjectDesignTokens {
	const tokens: ObjectDesignTokens = {
		spacing: { width: object.width, height: object.height },
	};

	const hasFill = Object.hasOwn(object, "fill");
	const hasStroke = Object.hasOwn(object, "stroke");
	if (hasFill || hasStroke) {
		tokens.colors = {};
		if (hasFill) tokens.colors.fill = object.fill;
		if (hasStroke) tokens.colors.stroke = object.stroke;
	}

	if (object.type === "text") {
		tokens.typography = {
			font_family: object.font_family ?? null,
			font_size: object.font_size ?? null,
			font_weight: object.font_weight ?? null,
			line_height: object.line_height ?? null,
		};
	}

	if (Object.hasOwn(object, "shadow") || Object.hasOwn(object, "blur")) {
		tokens.effects = {
			shadow: object.shadow ?? null,
			blur: object.blur ?? null,
		};
	}

	return tokens;
}

/** Empty, zero and false values carry no token. */
function isMeaningfulValue(value: unknown): boolean {
	if (value === null || value === undefined || value === false) return false;
	if (value === "" || value === 0) return false;
	if (Array.isArray(value)) return value.length > 0;
	if (typeof value === "object") return Object.keys(value).length > 0;
	return true;
}

/** Render a token value into its key form. */
export function formatTokenValue(value: unknown): string {
	if (typeof value === "string") return value;
	if (
		typeof value === "number" ||
		typeof value === "boolean" ||
		typeof value === "bigint"
	) {
		return String(value);
	}
	return JSON.stringify(value);
}

/**
 * Rank counts descending. Array.prototype.sort is stable, so ties keep
 * first-seen order.
 */
export function rankCounts(
	counts: ReadonlyMap<string, number>,
	limit?: number,
): RankedCounts {
	const ranked = [...counts.entries()].sort((a, b) => b[1] - a[1]);
	return limit === undefined ? ranked : ranked.slice(0, limit);
}

export function aggregateDesignTokens(
	objects: readonly DesignObject[],
): DesignTokenAggregate {
	const counts = new Map<TokenCategory, Map<string, number>>(
		TOKEN_CATEGORIES.map((category): [TokenCategory, Map<string, number>] => [
			category,
			new Map(),
		]),
	);

	for (const object of objects) {
		const tokens = extractObjectDesignTokens(object);
		for (const category of TOKEN_CATEGORIES) {
			const fields: Record<string, unknown> | undefined = tokens[category];
			const categoryCounts = counts.get(category);
			if (!fields || !categoryCounts) continue;

			for (const [field, value] of Object.entries(fields)) {
				if (!isMeaningfulValue(value)) continue;
				const key = `${field}_${formatTokenValue(value)}`;
				categoryCounts.set(key, (categoryCounts.get(key) ?? 0) + 1);
			}
		}
	}

	const aggregate: DesignTokenAggregate = {
		colors: [],
		typography: [],
		spacing: [],
		effects: [],
	};
	for (const [category, categoryCounts] of counts) {
		aggregate[category] = rankCounts(categoryCounts, TOP_TOKENS);
	}
	return aggregate;
}
