/**
 * Naming pattern analysis for component display names.
 *
 * Case patterns are tested in a fixed order (UPPER_CASE, lower_case,
 * snake_case, kebab-case, camelCase) and the first match decides. Short
 * names therefore tend to land in the earlier buckets: "a" is lower_case
 * and never reaches the snake_case test.
 */

import { countBy } from "./stats.js";
import type { CasePattern, NamingPatterns, RankedCounts } from "./types/index.js";

const WORD_SEPARATOR_RE = /[_\-\s]+/;

/** Has at least one cased character and no lowercase ones. */
function isUpperCase(name: string): boolean {
	return name === name.toUpperCase() && name !== name.toLowerCase();
}

/** Has at least one cased character and no uppercase ones. */
function isLowerCase(name: string): boolean {
	return name === name.toLowerCase() && name !== name.toUpperCase();
}

function hasInnerUpperCase(name: string): boolean {
	const rest = name.slice(1);
	return rest !== rest.toLowerCase();
}

export function getCasePattern(name: string): CasePattern {
	if (isUpperCase(name)) return "UPPER_CASE";
	if (isLowerCase(name)) return "lower_case";
	if (name.includes("_")) return "snake_case";
	if (name.includes("-")) return "kebab-case";
	if (hasInnerUpperCase(name)) return "camelCase";
	return "unknown";
}

/**
 * Share of names that follow the most common case pattern.
 * Ties go to the pattern seen first. No names scores 0.
 */
export function calculateNamingConsistency(names: readonly string[]): number {
	if (names.length === 0) return 0;

	const counts = countBy(names, getCasePattern);
	let dominant = 0;
	for (const count of counts.values()) {
		if (count > dominant) dominant = count;
	}
	return dominant / names.length;
}

function splitWords(name: string): string[] {
	return name.toLowerCase().split(WORD_SEPARATOR_RE);
}

function repeated(counts: Map<string, number>): RankedCounts {
	return [...counts.entries()].filter(([, count]) => count > 1);
}

/** First words shared by more than one name, in first-seen order. */
export function findCommonPrefixes(names: readonly string[]): RankedCounts {
	return repeated(countBy(names, (name) => splitWords(name)[0]));
}

/** Last words shared by more than one name, in first-seen order. */
export function findCommonSuffixes(names: readonly string[]): RankedCounts {
	return repeated(
		countBy(names, (name) => {
			const words = splitWords(name);
			return words[words.length - 1];
		}),
	);
}

export function detectNamingConventions(
	names: readonly string[],
): CasePattern[] {
	const conventions: CasePattern[] = [];
	if (names.some((name) => name.includes("_"))) conventions.push("snake_case");
	if (names.some((name) => name.includes("-"))) conventions.push("kebab-case");
	if (names.some(hasInnerUpperCase)) conventions.push("camelCase");
	return conventions;
}

export function analyzeNamingPatterns(names: readonly string[]): NamingPatterns {
	return {
		namingConsistency: calculateNamingConsistency(names),
		commonPrefixes: findCommonPrefixes(names),
		commonSuffixes: findCommonSuffixes(names),
		namingConventions: detectNamingConventions(names),
	};
}

/** Distinct leading words of non-blank names. */
export function countDistinctFirstWords(names: readonly string[]): number {
	const firstWords = new Set<string>();
	for (const name of names) {
		const trimmed = name.trim();
		if (trimmed) firstWords.add(trimmed.split(/\s+/)[0]);
	}
	return firstWords.size;
}
