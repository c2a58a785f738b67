// ============================================================================
// Matching Cascade
// ============================================================================

import type { SchemaRegistry } from "../schema";
import type { CanonicalField } from "../types";
import type { AliasIndex } from "./aliases";
import { jaccard, levenshteinSimilarity, normalizeHeader, tokenize } from "./similarity";
import type { HeaderCandidate, MatchMethod, Resolution } from "./types";

export const TOKEN_OVERLAP_THRESHOLD = 0.5;
export const FUZZY_THRESHOLD = 0.4;

/** Confidence of an alias from the built-in dictionary */
export const COMMON_ALIAS_CONFIDENCE = 0.95;

export type Match = Extract<Resolution, { method: MatchMethod }>;

/**
 * What a strategy may look at. `isAvailable` is false for fields missing
 * from the registry or already lost by this header.
 */
export interface StrategyInput {
	header: HeaderCandidate;
	registry: SchemaRegistry;
	isAvailable: (field: string) => boolean;
	promoted: AliasIndex;
	common: AliasIndex;
}

/** Returns a match, or null for no opinion */
export type MatchStrategy = (input: StrategyInput) => Match | null;

/**
 * Map a Jaccard score in [0.5, 1] onto [0.80, 0.95].
 */
export function tokenConfidence(score: number): number {
	return 0.8 + ((score - TOKEN_OVERLAP_THRESHOLD) / (1 - TOKEN_OVERLAP_THRESHOLD)) * 0.15;
}

/**
 * Map a similarity in [0.4, 1] onto [0.60, 0.75].
 */
export function fuzzyConfidence(score: number): number {
	return 0.6 + ((score - FUZZY_THRESHOLD) / (1 - FUZZY_THRESHOLD)) * 0.15;
}

// ============================================================================
// Strategies
// ============================================================================

export const exactMatch: MatchStrategy = ({ header, registry, isAvailable }) => {
	for (const field of registry.fields) {
		if (isAvailable(field.name) && normalizeHeader(field.name) === header.normalizedHeader) {
			return { method: "EXACT", field: field.name, confidence: 1, matchedVia: field.name };
		}
	}
	return null;
};

function aliasMatch(method: "PROMOTED_ALIAS" | "COMMON_ALIAS", confidence: number): MatchStrategy {
	return ({ header, isAvailable, promoted, common }) => {
		const alias = (method === "PROMOTED_ALIAS" ? promoted : common).get(header.normalizedHeader);
		if (!alias || !isAvailable(alias.field)) return null;
		return { method, field: alias.field, confidence, matchedVia: alias.aliasText };
	};
}

export const promotedAliasMatch = aliasMatch("PROMOTED_ALIAS", 1);
export const commonAliasMatch = aliasMatch("COMMON_ALIAS", COMMON_ALIAS_CONFIDENCE);

interface Scored {
	field: CanonicalField;
	score: number;
	via: string;
}

/**
 * Pick the best score. Ties go to the shorter field name, then to the
 * earlier candidate (candidates arrive in registry order).
 */
function pickBest(candidates: Scored[]): Scored | null {
	let best: Scored | null = null;
	for (const candidate of candidates) {
		if (
			!best ||
			candidate.score > best.score ||
			(candidate.score === best.score && candidate.field.name.length < best.field.name.length)
		) {
			best = candidate;
		}
	}
	return best;
}

export const tokenOverlapMatch: MatchStrategy = ({ header, registry, isAvailable }) => {
	if (header.tokens.length === 0) return null;

	const scored: Scored[] = [];
	registry.fields.forEach((field) => {
		if (!isAvailable(field.name)) return;
		let top: Scored | null = null;
		for (const text of [field.name, ...field.synonyms]) {
			const score = jaccard(header.tokens, tokenize(text));
			if (!top || score > top.score) top = { field, score, via: text };
		}
		if (top && top.score >= TOKEN_OVERLAP_THRESHOLD) scored.push(top);
	});

	const best = pickBest(scored);
	if (!best) return null;
	return {
		method: "TOKEN_OVERLAP",
		field: best.field.name,
		confidence: tokenConfidence(best.score),
		matchedVia: best.via,
	};
};

export const fuzzyMatch: MatchStrategy = ({ header, registry, isAvailable }) => {
	if (!header.normalizedHeader) return null;

	const scored: Scored[] = [];
	registry.fields.forEach((field) => {
		if (!isAvailable(field.name)) return;
		const score = levenshteinSimilarity(header.normalizedHeader, normalizeHeader(field.name));
		if (score >= FUZZY_THRESHOLD) scored.push({ field, score, via: field.name });
	});

	const best = pickBest(scored);
	if (!best) return null;
	return {
		method: "FUZZY",
		field: best.field.name,
		confidence: fuzzyConfidence(best.score),
		matchedVia: best.via,
	};
};

/** Full cascade, in priority order */
export const MAPPING_CASCADE: readonly MatchStrategy[] = [
	exactMatch,
	promotedAliasMatch,
	commonAliasMatch,
	tokenOverlapMatch,
	fuzzyMatch,
];

/** Re-run for headers that lost a field to a stronger claim */
export const FALLBACK_CASCADE: readonly MatchStrategy[] = [tokenOverlapMatch, fuzzyMatch];

/**
 * Run strategies in order; the first opinion wins.
 */
export function runCascade(strategies: readonly MatchStrategy[], input: StrategyInput): Resolution {
	if (!input.header.normalizedHeader) {
		return { method: "NONE", field: null, confidence: 0 };
	}
	for (const strategy of strategies) {
		const match = strategy(input);
		if (match) return match;
	}
	return { method: "NONE", field: null, confidence: 0 };
}
