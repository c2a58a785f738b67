// ============================================================================
// Header Mapping Types
// ============================================================================

import type { Logger } from "../logger";
import type { SchemaRegistry } from "../schema";
import type { AmbiguousMappingWarning } from "../types";

/**
 * How a header was matched, in cascade priority order.
 * - 'EXACT': normalized header equals the canonical name
 * - 'PROMOTED_ALIAS': user-confirmed alias from the promotion store
 * - 'COMMON_ALIAS': built-in alias dictionary
 * - 'TOKEN_OVERLAP': shared words with the name or a synonym
 * - 'FUZZY': character-level edit similarity to the name
 * - 'MANUAL': explicit user choice
 * - 'NONE': no match
 */
export type MappingMethod =
	| "EXACT"
	| "PROMOTED_ALIAS"
	| "COMMON_ALIAS"
	| "TOKEN_OVERLAP"
	| "FUZZY"
	| "MANUAL"
	| "NONE";

/** Methods a cascade strategy can produce */
export type MatchMethod = Exclude<MappingMethod, "MANUAL" | "NONE">;

/**
 * Outcome of the cascade for one header.
 */
export type Resolution =
	| { method: MatchMethod; field: string; confidence: number; matchedVia: string }
	| { method: "NONE"; field: null; confidence: 0 };

/**
 * A header as it appeared and in comparable form.
 */
export interface HeaderCandidate {
	index: number;
	rawHeader: string;
	normalizedHeader: string;
	tokens: readonly string[];
}

/**
 * A single header assignment.
 */
export interface MappingAssignment {
	/** Position of the header in the input (0-based) */
	index: number;
	/** Header text as given */
	rawHeader: string;
	normalizedHeader: string;
	/** Matched canonical field, null when unmapped */
	canonicalField: string | null;
	/** 0-1. 1 for exact, promoted and manual; 0 for none */
	confidence: number;
	method: MappingMethod;
	/** Name, synonym or alias text that produced the match */
	matchedVia?: string;
}

/**
 * Source of promoted aliases: a raw-header → field map, or anything that
 * exposes one (the promotion store does).
 */
export type AliasSource = ReadonlyMap<string, string> | { aliases(): ReadonlyMap<string, string> };

export interface ResolverContext {
	registry: SchemaRegistry;
	/** User-confirmed aliases, consulted before the built-in dictionary */
	promotedAliases?: AliasSource;
	/** Replaces the built-in alias dictionary (normalized alias → field) */
	commonAliases?: ReadonlyMap<string, string>;
	logger?: Logger;
}

/**
 * Options for the mapping process.
 */
export interface MappingOptions {
	/** Token or fuzzy matches at or above this count as auto-mapped. Default: 0.8 */
	autoAcceptThreshold?: number;
}

/**
 * Result of mapping headers to canonical fields.
 */
export interface MappingResult {
	/** One assignment per header, in input order */
	assignments: MappingAssignment[];
	/** Ties for a field broken by input order */
	warnings: AmbiguousMappingWarning[];
	/** Indices of headers that couldn't be mapped */
	unmappedHeaders: number[];
	/** Canonical fields no header was assigned to */
	unmappedFields: string[];
	/** Required canonical fields no header was assigned to */
	missingRequiredFields: string[];
	/** Count of assignments that need no review */
	autoMapped: number;
	/** Count of low-confidence matches a user should confirm */
	needsReview: number;
	/** Count of unmapped headers */
	unmapped: number;
}

/**
 * An alias known to the resolver.
 */
export interface AliasEntry {
	aliasText: string;
	canonicalField: string;
	source: "COMMON" | "PROMOTED";
}
