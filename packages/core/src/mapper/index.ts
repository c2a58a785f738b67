// Header Mapper - match incoming headers to canonical fields

// Main functions
export { mapHeaders, resolve, overrideAssignment, summarizeMapping, toCandidates } from "./resolver";

// Cascade (for advanced usage)
export {
	MAPPING_CASCADE,
	FALLBACK_CASCADE,
	TOKEN_OVERLAP_THRESHOLD,
	FUZZY_THRESHOLD,
	COMMON_ALIAS_CONFIDENCE,
	exactMatch,
	promotedAliasMatch,
	commonAliasMatch,
	tokenOverlapMatch,
	fuzzyMatch,
	runCascade,
	tokenConfidence,
	fuzzyConfidence,
} from "./strategies";
export type { Match, MatchStrategy, StrategyInput } from "./strategies";

// Aliases
export { COMMON_ALIASES, buildAliasIndex, aliasMap, listAliases, commonAliasMap } from "./aliases";
export type { AliasIndex, IndexedAlias } from "./aliases";

// Similarity functions
export { levenshtein, levenshteinSimilarity, normalizeHeader, tokenize, jaccard } from "./similarity";

// Types
export type {
	AliasEntry,
	AliasSource,
	HeaderCandidate,
	MappingAssignment,
	MappingMethod,
	MappingOptions,
	MappingResult,
	MatchMethod,
	Resolution,
	ResolverContext,
} from "./types";
