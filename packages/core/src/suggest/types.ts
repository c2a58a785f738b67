// ============================================================================
// Fix Suggestion Types
// ============================================================================

import type { CellOutcome } from "../cleaner";
import type { Logger } from "../logger";
import type { RegionConfig } from "../region";
import type { FixRule, ReasonCode } from "../types";

export type SuggestionSource = "PROMOTED" | "HEURISTIC";

export interface FixSuggestion {
	rowIndex: number;
	field: string;
	/** Current cleaned value of the cell, as text */
	originalValue: string;
	suggestedValue: string;
	reasonCode: ReasonCode;
	/** 1.0 for promoted rules */
	confidence: number;
	source: SuggestionSource;
}

/** Promoted rules as a list, or anything that holds them (the promotion store does) */
export type FixRuleSource = readonly FixRule[] | { fixRules(): readonly FixRule[] };

export interface SuggestOptions {
	rules?: FixRuleSource;
	/** Region for phone and postal heuristics */
	region?: RegionConfig | string;
	logger?: Logger;
}

export interface HeuristicContext {
	region?: RegionConfig;
}

/** A proposed value with its reason, before it is tied to a row */
export interface Proposal {
	suggestedValue: string;
	reasonCode: ReasonCode;
	confidence: number;
}

/** Looks at one cell and proposes a fix, or returns null */
export type Heuristic = (cell: CellOutcome, ctx: HeuristicContext) => Proposal | null;
