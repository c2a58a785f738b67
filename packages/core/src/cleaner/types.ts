// ============================================================================
// Cleaning Types
// ============================================================================

import type { Logger } from "../logger";
import type { RegionConfig } from "../region";
import type { CellValue, FieldCategory, RawValue } from "../types";

/**
 * Outcome of one cell.
 * - 'valid': cleaned value passes the category's check
 * - 'invalid': cleaned (or original) value fails it
 * - 'filled': a placeholder was written for a missing or unusable value
 * - 'missing': no value, left empty
 */
export type CellStatus = "valid" | "invalid" | "filled" | "missing";

export type CellIssue =
	| "invalid_phone"
	| "missing_country_code"
	| "invalid_email"
	| "suspect_domain"
	| "invalid_tax_id"
	| "invalid_date"
	| "invalid_amount"
	| "invalid_postal_code"
	| "invalid_url"
	| "invalid_text"
	| "unexpected_error";

export interface CellOutcome {
	/** Row position (0-based) */
	row: number;
	original: RawValue;
	value: CellValue;
	status: CellStatus;
	issue?: CellIssue;
}

/**
 * Completeness and validity of a column.
 */
export interface QualityMetrics {
	total: number;
	/** Non-missing cells (filled cells count) */
	present: number;
	valid: number;
	filled: number;
	/** present / total, 0 for an empty column */
	completeness: number;
	/** valid / present, 0 when nothing is present */
	validity: number;
}

export interface CleaningResult {
	field: string;
	category: FieldCategory;
	/** One value per input row */
	cleanedValues: CellValue[];
	cells: CellOutcome[];
	before: QualityMetrics;
	after: QualityMetrics;
}

export interface CleaningOptions {
	/** Region config or id ("US", "GB", ...) for phone, date, amount and postal rules */
	region?: RegionConfig | string;
	/** Strings read as missing (compared trimmed, case-insensitive). Replaces the defaults */
	missingTokens?: readonly string[];
	/** Date formats to try, in order. Default: ISO forms, region forms, month-name forms */
	dateFormats?: readonly string[];
	logger?: Logger;
}

/**
 * What a category rule may look at.
 */
export interface RuleContext {
	region?: RegionConfig;
	dateFormats: readonly string[];
}

/**
 * Cleaning and validation for one field category.
 * `clean` throws FieldCleaningError for a value it cannot use.
 */
export interface CategoryRule {
	clean(value: string | number, ctx: RuleContext): CellValue;
	/** Returns the problem with a value, or null when it is valid */
	validate(value: CellValue, ctx: RuleContext): CellIssue | null;
	/** Written into missing cells, and into cells `clean` rejects */
	fill?: CellValue;
}

/**
 * A replacement value for one cell, as accepted by the user.
 */
export interface CellFix {
	rowIndex: number;
	suggestedValue: string;
	/** When set, fixes for other fields are skipped */
	field?: string;
}
