// ============================================================================
// Field Categories
// ============================================================================

export const FIELD_CATEGORIES = [
	"text",
	"email",
	"phone",
	"date",
	"currency",
	"postal_code",
	"url",
	"tax_id",
	"numeric",
] as const;

export type FieldCategory = (typeof FIELD_CATEGORIES)[number];

export function isFieldCategory(value: string): value is FieldCategory {
	return (FIELD_CATEGORIES as readonly string[]).includes(value);
}

// ============================================================================
// Canonical Schema
// ============================================================================

/**
 * A named, typed column of the target schema.
 */
export interface CanonicalField {
	readonly name: string;
	readonly category: FieldCategory;
	readonly required: boolean;
	/** Extra names used by token-overlap matching */
	readonly synonyms: readonly string[];
}

// ============================================================================
// Tabular Data
// ============================================================================

/** A cell as it appears in the input (CSV readers may give numbers or nothing) */
export type RawValue = string | number | null | undefined;

/** A cell after cleaning. `null` marks a missing value that was not filled */
export type CellValue = string | number | null;

/**
 * Row-major table. `rows[i][j]` belongs to `headers[j]`.
 */
export interface Table {
	headers: string[];
	rows: CellValue[][];
}

// ============================================================================
// Warnings
// ============================================================================

/**
 * Two or more headers tied for one canonical field at the same confidence.
 * The earliest header keeps the field.
 */
export interface AmbiguousMappingWarning {
	kind: "ambiguous_mapping";
	field: string;
	headers: string[];
	winner: string;
	confidence: number;
}

/**
 * The promotion store could not be read or written. Never fatal.
 */
export interface PersistenceWarning {
	kind: "persistence_read" | "persistence_write";
	message: string;
	location: string;
}

export type HeadwiseWarning = AmbiguousMappingWarning | PersistenceWarning;

// ============================================================================
// Fixes
// ============================================================================

export const REASON_CODES = [
	"DOMAIN_TYPO",
	"MISSING_COUNTRY_CODE",
	"INVALID_DATE",
	"MALFORMED_URL",
	"POSTAL_FORMAT",
] as const;

/** Why a fix was suggested */
export type ReasonCode = (typeof REASON_CODES)[number];

/**
 * A user-accepted correction, replayed on later runs.
 * With `pattern`, `original` is a regular expression matched against the
 * whole value and `replacement` may use capture groups ($1).
 */
export interface FixRule {
	field: string;
	ruleType: ReasonCode;
	original: string;
	replacement: string;
	pattern?: boolean;
}
