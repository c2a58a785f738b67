import type { CellIssue } from "./cleaner/types";

// ============================================================================
// Error Codes
// ============================================================================

export const ERROR_CODES = {
	SCHEMA_LOAD: "SCHEMA_LOAD",
	PERSISTENCE_READ: "PERSISTENCE_READ",
	PERSISTENCE_WRITE: "PERSISTENCE_WRITE",
	FIELD_CLEANING: "FIELD_CLEANING",
	CSV_PARSE: "CSV_PARSE",
	UNKNOWN_FIELD: "UNKNOWN_FIELD",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// ============================================================================
// Error Classes
// ============================================================================

export class HeadwiseError extends Error {
	readonly code: ErrorCode;

	constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/** Canonical schema missing or malformed. Fatal: no partial schema is accepted. */
export class SchemaLoadError extends HeadwiseError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(ERROR_CODES.SCHEMA_LOAD, message, options);
	}
}

export class PersistenceReadError extends HeadwiseError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(ERROR_CODES.PERSISTENCE_READ, message, options);
	}
}

export class PersistenceWriteError extends HeadwiseError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(ERROR_CODES.PERSISTENCE_WRITE, message, options);
	}
}

/**
 * A single cell could not be normalized for its category.
 * `issue` ends up on the cell outcome.
 */
export class FieldCleaningError extends HeadwiseError {
	readonly issue: CellIssue;

	constructor(issue: CellIssue, message: string) {
		super(ERROR_CODES.FIELD_CLEANING, message);
		this.issue = issue;
	}
}

/** Input text is not readable as CSV */
export class CsvParseError extends HeadwiseError {
	constructor(message: string) {
		super(ERROR_CODES.CSV_PARSE, message);
	}
}

/** A caller named a field the canonical schema does not have */
export class UnknownFieldError extends HeadwiseError {
	readonly field: string;

	constructor(field: string) {
		super(ERROR_CODES.UNKNOWN_FIELD, `Unknown canonical field "${field}"`);
		this.field = field;
	}
}

/**
 * Render an unknown thrown value as a message.
 */
export function describeError(err: unknown): string {
	if (err instanceof Error) return err.message;
	return String(err);
}
