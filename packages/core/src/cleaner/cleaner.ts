// ============================================================================
// Cleaning Engine
// ============================================================================

import { FieldCleaningError, describeError } from "../errors";
import { type Logger, defaultLogger } from "../logger";
import { getDateFormatList, resolveRegion } from "../region";
import type { CanonicalField, CellValue, RawValue } from "../types";
import { CATEGORY_RULES } from "./rules";
import type {
	CategoryRule,
	CellFix,
	CellOutcome,
	CleaningOptions,
	CleaningResult,
	QualityMetrics,
	RuleContext,
} from "./types";

/** Strings read as a missing value (compared trimmed and lowercased) */
export const DEFAULT_MISSING_TOKENS: readonly string[] = ["na", "n/a", "null", "nan", "none", "#n/a"];

/**
 * Check whether a raw cell holds no value.
 */
export function isMissing(value: RawValue, missingTokens: readonly string[] = DEFAULT_MISSING_TOKENS): boolean {
	if (value === null || value === undefined) return true;
	if (typeof value === "number") return Number.isNaN(value);
	const text = value.trim().toLowerCase();
	return text === "" || missingTokens.includes(text);
}

function ruleContext(options?: CleaningOptions): RuleContext {
	const region = resolveRegion(options?.region);
	return {
		region,
		dateFormats: options?.dateFormats ?? getDateFormatList(region),
	};
}

function ratio(part: number, whole: number): number {
	return whole === 0 ? 0 : part / whole;
}

function metrics(total: number, present: number, valid: number, filled: number): QualityMetrics {
	return {
		total,
		present,
		valid,
		filled,
		completeness: ratio(present, total),
		validity: ratio(valid, present),
	};
}

/**
 * Metrics for cleaned cells. Filled cells are present but not valid.
 */
export function computeMetrics(cells: readonly CellOutcome[]): QualityMetrics {
	let present = 0;
	let valid = 0;
	let filled = 0;
	for (const cell of cells) {
		if (cell.status !== "missing") present++;
		if (cell.status === "valid") valid++;
		if (cell.status === "filled") filled++;
	}
	return metrics(cells.length, present, valid, filled);
}

function checkRaw(rule: CategoryRule, value: string | number, ctx: RuleContext): boolean {
	try {
		return rule.validate(value, ctx) === null;
	} catch {
		return false;
	}
}

/**
 * Metrics for raw values, validated as they are.
 */
export function computeRawMetrics(
	values: readonly RawValue[],
	rule: CategoryRule,
	ctx: RuleContext,
	missingTokens: readonly string[] = DEFAULT_MISSING_TOKENS
): QualityMetrics {
	let present = 0;
	let valid = 0;
	for (const value of values) {
		if (value === null || value === undefined || isMissing(value, missingTokens)) continue;
		present++;
		if (checkRaw(rule, typeof value === "string" ? value.trim() : value, ctx)) valid++;
	}
	return metrics(values.length, present, valid, 0);
}

function cleanCell(
	row: number,
	original: RawValue,
	rule: CategoryRule,
	ctx: RuleContext,
	missingTokens: readonly string[],
	logger: Logger
): CellOutcome {
	if (original === null || original === undefined || isMissing(original, missingTokens)) {
		return rule.fill === undefined
			? { row, original, value: null, status: "missing" }
			: { row, original, value: rule.fill, status: "filled" };
	}

	try {
		const value = rule.clean(original, ctx);
		const issue = rule.validate(value, ctx);
		return issue ? { row, original, value, status: "invalid", issue } : { row, original, value, status: "valid" };
	} catch (err) {
		if (err instanceof FieldCleaningError) {
			return rule.fill === undefined
				? { row, original, value: original, status: "invalid", issue: err.issue }
				: { row, original, value: rule.fill, status: "filled", issue: err.issue };
		}
		logger.warn("cleaner.cell.failed", { row, error: describeError(err) });
		return { row, original, value: original, status: "invalid", issue: "unexpected_error" };
	}
}

/**
 * Clean one column of raw values for a canonical field.
 *
 * Each cell is cleaned and validated on its own: a cell that cannot be
 * cleaned keeps its original value and is marked invalid, and the rest of
 * the column carries on. Rows are never dropped.
 *
 * @param values - Raw column values, one per row
 * @param field - Canonical field the column is mapped to
 * @param options - Region, missing tokens and date formats
 * @returns Cleaned values, per-cell outcomes and before/after metrics
 */
export function clean(
	values: readonly RawValue[],
	field: CanonicalField,
	options?: CleaningOptions
): CleaningResult {
	const logger = options?.logger ?? defaultLogger;
	const done = logger.timer("cleaner.clean", { field: field.name, rows: values.length });

	const rule = CATEGORY_RULES[field.category];
	const ctx = ruleContext(options);
	const missingTokens = options?.missingTokens?.map((t) => t.trim().toLowerCase()) ?? DEFAULT_MISSING_TOKENS;

	const cells = values.map((value, row) => cleanCell(row, value, rule, ctx, missingTokens, logger));
	const after = computeMetrics(cells);

	done({ valid: after.valid, filled: after.filled });

	return {
		field: field.name,
		category: field.category,
		cleanedValues: cells.map((cell) => cell.value),
		cells,
		before: computeRawMetrics(values, rule, ctx, missingTokens),
		after,
	};
}

/**
 * Write accepted fixes into a cleaning result. Fixed cells are validated
 * again (not re-cleaned) and the after-metrics recomputed. Fixes for other
 * fields or rows out of range are skipped.
 *
 * @returns A new result; the input is not modified
 */
export function applyFixes(
	result: CleaningResult,
	fixes: readonly CellFix[],
	field: CanonicalField,
	options?: CleaningOptions
): CleaningResult {
	const rule = CATEGORY_RULES[field.category];
	const ctx = ruleContext(options);
	const cells = [...result.cells];

	for (const fix of fixes) {
		if (fix.field !== undefined && fix.field !== field.name) continue;
		const cell = cells[fix.rowIndex];
		if (!cell) continue;

		const value: CellValue = fix.suggestedValue;
		const issue = safeValidate(rule, value, ctx);
		cells[fix.rowIndex] = issue
			? { row: cell.row, original: cell.original, value, status: "invalid", issue }
			: { row: cell.row, original: cell.original, value, status: "valid" };
	}

	return {
		...result,
		cleanedValues: cells.map((cell) => cell.value),
		cells,
		after: computeMetrics(cells),
	};
}

function safeValidate(rule: CategoryRule, value: CellValue, ctx: RuleContext) {
	try {
		return rule.validate(value, ctx);
	} catch {
		return "unexpected_error" as const;
	}
}
