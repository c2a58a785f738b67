// ============================================================================
// Import Pipeline
// ============================================================================

import { type CleaningOptions, type CleaningResult, type QualityMetrics, applyFixes, clean } from "./cleaner";
import { UnknownFieldError } from "./errors";
import { type Logger, defaultLogger } from "./logger";
import { type MappingResult, mapHeaders } from "./mapper";
import type { RegionConfig } from "./region";
import type { SchemaRegistry } from "./schema";
import type { PromotionStore } from "./store";
import { type FixSuggestion, suggest } from "./suggest";
import type { CanonicalField, CellValue, HeadwiseWarning, PersistenceWarning, Table } from "./types";

export interface PipelineContext {
	registry: SchemaRegistry;
	/** Source of promoted aliases and fix rules, and where accepted fixes go */
	store?: PromotionStore;
	region?: RegionConfig | string;
	logger?: Logger;
}

export interface PipelineOptions {
	/** Write promoted fix rules into the cleaned values. Default: true */
	autoApplyPromoted?: boolean;
	/** Fuzzy and token matches below this need review. Default: 0.8 */
	autoAcceptThreshold?: number;
	missingTokens?: CleaningOptions["missingTokens"];
	dateFormats?: CleaningOptions["dateFormats"];
}

/**
 * One mapped input column after cleaning.
 */
export interface ColumnResult {
	/** Position of the column in the input table */
	index: number;
	rawHeader: string;
	field: CanonicalField;
	cleaning: CleaningResult;
	/** Promoted fixes already written into `cleaning` */
	applied: FixSuggestion[];
}

export interface ColumnReport {
	rawHeader: string;
	field: string;
	before: QualityMetrics;
	after: QualityMetrics;
	applied: number;
	suggestions: number;
}

export interface PipelineReport {
	rows: number;
	columns: ColumnReport[];
	/** Present cells over all cells of the mapped columns, before cleaning */
	completenessBefore: number;
	completenessAfter: number;
	missingRequiredFields: string[];
	warnings: HeadwiseWarning[];
}

export interface PipelineResult {
	mapping: MappingResult;
	columns: ColumnResult[];
	/** Open suggestions, by column then row */
	suggestions: FixSuggestion[];
	/** Mapped headers renamed to their fields, unmapped columns as they were */
	cleanedTable: Table;
	report: PipelineReport;
}

export interface AcceptOptions {
	/** Record the fixes as fix rules and save the store */
	promote?: boolean;
}

// ============================================================================
// Assembly
// ============================================================================

function cleaningOptions(context: PipelineContext, options?: PipelineOptions): CleaningOptions {
	return {
		region: context.region,
		missingTokens: options?.missingTokens,
		dateFormats: options?.dateFormats,
		logger: context.logger,
	};
}

function buildTable(source: Table, mapping: MappingResult, columns: readonly ColumnResult[]): Table {
	const byIndex = new Map(columns.map((column) => [column.index, column]));

	return {
		headers: mapping.assignments.map((a) => a.canonicalField ?? a.rawHeader),
		rows: source.rows.map((row, r) =>
			source.headers.map((_, c): CellValue => {
				const column = byIndex.get(c);
				return column ? column.cleaning.cleanedValues[r] : (row[c] ?? null);
			})
		),
	};
}

function completeness(metrics: readonly QualityMetrics[]): number {
	let present = 0;
	let total = 0;
	for (const m of metrics) {
		present += m.present;
		total += m.total;
	}
	return total === 0 ? 0 : present / total;
}

function buildReport(
	rows: number,
	mapping: MappingResult,
	columns: readonly ColumnResult[],
	suggestions: readonly FixSuggestion[],
	warnings: HeadwiseWarning[]
): PipelineReport {
	return {
		rows,
		columns: columns.map((column) => ({
			rawHeader: column.rawHeader,
			field: column.field.name,
			before: column.cleaning.before,
			after: column.cleaning.after,
			applied: column.applied.length,
			suggestions: suggestions.filter((s) => s.field === column.field.name).length,
		})),
		completenessBefore: completeness(columns.map((c) => c.cleaning.before)),
		completenessAfter: completeness(columns.map((c) => c.cleaning.after)),
		missingRequiredFields: mapping.missingRequiredFields,
		warnings,
	};
}

// ============================================================================
// Run
// ============================================================================

/**
 * Map, clean and review a table.
 *
 * Headers are resolved against the registry (with the store's promoted
 * aliases), every mapped column is cleaned, and fix suggestions are
 * collected for its invalid and missing cells. Promoted suggestions are
 * applied straight away unless `autoApplyPromoted` is false; the rest are
 * returned for review. Row order and row count are kept.
 *
 * @param table - Parsed input
 * @param context - Registry, store, region and logger
 * @param options - Auto-apply, review threshold and cleaning settings
 */
export function runPipeline(table: Table, context: PipelineContext, options?: PipelineOptions): PipelineResult {
	const logger = context.logger ?? defaultLogger;
	const done = logger.timer("pipeline.run", { rows: table.rows.length, headers: table.headers.length });
	const autoApply = options?.autoApplyPromoted ?? true;
	const cleanOpts = cleaningOptions(context, options);

	const mapping = mapHeaders(
		table.headers,
		{ registry: context.registry, promotedAliases: context.store, logger: context.logger },
		{ autoAcceptThreshold: options?.autoAcceptThreshold }
	);

	const columns: ColumnResult[] = [];
	const suggestions: FixSuggestion[] = [];

	for (const assignment of mapping.assignments) {
		if (assignment.canonicalField === null) continue;
		const field = context.registry.get(assignment.canonicalField);
		if (!field) continue;

		const values = table.rows.map((row) => row[assignment.index] ?? null);
		let cleaning = clean(values, field, cleanOpts);
		const found = suggest(cleaning, field, { rules: context.store, region: context.region, logger: context.logger });

		let applied: FixSuggestion[] = [];
		if (autoApply) {
			applied = found.filter((s) => s.source === "PROMOTED");
			if (applied.length > 0) cleaning = applyFixes(cleaning, applied, field, cleanOpts);
		}

		columns.push({ index: assignment.index, rawHeader: assignment.rawHeader, field, cleaning, applied });
		suggestions.push(...(autoApply ? found.filter((s) => s.source !== "PROMOTED") : found));
	}

	const warnings: HeadwiseWarning[] = [...mapping.warnings, ...(context.store?.warnings ?? [])];
	const result: PipelineResult = {
		mapping,
		columns,
		suggestions,
		cleanedTable: buildTable(table, mapping, columns),
		report: buildReport(table.rows.length, mapping, columns, suggestions, warnings),
	};

	done({ columns: columns.length, suggestions: suggestions.length });
	return result;
}

// ============================================================================
// Review
// ============================================================================

/**
 * Write accepted suggestions into a pipeline result. Accepted suggestions
 * leave the open list. With `promote`, each one is recorded in the store as
 * a fix rule and the store is saved once; a failed save is added to the
 * report's warnings.
 *
 * @returns A new result; the input is not modified
 */
export function acceptFixes(
	result: PipelineResult,
	fixes: readonly FixSuggestion[],
	context: PipelineContext,
	options?: AcceptOptions
): PipelineResult {
	const logger = context.logger ?? defaultLogger;
	const cleanOpts = cleaningOptions(context);

	const columns = result.columns.map((column) => {
		const own = fixes.filter((fix) => fix.field === column.field.name);
		if (own.length === 0) return column;
		return { ...column, cleaning: applyFixes(column.cleaning, own, column.field, cleanOpts) };
	});

	const accepted = new Set(fixes.map((fix) => `${fix.field}\u0000${fix.rowIndex}`));
	const suggestions = result.suggestions.filter((s) => !accepted.has(`${s.field}\u0000${s.rowIndex}`));

	const warnings = [...result.report.warnings];
	if (options?.promote) {
		const warning = promoteFixes(fixes, context, logger);
		if (warning) warnings.push(warning);
	}

	logger.info("pipeline.fixes.accepted", { fixes: fixes.length, promoted: Boolean(options?.promote) });

	return {
		mapping: result.mapping,
		columns,
		suggestions,
		cleanedTable: buildTable(
			{ headers: result.mapping.assignments.map((a) => a.rawHeader), rows: result.cleanedTable.rows },
			result.mapping,
			columns
		),
		report: buildReport(result.report.rows, result.mapping, columns, suggestions, warnings),
	};
}

function promoteFixes(
	fixes: readonly FixSuggestion[],
	context: PipelineContext,
	logger: Logger
): PersistenceWarning | null {
	const { store } = context;
	if (!store) {
		logger.warn("pipeline.promote.no_store", { fixes: fixes.length }, "Nothing to promote into");
		return null;
	}

	let changed = false;
	for (const fix of fixes) {
		if (store.promoteFix(fix.field, fix.reasonCode, fix.originalValue, fix.suggestedValue)) changed = true;
	}
	return changed ? store.save() : null;
}

/**
 * Promote a user-confirmed header mapping and save the store. Later runs
 * map the header with PROMOTED_ALIAS at confidence 1.0.
 *
 * @returns null when saved (or already promoted), or the warning for a failed save
 * @throws UnknownFieldError when the field is not in the registry
 */
export function acceptMapping(
	context: PipelineContext & { store: PromotionStore },
	rawHeader: string,
	field: string
): PersistenceWarning | null {
	if (!context.registry.has(field)) throw new UnknownFieldError(field);

	const changed = context.store.promoteAlias(rawHeader, field);
	(context.logger ?? defaultLogger).info("pipeline.mapping.accepted", { rawHeader, field, changed });
	return changed ? context.store.save() : null;
}
