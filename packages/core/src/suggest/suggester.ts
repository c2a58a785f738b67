// ============================================================================
// Fix Suggestion Engine
// ============================================================================

import type { CleaningResult } from "../cleaner";
import { describeError } from "../errors";
import { type Logger, defaultLogger } from "../logger";
import { resolveRegion } from "../region";
import type { CanonicalField, FixRule } from "../types";
import { HEURISTICS } from "./heuristics";
import type { FixRuleSource, FixSuggestion, HeuristicContext, SuggestOptions } from "./types";

const patternCache = new Map<string, RegExp | null>();

function compilePattern(source: string, logger: Logger): RegExp | null {
	if (patternCache.has(source)) return patternCache.get(source) ?? null;

	let regex: RegExp | null = null;
	try {
		regex = new RegExp(`^(?:${source})$`);
	} catch (err) {
		logger.warn("suggest.rule.bad_pattern", { pattern: source, error: describeError(err) });
	}
	patternCache.set(source, regex);
	return regex;
}

/**
 * Find the promoted rule for a value: exact rules first, then pattern rules,
 * each in promotion order. Rules with a pattern that does not compile are
 * skipped.
 *
 * @returns The matching rule and the replacement it produces, or null
 */
export function matchFixRule(
	rules: readonly FixRule[],
	field: string,
	value: string,
	logger: Logger = defaultLogger
): { rule: FixRule; replacement: string } | null {
	const candidates = rules.filter((rule) => rule.field === field);

	const exact = candidates.find((rule) => !rule.pattern && rule.original === value);
	if (exact) return { rule: exact, replacement: exact.replacement };

	for (const rule of candidates) {
		if (!rule.pattern) continue;
		const regex = compilePattern(rule.original, logger);
		if (regex?.test(value)) {
			return { rule, replacement: value.replace(regex, rule.replacement) };
		}
	}
	return null;
}

function ruleList(source: FixRuleSource | undefined): readonly FixRule[] {
	if (!source) return [];
	return "fixRules" in source ? source.fixRules() : source;
}

/**
 * Propose fixes for the invalid and missing cells of a cleaned column.
 *
 * A promoted rule that matches the cell wins with confidence 1.0; otherwise
 * the category's heuristic is tried. At most one suggestion per row, in row
 * order. A heuristic that fails on a cell is logged and skipped.
 *
 * @param result - Output of `clean` for the column
 * @param field - Canonical field of the column
 * @param options - Promoted rules, region and logger
 */
export function suggest(result: CleaningResult, field: CanonicalField, options?: SuggestOptions): FixSuggestion[] {
	const logger = options?.logger ?? defaultLogger;
	const done = logger.timer("suggest.column", { field: field.name });

	const rules = ruleList(options?.rules);
	const ctx: HeuristicContext = { region: resolveRegion(options?.region) };
	const heuristic = HEURISTICS[field.category];
	const suggestions: FixSuggestion[] = [];

	for (const cell of result.cells) {
		if (cell.status !== "invalid" && cell.status !== "missing") continue;
		const originalValue = cell.value === null ? "" : String(cell.value);

		const promoted = matchFixRule(rules, field.name, originalValue, logger);
		if (promoted) {
			suggestions.push({
				rowIndex: cell.row,
				field: field.name,
				originalValue,
				suggestedValue: promoted.replacement,
				reasonCode: promoted.rule.ruleType,
				confidence: 1,
				source: "PROMOTED",
			});
			continue;
		}

		if (!heuristic) continue;
		try {
			const proposal = heuristic(cell, ctx);
			if (proposal && proposal.suggestedValue !== originalValue) {
				suggestions.push({ rowIndex: cell.row, field: field.name, originalValue, ...proposal, source: "HEURISTIC" });
			}
		} catch (err) {
			logger.warn("suggest.cell.failed", { field: field.name, row: cell.row, error: describeError(err) });
		}
	}

	done({ suggestions: suggestions.length });
	return suggestions;
}
