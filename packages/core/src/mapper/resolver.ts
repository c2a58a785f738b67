// ============================================================================
// Header Mapping Resolver
// ============================================================================

import { defaultLogger } from "../logger";
import type { SchemaRegistry } from "../schema";
import type { AmbiguousMappingWarning } from "../types";
import { COMMON_ALIASES, aliasMap, buildAliasIndex } from "./aliases";
import { normalizeHeader, tokenize } from "./similarity";
import { FALLBACK_CASCADE, MAPPING_CASCADE, type StrategyInput, runCascade } from "./strategies";
import type {
	HeaderCandidate,
	MappingAssignment,
	MappingOptions,
	MappingResult,
	Resolution,
	ResolverContext,
} from "./types";

const DEFAULT_AUTO_ACCEPT_THRESHOLD = 0.8;

const NO_MATCH: Resolution = { method: "NONE", field: null, confidence: 0 };

/**
 * Build the comparable form of each header.
 */
export function toCandidates(headers: readonly string[]): HeaderCandidate[] {
	return headers.map((rawHeader, index) => ({
		index,
		rawHeader,
		normalizedHeader: normalizeHeader(rawHeader),
		tokens: tokenize(rawHeader),
	}));
}

function toAssignment(candidate: HeaderCandidate, resolution: Resolution): MappingAssignment {
	const assignment: MappingAssignment = {
		index: candidate.index,
		rawHeader: candidate.rawHeader,
		normalizedHeader: candidate.normalizedHeader,
		canonicalField: resolution.field,
		confidence: resolution.confidence,
		method: resolution.method,
	};
	if (resolution.method !== "NONE") {
		assignment.matchedVia = resolution.matchedVia;
	}
	return assignment;
}

/**
 * Map headers to canonical fields.
 *
 * Every header runs the full cascade (exact, promoted alias, common alias,
 * token overlap, fuzzy). Claims are ranked by confidence, then input
 * position, and the first keeps its field. A header that loses a field
 * re-runs token overlap and fuzzy matching without the fields it has lost,
 * and its new claim is weighed against the current holder, which may lose
 * in turn. This repeats until no header loses. A loser with the same
 * confidence as the winner produces an ambiguity warning.
 *
 * @param headers - Header row as read from the file
 * @param context - Schema registry, promoted aliases and logger
 * @param options - Optional mapping configuration
 * @returns MappingResult with one assignment per header, in input order
 */
export function mapHeaders(
	headers: readonly string[],
	context: ResolverContext,
	options?: MappingOptions
): MappingResult {
	const logger = context.logger ?? defaultLogger;
	const done = logger.timer("mapper.resolve", { headers: headers.length });

	const { registry } = context;
	const promoted = buildAliasIndex(aliasMap(context.promotedAliases));
	const common = context.commonAliases ? buildAliasIndex(context.commonAliases, true) : COMMON_ALIASES;

	const candidates = toCandidates(headers);
	const resolutions: Resolution[] = candidates.map(() => NO_MATCH);
	// Fields each header has lost; a header never claims them again
	const lost = candidates.map(() => new Set<string>());
	const ambiguities = new Map<string, AmbiguousMappingWarning>();

	let pending = candidates;
	let round = 0;

	while (pending.length > 0) {
		for (const header of pending) {
			const excluded = lost[header.index];
			const input: StrategyInput = {
				header,
				registry,
				isAvailable: (field) => registry.has(field) && !excluded.has(field),
				promoted,
				common,
			};
			const strategies = excluded.size === 0 ? MAPPING_CASCADE : FALLBACK_CASCADE;
			resolutions[header.index] = runCascade(strategies, input);
		}

		// Every claim on a field is weighed again, so a demoted header can
		// displace a weaker holder settled in an earlier round
		const claims = candidates
			.filter((header) => resolutions[header.index].field !== null)
			.sort(
				(a, b) =>
					resolutions[b.index].confidence - resolutions[a.index].confidence || a.index - b.index
			);

		const holders = new Map<string, HeaderCandidate>();
		const losers: HeaderCandidate[] = [];

		for (const header of claims) {
			const { field, confidence } = resolutions[header.index];
			if (field === null) continue;

			const holder = holders.get(field);
			if (!holder) {
				holders.set(field, header);
				continue;
			}

			if (confidence === resolutions[holder.index].confidence) {
				const warning: AmbiguousMappingWarning = ambiguities.get(field) ?? {
					kind: "ambiguous_mapping",
					field,
					headers: [holder.rawHeader],
					winner: holder.rawHeader,
					confidence,
				};
				if (!warning.headers.includes(header.rawHeader)) warning.headers.push(header.rawHeader);
				ambiguities.set(field, warning);
			}
			lost[header.index].add(field);
			losers.push(header);
		}

		if (losers.length > 0) {
			logger.debug("mapper.round", { round, claimed: holders.size, demoted: losers.length });
		}

		pending = losers.sort((a, b) => a.index - b.index);
		round++;
	}

	const warnings = [...ambiguities.values()];
	for (const warning of warnings) {
		logger.warn(
			"mapper.ambiguous",
			{ field: warning.field, headers: warning.headers, confidence: warning.confidence },
			`Headers tie for "${warning.field}"; keeping "${warning.winner}"`
		);
	}

	const assignments = candidates.map((candidate) => toAssignment(candidate, resolutions[candidate.index]));
	const result = { ...summarizeMapping(assignments, registry, options), warnings };

	if (result.missingRequiredFields.length > 0) {
		logger.warn("mapper.required_missing", { fields: result.missingRequiredFields });
	}
	done({ mapped: headers.length - result.unmapped, rounds: round });

	return result;
}

/**
 * Resolve headers to assignments only. See {@link mapHeaders}.
 */
export function resolve(headers: readonly string[], context: ResolverContext): MappingAssignment[] {
	return mapHeaders(headers, context).assignments;
}

/**
 * Compute the statistics of a set of assignments. Warnings are left empty;
 * they come from resolution only.
 */
export function summarizeMapping(
	assignments: MappingAssignment[],
	registry: SchemaRegistry,
	options?: MappingOptions
): MappingResult {
	const autoAcceptThreshold = options?.autoAcceptThreshold ?? DEFAULT_AUTO_ACCEPT_THRESHOLD;

	const unmappedHeaders: number[] = [];
	const assigned = new Set<string>();
	let autoMapped = 0;
	let needsReview = 0;

	for (const assignment of assignments) {
		if (assignment.canonicalField === null) {
			unmappedHeaders.push(assignment.index);
			continue;
		}

		assigned.add(assignment.canonicalField);
		if (assignment.method === "TOKEN_OVERLAP" || assignment.method === "FUZZY") {
			if (assignment.confidence >= autoAcceptThreshold) {
				autoMapped++;
			} else {
				needsReview++;
			}
		} else {
			autoMapped++;
		}
	}

	const unmappedFields = registry.names().filter((name) => !assigned.has(name));
	const missingRequiredFields = registry
		.requiredFields()
		.map((field) => field.name)
		.filter((name) => !assigned.has(name));

	return {
		assignments,
		warnings: [],
		unmappedHeaders,
		unmappedFields,
		missingRequiredFields,
		autoMapped,
		needsReview,
		unmapped: unmappedHeaders.length,
	};
}

/**
 * Set a header's field by hand (for user corrections).
 *
 * @param assignments - Current assignments
 * @param index - Input position of the header to change
 * @param field - Field to assign, or null to unmap
 * @returns Updated assignments; the input array is not modified
 */
export function overrideAssignment(
	assignments: MappingAssignment[],
	index: number,
	field: string | null
): MappingAssignment[] {
	const updated = [...assignments];

	const targetIdx = updated.findIndex((a) => a.index === index);
	if (targetIdx === -1) {
		return updated;
	}

	// A field belongs to one header: unmap whoever held it
	if (field !== null) {
		const holderIdx = updated.findIndex((a) => a.canonicalField === field && a.index !== index);
		if (holderIdx !== -1) {
			const { matchedVia: _dropped, ...holder } = updated[holderIdx];
			updated[holderIdx] = { ...holder, canonicalField: null, confidence: 0, method: "NONE" };
		}
	}

	const { matchedVia: _previous, ...target } = updated[targetIdx];
	updated[targetIdx] =
		field === null
			? { ...target, canonicalField: null, confidence: 0, method: "NONE" }
			: { ...target, canonicalField: field, confidence: 1, method: "MANUAL" };

	return updated;
}
