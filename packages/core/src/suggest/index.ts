// Fix Suggestions - promoted rules first, then per-category heuristics

export { suggest, matchFixRule } from "./suggester";
export {
	HEURISTICS,
	domainTypo,
	missingCountryCode,
	invalidDate,
	malformedUrl,
	postalFormat,
} from "./heuristics";

export type {
	FixSuggestion,
	FixRuleSource,
	SuggestOptions,
	SuggestionSource,
	Heuristic,
	HeuristicContext,
	Proposal,
} from "./types";
