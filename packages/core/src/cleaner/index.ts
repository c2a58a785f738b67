// Cleaning Engine - per-category normalization with quality metrics

export {
	clean,
	applyFixes,
	computeMetrics,
	computeRawMetrics,
	isMissing,
	DEFAULT_MISSING_TOKENS,
} from "./cleaner";

export {
	CATEGORY_RULES,
	E164_PATTERN,
	EMAIL_PATTERN,
	TAX_ID_PATTERN,
	GENERIC_POSTAL_PATTERN,
	MIN_PHONE_DIGITS,
	MAX_PHONE_DIGITS,
	titleCase,
	isWellFormedUrl,
	hasScheme,
} from "./rules";

export { PROVIDER_DOMAINS, KNOWN_GOOD_DOMAINS, findDomainTypo } from "./domains";
export type { ProviderMatch } from "./domains";

export type {
	CategoryRule,
	CellFix,
	CellIssue,
	CellOutcome,
	CellStatus,
	CleaningOptions,
	CleaningResult,
	QualityMetrics,
	RuleContext,
} from "./types";
