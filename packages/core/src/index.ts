// @headwise/core - header mapping, cleaning and learned fixes for tabular imports

// Pipeline exports
export { runPipeline, acceptFixes, acceptMapping } from "./pipeline";
export type {
	PipelineContext,
	PipelineOptions,
	PipelineResult,
	PipelineReport,
	ColumnResult,
	ColumnReport,
	AcceptOptions,
} from "./pipeline";

// Table exports
export { parseCsv, toCsv } from "./table";

// Schema exports
export { SchemaRegistry, createRegistry, parseSchemaCsv, loadSchemaFile } from "./schema";
export type { FieldDefinition } from "./schema";

// Mapper exports
export {
	mapHeaders,
	resolve,
	overrideAssignment,
	summarizeMapping,
	listAliases,
	commonAliasMap,
	levenshtein,
	levenshteinSimilarity,
	normalizeHeader,
	tokenize,
	jaccard,
	TOKEN_OVERLAP_THRESHOLD,
	FUZZY_THRESHOLD,
	COMMON_ALIAS_CONFIDENCE,
} from "./mapper";
export type {
	AliasEntry,
	AliasSource,
	MappingAssignment,
	MappingMethod,
	MappingOptions,
	MappingResult,
	ResolverContext,
} from "./mapper";

// Cleaner exports
export { clean, applyFixes, computeMetrics, isMissing, findDomainTypo, DEFAULT_MISSING_TOKENS } from "./cleaner";
export type {
	CellFix,
	CellIssue,
	CellOutcome,
	CellStatus,
	CleaningOptions,
	CleaningResult,
	QualityMetrics,
} from "./cleaner";

// Suggester exports
export { suggest, matchFixRule } from "./suggest";
export type { FixSuggestion, FixRuleSource, SuggestOptions, SuggestionSource } from "./suggest";

// Store exports
export { PromotionStore, FileBackend, MemoryBackend } from "./store";
export type { StorageBackend, StoreOptions, PromoteFixOptions, PromotionSnapshot } from "./store";

// Region exports
export {
	getRegion,
	hasRegion,
	registerRegion,
	resolveRegion,
	parseDate,
	normalizeDateToISO,
	parseAmount,
	internationalizePhone,
} from "./region";
export type { RegionConfig, ParsedDate, PostalLayout } from "./region";

// Ambient
export { loadConfig, DEFAULT_SCHEMA_PATH, DEFAULT_STORE_PATH } from "./config";
export type { HeadwiseConfig } from "./config";
export { Logger, createLogger, memorySink, defaultLogger } from "./logger";
export type { LogLevel, LogRecord, LogSink, LoggerOptions } from "./logger";
export {
	HeadwiseError,
	SchemaLoadError,
	PersistenceReadError,
	PersistenceWriteError,
	FieldCleaningError,
	CsvParseError,
	UnknownFieldError,
	ERROR_CODES,
	describeError,
} from "./errors";
export type { ErrorCode } from "./errors";

// Types
export { FIELD_CATEGORIES, REASON_CODES, isFieldCategory } from "./types";
export type {
	FieldCategory,
	CanonicalField,
	RawValue,
	CellValue,
	Table,
	AmbiguousMappingWarning,
	PersistenceWarning,
	HeadwiseWarning,
	ReasonCode,
	FixRule,
} from "./types";
