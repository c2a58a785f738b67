// ============================================================================
// Alias Dictionaries
// ============================================================================

import commonAliasData from "./common-aliases.json";
import { normalizeHeader } from "./similarity";
import type { AliasEntry, AliasSource } from "./types";

/** Alias text as written, with the field it points to */
export interface IndexedAlias {
	aliasText: string;
	field: string;
}

/** Normalized alias text → alias */
export type AliasIndex = ReadonlyMap<string, IndexedAlias>;

function buildIndex(entries: Iterable<[string, string]>, overwrite: boolean): Map<string, IndexedAlias> {
	const index = new Map<string, IndexedAlias>();
	for (const [aliasText, field] of entries) {
		const key = normalizeHeader(aliasText);
		if (!key) continue;
		if (!overwrite && index.has(key)) continue;
		index.set(key, { aliasText, field });
	}
	return index;
}

function* commonEntries(data: Record<string, readonly string[]>): Generator<[string, string]> {
	for (const [field, aliases] of Object.entries(data)) {
		for (const alias of aliases) {
			yield [alias, field];
		}
	}
}

/**
 * Built-in alias dictionary, keyed by normalized alias text.
 * When two fields list the same alias the first one listed keeps it.
 */
export const COMMON_ALIASES: AliasIndex = buildIndex(commonEntries(commonAliasData), false);

/**
 * Index a map of alias text → field. Keys are normalized; when two keys
 * normalize the same, the later entry wins unless `firstWins` is set.
 */
export function buildAliasIndex(aliases: ReadonlyMap<string, string>, firstWins = false): AliasIndex {
	return buildIndex(aliases.entries(), !firstWins);
}

/**
 * Read the alias map out of an alias source.
 */
export function aliasMap(source: AliasSource | undefined): ReadonlyMap<string, string> {
	if (!source) return new Map();
	if ("aliases" in source) return source.aliases();
	return source;
}

/**
 * List every alias the resolver knows, promoted ones first.
 */
export function listAliases(
	promoted?: AliasSource,
	common: ReadonlyMap<string, string> = commonAliasMap()
): AliasEntry[] {
	const entries: AliasEntry[] = [];
	for (const [aliasText, canonicalField] of aliasMap(promoted)) {
		entries.push({ aliasText, canonicalField, source: "PROMOTED" });
	}
	for (const [aliasText, canonicalField] of common) {
		entries.push({ aliasText, canonicalField, source: "COMMON" });
	}
	return entries;
}

/**
 * The built-in dictionary as alias text → field.
 */
export function commonAliasMap(): Map<string, string> {
	return new Map([...COMMON_ALIASES.values()].map((alias) => [alias.aliasText, alias.field]));
}
