// ============================================================================
// Fix Promotion Store
// ============================================================================

import { describeError } from "../errors";
import { type Logger, defaultLogger } from "../logger";
import { normalizeHeader } from "../mapper/similarity";
import { matchFixRule } from "../suggest/suggester";
import type { FixRule, PersistenceWarning, ReasonCode } from "../types";
import { FileBackend, type StorageBackend } from "./backend";
import { type PromotionSnapshot, emptySnapshot, parseDocument, serializeDocument } from "./document";

export interface StoreOptions {
	logger?: Logger;
}

export interface PromoteFixOptions {
	/** Treat `original` as a regular expression over the whole value */
	pattern?: boolean;
}

function sameKey(rule: FixRule, field: string, ruleType: ReasonCode, original: string): boolean {
	return rule.field === field && rule.ruleType === ruleType && rule.original === original;
}

/**
 * User-confirmed header aliases and fix rules, kept across sessions.
 *
 * Loading never throws: an unreadable or corrupt document gives an empty
 * store and a warning. Saving never throws either: a failed write returns a
 * warning and the in-memory state stays usable.
 */
export class PromotionStore {
	private readonly headerAliases: Map<string, string>;
	private readonly rules: FixRule[];
	private readonly warningList: PersistenceWarning[] = [];
	private readonly logger: Logger;

	private constructor(
		private readonly backend: StorageBackend,
		snapshot: PromotionSnapshot,
		logger: Logger
	) {
		this.headerAliases = snapshot.headerAliases;
		this.rules = snapshot.fixRules;
		this.logger = logger.with({ store: backend.location });
	}

	/**
	 * Open a store over a backend.
	 */
	static load(backend: StorageBackend, options?: StoreOptions): PromotionStore {
		const logger = options?.logger ?? defaultLogger;

		let snapshot = emptySnapshot();
		let warning: PersistenceWarning | null = null;
		try {
			const text = backend.read();
			if (text !== null) snapshot = parseDocument(text, backend.location);
		} catch (err) {
			const message = describeError(err);
			warning = { kind: "persistence_read", message, location: backend.location };
		}

		const store = new PromotionStore(backend, snapshot, logger);
		if (warning) {
			store.warningList.push(warning);
			store.logger.warn("store.load.failed", { error: warning.message }, "Starting with an empty store");
		} else {
			store.logger.info("store.load.ok", {
				aliases: snapshot.headerAliases.size,
				rules: snapshot.fixRules.length,
			});
		}
		return store;
	}

	/**
	 * Open a store backed by a JSON file.
	 */
	static open(path: string, options?: StoreOptions): PromotionStore {
		return PromotionStore.load(new FileBackend(path), options);
	}

	/** Read and write problems so far, oldest first */
	get warnings(): readonly PersistenceWarning[] {
		return this.warningList;
	}

	/**
	 * Record that a raw header means a canonical field. Any stored alias
	 * that normalizes to the same header is replaced, so the newest
	 * promotion wins whatever order a reloaded document lists its keys in.
	 *
	 * @returns false when the alias was already promoted to that field
	 */
	promoteAlias(rawHeader: string, field: string): boolean {
		if (this.headerAliases.get(rawHeader) === field) return false;
		const key = normalizeHeader(rawHeader);
		for (const existing of [...this.headerAliases.keys()]) {
			if (normalizeHeader(existing) === key) this.headerAliases.delete(existing);
		}
		this.headerAliases.set(rawHeader, field);
		this.logger.debug("store.alias.promoted", { rawHeader, field });
		return true;
	}

	/**
	 * Record an accepted fix. Keyed by (field, ruleType, original); a later
	 * promotion with the same key replaces the replacement.
	 *
	 * @returns false when an identical rule is already stored
	 */
	promoteFix(
		field: string,
		ruleType: ReasonCode,
		original: string,
		replacement: string,
		options?: PromoteFixOptions
	): boolean {
		const rule: FixRule = { field, ruleType, original, replacement };
		if (options?.pattern) rule.pattern = true;

		const index = this.rules.findIndex((r) => sameKey(r, field, ruleType, original));
		if (index === -1) {
			this.rules.push(rule);
		} else {
			const existing = this.rules[index];
			if (existing.replacement === replacement && Boolean(existing.pattern) === Boolean(rule.pattern)) {
				return false;
			}
			this.rules[index] = rule;
		}

		this.logger.debug("store.fix.promoted", { field, ruleType });
		return true;
	}

	/** Promoted aliases, raw header → field, in promotion order */
	aliases(): ReadonlyMap<string, string> {
		return this.headerAliases;
	}

	/** Promoted fix rules, in promotion order */
	fixRules(): readonly FixRule[] {
		return this.rules;
	}

	/**
	 * The rule that applies to a value, exact rules before pattern rules.
	 */
	findRule(field: string, value: string): FixRule | undefined {
		return matchFixRule(this.rules, field, value, this.logger)?.rule;
	}

	/** Copy of the current contents */
	snapshot(): PromotionSnapshot {
		return {
			headerAliases: new Map(this.headerAliases),
			fixRules: this.rules.map((rule) => ({ ...rule })),
		};
	}

	/**
	 * Write the store to its backend.
	 *
	 * @returns null on success, or the warning for a failed write
	 */
	save(): PersistenceWarning | null {
		try {
			this.backend.write(serializeDocument({ headerAliases: this.headerAliases, fixRules: this.rules }));
			this.logger.debug("store.save.ok", { aliases: this.headerAliases.size, rules: this.rules.length });
			return null;
		} catch (err) {
			const message = describeError(err);
			const warning: PersistenceWarning = {
				kind: "persistence_write",
				message,
				location: this.backend.location,
			};
			this.warningList.push(warning);
			this.logger.warn("store.save.failed", { error: message });
			return warning;
		}
	}
}
