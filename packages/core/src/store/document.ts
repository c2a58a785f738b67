import { z } from "zod";
import { PersistenceReadError } from "../errors";
import { type FixRule, REASON_CODES } from "../types";

// ============================================================================
// Promotion Document
// ============================================================================

const FixRuleRecordSchema = z.object({
	field: z.string().min(1),
	rule_type: z.enum(REASON_CODES),
	original: z.string(),
	replacement: z.string(),
	pattern: z.boolean().optional(),
});

export const PromotionDocumentSchema = z.object({
	header_aliases: z.record(z.string(), z.string().min(1)).default({}),
	fix_rules: z.array(FixRuleRecordSchema).default([]),
});

/** On-disk form of the promotion store */
export type PromotionDocument = z.infer<typeof PromotionDocumentSchema>;

/** In-memory contents of the promotion store */
export interface PromotionSnapshot {
	headerAliases: Map<string, string>;
	fixRules: FixRule[];
}

export function emptySnapshot(): PromotionSnapshot {
	return { headerAliases: new Map(), fixRules: [] };
}

/**
 * Parse stored text. Blank text is an empty store.
 *
 * @throws PersistenceReadError when the text is not JSON or not a promotion document
 */
export function parseDocument(text: string, location: string): PromotionSnapshot {
	if (!text.trim()) return emptySnapshot();

	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch (err) {
		throw new PersistenceReadError(`${location} is not valid JSON`, { cause: err });
	}

	const parsed = PromotionDocumentSchema.safeParse(json);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const path = issue?.path.join(".") || "document";
		throw new PersistenceReadError(`${location} is not a promotion document: ${path}: ${issue?.message}`, {
			cause: parsed.error,
		});
	}

	return {
		headerAliases: new Map(Object.entries(parsed.data.header_aliases)),
		fixRules: parsed.data.fix_rules.map((record) => {
			const rule: FixRule = {
				field: record.field,
				ruleType: record.rule_type,
				original: record.original,
				replacement: record.replacement,
			};
			if (record.pattern) rule.pattern = true;
			return rule;
		}),
	};
}

/**
 * Render a snapshot as a JSON document with two-space indentation.
 */
export function serializeDocument(snapshot: PromotionSnapshot): string {
	const document: PromotionDocument = {
		header_aliases: Object.fromEntries(snapshot.headerAliases),
		fix_rules: snapshot.fixRules.map((rule) => ({
			field: rule.field,
			rule_type: rule.ruleType,
			original: rule.original,
			replacement: rule.replacement,
			...(rule.pattern ? { pattern: true } : {}),
		})),
	};
	return `${JSON.stringify(document, null, 2)}\n`;
}
