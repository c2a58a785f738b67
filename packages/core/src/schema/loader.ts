import { readFileSync } from "node:fs";
import Papa from "papaparse";
import { z } from "zod";
import { SchemaLoadError, describeError } from "../errors";
import { type Logger, defaultLogger } from "../logger";
import { type FieldDefinition, type SchemaRegistry, createRegistry } from "./registry";

// ============================================================================
// Schema File Loading
// ============================================================================

const SchemaRowSchema = z.object({
	name: z.string().trim().min(1, "name is empty"),
	category: z.string().trim().min(1, "category is empty"),
	required: z.string().optional(),
	synonyms: z.string().optional(),
});

const TRUE_VALUES = new Set(["true", "yes", "y", "1"]);
const FALSE_VALUES = new Set(["false", "no", "n", "0", ""]);

function parseRequired(value: string | undefined, field: string): boolean {
	const text = (value ?? "").trim().toLowerCase();
	if (TRUE_VALUES.has(text)) return true;
	if (FALSE_VALUES.has(text)) return false;
	throw new SchemaLoadError(`Field "${field}" has an unreadable required flag "${value}"`);
}

/**
 * Parse a canonical schema from CSV text.
 * Columns: name (or canonical_name), category, required, synonyms ("|"-separated).
 *
 * @throws SchemaLoadError when the text is not a usable schema
 */
export function parseSchemaCsv(text: string): SchemaRegistry {
	const parsed = Papa.parse<Record<string, string | undefined>>(text, {
		header: true,
		skipEmptyLines: "greedy",
		transformHeader: (header) => {
			const key = header.trim().toLowerCase();
			return key === "canonical_name" ? "name" : key;
		},
	});

	const fatal = parsed.errors.find((e) => e.type !== "FieldMismatch");
	if (fatal) {
		throw new SchemaLoadError(`Schema CSV is malformed: ${fatal.message} (row ${fatal.row ?? "?"})`);
	}

	const columns = parsed.meta.fields ?? [];
	if (!columns.includes("name") || !columns.includes("category")) {
		throw new SchemaLoadError('Schema CSV needs "name" (or "canonical_name") and "category" columns');
	}

	const definitions: FieldDefinition[] = parsed.data.map((row, index) => {
		const result = SchemaRowSchema.safeParse(row);
		if (!result.success) {
			const issue = result.error.issues[0];
			throw new SchemaLoadError(`Schema row ${index + 2}: ${issue?.message ?? "invalid row"}`);
		}
		const { name, category, required, synonyms } = result.data;
		return {
			name,
			category,
			required: parseRequired(required, name),
			synonyms: synonyms ? synonyms.split("|") : [],
		};
	});

	return createRegistry(definitions);
}

/**
 * Load the canonical schema from a CSV file. Read once at startup; there is
 * no reload.
 *
 * @throws SchemaLoadError when the file is missing, unreadable or malformed
 */
export function loadSchemaFile(path: string, logger: Logger = defaultLogger): SchemaRegistry {
	let text: string;
	try {
		text = readFileSync(path, "utf8");
	} catch (err) {
		logger.error("schema.load.unreadable", { path, error: describeError(err) });
		throw new SchemaLoadError(`Cannot read schema file ${path}: ${describeError(err)}`, { cause: err });
	}

	try {
		const registry = parseSchemaCsv(text);
		logger.info("schema.load.ok", { path, fields: registry.size });
		return registry;
	} catch (err) {
		logger.error("schema.load.invalid", { path, error: describeError(err) });
		throw err;
	}
}
