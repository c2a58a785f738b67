import { SchemaLoadError } from "../errors";
import type { CanonicalField, FieldCategory } from "../types";
import { isFieldCategory } from "../types";

// ============================================================================
// Canonical Schema Registry
// ============================================================================

export interface FieldDefinition {
	name: string;
	category: FieldCategory | string;
	required?: boolean;
	synonyms?: readonly string[];
}

/**
 * Read-only, ordered set of canonical fields. Order is the schema file's
 * row order and is used as the last tie-break when mapping headers.
 */
export class SchemaRegistry {
	private readonly byName: ReadonlyMap<string, CanonicalField>;
	readonly fields: readonly CanonicalField[];

	constructor(fields: readonly CanonicalField[]) {
		this.fields = Object.freeze([...fields]);
		this.byName = new Map(this.fields.map((field) => [field.name, field]));
	}

	get size(): number {
		return this.fields.length;
	}

	get(name: string): CanonicalField | undefined {
		return this.byName.get(name);
	}

	has(name: string): boolean {
		return this.byName.has(name);
	}

	names(): string[] {
		return this.fields.map((field) => field.name);
	}

	requiredFields(): CanonicalField[] {
		return this.fields.filter((field) => field.required);
	}
}

/**
 * Build a registry from field definitions.
 *
 * @throws SchemaLoadError on an empty schema, a blank or duplicate name,
 * or an unknown category
 */
export function createRegistry(definitions: readonly FieldDefinition[]): SchemaRegistry {
	if (definitions.length === 0) {
		throw new SchemaLoadError("Schema defines no fields");
	}

	const seen = new Set<string>();
	const fields: CanonicalField[] = [];

	definitions.forEach((definition, index) => {
		const name = definition.name.trim();
		if (!name) {
			throw new SchemaLoadError(`Field ${index + 1} has no name`);
		}
		if (seen.has(name)) {
			throw new SchemaLoadError(`Duplicate canonical field "${name}"`);
		}

		const category = definition.category.trim().toLowerCase();
		if (!isFieldCategory(category)) {
			throw new SchemaLoadError(`Field "${name}" has unknown category "${definition.category}"`);
		}

		seen.add(name);
		fields.push(
			Object.freeze({
				name,
				category,
				required: definition.required ?? false,
				synonyms: Object.freeze(
					(definition.synonyms ?? []).map((s) => s.trim()).filter((s) => s.length > 0)
				),
			})
		);
	});

	return new SchemaRegistry(fields);
}
