// Canonical Schema - target fields loaded once at startup

export { SchemaRegistry, createRegistry } from "./registry";
export type { FieldDefinition } from "./registry";
export { parseSchemaCsv, loadSchemaFile } from "./loader";
