import { describe, expect, test } from "vitest";
import {
	DEFAULT_SCHEMA_PATH,
	MemoryBackend,
	PromotionStore,
	createLogger,
	loadSchemaFile,
	parseCsv,
	runPipeline,
	toCsv,
} from "./index";

const quiet = createLogger({ level: "silent" });

describe("public API", () => {
	test("the bundled schema loads", () => {
		const registry = loadSchemaFile(DEFAULT_SCHEMA_PATH, quiet);

		expect(registry.size).toBe(15);
		expect(registry.requiredFields().map((f) => f.name)).toEqual(["company_name", "email"]);
	});

	test("CSV in, cleaned CSV and suggestions out", () => {
		const registry = loadSchemaFile(DEFAULT_SCHEMA_PATH, quiet);
		const store = PromotionStore.load(new MemoryBackend(), { logger: quiet });
		const table = parseCsv("Company,Tel No.,Email\nacme corp,(555) 123-4567,jane@gamil.com\n");

		const result = runPipeline(table, { registry, store, region: "US", logger: quiet });

		expect(toCsv(result.cleanedTable)).toBe("company_name,phone,email\nAcme Corp,+15551234567,jane@gamil.com");
		expect(result.suggestions.map((s) => [s.field, s.suggestedValue, s.reasonCode])).toEqual([
			["email", "jane@gmail.com", "DOMAIN_TYPO"],
		]);
		expect(result.report.missingRequiredFields).toEqual([]);
	});
});
