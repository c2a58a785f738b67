import { describe, expect, test } from "vitest";
import { COMMON_ALIASES, commonAliasMap, listAliases } from "./aliases";

// ============================================================================
// Alias Listing
// ============================================================================

describe("listAliases", () => {
	test("promoted aliases come before the common ones", () => {
		const promoted = new Map([
			["Firma Adı", "company_name"],
			["Tel No.", "fax"],
		]);
		const common = new Map([["e mail", "email"]]);

		expect(listAliases(promoted, common)).toEqual([
			{ aliasText: "Firma Adı", canonicalField: "company_name", source: "PROMOTED" },
			{ aliasText: "Tel No.", canonicalField: "fax", source: "PROMOTED" },
			{ aliasText: "e mail", canonicalField: "email", source: "COMMON" },
		]);
	});

	test("reads promoted aliases from a store-like source", () => {
		const store = { aliases: () => new Map([["Cust Mail", "email"]]) };

		expect(listAliases(store, new Map())).toEqual([
			{ aliasText: "Cust Mail", canonicalField: "email", source: "PROMOTED" },
		]);
	});

	test("defaults to the built-in dictionary", () => {
		const entries = listAliases();

		expect(entries).toHaveLength(COMMON_ALIASES.size);
		expect(entries[0]).toEqual({ aliasText: "order id", canonicalField: "order_id", source: "COMMON" });
		expect(entries.every((entry) => entry.source === "COMMON")).toBe(true);
	});
});

describe("commonAliasMap", () => {
	test("maps alias text to field, first listing kept", () => {
		const map = commonAliasMap();

		expect(map.size).toBe(COMMON_ALIASES.size);
		expect(map.get("vat")).toBe("tax_id");
		expect(map.get("e mail")).toBe("email");
	});
});
