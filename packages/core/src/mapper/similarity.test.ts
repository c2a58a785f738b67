import { describe, expect, test } from "vitest";
import { jaccard, levenshtein, levenshteinSimilarity, normalizeHeader, tokenize } from "./similarity";

// ============================================================================
// Levenshtein Distance Tests
// ============================================================================

describe("levenshtein", () => {
	test("identical strings have distance 0", () => {
		expect(levenshtein("phone", "phone")).toBe(0);
		expect(levenshtein("", "")).toBe(0);
	});

	test("single character difference", () => {
		expect(levenshtein("email", "emall")).toBe(1); // substitution
		expect(levenshtein("email", "emai")).toBe(1); // deletion
		expect(levenshtein("email", "emaill")).toBe(1); // insertion
	});

	test("empty string comparisons", () => {
		expect(levenshtein("", "city")).toBe(4);
		expect(levenshtein("city", "")).toBe(4);
	});

	test("transposed letters cost two edits", () => {
		expect(levenshtein("gamil.com", "gmail.com")).toBe(2);
		expect(levenshtein("phoen", "phone")).toBe(2);
	});

	test("argument order does not matter", () => {
		expect(levenshtein("tax id", "tax identifier")).toBe(levenshtein("tax identifier", "tax id"));
	});

	test("accented characters count as single edits", () => {
		expect(levenshtein("société", "societe")).toBe(2);
	});
});

// ============================================================================
// Levenshtein Similarity Tests
// ============================================================================

describe("levenshteinSimilarity", () => {
	test("identical strings have similarity 1", () => {
		expect(levenshteinSimilarity("website", "website")).toBe(1);
		expect(levenshteinSimilarity("", "")).toBe(1);
	});

	test("scales distance by the longer string", () => {
		expect(levenshteinSimilarity("gamil.com", "gmail.com")).toBeCloseTo(7 / 9, 10);
		expect(levenshteinSimilarity("emial", "email")).toBeCloseTo(0.6, 10);
	});

	test("completely different strings have similarity 0", () => {
		expect(levenshteinSimilarity("abc", "xyz")).toBe(0);
	});
});

// ============================================================================
// Header Normalization Tests
// ============================================================================

describe("normalizeHeader", () => {
	test("trims and lowercases", () => {
		expect(normalizeHeader("  EMAIL  ")).toBe("email");
		expect(normalizeHeader("\tCity\n")).toBe("city");
	});

	test("replaces punctuation runs with a single space", () => {
		expect(normalizeHeader("Tel No.")).toBe("tel no");
		expect(normalizeHeader("VAT#")).toBe("vat");
		expect(normalizeHeader("postal_code")).toBe("postal code");
		expect(normalizeHeader("E-Mail_Address")).toBe("e mail address");
		expect(normalizeHeader("zip / postal")).toBe("zip postal");
	});

	test("splits camelCase boundaries", () => {
		expect(normalizeHeader("HomePage")).toBe("home page");
		expect(normalizeHeader("customerID")).toBe("customer id");
		expect(normalizeHeader("address2Line")).toBe("address2 line");
	});

	test("keeps all-caps words together", () => {
		expect(normalizeHeader("GSTIN")).toBe("gstin");
	});

	test("keeps non-ASCII letters", () => {
		expect(normalizeHeader("Société_Nom")).toBe("société nom");
	});

	test("punctuation-only header normalizes to empty", () => {
		expect(normalizeHeader(" -- ")).toBe("");
	});
});

// ============================================================================
// Tokenize Tests
// ============================================================================

describe("tokenize", () => {
	test("splits normalized words", () => {
		expect(tokenize("Contact Email")).toEqual(["contact", "email"]);
		expect(tokenize("date_established")).toEqual(["date", "established"]);
	});

	test("empty input gives no tokens", () => {
		expect(tokenize("")).toEqual([]);
		expect(tokenize("   ")).toEqual([]);
	});
});

// ============================================================================
// Jaccard Tests
// ============================================================================

describe("jaccard", () => {
	test("identical sets score 1", () => {
		expect(jaccard(["email", "address"], ["address", "email"])).toBe(1);
	});

	test("partial overlap", () => {
		expect(jaccard(["email", "address"], ["email"])).toBe(0.5);
		expect(jaccard(["a", "b"], ["b", "c"])).toBeCloseTo(1 / 3, 10);
	});

	test("duplicates are counted once", () => {
		expect(jaccard(["a", "a"], ["a"])).toBe(1);
	});

	test("empty input scores 0", () => {
		expect(jaccard([], ["email"])).toBe(0);
		expect(jaccard(["email"], [])).toBe(0);
	});
});
