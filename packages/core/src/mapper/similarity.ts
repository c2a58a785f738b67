// ============================================================================
// String Similarity Functions for Header Mapping
// ============================================================================

/**
 * Compute Levenshtein edit distance between two strings.
 * Uses Wagner-Fischer dynamic programming algorithm.
 * Time: O(n*m), Space: O(min(n,m))
 */
export function levenshtein(a: string, b: string): number {
	// Early exits
	if (a === b) return 0;
	if (a.length === 0) return b.length;
	if (b.length === 0) return a.length;

	// Ensure shorter is the first string (optimize space)
	const shorter = a.length <= b.length ? a : b;
	const longer = a.length <= b.length ? b : a;

	const aLen = shorter.length;
	const bLen = longer.length;

	// Use two rows instead of full matrix
	let prevRow = new Array<number>(aLen + 1);
	let currRow = new Array<number>(aLen + 1);

	for (let i = 0; i <= aLen; i++) {
		prevRow[i] = i;
	}

	for (let j = 1; j <= bLen; j++) {
		currRow[0] = j;

		for (let i = 1; i <= aLen; i++) {
			const cost = shorter[i - 1] === longer[j - 1] ? 0 : 1;
			currRow[i] = Math.min(
				prevRow[i] + 1, // deletion
				currRow[i - 1] + 1, // insertion
				prevRow[i - 1] + cost // substitution
			);
		}

		const temp = prevRow;
		prevRow = currRow;
		currRow = temp;
	}

	return prevRow[aLen];
}

/**
 * Compute normalized Levenshtein similarity (0-1 range).
 * 1 = identical, 0 = completely different
 */
export function levenshteinSimilarity(a: string, b: string): number {
	if (a === b) return 1;
	const maxLen = Math.max(a.length, b.length);
	if (maxLen === 0) return 1;
	return 1 - levenshtein(a, b) / maxLen;
}

/**
 * Normalize a header for comparison.
 * - Split camelCase boundaries ("HomePage" → "Home Page")
 * - Lowercase
 * - Replace every run of punctuation, underscores and whitespace with one space
 * - Trim
 *
 * "Tel No." → "tel no", "VAT#" → "vat", "postal_code" → "postal code"
 */
export function normalizeHeader(str: string): string {
	return str
		.trim()
		.replace(/(\p{Ll}|\d)(\p{Lu})/gu, "$1 $2")
		.toLowerCase()
		.replace(/[^\p{L}\p{N}]+/gu, " ")
		.trim();
}

/**
 * Tokenize a string into normalized words.
 */
export function tokenize(str: string): string[] {
	return normalizeHeader(str)
		.split(" ")
		.filter((t) => t.length > 0);
}

/**
 * Jaccard similarity of two token sets: |A ∩ B| / |A ∪ B|.
 * Empty input gives 0.
 */
export function jaccard(a: readonly string[], b: readonly string[]): number {
	const setA = new Set(a);
	const setB = new Set(b);
	if (setA.size === 0 || setB.size === 0) return 0;

	let shared = 0;
	for (const token of setA) {
		if (setB.has(token)) shared++;
	}
	return shared / (setA.size + setB.size - shared);
}
