import { levenshteinSimilarity } from "../mapper/similarity";

// ============================================================================
// Email Provider Domains
// ============================================================================

/**
 * Widely used mailbox providers. A domain this close to one of them, and not
 * itself known, is most likely a typo.
 */
export const PROVIDER_DOMAINS: ReadonlyArray<{ domain: string; threshold: number }> = [
	{ domain: "gmail.com", threshold: 0.75 },
	{ domain: "yahoo.com", threshold: 0.75 },
	{ domain: "hotmail.com", threshold: 0.8 },
	{ domain: "outlook.com", threshold: 0.8 },
	{ domain: "icloud.com", threshold: 0.8 },
	{ domain: "aol.com", threshold: 0.8 },
	{ domain: "protonmail.com", threshold: 0.8 },
];

/** Real domains that sit close to a provider */
export const KNOWN_GOOD_DOMAINS: ReadonlySet<string> = new Set([
	...PROVIDER_DOMAINS.map((p) => p.domain),
	"googlemail.com",
	"hotmail.co.uk",
	"yahoo.co.uk",
	"yahoo.co.in",
	"outlook.in",
	"ymail.com",
	"mail.com",
	"gmx.com",
	"live.com",
	"msn.com",
	"me.com",
	"mac.com",
	"proton.me",
]);

export interface ProviderMatch {
	domain: string;
	similarity: number;
}

/**
 * Provider a domain looks like a misspelling of, or null.
 */
export function findDomainTypo(domain: string): ProviderMatch | null {
	const candidate = domain.trim().toLowerCase();
	if (!candidate || KNOWN_GOOD_DOMAINS.has(candidate)) return null;

	let best: ProviderMatch | null = null;
	for (const provider of PROVIDER_DOMAINS) {
		const similarity = levenshteinSimilarity(candidate, provider.domain);
		if (similarity >= provider.threshold && (!best || similarity > best.similarity)) {
			best = { domain: provider.domain, similarity };
		}
	}
	return best;
}
