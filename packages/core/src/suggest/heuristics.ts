import { findDomainTypo } from "../cleaner/domains";
import { hasScheme, isWellFormedUrl } from "../cleaner/rules";
import { levenshteinSimilarity } from "../mapper/similarity";
import {
	type ParsedDate,
	type RegionConfig,
	expandShortYear,
	formatISODate,
	isCalendarDate,
	monthFromName,
	nationalNumber,
} from "../region";
import type { FieldCategory } from "../types";
import type { Heuristic } from "./types";

// ============================================================================
// Helpers
// ============================================================================

/** Text of the cell as cleaned */
function cellText(value: unknown): string {
	return value === null || value === undefined ? "" : String(value).trim();
}

function isoIfValid(date: ParsedDate): string | null {
	return isCalendarDate(date) ? formatISODate(date) : null;
}

/** Whether the region writes the day before the month. Month-first without a region */
function isDayFirst(region?: RegionConfig): boolean {
	return region?.dateFormats[0]?.startsWith("DD") ?? false;
}

// ============================================================================
// Email
// ============================================================================

export const domainTypo: Heuristic = (cell) => {
	const value = cellText(cell.value);
	const at = value.lastIndexOf("@");
	if (at <= 0) return null;

	const match = findDomainTypo(value.slice(at + 1));
	if (!match) return null;
	return {
		suggestedValue: `${value.slice(0, at + 1)}${match.domain}`,
		reasonCode: "DOMAIN_TYPO",
		confidence: match.similarity,
	};
};

// ============================================================================
// Phone
// ============================================================================

export const missingCountryCode: Heuristic = (cell, { region }) => {
	const digits = cellText(cell.value);
	if (!region || !/^\d{7,15}$/.test(digits)) return null;

	const national = nationalNumber(digits, region);
	return {
		suggestedValue: `${region.phoneCountryCode}${national}`,
		reasonCode: "MISSING_COUNTRY_CODE",
		confidence: national.length === region.phoneNationalDigits ? 0.9 : 0.6,
	};
};

// ============================================================================
// Date
// ============================================================================

const NUMERIC_DATE = /^(\d{1,2})([/.-])(\d{1,2})\2(\d{4})$/;
const SHORT_YEAR_DATE = /^(\d{1,2})([/.-])(\d{1,2})\2(\d{2})$/;
const MONTH_YEAR = /^([A-Za-z]{3,9})\.?[\s,-]+(\d{4})$/;

/**
 * Read "a/b/y" the way the region reads it, or the other way round.
 */
function readParts(a: number, b: number, year: number, dayFirst: boolean): ParsedDate {
	return dayFirst ? { day: a, month: b, year } : { day: b, month: a, year };
}

export const invalidDate: Heuristic = (cell, { region }) => {
	const text = cellText(cell.value).replace(/\s+/g, " ");
	const dayFirst = isDayFirst(region);

	const numeric = NUMERIC_DATE.exec(text);
	if (numeric) {
		const swapped = isoIfValid(readParts(Number(numeric[1]), Number(numeric[3]), Number(numeric[4]), !dayFirst));
		return swapped ? { suggestedValue: swapped, reasonCode: "INVALID_DATE", confidence: 0.6 } : null;
	}

	const short = SHORT_YEAR_DATE.exec(text);
	if (short) {
		const year = expandShortYear(Number(short[4]));
		const expanded = isoIfValid(readParts(Number(short[1]), Number(short[3]), year, dayFirst));
		return expanded ? { suggestedValue: expanded, reasonCode: "INVALID_DATE", confidence: 0.5 } : null;
	}

	const monthYear = MONTH_YEAR.exec(text);
	if (monthYear) {
		const first = isoIfValid({ day: 1, month: monthFromName(monthYear[1]), year: Number(monthYear[2]) });
		return first ? { suggestedValue: first, reasonCode: "INVALID_DATE", confidence: 0.4 } : null;
	}

	return null;
};

// ============================================================================
// URL
// ============================================================================

const SCHEME_TYPO = /^([a-z]{2,6})(:\/{1,3}|:|\/{2})(?!\/)(.+)$/i;
const URL_PARTS = /^([a-z][a-z0-9+.-]*:\/\/)([^/:?#]+)(.*)$/i;
const WEB_SCHEMES = ["http", "https"];

function fixScheme(text: string): string | null {
	const match = SCHEME_TYPO.exec(text);
	if (!match) return null;

	const written = match[1].toLowerCase();
	let best: { scheme: string; similarity: number } | null = null;
	for (const scheme of WEB_SCHEMES) {
		const similarity = levenshteinSimilarity(written, scheme);
		if (similarity >= 0.6 && (!best || similarity > best.similarity)) best = { scheme, similarity };
	}
	if (!best) return null;

	const fixed = `${best.scheme}://${match[3]}`;
	return fixed !== text && isWellFormedUrl(fixed) ? fixed : null;
}

function appendTld(text: string): string | null {
	const match = URL_PARTS.exec(text);
	if (!match || !/^[a-z0-9-]+$/i.test(match[2])) return null;
	const fixed = `${match[1]}${match[2]}.com${match[3]}`;
	return isWellFormedUrl(fixed) ? fixed : null;
}

export const malformedUrl: Heuristic = (cell) => {
	// The scheme is checked on the text as entered: cleaning prefixes "https://"
	// to anything without a well-formed scheme.
	const entered = typeof cell.original === "string" ? cell.original.trim() : cellText(cell.value);
	const schemeFixed = fixScheme(entered);
	if (schemeFixed) {
		return { suggestedValue: schemeFixed, reasonCode: "MALFORMED_URL", confidence: 0.7 };
	}

	const value = cellText(cell.value);
	const withTld = appendTld(hasScheme(value) ? value : `https://${value}`);
	return withTld ? { suggestedValue: withTld, reasonCode: "MALFORMED_URL", confidence: 0.5 } : null;
};

// ============================================================================
// Postal Code
// ============================================================================

export const postalFormat: Heuristic = (cell, { region }) => {
	if (!region) return null;
	const stripped = cellText(cell.value)
		.replace(/[^A-Za-z0-9]/g, "")
		.toUpperCase();

	for (const layout of region.postalLayouts) {
		if (layout.length !== stripped.length) continue;
		const candidate = `${stripped.slice(0, layout.split)}${layout.separator}${stripped.slice(layout.split)}`;
		if (region.postalPattern.test(candidate)) {
			return { suggestedValue: candidate, reasonCode: "POSTAL_FORMAT", confidence: 0.8 };
		}
	}
	return null;
};

/**
 * Heuristic for each category that has one.
 */
export const HEURISTICS: Partial<Record<FieldCategory, Heuristic>> = {
	email: domainTypo,
	phone: missingCountryCode,
	date: invalidDate,
	url: malformedUrl,
	postal_code: postalFormat,
};

