import { COMMON_CURRENCY_SYMBOLS, getDateFormats } from "./registry";
import type { ParsedDate, RegionConfig } from "./types";

// ============================================================================
// Date Parsing & Validation
// ============================================================================

/** Days in each month (non-leap year) */
const DAYS_IN_MONTH = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

const MONTH_NAMES: Record<string, number> = {
	jan: 1,
	january: 1,
	feb: 2,
	february: 2,
	mar: 3,
	march: 3,
	apr: 4,
	april: 4,
	may: 5,
	jun: 6,
	june: 6,
	jul: 7,
	july: 7,
	aug: 8,
	august: 8,
	sep: 9,
	sept: 9,
	september: 9,
	oct: 10,
	october: 10,
	nov: 11,
	november: 11,
	dec: 12,
	december: 12,
};

export const MIN_YEAR = 1900;
export const MAX_YEAR = 2100;

/**
 * Check if a year is a leap year.
 */
export function isLeapYear(year: number): boolean {
	return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Get the number of days in a month, accounting for leap years.
 */
export function daysInMonth(month: number, year: number): number {
	if (month === 2 && isLeapYear(year)) {
		return 29;
	}
	return DAYS_IN_MONTH[month] || 0;
}

/**
 * Month number for an English month name or abbreviation, or 0.
 */
export function monthFromName(name: string): number {
	return MONTH_NAMES[name.toLowerCase().replace(/\.$/, "")] ?? 0;
}

/**
 * Expand a two-digit year: 00-49 → 2000s, 50-99 → 1900s.
 */
export function expandShortYear(year: number): number {
	return year < 50 ? 2000 + year : 1900 + year;
}

/**
 * Check that day, month and year form a real calendar date in range.
 */
export function isCalendarDate(date: ParsedDate): boolean {
	const { day, month, year } = date;
	if (year < MIN_YEAR || year > MAX_YEAR) return false;
	if (month < 1 || month > 12) return false;
	return day >= 1 && day <= daysInMonth(month, year);
}

/**
 * Parse a date string against formats tried in order. The first format
 * that yields a real calendar date wins; a shape match with an impossible
 * day or month falls through to the next format.
 * Returns null if no format gives a valid date.
 */
export function parseDate(value: string, formats: readonly string[]): ParsedDate | null {
	const text = value.trim().replace(/\s+/g, " ");
	if (!text) return null;

	for (const format of getDateFormats(formats)) {
		const match = text.match(format.regex);
		if (!match) continue;

		const day = Number.parseInt(match[format.dayIndex], 10);
		const month = format.monthIsName
			? monthFromName(match[format.monthIndex])
			: Number.parseInt(match[format.monthIndex], 10);
		let year = Number.parseInt(match[format.yearIndex], 10);
		if (format.shortYear) year = expandShortYear(year);

		const parsed = { day, month, year };
		if (isCalendarDate(parsed)) return parsed;
	}

	return null;
}

/**
 * Format date components as ISO 8601 calendar date (YYYY-MM-DD).
 */
export function formatISODate(date: ParsedDate): string {
	const { day, month, year } = date;
	return `${year}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

/**
 * Normalize a date in any of the given formats to ISO format (YYYY-MM-DD).
 */
export function normalizeDateToISO(value: string, formats: readonly string[]): string | null {
	const parsed = parseDate(value, formats);
	return parsed ? formatISODate(parsed) : null;
}

/**
 * Check that a value is already an ISO calendar date.
 */
export function isISODate(value: string): boolean {
	const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
	if (!match) return false;
	return isCalendarDate({
		year: Number(match[1]),
		month: Number(match[2]),
		day: Number(match[3]),
	});
}

// ============================================================================
// Amount Parsing
// ============================================================================

const NUMBER_SHAPE = /^[-+]?(\d+\.?\d*|\.\d+)$/;

/**
 * Strip currency symbols and codes from a value.
 */
export function stripCurrencySymbols(value: string, region?: RegionConfig): string {
	const symbols = [...(region?.currencySymbols ?? []), ...COMMON_CURRENCY_SYMBOLS].sort(
		(a, b) => b.length - a.length
	);

	let cleaned = value.trim();
	for (const symbol of symbols) {
		if (cleaned.includes(symbol)) {
			cleaned = cleaned.split(symbol).join("");
		}
	}
	return cleaned.trim();
}

/**
 * Parse an amount written with currency symbols and thousands separators.
 * Returns NaN if what remains is not a plain number.
 */
export function parseAmount(value: string, region?: RegionConfig): number {
	const thousandsSeparator = region?.thousandsSeparator ?? ",";
	const decimalSeparator = region?.decimalSeparator ?? ".";

	let cleaned = stripCurrencySymbols(value, region).replace(/\s+/g, "");

	if (thousandsSeparator.trim()) {
		cleaned = cleaned.split(thousandsSeparator).join("");
	}
	if (decimalSeparator !== ".") {
		cleaned = cleaned.replace(decimalSeparator, ".");
	}

	if (!NUMBER_SHAPE.test(cleaned)) {
		return Number.NaN;
	}
	return Number.parseFloat(cleaned);
}

// ============================================================================
// Phone Parsing
// ============================================================================

/**
 * Split a phone value into digits and whether it carried an international
 * prefix. A leading "00" counts as "+".
 */
export function splitPhone(value: string): { international: boolean; digits: string } {
	const trimmed = value.trim();
	let digits = trimmed.replace(/\D/g, "");
	let international = trimmed.startsWith("+");

	if (!international && digits.startsWith("00")) {
		international = true;
		digits = digits.slice(2);
	}

	return { international, digits };
}

/**
 * Strip the region's trunk prefix from a national number written with it.
 */
export function nationalNumber(digits: string, region: RegionConfig): string {
	const trunk = region.phoneTrunkPrefix;
	if (trunk && digits.startsWith(trunk) && digits.length === region.phoneNationalDigits + trunk.length) {
		return digits.slice(trunk.length);
	}
	return digits;
}

/**
 * Write national digits in E.164 form for the region.
 * Digits that already start with the country code at full length only gain "+".
 */
export function internationalizePhone(digits: string, region: RegionConfig): string {
	const countryCode = region.phoneCountryCode.replace("+", "");

	if (
		digits.length === countryCode.length + region.phoneNationalDigits &&
		digits.startsWith(countryCode)
	) {
		return `+${digits}`;
	}

	return `+${countryCode}${nationalNumber(digits, region)}`;
}
