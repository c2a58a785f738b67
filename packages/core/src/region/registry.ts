import type { DateFormatInfo, RegionConfig } from "./types";

// ============================================================================
// Built-in Region Configurations
// ============================================================================

const usRegion: RegionConfig = {
	id: "US",

	// Date: MM/DD/YYYY
	dateFormats: ["MM/DD/YYYY", "MM-DD-YYYY"],

	// Number: 1,234.56
	thousandsSeparator: ",",
	decimalSeparator: ".",
	currencySymbols: ["US$", "$", "USD"],

	// Phone: +1 (XXX) XXX-XXXX
	phoneCountryCode: "+1",
	phoneNationalDigits: 10,

	// ZIP or ZIP+4
	postalPattern: /^\d{5}(-\d{4})?$/,
	postalLayouts: [{ length: 9, split: 5, separator: "-" }],
};

const gbRegion: RegionConfig = {
	id: "GB",

	// Date: DD/MM/YYYY
	dateFormats: ["DD/MM/YYYY", "DD-MM-YYYY", "DD.MM.YYYY"],

	thousandsSeparator: ",",
	decimalSeparator: ".",
	currencySymbols: ["£", "GBP"],

	// Phone: +44, 0 trunk prefix
	phoneCountryCode: "+44",
	phoneTrunkPrefix: "0",
	phoneNationalDigits: 10,

	// Outward and inward code separated by a space: SW1A 1AA
	postalPattern: /^[A-Z]{1,2}\d[A-Z\d]? \d[A-Z]{2}$/,
	postalLayouts: [
		{ length: 5, split: 2, separator: " " },
		{ length: 6, split: 3, separator: " " },
		{ length: 7, split: 4, separator: " " },
	],
};

const inRegion: RegionConfig = {
	id: "IN",

	dateFormats: ["DD/MM/YYYY", "DD-MM-YYYY", "DD.MM.YYYY"],

	// Lakh grouping (15,00,000) uses the same separator
	thousandsSeparator: ",",
	decimalSeparator: ".",
	currencySymbols: ["₹", "Rs.", "Rs", "INR"],

	// Phone: +91 XXXXX XXXXX
	phoneCountryCode: "+91",
	phoneTrunkPrefix: "0",
	phoneNationalDigits: 10,

	// PIN code
	postalPattern: /^\d{6}$/,
	postalLayouts: [],
};

const deRegion: RegionConfig = {
	id: "DE",

	// Date: DD.MM.YYYY
	dateFormats: ["DD.MM.YYYY", "DD/MM/YYYY"],

	// Number: 1.234,56
	thousandsSeparator: ".",
	decimalSeparator: ",",
	currencySymbols: ["€", "EUR"],

	// Phone: +49, national numbers vary in length
	phoneCountryCode: "+49",
	phoneTrunkPrefix: "0",
	phoneNationalDigits: 11,

	postalPattern: /^\d{5}$/,
	postalLayouts: [],
};

const frRegion: RegionConfig = {
	id: "FR",

	// Date: DD/MM/YYYY
	dateFormats: ["DD/MM/YYYY", "DD.MM.YYYY"],

	// Number: 1 234,56 (space as thousands separator)
	thousandsSeparator: " ",
	decimalSeparator: ",",
	currencySymbols: ["€", "EUR"],

	// Phone: +33 X XX XX XX XX
	phoneCountryCode: "+33",
	phoneTrunkPrefix: "0",
	phoneNationalDigits: 9,

	postalPattern: /^\d{5}$/,
	postalLayouts: [],
};

const trRegion: RegionConfig = {
	id: "TR",

	dateFormats: ["DD.MM.YYYY", "DD/MM/YYYY"],

	// Number: 1.234,56
	thousandsSeparator: ".",
	decimalSeparator: ",",
	currencySymbols: ["₺", "TRY", "TL"],

	// Phone: +90 5XX XXX XX XX
	phoneCountryCode: "+90",
	phoneTrunkPrefix: "0",
	phoneNationalDigits: 10,

	postalPattern: /^\d{5}$/,
	postalLayouts: [],
};

// ============================================================================
// Region Registry
// ============================================================================

const regionRegistry = new Map<string, RegionConfig>();

for (const region of [usRegion, gbRegion, inRegion, deRegion, frRegion, trRegion]) {
	regionRegistry.set(region.id, region);
}

// Alias
regionRegistry.set("UK", gbRegion);

/**
 * Get a region configuration by code (case-insensitive).
 * Returns undefined for unknown codes: there is no fallback region.
 */
export function getRegion(regionId: string): RegionConfig | undefined {
	return regionRegistry.get(regionId.toUpperCase());
}

/**
 * Check if a region is registered.
 */
export function hasRegion(regionId: string): boolean {
	return regionRegistry.has(regionId.toUpperCase());
}

/**
 * Register a custom region configuration. Replaces a built-in with the same id.
 */
export function registerRegion(config: RegionConfig): void {
	regionRegistry.set(config.id.toUpperCase(), config);
}

/**
 * Accept a region object or a code. Unknown codes resolve to undefined.
 */
export function resolveRegion(region: RegionConfig | string | undefined): RegionConfig | undefined {
	if (region === undefined) return undefined;
	return typeof region === "string" ? getRegion(region) : region;
}

// ============================================================================
// Date Formats
// ============================================================================

/** Unambiguous year-first forms, always tried first */
export const ISO_DATE_FORMATS = ["YYYY-MM-DD", "YYYY/MM/DD", "YYYY.MM.DD"];

/** Used when no region is configured: month-first, then day-first */
export const FALLBACK_DATE_FORMATS = ["MM/DD/YYYY", "MM-DD-YYYY", "DD/MM/YYYY", "DD-MM-YYYY"];

/** Month-name forms, tried last */
export const NAMED_DATE_FORMATS = ["DD MMM YYYY", "DD-MMM-YYYY", "MMM DD, YYYY", "MMM DD YYYY"];

/**
 * Ordered input formats for a region: ISO forms, then the region's own
 * (month-first, then day-first without a region), then month-name forms.
 */
export function getDateFormatList(region?: RegionConfig): string[] {
	return [...ISO_DATE_FORMATS, ...(region?.dateFormats ?? FALLBACK_DATE_FORMATS), ...NAMED_DATE_FORMATS];
}

const dateFormatCache = new Map<string, DateFormatInfo>();

/**
 * Parse date format string into regex and index mappings.
 * Tokens: YYYY, YY, MMM (month name), MM (1-2 digits), DD (1-2 digits).
 */
function parseDateFormat(format: string): DateFormatInfo {
	let regex = "";
	let dayIndex = 0;
	let monthIndex = 0;
	let yearIndex = 0;
	let groupIndex = 0;
	let monthIsName = false;
	let shortYear = false;

	const parts = format.split(/([DMY]+)/);

	for (const part of parts) {
		if (!part) continue;

		if (part === "DD") {
			groupIndex++;
			dayIndex = groupIndex;
			regex += "(\\d{1,2})";
		} else if (part === "MM") {
			groupIndex++;
			monthIndex = groupIndex;
			regex += "(\\d{1,2})";
		} else if (part === "MMM") {
			groupIndex++;
			monthIndex = groupIndex;
			monthIsName = true;
			regex += "([A-Za-z]{3,9})\\.?";
		} else if (part === "YYYY") {
			groupIndex++;
			yearIndex = groupIndex;
			regex += "(\\d{4})";
		} else if (part === "YY") {
			groupIndex++;
			yearIndex = groupIndex;
			shortYear = true;
			regex += "(\\d{2})";
		} else {
			// Separator - escape regex special chars
			regex += part.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
		}
	}

	return {
		format,
		regex: new RegExp(`^${regex}$`, "i"),
		dayIndex,
		monthIndex,
		yearIndex,
		monthIsName,
		shortYear,
	};
}

/**
 * Get compiled descriptors for a list of format strings.
 */
export function getDateFormats(formats: readonly string[]): DateFormatInfo[] {
	return formats.map((format) => {
		const cached = dateFormatCache.get(format);
		if (cached) return cached;
		const info = parseDateFormat(format);
		dateFormatCache.set(format, info);
		return info;
	});
}

// ============================================================================
// Currency Symbols
// ============================================================================

/** Stripped from amounts regardless of region */
export const COMMON_CURRENCY_SYMBOLS = [
	"US$",
	"Rs.",
	"$",
	"€",
	"£",
	"₹",
	"¥",
	"₺",
	"USD",
	"EUR",
	"GBP",
	"INR",
	"JPY",
	"TRY",
	"Rs",
];

export { usRegion, gbRegion, inRegion, deRegion, frRegion, trRegion };
