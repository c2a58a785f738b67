// ============================================================================
// Region Configuration Types
// ============================================================================

/**
 * Where to put a separator back into a stripped postal code of a given length.
 */
export interface PostalLayout {
	/** Length of the stripped code */
	length: number;
	/** Index the separator is inserted at */
	split: number;
	separator: string;
}

/**
 * A country's formatting conventions.
 */
export interface RegionConfig {
	/** Two-letter region code (e.g. 'US', 'IN') */
	id: string;

	// Date formatting
	/** Date formats in priority order (e.g. ['DD/MM/YYYY', 'DD.MM.YYYY']) */
	dateFormats: string[];

	// Number formatting
	/** Thousands separator (e.g. ',' for US, '.' for DE) */
	thousandsSeparator: string;
	/** Decimal separator (e.g. '.' for US, ',' for DE) */
	decimalSeparator: string;
	/** Currency symbols and codes stripped from amounts */
	currencySymbols: string[];

	// Phone formatting
	/** Country calling code (e.g. '+1') */
	phoneCountryCode: string;
	/** Digits dialled before a national number inside the country (e.g. '0') */
	phoneTrunkPrefix?: string;
	/** Digit count of a national number without trunk prefix */
	phoneNationalDigits: number;

	// Postal codes
	/** Conventional written form, separators included */
	postalPattern: RegExp;
	/** Separator positions by stripped length */
	postalLayouts: PostalLayout[];
}

/**
 * Parsed date components.
 */
export interface ParsedDate {
	day: number;
	month: number;
	year: number;
}

/**
 * Date format descriptor.
 */
export interface DateFormatInfo {
	/** Original format string */
	format: string;
	/** Regex to match the format */
	regex: RegExp;
	/** Capture group indices for day, month and year */
	dayIndex: number;
	monthIndex: number;
	yearIndex: number;
	/** Month is written as a name ('Jan', 'January') */
	monthIsName: boolean;
	/** Year is written with two digits */
	shortYear: boolean;
}
