// Types
export type { RegionConfig, ParsedDate, DateFormatInfo, PostalLayout } from "./types";

// Registry
export {
	getRegion,
	hasRegion,
	registerRegion,
	resolveRegion,
	getDateFormats,
	getDateFormatList,
	ISO_DATE_FORMATS,
	FALLBACK_DATE_FORMATS,
	NAMED_DATE_FORMATS,
	COMMON_CURRENCY_SYMBOLS,
	usRegion,
	gbRegion,
	inRegion,
	deRegion,
	frRegion,
	trRegion,
} from "./registry";

// Parsers
export {
	// Date
	parseDate,
	normalizeDateToISO,
	formatISODate,
	isISODate,
	isCalendarDate,
	monthFromName,
	expandShortYear,
	daysInMonth,
	isLeapYear,
	MIN_YEAR,
	MAX_YEAR,
	// Amount
	parseAmount,
	stripCurrencySymbols,
	// Phone
	splitPhone,
	nationalNumber,
	internationalizePhone,
} from "./parsers";
