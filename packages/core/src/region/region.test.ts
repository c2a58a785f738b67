import { describe, expect, test } from "vitest";
import {
	daysInMonth,
	deRegion,
	expandShortYear,
	frRegion,
	gbRegion,
	getDateFormatList,
	getRegion,
	hasRegion,
	internationalizePhone,
	isISODate,
	isLeapYear,
	nationalNumber,
	normalizeDateToISO,
	parseAmount,
	registerRegion,
	resolveRegion,
	splitPhone,
	usRegion,
} from "./index";
import type { RegionConfig } from "./types";

// ============================================================================
// Registry
// ============================================================================

describe("Region registry", () => {
	test("lookups ignore case and UK is GB", () => {
		expect(getRegion("us")?.id).toBe("US");
		expect(getRegion("UK")).toBe(gbRegion);
		expect(hasRegion("zz")).toBe(false);
	});

	test("resolveRegion accepts codes and objects", () => {
		expect(resolveRegion("in")?.phoneCountryCode).toBe("+91");
		expect(resolveRegion(deRegion)).toBe(deRegion);
		expect(resolveRegion("ZZ")).toBeUndefined();
		expect(resolveRegion(undefined)).toBeUndefined();
	});

	test("custom regions can be registered", () => {
		const nl: RegionConfig = {
			id: "nl",
			dateFormats: ["DD-MM-YYYY"],
			thousandsSeparator: ".",
			decimalSeparator: ",",
			currencySymbols: ["€"],
			phoneCountryCode: "+31",
			phoneTrunkPrefix: "0",
			phoneNationalDigits: 9,
			postalPattern: /^\d{4} [A-Z]{2}$/,
			postalLayouts: [{ length: 6, split: 4, separator: " " }],
		};
		registerRegion(nl);

		expect(getRegion("NL")).toBe(nl);
	});
});

// ============================================================================
// Dates
// ============================================================================

describe("Dates", () => {
	test("leap years", () => {
		expect(isLeapYear(2024)).toBe(true);
		expect(isLeapYear(1900)).toBe(false);
		expect(isLeapYear(2000)).toBe(true);
		expect(daysInMonth(2, 2024)).toBe(29);
		expect(daysInMonth(2, 2023)).toBe(28);
	});

	test("two-digit years pivot at 50", () => {
		expect(expandShortYear(49)).toBe(2049);
		expect(expandShortYear(50)).toBe(1950);
	});

	test("ISO, then the region's order, then month names", () => {
		expect(getDateFormatList(gbRegion)).toEqual([
			"YYYY-MM-DD",
			"YYYY/MM/DD",
			"YYYY.MM.DD",
			"DD/MM/YYYY",
			"DD-MM-YYYY",
			"DD.MM.YYYY",
			"DD MMM YYYY",
			"DD-MMM-YYYY",
			"MMM DD, YYYY",
			"MMM DD YYYY",
		]);
		expect(getDateFormatList()).toContain("MM/DD/YYYY");
	});

	test("normalizes by region", () => {
		expect(normalizeDateToISO("13/05/2021", getDateFormatList(gbRegion))).toBe("2021-05-13");
		expect(normalizeDateToISO("05/13/2021", getDateFormatList(usRegion))).toBe("2021-05-13");
		expect(normalizeDateToISO("2021/5/3", getDateFormatList(usRegion))).toBe("2021-05-03");
	});

	test("month names", () => {
		const formats = getDateFormatList(usRegion);

		expect(normalizeDateToISO("5 Mar 2021", formats)).toBe("2021-03-05");
		expect(normalizeDateToISO("March 5, 2021", formats)).toBe("2021-03-05");
	});

	test("an impossible date falls through to the next format", () => {
		expect(normalizeDateToISO("15/03/2010", ["MM/DD/YYYY", "DD/MM/YYYY"])).toBe("2010-03-15");
		expect(normalizeDateToISO("03/15/2010", ["DD/MM/YYYY", "MM/DD/YYYY"])).toBe("2010-03-15");
	});

	test("without a region, day-first dates follow month-first ones", () => {
		expect(normalizeDateToISO("15/03/2010", getDateFormatList())).toBe("2010-03-15");
		expect(normalizeDateToISO("03/04/2010", getDateFormatList())).toBe("2010-03-04");
	});

	test("null when no format gives a calendar date", () => {
		expect(normalizeDateToISO("13/05/2021", getDateFormatList(usRegion))).toBeNull();
		expect(normalizeDateToISO("31/02/2021", getDateFormatList(gbRegion))).toBeNull();
	});

	test("isISODate checks the calendar", () => {
		expect(isISODate("2024-02-29")).toBe(true);
		expect(isISODate("2023-02-29")).toBe(false);
		expect(isISODate("2024-2-29")).toBe(false);
	});
});

// ============================================================================
// Amounts
// ============================================================================

describe("Amounts", () => {
	test("strips symbols and separators", () => {
		expect(parseAmount("$1,234.56", usRegion)).toBe(1234.56);
		expect(parseAmount("1.234,56 €", deRegion)).toBe(1234.56);
		expect(parseAmount("1 234,56", frRegion)).toBe(1234.56);
		expect(parseAmount("-42")).toBe(-42);
	});

	test("NaN for anything else", () => {
		expect(parseAmount("12abc")).toBeNaN();
		expect(parseAmount("")).toBeNaN();
	});
});

// ============================================================================
// Phones
// ============================================================================

describe("Phones", () => {
	test("00 counts as an international prefix", () => {
		expect(splitPhone("0044 20 7946 0958")).toEqual({ international: true, digits: "442079460958" });
		expect(splitPhone("(555) 123-4567")).toEqual({ international: false, digits: "5551234567" });
	});

	test("trunk prefix is dropped only at full length", () => {
		expect(nationalNumber("02079460958", gbRegion)).toBe("2079460958");
		expect(nationalNumber("0207946", gbRegion)).toBe("0207946");
	});

	test("internationalizes national numbers", () => {
		expect(internationalizePhone("5551234567", usRegion)).toBe("+15551234567");
		expect(internationalizePhone("15551234567", usRegion)).toBe("+15551234567");
		expect(internationalizePhone("02079460958", gbRegion)).toBe("+442079460958");
	});
});
