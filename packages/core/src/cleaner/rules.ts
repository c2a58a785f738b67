import { FieldCleaningError } from "../errors";
import {
	internationalizePhone,
	isISODate,
	normalizeDateToISO,
	parseAmount,
	splitPhone,
} from "../region";
import type { FieldCategory } from "../types";
import { findDomainTypo } from "./domains";
import type { CategoryRule, CellIssue } from "./types";

// ============================================================================
// Patterns
// ============================================================================

export const E164_PATTERN = /^\+\d{7,15}$/;
export const EMAIL_PATTERN = /^[a-z0-9._%+'-]+@[a-z0-9-]+(\.[a-z0-9-]+)*\.[a-z]{2,}$/i;
export const TAX_ID_PATTERN = /^[A-Z0-9]{8,15}$/;
export const GENERIC_POSTAL_PATTERN = /^[A-Z0-9]{3,10}$/;
const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;
const URL_PROTOCOLS = new Set(["http:", "https:", "ftp:"]);

export const MIN_PHONE_DIGITS = 7;
export const MAX_PHONE_DIGITS = 15;

// ============================================================================
// Text Helpers
// ============================================================================

/**
 * Collapse whitespace and title-case: "  acme   WIDGETS " → "Acme Widgets".
 * A letter is capitalized after anything but a letter, digit or apostrophe.
 */
export function titleCase(value: string): string {
	return value
		.trim()
		.replace(/\s+/g, " ")
		.toLowerCase()
		.replace(/(^|[^\p{L}\p{N}'])(\p{L})/gu, (_, before: string, letter: string) => before + letter.toUpperCase());
}

/**
 * Check a URL: http, https or ftp, with a dotted host ending in an
 * alphabetic top-level domain of two or more letters.
 */
export function isWellFormedUrl(value: string): boolean {
	let url: URL;
	try {
		url = new URL(value);
	} catch {
		return false;
	}
	if (!URL_PROTOCOLS.has(url.protocol)) return false;

	const labels = url.hostname.split(".");
	const tld = labels[labels.length - 1] ?? "";
	return labels.length >= 2 && labels.every((label) => label.length > 0) && /^[a-z]{2,}$/i.test(tld);
}

export function hasScheme(value: string): boolean {
	return SCHEME_PATTERN.test(value);
}

function fail(issue: CellIssue, message: string): never {
	throw new FieldCleaningError(issue, message);
}

function isNonEmptyString(value: unknown): value is string {
	return typeof value === "string" && value.length > 0;
}

// ============================================================================
// Category Rules
// ============================================================================

const phoneRule: CategoryRule = {
	clean(value, ctx) {
		const { international, digits } = splitPhone(String(value));
		if (digits.length < MIN_PHONE_DIGITS || digits.length > MAX_PHONE_DIGITS) {
			fail("invalid_phone", `Phone number has ${digits.length} digits`);
		}
		if (international) return `+${digits}`;
		return ctx.region ? internationalizePhone(digits, ctx.region) : digits;
	},
	validate(value) {
		if (typeof value === "string" && E164_PATTERN.test(value)) return null;
		const digits = String(value ?? "");
		if (/^\d+$/.test(digits) && digits.length >= MIN_PHONE_DIGITS && digits.length <= MAX_PHONE_DIGITS) {
			return "missing_country_code";
		}
		return "invalid_phone";
	},
};

const emailRule: CategoryRule = {
	clean(value) {
		return String(value).trim().toLowerCase();
	},
	validate(value) {
		if (!isNonEmptyString(value) || !EMAIL_PATTERN.test(value)) return "invalid_email";
		const domain = value.slice(value.lastIndexOf("@") + 1);
		return findDomainTypo(domain) ? "suspect_domain" : null;
	},
};

const taxIdRule: CategoryRule = {
	clean(value) {
		return String(value)
			.replace(/[^A-Za-z0-9]/g, "")
			.toUpperCase();
	},
	validate(value) {
		return typeof value === "string" && TAX_ID_PATTERN.test(value) ? null : "invalid_tax_id";
	},
};

const dateRule: CategoryRule = {
	clean(value, ctx) {
		const text = String(value).trim();
		if (isISODate(text)) return text;
		return normalizeDateToISO(text, ctx.dateFormats) ?? fail("invalid_date", `Unrecognized date "${text}"`);
	},
	validate(value) {
		return typeof value === "string" && isISODate(value) ? null : "invalid_date";
	},
};

const amountRule: CategoryRule = {
	clean(value, ctx) {
		if (typeof value === "number") {
			return Number.isFinite(value) ? value : fail("invalid_amount", "Amount is not finite");
		}
		const amount = parseAmount(value, ctx.region);
		return Number.isNaN(amount) ? fail("invalid_amount", `Unreadable amount "${value}"`) : amount;
	},
	validate(value) {
		return typeof value === "number" && Number.isFinite(value) ? null : "invalid_amount";
	},
	fill: 0,
};

const postalCodeRule: CategoryRule = {
	clean(value) {
		return String(value)
			.replace(/[^A-Za-z0-9]/g, "")
			.toUpperCase();
	},
	validate(value, ctx) {
		if (typeof value !== "string") return "invalid_postal_code";
		const pattern = ctx.region?.postalPattern ?? GENERIC_POSTAL_PATTERN;
		return pattern.test(value) ? null : "invalid_postal_code";
	},
};

const urlRule: CategoryRule = {
	clean(value) {
		const text = String(value).trim();
		return hasScheme(text) ? text : `https://${text}`;
	},
	validate(value) {
		return typeof value === "string" && isWellFormedUrl(value) ? null : "invalid_url";
	},
};

const textRule: CategoryRule = {
	clean(value) {
		return titleCase(String(value));
	},
	validate(value) {
		return isNonEmptyString(value) ? null : "invalid_text";
	},
	fill: "Unknown",
};

/**
 * Cleaning rule for each field category.
 */
export const CATEGORY_RULES: Record<FieldCategory, CategoryRule> = {
	text: textRule,
	email: emailRule,
	phone: phoneRule,
	date: dateRule,
	currency: amountRule,
	numeric: amountRule,
	postal_code: postalCodeRule,
	url: urlRule,
	tax_id: taxIdRule,
};
