import { fileURLToPath } from "node:url";
import * as dotenv from "dotenv";
import { z } from "zod";
import type { LogLevel } from "./logger";

// ============================================================================
// Configuration
// ============================================================================

/** Schema file shipped with the package */
export const DEFAULT_SCHEMA_PATH = fileURLToPath(new URL("../schema/canonical.csv", import.meta.url));

export const DEFAULT_STORE_PATH = "promoted_fixes.json";

export interface HeadwiseConfig {
	/** Canonical schema CSV */
	schemaPath: string;
	/** Promotion store JSON document */
	storePath: string;
	/** Region used for phone prefixes, dates, numbers and postal codes */
	defaultRegion?: string;
	logLevel: LogLevel;
}

const EnvSchema = z.object({
	HEADWISE_SCHEMA_PATH: z.string().min(1).optional(),
	HEADWISE_STORE_PATH: z.string().min(1).optional(),
	HEADWISE_DEFAULT_REGION: z
		.string()
		.regex(/^[A-Za-z]{2}$/, "expected a two-letter region code")
		.optional(),
	HEADWISE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
});

type Env = Record<string, string | undefined>;

/**
 * Read configuration from the environment.
 * When no env object is passed, `.env` in the working directory is loaded first.
 * Empty variables count as unset.
 *
 * @throws ZodError when a variable is set to an unusable value
 */
export function loadConfig(env?: Env): HeadwiseConfig {
	let source: Env;
	if (env) {
		source = env;
	} else {
		dotenv.config();
		source = process.env;
	}

	const parsed = EnvSchema.parse(
		Object.fromEntries(
			Object.keys(EnvSchema.shape).map((key) => [key, emptyToUndefined(source[key])])
		)
	);

	return {
		schemaPath: parsed.HEADWISE_SCHEMA_PATH ?? DEFAULT_SCHEMA_PATH,
		storePath: parsed.HEADWISE_STORE_PATH ?? DEFAULT_STORE_PATH,
		defaultRegion: parsed.HEADWISE_DEFAULT_REGION?.toUpperCase(),
		logLevel: parsed.HEADWISE_LOG_LEVEL ?? "info",
	};
}

function emptyToUndefined(value: string | undefined): string | undefined {
	if (value === undefined) return undefined;
	const trimmed = value.trim();
	return trimmed === "" ? undefined : trimmed;
}
