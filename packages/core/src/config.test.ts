import { describe, expect, test } from "vitest";
import { ZodError } from "zod";
import { DEFAULT_SCHEMA_PATH, DEFAULT_STORE_PATH, loadConfig } from "./config";

describe("loadConfig", () => {
	test("defaults", () => {
		expect(loadConfig({})).toEqual({
			schemaPath: DEFAULT_SCHEMA_PATH,
			storePath: DEFAULT_STORE_PATH,
			defaultRegion: undefined,
			logLevel: "info",
		});
	});

	test("reads and tidies variables", () => {
		const config = loadConfig({
			HEADWISE_SCHEMA_PATH: "",
			HEADWISE_STORE_PATH: " data/fixes.json ",
			HEADWISE_DEFAULT_REGION: "gb",
			HEADWISE_LOG_LEVEL: "debug",
		});

		expect(config).toEqual({
			schemaPath: DEFAULT_SCHEMA_PATH,
			storePath: "data/fixes.json",
			defaultRegion: "GB",
			logLevel: "debug",
		});
	});

	test("rejects unusable values", () => {
		expect(() => loadConfig({ HEADWISE_DEFAULT_REGION: "usa" })).toThrow(ZodError);
		expect(() => loadConfig({ HEADWISE_LOG_LEVEL: "verbose" })).toThrow(ZodError);
	});

	test("the bundled schema sits beside the sources", () => {
		expect(DEFAULT_SCHEMA_PATH.endsWith("schema/canonical.csv")).toBe(true);
	});
});
