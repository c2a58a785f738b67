import { describe, expect, test } from "vitest";
import { createLogger, memorySink } from "./logger";

describe("Logger", () => {
	test("drops records below the level", () => {
		const { sink, records } = memorySink();
		const logger = createLogger({ level: "warn", sink });

		logger.debug("a");
		logger.info("b");
		logger.warn("c");
		logger.error("d");

		expect(records.map((r) => [r.level, r.event])).toEqual([
			["warn", "c"],
			["error", "d"],
		]);
	});

	test("records carry data, message and bound context", () => {
		const { sink, records } = memorySink();
		const logger = createLogger({ sink }).with({ store: "memory" });

		logger.info("store.load.ok", { aliases: 2 }, "loaded");
		logger.info("bare", {});

		const [first, second] = records;
		expect(first).toMatchObject({
			level: "info",
			event: "store.load.ok",
			msg: "loaded",
			data: { aliases: 2 },
			ctx: { store: "memory" },
		});
		expect(Number.isNaN(Date.parse(first.ts))).toBe(false);
		expect(second.data).toBeUndefined();
		expect(second.msg).toBeUndefined();
	});

	test("timer logs a duration at debug", () => {
		const { sink, records } = memorySink();
		const logger = createLogger({ level: "debug", sink });

		const done = logger.timer("cleaner.clean", { field: "email" });
		const elapsed = done({ valid: 3 });

		expect(elapsed).toBeGreaterThanOrEqual(0);
		expect(records).toHaveLength(1);
		expect(records[0]).toMatchObject({ level: "debug", event: "cleaner.clean", data: { field: "email", valid: 3 } });
		expect(typeof records[0].duration_ms).toBe("number");
	});

	test("silent emits nothing and setLevel changes it", () => {
		const { sink, records } = memorySink();
		const logger = createLogger({ level: "silent", sink });

		logger.error("hidden");
		logger.setLevel("error");
		logger.error("shown");

		expect(records.map((r) => r.event)).toEqual(["shown"]);
		expect(logger.isEnabled("warn")).toBe(false);
	});
});
