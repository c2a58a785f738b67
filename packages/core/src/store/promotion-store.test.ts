import { mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { PersistenceWriteError } from "../errors";
import { createLogger, memorySink } from "../logger";
import { buildAliasIndex } from "../mapper/aliases";
import { FileBackend, MemoryBackend } from "./backend";
import { PromotionStore } from "./promotion-store";

const quiet = createLogger({ level: "silent" });

const EXPECTED_DOCUMENT = `{
  "header_aliases": {
    "Tel No.": "phone"
  },
  "fix_rules": [
    {
      "field": "email",
      "rule_type": "DOMAIN_TYPO",
      "original": "jane@gamil.com",
      "replacement": "jane@gmail.com"
    }
  ]
}
`;

// ============================================================================
// Promotion
// ============================================================================

describe("PromotionStore - promotion", () => {
	test("an empty backend gives an empty store", () => {
		const store = PromotionStore.load(new MemoryBackend(), { logger: quiet });

		expect(store.aliases().size).toBe(0);
		expect(store.fixRules()).toEqual([]);
		expect(store.warnings).toEqual([]);
	});

	test("promoting an alias is idempotent", () => {
		const store = PromotionStore.load(new MemoryBackend(), { logger: quiet });

		expect(store.promoteAlias("Tel No.", "phone")).toBe(true);
		expect(store.promoteAlias("Tel No.", "phone")).toBe(false);
		expect([...store.aliases()]).toEqual([["Tel No.", "phone"]]);
	});

	test("re-promoting an alias to a new field moves it last", () => {
		const store = PromotionStore.load(new MemoryBackend(), { logger: quiet });
		store.promoteAlias("Ref", "tax_id");
		store.promoteAlias("Mob", "phone");

		expect(store.promoteAlias("Ref", "contact_person")).toBe(true);
		expect([...store.aliases()]).toEqual([
			["Mob", "phone"],
			["Ref", "contact_person"],
		]);
	});

	test("a promotion replaces aliases that normalize the same", () => {
		const store = PromotionStore.load(new MemoryBackend(), { logger: quiet });
		store.promoteAlias("Tel No.", "phone");
		store.promoteAlias("Mob", "phone");

		expect(store.promoteAlias("TEL-NO", "fax")).toBe(true);
		expect([...store.aliases()]).toEqual([
			["Mob", "phone"],
			["TEL-NO", "fax"],
		]);
	});

	test("fix rules are upserted by field, rule type and original", () => {
		const store = PromotionStore.load(new MemoryBackend(), { logger: quiet });

		expect(store.promoteFix("email", "DOMAIN_TYPO", "jane@gamil.com", "jane@gmail.com")).toBe(true);
		expect(store.promoteFix("email", "DOMAIN_TYPO", "jane@gamil.com", "jane@gmail.com")).toBe(false);
		expect(store.promoteFix("email", "DOMAIN_TYPO", "jane@gamil.com", "j.doe@gmail.com")).toBe(true);

		expect(store.fixRules()).toEqual([
			{ field: "email", ruleType: "DOMAIN_TYPO", original: "jane@gamil.com", replacement: "j.doe@gmail.com" },
		]);
	});

	test("findRule prefers exact rules over patterns", () => {
		const store = PromotionStore.load(new MemoryBackend(), { logger: quiet });
		store.promoteFix("email", "DOMAIN_TYPO", "(.+)@gamil\\.com", "$1@gmail.com", { pattern: true });
		store.promoteFix("email", "DOMAIN_TYPO", "ann@gamil.com", "ann@example.com");

		expect(store.findRule("email", "ann@gamil.com")?.replacement).toBe("ann@example.com");
		expect(store.findRule("email", "bob@gamil.com")?.pattern).toBe(true);
		expect(store.findRule("email", "bob@example.com")).toBeUndefined();
	});

	test("snapshot is a copy", () => {
		const store = PromotionStore.load(new MemoryBackend(), { logger: quiet });
		store.promoteAlias("Tel No.", "phone");
		const snapshot = store.snapshot();
		snapshot.headerAliases.set("Other", "email");

		expect(store.aliases().has("Other")).toBe(false);
	});
});

// ============================================================================
// Persistence
// ============================================================================

describe("PromotionStore - persistence", () => {
	test("saves a two-space JSON document", () => {
		const backend = new MemoryBackend();
		const store = PromotionStore.load(backend, { logger: quiet });
		store.promoteAlias("Tel No.", "phone");
		store.promoteFix("email", "DOMAIN_TYPO", "jane@gamil.com", "jane@gmail.com");

		expect(store.save()).toBeNull();
		expect(backend.contents()).toBe(EXPECTED_DOCUMENT);
	});

	test("a saved store loads back the same", () => {
		const backend = new MemoryBackend();
		const store = PromotionStore.load(backend, { logger: quiet });
		store.promoteAlias("Tel No.", "phone");
		store.promoteFix("postal_code", "POSTAL_FORMAT", "([A-Z0-9]{3,4})(\\d[A-Z]{2})", "$1 $2", { pattern: true });
		store.save();

		const reloaded = PromotionStore.load(backend, { logger: quiet });

		expect(reloaded.snapshot()).toEqual(store.snapshot());
		expect(reloaded.warnings).toEqual([]);
	});

	test("the newest alias still wins after a reload with numeric keys", () => {
		const backend = new MemoryBackend();
		const store = PromotionStore.load(backend, { logger: quiet });
		store.promoteAlias("2024.", "tax_id");
		store.promoteAlias("2024", "date_established");
		store.save();

		const reloaded = PromotionStore.load(backend, { logger: quiet });

		expect([...reloaded.aliases()]).toEqual([["2024", "date_established"]]);
		expect(buildAliasIndex(reloaded.aliases()).get("2024")?.field).toBe("date_established");
	});

	test("blank text is an empty store", () => {
		const store = PromotionStore.load(new MemoryBackend("  \n"), { logger: quiet });

		expect(store.aliases().size).toBe(0);
		expect(store.warnings).toEqual([]);
	});

	test("corrupt JSON loads as empty with a warning", () => {
		const { sink, records } = memorySink();
		const store = PromotionStore.load(new MemoryBackend("{not json"), {
			logger: createLogger({ level: "warn", sink }),
		});

		expect(store.aliases().size).toBe(0);
		expect(store.warnings).toEqual([
			{ kind: "persistence_read", message: "memory is not valid JSON", location: "memory" },
		]);
		expect(records.map((r) => r.event)).toEqual(["store.load.failed"]);
	});

	test("a document of the wrong shape loads as empty with a warning", () => {
		const store = PromotionStore.load(new MemoryBackend('{"header_aliases": [], "fix_rules": []}'), {
			logger: quiet,
		});

		expect(store.aliases().size).toBe(0);
		expect(store.warnings.map((w) => w.kind)).toEqual(["persistence_read"]);
	});

	test("unknown rule types are rejected", () => {
		const text = JSON.stringify({
			fix_rules: [{ field: "email", rule_type: "SPELLING", original: "a", replacement: "b" }],
		});
		const store = PromotionStore.load(new MemoryBackend(text), { logger: quiet });

		expect(store.fixRules()).toEqual([]);
		expect(store.warnings).toHaveLength(1);
	});

	test("missing sections default to empty", () => {
		const store = PromotionStore.load(new MemoryBackend('{"header_aliases": {"Mob": "phone"}}'), {
			logger: quiet,
		});

		expect([...store.aliases()]).toEqual([["Mob", "phone"]]);
		expect(store.fixRules()).toEqual([]);
		expect(store.warnings).toEqual([]);
	});
});

// ============================================================================
// File Backend
// ============================================================================

describe("PromotionStore - file backend", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "headwise-store-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	test("a missing file is an empty store", () => {
		const store = PromotionStore.open(join(dir, "promoted_fixes.json"), { logger: quiet });

		expect(store.aliases().size).toBe(0);
		expect(store.warnings).toEqual([]);
	});

	test("saves atomically and reloads in a new session", () => {
		const path = join(dir, "nested", "promoted_fixes.json");
		const store = PromotionStore.open(path, { logger: quiet });
		store.promoteAlias("Tel No.", "phone");
		store.promoteFix("email", "DOMAIN_TYPO", "jane@gamil.com", "jane@gmail.com");

		expect(store.save()).toBeNull();
		expect(readFileSync(path, "utf8")).toBe(EXPECTED_DOCUMENT);
		expect(readdirSync(join(dir, "nested"))).toEqual(["promoted_fixes.json"]);

		const next = PromotionStore.open(path, { logger: quiet });
		expect(next.aliases().get("Tel No.")).toBe("phone");
		expect(next.findRule("email", "jane@gamil.com")?.replacement).toBe("jane@gmail.com");
	});

	test("a corrupt file loads as empty with a warning", () => {
		const path = join(dir, "promoted_fixes.json");
		writeFileSync(path, '{"header_aliases": {', "utf8");

		const store = PromotionStore.open(path, { logger: quiet });

		expect(store.aliases().size).toBe(0);
		expect(store.warnings).toEqual([
			{ kind: "persistence_read", message: `${path} is not valid JSON`, location: path },
		]);
	});

	test("a failed write returns a warning and keeps the store usable", () => {
		const blocker = join(dir, "not-a-directory");
		writeFileSync(blocker, "", "utf8");
		const path = join(blocker, "promoted_fixes.json");

		const store = PromotionStore.open(path, { logger: quiet });
		store.promoteAlias("Tel No.", "phone");
		const warning = store.save();

		expect(warning?.kind).toBe("persistence_write");
		expect(warning?.location).toBe(path);
		expect(store.warnings).toHaveLength(1);
		expect(store.aliases().get("Tel No.")).toBe("phone");
		expect(warning?.message).not.toContain("left behind");
	});

	test("a failed rename leaves no temporary file behind", () => {
		const path = join(dir, "promoted_fixes.json");
		mkdirSync(join(path, "taken"), { recursive: true });

		expect(() => new FileBackend(path).write("{}")).toThrow(PersistenceWriteError);
		expect(readdirSync(dir)).toEqual(["promoted_fixes.json"]);
		expect(readdirSync(path)).toEqual(["taken"]);
	});
});
