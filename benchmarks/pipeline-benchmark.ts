/**
 * Pipeline Benchmark
 *
 * Maps, cleans and reviews a generated 10,000-row import.
 */

import {
	DEFAULT_SCHEMA_PATH,
	type Table,
	MemoryBackend,
	PromotionStore,
	createLogger,
	loadSchemaFile,
	mapHeaders,
	parseCsv,
	runPipeline,
	toCsv,
} from "@headwise/core";

// ============================================================================
// Configuration
// ============================================================================

const RUNS = 5;
const ROWS = 10_000;
const HEADER_VARIATIONS = 1000;

const logger = createLogger({ level: "silent" });
const registry = loadSchemaFile(DEFAULT_SCHEMA_PATH, logger);

// ============================================================================
// Test Data
// ============================================================================

const headers = [
	"Company",
	"Tel No.",
	"E-mail",
	"Zip",
	"Web Site",
	"Founded",
	"Annual Revenue",
	"Contact Name",
	"Notes",
];

const messyHeaders = ["Compnay Name", "Phone Number", "Emial", "Postal", "Homepage", "Start Date", "Revenue"];

function generateTable(rows: number): Table {
	const data: Table["rows"] = [];
	for (let i = 0; i < rows; i++) {
		const broken = i % 10 === 0;
		data.push([
			`acme ${i} ltd`,
			broken ? "12345" : `(555) ${String(100 + (i % 900)).padStart(3, "0")}-${String(i % 10000).padStart(4, "0")}`,
			broken ? `user${i}@gamil.com` : `user${i}@example.com`,
			i % 7 === 0 ? "N/A" : "94107",
			broken ? "htp://example.com" : "example.com",
			broken ? "13/05/2021" : "05/13/2021",
			`$${(i * 13) % 100000}.50`,
			"jane doe",
			"",
		]);
	}
	return { headers, rows: data };
}

// ============================================================================
// Benchmark Functions
// ============================================================================

function benchMapHeaders(list: string[]): number {
	const start = performance.now();
	for (let i = 0; i < HEADER_VARIATIONS; i++) {
		mapHeaders(list, { registry, logger });
	}
	return performance.now() - start;
}

function benchPipeline(table: Table): number {
	const store = PromotionStore.load(new MemoryBackend(), { logger });
	store.promoteFix("email", "DOMAIN_TYPO", "(.+)@gamil\\.com", "$1@gmail.com", { pattern: true });

	const start = performance.now();
	runPipeline(table, { registry, store, region: "US", logger });
	return performance.now() - start;
}

function benchCsvRoundTrip(text: string): number {
	const start = performance.now();
	toCsv(parseCsv(text));
	return performance.now() - start;
}

function median(arr: number[]): number {
	const sorted = [...arr].sort((a, b) => a - b);
	const mid = Math.floor(sorted.length / 2);
	return sorted.length % 2 !== 0 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

// ============================================================================
// Main Benchmark
// ============================================================================

console.log("=".repeat(60));
console.log("Pipeline Benchmark");
console.log("=".repeat(60));
console.log(`Runs: ${RUNS}`);
console.log(`Rows: ${ROWS.toLocaleString()}`);
console.log();

const table = generateTable(ROWS);
const csv = toCsv(table);

// Warm up
runPipeline(generateTable(100), { registry, region: "US", logger });

const results: Record<string, number[]> = {
	"clean headers": [],
	"messy headers": [],
	pipeline: [],
	csv: [],
};

for (let run = 0; run < RUNS; run++) {
	results["clean headers"].push(benchMapHeaders(headers));
	results["messy headers"].push(benchMapHeaders(messyHeaders));
	results.pipeline.push(benchPipeline(table));
	results.csv.push(benchCsvRoundTrip(csv));
}

console.log(`--- mapHeaders() (${HEADER_VARIATIONS} mappings) ---`);
for (const key of ["clean headers", "messy headers"]) {
	const med = median(results[key]);
	console.log(`  ${key.padEnd(14)}: ${med.toFixed(2)}ms (${(HEADER_VARIATIONS / (med / 1000) / 1000).toFixed(1)}K/sec)`);
}
console.log();

const pipelineMed = median(results.pipeline);
console.log(`--- runPipeline() (${ROWS.toLocaleString()} rows) ---`);
console.log(`  Median: ${pipelineMed.toFixed(2)}ms`);
console.log(`  Throughput: ${(ROWS / (pipelineMed / 1000) / 1000).toFixed(1)}K rows/sec`);
console.log(`  Under one second: ${pipelineMed < 1000 ? "yes" : "no"}`);
console.log();

console.log("--- parseCsv() + toCsv() ---");
console.log(`  Median: ${median(results.csv).toFixed(2)}ms`);
console.log();

// Result analysis
console.log("--- Result Analysis ---");
const store = PromotionStore.load(new MemoryBackend(), { logger });
const result = runPipeline(table, { registry, store, region: "US", logger });
for (const assignment of result.mapping.assignments) {
	console.log(
		`  ${assignment.rawHeader.padEnd(16)} → ${(assignment.canonicalField ?? "-").padEnd(18)} ${assignment.method} ${assignment.confidence.toFixed(2)}`
	);
}
console.log(`  Suggestions: ${result.suggestions.length}`);
console.log(
	`  Completeness: ${(result.report.completenessBefore * 100).toFixed(1)}% → ${(result.report.completenessAfter * 100).toFixed(1)}%`
);
console.log();

console.log("=".repeat(60));
