import Papa from "papaparse";
import { CsvParseError } from "./errors";
import type { CellValue, Table } from "./types";

// ============================================================================
// CSV Table I/O
// ============================================================================

/**
 * Parse CSV text into a table. The first row is the header row; blank
 * lines are skipped. Short rows are padded with null and long rows cut
 * to the header width.
 *
 * @throws CsvParseError on unbalanced quotes
 */
export function parseCsv(text: string): Table {
	const parsed = Papa.parse<string[]>(text, { skipEmptyLines: "greedy" });

	const fatal = parsed.errors.find((e) => e.type === "Quotes");
	if (fatal) {
		throw new CsvParseError(`CSV is malformed: ${fatal.message} (row ${fatal.row ?? "?"})`);
	}

	const [headerRow, ...body] = parsed.data;
	if (!headerRow) return { headers: [], rows: [] };

	const width = headerRow.length;
	const rows = body.map((record) => {
		const row: CellValue[] = record.slice(0, width);
		while (row.length < width) row.push(null);
		return row;
	});

	return { headers: [...headerRow], rows };
}

/**
 * Render a table as CSV with "\n" line endings. Null cells are empty.
 */
export function toCsv(table: Table): string {
	return Papa.unparse(
		{
			fields: table.headers,
			data: table.rows.map((row) => row.map((cell) => cell ?? "")),
		},
		{ newline: "\n" }
	);
}
