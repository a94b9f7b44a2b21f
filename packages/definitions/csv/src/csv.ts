/**
 * Minimal CSV reading and writing for the lattice tables.
 *
 * Fields may be double-quoted; a doubled quote inside a quoted field is a
 * literal quote. Blank lines are skipped.
 */

export type CsvRecord = Record<string, string>;

export type CsvResult<T> =
	| { success: true; rows: T[] }
	| { success: false; error: string };

/**
 * Split one CSV line into fields, honouring quotes.
 */
export function parseCsvLine(line: string): string[] {
	const fields: string[] = [];
	let current = "";
	let inQuotes = false;

	for (let i = 0; i < line.length; i++) {
		const ch = line.charAt(i);
		if (ch === '"') {
			if (inQuotes && line.charAt(i + 1) === '"') {
				current += '"';
				i++;
			} else {
				inQuotes = !inQuotes;
			}
		} else if (ch === "," && !inQuotes) {
			fields.push(current.trim());
			current = "";
		} else {
			current += ch;
		}
	}
	fields.push(current.trim());
	return fields;
}

/**
 * Parse CSV content into a 2D array of strings
 */
export function parseCsv(content: string): string[][] {
	return content
		.split(/\r?\n/)
		.filter((line) => line.trim().length > 0)
		.map(parseCsvLine);
}

/**
 * Parse CSV content with a header row into records keyed by column name.
 *
 * @param required - Columns that must appear in the header
 */
export function parseCsvRecords(
	content: string,
	required: readonly string[] = [],
): CsvResult<CsvRecord> {
	const [header, ...lines] = parseCsv(content);
	if (!header) {
		return { success: false, error: "Missing header row" };
	}

	const missing = required.filter((column) => !header.includes(column));
	if (missing.length > 0) {
		return {
			success: false,
			error: `Missing column${missing.length > 1 ? "s" : ""}: ${missing.join(", ")}`,
		};
	}

	const rows: CsvRecord[] = [];
	for (const [index, fields] of lines.entries()) {
		if (fields.length > header.length) {
			return {
				success: false,
				error: `Row ${index + 1}: expected ${header.length} columns, got ${fields.length}`,
			};
		}
		const record: CsvRecord = {};
		header.forEach((column, i) => {
			record[column] = fields[i] ?? "";
		});
		rows.push(record);
	}
	return { success: true, rows };
}

function quoteField(value: string): string {
	return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Format a header and rows as CSV, quoting fields where needed. The output
 * ends with a newline.
 */
export function formatCsv(
	header: readonly string[],
	rows: ReadonlyArray<ReadonlyArray<string | number | undefined>>,
): string {
	const lines = [header.map(quoteField).join(",")];
	for (const row of rows) {
		lines.push(row.map((cell) => quoteField(cell === undefined ? "" : String(cell))).join(","));
	}
	return `${lines.join("\n")}\n`;
}
