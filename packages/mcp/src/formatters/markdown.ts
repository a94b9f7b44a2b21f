/**
 * Markdown formatting for tool output.
 */

export type ColumnAlign = "left" | "right";

/**
 * Build a markdown table from headers and rows.
 *
 * Column widths are the longest of the header and the cells in that column.
 * Right-aligned columns get a `--:` separator and left padding, which keeps
 * numbers lined up in plain-text clients.
 *
 * @param align - Per-column alignment (default left)
 */
export function buildMarkdownTable(
	headers: readonly string[],
	rows: ReadonlyArray<readonly string[]>,
	align: readonly ColumnAlign[] = [],
): string {
	const colWidths = headers.map((h) => Math.max(h.length, 3));
	for (const row of rows) {
		row.forEach((cell, i) => {
			colWidths[i] = Math.max(colWidths[i] ?? 0, cell.length);
		});
	}

	const pad = (s: string, i: number) => {
		const width = colWidths[i] ?? s.length;
		return align[i] === "right" ? s.padStart(width) : s.padEnd(width);
	};
	const separator = (i: number) => {
		const width = colWidths[i] ?? 3;
		return align[i] === "right" ? `${"-".repeat(width - 1)}:` : "-".repeat(width);
	};

	const headerRow = `| ${headers.map((h, i) => pad(h, i)).join(" | ")} |`;
	const sepRow = `| ${headers.map((_, i) => separator(i)).join(" | ")} |`;
	const dataRows = rows.map(
		(row) => `| ${headers.map((_, i) => pad(row[i] ?? "", i)).join(" | ")} |`,
	);

	return [headerRow, sepRow, ...dataRows].join("\n");
}

/**
 * Format a number for display: integers as-is, other values to 6
 * significant digits without trailing zeros.
 *
 * @example
 * formatNumber(0.00019999999) // → "0.0002"
 */
export function formatNumber(value: number): string {
	if (Number.isInteger(value)) return String(value);
	return String(Number(value.toPrecision(6)));
}

/** Clamp range as `lower..upper`, with `-∞`/`∞` for missing bounds */
export function formatLimits(lower: number | undefined, upper: number | undefined): string {
	if (lower === undefined && upper === undefined) return "";
	const lo = lower !== undefined ? formatNumber(lower) : "-∞";
	const hi = upper !== undefined ? formatNumber(upper) : "∞";
	return `${lo}..${hi}`;
}
