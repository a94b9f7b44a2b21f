import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { UnitTables } from "@lattice-units/core";
import { formatCsv } from "./csv.js";
import { PCHIP_FILENAME, POLY_FILENAME, UNITCONV_FILENAME } from "./tables.js";

/** CSV text of the three unit tables, keyed by file name */
export function unitTablesToCsv(tables: UnitTables): Record<string, string> {
	return {
		[UNITCONV_FILENAME]: formatCsv(
			[
				"el_id",
				"field",
				"uc_type",
				"uc_id",
				"phys_units",
				"eng_units",
				"lower_lim",
				"upper_lim",
			],
			tables.units.map((row) => [
				row.elementId,
				row.field,
				row.kind,
				row.conversionId,
				row.physUnits,
				row.engUnits,
				row.lowerLimit,
				row.upperLimit,
			]),
		),
		[POLY_FILENAME]: formatCsv(
			["uc_id", "coeff", "val"],
			tables.poly.map((row) => [row.conversionId, row.coefficientIndex, row.value]),
		),
		[PCHIP_FILENAME]: formatCsv(
			["uc_id", "eng", "phy"],
			tables.pchip.map((row) => [row.conversionId, row.engineering, row.physics]),
		),
	};
}

/**
 * Write the unit tables into a mode directory, creating it if needed.
 *
 * @returns Paths of the written files
 */
export async function writeUnitTables(
	modeDir: string,
	tables: UnitTables,
): Promise<string[]> {
	await fs.mkdir(modeDir, { recursive: true });
	const written: string[] = [];
	for (const [fileName, content] of Object.entries(unitTablesToCsv(tables))) {
		const filePath = path.join(modeDir, fileName);
		await fs.writeFile(filePath, content, "utf8");
		written.push(filePath);
	}
	return written;
}
