import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type {
	LatticeDataProvider,
	LatticeDefinition,
	LatticeDefinitionStub,
	LatticeElement,
	PchipDataRow,
	PolyDataRow,
	UnitsRow,
} from "@lattice-units/core";
import { findClosestMatches } from "@lattice-units/core";
import type { CsvResult } from "./csv.js";
import { LatticeCsvError } from "./errors.js";
import type { FamilyRow } from "./tables.js";
import {
	ELEMENTS_FILENAME,
	EPICS_DEVICES_FILENAME,
	FAMILIES_FILENAME,
	PCHIP_FILENAME,
	POLY_FILENAME,
	parseElementsCsv,
	parseFamiliesCsv,
	parsePchipCsv,
	parsePolyCsv,
	parsePvDevicesCsv,
	parseSimpleDevicesCsv,
	parseUnitconvCsv,
	SIMPLE_DEVICES_FILENAME,
	UNITCONV_FILENAME,
} from "./tables.js";

async function readOptional(filePath: string): Promise<string | undefined> {
	try {
		return await fs.readFile(filePath, "utf8");
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			return undefined;
		}
		throw error;
	}
}

async function readRequired(filePath: string): Promise<string> {
	const content = await readOptional(filePath);
	if (content === undefined) {
		throw new LatticeCsvError(
			`${path.basename(filePath)} not found in ${path.dirname(filePath)}`,
			"MISSING_FILE",
			filePath,
		);
	}
	return content;
}

function unwrap<T>(result: CsvResult<T>, filePath: string): T[] {
	if (!result.success) {
		throw new LatticeCsvError(
			`${path.basename(filePath)}: ${result.error}`,
			"MALFORMED_FILE",
			filePath,
		);
	}
	return result.rows;
}

function checkElementId(elementId: number, count: number, filePath: string, allowLattice: boolean): void {
	const lowest = allowLattice ? 0 : 1;
	if (elementId < lowest || elementId > count) {
		throw new LatticeCsvError(
			`${path.basename(filePath)}: element id ${elementId} is outside ${lowest}..${count}`,
			"MALFORMED_FILE",
			filePath,
		);
	}
}

function addFamilies(
	elements: LatticeElement[],
	families: readonly FamilyRow[],
	filePath: string,
): void {
	for (const row of families) {
		checkElementId(row.elementId, elements.length, filePath, false);
		const element = elements[row.elementId - 1];
		if (element && !element.families.includes(row.family)) {
			element.families.push(row.family);
		}
	}
}

/**
 * Reads lattice modes stored as directories of CSV tables.
 *
 * Each data directory holds one subdirectory per mode. A subdirectory is a
 * mode when it contains at least `elements.csv` and `families.csv`; the
 * device and unit tables are optional.
 */
export class LatticeCsvProvider implements LatticeDataProvider {
	id = "csv";
	label = "CSV lattice tables";

	private readonly dataDirs: string[];
	private cachedModes: Map<string, string> | null = null;

	/**
	 * @param dataDirs Directories to search for modes; earlier directories win
	 * when two hold a mode of the same name
	 */
	constructor(dataDirs: readonly string[]) {
		this.dataDirs = [...dataDirs];
	}

	/**
	 * Forget discovered modes, forcing a re-scan on next access.
	 */
	invalidateCache(): void {
		this.cachedModes = null;
	}

	async discoverModes(): Promise<string[]> {
		const modes = await this.scanModes();
		return [...modes.keys()].sort();
	}

	async peek(mode: string): Promise<LatticeDefinitionStub> {
		const modes = await this.scanModes();
		const dir = modes.get(mode);
		if (!dir) {
			const suggestions = findClosestMatches(mode, [...modes.keys()], 3, 2);
			const hint =
				suggestions.length > 0 ? ` Did you mean: ${suggestions.join(", ")}?` : "";
			throw new LatticeCsvError(
				`Unknown lattice mode "${mode}".${hint}`,
				"UNKNOWN_MODE",
				this.dataDirs.join(path.delimiter),
			);
		}
		return { mode, uri: dir };
	}

	async parse(mode: string): Promise<LatticeDefinition> {
		const stub = await this.peek(mode);
		const file = (name: string) => path.join(stub.uri, name);

		const elements = unwrap(
			parseElementsCsv(await readRequired(file(ELEMENTS_FILENAME))),
			file(ELEMENTS_FILENAME),
		);
		addFamilies(
			elements,
			unwrap(
				parseFamiliesCsv(await readRequired(file(FAMILIES_FILENAME))),
				file(FAMILIES_FILENAME),
			),
			file(FAMILIES_FILENAME),
		);

		const pvContent = await readOptional(file(EPICS_DEVICES_FILENAME));
		const pvDevices =
			pvContent === undefined
				? []
				: unwrap(parsePvDevicesCsv(pvContent), file(EPICS_DEVICES_FILENAME));
		if (pvContent === undefined) {
			console.warn(
				`[lattice-csv] ${file(EPICS_DEVICES_FILENAME)} not found, mode ${mode} has no PV devices.`,
			);
		}

		const simpleContent = await readOptional(file(SIMPLE_DEVICES_FILENAME));
		const simpleDevices =
			simpleContent === undefined
				? []
				: unwrap(parseSimpleDevicesCsv(simpleContent), file(SIMPLE_DEVICES_FILENAME));

		for (const device of pvDevices) {
			checkElementId(device.elementId, elements.length, file(EPICS_DEVICES_FILENAME), true);
		}
		for (const device of simpleDevices) {
			checkElementId(device.elementId, elements.length, file(SIMPLE_DEVICES_FILENAME), true);
		}

		return {
			...stub,
			elements,
			pvDevices,
			simpleDevices,
			unitTables: await this.readUnitTables(stub.uri, elements.length),
		};
	}

	private async readUnitTables(
		dir: string,
		elementCount: number,
	): Promise<LatticeDefinition["unitTables"]> {
		const unitconvPath = path.join(dir, UNITCONV_FILENAME);
		const unitconv = await readOptional(unitconvPath);
		if (unitconv === undefined) {
			return { units: [], poly: [], pchip: [] };
		}
		const units: UnitsRow[] = unwrap(parseUnitconvCsv(unitconv), unitconvPath);
		for (const row of units) {
			checkElementId(row.elementId, elementCount, unitconvPath, true);
		}

		const polyPath = path.join(dir, POLY_FILENAME);
		const polyContent = await readOptional(polyPath);
		let poly: PolyDataRow[] = [];
		if (polyContent === undefined) {
			console.warn(`[lattice-csv] ${polyPath} not found, unable to load polynomial conversions.`);
		} else {
			poly = unwrap(parsePolyCsv(polyContent), polyPath);
		}

		const pchipPath = path.join(dir, PCHIP_FILENAME);
		const pchipContent = await readOptional(pchipPath);
		let pchip: PchipDataRow[] = [];
		if (pchipContent === undefined) {
			console.warn(`[lattice-csv] ${pchipPath} not found, unable to load pchip conversions.`);
		} else {
			pchip = unwrap(parsePchipCsv(pchipContent), pchipPath);
		}

		return { units, poly, pchip };
	}

	private async scanModes(): Promise<Map<string, string>> {
		if (this.cachedModes) return this.cachedModes;

		const modes = new Map<string, string>();
		for (const dataDir of this.dataDirs) {
			let entries: Dirent[];
			try {
				entries = await fs.readdir(dataDir, { withFileTypes: true });
			} catch (error) {
				console.warn(
					`[lattice-csv] Cannot read data directory ${dataDir}: ${error instanceof Error ? error.message : String(error)}`,
				);
				continue;
			}
			for (const entry of entries) {
				if (!entry.isDirectory() || modes.has(entry.name)) continue;
				const modeDir = path.join(dataDir, entry.name);
				const contents = await fs.readdir(modeDir);
				if (contents.includes(ELEMENTS_FILENAME) && contents.includes(FAMILIES_FILENAME)) {
					modes.set(entry.name, modeDir);
				}
			}
		}
		this.cachedModes = modes;
		return modes;
	}
}
