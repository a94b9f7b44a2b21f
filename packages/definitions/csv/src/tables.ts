import type {
	ConversionKind,
	LatticeElement,
	PchipDataRow,
	PolyDataRow,
	PvDeviceDefinition,
	SimpleDeviceDefinition,
	UnitsRow,
} from "@lattice-units/core";
import type { CsvRecord, CsvResult } from "./csv.js";
import { parseCsvRecords } from "./csv.js";

export const ELEMENTS_FILENAME = "elements.csv";
export const EPICS_DEVICES_FILENAME = "epics_devices.csv";
export const SIMPLE_DEVICES_FILENAME = "simple_devices.csv";
export const FAMILIES_FILENAME = "families.csv";
export const UNITCONV_FILENAME = "unitconv.csv";
export const POLY_FILENAME = "uc_poly_data.csv";
export const PCHIP_FILENAME = "uc_pchip_data.csv";

/** One row of `families.csv` */
export interface FamilyRow {
	elementId: number;
	family: string;
}

/** Thrown inside a row mapper; turned into a failed result */
class RowError extends Error {}

function column(record: CsvRecord, name: string): string {
	return record[name] ?? "";
}

function readNumber(record: CsvRecord, name: string): number {
	const text = column(record, name);
	const value = text === "" ? Number.NaN : Number(text);
	if (!Number.isFinite(value)) {
		throw new RowError(`${name} "${text}" is not a number`);
	}
	return value;
}

function readInteger(record: CsvRecord, name: string): number {
	const value = readNumber(record, name);
	if (!Number.isInteger(value) || value < 0) {
		throw new RowError(`${name} "${column(record, name)}" is not a non-negative integer`);
	}
	return value;
}

function readOptionalNumber(record: CsvRecord, name: string): number | undefined {
	return column(record, name) === "" ? undefined : readNumber(record, name);
}

function readBoolean(record: CsvRecord, name: string): boolean {
	const text = column(record, name);
	switch (text.toLowerCase()) {
		case "true":
			return true;
		case "false":
			return false;
		default:
			throw new RowError(`Unable to evaluate "${text}" as a boolean`);
	}
}

function readConversionKind(record: CsvRecord): ConversionKind {
	const text = column(record, "uc_type");
	if (text === "null" || text === "poly" || text === "pchip") return text;
	throw new RowError(`unknown uc_type "${text}"`);
}

/**
 * Parse records and map each one, stopping at the first bad row. Line
 * numbers count the header as line 1.
 */
function mapRecords<T>(
	content: string,
	required: readonly string[],
	map: (record: CsvRecord, index: number) => T,
): CsvResult<T> {
	const parsed = parseCsvRecords(content, required);
	if (!parsed.success) return parsed;

	const rows: T[] = [];
	for (const [index, record] of parsed.rows.entries()) {
		try {
			rows.push(map(record, index));
		} catch (error) {
			if (error instanceof RowError) {
				return { success: false, error: `Line ${index + 2}: ${error.message}` };
			}
			throw error;
		}
	}
	return { success: true, rows };
}

/**
 * `elements.csv`: `id,name,type,length`. Ids follow row order from 1; an `id`
 * column, when present, must agree. Each element starts in the family named
 * by its type.
 */
export function parseElementsCsv(content: string): CsvResult<LatticeElement> {
	return mapRecords(content, ["type", "length"], (record, index) => {
		const id = index + 1;
		if (column(record, "id") !== "" && readInteger(record, "id") !== id) {
			throw new RowError(`element id ${column(record, "id")} is out of order (expected ${id})`);
		}
		const type = column(record, "type");
		if (type === "") throw new RowError("element type is empty");
		const name = column(record, "name");
		return {
			id,
			...(name !== "" ? { name } : {}),
			type,
			length: readNumber(record, "length"),
			families: [type],
		};
	});
}

/** `epics_devices.csv`: `el_id,name,field,get_pv,set_pv` */
export function parsePvDevicesCsv(content: string): CsvResult<PvDeviceDefinition> {
	return mapRecords(
		content,
		["el_id", "name", "field", "get_pv", "set_pv"],
		(record) => {
			const name = column(record, "name");
			const getPv = column(record, "get_pv");
			const setPv = column(record, "set_pv");
			if (getPv === "" && setPv === "") {
				throw new RowError(`device ${name} has neither get_pv nor set_pv`);
			}
			return {
				elementId: readInteger(record, "el_id"),
				name,
				field: column(record, "field"),
				...(getPv !== "" ? { getPv } : {}),
				...(setPv !== "" ? { setPv } : {}),
			};
		},
	);
}

/** `simple_devices.csv`: `el_id,field,value,readonly` */
export function parseSimpleDevicesCsv(
	content: string,
): CsvResult<SimpleDeviceDefinition> {
	return mapRecords(content, ["el_id", "field", "value", "readonly"], (record) => ({
		elementId: readInteger(record, "el_id"),
		field: column(record, "field"),
		value: readNumber(record, "value"),
		readonly: readBoolean(record, "readonly"),
	}));
}

/** `families.csv`: `el_id,family` */
export function parseFamiliesCsv(content: string): CsvResult<FamilyRow> {
	return mapRecords(content, ["el_id", "family"], (record) => {
		const family = column(record, "family");
		if (family === "") throw new RowError("family name is empty");
		return { elementId: readInteger(record, "el_id"), family };
	});
}

/**
 * `unitconv.csv`:
 * `el_id,field,uc_type,uc_id,phys_units,eng_units,lower_lim,upper_lim`.
 * Empty limits are unset; `uc_id` may be empty for null conversions.
 */
export function parseUnitconvCsv(content: string): CsvResult<UnitsRow> {
	return mapRecords(
		content,
		["el_id", "field", "uc_type", "uc_id", "phys_units", "eng_units"],
		(record) => {
			const kind = readConversionKind(record);
			const conversionId =
				kind === "null" && column(record, "uc_id") === ""
					? 0
					: readInteger(record, "uc_id");
			return {
				elementId: readInteger(record, "el_id"),
				field: column(record, "field"),
				kind,
				conversionId,
				physUnits: column(record, "phys_units"),
				engUnits: column(record, "eng_units"),
				lowerLimit: readOptionalNumber(record, "lower_lim"),
				upperLimit: readOptionalNumber(record, "upper_lim"),
			};
		},
	);
}

/** `uc_poly_data.csv`: `uc_id,coeff,val` */
export function parsePolyCsv(content: string): CsvResult<PolyDataRow> {
	return mapRecords(content, ["uc_id", "coeff", "val"], (record) => ({
		conversionId: readInteger(record, "uc_id"),
		coefficientIndex: readInteger(record, "coeff"),
		value: readNumber(record, "val"),
	}));
}

/** `uc_pchip_data.csv`: `uc_id,eng,phy`, samples in row order */
export function parsePchipCsv(content: string): CsvResult<PchipDataRow> {
	return mapRecords(content, ["uc_id", "eng", "phy"], (record) => ({
		conversionId: readInteger(record, "uc_id"),
		engineering: readNumber(record, "eng"),
		physics: readNumber(record, "phy"),
	}));
}
