export type { CsvRecord, CsvResult } from "./csv.js";
export { formatCsv, parseCsv, parseCsvLine, parseCsvRecords } from "./csv.js";
export type { LatticeCsvErrorCode } from "./errors.js";
export { LatticeCsvError } from "./errors.js";
export { LatticeCsvProvider } from "./provider.js";
export type { FamilyRow } from "./tables.js";
export {
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
export { unitTablesToCsv, writeUnitTables } from "./writer.js";
