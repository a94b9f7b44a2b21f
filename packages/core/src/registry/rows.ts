import type { ConversionKind } from "../conversion/record.js";

/** One row of the units table (`unitconv.csv`) */
export interface UnitsRow {
	/** Element id; 0 addresses the lattice itself */
	elementId: number;
	field: string;
	kind: ConversionKind;
	/** Foreign key into the polynomial or pchip data table */
	conversionId: number;
	physUnits: string;
	engUnits: string;
	lowerLimit?: number | undefined;
	upperLimit?: number | undefined;
}

/** One coefficient of a polynomial conversion (`uc_poly_data.csv`) */
export interface PolyDataRow {
	conversionId: number;
	/** Power of x this coefficient multiplies, ascending from 0 */
	coefficientIndex: number;
	value: number;
}

/** One calibration sample of a piecewise conversion (`uc_pchip_data.csv`) */
export interface PchipDataRow {
	conversionId: number;
	engineering: number;
	physics: number;
}

/** The three tables a conversion registry is built from */
export interface UnitTables {
	units: readonly UnitsRow[];
	poly: readonly PolyDataRow[];
	pchip: readonly PchipDataRow[];
}
