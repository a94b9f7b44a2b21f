import type { CalibrationCurve } from "../calibration/curve.js";
import { createCalibrationCurve } from "../calibration/curve.js";
import { ConversionError, RegistryBuildError } from "../errors.js";
import type { ConversionKind } from "../conversion/record.js";
import { ConversionRecord, NULL_CONVERSION } from "../conversion/record.js";
import { magneticRigidity } from "../conversion/rigidity.js";
import { validateLimits, validateNumber } from "../validation/rules.js";
import type { PchipDataRow, PolyDataRow, UnitTables, UnitsRow } from "./rows.js";

const CONVERSION_KINDS: readonly ConversionKind[] = ["null", "poly", "pchip"];

export interface RegistryOptions {
	/**
	 * Normalise magnet strengths to the beam rigidity. Applies to every
	 * non-null conversion of the elements selected by `appliesTo`.
	 */
	rigidity?: {
		energyMeV: number;
		appliesTo: (elementId: number) => boolean;
	};
}

/** A resolved registry entry */
export interface RegistryEntry {
	elementId: number;
	field: string;
	record: ConversionRecord;
}

function entryKey(elementId: number, field: string): string {
	return `${elementId}\u0000${field}`;
}

/**
 * Immutable index from (element id, field) to the conversion governing that
 * field. Build one with {@link buildConversionRegistry}.
 */
export class ConversionRegistry {
	private readonly records: ReadonlyMap<string, RegistryEntry>;

	constructor(entries: Iterable<RegistryEntry>) {
		const records = new Map<string, RegistryEntry>();
		for (const entry of entries) {
			records.set(
				entryKey(entry.elementId, entry.field),
				Object.freeze({ ...entry }),
			);
		}
		this.records = records;
		Object.freeze(this);
	}

	/** Number of explicit (element, field) entries */
	get size(): number {
		return this.records.size;
	}

	/**
	 * Conversion for a field. Fields without unit metadata resolve to
	 * {@link NULL_CONVERSION}; this never throws.
	 */
	resolve(elementId: number, field: string): ConversionRecord {
		return (
			this.records.get(entryKey(elementId, field))?.record ?? NULL_CONVERSION
		);
	}

	/** Whether an explicit entry exists for the field */
	has(elementId: number, field: string): boolean {
		return this.records.has(entryKey(elementId, field));
	}

	/** All explicit entries, ordered by element id then field name */
	entries(): RegistryEntry[] {
		return [...this.records.values()].sort(
			(a, b) => a.elementId - b.elementId || a.field.localeCompare(b.field),
		);
	}

	/** Field names with an explicit entry on an element, sorted */
	fieldsOf(elementId: number): string[] {
		return this.entries()
			.filter((e) => e.elementId === elementId)
			.map((e) => e.field);
	}

	/** Element ids with at least one explicit entry, ascending */
	elementIds(): number[] {
		return [...new Set(this.entries().map((e) => e.elementId))];
	}
}

function isNonNegativeInteger(value: number): boolean {
	return Number.isInteger(value) && value >= 0;
}

/**
 * Group polynomial rows into coefficient arrays. Indices of each conversion
 * must run 0..n-1 with no gaps or repeats.
 */
function collectPolynomials(
	rows: readonly PolyDataRow[],
): Map<number, number[]> {
	const grouped = new Map<number, Map<number, number>>();
	for (const row of rows) {
		const location = { conversionId: row.conversionId };
		if (
			!isNonNegativeInteger(row.conversionId) ||
			!isNonNegativeInteger(row.coefficientIndex)
		) {
			throw new RegistryBuildError(
				`coefficient index ${row.coefficientIndex} must be a non-negative integer`,
				"MALFORMED_ROW",
				location,
			);
		}
		const valueCheck = validateNumber(row.value);
		if (!valueCheck.valid) {
			throw new RegistryBuildError(
				`coefficient ${row.coefficientIndex}: ${valueCheck.error ?? "invalid value"}`,
				"MALFORMED_ROW",
				location,
			);
		}
		const coefficients = grouped.get(row.conversionId) ?? new Map<number, number>();
		if (coefficients.has(row.coefficientIndex)) {
			throw new RegistryBuildError(
				`coefficient ${row.coefficientIndex} given more than once`,
				"MALFORMED_ROW",
				location,
			);
		}
		coefficients.set(row.coefficientIndex, row.value);
		grouped.set(row.conversionId, coefficients);
	}

	const polynomials = new Map<number, number[]>();
	for (const [conversionId, coefficients] of grouped) {
		const ordered: number[] = [];
		for (let i = 0; i < coefficients.size; i++) {
			const value = coefficients.get(i);
			if (value === undefined) {
				throw new RegistryBuildError(
					`coefficient ${i} missing (indices must run from 0 without gaps)`,
					"COEFFICIENT_GAP",
					{ conversionId },
				);
			}
			ordered.push(value);
		}
		polynomials.set(conversionId, ordered);
	}
	return polynomials;
}

/** Group pchip samples (in row order) into validated calibration curves */
function collectCurves(
	rows: readonly PchipDataRow[],
): Map<number, CalibrationCurve> {
	const grouped = new Map<number, { current: number[]; field: number[] }>();
	for (const row of rows) {
		if (!isNonNegativeInteger(row.conversionId)) {
			throw new RegistryBuildError(
				"conversion id must be a non-negative integer",
				"MALFORMED_ROW",
				{ conversionId: row.conversionId },
			);
		}
		const samples = grouped.get(row.conversionId) ?? {
			current: [],
			field: [],
		};
		samples.current.push(row.engineering);
		samples.field.push(row.physics);
		grouped.set(row.conversionId, samples);
	}

	const curves = new Map<number, CalibrationCurve>();
	for (const [conversionId, samples] of grouped) {
		try {
			curves.set(
				conversionId,
				createCalibrationCurve(samples.current, samples.field),
			);
		} catch (error) {
			if (error instanceof ConversionError) {
				throw new RegistryBuildError(
					error.message,
					"DOMAIN_ERROR",
					{ conversionId },
					{ cause: error },
				);
			}
			throw error;
		}
	}
	return curves;
}

function validateUnitsRow(row: UnitsRow): void {
	const location = {
		elementId: row.elementId,
		field: row.field,
		conversionId: row.conversionId,
	};
	if (!isNonNegativeInteger(row.elementId)) {
		throw new RegistryBuildError(
			"element id must be a non-negative integer",
			"MALFORMED_ROW",
			location,
		);
	}
	if (row.field.trim().length === 0) {
		throw new RegistryBuildError(
			"field name is empty",
			"MALFORMED_ROW",
			location,
		);
	}
	if (!CONVERSION_KINDS.includes(row.kind)) {
		throw new RegistryBuildError(
			`unknown conversion kind "${String(row.kind)}"`,
			"MALFORMED_ROW",
			location,
		);
	}
	if (row.kind !== "null" && !isNonNegativeInteger(row.conversionId)) {
		throw new RegistryBuildError(
			"conversion id must be a non-negative integer",
			"MALFORMED_ROW",
			location,
		);
	}
	const limitCheck = validateLimits(row.lowerLimit, row.upperLimit);
	if (!limitCheck.valid) {
		throw new RegistryBuildError(
			limitCheck.error ?? "invalid limits",
			"INVALID_LIMITS",
			location,
		);
	}
}

/**
 * Build every conversion record from the unit tables and index them by
 * (element id, field).
 *
 * All rows are validated up front and any problem rejects the whole build;
 * a registry is never returned partially populated. Rows that reference the
 * same conversion with identical units, limits and rigidity share one record.
 *
 * @throws RegistryBuildError identifying the offending element, field and
 * conversion id
 *
 * @example
 * const registry = buildConversionRegistry({
 *   units: [{ elementId: 3, field: "x", kind: "poly", conversionId: 1,
 *             physUnits: "m", engUnits: "mm" }],
 *   poly: [{ conversionId: 1, coefficientIndex: 0, value: 0 },
 *          { conversionId: 1, coefficientIndex: 1, value: 0.001 }],
 *   pchip: [],
 * });
 * registry.resolve(3, "x").toPhysics(2); // 0.002
 */
export function buildConversionRegistry(
	tables: UnitTables,
	options: RegistryOptions = {},
): ConversionRegistry {
	const polynomials = collectPolynomials(tables.poly);
	const curves = collectCurves(tables.pchip);

	let rigidity: number | undefined;
	if (options.rigidity) {
		try {
			rigidity = magneticRigidity(options.rigidity.energyMeV);
		} catch (error) {
			throw new RegistryBuildError(
				error instanceof Error ? error.message : String(error),
				"DOMAIN_ERROR",
				{ elementId: 0, field: "energy" },
				{ cause: error },
			);
		}
	}

	const shared = new Map<string, ConversionRecord>();
	const seen = new Set<string>();
	const entries: RegistryEntry[] = [];

	for (const row of tables.units) {
		validateUnitsRow(row);
		const location = {
			elementId: row.elementId,
			field: row.field,
			conversionId: row.conversionId,
		};

		const key = entryKey(row.elementId, row.field);
		if (seen.has(key)) {
			throw new RegistryBuildError(
				"more than one conversion given for this field",
				"DUPLICATE_KEY",
				location,
			);
		}
		seen.add(key);

		const scaled =
			row.kind !== "null" &&
			rigidity !== undefined &&
			options.rigidity?.appliesTo(row.elementId) === true;
		const recordRigidity = scaled ? rigidity : undefined;

		const shareKey = JSON.stringify([
			row.kind,
			row.kind === "null" ? null : row.conversionId,
			row.physUnits,
			row.engUnits,
			row.lowerLimit ?? null,
			row.upperLimit ?? null,
			recordRigidity ?? null,
		]);

		let record = shared.get(shareKey);
		if (!record) {
			record = createRecord(
				row,
				polynomials,
				curves,
				recordRigidity,
				location,
			);
			shared.set(shareKey, record);
		}
		entries.push({ elementId: row.elementId, field: row.field, record });
	}

	return new ConversionRegistry(entries);
}

function createRecord(
	row: UnitsRow,
	polynomials: ReadonlyMap<number, number[]>,
	curves: ReadonlyMap<number, CalibrationCurve>,
	rigidity: number | undefined,
	location: { elementId: number; field: string; conversionId: number },
): ConversionRecord {
	const options = {
		name: String(row.conversionId),
		physUnits: row.physUnits,
		engUnits: row.engUnits,
		lowerLimit: row.lowerLimit,
		upperLimit: row.upperLimit,
		rigidity,
	};

	try {
		switch (row.kind) {
			case "null":
				return new ConversionRecord(
					{ kind: "null" },
					{ physUnits: row.physUnits, engUnits: row.engUnits },
				);
			case "poly": {
				const coefficients = polynomials.get(row.conversionId);
				if (!coefficients) {
					throw new RegistryBuildError(
						"no polynomial data for this conversion id",
						"UNKNOWN_CONVERSION",
						location,
					);
				}
				return new ConversionRecord({ kind: "poly", coefficients }, options);
			}
			case "pchip": {
				const curve = curves.get(row.conversionId);
				if (!curve) {
					throw new RegistryBuildError(
						"no pchip data for this conversion id",
						"UNKNOWN_CONVERSION",
						location,
					);
				}
				return new ConversionRecord({ kind: "pchip", curve }, options);
			}
			default: {
				const _exhaustive: never = row.kind;
				throw new RegistryBuildError(
					`unknown conversion kind "${String(_exhaustive)}"`,
					"MALFORMED_ROW",
					location,
				);
			}
		}
	} catch (error) {
		if (error instanceof ConversionError) {
			throw new RegistryBuildError(error.message, "DOMAIN_ERROR", location, {
				cause: error,
			});
		}
		throw error;
	}
}
