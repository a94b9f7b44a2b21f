import type { CalibrationCurve } from "../calibration/curve.js";
import { linearGradient } from "../calibration/curve.js";
import type { CalibrationTable } from "../calibration/table.js";
import { isUniformResponse } from "../calibration/table.js";
import { ConversionError, RegistryBuildError } from "../errors.js";
import type {
	PchipDataRow,
	PolyDataRow,
	UnitTables,
	UnitsRow,
} from "../registry/rows.js";
import type { ElementKind } from "./element-kind.js";
import { CORRECTOR_KINDS, ELEMENT_KINDS } from "./element-kind.js";
import type { IndexMap } from "./index-map.js";

/** One hardware device of the physics model */
export interface DeviceDescription {
	/** Position in the physics model (0-based) */
	modelIndex: number;
	kind: ElementKind;
	/** Key into the calibration table; required for calibrated kinds */
	channel?: string;
	/** Power-supply family; multipoles of one family may share a conversion */
	family?: string;
	/** Setpoint control range in engineering units */
	range?: { lower: number; upper: number };
}

/**
 * Correctors that are windings on another magnet are reported at the host's
 * model position; their own position is `offset` further on.
 */
export interface WindingOffset {
	hosts: ReadonlySet<number>;
	offset: number;
}

export interface UnitTableInput {
	devices: readonly DeviceDescription[];
	calibration: CalibrationTable<string>;
	indexMap: IndexMap;
	windings?: WindingOffset;
	/** Relative tolerance for family uniformity (default 1e-9) */
	tolerance?: number;
	/** Emit the lattice-level rows for element 0 (default true) */
	includeLattice?: boolean;
}

interface LatticeField {
	field: string;
	physUnits: string;
	engUnits: string;
	gradient?: number;
}

const LATTICE_FIELDS: readonly LatticeField[] = [
	{ field: "s_position", physUnits: "m", engUnits: "m" },
	{ field: "beta", physUnits: "m", engUnits: "m" },
	{ field: "dispersion", physUnits: "m", engUnits: "m" },
	{ field: "beam_current", physUnits: "A", engUnits: "A" },
	{ field: "energy", physUnits: "eV", engUnits: "MeV", gradient: 1e6 },
	{ field: "emittance_x", physUnits: "m", engUnits: "nm", gradient: 1e-9 },
	{ field: "emittance_y", physUnits: "m", engUnits: "pm", gradient: 1e-12 },
];

/**
 * Produce the three unit tables for a lattice from its device descriptions
 * and calibration data.
 *
 * Rows are emitted in a fixed order: lattice fields, then multipole families
 * in order of first appearance, then the remaining devices in input order.
 *
 * @throws RegistryBuildError for devices without calibration data or whose
 * model position has no element id
 */
export function buildUnitTables(input: UnitTableInput): UnitTables {
	const units: UnitsRow[] = [];
	const poly: PolyDataRow[] = [];
	const pchip: PchipDataRow[] = [];
	let nextId = 1;

	const addLinear = (gradient: number, offset = 0): number => {
		const conversionId = nextId++;
		poly.push(
			{ conversionId, coefficientIndex: 0, value: offset },
			{ conversionId, coefficientIndex: 1, value: gradient },
		);
		return conversionId;
	};

	const addCurve = (curve: CalibrationCurve): number => {
		const conversionId = nextId++;
		curve.current.forEach((engineering, i) => {
			pchip.push({ conversionId, engineering, physics: curve.field[i] ?? 0 });
		});
		return conversionId;
	};

	if (input.includeLattice ?? true) {
		for (const entry of LATTICE_FIELDS) {
			const isLinear = entry.gradient !== undefined;
			units.push({
				elementId: 0,
				field: entry.field,
				kind: isLinear ? "poly" : "null",
				conversionId: isLinear ? addLinear(entry.gradient ?? 1) : 0,
				physUnits: entry.physUnits,
				engUnits: entry.engUnits,
			});
		}
	}

	const families = new Map<string, DeviceDescription[]>();
	const others: DeviceDescription[] = [];
	for (const device of input.devices) {
		if (ELEMENT_KINDS[device.kind].strategy === "multipole-pchip") {
			const key = `${device.kind}\u0000${device.family ?? device.kind}`;
			const members = families.get(key) ?? [];
			members.push(device);
			families.set(key, members);
		} else {
			others.push(device);
		}
	}

	for (const members of families.values()) {
		const calibrated = members.map((device) => ({
			device,
			curve: curveFor(device, input),
		}));
		const curves = calibrated.map((entry) => entry.curve);
		const first = curves[0];
		const shared =
			first && isUniformResponse(curves, input.tolerance)
				? addCurve(first)
				: undefined;
		for (const { device, curve } of calibrated) {
			units.push(unitsRow(device, input, "pchip", shared ?? addCurve(curve)));
		}
	}

	let bpmConversion: number | undefined;
	for (const device of others) {
		const info = ELEMENT_KINDS[device.kind];
		switch (info.strategy) {
			case "fixed-linear": {
				bpmConversion ??= addLinear(info.gradient ?? 1);
				for (const field of info.fields) {
					units.push({
						elementId: elementIdOf(device, input),
						field,
						kind: "poly",
						conversionId: bpmConversion,
						physUnits: info.physUnits,
						engUnits: info.engUnits,
					});
				}
				break;
			}
			case "linear-calibration": {
				const curve = curveFor(device, input);
				let gradient: number;
				try {
					gradient = linearGradient(curve);
				} catch (error) {
					if (error instanceof ConversionError) {
						throw new RegistryBuildError(
							`channel ${device.channel ?? "?"}: ${error.message}`,
							"DOMAIN_ERROR",
							{ elementId: elementIdOf(device, input) },
							{ cause: error },
						);
					}
					throw error;
				}
				units.push(unitsRow(device, input, "poly", addLinear(gradient)));
				break;
			}
			case "null":
				units.push(unitsRow(device, input, "null", 0));
				break;
			case "multipole-pchip":
				break;
		}
	}

	return { units, poly, pchip };
}

function elementIdOf(device: DeviceDescription, input: UnitTableInput): number {
	const shifted =
		CORRECTOR_KINDS.includes(device.kind) &&
		input.windings?.hosts.has(device.modelIndex) === true;
	const modelIndex = shifted
		? device.modelIndex + (input.windings?.offset ?? 0)
		: device.modelIndex;
	const elementId = input.indexMap.toElementId(modelIndex);
	if (elementId === undefined) {
		throw new RegistryBuildError(
			`model index ${modelIndex} has no element id`,
			"MALFORMED_ROW",
			{ field: ELEMENT_KINDS[device.kind].fields[0] ?? device.kind },
		);
	}
	return elementId;
}

function curveFor(
	device: DeviceDescription,
	input: UnitTableInput,
): CalibrationCurve {
	const curve =
		device.channel !== undefined
			? input.calibration.get(device.channel)
			: undefined;
	if (!curve) {
		throw new RegistryBuildError(
			`no calibration data for channel ${device.channel ?? "(none)"}`,
			"UNKNOWN_CONVERSION",
			{
				elementId: elementIdOf(device, input),
				field: ELEMENT_KINDS[device.kind].fields[0] ?? device.kind,
			},
		);
	}
	return curve;
}

function unitsRow(
	device: DeviceDescription,
	input: UnitTableInput,
	kind: UnitsRow["kind"],
	conversionId: number,
): UnitsRow {
	const info = ELEMENT_KINDS[device.kind];
	const row: UnitsRow = {
		elementId: elementIdOf(device, input),
		field: info.fields[0] ?? device.kind,
		kind,
		conversionId,
		physUnits: info.physUnits,
		engUnits: info.engUnits,
	};
	if (kind !== "null" && device.range) {
		row.lowerLimit = device.range.lower;
		row.upperLimit = device.range.upper;
	}
	return row;
}
