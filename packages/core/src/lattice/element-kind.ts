/**
 * Kinds of lattice element that carry unit conversions, with the field each
 * one exposes and how its conversion is derived from calibration data.
 */
export type ElementKind =
	| "quadrupole"
	| "sextupole"
	| "octupole"
	| "bend"
	| "double-bend"
	| "skew-quadrupole"
	| "corrector-horizontal"
	| "corrector-vertical"
	| "trim-horizontal"
	| "trim-vertical"
	| "bpm"
	| "rf-cavity";

/**
 * How a kind's conversion is produced:
 *
 * - `multipole-pchip`: measured excitation curve, shared across a family when
 *   every member responds identically
 * - `linear-calibration`: straight line through the second calibration sample
 * - `fixed-linear`: the same constant gradient for every device
 * - `null`: values are already in physics units
 */
export type ConversionStrategy =
	| "multipole-pchip"
	| "linear-calibration"
	| "fixed-linear"
	| "null";

export interface ElementKindInfo {
	fields: readonly string[];
	physUnits: string;
	engUnits: string;
	strategy: ConversionStrategy;
	/** Gradient for `fixed-linear` kinds */
	gradient?: number;
}

export const ELEMENT_KINDS: Readonly<Record<ElementKind, ElementKindInfo>> = {
	quadrupole: {
		fields: ["b1"],
		physUnits: "m^-2",
		engUnits: "A",
		strategy: "multipole-pchip",
	},
	sextupole: {
		fields: ["b2"],
		physUnits: "m^-3",
		engUnits: "A",
		strategy: "multipole-pchip",
	},
	octupole: {
		fields: ["b3"],
		physUnits: "m^-4",
		engUnits: "A",
		strategy: "multipole-pchip",
	},
	bend: {
		fields: ["b0"],
		physUnits: "m^-1",
		engUnits: "A",
		strategy: "multipole-pchip",
	},
	"double-bend": {
		fields: ["db0"],
		physUnits: "m^-1",
		engUnits: "A",
		strategy: "multipole-pchip",
	},
	"skew-quadrupole": {
		fields: ["a1"],
		physUnits: "m^-2",
		engUnits: "A",
		strategy: "multipole-pchip",
	},
	"corrector-horizontal": {
		fields: ["x_kick"],
		physUnits: "",
		engUnits: "A",
		strategy: "linear-calibration",
	},
	"corrector-vertical": {
		fields: ["y_kick"],
		physUnits: "",
		engUnits: "A",
		strategy: "linear-calibration",
	},
	"trim-horizontal": {
		fields: ["x_kick"],
		physUnits: "",
		engUnits: "A",
		strategy: "linear-calibration",
	},
	"trim-vertical": {
		fields: ["y_kick"],
		physUnits: "",
		engUnits: "A",
		strategy: "linear-calibration",
	},
	bpm: {
		fields: ["x", "y"],
		physUnits: "m",
		engUnits: "mm",
		strategy: "fixed-linear",
		gradient: 0.001,
	},
	"rf-cavity": {
		fields: ["f"],
		physUnits: "Hz",
		engUnits: "Hz",
		strategy: "null",
	},
};

/** Corrector kinds, which may be windings on another magnet */
export const CORRECTOR_KINDS: readonly ElementKind[] = [
	"corrector-horizontal",
	"corrector-vertical",
];

/**
 * Families whose physics strengths are normalised to the beam rigidity.
 * Compared case-insensitively.
 */
export const RIGIDITY_FAMILIES: readonly string[] = [
	"hstr",
	"vstr",
	"quadrupole",
	"sextupole",
	"multipole",
	"bend",
];

export function isElementKind(value: string): value is ElementKind {
	return Object.hasOwn(ELEMENT_KINDS, value);
}

/** Whether any of an element's families needs rigidity scaling */
export function needsRigidity(families: Iterable<string>): boolean {
	for (const family of families) {
		if (RIGIDITY_FAMILIES.includes(family.toLowerCase())) return true;
	}
	return false;
}
