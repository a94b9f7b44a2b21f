import type { UnitTables } from "../registry/rows.js";
import type { RegistryOptions } from "../registry/registry.js";
import { needsRigidity } from "../lattice/element-kind.js";

/** An element of the lattice, in beamline order */
export interface LatticeElement {
	/** 1-based position; id 0 is reserved for the lattice */
	id: number;
	name?: string;
	/** Model type, also the element's first family */
	type: string;
	/** Length in metres */
	length: number;
	families: string[];
}

/** A field backed by a readback and/or setpoint process variable */
export interface PvDeviceDefinition {
	elementId: number;
	/** Device name, usually the PV prefix */
	name: string;
	field: string;
	getPv?: string;
	setPv?: string;
}

/** A field backed by a stored constant */
export interface SimpleDeviceDefinition {
	elementId: number;
	field: string;
	value: number;
	readonly: boolean;
}

/** Minimal metadata about a lattice mode, cheap to read */
export interface LatticeDefinitionStub {
	/** Mode name, e.g. "I04" */
	mode: string;
	/** Absolute path of the mode directory */
	uri: string;
}

/** A fully parsed lattice mode */
export interface LatticeDefinition extends LatticeDefinitionStub {
	elements: LatticeElement[];
	pvDevices: PvDeviceDefinition[];
	simpleDevices: SimpleDeviceDefinition[];
	unitTables: UnitTables;
}

/** s position (start of each element), accumulated from element lengths */
export function sPositions(elements: readonly LatticeElement[]): number[] {
	const positions: number[] = [];
	let s = 0;
	for (const element of elements) {
		positions.push(s);
		s += element.length;
	}
	return positions;
}

/** Beam energy in MeV, stored as the lattice's `energy` simple device */
export function latticeEnergy(definition: LatticeDefinition): number | undefined {
	return definition.simpleDevices.find(
		(d) => d.elementId === 0 && d.field === "energy",
	)?.value;
}

/** Every family name used in the lattice, sorted */
export function allFamilies(elements: readonly LatticeElement[]): string[] {
	return [...new Set(elements.flatMap((e) => e.families))].sort();
}

/** Elements belonging to a family (case-insensitive), in lattice order */
export function familyMembers(
	elements: readonly LatticeElement[],
	family: string,
): LatticeElement[] {
	const wanted = family.toLowerCase();
	return elements.filter((e) =>
		e.families.some((f) => f.toLowerCase() === wanted),
	);
}

/**
 * Registry options for a definition: magnet families are normalised to the
 * beam rigidity when the lattice carries an energy.
 */
export function registryOptionsFor(
	definition: LatticeDefinition,
): RegistryOptions {
	const energyMeV = latticeEnergy(definition);
	if (energyMeV === undefined) return {};

	const scaled = new Set(
		definition.elements
			.filter((e) => needsRigidity(e.families))
			.map((e) => e.id),
	);
	return {
		rigidity: {
			energyMeV,
			appliesTo: (elementId) => scaled.has(elementId),
		},
	};
}
