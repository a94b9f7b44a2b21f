import { describe, expect, it } from "vitest";
import { CalibrationTable } from "../src/calibration/table.js";
import type { LatticeDefinition } from "../src/definition/lattice.js";
import {
	allFamilies,
	familyMembers,
	latticeEnergy,
	registryOptionsFor,
	sPositions,
} from "../src/definition/lattice.js";
import { RegistryBuildError } from "../src/errors.js";
import {
	ELEMENT_KINDS,
	isElementKind,
	needsRigidity,
} from "../src/lattice/element-kind.js";
import { IndexMap } from "../src/lattice/index-map.js";
import type { DeviceDescription } from "../src/lattice/unit-tables.js";
import { buildUnitTables } from "../src/lattice/unit-tables.js";
import { buildConversionRegistry } from "../src/registry/registry.js";

const MODEL_TYPES = [
	"Drift",
	"Quadrupole",
	"Quadrupole",
	"Sextupole",
	"HSTR",
	"BPM",
	"Quadrupole",
	"HTRIM",
	"RFCavity",
];

const WINDINGS = [{ winding: "HSTR", host: "Sextupole", distance: 1 }];

const CALIBRATION = CalibrationTable.from([
	["Q1A", { current: [0, 100, 200], field: [0, 0.5, 0.9] }],
	["Q1B", { current: [0, 50, 100], field: [0, 0.25, 0.45] }],
	["Q2A", { current: [0, 100, 200], field: [0, 0.6, 1.0] }],
	["S1A", { current: [0, 100], field: [0, 20] }],
	["HC1", { current: [0, 10], field: [0, 0.002] }],
	["HT1", { current: [0, 5], field: [0, 0.0005] }],
]);

const DEVICES: DeviceDescription[] = [
	{
		modelIndex: 1,
		kind: "quadrupole",
		channel: "Q1A",
		family: "Q1D",
		range: { lower: 0, upper: 200 },
	},
	{
		modelIndex: 2,
		kind: "quadrupole",
		channel: "Q1B",
		family: "Q1D",
		range: { lower: 0, upper: 180 },
	},
	{
		modelIndex: 3,
		kind: "sextupole",
		channel: "S1A",
		family: "S1",
		range: { lower: -100, upper: 100 },
	},
	{
		modelIndex: 3,
		kind: "corrector-horizontal",
		channel: "HC1",
		range: { lower: -10, upper: 10 },
	},
	{ modelIndex: 5, kind: "bpm" },
	{ modelIndex: 6, kind: "quadrupole", channel: "Q2A", family: "Q2D" },
	{
		modelIndex: 7,
		kind: "trim-horizontal",
		channel: "HT1",
		range: { lower: -5, upper: 5 },
	},
	{ modelIndex: 8, kind: "rf-cavity" },
];

describe("element kinds", () => {
	it("describes fields and units per kind", () => {
		expect(ELEMENT_KINDS.quadrupole.fields).toEqual(["b1"]);
		expect(ELEMENT_KINDS["trim-vertical"].fields).toEqual(["y_kick"]);
		expect(ELEMENT_KINDS.bpm).toEqual({
			fields: ["x", "y"],
			physUnits: "m",
			engUnits: "mm",
			strategy: "fixed-linear",
			gradient: 0.001,
		});
	});

	it("recognises kind names", () => {
		expect(isElementKind("skew-quadrupole")).toBe(true);
		expect(isElementKind("Quadrupole")).toBe(false);
		expect(isElementKind("toString")).toBe(false);
	});

	it("selects rigidity families case-insensitively", () => {
		expect(needsRigidity(["BPM", "Quadrupole"])).toBe(true);
		expect(needsRigidity(["HSTR"])).toBe(true);
		expect(needsRigidity(["BPM", "HTRIM"])).toBe(false);
		expect(needsRigidity([])).toBe(false);
	});
});

describe("IndexMap", () => {
	const map = IndexMap.build(MODEL_TYPES, WINDINGS);

	it("numbers elements from 1 in model order", () => {
		expect(map.toElementId(0)).toBe(1);
		expect(map.toElementId(3)).toBe(4);
		expect(map.toElementId(8)).toBe(8);
	});

	it("folds windings into their host", () => {
		expect(map.toElementId(4)).toBe(4);
		expect(map.toModelIndices(4)).toEqual([3, 4]);
		expect(map.toModelIndices(5)).toEqual([5]);
	});

	it("counts positions and elements", () => {
		expect(map.modelCount).toBe(9);
		expect(map.elementCount).toBe(8);
	});

	it("returns nothing outside the model", () => {
		expect(map.toElementId(9)).toBeUndefined();
		expect(map.toModelIndices(0)).toEqual([]);
	});

	it("keeps windings without a matching host as separate elements", () => {
		const plain = IndexMap.build(["BPM", "HSTR", "Sextupole"], WINDINGS);
		expect(plain.toElementId(1)).toBe(2);
		expect(plain.elementCount).toBe(3);
	});

	it("never folds the first element", () => {
		const first = IndexMap.build(["HSTR"], [
			{ winding: "HSTR", host: "HSTR", distance: 1 },
		]);
		expect(first.toElementId(0)).toBe(1);
	});
});

describe("buildUnitTables", () => {
	const indexMap = IndexMap.build(MODEL_TYPES, WINDINGS);
	const build = (devices: DeviceDescription[] = DEVICES) =>
		buildUnitTables({
			devices,
			calibration: CALIBRATION,
			indexMap,
			windings: { hosts: new Set([3]), offset: 1 },
		});

	it("emits lattice rows for element 0", () => {
		const { units, poly } = build();
		expect(units.slice(0, 7).map((r) => [r.field, r.kind, r.conversionId])).toEqual([
			["s_position", "null", 0],
			["beta", "null", 0],
			["dispersion", "null", 0],
			["beam_current", "null", 0],
			["energy", "poly", 1],
			["emittance_x", "poly", 2],
			["emittance_y", "poly", 3],
		]);
		expect(units[4]).toEqual({
			elementId: 0,
			field: "energy",
			kind: "poly",
			conversionId: 1,
			physUnits: "eV",
			engUnits: "MeV",
		});
		expect(poly.slice(0, 2)).toEqual([
			{ conversionId: 1, coefficientIndex: 0, value: 0 },
			{ conversionId: 1, coefficientIndex: 1, value: 1e6 },
		]);
	});

	it("can leave out the lattice rows", () => {
		const { units } = buildUnitTables({
			devices: [{ modelIndex: 8, kind: "rf-cavity" }],
			calibration: CALIBRATION,
			indexMap,
			includeLattice: false,
		});
		expect(units).toEqual([
			{
				elementId: 8,
				field: "f",
				kind: "null",
				conversionId: 0,
				physUnits: "Hz",
				engUnits: "Hz",
			},
		]);
	});

	it("shares one curve across a uniform family, keeping per-device limits", () => {
		const { units, pchip } = build();
		const q1 = units.filter((r) => r.conversionId === 4);
		expect(q1).toEqual([
			{
				elementId: 2,
				field: "b1",
				kind: "pchip",
				conversionId: 4,
				physUnits: "m^-2",
				engUnits: "A",
				lowerLimit: 0,
				upperLimit: 200,
			},
			{
				elementId: 3,
				field: "b1",
				kind: "pchip",
				conversionId: 4,
				physUnits: "m^-2",
				engUnits: "A",
				lowerLimit: 0,
				upperLimit: 180,
			},
		]);
		expect(pchip.filter((r) => r.conversionId === 4)).toEqual([
			{ conversionId: 4, engineering: 0, physics: 0 },
			{ conversionId: 4, engineering: 100, physics: 0.5 },
			{ conversionId: 4, engineering: 200, physics: 0.9 },
		]);
	});

	it("gives each device its own curve when a family is not uniform", () => {
		const devices = DEVICES.map((d) =>
			d.channel === "Q1B" ? { ...d, channel: "Q2A" } : d,
		);
		const { units } = build(devices);
		const q1 = units.filter((r) => r.field === "b1").map((r) => r.conversionId);
		expect(q1).toEqual([4, 5, 7]);
	});

	it("moves corrector windings onto the host element", () => {
		const { units, poly } = build();
		const corrector = units.find((r) => r.field === "x_kick" && r.elementId === 4);
		expect(corrector).toEqual({
			elementId: 4,
			field: "x_kick",
			kind: "poly",
			conversionId: 7,
			physUnits: "",
			engUnits: "A",
			lowerLimit: -10,
			upperLimit: 10,
		});
		expect(poly.filter((r) => r.conversionId === 7)).toEqual([
			{ conversionId: 7, coefficientIndex: 0, value: 0 },
			{ conversionId: 7, coefficientIndex: 1, value: 0.0002 },
		]);
	});

	it("gives BPMs one shared millimetre conversion without limits", () => {
		const { units, poly } = build();
		expect(units.filter((r) => r.elementId === 5)).toEqual([
			{
				elementId: 5,
				field: "x",
				kind: "poly",
				conversionId: 8,
				physUnits: "m",
				engUnits: "mm",
			},
			{
				elementId: 5,
				field: "y",
				kind: "poly",
				conversionId: 8,
				physUnits: "m",
				engUnits: "mm",
			},
		]);
		expect(poly.filter((r) => r.conversionId === 8).map((r) => r.value)).toEqual([
			0, 0.001,
		]);
	});

	it("builds a working registry", () => {
		const registry = buildConversionRegistry(build());
		expect(registry.resolve(2, "b1").toPhysics(100)).toBe(0.5);
		expect(registry.resolve(3, "b1").toEngineering(0.9)).toBe(180);
		expect(registry.resolve(4, "b2").toPhysics(50)).toBe(10);
		expect(registry.resolve(7, "x_kick").toEngineering(0.0001)).toBe(1);
		expect(registry.resolve(5, "x")).toBe(registry.resolve(5, "y"));
		expect(registry.resolve(8, "f").kind).toBe("null");
	});

	it("fails for devices without calibration data", () => {
		let caught: unknown;
		try {
			build([{ modelIndex: 1, kind: "quadrupole", channel: "NOPE" }]);
		} catch (error) {
			caught = error;
		}
		expect(caught).toBeInstanceOf(RegistryBuildError);
		expect(caught).toMatchObject({
			code: "UNKNOWN_CONVERSION",
			message: 'element 2, field "b1": no calibration data for channel NOPE',
		});
	});

	it("fails for model positions outside the index map", () => {
		expect(() => build([{ modelIndex: 20, kind: "rf-cavity" }])).toThrow(
			'field "f": model index 20 has no element id',
		);
	});
});

describe("lattice definitions", () => {
	const definition: LatticeDefinition = {
		mode: "DIAD",
		uri: "/data/DIAD",
		elements: [
			{ id: 1, type: "Drift", length: 1.5, families: ["Drift"] },
			{ id: 2, type: "Quadrupole", length: 0.5, families: ["Quadrupole", "Q1D"] },
			{ id: 3, type: "BPM", length: 0, families: ["BPM"] },
		],
		pvDevices: [],
		simpleDevices: [
			{ elementId: 0, field: "energy", value: 3000, readonly: true },
		],
		unitTables: { units: [], poly: [], pchip: [] },
	};

	it("accumulates s positions", () => {
		expect(sPositions(definition.elements)).toEqual([0, 1.5, 2]);
	});

	it("reads the beam energy", () => {
		expect(latticeEnergy(definition)).toBe(3000);
		expect(latticeEnergy({ ...definition, simpleDevices: [] })).toBeUndefined();
	});

	it("lists and filters families", () => {
		expect(allFamilies(definition.elements)).toEqual([
			"BPM",
			"Drift",
			"Q1D",
			"Quadrupole",
		]);
		expect(familyMembers(definition.elements, "q1d").map((e) => e.id)).toEqual([
			2,
		]);
	});

	it("scales only rigidity families", () => {
		const options = registryOptionsFor(definition);
		expect(options.rigidity?.energyMeV).toBe(3000);
		expect(options.rigidity?.appliesTo(2)).toBe(true);
		expect(options.rigidity?.appliesTo(3)).toBe(false);
		expect(registryOptionsFor({ ...definition, simpleDevices: [] })).toEqual({});
	});
});
