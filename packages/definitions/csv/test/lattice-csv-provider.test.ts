import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import {
	buildConversionRegistry,
	magneticRigidity,
	registryOptionsFor,
} from "@lattice-units/core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LatticeCsvProvider } from "../src/provider.js";
import { writeUnitTables } from "../src/writer.js";

const testDir = path.dirname(fileURLToPath(import.meta.url));
const modesDir = path.join(testDir, "fixtures", "modes");

describe("LatticeCsvProvider", () => {
	beforeEach(() => {
		vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("discovers directories holding elements and families", async () => {
		const provider = new LatticeCsvProvider([modesDir]);
		await expect(provider.discoverModes()).resolves.toEqual(["BADBOOL", "DIAD", "NOUNITS"]);
	});

	it("warns about unreadable data directories", async () => {
		const missing = path.join(modesDir, "does-not-exist");
		const provider = new LatticeCsvProvider([missing, modesDir]);
		await expect(provider.discoverModes()).resolves.toHaveLength(3);
		expect(console.warn).toHaveBeenCalledTimes(1);
	});

	it("resolves a mode to its directory", async () => {
		const provider = new LatticeCsvProvider([modesDir]);
		await expect(provider.peek("DIAD")).resolves.toEqual({
			mode: "DIAD",
			uri: path.join(modesDir, "DIAD"),
		});
	});

	it("suggests close mode names", async () => {
		const provider = new LatticeCsvProvider([modesDir]);
		await expect(provider.peek("DIAX")).rejects.toMatchObject({
			code: "UNKNOWN_MODE",
			message: 'Unknown lattice mode "DIAX". Did you mean: DIAD?',
		});
	});

	describe("parse", () => {
		it("reads elements with their families", async () => {
			const def = await new LatticeCsvProvider([modesDir]).parse("DIAD");
			expect(def.elements).toHaveLength(5);
			expect(def.elements[0]).toEqual({
				id: 1,
				name: "D1",
				type: "Drift",
				length: 2.5,
				families: ["Drift"],
			});
			expect(def.elements[1]?.families).toEqual(["Quadrupole", "QF"]);
			expect(def.elements[3]?.families).toEqual(["BPM"]);
		});

		it("reads PV and simple devices", async () => {
			const def = await new LatticeCsvProvider([modesDir]).parse("DIAD");
			expect(def.pvDevices).toHaveLength(6);
			expect(def.pvDevices[2]).toEqual({
				elementId: 4,
				name: "SR01C-DI-BPM1",
				field: "x",
				getPv: "SR01C-DI-BPM1:X",
			});
			expect(def.simpleDevices).toEqual([
				{ elementId: 0, field: "energy", value: 3000, readonly: true },
				{ elementId: 0, field: "emittance_x", value: 2.7, readonly: false },
			]);
		});

		it("reads the unit tables", async () => {
			const def = await new LatticeCsvProvider([modesDir]).parse("DIAD");
			expect(def.unitTables.units).toHaveLength(6);
			expect(def.unitTables.poly).toHaveLength(6);
			expect(def.unitTables.pchip).toEqual([
				{ conversionId: 2, engineering: 0, physics: 0 },
				{ conversionId: 2, engineering: 100, physics: 2.5 },
				{ conversionId: 2, engineering: 200, physics: 4.5 },
			]);
			expect(console.warn).not.toHaveBeenCalled();
		});

		it("builds a registry scaled to the beam rigidity", async () => {
			const def = await new LatticeCsvProvider([modesDir]).parse("DIAD");
			const registry = buildConversionRegistry(def.unitTables, registryOptionsFor(def));
			const rigidity = magneticRigidity(3000);

			expect(registry.resolve(0, "energy").toPhysics(3000)).toBe(3e9);
			expect(registry.resolve(2, "b1").toPhysics(100)).toBeCloseTo(2.5 / rigidity, 12);
			expect(registry.resolve(2, "b1").toEngineering(10)).toBe(200);
			expect(registry.resolve(3, "x_kick").toEngineering(0.0006 / rigidity)).toBeCloseTo(3, 9);
			expect(registry.resolve(4, "x").toPhysics(2)).toBe(0.002);
			expect(registry.resolve(4, "x")).toBe(registry.resolve(4, "y"));
			expect(registry.resolve(5, "f").kind).toBe("null");
		});

		it("tolerates modes without device or unit tables", async () => {
			const def = await new LatticeCsvProvider([modesDir]).parse("NOUNITS");
			expect(def.elements.map((e) => e.id)).toEqual([1, 2]);
			expect(def.pvDevices).toEqual([]);
			expect(def.unitTables).toEqual({ units: [], poly: [], pchip: [] });
			expect(console.warn).toHaveBeenCalledWith(
				`[lattice-csv] ${path.join(modesDir, "NOUNITS", "epics_devices.csv")} not found, mode NOUNITS has no PV devices.`,
			);
		});

		it("names the file and line of malformed rows", async () => {
			await expect(
				new LatticeCsvProvider([modesDir]).parse("BADBOOL"),
			).rejects.toMatchObject({
				code: "MALFORMED_FILE",
				message: 'simple_devices.csv: Line 2: Unable to evaluate "yes" as a boolean',
			});
		});
	});

	describe("writeUnitTables", () => {
		let workDir: string;

		beforeEach(async () => {
			workDir = await fs.mkdtemp(path.join(os.tmpdir(), "lattice-csv-"));
		});

		afterEach(async () => {
			await fs.rm(workDir, { recursive: true, force: true });
		});

		it("writes tables a provider reads back", async () => {
			const source = await new LatticeCsvProvider([modesDir]).parse("DIAD");
			const modeDir = path.join(workDir, "COPY");
			await fs.mkdir(modeDir);
			for (const name of ["elements.csv", "families.csv", "epics_devices.csv"]) {
				await fs.copyFile(path.join(source.uri, name), path.join(modeDir, name));
			}

			const written = await writeUnitTables(modeDir, source.unitTables);
			expect(written.map((p) => path.basename(p))).toEqual([
				"unitconv.csv",
				"uc_poly_data.csv",
				"uc_pchip_data.csv",
			]);

			const copy = await new LatticeCsvProvider([workDir]).parse("COPY");
			expect(copy.unitTables).toEqual(source.unitTables);
		});
	});
});
