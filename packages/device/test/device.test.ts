import type { LatticeDefinition } from "@lattice-units/core";
import { afterEach, describe, expect, it, vi } from "vitest";
import { PvDevice, PvEnabler, SimpleDevice } from "../src/device.js";
import { DeviceTable } from "../src/device-table.js";
import { DataSourceError } from "../src/errors.js";
import { MockControlSystem } from "./mocks/control-system-mock.js";

describe("PvDevice", () => {
	it("reads the PV for the requested handle", async () => {
		const cs = new MockControlSystem({
			"SR01A-PC-Q1:I": 101.5,
			"SR01A-PC-Q1:SETI": 100,
		});
		const device = new PvDevice("SR01A-PC-Q1", cs, {
			readbackPv: "SR01A-PC-Q1:I",
			setpointPv: "SR01A-PC-Q1:SETI",
		});
		await expect(device.getValue("readback", true)).resolves.toBe(101.5);
		await expect(device.getValue("setpoint", true)).resolves.toBe(100);
		expect(cs.getSingle).toHaveBeenCalledWith("SR01A-PC-Q1:I", true);
	});

	it("writes to the setpoint PV", async () => {
		const cs = new MockControlSystem();
		const device = new PvDevice("SR01A-PC-Q1", cs, {
			setpointPv: "SR01A-PC-Q1:SETI",
		});
		await expect(device.setValue(42, true)).resolves.toBe(true);
		expect(cs.values.get("SR01A-PC-Q1:SETI")).toBe(42);
	});

	it("rejects handles it has no PV for", async () => {
		const device = new PvDevice("SR01C-DI-EBPM-01", new MockControlSystem(), {
			readbackPv: "SR01C-DI-EBPM-01:SA:X",
		});
		await expect(device.setValue(1, true)).rejects.toMatchObject({
			code: "NO_HANDLE",
			message: "Device SR01C-DI-EBPM-01 has no setpoint PV",
		});
	});

	it("needs at least one PV", () => {
		expect(() => new PvDevice("empty", new MockControlSystem(), {})).toThrow(
			"Device empty needs a readback or a setpoint PV",
		);
	});

	it("treats empty PV names as missing", () => {
		const device = new PvDevice("d", new MockControlSystem(), {
			readbackPv: "d:RB",
			setpointPv: "",
		});
		expect(device.setpointPv).toBeUndefined();
	});

	it("passes tolerated control-system failures through", async () => {
		const cs = new MockControlSystem();
		const device = new PvDevice("d", cs, { readbackPv: "d:RB", setpointPv: "d:SP" });
		cs.offline.add("d:SP");
		await expect(device.getValue("readback", false)).resolves.toBeUndefined();
		await expect(device.setValue(1, false)).resolves.toBe(false);
		await expect(device.setValue(1, true)).rejects.toBeInstanceOf(DataSourceError);
	});
});

describe("PvEnabler", () => {
	it("compares the status PV after truncation", async () => {
		const cs = new MockControlSystem({ "SR-PS:ENABLED": 1.0 });
		const enabler = new PvEnabler("SR-PS:ENABLED", 1.7, cs);
		await expect(enabler.isEnabled()).resolves.toBe(true);
		cs.values.set("SR-PS:ENABLED", 0);
		await expect(enabler.isEnabled()).resolves.toBe(false);
	});

	it("drives a device's enabled state", async () => {
		const cs = new MockControlSystem({ "SR-PS:ENABLED": 0 });
		const device = new PvDevice("d", cs, {
			readbackPv: "d:RB",
			enabled: new PvEnabler("SR-PS:ENABLED", 1, cs),
		});
		await expect(device.isEnabled()).resolves.toBe(false);
		await expect(new SimpleDevice(1).isEnabled()).resolves.toBe(true);
	});
});

describe("SimpleDevice", () => {
	it("returns its stored value for any handle", async () => {
		const device = new SimpleDevice(3000);
		await expect(device.getValue()).resolves.toBe(3000);
	});

	it("is read-only by default", async () => {
		const device = new SimpleDevice(3000, {}, "energy");
		await expect(device.setValue(2000)).rejects.toMatchObject({
			code: "READONLY",
			message: "Cannot change the value of read-only device energy",
		});
	});

	it("stores a copy of writable array values", async () => {
		const device = new SimpleDevice([1, 2], { readonly: false });
		const next = [3, 4];
		await device.setValue(next);
		next[0] = 9;
		await expect(device.getValue()).resolves.toEqual([3, 4]);
	});
});

describe("DeviceTable", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	const definition: LatticeDefinition = {
		mode: "VMX",
		uri: "/data/VMX",
		elements: [
			{ id: 1, type: "Drift", length: 2, families: ["Drift"] },
			{ id: 2, type: "BPM", length: 0, families: ["BPM"] },
		],
		pvDevices: [
			{ elementId: 2, name: "BPM1", field: "x", getPv: "BPM1:X" },
			{ elementId: 2, name: "BPM1", field: "y", getPv: "BPM1:Y" },
		],
		simpleDevices: [
			{ elementId: 0, field: "energy", value: 3000, readonly: true },
		],
		unitTables: { units: [], poly: [], pchip: [] },
	};

	it("creates devices from a definition", async () => {
		const table = DeviceTable.fromDefinition(definition, new MockControlSystem());
		expect(table.size).toBe(4);
		expect(table.fieldsOf(2)).toEqual(["x", "y"]);
		expect(table.fieldsOf(0)).toEqual(["energy", "s_position"]);
		await expect(table.get(0, "s_position")?.getValue("readback", true)).resolves.toEqual([
			0, 2,
		]);
		expect(table.get(2, "x")).toBeInstanceOf(PvDevice);
		expect(table.has(1, "x")).toBe(false);
	});

	it("warns when a field's device is replaced", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		const table = new DeviceTable()
			.add(1, "x", new SimpleDevice(1, {}, "first"))
			.add(1, "x", new SimpleDevice(2, {}, "second"));
		expect(table.size).toBe(1);
		expect(warn).toHaveBeenCalledWith(
			'[device] Element 1 field "x" already has a device; replacing it with second',
		);
	});
});
