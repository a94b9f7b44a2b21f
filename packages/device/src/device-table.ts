import type { LatticeDefinition } from "@lattice-units/core";
import { sPositions } from "@lattice-units/core";
import type { ControlSystem } from "./control-system.js";
import type { Device } from "./device.js";
import { PvDevice, SimpleDevice } from "./device.js";

function tableKey(elementId: number, field: string): string {
	return `${elementId}\u0000${field}`;
}

export interface DeviceEntry {
	elementId: number;
	field: string;
	device: Device;
}

/** Devices keyed by (element id, field); element 0 is the lattice */
export class DeviceTable {
	private readonly devices = new Map<string, DeviceEntry>();

	/**
	 * Attach a device to a field, replacing (with a warning) any device the
	 * field already had.
	 */
	add(elementId: number, field: string, device: Device): this {
		const key = tableKey(elementId, field);
		if (this.devices.has(key)) {
			console.warn(
				`[device] Element ${elementId} field "${field}" already has a device; replacing it with ${device.name || "an unnamed device"}`,
			);
		}
		this.devices.set(key, { elementId, field, device });
		return this;
	}

	get(elementId: number, field: string): Device | undefined {
		return this.devices.get(tableKey(elementId, field))?.device;
	}

	has(elementId: number, field: string): boolean {
		return this.devices.has(tableKey(elementId, field));
	}

	get size(): number {
		return this.devices.size;
	}

	/** Field names with a device on an element, sorted */
	fieldsOf(elementId: number): string[] {
		return [...this.devices.values()]
			.filter((e) => e.elementId === elementId)
			.map((e) => e.field)
			.sort();
	}

	entries(): DeviceEntry[] {
		return [...this.devices.values()];
	}

	/**
	 * Create the devices a parsed lattice declares. PV devices share the given
	 * control system; the lattice also gets a read-only `s_position` device
	 * holding the start position of every element.
	 */
	static fromDefinition(
		definition: LatticeDefinition,
		cs: ControlSystem,
	): DeviceTable {
		const table = new DeviceTable();
		for (const pv of definition.pvDevices) {
			table.add(
				pv.elementId,
				pv.field,
				new PvDevice(pv.name, cs, {
					readbackPv: pv.getPv,
					setpointPv: pv.setPv,
				}),
			);
		}
		table.add(
			0,
			"s_position",
			new SimpleDevice(sPositions(definition.elements), {}, "s_position"),
		);
		for (const simple of definition.simpleDevices) {
			table.add(
				simple.elementId,
				simple.field,
				new SimpleDevice(
					simple.value,
					{ readonly: simple.readonly },
					`${simple.elementId}:${simple.field}`,
				),
			);
		}
		return table;
	}
}
