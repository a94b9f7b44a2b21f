import type { FieldValue, Handle } from "@lattice-units/core";
import type { ControlSystem } from "./control-system.js";
import { DataSourceError } from "./errors.js";

/**
 * Backs a single field of an element. Devices always speak engineering
 * units; conversion happens in the field accessor.
 */
export interface Device {
	/** Human-readable name, e.g. the PV prefix */
	readonly name: string;

	isEnabled(): Promise<boolean>;

	/**
	 * Read the field. Resolves `undefined` only when the control system
	 * failed and `throwOnError` was false.
	 */
	getValue(handle: Handle, throwOnError: boolean): Promise<FieldValue | undefined>;

	/** Write the setpoint; resolves false on a tolerated control-system failure */
	setValue(value: FieldValue, throwOnError: boolean): Promise<boolean>;
}

/**
 * Considers a device enabled while a status PV holds a given value.
 * Values are compared after truncation to integers.
 */
export class PvEnabler {
	readonly pv: string;
	private readonly enabledValue: number;
	private readonly cs: ControlSystem;

	constructor(pv: string, enabledValue: number, cs: ControlSystem) {
		this.pv = pv;
		this.enabledValue = Math.trunc(enabledValue);
		this.cs = cs;
	}

	async isEnabled(): Promise<boolean> {
		const value = await this.cs.getSingle(this.pv, true);
		return typeof value === "number" && Math.trunc(value) === this.enabledValue;
	}
}

export type Enabled = boolean | PvEnabler;

async function resolveEnabled(enabled: Enabled): Promise<boolean> {
	return typeof enabled === "boolean" ? enabled : enabled.isEnabled();
}

export interface PvDeviceOptions {
	readbackPv?: string | undefined;
	setpointPv?: string | undefined;
	enabled?: Enabled;
}

/** A field read and written through control-system process variables */
export class PvDevice implements Device {
	readonly name: string;
	readonly readbackPv: string | undefined;
	readonly setpointPv: string | undefined;
	/** Client the PVs live on; batched accesses are grouped by it */
	readonly cs: ControlSystem;
	private readonly enabled: Enabled;

	/**
	 * @throws DataSourceError (NO_HANDLE) if neither PV is given
	 */
	constructor(name: string, cs: ControlSystem, options: PvDeviceOptions) {
		if (!options.readbackPv && !options.setpointPv) {
			throw new DataSourceError(
				`Device ${name} needs a readback or a setpoint PV`,
				"NO_HANDLE",
			);
		}
		this.name = name;
		this.cs = cs;
		this.readbackPv = options.readbackPv || undefined;
		this.setpointPv = options.setpointPv || undefined;
		this.enabled = options.enabled ?? true;
	}

	isEnabled(): Promise<boolean> {
		return resolveEnabled(this.enabled);
	}

	/**
	 * @throws DataSourceError (NO_HANDLE) if the device has no PV for `handle`
	 */
	pvName(handle: Handle): string {
		const pv = handle === "readback" ? this.readbackPv : this.setpointPv;
		if (!pv) {
			throw new DataSourceError(
				`Device ${this.name} has no ${handle} PV`,
				"NO_HANDLE",
			);
		}
		return pv;
	}

	async getValue(
		handle: Handle,
		throwOnError: boolean,
	): Promise<FieldValue | undefined> {
		return this.cs.getSingle(this.pvName(handle), throwOnError);
	}

	async setValue(value: FieldValue, throwOnError: boolean): Promise<boolean> {
		return this.cs.setSingle(this.pvName("setpoint"), value, throwOnError);
	}
}

export interface SimpleDeviceOptions {
	/** Default true */
	readonly?: boolean;
	enabled?: Enabled;
}

/**
 * Stores a value in memory. Used for data that rarely changes, such as the
 * beam energy or element positions.
 */
export class SimpleDevice implements Device {
	readonly name: string;
	readonly readonly: boolean;
	private value: FieldValue;
	private readonly enabled: Enabled;

	constructor(value: FieldValue, options: SimpleDeviceOptions = {}, name = "") {
		this.value = typeof value === "number" ? value : [...value];
		this.readonly = options.readonly ?? true;
		this.enabled = options.enabled ?? true;
		this.name = name;
	}

	isEnabled(): Promise<boolean> {
		return resolveEnabled(this.enabled);
	}

	async getValue(): Promise<FieldValue> {
		return this.value;
	}

	/**
	 * @throws DataSourceError (READONLY) for read-only devices
	 */
	async setValue(value: FieldValue): Promise<boolean> {
		if (this.readonly) {
			throw new DataSourceError(
				`Cannot change the value of read-only device ${this.name || "(unnamed)"}`,
				"READONLY",
			);
		}
		this.value = typeof value === "number" ? value : [...value];
		return true;
	}
}
