import type {
	ConversionRegistry,
	FieldValue,
	Handle,
	UnitSystem,
} from "@lattice-units/core";
import type { ControlSystem } from "./control-system.js";
import type { Device } from "./device.js";
import { PvDevice } from "./device.js";
import type { DeviceTable } from "./device-table.js";
import { DataSourceError } from "./errors.js";

export interface FieldAccessorOptions {
	/** Unit system used when a call does not name one (default engineering) */
	defaultUnits?: UnitSystem;
	/** Handle used for reads that do not name one (default readback) */
	defaultHandle?: Handle;
}

export interface GetValueOptions {
	handle?: Handle;
	units?: UnitSystem;
	/** Reject on control-system failures instead of resolving undefined (default true) */
	throwOnError?: boolean;
}

export interface SetValueOptions {
	units?: UnitSystem;
	/** Reject on control-system failures instead of reporting them (default true) */
	throwOnError?: boolean;
}

export interface WriteResult {
	/** Engineering value forwarded to the device, after clamping */
	value: FieldValue;
	/** False when the control system refused the write and errors were tolerated */
	accepted: boolean;
}

/**
 * Reads and writes element fields in either unit system. Devices always
 * deal in engineering units; values are converted through the registry on
 * the way in and out.
 */
export class FieldAccessor {
	private readonly registry: ConversionRegistry;
	private readonly devices: DeviceTable;
	readonly defaultUnits: UnitSystem;
	readonly defaultHandle: Handle;

	constructor(
		registry: ConversionRegistry,
		devices: DeviceTable,
		options: FieldAccessorOptions = {},
	) {
		this.registry = registry;
		this.devices = devices;
		this.defaultUnits = options.defaultUnits ?? "engineering";
		this.defaultHandle = options.defaultHandle ?? "readback";
	}

	/**
	 * @throws DataSourceError (UNKNOWN_FIELD) if the field has no device
	 */
	device(elementId: number, field: string): Device {
		const device = this.devices.get(elementId, field);
		if (!device) {
			const target = elementId === 0 ? "The lattice" : `Element ${elementId}`;
			throw new DataSourceError(
				`${target} has no field "${field}"`,
				"UNKNOWN_FIELD",
			);
		}
		return device;
	}

	/**
	 * Read a field, converting the engineering value to physics units when
	 * asked. Resolves undefined if the read failed and `throwOnError` is false.
	 */
	async getValue(
		elementId: number,
		field: string,
		options: GetValueOptions = {},
	): Promise<FieldValue | undefined> {
		const device = this.device(elementId, field);
		const raw = await device.getValue(
			options.handle ?? this.defaultHandle,
			options.throwOnError ?? true,
		);
		if (raw === undefined) return undefined;

		const units = options.units ?? this.defaultUnits;
		return units === "physics"
			? this.registry.resolve(elementId, field).toPhysics(raw)
			: raw;
	}

	/**
	 * Write a field's setpoint. Physics values are converted (and thereby
	 * clamped) with `toEngineering`; engineering values are clamped directly.
	 *
	 * @throws ConversionError if a physics value cannot be converted
	 */
	async setValue(
		elementId: number,
		field: string,
		value: FieldValue,
		options: SetValueOptions = {},
	): Promise<WriteResult> {
		const write = this.prepareWrite(elementId, field, value, options);
		const accepted = await write.device.setValue(
			write.value,
			options.throwOnError ?? true,
		);
		return { value: write.value, accepted };
	}

	private prepareWrite(
		elementId: number,
		field: string,
		value: FieldValue,
		options: SetValueOptions,
	): { device: Device; value: FieldValue } {
		const device = this.device(elementId, field);
		const record = this.registry.resolve(elementId, field);
		const units = options.units ?? this.defaultUnits;
		return {
			device,
			value:
				units === "physics" ? record.toEngineering(value) : record.clamp(value),
		};
	}

	/**
	 * Read one field across several elements, in order. PV-backed fields
	 * are fetched with one `getMultiple` call per control system.
	 */
	async getValues(
		elementIds: readonly number[],
		field: string,
		options: GetValueOptions = {},
	): Promise<Array<FieldValue | undefined>> {
		const handle = options.handle ?? this.defaultHandle;
		const throwOnError = options.throwOnError ?? true;
		const units = options.units ?? this.defaultUnits;

		const reads = elementIds.map((elementId, index) => ({
			elementId,
			index,
			device: this.device(elementId, field),
		}));
		const { batches, rest } = batchByControlSystem(reads, handle);

		const raw: Array<FieldValue | undefined> = reads.map(() => undefined);
		await Promise.all([
			...batches.map(async (batch) => {
				const values = await batch.cs.getMultiple(batch.pvs, throwOnError);
				batch.items.forEach((read, j) => {
					raw[read.index] = values[j];
				});
			}),
			...rest.map(async (read) => {
				raw[read.index] = await read.device.getValue(handle, throwOnError);
			}),
		]);

		return reads.map(({ elementId, index }) => {
			const value = raw[index];
			if (value === undefined || units !== "physics") return value;
			return this.registry.resolve(elementId, field).toPhysics(value);
		});
	}

	/**
	 * Write one field across several elements, one value each. PV-backed
	 * fields are written with one `setMultiple` call per control system.
	 *
	 * Every value is converted, and every setpoint PV looked up, before the
	 * first write, so a field or conversion error leaves all devices
	 * untouched.
	 *
	 * @throws RangeError if the counts differ
	 */
	async setValues(
		elementIds: readonly number[],
		field: string,
		values: readonly FieldValue[],
		options: SetValueOptions = {},
	): Promise<WriteResult[]> {
		assertSameLength(elementIds, values);
		const throwOnError = options.throwOnError ?? true;

		const writes = elementIds.flatMap((id, index) => {
			const value = values[index];
			return value === undefined
				? []
				: [{ index, ...this.prepareWrite(id, field, value, options) }];
		});
		const { batches, rest } = batchByControlSystem(writes, "setpoint");

		const accepted: boolean[] = writes.map(() => false);
		for (const batch of batches) {
			const results = await batch.cs.setMultiple(
				batch.pvs,
				batch.items.map((w) => w.value),
				throwOnError,
			);
			batch.items.forEach((write, j) => {
				accepted[write.index] = results[j] ?? false;
			});
		}
		for (const write of rest) {
			accepted[write.index] = await write.device.setValue(
				write.value,
				throwOnError,
			);
		}

		return writes.map((write) => ({
			value: write.value,
			accepted: accepted[write.index] ?? false,
		}));
	}

	/**
	 * Convert one value per element between unit systems without touching
	 * any device, e.g. a family's strengths.
	 *
	 * @throws RangeError if the counts differ
	 * @throws ConversionError if a value cannot be converted
	 *
	 * @example
	 * const quads = familyMembers(definition.elements, "QUAD").map((e) => e.id);
	 * accessor.convertValues(quads, "b1", currents, "engineering", "physics");
	 */
	convertValues(
		elementIds: readonly number[],
		field: string,
		values: readonly FieldValue[],
		origin: UnitSystem,
		target: UnitSystem,
	): FieldValue[] {
		assertSameLength(elementIds, values);
		const converted: FieldValue[] = [];
		elementIds.forEach((id, i) => {
			const value = values[i];
			if (value !== undefined) {
				converted.push(
					this.registry.resolve(id, field).convert(value, origin, target),
				);
			}
		});
		return converted;
	}
}

function assertSameLength(
	elementIds: readonly number[],
	values: readonly FieldValue[],
): void {
	if (elementIds.length !== values.length) {
		throw new RangeError(
			`Number of values (${values.length}) must equal the number of elements (${elementIds.length})`,
		);
	}
}

interface PvBatch<T> {
	cs: ControlSystem;
	pvs: string[];
	items: T[];
}

/**
 * Split accesses into PV-backed batches, one per control system, and the
 * remaining devices.
 *
 * @throws DataSourceError (NO_HANDLE) if a PV device lacks the handle
 */
function batchByControlSystem<T extends { device: Device }>(
	items: readonly T[],
	handle: Handle,
): { batches: PvBatch<T>[]; rest: T[] } {
	const batches = new Map<ControlSystem, PvBatch<T>>();
	const rest: T[] = [];
	for (const item of items) {
		const { device } = item;
		if (!(device instanceof PvDevice)) {
			rest.push(item);
			continue;
		}
		let batch = batches.get(device.cs);
		if (!batch) {
			batch = { cs: device.cs, pvs: [], items: [] };
			batches.set(device.cs, batch);
		}
		batch.pvs.push(device.pvName(handle));
		batch.items.push(item);
	}
	return { batches: [...batches.values()], rest };
}
