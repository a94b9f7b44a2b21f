import type { FieldValue } from "@lattice-units/core";

/**
 * Client of the accelerator control system, addressed by process variable
 * (PV) name. Implementations own their transport, timeouts and retries.
 *
 * With `throwOnError` set, a failed access rejects with a
 * `DataSourceError` of code `CONTROL_SYSTEM`. Without it the failure is
 * logged and reported in the result: `undefined` for reads, `false` for
 * writes.
 */
export interface ControlSystem {
	getSingle(pv: string, throwOnError: boolean): Promise<FieldValue | undefined>;

	/** Values in the order of `pvs` */
	getMultiple(
		pvs: readonly string[],
		throwOnError: boolean,
	): Promise<Array<FieldValue | undefined>>;

	/** Resolves true when the write was accepted */
	setSingle(pv: string, value: FieldValue, throwOnError: boolean): Promise<boolean>;

	/**
	 * Write one value per PV.
	 *
	 * @throws RangeError if `pvs` and `values` differ in length
	 */
	setMultiple(
		pvs: readonly string[],
		values: readonly FieldValue[],
		throwOnError: boolean,
	): Promise<boolean[]>;
}
