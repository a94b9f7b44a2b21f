import { ConversionError } from "../errors.js";
import type { CalibrationCurve } from "./curve.js";
import { createCalibrationCurve, responseRatios } from "./curve.js";

/** Raw measured samples for one device, before validation */
export interface CalibrationSamples {
	current: readonly number[];
	field: readonly number[];
}

/**
 * Static mapping from a device identity (a channel name, or a conversion id)
 * to its validated calibration curve. Built once, read-only afterwards.
 */
export class CalibrationTable<K = string> {
	private readonly curves: ReadonlyMap<K, CalibrationCurve>;

	private constructor(curves: Map<K, CalibrationCurve>) {
		this.curves = curves;
	}

	/**
	 * Validate every entry and build the table.
	 *
	 * @throws ConversionError (DOMAIN_ERROR) naming the first invalid device
	 */
	static from<K>(
		entries: Iterable<readonly [K, CalibrationSamples]>,
	): CalibrationTable<K> {
		const curves = new Map<K, CalibrationCurve>();
		for (const [key, samples] of entries) {
			try {
				curves.set(key, createCalibrationCurve(samples.current, samples.field));
			} catch (error) {
				if (error instanceof ConversionError) {
					throw new ConversionError(`${String(key)}: ${error.message}`, error.code);
				}
				throw error;
			}
		}
		return new CalibrationTable(curves);
	}

	get size(): number {
		return this.curves.size;
	}

	get(key: K): CalibrationCurve | undefined {
		return this.curves.get(key);
	}

	has(key: K): boolean {
		return this.curves.has(key);
	}

	keys(): K[] {
		return [...this.curves.keys()];
	}

	entries(): Array<[K, CalibrationCurve]> {
		return [...this.curves.entries()];
	}
}

/**
 * Whether a group of devices responds identically, i.e. every sampled
 * field/current ratio of every curve equals the corresponding ratio of the
 * first curve within a relative tolerance. Families that pass can share a
 * single conversion.
 *
 * @example
 * isUniformResponse([a, a, a]); // true
 */
export function isUniformResponse(
	curves: readonly CalibrationCurve[],
	tolerance = 1e-9,
): boolean {
	const first = curves[0];
	if (!first) return true;
	const reference = responseRatios(first);

	for (const curve of curves.slice(1)) {
		const ratios = responseRatios(curve);
		if (ratios.length !== reference.length) return false;
		for (let i = 0; i < ratios.length; i++) {
			const r = ratios[i] ?? 0;
			const ref = reference[i] ?? 0;
			const scale = Math.max(Math.abs(r), Math.abs(ref), 1e-300);
			if (Math.abs(r - ref) / scale > tolerance) return false;
		}
	}
	return true;
}
