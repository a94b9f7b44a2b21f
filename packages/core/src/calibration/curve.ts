import { ConversionError } from "../errors.js";
import { validateIncreasingSequence } from "../validation/rules.js";

/**
 * Paired calibration samples relating a device's engineering input
 * (e.g. magnet current) to its physical response.
 *
 * Both sequences are strictly increasing and of equal length (>= 2).
 * Instances are frozen.
 */
export interface CalibrationCurve {
	/** Engineering-unit sample points */
	readonly current: readonly number[];
	/** Physics-unit sample points */
	readonly field: readonly number[];
}

/**
 * Validate and freeze a calibration curve.
 *
 * @throws ConversionError (DOMAIN_ERROR) if the samples are too short, of
 * unequal length, non-finite or not strictly increasing
 *
 * @example
 * const curve = createCalibrationCurve([0, 100], [0, 50]);
 */
export function createCalibrationCurve(
	current: readonly number[],
	field: readonly number[],
): CalibrationCurve {
	if (current.length !== field.length) {
		throw new ConversionError(
			`Calibration curve has ${current.length} current samples but ${field.length} field samples`,
			"DOMAIN_ERROR",
		);
	}

	for (const [label, values] of [
		["current", current],
		["field", field],
	] as const) {
		const check = validateIncreasingSequence(values, { label });
		if (!check.valid) {
			throw new ConversionError(
				`Invalid calibration curve: ${check.error ?? "unknown error"}`,
				"DOMAIN_ERROR",
			);
		}
	}

	return Object.freeze({
		current: Object.freeze([...current]),
		field: Object.freeze([...field]),
	});
}

/**
 * Ratio of the physical response to the engineering input at each sample,
 * skipping samples where the input is zero.
 */
export function responseRatios(curve: CalibrationCurve): number[] {
	const ratios: number[] = [];
	for (let i = 0; i < curve.current.length; i++) {
		const c = curve.current[i] ?? 0;
		if (c === 0) continue;
		ratios.push((curve.field[i] ?? 0) / c);
	}
	return ratios;
}

/**
 * Gradient of the line through the origin and the second sample, the linear
 * approximation used for corrector and trim magnets.
 *
 * @example
 * linearGradient(createCalibrationCurve([0, 10], [0, 0.002])); // 0.0002
 */
export function linearGradient(curve: CalibrationCurve): number {
	const c = curve.current[1] ?? 0;
	const f = curve.field[1] ?? 0;
	if (c === 0) {
		throw new ConversionError(
			"Calibration curve has zero current at its second sample",
			"DIVISION_ERROR",
		);
	}
	return f / c;
}
