import type {
	SequenceValidationOptions,
	ValidationContext,
	ValidationResult,
} from "./types.js";

/**
 * Validate that a value is a valid number (not NaN or Infinity)
 *
 * @example
 * const result = validateNumber(NaN);
 * // { valid: false, error: "Value NaN is not a finite number", code: "INVALID_NUMBER" }
 */
export function validateNumber(value: number): ValidationResult {
	if (!Number.isFinite(value)) {
		return {
			valid: false,
			error: `Value ${value} is not a finite number`,
			code: "INVALID_NUMBER",
		};
	}

	return { valid: true };
}

/**
 * Validate that a value maintains monotonic increasing order
 *
 * @param strict - If true, requires strictly increasing (>); if false, allows equal (>=)
 *
 * @example
 * const result = validateMonotonicIncreasing(1500, { previousValue: 1500 }, true);
 * // { valid: false, error: "Values not strictly increasing: 1500 >= 1500", code: "NOT_STRICTLY_INCREASING" }
 */
export function validateMonotonicIncreasing(
	value: number,
	context: ValidationContext,
	strict = true,
): ValidationResult {
	const { previousValue } = context;

	if (previousValue === undefined) {
		return { valid: true };
	}

	if (strict && value <= previousValue) {
		return {
			valid: false,
			error: `Values not strictly increasing: ${previousValue} >= ${value}`,
			code: "NOT_STRICTLY_INCREASING",
		};
	}

	if (!strict && value < previousValue) {
		return {
			valid: false,
			error: `Values not increasing: ${previousValue} > ${value}`,
			code: "NOT_INCREASING",
			suggestedValue: previousValue,
		};
	}

	return { valid: true };
}

/**
 * Validate a whole sample sequence: length, finiteness and monotonic order.
 * Stops at the first failing sample and reports its index.
 *
 * @example
 * validateIncreasingSequence([0, 10, 5], { label: "current" });
 * // { valid: false, code: "NOT_STRICTLY_INCREASING", index: 2,
 * //   error: "current[2]: Values not strictly increasing: 10 >= 5" }
 */
export function validateIncreasingSequence(
	values: readonly number[],
	options: SequenceValidationOptions = {},
): ValidationResult {
	const { minLength = 2, strict = true, label = "values" } = options;

	if (values.length < minLength) {
		return {
			valid: false,
			error: `${label} needs at least ${minLength} samples, got ${values.length}`,
			code: "TOO_SHORT",
		};
	}

	for (let i = 0; i < values.length; i++) {
		const value = values[i];
		if (value === undefined) continue;

		const numberCheck = validateNumber(value);
		if (!numberCheck.valid) {
			return {
				...numberCheck,
				index: i,
				error: `${label}[${i}]: ${numberCheck.error}`,
			};
		}

		const orderCheck = validateMonotonicIncreasing(
			value,
			{ previousValue: i > 0 ? values[i - 1] : undefined },
			strict,
		);
		if (!orderCheck.valid) {
			return {
				...orderCheck,
				index: i,
				error: `${label}[${i}]: ${orderCheck.error}`,
			};
		}
	}

	return { valid: true };
}

/**
 * Validate an optional [lower, upper] limit pair. Either bound may be absent;
 * when both are present lower must not exceed upper.
 *
 * @example
 * validateLimits(10, -10);
 * // { valid: false, code: "INVALID_RANGE", error: "Lower limit 10 exceeds upper limit -10" }
 */
export function validateLimits(
	lower: number | undefined,
	upper: number | undefined,
): ValidationResult {
	for (const bound of [lower, upper]) {
		if (bound === undefined) continue;
		const numberCheck = validateNumber(bound);
		if (!numberCheck.valid) return numberCheck;
	}

	if (lower !== undefined && upper !== undefined && lower > upper) {
		return {
			valid: false,
			error: `Lower limit ${lower} exceeds upper limit ${upper}`,
			code: "INVALID_RANGE",
		};
	}

	return { valid: true };
}
