/**
 * Constraints for clamping
 */
export interface ClampConstraints {
	/** Minimum allowed value */
	min?: number | undefined;
	/** Maximum allowed value */
	max?: number | undefined;
}

/**
 * Saturate a single value into an optional [min, max] range.
 * A missing bound leaves that side open.
 *
 * @example
 * clamp(15, { min: -10, max: 10 }); // 10
 * clamp(-20, { min: -10, max: 10 }); // -10
 * clamp(-20, { max: 10 }); // -20
 */
export function clamp(value: number, constraints: ClampConstraints): number {
	let result = value;
	if (constraints.min !== undefined && result < constraints.min) {
		result = constraints.min;
	}
	if (constraints.max !== undefined && result > constraints.max) {
		result = constraints.max;
	}
	return result;
}
