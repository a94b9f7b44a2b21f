/** Unit system a value is expressed in */
export type UnitSystem = "engineering" | "physics";

/** Which side of a controllable field is addressed */
export type Handle = "readback" | "setpoint";

/** A scalar or an ordered sequence of scalars */
export type FieldValue = number | readonly number[];

export const ENGINEERING: UnitSystem = "engineering";
export const PHYSICS: UnitSystem = "physics";
export const READBACK: Handle = "readback";
export const SETPOINT: Handle = "setpoint";

/**
 * Apply a scalar function elementwise, mirroring the input shape.
 *
 * @example
 * mapValue(2, (x) => x * 3); // 6
 * mapValue([1, 2], (x) => x * 3); // [3, 6]
 */
export function mapValue(value: number, fn: (x: number) => number): number;
export function mapValue(
	value: readonly number[],
	fn: (x: number) => number,
): number[];
export function mapValue(
	value: FieldValue,
	fn: (x: number) => number,
): number | number[];
export function mapValue(
	value: FieldValue,
	fn: (x: number) => number,
): number | number[] {
	if (typeof value === "number") return fn(value);
	return value.map((x) => fn(x));
}

export function isUnitSystem(value: unknown): value is UnitSystem {
	return value === "engineering" || value === "physics";
}

export function isHandle(value: unknown): value is Handle {
	return value === "readback" || value === "setpoint";
}
