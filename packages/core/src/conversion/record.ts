import type { CalibrationCurve } from "../calibration/curve.js";
import { createCalibrationCurve } from "../calibration/curve.js";
import { ConversionError } from "../errors.js";
import { clamp } from "../math/operations.js";
import type { PchipInterpolant } from "../math/pchip.js";
import { createPchip, evaluatePchip } from "../math/pchip.js";
import { effectiveDegree, evaluatePolynomial } from "../math/polynomial.js";
import type { FieldValue, UnitSystem } from "../units.js";
import { mapValue } from "../units.js";
import { validateLimits, validateNumber } from "../validation/rules.js";

/** Conversion algorithm */
export type ConversionKind = "null" | "poly" | "pchip";

/** Algorithm parameters; exactly one payload per kind */
export type ConversionParams =
	| { kind: "null" }
	| {
			kind: "poly";
			/** Ascending powers: value = Σ coefficients[i] * x^i */
			coefficients: readonly number[];
	  }
	| { kind: "pchip"; curve: CalibrationCurve };

export interface ConversionOptions {
	/** Identifier shown in error messages, usually the conversion id */
	name?: string | undefined;
	physUnits?: string | undefined;
	engUnits?: string | undefined;
	/** Engineering-unit lower clamp bound; ignored for null conversions */
	lowerLimit?: number | undefined;
	/** Engineering-unit upper clamp bound; ignored for null conversions */
	upperLimit?: number | undefined;
	/**
	 * Beam rigidity (T·m) dividing the converted physics value; used for
	 * magnets whose physics strength is normalised to the beam energy.
	 * Ignored for null conversions.
	 */
	rigidity?: number | undefined;
}

/** Engineering-unit clamp range, either side optional */
export interface ConversionLimits {
	lower: number | undefined;
	upper: number | undefined;
}

/**
 * Converts a field value between engineering units (hardware controller) and
 * physics units (accelerator model).
 *
 * Records are immutable: all parameters are validated and the interpolants
 * precomputed in the constructor, so the conversion methods are pure and
 * safe to share.
 */
export class ConversionRecord {
	readonly kind: ConversionKind;
	readonly name: string | undefined;
	readonly physUnits: string;
	readonly engUnits: string;
	readonly lowerLimit: number | undefined;
	readonly upperLimit: number | undefined;
	readonly rigidity: number | undefined;
	readonly coefficients: readonly number[] | undefined;
	readonly curve: CalibrationCurve | undefined;

	private readonly forward: PchipInterpolant | undefined;
	private readonly inverse: PchipInterpolant | undefined;

	/**
	 * @throws ConversionError (DOMAIN_ERROR) for empty or non-finite
	 * coefficients, an invalid curve, inverted limits or a bad rigidity
	 */
	constructor(params: ConversionParams, options: ConversionOptions = {}) {
		this.kind = params.kind;
		this.name = options.name;
		this.physUnits = options.physUnits ?? "";
		this.engUnits = options.engUnits ?? "";

		const converting = params.kind !== "null";
		this.lowerLimit = converting ? options.lowerLimit : undefined;
		this.upperLimit = converting ? options.upperLimit : undefined;
		this.rigidity = converting ? options.rigidity : undefined;

		const limitCheck = validateLimits(this.lowerLimit, this.upperLimit);
		if (!limitCheck.valid) {
			throw new ConversionError(
				`${this}: ${limitCheck.error ?? "invalid limits"}`,
				"DOMAIN_ERROR",
			);
		}
		if (
			this.rigidity !== undefined &&
			(!Number.isFinite(this.rigidity) || this.rigidity <= 0)
		) {
			throw new ConversionError(
				`${this}: rigidity must be a positive number, got ${this.rigidity}`,
				"DOMAIN_ERROR",
			);
		}

		switch (params.kind) {
			case "null":
				this.coefficients = undefined;
				this.curve = undefined;
				this.forward = undefined;
				this.inverse = undefined;
				break;
			case "poly": {
				if (params.coefficients.length === 0) {
					throw new ConversionError(
						`${this}: polynomial has no coefficients`,
						"DOMAIN_ERROR",
					);
				}
				for (const c of params.coefficients) {
					const check = validateNumber(c);
					if (!check.valid) {
						throw new ConversionError(
							`${this}: ${check.error ?? "invalid coefficient"}`,
							"DOMAIN_ERROR",
						);
					}
				}
				this.coefficients = Object.freeze([...params.coefficients]);
				this.curve = undefined;
				this.forward = undefined;
				this.inverse = undefined;
				break;
			}
			case "pchip": {
				// Curves may be plain objects; revalidate
				const curve = createCalibrationCurve(
					params.curve.current,
					params.curve.field,
				);
				this.coefficients = undefined;
				this.curve = curve;
				this.forward = createPchip(curve.current, curve.field);
				this.inverse = createPchip(curve.field, curve.current);
				break;
			}
			default: {
				const _exhaustive: never = params;
				throw new ConversionError(
					`Unknown conversion kind: ${String(_exhaustive)}`,
					"DOMAIN_ERROR",
				);
			}
		}

		Object.freeze(this);
	}

	toString(): string {
		const label = this.name !== undefined ? ` ${this.name}` : "";
		return `${this.kind} conversion${label}`;
	}

	/**
	 * Convert an engineering value (or array of values) to physics units.
	 * Readback direction: never clamped.
	 */
	toPhysics(value: number): number;
	toPhysics(value: readonly number[]): number[];
	toPhysics(value: FieldValue): number | number[];
	toPhysics(value: FieldValue): number | number[] {
		return mapValue(value, (x) => this.scalarToPhysics(x));
	}

	/**
	 * Convert a physics value (or array of values) to engineering units,
	 * saturating the result into the conversion limits.
	 *
	 * @throws ConversionError DIVISION_ERROR for a zero-gradient linear
	 * conversion, NOT_INVERTIBLE for polynomials of degree > 1
	 */
	toEngineering(value: number): number;
	toEngineering(value: readonly number[]): number[];
	toEngineering(value: FieldValue): number | number[];
	toEngineering(value: FieldValue): number | number[] {
		return mapValue(value, (y) => this.scalarToEngineering(y));
	}

	/**
	 * Saturate an engineering value into [lowerLimit, upperLimit]. A no-op for
	 * null conversions and for values already in range.
	 */
	clamp(value: number): number;
	clamp(value: readonly number[]): number[];
	clamp(value: FieldValue): number | number[];
	clamp(value: FieldValue): number | number[] {
		return mapValue(value, (x) =>
			clamp(x, { min: this.lowerLimit, max: this.upperLimit }),
		);
	}

	/**
	 * Convert between unit systems; passes the value through untouched when
	 * origin and target agree.
	 */
	convert(value: number, origin: UnitSystem, target: UnitSystem): number;
	convert(
		value: readonly number[],
		origin: UnitSystem,
		target: UnitSystem,
	): number[];
	convert(
		value: FieldValue,
		origin: UnitSystem,
		target: UnitSystem,
	): number | number[];
	convert(
		value: FieldValue,
		origin: UnitSystem,
		target: UnitSystem,
	): number | number[] {
		if (origin === target) {
			return typeof value === "number" ? value : [...value];
		}
		return origin === "engineering"
			? this.toPhysics(value)
			: this.toEngineering(value);
	}

	/**
	 * The clamp range expressed in the requested unit system. Bounds that are
	 * not set stay undefined.
	 */
	conversionLimits(units: UnitSystem = "engineering"): ConversionLimits {
		if (units === "engineering") {
			return { lower: this.lowerLimit, upper: this.upperLimit };
		}
		return {
			lower:
				this.lowerLimit !== undefined
					? this.scalarToPhysics(this.lowerLimit)
					: undefined,
			upper:
				this.upperLimit !== undefined
					? this.scalarToPhysics(this.upperLimit)
					: undefined,
		};
	}

	private scalarToPhysics(x: number): number {
		if (this.kind === "null") return x;

		const result =
			this.kind === "poly"
				? evaluatePolynomial(this.coefficients ?? [], x)
				: this.forward
					? evaluatePchip(this.forward, x)
					: x;
		return this.rigidity !== undefined ? result / this.rigidity : result;
	}

	private scalarToEngineering(y: number): number {
		if (this.kind === "null") return y;

		const raw = this.rigidity !== undefined ? y * this.rigidity : y;
		const result =
			this.kind === "poly"
				? this.invertPolynomial(raw)
				: this.inverse
					? evaluatePchip(this.inverse, raw)
					: raw;
		return clamp(result, { min: this.lowerLimit, max: this.upperLimit });
	}

	private invertPolynomial(y: number): number {
		const coefficients = this.coefficients ?? [];
		if (effectiveDegree(coefficients) > 1) {
			throw new ConversionError(
				`${this}: cannot invert a polynomial of degree ${effectiveDegree(coefficients)}`,
				"NOT_INVERTIBLE",
			);
		}
		const offset = coefficients[0] ?? 0;
		const gradient = coefficients[1] ?? 0;
		if (gradient === 0) {
			throw new ConversionError(
				`${this}: linear conversion has zero gradient`,
				"DIVISION_ERROR",
			);
		}
		return (y - offset) / gradient;
	}
}

/** The identity conversion used for fields without unit metadata */
export const NULL_CONVERSION = new ConversionRecord({ kind: "null" });

/**
 * Build a linear conversion physics = offset + gradient * engineering.
 *
 * @example
 * const bpm = linearConversion(0.001, 0, { engUnits: "mm", physUnits: "m" });
 * bpm.toPhysics(2); // 0.002
 */
export function linearConversion(
	gradient: number,
	offset = 0,
	options: ConversionOptions = {},
): ConversionRecord {
	return new ConversionRecord(
		{ kind: "poly", coefficients: [offset, gradient] },
		options,
	);
}
