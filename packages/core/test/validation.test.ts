import { describe, expect, it } from "vitest";
import {
	validateIncreasingSequence,
	validateLimits,
	validateMonotonicIncreasing,
	validateNumber,
} from "../src/validation/rules.js";

describe("Validation Rules", () => {
	describe("validateNumber", () => {
		it("accepts finite numbers", () => {
			expect(validateNumber(-3.5)).toEqual({ valid: true });
		});

		it("rejects NaN and infinities", () => {
			expect(validateNumber(Number.NaN)).toEqual({
				valid: false,
				error: "Value NaN is not a finite number",
				code: "INVALID_NUMBER",
			});
			expect(validateNumber(Number.POSITIVE_INFINITY).valid).toBe(false);
		});
	});

	describe("validateMonotonicIncreasing", () => {
		it("passes the first value", () => {
			expect(validateMonotonicIncreasing(5, {}).valid).toBe(true);
		});

		it("rejects equal neighbours when strict", () => {
			const result = validateMonotonicIncreasing(5, { previousValue: 5 });
			expect(result.code).toBe("NOT_STRICTLY_INCREASING");
			expect(result.error).toBe("Values not strictly increasing: 5 >= 5");
		});

		it("allows equal neighbours when not strict", () => {
			expect(
				validateMonotonicIncreasing(5, { previousValue: 5 }, false).valid,
			).toBe(true);
			expect(
				validateMonotonicIncreasing(4, { previousValue: 5 }, false).code,
			).toBe("NOT_INCREASING");
		});
	});

	describe("validateIncreasingSequence", () => {
		it("accepts a strictly increasing sequence", () => {
			expect(validateIncreasingSequence([0, 1, 2.5])).toEqual({ valid: true });
		});

		it("rejects short sequences", () => {
			expect(validateIncreasingSequence([1], { label: "current" })).toEqual({
				valid: false,
				error: "current needs at least 2 samples, got 1",
				code: "TOO_SHORT",
			});
		});

		it("reports the first failing index", () => {
			const result = validateIncreasingSequence([0, 10, 5, 1], {
				label: "current",
			});
			expect(result.index).toBe(2);
			expect(result.error).toBe(
				"current[2]: Values not strictly increasing: 10 >= 5",
			);
		});

		it("rejects non-finite samples", () => {
			const result = validateIncreasingSequence([0, Number.NaN]);
			expect(result.code).toBe("INVALID_NUMBER");
			expect(result.error).toBe("values[1]: Value NaN is not a finite number");
		});
	});

	describe("validateLimits", () => {
		it("accepts absent or ordered bounds", () => {
			expect(validateLimits(undefined, undefined).valid).toBe(true);
			expect(validateLimits(-1, undefined).valid).toBe(true);
			expect(validateLimits(-1, -1).valid).toBe(true);
		});

		it("rejects inverted bounds", () => {
			expect(validateLimits(10, -10)).toEqual({
				valid: false,
				error: "Lower limit 10 exceeds upper limit -10",
				code: "INVALID_RANGE",
			});
		});

		it("rejects non-finite bounds", () => {
			expect(validateLimits(Number.NaN, 1).code).toBe("INVALID_NUMBER");
		});
	});
});
