import { describe, expect, it } from "vitest";
import { createPchip, evaluatePchip, pchipSlopes } from "../src/math/pchip.js";
import { effectiveDegree, evaluatePolynomial } from "../src/math/polynomial.js";

describe("pchipSlopes", () => {
	it("uses the secant slope at both ends of a two-point curve", () => {
		expect(pchipSlopes([0, 100], [0, 50])).toEqual([0.5, 0.5]);
	});

	it("uses a weighted harmonic mean in the interior", () => {
		const slopes = pchipSlopes([0, 10, 20, 40], [0, 2, 3, 4]);
		expect(slopes[0]).toBeCloseTo(0.25, 12);
		expect(slopes[1]).toBeCloseTo(0.133333333333, 10);
		expect(slopes[2]).toBeCloseTo(0.069230769231, 10);
		expect(slopes[3]).toBeCloseTo(0.016666666667, 10);
	});

	it("flattens local extrema", () => {
		const slopes = pchipSlopes([0, 1, 2], [0, 1, 0]);
		expect(slopes[1]).toBe(0);
	});
});

describe("evaluatePchip", () => {
	const p = createPchip([0, 10, 20, 40], [0, 2, 3, 4]);

	it("passes through every knot", () => {
		expect(evaluatePchip(p, 0)).toBe(0);
		expect(evaluatePchip(p, 10)).toBe(2);
		expect(evaluatePchip(p, 20)).toBe(3);
		expect(evaluatePchip(p, 40)).toBe(4);
	});

	it("interpolates between knots", () => {
		expect(evaluatePchip(p, 5)).toBeCloseTo(1.145833333333, 10);
		expect(evaluatePchip(p, 15)).toBeCloseTo(2.580128205128, 10);
		expect(evaluatePchip(p, 30)).toBeCloseTo(3.631410256410, 10);
	});

	it("continues along the boundary tangent outside the samples", () => {
		expect(evaluatePchip(p, -5)).toBeCloseTo(-1.25, 12);
		expect(evaluatePchip(p, 50)).toBeCloseTo(4.166666666667, 10);
	});

	it("is exact for a straight line", () => {
		const line = createPchip([0, 100], [0, 50]);
		expect(evaluatePchip(line, 50)).toBe(25);
		expect(evaluatePchip(line, 200)).toBe(100);
	});

	it("never decreases over monotone samples", () => {
		let previous = evaluatePchip(p, 0);
		for (let t = 0.5; t <= 40; t += 0.5) {
			const value = evaluatePchip(p, t);
			expect(value).toBeGreaterThanOrEqual(previous);
			previous = value;
		}
	});

	it("freezes the interpolant", () => {
		expect(Object.isFrozen(p)).toBe(true);
		expect(Object.isFrozen(p.slopes)).toBe(true);
	});
});

describe("evaluatePolynomial", () => {
	it("evaluates ascending powers", () => {
		expect(evaluatePolynomial([1, 2, 3], 2)).toBe(17);
	});

	it("returns the constant term at zero", () => {
		expect(evaluatePolynomial([4, 5], 0)).toBe(4);
	});

	it("treats an empty polynomial as zero", () => {
		expect(evaluatePolynomial([], 3)).toBe(0);
	});
});

describe("effectiveDegree", () => {
	it("ignores trailing zeros", () => {
		expect(effectiveDegree([3, 2, 0, 0])).toBe(1);
	});

	it("reports the highest non-zero power", () => {
		expect(effectiveDegree([0, 0, 1])).toBe(2);
	});

	it("treats constants and the zero polynomial as degree 0", () => {
		expect(effectiveDegree([5])).toBe(0);
		expect(effectiveDegree([0, 0])).toBe(0);
	});
});
