/**
 * Evaluate a polynomial given in ascending powers (coefficients[i] * x^i)
 * using Horner's scheme.
 *
 * @example
 * evaluatePolynomial([1, 2, 3], 2); // 1 + 2*2 + 3*4 = 17
 */
export function evaluatePolynomial(
	coefficients: readonly number[],
	x: number,
): number {
	let result = 0;
	for (let i = coefficients.length - 1; i >= 0; i--) {
		result = result * x + (coefficients[i] ?? 0);
	}
	return result;
}

/**
 * Degree of a polynomial once trailing zero coefficients are ignored.
 * The zero polynomial has degree 0.
 *
 * @example
 * effectiveDegree([3, 2, 0, 0]); // 1
 */
export function effectiveDegree(coefficients: readonly number[]): number {
	for (let i = coefficients.length - 1; i > 0; i--) {
		if ((coefficients[i] ?? 0) !== 0) return i;
	}
	return 0;
}
