/**
 * Monotone piecewise cubic Hermite interpolation (PCHIP).
 *
 * Knot derivatives follow Fritsch & Butland: a weighted harmonic mean of the
 * neighbouring secant slopes in the interior, a shape-preserving three-point
 * formula at the ends. With monotone data the interpolant is monotone and
 * passes through every knot exactly.
 *
 * Outside [x[0], x[n-1]] the interpolant continues along the tangent of the
 * boundary knot.
 */

export interface PchipInterpolant {
	/** Knot abscissae, strictly increasing */
	readonly x: readonly number[];
	/** Knot ordinates */
	readonly y: readonly number[];
	/** Derivative at each knot */
	readonly slopes: readonly number[];
}

function sign(v: number): number {
	return v > 0 ? 1 : v < 0 ? -1 : 0;
}

/** One-sided three-point derivative estimate for an end knot */
function edgeSlope(h0: number, h1: number, m0: number, m1: number): number {
	const d = ((2 * h0 + h1) * m0 - h0 * m1) / (h0 + h1);
	if (sign(d) !== sign(m0)) return 0;
	if (sign(m0) !== sign(m1) && Math.abs(d) > 3 * Math.abs(m0)) return 3 * m0;
	return d;
}

/**
 * Compute knot derivatives for the given samples.
 *
 * @param x - Strictly increasing abscissae (at least two)
 * @param y - Ordinates, same length as x
 */
export function pchipSlopes(
	x: readonly number[],
	y: readonly number[],
): number[] {
	const n = x.length;
	const h: number[] = [];
	const m: number[] = [];
	for (let k = 0; k < n - 1; k++) {
		const dx = (x[k + 1] ?? 0) - (x[k] ?? 0);
		h.push(dx);
		m.push(((y[k + 1] ?? 0) - (y[k] ?? 0)) / dx);
	}

	const first = m[0] ?? 0;
	if (n === 2) return [first, first];

	const slopes: number[] = new Array<number>(n).fill(0);
	for (let k = 1; k < n - 1; k++) {
		const mPrev = m[k - 1] ?? 0;
		const mNext = m[k] ?? 0;
		if (sign(mPrev) * sign(mNext) <= 0) continue;
		const hPrev = h[k - 1] ?? 0;
		const hNext = h[k] ?? 0;
		const w1 = 2 * hNext + hPrev;
		const w2 = hNext + 2 * hPrev;
		slopes[k] = (w1 + w2) / (w1 / mPrev + w2 / mNext);
	}

	slopes[0] = edgeSlope(h[0] ?? 0, h[1] ?? 0, first, m[1] ?? 0);
	slopes[n - 1] = edgeSlope(
		h[n - 2] ?? 0,
		h[n - 3] ?? 0,
		m[n - 2] ?? 0,
		m[n - 3] ?? 0,
	);
	return slopes;
}

/**
 * Build an interpolant. Callers validate the samples first; this function
 * assumes x is strictly increasing and both arrays share a length >= 2.
 */
export function createPchip(
	x: readonly number[],
	y: readonly number[],
): PchipInterpolant {
	return Object.freeze({
		x: Object.freeze([...x]),
		y: Object.freeze([...y]),
		slopes: Object.freeze(pchipSlopes(x, y)),
	});
}

/** Index k of the segment [x[k], x[k+1]) containing t; t is inside the knots */
function findSegment(x: readonly number[], t: number): number {
	let lo = 0;
	let hi = x.length - 1;
	while (hi - lo > 1) {
		const mid = (lo + hi) >> 1;
		if ((x[mid] ?? 0) <= t) lo = mid;
		else hi = mid;
	}
	return lo;
}

/**
 * Evaluate the interpolant at t.
 *
 * @example
 * const p = createPchip([0, 100], [0, 50]);
 * evaluatePchip(p, 50); // 25
 * evaluatePchip(p, 200); // 100 (tangent extrapolation)
 */
export function evaluatePchip(p: PchipInterpolant, t: number): number {
	const { x, y, slopes } = p;
	const last = x.length - 1;
	const x0 = x[0] ?? 0;
	const xn = x[last] ?? 0;

	if (t <= x0) return (y[0] ?? 0) + (slopes[0] ?? 0) * (t - x0);
	if (t >= xn) return (y[last] ?? 0) + (slopes[last] ?? 0) * (t - xn);

	const k = findSegment(x, t);
	const xa = x[k] ?? 0;
	const h = (x[k + 1] ?? 0) - xa;
	const s = (t - xa) / h;
	const s2 = s * s;
	const s3 = s2 * s;

	const h00 = 2 * s3 - 3 * s2 + 1;
	const h10 = s3 - 2 * s2 + s;
	const h01 = -2 * s3 + 3 * s2;
	const h11 = s3 - s2;

	return (
		h00 * (y[k] ?? 0) +
		h10 * h * (slopes[k] ?? 0) +
		h01 * (y[k + 1] ?? 0) +
		h11 * h * (slopes[k + 1] ?? 0)
	);
}
