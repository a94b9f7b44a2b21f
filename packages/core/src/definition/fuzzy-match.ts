/**
 * Approximate name lookup for field names, families and lattice modes,
 * used to suggest alternatives when a lookup misses.
 */

/**
 * Minimum number of single-character insertions, deletions or substitutions
 * turning `a` into `b`.
 */
export function levenshteinDistance(a: string, b: string): number {
	if (a.length === 0) return b.length;
	if (b.length === 0) return a.length;

	let previous: number[] = Array.from({ length: b.length + 1 }, (_, j) => j);
	let current: number[] = [];

	for (let i = 1; i <= a.length; i++) {
		current = [i];
		for (let j = 1; j <= b.length; j++) {
			const cost = a.charAt(i - 1) === b.charAt(j - 1) ? 0 : 1;
			current[j] = Math.min(
				(previous[j] ?? 0) + 1,
				(current[j - 1] ?? 0) + 1,
				(previous[j - 1] ?? 0) + cost,
			);
		}
		[previous, current] = [current, previous];
	}

	return previous[b.length] ?? Infinity;
}

/**
 * Lower-case and drop separators so that `emittance_x`, `Emittance-X` and
 * `emittance x` compare equal.
 *
 * @example
 * normalizeName("Emittance-X") // → "emittancex"
 */
export function normalizeName(name: string): string {
	return name.toLowerCase().replace(/[\s_\-.]+/g, "");
}

/**
 * Score 0–1, higher is closer:
 * - identical after normalisation → 1
 * - one contains the other → 0.9+, more for greater coverage
 * - otherwise normalised Levenshtein, capped at 0.89
 */
function scoreCandidate(input: string, candidate: string): number {
	const a = normalizeName(input);
	const b = normalizeName(candidate);
	if (a === b) return 1;

	if (b.includes(a) || a.includes(b)) {
		const coverage = Math.min(a.length, b.length) / Math.max(a.length, b.length);
		return 0.9 + 0.09 * coverage;
	}

	const maxLen = Math.max(a.length, b.length);
	return Math.max(0, Math.min(0.89, 1 - levenshteinDistance(a, b) / maxLen));
}

/**
 * Candidates closest to `input`, best first, in their original spelling.
 *
 * @param maxDistance - Drop candidates further than this many edits, relative
 * to the longest name involved (default: keep all)
 *
 * @example
 * findClosestMatches("emitance_x", ["emittance_x", "emittance_y", "energy"], 1);
 * // → ["emittance_x"]
 */
export function findClosestMatches(
	input: string,
	candidates: readonly string[],
	maxResults = 3,
	maxDistance = Infinity,
): string[] {
	if (input.length === 0 || candidates.length === 0) return [];

	const maxLen = Math.max(input.length, ...candidates.map((c) => c.length));
	const minScore =
		maxDistance === Infinity ? -Infinity : Math.max(0, 1 - maxDistance / maxLen);

	return candidates
		.map((candidate) => ({ candidate, score: scoreCandidate(input, candidate) }))
		.filter((s) => s.score > minScore)
		.sort((a, b) => b.score - a.score)
		.slice(0, maxResults)
		.map((s) => s.candidate);
}
