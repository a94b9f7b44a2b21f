/**
 * A winding element in the physics model that belongs to the magnet
 * `distance` positions before it, e.g. a horizontal corrector coil wound on
 * the preceding sextupole. Windings get no element id of their own.
 */
export interface WindingRule {
	/** Model type of the winding element */
	winding: string;
	/** Model type of the magnet carrying it */
	host: string;
	/** How many positions before the winding the host sits */
	distance: number;
}

/**
 * Bidirectional map between physics-model positions (0-based) and exported
 * element ids (1-based; id 0 is the lattice itself).
 */
export class IndexMap {
	private readonly elementIds: readonly number[];
	private readonly modelIndices: ReadonlyMap<number, readonly number[]>;

	private constructor(elementIds: number[]) {
		this.elementIds = elementIds;
		const reverse = new Map<number, number[]>();
		elementIds.forEach((id, index) => {
			const indices = reverse.get(id) ?? [];
			indices.push(index);
			reverse.set(id, indices);
		});
		this.modelIndices = reverse;
	}

	/**
	 * Assign element ids in one pass over the model's element types, folding
	 * windings into their host magnet.
	 *
	 * @example
	 * const map = IndexMap.build(["Drift", "Sextupole", "HSTR"], [
	 *   { winding: "HSTR", host: "Sextupole", distance: 1 },
	 * ]);
	 * map.toElementId(2); // 2, same element as the sextupole
	 */
	static build(
		modelTypes: readonly string[],
		windings: readonly WindingRule[] = [],
	): IndexMap {
		const ids: number[] = [];
		let current = 0;
		modelTypes.forEach((type, index) => {
			const folded =
				current > 0 &&
				windings.some(
					(rule) =>
						rule.winding === type &&
						rule.distance > 0 &&
						modelTypes[index - rule.distance] === rule.host,
				);
			if (!folded) current++;
			ids.push(current);
		});
		return new IndexMap(ids);
	}

	/** Number of model positions */
	get modelCount(): number {
		return this.elementIds.length;
	}

	/** Number of exported elements, excluding the lattice */
	get elementCount(): number {
		return this.modelIndices.size;
	}

	/** Element id of a model position, or undefined if out of range */
	toElementId(modelIndex: number): number | undefined {
		return this.elementIds[modelIndex];
	}

	/** Every model position folded into an element, ascending */
	toModelIndices(elementId: number): readonly number[] {
		return this.modelIndices.get(elementId) ?? [];
	}
}
