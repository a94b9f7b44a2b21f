import type { LatticeDefinition, LatticeDefinitionStub } from "./lattice.js";

export interface LatticeDataProvider {
	/**
	 * Internal ID
	 *
	 * @example "csv"
	 */
	id: string;
	/** Human-readable label */
	label: string;

	/**
	 * Names of the lattice modes available to this provider.
	 *
	 * @remarks
	 * A mode being listed does not guarantee it parses; it only has the files
	 * a mode needs at minimum.
	 */
	discoverModes(): Promise<string[]>;

	/** Resolve a mode's location without reading its tables */
	peek(mode: string): Promise<LatticeDefinitionStub>;

	/** Parse every table of a mode */
	parse(mode: string): Promise<LatticeDefinition>;
}
