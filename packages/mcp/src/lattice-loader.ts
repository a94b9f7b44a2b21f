/**
 * Lattice loader for the lattice-units MCP server.
 *
 * Parses a lattice mode with the CSV provider and builds its conversion
 * registry, caching results by mode directory + newest file mtime to avoid
 * re-parsing on every tool call.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type {
	ConversionRegistry,
	LatticeDefinition,
	LatticeElement,
} from "@lattice-units/core";
import {
	buildConversionRegistry,
	findClosestMatches,
	latticeEnergy,
	registryOptionsFor,
} from "@lattice-units/core";
import { LatticeCsvProvider } from "@lattice-units/definitions-csv";

export interface LoadedLattice {
	/** Parsed mode */
	definition: LatticeDefinition;
	/** Conversion registry built from the mode's unit tables */
	registry: ConversionRegistry;
	/** Beam energy in MeV, when the mode stores one */
	energyMeV: number | undefined;
	/** Newest modification time of the mode's files (for cache invalidation) */
	mtime: number;
}

interface CacheEntry {
	mtime: number;
	loaded: LoadedLattice;
}

const cache = new Map<string, CacheEntry>();

async function newestMtime(dir: string): Promise<number> {
	const names = await fs.readdir(dir);
	let newest = 0;
	for (const name of names) {
		if (!name.endsWith(".csv")) continue;
		const stat = await fs.stat(path.join(dir, name));
		newest = Math.max(newest, stat.mtimeMs);
	}
	return newest;
}

/**
 * Load a lattice mode and build its conversion registry.
 *
 * @param mode - Mode name (a subdirectory of one of the data directories)
 * @param dataDirs - Directories to search for modes
 * @throws LatticeCsvError if the mode is unknown or its tables are malformed
 * @throws RegistryBuildError if the unit tables are inconsistent
 */
export async function loadLattice(
	mode: string,
	dataDirs: readonly string[],
): Promise<LoadedLattice> {
	const provider = new LatticeCsvProvider(dataDirs);
	const stub = await provider.peek(mode);

	const mtime = await newestMtime(stub.uri);
	const cached = cache.get(stub.uri);
	if (cached && cached.mtime === mtime) {
		return cached.loaded;
	}

	const definition = await provider.parse(mode);
	const registry = buildConversionRegistry(
		definition.unitTables,
		registryOptionsFor(definition),
	);

	const loaded: LoadedLattice = {
		definition,
		registry,
		energyMeV: latticeEnergy(definition),
		mtime,
	};

	cache.set(stub.uri, { mtime, loaded });
	return loaded;
}

/**
 * Find an element by id or by name (case-insensitive). Id 0 is the lattice
 * itself and resolves to `undefined`.
 *
 * @throws Error naming the closest element names if nothing matches
 */
export function findElement(
	definition: LatticeDefinition,
	element: number | string,
): LatticeElement | undefined {
	if (typeof element === "number") {
		if (element === 0) return undefined;
		const found = definition.elements[element - 1];
		if (!found) {
			throw new Error(
				`Element ${element} does not exist; mode ${definition.mode} has elements 1-${definition.elements.length}`,
			);
		}
		return found;
	}

	const wanted = element.toLowerCase();
	const found = definition.elements.find((e) => e.name?.toLowerCase() === wanted);
	if (found) return found;

	const names = definition.elements.flatMap((e) => (e.name ? [e.name] : []));
	const suggestions = findClosestMatches(element, names, 3, 3);
	const hint = suggestions.length > 0 ? ` Did you mean: ${suggestions.join(", ")}?` : "";
	throw new Error(`No element named "${element}" in mode ${definition.mode}.${hint}`);
}

/**
 * Clear the lattice cache.
 */
export function clearLatticeCache(): void {
	cache.clear();
}
