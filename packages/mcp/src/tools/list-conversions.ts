/**
 * list_conversions tool handler for the lattice-units MCP server.
 *
 * Lists the unit conversions of a lattice mode, optionally narrowed to a
 * family or a field name.
 */

import type { LatticeElement } from "@lattice-units/core";
import { allFamilies, familyMembers, findClosestMatches } from "@lattice-units/core";
import type { McpConfig } from "../config.js";
import { buildMarkdownTable, formatLimits } from "../formatters/markdown.js";
import { toYamlFrontmatter } from "../formatters/yaml-formatter.js";
import { loadLattice } from "../lattice-loader.js";

export interface ListConversionsOptions {
	mode: string;
	/** Family name, case-insensitive */
	family?: string;
	/** Field name, exact */
	field?: string;
}

/**
 * Handle the list_conversions tool call.
 *
 * @returns YAML frontmatter with mode metadata + markdown table of conversions
 * @throws Error if the family is unknown
 */
export async function handleListConversions(
	options: ListConversionsOptions,
	config: McpConfig,
): Promise<string> {
	const { definition, registry, energyMeV } = await loadLattice(
		options.mode,
		config.dataDirs,
	);

	let members: Set<number> | undefined;
	if (options.family !== undefined) {
		const found = familyMembers(definition.elements, options.family);
		if (found.length === 0) {
			const suggestions = findClosestMatches(
				options.family,
				allFamilies(definition.elements),
				3,
				3,
			);
			const hint =
				suggestions.length > 0 ? ` Did you mean: ${suggestions.join(", ")}?` : "";
			throw new Error(`No family "${options.family}" in mode ${definition.mode}.${hint}`);
		}
		members = new Set(found.map((e) => e.id));
	}

	const elements = new Map<number, LatticeElement>(
		definition.elements.map((e) => [e.id, e]),
	);

	const entries = registry
		.entries()
		.filter((e) => members === undefined || members.has(e.elementId))
		.filter((e) => options.field === undefined || e.field === options.field);

	const frontmatter = toYamlFrontmatter({
		mode: definition.mode,
		energy_mev: energyMeV,
		...(options.family !== undefined ? { family: options.family } : {}),
		...(options.field !== undefined ? { field: options.field } : {}),
		conversion_count: entries.length,
	});

	const headers = ["Element", "Name", "Type", "Field", "Kind", "Eng", "Phys", "Limits"];
	const rows = entries.map(({ elementId, field, record }) => {
		const element = elements.get(elementId);
		return [
			String(elementId),
			elementId === 0 ? "(lattice)" : (element?.name ?? ""),
			element?.type ?? "",
			field,
			record.rigidity !== undefined ? `${record.kind} / Bρ` : record.kind,
			record.engUnits,
			record.physUnits,
			formatLimits(record.lowerLimit, record.upperLimit),
		];
	});

	return `${frontmatter}\n${buildMarkdownTable(headers, rows, ["right"])}`;
}
