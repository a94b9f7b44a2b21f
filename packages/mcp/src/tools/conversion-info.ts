/**
 * conversion_info tool handler for the lattice-units MCP server.
 *
 * Describes the conversion governing one field: kind, units, limits in both
 * unit systems, rigidity and the polynomial coefficients or calibration
 * samples behind it.
 */

import { findClosestMatches } from "@lattice-units/core";
import type { McpConfig } from "../config.js";
import { describeConversion, toYaml } from "../formatters/yaml-formatter.js";
import { findElement, loadLattice } from "../lattice-loader.js";

export interface ConversionInfoOptions {
	mode: string;
	/** Element id (0 for the lattice) or element name */
	element: number | string;
	field: string;
}

/**
 * Handle the conversion_info tool call.
 *
 * Fields without a conversion are not an error: they resolve to the identity
 * conversion, which the output reports together with the fields that do
 * have one.
 *
 * @returns YAML document describing the conversion
 */
export async function handleConversionInfo(
	options: ConversionInfoOptions,
	config: McpConfig,
): Promise<string> {
	const { definition, registry } = await loadLattice(options.mode, config.dataDirs);
	const element = findElement(definition, options.element);
	const elementId = element?.id ?? 0;
	const record = registry.resolve(elementId, options.field);
	const explicit = registry.has(elementId, options.field);

	const metadata: Record<string, unknown> = {
		mode: definition.mode,
		element: elementId,
		name: element?.name,
		type: element?.type,
		families: element?.families,
		field: options.field,
		explicit,
		kind: record.kind,
	};

	if (!explicit) {
		const fields = registry.fieldsOf(elementId);
		metadata["fields_with_conversions"] = fields;
		const suggestions = findClosestMatches(options.field, fields, 3, 2);
		if (suggestions.length > 0) metadata["did_you_mean"] = suggestions;
		return toYaml(metadata);
	}

	return toYaml({ ...metadata, ...describeConversion(record) });
}
