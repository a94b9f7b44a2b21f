/**
 * convert_value tool handler for the lattice-units MCP server.
 *
 * Converts a value of one field between engineering and physics units.
 * Conversion to engineering units is clamped into the field's limits, the
 * same way a setpoint write would be.
 */

import type { FieldValue, UnitSystem } from "@lattice-units/core";
import type { McpConfig } from "../config.js";
import { limitsIn, toYaml } from "../formatters/yaml-formatter.js";
import { findElement, loadLattice } from "../lattice-loader.js";

export interface ConvertValueOptions {
	mode: string;
	/** Element id (0 for the lattice) or element name */
	element: number | string;
	field: string;
	value: FieldValue;
	/** Unit system of `value` (default from config) */
	from?: UnitSystem;
}

/**
 * Handle the convert_value tool call.
 *
 * @returns YAML document with the input and converted values
 * @throws ConversionError if the conversion cannot be inverted
 */
export async function handleConvertValue(
	options: ConvertValueOptions,
	config: McpConfig,
): Promise<string> {
	const { definition, registry } = await loadLattice(options.mode, config.dataDirs);
	const element = findElement(definition, options.element);
	const elementId = element?.id ?? 0;
	const record = registry.resolve(elementId, options.field);

	const from = options.from ?? config.defaultUnits;
	const to: UnitSystem = from === "engineering" ? "physics" : "engineering";
	const output = record.convert(options.value, from, to);

	const units = (system: UnitSystem) =>
		system === "engineering" ? record.engUnits : record.physUnits;

	return toYaml({
		mode: definition.mode,
		element: elementId,
		field: options.field,
		kind: record.kind,
		from,
		to,
		input: typeof options.value === "number" ? options.value : [...options.value],
		input_units: units(from),
		output,
		output_units: units(to),
		limits: to === "engineering" ? limitsIn(record, "engineering") : undefined,
	});
}
