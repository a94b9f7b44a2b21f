/**
 * YAML documents describing conversion records, for the tools that answer
 * with structured data rather than tables.
 */

import type { ConversionLimits, ConversionRecord, UnitSystem } from "@lattice-units/core";
import type { DumpOptions } from "js-yaml";
import yaml from "js-yaml";

const DUMP_OPTIONS: DumpOptions = {
	indent: 2,
	lineWidth: 120,
	noRefs: true,
	sortKeys: false,
	// undefined values are dropped instead of failing the dump
	skipInvalid: true,
};

/** Key order follows insertion order; `undefined` values are omitted */
export function toYaml(data: Record<string, unknown>): string {
	return yaml.dump(data, DUMP_OPTIONS);
}

/** `data` as a `---` delimited block to put above a Markdown table */
export function toYamlFrontmatter(data: Record<string, unknown>): string {
	return ["---", toYaml(data).trimEnd(), "---", ""].join("\n");
}

/**
 * The record's clamp range in one unit system, or undefined when the record
 * is not limited at all.
 */
export function limitsIn(
	record: ConversionRecord,
	units: UnitSystem,
): ConversionLimits | undefined {
	if (record.lowerLimit === undefined && record.upperLimit === undefined) {
		return undefined;
	}
	return record.conversionLimits(units);
}

/**
 * Plain-data description of an explicit conversion: id, units, rigidity,
 * limits in both systems and the coefficients or samples behind it.
 */
export function describeConversion(record: ConversionRecord): Record<string, unknown> {
	const engineering = limitsIn(record, "engineering");
	return {
		conversion_id: record.name,
		eng_units: record.engUnits,
		phys_units: record.physUnits,
		rigidity_tm: record.rigidity,
		limits: engineering && {
			engineering,
			physics: limitsIn(record, "physics"),
		},
		coefficients: record.coefficients && [...record.coefficients],
		samples: record.curve && {
			current: [...record.curve.current],
			field: [...record.curve.field],
		},
	};
}
