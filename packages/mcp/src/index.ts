#!/usr/bin/env node
/**
 * Lattice Units MCP Server
 *
 * Exposes the unit conversions of CSV lattice modes to LLM agents via the
 * Model Context Protocol (MCP). Runs as a standalone Node.js process using
 * stdio transport. All tools are read-only; nothing talks to a control
 * system.
 *
 * Usage:
 *   lattice-units-mcp [--data-dir <path>]... [--default-units <system>]
 *
 * Environment variables:
 *   LATTICE_DATA_PATH      Data directories, separated like PATH
 *   LATTICE_DEFAULT_UNITS  "engineering" or "physics"
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import type { McpConfig } from "./config.js";
import { loadConfig } from "./config.js";
import { handleConversionInfo } from "./tools/conversion-info.js";
import { handleConvertValue } from "./tools/convert-value.js";
import { handleListConversions } from "./tools/list-conversions.js";
import { handleListModes } from "./tools/list-modes.js";

let config: McpConfig;
try {
	config = loadConfig();
} catch (err) {
	process.stderr.write(
		`Warning: failed to load config, using defaults: ${err instanceof Error ? err.message : String(err)}\n`,
	);
	config = { dataDirs: [`${process.cwd()}/data`], defaultUnits: "engineering" };
}

/**
 * Run a tool handler, turning thrown errors into an MCP error result.
 */
async function respond(
	handler: () => Promise<string>,
): Promise<{ content: Array<{ type: "text"; text: string }>; isError?: boolean }> {
	try {
		const text = await handler();
		return { content: [{ type: "text", text }] };
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		return {
			content: [{ type: "text", text: `Error: ${message}` }],
			isError: true,
		};
	}
}

const elementSchema = z
	.union([z.number().int().min(0), z.string().min(1)])
	.describe("Element id (0 addresses the lattice itself) or element name");

const server = new McpServer({
	name: "lattice-units",
	version: "0.1.0",
});

// ─── Tool: list_modes ─────────────────────────────────────────────────────────

server.tool(
	"list_modes",
	"List the lattice modes available in the configured data directories. Call this first to find a mode name for the other tools.",
	{},
	async () => respond(() => handleListModes(config)),
);

// ─── Tool: list_conversions ───────────────────────────────────────────────────

server.tool(
	"list_conversions",
	"List the unit conversions of a lattice mode: element, field, conversion kind, units and engineering limits. Kinds marked '/ Bρ' are normalised to the beam rigidity. Fields not listed have no conversion (their values are the same in both unit systems).",
	{
		mode: z.string().describe("Mode name (from list_modes)"),
		family: z
			.string()
			.optional()
			.describe("Only elements in this family (case-insensitive), e.g. 'QUAD'"),
		field: z.string().optional().describe("Only this field, e.g. 'b1' or 'x_kick'"),
	},
	async ({ mode, family, field }) =>
		respond(() =>
			handleListConversions(
				{
					mode,
					...(family !== undefined ? { family } : {}),
					...(field !== undefined ? { field } : {}),
				},
				config,
			),
		),
);

// ─── Tool: conversion_info ────────────────────────────────────────────────────

server.tool(
	"conversion_info",
	"Describe the conversion of one field: kind, units, limits in both unit systems, rigidity, and the polynomial coefficients or calibration samples.",
	{
		mode: z.string().describe("Mode name (from list_modes)"),
		element: elementSchema,
		field: z.string().describe("Field name, e.g. 'b1'"),
	},
	async ({ mode, element, field }) =>
		respond(() => handleConversionInfo({ mode, element, field }, config)),
);

// ─── Tool: convert_value ──────────────────────────────────────────────────────

server.tool(
	"convert_value",
	"Convert a value (or list of values) of one field between engineering and physics units. Conversions to engineering units are clamped into the field's limits, as a setpoint write would be.",
	{
		mode: z.string().describe("Mode name (from list_modes)"),
		element: elementSchema,
		field: z.string().describe("Field name, e.g. 'b1'"),
		value: z
			.union([z.number(), z.array(z.number()).min(1)])
			.describe("Value or values to convert"),
		from: z
			.enum(["engineering", "physics"])
			.optional()
			.describe("Unit system of `value`; defaults to the server's configured default"),
	},
	async ({ mode, element, field, value, from }) =>
		respond(() =>
			handleConvertValue(
				{ mode, element, field, value, ...(from !== undefined ? { from } : {}) },
				config,
			),
		),
);

// ─── Start server ─────────────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);
