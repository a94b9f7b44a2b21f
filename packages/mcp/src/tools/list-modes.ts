/**
 * list_modes tool handler for the lattice-units MCP server.
 *
 * Lists the lattice modes found in the configured data directories.
 */

import * as path from "node:path";
import { LatticeCsvProvider } from "@lattice-units/definitions-csv";
import type { McpConfig } from "../config.js";
import { buildMarkdownTable } from "../formatters/markdown.js";
import { toYamlFrontmatter } from "../formatters/yaml-formatter.js";

/**
 * Handle the list_modes tool call.
 *
 * @returns YAML frontmatter with the searched directories + markdown table of modes
 */
export async function handleListModes(config: McpConfig): Promise<string> {
	const provider = new LatticeCsvProvider(config.dataDirs);
	const modes = await provider.discoverModes();

	const frontmatter = toYamlFrontmatter({
		data_dirs: config.dataDirs,
		mode_count: modes.length,
	});

	if (modes.length === 0) {
		return `${frontmatter}\nNo lattice modes found. A mode is a directory containing elements.csv and families.csv.`;
	}

	const rows: string[][] = [];
	for (const mode of modes) {
		const stub = await provider.peek(mode);
		rows.push([mode, path.dirname(stub.uri)]);
	}

	return `${frontmatter}\n${buildMarkdownTable(["Mode", "Data directory"], rows)}`;
}
