/**
 * Configuration for the lattice-units MCP server.
 *
 * Reads configuration from:
 * 1. CLI arguments (--data-dir, --default-units)
 * 2. Environment variables (LATTICE_DATA_PATH, LATTICE_DEFAULT_UNITS)
 * 3. `.lattice-units.json` in the working directory (optional)
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { UnitSystem } from "@lattice-units/core";
import { isUnitSystem } from "@lattice-units/core";

export const CONFIG_FILENAME = ".lattice-units.json";

export interface McpConfig {
	/** Directories holding one subdirectory per lattice mode, searched in order */
	dataDirs: string[];
	/** Unit system `convert_value` converts from when the call does not say */
	defaultUnits: UnitSystem;
}

export interface ConfigSources {
	argv?: readonly string[];
	env?: Readonly<Record<string, string | undefined>>;
	cwd?: string;
}

/**
 * Parse CLI arguments. `--data-dir` may be given more than once.
 *
 * @param argv - Process arguments, including the node and script paths
 */
function parseCliArgs(argv: readonly string[]): {
	dataDirs: string[];
	defaultUnits: string | undefined;
} {
	const dataDirs: string[] = [];
	let defaultUnits: string | undefined;

	for (let i = 2; i < argv.length; i++) {
		const arg = argv[i];
		if (!arg) continue;

		if (arg === "--data-dir" && i + 1 < argv.length) {
			const next = argv[i + 1];
			if (next) dataDirs.push(next);
			i++;
		} else if (arg.startsWith("--data-dir=")) {
			dataDirs.push(arg.slice("--data-dir=".length));
		} else if (arg === "--default-units" && i + 1 < argv.length) {
			defaultUnits = argv[i + 1];
			i++;
		} else if (arg.startsWith("--default-units=")) {
			defaultUnits = arg.slice("--default-units=".length);
		}
	}

	return { dataDirs, defaultUnits };
}

/**
 * Read `.lattice-units.json` from a directory.
 *
 * @returns Parsed settings, or an empty object if the file is absent
 * @throws Error if the file exists but is not a JSON object
 */
function readConfigFile(dir: string): Record<string, unknown> {
	const configPath = path.join(dir, CONFIG_FILENAME);
	let raw: string;
	try {
		raw = fs.readFileSync(configPath, "utf8");
	} catch {
		return {};
	}
	const parsed: unknown = JSON.parse(raw);
	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
		throw new Error(`${configPath} must contain a JSON object`);
	}
	return Object.fromEntries(Object.entries(parsed));
}

function toUnitSystem(value: unknown, source: string): UnitSystem | undefined {
	if (value === undefined) return undefined;
	if (!isUnitSystem(value)) {
		throw new Error(
			`${source}: unit system must be "engineering" or "physics", got ${JSON.stringify(value)}`,
		);
	}
	return value;
}

/**
 * Load MCP server configuration from all sources.
 *
 * Priority: CLI args > env vars > config file > defaults. Data directories
 * from every source are kept, highest priority first; the default `./data`
 * applies only when no source names one.
 *
 * @throws Error for an unknown unit system or a malformed config file
 */
export function loadConfig(sources: ConfigSources = {}): McpConfig {
	const argv = sources.argv ?? process.argv;
	const env = sources.env ?? process.env;
	const cwd = sources.cwd ?? process.cwd();

	const cli = parseCliArgs(argv);
	const settings = readConfigFile(cwd);

	const dataDirs: string[] = [...cli.dataDirs];

	const envDataPath = env["LATTICE_DATA_PATH"];
	if (envDataPath !== undefined) {
		dataDirs.push(...envDataPath.split(path.delimiter).filter((p) => p !== ""));
	}

	const fileDataDirs = settings["dataDirs"];
	if (Array.isArray(fileDataDirs)) {
		for (const p of fileDataDirs) {
			if (typeof p === "string") dataDirs.push(p);
		}
	}

	if (dataDirs.length === 0) dataDirs.push("./data");

	const defaultUnits =
		toUnitSystem(cli.defaultUnits, "--default-units") ??
		toUnitSystem(env["LATTICE_DEFAULT_UNITS"], "LATTICE_DEFAULT_UNITS") ??
		toUnitSystem(settings["defaultUnits"], CONFIG_FILENAME) ??
		"engineering";

	// Resolve relative paths to absolute, dropping duplicates
	const resolved = dataDirs.map((p) =>
		path.isAbsolute(p) ? p : path.resolve(cwd, p),
	);

	return {
		dataDirs: [...new Set(resolved)],
		defaultUnits,
	};
}
