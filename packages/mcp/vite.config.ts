import { builtinModules } from "node:module";
import { defineConfig } from "vite";

// Bundles the MCP server into a single self-contained .mjs file. The server
// runs as a stdio child process in a real Node.js runtime, so Node built-ins
// stay external instead of being replaced with browser stubs.
export default defineConfig({
	build: {
		target: "node20",
		lib: {
			entry: "src/index.ts",
			formats: ["es"],
			fileName: "server",
		},
		outDir: "dist",
		sourcemap: true,
		rollupOptions: {
			external: [...builtinModules, ...builtinModules.map((m) => `node:${m}`)],
			output: {
				entryFileNames: "server.mjs",
			},
		},
	},
});
