import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		coverage: {
			reporter: ["text"],
			include: ["packages/**/src/**/*.ts"],
			exclude: ["**/*.d.ts", "packages/mcp/src/index.ts"],
		},
		projects: [
			// Node environment for every package
			{
				test: {
					name: "node",
					environment: "node",
					include: ["./packages/**/test/**/*.{test,spec}.ts"],
					exclude: ["node_modules/**"],
				},
			},
		],
	},
});
