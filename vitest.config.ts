import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["./test/**/*.{test,spec}.ts"],
		exclude: ["node_modules/**", "dist/**"],
		coverage: {
			reporter: ["text"],
			include: ["src/**/*.ts"],
			exclude: ["src/index.ts"],
		},
	},
});
