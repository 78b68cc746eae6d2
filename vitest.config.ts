import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["cli/**/*.test.ts", "core/**/*.test.ts"],
		environment: "node",
	},
});
