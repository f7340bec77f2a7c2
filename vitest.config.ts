import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const here = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@src": here("./src"),
			"@lib": here("./src/lib"),
			"@features": here("./src/features"),
		},
	},
	test: {
		include: ["src/**/*.test.ts"],
		setupFiles: ["./test-setup.ts"],
		environment: "node",
	},
});
