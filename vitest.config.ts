import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packages = fileURLToPath(new URL("./packages", import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@livewindow/core": `${packages}/core/src/index.ts`,
			"@livewindow/engine": `${packages}/engine/src/index.ts`,
			"@livewindow/columnar": `${packages}/columnar/src/index.ts`,
		},
	},
	test: {
		globals: true,
		include: ["packages/*/src/**/__tests__/**/*.test.ts", "tests/integration/**/*.test.ts"],
		testTimeout: 10_000,
	},
});
