import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packages = fileURLToPath(new URL("./packages", import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@switchyard/core": path.join(packages, "core/src/index.ts"),
			"@switchyard/router": path.join(packages, "router/src/index.ts"),
			"@switchyard/server": path.join(packages, "server/src/index.ts"),
		},
	},
	test: {
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
		testTimeout: 10_000,
	},
});
