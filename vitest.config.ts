import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

const workspacePackages = [
	"core",
	"indicators",
	"strategy-engine",
	"execution-engine",
	"risk-engine",
	"persistence",
	"exchange-ccxt",
	"runtime",
];

export default defineConfig({
	resolve: {
		alias: workspacePackages.map((name) => ({
			find: `@openrange/${name}`,
			replacement: path.join(root, "packages", name, "src", "index.ts"),
		})),
	},
	test: {
		include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
		environment: "node",
	},
});
