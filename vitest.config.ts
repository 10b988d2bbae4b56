import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const libsys = fileURLToPath(new URL("./src/lib/libsys", import.meta.url));

export default defineConfig({
	resolve: {
		alias: [
			{ find: /^libsys$/, replacement: `${libsys}/libsys.ts` },
			{ find: /^libsys\//, replacement: `${libsys}/` },
		],
	},
	test: {
		include: ["src/**/*.test.ts"],
	},
});
