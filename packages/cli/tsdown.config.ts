import { defineConfig } from "tsdown";

export default defineConfig({
	format: ["esm"],
	entry: ["./src/index.ts"],
	sourcemap: true,
	clean: true,
	// Workspace packages export TypeScript sources; bundle them into the bin.
	noExternal: ["polyfield", /^@polyfield\//],
});
