// =============================================================================
// Config file discovery paths
// =============================================================================
// Every candidate path the CLI probes for the user's polyfield config: base
// file names multiplied by common directory prefixes.

const baseNames = ["polyfield.config", "polyfield"];

const extensions = [".ts", ".tsx", ".js", ".jsx", ".mts", ".mjs"];

const directoryPrefixes = [
	"", // project root
	"lib/",
	"server/",
	"config/",
	"src/",
	"src/lib/",
	"src/server/",
	"src/config/",
	"app/",
	"app/lib/",
	"app/server/",
];

export const possibleConfigPaths: string[] = [];

for (const dir of directoryPrefixes) {
	for (const base of baseNames) {
		for (const ext of extensions) {
			possibleConfigPaths.push(`${dir}${base}${ext}`);
		}
	}
}
