import path from "node:path";
import { defineBuildConfig } from "unbuild";

const alias = (prefix: string, dir: string) => ({
	find: new RegExp(`^#${prefix}\\/(.*)$`),
	replacement: path.resolve(`src/${dir}/$1`),
});

export default defineBuildConfig({
	entries: [
		{ input: "src/cli/index", name: "cli" },
		{ input: "src/index", name: "index" },
	],
	declaration: true,
	clean: true,
	sourcemap: true,
	rollup: {
		emitCJS: false,
		alias: {
			entries: [
				alias("cli", "cli"),
				alias("commands", "commands"),
				alias("config", "config"),
				{
					find: "#config",
					replacement: path.resolve("src/config/index"),
				},
				{
					find: /^#core\/(.*)$/,
					replacement: path.resolve("src/$1"),
				},
				alias("manifest", "manifest"),
				alias("mirror", "mirror"),
				alias("transport", "transport"),
				alias("types", "types"),
			],
		},
		inlineDependencies: ["picocolors"],
		esbuild: {
			minify: true,
		},
	},
});
