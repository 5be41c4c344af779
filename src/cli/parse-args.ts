import process from "node:process";

import cac from "cac";
import { COMMANDS, type CliCommand, type CliOptions } from "./types";

export type ParsedArgs = {
	command: CliCommand | null;
	options: CliOptions;
	positionals: string[];
	rawArgs: string[];
	help: boolean;
};

const VALUE_FLAGS = new Set([
	"--config",
	"-d",
	"--dir",
	"-u",
	"--url",
	"--retries",
	"--timeout-ms",
]);

const VERBOSE_SHORT = /^-v+$/;

const KNOWN_COMMANDS = new Set<string>(COMMANDS);

const isCommand = (value: string): value is CliCommand =>
	KNOWN_COMMANDS.has(value);

/**
 * Arguments that are neither flags nor flag values, in order.
 */
const collectPositionals = (rawArgs: string[]) => {
	const positionals: string[] = [];
	for (let index = 0; index < rawArgs.length; index += 1) {
		const arg = rawArgs[index];
		if (arg === "--") {
			positionals.push(...rawArgs.slice(index + 1));
			break;
		}
		if (arg.startsWith("-")) {
			if (VALUE_FLAGS.has(arg)) {
				index += 1;
			}
			continue;
		}
		positionals.push(arg);
	}
	return positionals;
};

/**
 * `-v`, `-vv` and `--verbose` all add up.
 */
export const countVerbosity = (rawArgs: string[]) => {
	let count = 0;
	for (const arg of rawArgs) {
		if (arg === "--") break;
		if (arg === "--verbose") {
			count += 1;
		} else if (VERBOSE_SHORT.test(arg)) {
			count += arg.length - 1;
		}
	}
	return count;
};

const optionalString = (value: unknown, flag: string) => {
	if (value === undefined) return undefined;
	if (typeof value === "number") return String(value);
	if (typeof value !== "string" || value.length === 0) {
		throw new Error(`${flag} expects a value.`);
	}
	return value;
};

const optionalInteger = (
	value: unknown,
	flag: string,
	range: { min: number; max?: number },
) => {
	if (value === undefined) return undefined;
	const parsed = typeof value === "number" ? value : Number(value);
	const inRange =
		Number.isInteger(parsed) &&
		parsed >= range.min &&
		(range.max === undefined || parsed <= range.max);
	if (typeof value === "boolean" || !inRange) {
		const bounds =
			range.max === undefined
				? `an integer of at least ${range.min}`
				: `an integer from ${range.min} to ${range.max}`;
		throw new Error(`${flag} must be ${bounds}.`);
	}
	return parsed;
};

const buildOptions = (
	values: Record<string, unknown>,
	rawArgs: string[],
): CliOptions => ({
	config: optionalString(values.config, "--config"),
	dir: optionalString(values.dir, "--dir"),
	url: optionalString(values.url, "--url"),
	dryRun: Boolean(values.dryRun),
	keepGoing: Boolean(values.keepGoing),
	skipVerify: Boolean(values.skipVerify),
	retries: optionalInteger(values.retries, "--retries", { min: 0, max: 10 }),
	timeoutMs: optionalInteger(values.timeoutMs, "--timeout-ms", { min: 1 }),
	json: Boolean(values.json),
	silent: Boolean(values.silent),
	verbosity: countVerbosity(rawArgs),
});

/**
 * Parses `process.argv`-shaped input. Throws on unknown commands and
 * malformed option values.
 */
export const parseArgs = (argv = process.argv): ParsedArgs => {
	const cli = cac("pkgmirror");

	cli
		.option("--config <path>", "Path to config file")
		.option("-d, --dir <path>", "Override download directory")
		.option("-u, --url <url>", "Override Packages URL")
		.option("--dry-run", "Preview changes without writing files")
		.option("--keep-going", "Continue after a failed download")
		.option("--skip-verify", "Do not check size and MD5 of downloads")
		.option("--retries <n>", "Extra attempts per download")
		.option("--timeout-ms <n>", "Network timeout in milliseconds")
		.option("--json", "Output JSON")
		.option("--silent", "Suppress non-error output")
		.option("-v, --verbose", "More log output (repeatable)")
		.option("-h, --help", "Show help");

	cli.command("sync", "Mirror the remote Packages feed");
	cli.command("verify", "Check cached packages against the local manifest");
	cli.command("prune", "Remove files the local manifest does not reference");
	cli.command("init", "Create a new config interactively");

	const result = cli.parse(argv, { run: false });
	const rawArgs = argv.slice(2);
	const [first, ...positionals] = collectPositionals(rawArgs);
	if (first !== undefined && !isCommand(first)) {
		throw new Error(`Unknown command '${first}'.`);
	}
	return {
		command: first ?? null,
		options: buildOptions(result.options, rawArgs),
		positionals,
		rawArgs,
		help: Boolean(result.options.help),
	};
};
