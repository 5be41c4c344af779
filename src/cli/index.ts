import process from "node:process";
import pc from "picocolors";
import type { SettingsOverrides } from "#config";
import { formatMirrorError } from "#core/errors";
import { ExitCode } from "./exit-code";
import { type Logger, createLogger } from "./logger";
import { parseArgs } from "./parse-args";
import { ProgressReporter } from "./progress";
import type { CliCommand, CliOptions } from "./types";
import { setSilentMode, symbols, ui } from "./ui";

export const CLI_NAME = "pkgmirror";

const HELP_TEXT = `
Usage: ${CLI_NAME} <command> [options]

Commands:
  sync    Mirror the remote Packages feed into the download directory
  verify  Check cached packages against the local manifest
  prune   Remove files the local manifest does not reference
  init    Create a new config interactively

Global options:
  --config <path>
  -d, --dir <path>
  -u, --url <url>
  --dry-run
  --keep-going
  --skip-verify
  --retries <n>
  --timeout-ms <n>
  --json
  --silent
  -v, -vv, -vvv
`;

const printHelp = () => {
	process.stdout.write(HELP_TEXT.trimStart());
};

const printError = (message: string) => {
	process.stderr.write(`${symbols.error} ${message}\n`);
};

const printJson = (value: unknown) => {
	process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
};

export const toSettingsOverrides = (
	options: CliOptions,
	cwd = process.cwd(),
): SettingsOverrides => ({
	cwd,
	configPath: options.config,
	downloadDir: options.dir,
	url: options.url,
	retries: options.retries,
	timeoutMs: options.timeoutMs,
	...(options.skipVerify ? { verifyDownloads: false } : {}),
	...(options.keepGoing ? { failFast: false } : {}),
});

export const runCommand = async (
	command: CliCommand,
	options: CliOptions,
	logger: Logger,
): Promise<ExitCode> => {
	const overrides = toSettingsOverrides(options);
	if (command === "sync") {
		const { printSyncReport, runSync } = await import("#commands/sync");
		const reporter =
			!options.json && !options.silent && process.stdout.isTTY
				? new ProgressReporter()
				: null;
		let result: Awaited<ReturnType<typeof runSync>>;
		try {
			result = await runSync(
				{ ...overrides, dryRun: options.dryRun },
				{ logger, onProgress: reporter?.handle },
			);
		} finally {
			reporter?.finish();
		}
		if (!result.ok) {
			printError(formatMirrorError(result.error));
			return ExitCode.FatalError;
		}
		if (options.json) {
			printJson(result.value);
		} else {
			printSyncReport(result.value);
		}
		return result.value.commit === "partial"
			? ExitCode.FatalError
			: ExitCode.Success;
	}
	if (command === "verify") {
		const { printVerify, verifyMirror } = await import("#commands/verify");
		const report = await verifyMirror(overrides, { logger });
		if (options.json) {
			printJson(report);
		} else {
			printVerify(report);
		}
		return report.ok ? ExitCode.Success : ExitCode.FatalError;
	}
	if (command === "prune") {
		const { pruneMirror } = await import("#commands/prune");
		const result = await pruneMirror(
			{ ...overrides, dryRun: options.dryRun },
			{ logger },
		);
		if (options.json) {
			printJson(result);
		} else if (result.removed.length === 0) {
			ui.line(`${symbols.info} No unreferenced files to prune.`);
		} else {
			const verb = result.dryRun ? "Would remove" : "Removed";
			ui.line(
				`${symbols.success} ${verb} ${result.removed.length} file${result.removed.length === 1 ? "" : "s"} from ${ui.path(result.downloadDir)}`,
			);
			for (const file of result.removed) {
				ui.item(pc.dim("-"), file);
			}
		}
		return ExitCode.Success;
	}
	const { initConfig } = await import("#commands/init");
	if (options.config) {
		throw new Error("Init does not accept --config. Use the project root.");
	}
	const result = await initConfig({ cwd: overrides.cwd });
	if (options.json) {
		printJson(result);
	} else {
		ui.line(`${symbols.success} Wrote ${pc.gray(ui.path(result.configPath))}`);
	}
	return ExitCode.Success;
};

const parseOrExit = (argv: string[]) => {
	try {
		return parseArgs(argv);
	} catch (error) {
		printError(error instanceof Error ? error.message : String(error));
		return process.exit(ExitCode.InvalidArgument);
	}
};

/**
 * The main entry point of the CLI
 */
export async function main(argv = process.argv): Promise<void> {
	try {
		process.on("uncaughtException", errorHandler);
		process.on("unhandledRejection", errorHandler);

		const parsed = parseOrExit(argv);

		setSilentMode(parsed.options.silent);

		if (parsed.help) {
			printHelp();
			return process.exit(ExitCode.Success);
		}

		if (!parsed.command) {
			printHelp();
			return process.exit(ExitCode.InvalidArgument);
		}

		if (parsed.positionals.length > 0) {
			printError(`${CLI_NAME}: unexpected arguments.`);
			printHelp();
			return process.exit(ExitCode.InvalidArgument);
		}

		const logger = createLogger({
			verbosity: parsed.options.silent ? 0 : parsed.options.verbosity,
		});
		const code = await runCommand(parsed.command, parsed.options, logger);
		process.exit(code);
	} catch (error) {
		errorHandler(error);
	}
}

function errorHandler(error: unknown): void {
	const message =
		error instanceof Error ? error.message || String(error) : String(error);
	printError(message);
	process.exit(ExitCode.FatalError);
}
