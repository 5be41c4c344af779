import pc from "picocolors";
import { symbols } from "./ui";

export type LogLevel = "error" | "warn" | "info" | "debug";

export type Logger = Record<LogLevel, (message: string) => void>;

const LEVELS: LogLevel[] = ["error", "warn", "info", "debug"];

const PREFIX: Record<LogLevel, string> = {
	error: `${symbols.error} ${pc.red("error")}`,
	warn: `${symbols.warn} ${pc.yellow("warn")} `,
	info: `${symbols.info} ${pc.blue("info")} `,
	debug: `${pc.dim("·")} ${pc.dim("debug")}`,
};

/**
 * Each `-v` lowers the threshold by one level, starting from errors only.
 */
export const levelForVerbosity = (verbosity: number): LogLevel =>
	LEVELS[Math.min(Math.max(0, Math.floor(verbosity)), LEVELS.length - 1)];

export type LogSink = {
	write: (line: string) => unknown;
};

type LoggerOptions = {
	verbosity: number;
	stream?: LogSink;
};

export const createLogger = (options: LoggerOptions): Logger => {
	const stream = options.stream ?? process.stderr;
	const threshold = LEVELS.indexOf(levelForVerbosity(options.verbosity));
	const write = (level: LogLevel) => (message: string) => {
		if (LEVELS.indexOf(level) > threshold) return;
		stream.write(`${PREFIX[level]} ${message}\n`);
	};
	return {
		error: write("error"),
		warn: write("warn"),
		info: write("info"),
		debug: write("debug"),
	};
};

const noop = () => {};

export const silentLogger: Logger = {
	error: noop,
	warn: noop,
	info: noop,
	debug: noop,
};
