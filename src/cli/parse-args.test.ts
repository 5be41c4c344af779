import { describe, expect, it } from "vitest";
import { countVerbosity, parseArgs } from "./parse-args";

const argv = (...args: string[]) => ["node", "pkgmirror", ...args];

describe("countVerbosity", () => {
	it("counts single and stacked -v flags", () => {
		expect(countVerbosity(["sync"])).toBe(0);
		expect(countVerbosity(["sync", "-v"])).toBe(1);
		expect(countVerbosity(["sync", "-vv"])).toBe(2);
		expect(countVerbosity(["-vvv", "sync"])).toBe(3);
	});

	it("adds repeated flags and --verbose", () => {
		expect(countVerbosity(["-v", "sync", "-vv", "--verbose"])).toBe(4);
	});

	it("stops at --", () => {
		expect(countVerbosity(["sync", "--", "-vvv"])).toBe(0);
	});
});

describe("parseArgs", () => {
	it("parses a sync invocation", () => {
		const parsed = parseArgs(
			argv(
				"sync",
				"-u",
				"https://feed.test/repo/Packages",
				"--dir",
				"mirror",
				"--retries",
				"3",
				"--keep-going",
				"--dry-run",
				"-vv",
			),
		);
		expect(parsed.command).toBe("sync");
		expect(parsed.positionals).toEqual([]);
		expect(parsed.help).toBe(false);
		expect(parsed.options).toEqual({
			config: undefined,
			dir: "mirror",
			url: "https://feed.test/repo/Packages",
			dryRun: true,
			keepGoing: true,
			skipVerify: false,
			retries: 3,
			timeoutMs: undefined,
			json: false,
			silent: false,
			verbosity: 2,
		});
	});

	it("reads flags given before the command", () => {
		const parsed = parseArgs(argv("--config", "feed.json", "--json", "verify"));
		expect(parsed.command).toBe("verify");
		expect(parsed.options.config).toBe("feed.json");
		expect(parsed.options.json).toBe(true);
	});

	it("returns no command when none is given", () => {
		expect(parseArgs(argv()).command).toBeNull();
	});

	it("collects extra positionals", () => {
		expect(parseArgs(argv("prune", "extra")).positionals).toEqual(["extra"]);
	});

	it("reports --help", () => {
		expect(parseArgs(argv("--help")).help).toBe(true);
	});

	it("rejects unknown commands", () => {
		expect(() => parseArgs(argv("mirror"))).toThrow("Unknown command 'mirror'.");
	});

	it("rejects out-of-range retries", () => {
		expect(() => parseArgs(argv("sync", "--retries", "11"))).toThrow(
			"--retries must be an integer from 0 to 10.",
		);
	});

	it("rejects a non-positive timeout", () => {
		expect(() => parseArgs(argv("sync", "--timeout-ms", "0"))).toThrow(
			"--timeout-ms must be an integer of at least 1.",
		);
	});
});
