export type CliOptions = {
	config?: string;
	dir?: string;
	url?: string;
	dryRun: boolean;
	keepGoing: boolean;
	skipVerify: boolean;
	retries?: number;
	timeoutMs?: number;
	json: boolean;
	silent: boolean;
	/** Number of `-v` flags; 0 logs errors only. */
	verbosity: number;
};

export const COMMANDS = ["sync", "verify", "prune", "init"] as const;

export type CliCommand = (typeof COMMANDS)[number];
