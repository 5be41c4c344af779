import cliTruncate from "cli-truncate";
import { createLogUpdate } from "log-update";

type LiveOutputOptions = {
	stdout?: NodeJS.WriteStream;
	maxWidth?: number;
};

export type LiveOutput = {
	render: (lines: string[]) => void;
	clear: () => void;
	stop: () => void;
};

/**
 * A block of terminal lines redrawn in place, each cut to the terminal
 * width so redraws never wrap.
 */
export const createLiveOutput = (
	options: LiveOutputOptions = {},
): LiveOutput => {
	const stdout = options.stdout ?? process.stdout;
	const updater = createLogUpdate(stdout);
	const maxWidth = options.maxWidth ?? Math.max(20, (stdout.columns ?? 80) - 2);
	const truncate = (line: string) =>
		cliTruncate(line, maxWidth, { position: "middle" });

	return {
		render: (lines) => updater(lines.map(truncate).join("\n")),
		clear: () => updater.clear(),
		stop: () => updater.done(),
	};
};
