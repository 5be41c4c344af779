import pc from "picocolors";
import type { ProgressEvent } from "#mirror/execute";
import { createLiveOutput, type LiveOutput } from "./live-output";
import { symbols } from "./ui";

const formatDuration = (ms: number) => {
	const seconds = Math.max(0, ms / 1000);
	if (seconds < 60) {
		return `${seconds.toFixed(1)}s`;
	}
	const minutes = Math.floor(seconds / 60);
	const remainder = seconds % 60;
	return `${minutes}m ${remainder.toFixed(1)}s`;
};

export type ProgressReporterOptions = {
	output?: LiveOutput;
	tty?: boolean;
	maxNotes?: number;
};

/**
 * Live view of a running sync: the file being downloaded, a running tally
 * and the latest retry notes. Nothing is left on screen once the run ends.
 */
export class ProgressReporter {
	private readonly output: LiveOutput;
	private readonly tty: boolean;
	private readonly maxNotes: number;
	private readonly startTime = Date.now();
	private readonly notes: string[] = [];
	private current: { filename: string; index: number; total: number } | null =
		null;
	private timer: NodeJS.Timeout | null = null;
	private fetched = 0;
	private removed = 0;
	private failed = 0;
	private bytes = 0;

	constructor(options: ProgressReporterOptions = {}) {
		this.tty = options.tty ?? Boolean(process.stdout.isTTY);
		this.output = options.output ?? createLiveOutput();
		this.maxNotes = options.maxNotes ?? 3;
		this.startTimer();
	}

	readonly handle = (event: ProgressEvent) => {
		switch (event.type) {
			case "delete":
				this.removed += 1;
				break;
			case "fetch-start":
				this.current = {
					filename: event.filename,
					index: event.index,
					total: event.total,
				};
				break;
			case "fetch-retry":
				this.note(
					`${symbols.warn} retry ${event.attempt} ${event.filename}: ${event.error.message}`,
				);
				break;
			case "fetch-done":
				this.fetched += 1;
				this.bytes += event.bytes;
				this.current = null;
				break;
			case "fetch-failed":
				this.failed += 1;
				this.current = null;
				this.note(`${symbols.error} ${event.filename}: ${event.error.message}`);
				break;
		}
		this.render();
	};

	composeView() {
		const lines: string[] = [];
		if (this.current) {
			const { filename, index, total } = this.current;
			lines.push(
				`${pc.cyan("→")} fetch ${pc.bold(filename)} ${pc.dim(`(${index}/${total})`)}`,
			);
		}
		lines.push(...this.notes);
		const tally = [
			`${this.fetched} fetched`,
			`${this.removed} removed`,
			this.failed ? `${this.failed} failed` : null,
			formatDuration(Date.now() - this.startTime),
		].filter((part): part is string => part !== null);
		lines.push(pc.dim(tally.join(" · ")));
		return lines;
	}

	finish() {
		this.stopTimer();
		if (!this.tty) return;
		this.output.clear();
		this.output.stop();
	}

	private note(text: string) {
		this.notes.push(text);
		if (this.notes.length > this.maxNotes) {
			this.notes.splice(0, this.notes.length - this.maxNotes);
		}
	}

	private render() {
		if (!this.tty) return;
		this.output.render(this.composeView());
	}

	private startTimer() {
		if (!this.tty) return;
		this.timer = setInterval(() => {
			if (this.current) {
				this.render();
			}
		}, 250);
		this.timer.unref?.();
	}

	private stopTimer() {
		if (!this.timer) return;
		clearInterval(this.timer);
		this.timer = null;
	}
}
