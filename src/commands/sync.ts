import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import pc from "picocolors";
import { type Logger, silentLogger } from "#cli/logger";
import { symbols, ui } from "#cli/ui";
import { resolveSettings } from "#config";
import {
	type FilesystemError,
	type Result,
	type TransportError,
	fail,
	filesystemError,
	formatMirrorError,
	getErrorMessage,
	ok,
} from "#core/errors";
import { isSafeRelativePath } from "#core/paths";
import { filterManifest } from "#manifest/filter";
import { parseManifest } from "#manifest/parse";
import { type ProgressEvent, executeActions } from "#mirror/execute";
import { isEmptyPlan, planActions } from "#mirror/plan";
import {
	classifyEntry,
	mergePackageSets,
	summarizeEntries,
} from "#mirror/reconcile";
import { inspectLocalPackages, isValidRecord } from "#mirror/validate";
import { createHttpTransport } from "#transport/http";
import type { Transport } from "#transport/types";
import type { PackageSet } from "#types/mirror";
import type { SkippedRecord, SyncOptions, SyncReport } from "#types/sync";

type SyncDeps = {
	transport?: Transport;
	logger?: Logger;
	onProgress?: (event: ProgressEvent) => void;
	retryDelayMs?: number;
};

const fetchManifest = async (
	transport: Transport,
	url: URL,
	timeoutMs: number,
): Promise<Result<Buffer>> => {
	const response = await transport.get(url, { timeoutMs });
	if (!response.ok) {
		return fail(response.error);
	}
	const chunks: Buffer[] = [];
	try {
		for await (const chunk of response.value.body) {
			chunks.push(Buffer.from(chunk));
		}
	} catch (error) {
		return fail<TransportError>({
			type: "transport",
			message: `Transfer of ${url.toString()} failed: ${getErrorMessage(error)}`,
			url: url.toString(),
			retryable: true,
			...(error instanceof Error ? { rawError: error } : {}),
		});
	}
	return ok(Buffer.concat(chunks));
};

/**
 * Remote records the mirror cannot act on: no filename, or a filename that
 * would resolve outside the repository.
 */
const selectRemoteRecords = (parsed: PackageSet, logger: Logger) => {
	const remote: PackageSet = new Map();
	const skipped: SkippedRecord[] = [];
	for (const record of parsed.values()) {
		const reason = !isValidRecord(record)
			? "invalid"
			: !isSafeRelativePath(record.filename)
				? "unsafe-path"
				: null;
		if (reason) {
			logger.warn(
				`Skipping remote package ${record.name}: ${reason} filename '${record.filename}'`,
			);
			skipped.push({ name: record.name, filename: record.filename, reason });
			continue;
		}
		remote.set(record.name, record);
	}
	return { remote, skipped };
};

const commitManifest = async (
	manifestPath: string,
	data: Uint8Array,
): Promise<Result<void, FilesystemError>> => {
	const staging = `${manifestPath}.tmp`;
	try {
		await writeFile(staging, data);
		await rename(staging, manifestPath);
		return ok(undefined);
	} catch (error) {
		await rm(staging, { force: true });
		return fail(filesystemError(error, manifestPath, "write"));
	}
};

export const runSync = async (
	options: SyncOptions,
	deps: SyncDeps = {},
): Promise<Result<SyncReport>> => {
	const settings = await resolveSettings(options);
	const logger = deps.logger ?? silentLogger;
	const transport = deps.transport ?? createHttpTransport();
	const manifestUrl = new URL(settings.url);

	logger.info(`Fetching 'Packages' from ${manifestUrl.toString()} ...`);
	const manifest = await fetchManifest(
		transport,
		manifestUrl,
		settings.timeoutMs,
	);
	if (!manifest.ok) {
		return fail(manifest.error);
	}
	logger.info("Extracting package information from remote manifest ...");
	const { remote, skipped } = selectRemoteRecords(
		parseManifest(manifest.value),
		logger,
	);
	logger.info("Preparing local package information ...");
	const local = await inspectLocalPackages(settings.downloadDir, { logger });

	logger.info("Merging package lists ...");
	const entries = mergePackageSets(local.trusted, remote);
	const actions = planActions(entries);
	const report: SyncReport = {
		manifestUrl: manifestUrl.toString(),
		downloadDir: settings.downloadDir,
		manifestPath: local.manifestPath,
		dryRun: options.dryRun,
		summary: summarizeEntries(entries),
		entries: entries.map((entry) => ({
			name: entry.name,
			status: classifyEntry(entry),
			...(entry.local ? { localFilename: entry.local.filename } : {}),
			...(entry.remote ? { remoteFilename: entry.remote.filename } : {}),
		})),
		rejectedLocal: local.rejected,
		skippedRemote: skipped,
		actions,
		execution: null,
		commit: "none",
	};
	if (options.dryRun) {
		return ok(report);
	}

	try {
		await mkdir(settings.downloadDir, { recursive: true });
	} catch (error) {
		return fail(filesystemError(error, settings.downloadDir, "create"));
	}
	logger.info(`Processing ${entries.length} packages ...`);
	const executed = await executeActions({
		actions,
		manifestUrl,
		downloadDir: settings.downloadDir,
		transport,
		timeoutMs: settings.timeoutMs,
		retries: settings.retries,
		retryDelayMs: deps.retryDelayMs,
		verifyDownloads: settings.verifyDownloads,
		failFast: settings.failFast,
		logger,
		onProgress: deps.onProgress,
	});
	if (!executed.ok) {
		return fail(executed.error);
	}
	report.execution = executed.value;

	let data: Uint8Array = manifest.value;
	report.commit = "full";
	if (executed.value.failed.length > 0) {
		const failedNames = new Set(executed.value.failed.map((item) => item.name));
		const keep = new Set(
			Array.from(remote.keys()).filter((name) => !failedNames.has(name)),
		);
		data = filterManifest(manifest.value, keep);
		report.commit = "partial";
		logger.warn(
			`Writing a partial 'Packages' without ${failedNames.size} failed package(s)`,
		);
	}
	logger.info("Writing local 'Packages' file ...");
	const committed = await commitManifest(local.manifestPath, data);
	if (!committed.ok) {
		return fail(committed.error);
	}
	return ok(report);
};

const plural = (count: number, word: string) =>
	`${count} ${word}${count === 1 ? "" : "s"}`;

const formatBytes = (bytes: number) => {
	if (bytes < 1024) return `${bytes} B`;
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
};

export const printSyncReport = (report: SyncReport) => {
	const { summary } = report;
	ui.header("Source", report.manifestUrl);
	ui.header("Mirror", ui.path(report.downloadDir));
	ui.line(
		`${symbols.info} ${plural(report.entries.length, "package")} (${summary.unchanged} unchanged, ${summary.added} added, ${summary.changed} changed, ${summary.removed} removed)`,
	);
	if (report.rejectedLocal.length > 0) {
		ui.line(
			`${symbols.warn} ${plural(report.rejectedLocal.length, "cached package")} failed validation and will be fetched again`,
		);
	}
	if (isEmptyPlan(report.actions)) {
		ui.line(`${symbols.success} Mirror is up to date`);
		return;
	}
	for (const action of report.actions.deletions) {
		ui.step("delete", action.filename, pc.dim(action.name));
	}
	for (const action of report.actions.fetches) {
		ui.step("fetch", action.filename, pc.dim(action.name));
	}
	if (report.dryRun) {
		ui.line(`${symbols.info} Dry run: no files changed`);
		return;
	}
	const execution = report.execution;
	if (!execution) {
		return;
	}
	const bytes = execution.fetched.reduce((total, item) => total + item.bytes, 0);
	ui.line(
		`${symbols.success} Fetched ${plural(execution.fetched.length, "file")} (${formatBytes(bytes)}), removed ${plural(execution.deleted.length, "file")}`,
	);
	for (const failure of execution.failed) {
		ui.item(symbols.error, failure.filename, formatMirrorError(failure.error));
	}
	if (report.commit === "partial") {
		ui.line(
			`${symbols.warn} Wrote partial ${pc.gray(ui.path(report.manifestPath))} (${plural(execution.failed.length, "package")} left out)`,
		);
		return;
	}
	ui.line(`${symbols.info} Wrote ${pc.gray(ui.path(report.manifestPath))}`);
};
