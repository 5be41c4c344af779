import { type Stats, createWriteStream } from "node:fs";
import { mkdir, rename, rm, stat } from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { setTimeout as delay } from "node:timers/promises";
import { type Logger, silentLogger } from "#cli/logger";
import {
	type FilesystemError,
	type IntegrityError,
	type MirrorError,
	type Result,
	type TransportError,
	fail,
	filesystemError,
	getErrnoCode,
	getErrorMessage,
	ok,
} from "#core/errors";
import { PARTIAL_SUFFIX, resolveInside } from "#core/paths";
import type { Transport } from "#transport/types";
import type {
	ActionList,
	DeleteAction,
	FetchAction,
	PackageRecord,
} from "#types/mirror";
import { hashFile } from "./checksum";

const DEFAULT_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 250;

export type ProgressEvent =
	| { type: "delete"; filename: string; existed: boolean }
	| { type: "fetch-start"; filename: string; index: number; total: number }
	| {
			type: "fetch-retry";
			filename: string;
			attempt: number;
			error: MirrorError;
	  }
	| { type: "fetch-done"; filename: string; bytes: number }
	| { type: "fetch-failed"; filename: string; error: MirrorError };

export type FetchedFile = {
	name: string;
	filename: string;
	bytes: number;
};

export type FailedFetch = {
	name: string;
	filename: string;
	error: MirrorError;
};

export type ExecutionReport = {
	deleted: string[];
	fetched: FetchedFile[];
	failed: FailedFetch[];
};

export type ExecuteParams = {
	actions: ActionList;
	manifestUrl: URL;
	downloadDir: string;
	transport: Transport;
	timeoutMs?: number;
	retries?: number;
	retryDelayMs?: number;
	verifyDownloads?: boolean;
	failFast?: boolean;
	logger?: Logger;
	onProgress?: (event: ProgressEvent) => void;
};

const unsafePathError = (filename: string, operation: string): FilesystemError => ({
	type: "filesystem",
	message: `Refusing to ${operation} ${filename}: path leaves the download directory`,
	path: filename,
	operation,
});

const deleteFile = async (
	downloadDir: string,
	action: DeleteAction,
): Promise<Result<boolean, FilesystemError>> => {
	const target = resolveInside(downloadDir, action.filename);
	if (!target) {
		return fail(unsafePathError(action.filename, "remove"));
	}
	try {
		await rm(target);
		return ok(true);
	} catch (error) {
		if (getErrnoCode(error) === "ENOENT") {
			return ok(false);
		}
		return fail(filesystemError(error, target, "remove"));
	}
};

/**
 * Package URL beside the manifest. `?` and `#` in a filename are part of
 * the path, not a query or fragment.
 */
export const resolvePackageUrl = (filename: string, manifestUrl: URL) =>
	new URL(filename.replace(/[?#]/g, encodeURIComponent), manifestUrl);

export const verifyDownload = async (
	filePath: string,
	record: PackageRecord,
): Promise<Result<void, IntegrityError | FilesystemError>> => {
	if (record.size !== undefined) {
		let info: Stats;
		try {
			info = await stat(filePath);
		} catch (error) {
			return fail(filesystemError(error, filePath, "stat"));
		}
		if (info.size !== record.size) {
			return fail<IntegrityError>({
				type: "integrity",
				message: `Downloaded ${record.filename} is ${info.size} bytes, manifest lists ${record.size}`,
				path: record.filename,
				field: "size",
				expected: String(record.size),
				actual: String(info.size),
			});
		}
	}
	if (record.checksum) {
		let digest: string;
		try {
			digest = await hashFile(filePath);
		} catch (error) {
			return fail(filesystemError(error, filePath, "read"));
		}
		if (digest !== record.checksum) {
			return fail<IntegrityError>({
				type: "integrity",
				message: `Downloaded ${record.filename} has MD5 ${digest}, manifest lists ${record.checksum}`,
				path: record.filename,
				field: "checksum",
				expected: record.checksum,
				actual: digest,
			});
		}
	}
	return ok(undefined);
};

const isRetryable = (error: MirrorError) =>
	error.type === "integrity" ||
	(error.type === "transport" && error.retryable);

export const executeActions = async (
	params: ExecuteParams,
): Promise<Result<ExecutionReport>> => {
	const logger = params.logger ?? silentLogger;
	const retries = params.retries ?? DEFAULT_RETRIES;
	const retryDelayMs = params.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
	const verifyDownloads = params.verifyDownloads ?? true;
	const failFast = params.failFast ?? true;
	const report: ExecutionReport = { deleted: [], fetched: [], failed: [] };

	const fetchOnce = async (
		action: FetchAction,
	): Promise<Result<number>> => {
		const target = resolveInside(params.downloadDir, action.filename);
		if (!target) {
			return fail(unsafePathError(action.filename, "write"));
		}
		const url = resolvePackageUrl(action.filename, params.manifestUrl);
		const response = await params.transport.get(url, {
			timeoutMs: params.timeoutMs,
		});
		if (!response.ok) {
			return fail(response.error);
		}
		const partial = `${target}${PARTIAL_SUFFIX}`;
		try {
			await mkdir(path.dirname(target), { recursive: true });
		} catch (error) {
			return fail(filesystemError(error, path.dirname(target), "create"));
		}
		let transferFailed = false;
		const source = async function* (body: AsyncIterable<Uint8Array>) {
			try {
				yield* body;
			} catch (error) {
				transferFailed = true;
				throw error;
			}
		};
		try {
			await pipeline(source(response.value.body), createWriteStream(partial));
		} catch (error) {
			await rm(partial, { force: true });
			if (!transferFailed) {
				return fail(filesystemError(error, partial, "write"));
			}
			return fail<TransportError>({
				type: "transport",
				message: `Transfer of ${url.toString()} failed: ${getErrorMessage(error)}`,
				url: url.toString(),
				retryable: true,
				...(error instanceof Error ? { rawError: error } : {}),
			});
		}
		if (verifyDownloads) {
			const verified = await verifyDownload(partial, action.record);
			if (!verified.ok) {
				await rm(partial, { force: true });
				return fail(verified.error);
			}
		}
		try {
			const { size } = await stat(partial);
			await rename(partial, target);
			return ok(size);
		} catch (error) {
			await rm(partial, { force: true });
			return fail(filesystemError(error, target, "write"));
		}
	};

	const fetchWithRetry = async (action: FetchAction) => {
		for (let attempt = 1; ; attempt += 1) {
			const result = await fetchOnce(action);
			if (result.ok || !isRetryable(result.error) || attempt > retries) {
				return result;
			}
			logger.warn(
				`Retrying ${action.filename} (attempt ${attempt + 1} of ${retries + 1}): ${result.error.message}`,
			);
			params.onProgress?.({
				type: "fetch-retry",
				filename: action.filename,
				attempt,
				error: result.error,
			});
			await delay(retryDelayMs * attempt);
		}
	};

	const { deletions, fetches } = params.actions;
	if (deletions.length > 0) {
		logger.info(`Removing ${deletions.length} files ...`);
	}
	for (const action of deletions) {
		const result = await deleteFile(params.downloadDir, action);
		if (!result.ok) {
			return fail(result.error);
		}
		logger.debug(
			result.value
				? `Removed '${action.filename}'`
				: `Already gone: '${action.filename}'`,
		);
		report.deleted.push(action.filename);
		params.onProgress?.({
			type: "delete",
			filename: action.filename,
			existed: result.value,
		});
	}

	const total = fetches.length;
	logger.info(`Downloading ${total} files ...`);
	for (const [index, action] of fetches.entries()) {
		logger.debug(
			`Downloading file(${index + 1} of ${total}) '${action.filename}' ...`,
		);
		params.onProgress?.({
			type: "fetch-start",
			filename: action.filename,
			index: index + 1,
			total,
		});
		const result = await fetchWithRetry(action);
		if (result.ok) {
			report.fetched.push({
				name: action.name,
				filename: action.filename,
				bytes: result.value,
			});
			params.onProgress?.({
				type: "fetch-done",
				filename: action.filename,
				bytes: result.value,
			});
			continue;
		}
		logger.error(result.error.message);
		params.onProgress?.({
			type: "fetch-failed",
			filename: action.filename,
			error: result.error,
		});
		if (failFast || result.error.type === "filesystem") {
			return fail(result.error);
		}
		report.failed.push({
			name: action.name,
			filename: action.filename,
			error: result.error,
		});
	}
	return ok(report);
};
