import { readFile, stat } from "node:fs/promises";
import { type Logger, silentLogger } from "#cli/logger";
import { getErrnoCode, getErrorMessage } from "#core/errors";
import { resolveInside, resolveManifestPath } from "#core/paths";
import { parseManifest } from "#manifest/parse";
import type {
	PackageRecord,
	PackageSet,
	RejectReason,
	RejectedRecord,
} from "#types/mirror";
import { hashFile } from "./checksum";

type ValidateOptions = {
	logger?: Logger;
};

export type LocalStateReport = {
	manifestPath: string;
	manifestFound: boolean;
	trusted: PackageSet;
	rejected: RejectedRecord[];
};

export const isValidRecord = (record: PackageRecord) =>
	record.name.length > 0 && record.filename.length > 0;

const readLocalManifest = async (manifestPath: string, logger: Logger) => {
	try {
		return await readFile(manifestPath);
	} catch (error) {
		const code = getErrnoCode(error);
		if (code === "ENOENT") {
			logger.debug(`No local manifest at ${manifestPath}`);
		} else {
			logger.warn(
				`Ignoring unreadable local manifest ${manifestPath}: ${getErrorMessage(error)}`,
			);
		}
		return null;
	}
};

const statFile = async (filePath: string) => {
	try {
		const info = await stat(filePath);
		return info.isFile() ? info : null;
	} catch {
		return null;
	}
};

type Corroboration =
	| { trusted: true; record: PackageRecord }
	| { trusted: false; reason: RejectReason };

/**
 * Checks one cached record against the bytes on disk. Missing size or
 * checksum fields are filled in from the file.
 */
export const corroborateRecord = async (
	downloadDir: string,
	record: PackageRecord,
): Promise<Corroboration> => {
	if (!isValidRecord(record)) {
		return { trusted: false, reason: "invalid" };
	}
	const filePath = resolveInside(downloadDir, record.filename);
	if (!filePath) {
		return { trusted: false, reason: "unsafe-path" };
	}
	const info = await statFile(filePath);
	if (!info) {
		return { trusted: false, reason: "missing" };
	}
	const size = record.size ?? info.size;
	if (size !== info.size) {
		return { trusted: false, reason: "size-mismatch" };
	}
	let digest: string;
	try {
		digest = await hashFile(filePath);
	} catch {
		return { trusted: false, reason: "missing" };
	}
	const checksum = record.checksum ?? digest;
	if (checksum !== digest) {
		return { trusted: false, reason: "checksum-mismatch" };
	}
	return { trusted: true, record: { ...record, size, checksum } };
};

export const inspectLocalPackages = async (
	downloadDir: string,
	options: ValidateOptions = {},
): Promise<LocalStateReport> => {
	const logger = options.logger ?? silentLogger;
	const manifestPath = resolveManifestPath(downloadDir);
	const raw = await readLocalManifest(manifestPath, logger);
	const trusted: PackageSet = new Map();
	const rejected: RejectedRecord[] = [];
	if (!raw) {
		return { manifestPath, manifestFound: false, trusted, rejected };
	}
	const cached = parseManifest(raw);
	logger.info(`Validating ${cached.size} cached packages ...`);
	for (const record of cached.values()) {
		const result = await corroborateRecord(downloadDir, record);
		if (result.trusted) {
			trusted.set(record.name, result.record);
			continue;
		}
		logger.debug(
			`Dropping cached ${record.name} (${record.filename || "no filename"}): ${result.reason}`,
		);
		rejected.push({
			name: record.name,
			filename: record.filename,
			reason: result.reason,
		});
	}
	return { manifestPath, manifestFound: true, trusted, rejected };
};

export const loadLocalPackages = async (
	downloadDir: string,
	options: ValidateOptions = {},
): Promise<PackageSet> =>
	(await inspectLocalPackages(downloadDir, options)).trusted;
