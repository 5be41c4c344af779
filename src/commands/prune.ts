import { access, rm } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { type Logger, silentLogger } from "#cli/logger";
import { type SettingsOverrides, resolveMirrorDir } from "#config";
import {
	MANIFEST_FILENAME,
	isSafeRelativePath,
	resolveManifestPath,
	toPosixPath,
} from "#core/paths";
import { readManifestFile } from "#manifest/parse";

type PruneOptions = Pick<
	SettingsOverrides,
	"configPath" | "downloadDir" | "cwd"
> & {
	dryRun: boolean;
};

type PruneDeps = {
	logger?: Logger;
};

export type PruneReport = {
	downloadDir: string;
	dryRun: boolean;
	removed: string[];
};

const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

const referencedFiles = async (manifestPath: string) => {
	const referenced = new Set<string>([MANIFEST_FILENAME]);
	for (const record of (await readManifestFile(manifestPath)).values()) {
		if (isSafeRelativePath(record.filename)) {
			referenced.add(path.posix.normalize(toPosixPath(record.filename)));
		}
	}
	return referenced;
};

/**
 * Removes files under the download directory that no record of the local
 * manifest references. Hidden files, `node_modules` and the config file
 * are never touched.
 */
export const pruneMirror = async (
	options: PruneOptions,
	deps: PruneDeps = {},
): Promise<PruneReport> => {
	const logger = deps.logger ?? silentLogger;
	const { loaded, downloadDir } = await resolveMirrorDir(options);
	const manifestPath = resolveManifestPath(downloadDir);
	if (!(await exists(manifestPath))) {
		throw new Error(
			`No '${MANIFEST_FILENAME}' in ${downloadDir}. Run \`pkgmirror sync\` first.`,
		);
	}
	const referenced = await referencedFiles(manifestPath);
	if (loaded) {
		const configRelative = path.relative(downloadDir, loaded.resolvedPath);
		referenced.add(toPosixPath(configRelative));
	}
	const files = await fg("**/*", {
		cwd: downloadDir,
		onlyFiles: true,
		dot: false,
		followSymbolicLinks: false,
		ignore: ["**/node_modules/**"],
	});
	const removed = files.filter((file) => !referenced.has(file)).sort();
	logger.info(
		`${removed.length} of ${files.length} files are not referenced by '${MANIFEST_FILENAME}'`,
	);
	if (!options.dryRun) {
		for (const file of removed) {
			logger.debug(`Removing '${file}'`);
			await rm(path.join(downloadDir, file), { force: true });
		}
	}
	return { downloadDir, dryRun: options.dryRun, removed };
};
