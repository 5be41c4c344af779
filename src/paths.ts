import path from "node:path";

export const MANIFEST_FILENAME = "Packages";
export const PARTIAL_SUFFIX = ".part";

export const toPosixPath = (value: string) => value.replace(/\\/g, "/");

const URL_SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Manifest filenames must stay below the repository root, both as a URL
 * relative to the manifest and as a path below the download directory.
 */
export const isSafeRelativePath = (value: string) => {
	if (value.length === 0 || value.includes("\0")) {
		return false;
	}
	const normalized = toPosixPath(value);
	if (normalized.startsWith("/") || URL_SCHEME_PATTERN.test(normalized)) {
		return false;
	}
	return normalized
		.split("/")
		.every((segment) => segment !== ".." && segment !== "");
};

export const resolveInside = (root: string, relative: string) => {
	if (!isSafeRelativePath(relative)) {
		return null;
	}
	const resolvedRoot = path.resolve(root);
	const resolvedTarget = path.resolve(resolvedRoot, relative);
	const relativeTarget = path.relative(resolvedRoot, resolvedTarget);
	if (
		relativeTarget === "" ||
		relativeTarget === ".." ||
		relativeTarget.startsWith(`..${path.sep}`) ||
		path.isAbsolute(relativeTarget)
	) {
		return null;
	}
	return resolvedTarget;
};

export const resolveDownloadDir = (
	baseDir: string,
	downloadDir: string,
	overrideDir?: string,
) =>
	overrideDir ? path.resolve(overrideDir) : path.resolve(baseDir, downloadDir);

export const resolveManifestPath = (downloadDir: string) =>
	path.join(downloadDir, MANIFEST_FILENAME);
