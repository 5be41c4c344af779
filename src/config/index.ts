import { access, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { type MirrorConfig, ConfigSchema } from "#config/schema";
import { getErrorMessage } from "#core/errors";
import { resolveDownloadDir } from "#core/paths";
import { DEFAULT_TIMEOUT_MS } from "#transport/http";

export type { MirrorConfig };

export const DEFAULT_CONFIG_FILENAME = "pkgmirror.config.json";
export const DEFAULT_DOWNLOAD_DIR = ".";
const PACKAGE_JSON_FILENAME = "package.json";
const PACKAGE_JSON_KEY = "pkgmirror";

export const DEFAULT_SETTINGS = {
	downloadDir: DEFAULT_DOWNLOAD_DIR,
	timeoutMs: DEFAULT_TIMEOUT_MS,
	retries: 2,
	verifyDownloads: true,
	failFast: true,
} as const;

/**
 * Effective settings for one run: config file values merged over the
 * defaults, command-line values merged over both.
 */
export type MirrorSettings = {
	url: string;
	/** Absolute path of the mirror directory. */
	downloadDir: string;
	timeoutMs: number;
	retries: number;
	verifyDownloads: boolean;
	failFast: boolean;
	configPath: string | null;
};

export type SettingsOverrides = {
	configPath?: string;
	url?: string;
	downloadDir?: string;
	timeoutMs?: number;
	retries?: number;
	verifyDownloads?: boolean;
	failFast?: boolean;
	cwd?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

export const validateConfig = (input: unknown): MirrorConfig => {
	if (!isRecord(input)) {
		throw new Error("Config must be a JSON object.");
	}
	const parsed = ConfigSchema.safeParse(input);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "config"} ${issue.message}`)
			.join("; ");
		throw new Error(`Config does not match schema: ${details}.`);
	}
	return parsed.data;
};

export const resolveConfigPath = (configPath?: string, cwd = process.cwd()) =>
	configPath
		? path.resolve(cwd, configPath)
		: path.resolve(cwd, DEFAULT_CONFIG_FILENAME);

const loadConfigFromFile = async (
	filePath: string,
	mode: "config" | "package",
) => {
	let raw: string;
	try {
		raw = await readFile(filePath, "utf8");
	} catch (error) {
		throw new Error(
			`Failed to read config at ${filePath}: ${getErrorMessage(error)}`,
		);
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		throw new Error(`Invalid JSON in ${filePath}: ${getErrorMessage(error)}`);
	}
	if (mode === "package") {
		const section = isRecord(parsed) ? parsed[PACKAGE_JSON_KEY] : undefined;
		if (section === undefined) {
			return null;
		}
		return { config: validateConfig(section), resolvedPath: filePath };
	}
	return { config: validateConfig(parsed), resolvedPath: filePath };
};

/**
 * Loads the config from an explicit path, or else from
 * `pkgmirror.config.json` or the `pkgmirror` key of `package.json` in the
 * working directory. Returns null when no config exists and none was
 * asked for.
 */
export const loadConfig = async (configPath?: string, cwd = process.cwd()) => {
	const resolvedPath = resolveConfigPath(configPath, cwd);
	const isPackageConfig = path.basename(resolvedPath) === PACKAGE_JSON_FILENAME;
	if (configPath) {
		const loaded = await loadConfigFromFile(
			resolvedPath,
			isPackageConfig ? "package" : "config",
		);
		if (!loaded) {
			throw new Error(`Missing ${PACKAGE_JSON_KEY} config in ${resolvedPath}.`);
		}
		return loaded;
	}
	if (await exists(resolvedPath)) {
		return loadConfigFromFile(resolvedPath, "config");
	}
	const packagePath = path.resolve(cwd, PACKAGE_JSON_FILENAME);
	if (await exists(packagePath)) {
		return loadConfigFromFile(packagePath, "package");
	}
	return null;
};

export const writeConfig = async (configPath: string, config: MirrorConfig) => {
	const data = `${JSON.stringify(config, null, 2)}\n`;
	await writeFile(configPath, data, "utf8");
};

const parseUrlOverride = (url: string) => {
	const parsed = ConfigSchema.shape.url.safeParse(url);
	if (!parsed.success) {
		const details = parsed.error.issues.map((issue) => issue.message).join("; ");
		throw new Error(`Invalid --url ${url}: ${details}.`);
	}
	return parsed.data;
};

/**
 * Download directory for commands that only look at local state. No URL
 * is required.
 */
export const resolveMirrorDir = async (overrides: SettingsOverrides = {}) => {
	const cwd = overrides.cwd ?? process.cwd();
	const loaded = await loadConfig(overrides.configPath, cwd);
	const baseDir = loaded ? path.dirname(loaded.resolvedPath) : cwd;
	return {
		loaded,
		downloadDir: resolveDownloadDir(
			baseDir,
			loaded?.config.downloadDir ?? DEFAULT_SETTINGS.downloadDir,
			overrides.downloadDir ? path.resolve(cwd, overrides.downloadDir) : undefined,
		),
	};
};

export const resolveSettings = async (
	overrides: SettingsOverrides = {},
): Promise<MirrorSettings> => {
	const { loaded, downloadDir } = await resolveMirrorDir(overrides);
	const config = loaded?.config;
	const url = overrides.url ? parseUrlOverride(overrides.url) : config?.url;
	if (!url) {
		throw new Error(
			`No Packages URL configured. Pass --url or create ${DEFAULT_CONFIG_FILENAME} with \`pkgmirror init\`.`,
		);
	}
	return {
		url,
		downloadDir,
		timeoutMs:
			overrides.timeoutMs ?? config?.timeoutMs ?? DEFAULT_SETTINGS.timeoutMs,
		retries: overrides.retries ?? config?.retries ?? DEFAULT_SETTINGS.retries,
		verifyDownloads:
			overrides.verifyDownloads ??
			config?.verifyDownloads ??
			DEFAULT_SETTINGS.verifyDownloads,
		failFast:
			overrides.failFast ?? config?.failFast ?? DEFAULT_SETTINGS.failFast,
		configPath: loaded?.resolvedPath ?? null,
	};
};
