export { createLogger, silentLogger } from "#cli/logger";
export type { Logger, LogLevel } from "#cli/logger";
export { initConfig } from "#commands/init";
export { pruneMirror } from "#commands/prune";
export type { PruneReport } from "#commands/prune";
export { printSyncReport, runSync } from "#commands/sync";
export { printVerify, verifyMirror } from "#commands/verify";
export type { VerifyReport } from "#commands/verify";
export {
	DEFAULT_CONFIG_FILENAME,
	DEFAULT_SETTINGS,
	loadConfig,
	resolveSettings,
	validateConfig,
	writeConfig,
} from "#config";
export type { MirrorConfig, MirrorSettings, SettingsOverrides } from "#config";
export { ConfigSchema } from "#config/schema";
export { fail, formatMirrorError, ok } from "#core/errors";
export type {
	BaseError,
	FilesystemError,
	IntegrityError,
	MirrorError,
	Result,
	TransportError,
} from "#core/errors";
export { filterManifest } from "#manifest/filter";
export { parseManifest, readManifestFile, streamManifest } from "#manifest/parse";
export { executeActions } from "#mirror/execute";
export type { ExecutionReport, ProgressEvent } from "#mirror/execute";
export { isEmptyPlan, planActions } from "#mirror/plan";
export { classifyEntry, mergePackageSets } from "#mirror/reconcile";
export { inspectLocalPackages, loadLocalPackages } from "#mirror/validate";
export { createHttpTransport } from "#transport/http";
export type { Transport, TransportResponse } from "#transport/types";
export type * from "#types/mirror";
export type * from "#types/sync";
