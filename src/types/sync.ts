import type { SettingsOverrides } from "#config";
import type { ExecutionReport } from "#mirror/execute";
import type { ActionList, EntryStatus, RejectedRecord } from "./mirror";

export type SyncOptions = SettingsOverrides & {
	dryRun: boolean;
};

export type SkippedRecord = {
	name: string;
	filename: string;
	reason: "invalid" | "unsafe-path";
};

export type SyncEntry = {
	name: string;
	status: EntryStatus;
	localFilename?: string;
	remoteFilename?: string;
};

export type SyncReport = {
	manifestUrl: string;
	downloadDir: string;
	manifestPath: string;
	dryRun: boolean;
	summary: Record<EntryStatus, number>;
	entries: SyncEntry[];
	rejectedLocal: RejectedRecord[];
	skippedRemote: SkippedRecord[];
	actions: ActionList;
	execution: ExecutionReport | null;
	/** Which manifest was written: the remote one as is, a filtered one, or none. */
	commit: "full" | "partial" | "none";
};
