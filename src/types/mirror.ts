/**
 * One package stanza of a `Packages` manifest, reduced to the fields the
 * mirror reconciles on.
 */
export type PackageRecord = {
	name: string;
	/** Path relative to the repository root; empty when the stanza has none. */
	filename: string;
	size?: number;
	/** Lowercase hex MD5 digest. */
	checksum?: string;
};

export type PackageSet = Map<string, PackageRecord>;

export type MergedEntry =
	| { name: string; local: PackageRecord; remote?: PackageRecord }
	| { name: string; local?: PackageRecord; remote: PackageRecord };

export type EntryStatus = "unchanged" | "added" | "removed" | "changed";

export type DeleteAction = {
	kind: "delete";
	name: string;
	filename: string;
};

export type FetchAction = {
	kind: "fetch";
	name: string;
	filename: string;
	record: PackageRecord;
};

export type ActionList = {
	deletions: DeleteAction[];
	fetches: FetchAction[];
};

export type RejectReason =
	| "invalid"
	| "unsafe-path"
	| "missing"
	| "size-mismatch"
	| "checksum-mismatch";

export type RejectedRecord = {
	name: string;
	filename: string;
	reason: RejectReason;
};
