import type {
	EntryStatus,
	MergedEntry,
	PackageRecord,
	PackageSet,
} from "#types/mirror";

/**
 * Fields that must match for a cached package to count as unchanged.
 * Size and checksum are not compared; a package only changes when its
 * filename does.
 */
const COMPARE_FIELDS = ["filename"] as const;

export const isEquivalent = (local: PackageRecord, remote: PackageRecord) =>
	COMPARE_FIELDS.every((field) => local[field] === remote[field]);

/**
 * Pairs every package name of either set with its local and remote record.
 * Local names come first, in local order, followed by remote-only names.
 */
export const mergePackageSets = (
	local: PackageSet,
	remote: PackageSet,
): MergedEntry[] => {
	const merged: MergedEntry[] = [];
	for (const [name, record] of local) {
		merged.push({ name, local: record, remote: remote.get(name) });
	}
	for (const [name, record] of remote) {
		if (local.has(name)) continue;
		merged.push({ name, remote: record });
	}
	return merged;
};

export const classifyEntry = (entry: MergedEntry): EntryStatus => {
	const { local, remote } = entry;
	if (!remote) return "removed";
	if (!local) return "added";
	return isEquivalent(local, remote) ? "unchanged" : "changed";
};

export const summarizeEntries = (entries: MergedEntry[]) => {
	const summary: Record<EntryStatus, number> = {
		unchanged: 0,
		added: 0,
		removed: 0,
		changed: 0,
	};
	for (const entry of entries) {
		summary[classifyEntry(entry)] += 1;
	}
	return summary;
};
