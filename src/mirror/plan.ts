import type { ActionList, MergedEntry } from "#types/mirror";
import { isEquivalent } from "./reconcile";

/**
 * Turns merged entries into the deletions and fetches that bring the local
 * directory in line with the remote feed. A local file is kept when any
 * remote package still points at the same filename.
 */
export const planActions = (entries: MergedEntry[]): ActionList => {
	const remoteFilenames = new Set<string>();
	for (const entry of entries) {
		if (entry.remote) remoteFilenames.add(entry.remote.filename);
	}
	const actions: ActionList = { deletions: [], fetches: [] };
	for (const { name, local, remote } of entries) {
		if (!local && !remote) {
			continue;
		}
		if (!remote) {
			if (local && !remoteFilenames.has(local.filename)) {
				actions.deletions.push({
					kind: "delete",
					name,
					filename: local.filename,
				});
			}
			continue;
		}
		if (!local || !isEquivalent(local, remote)) {
			actions.fetches.push({
				kind: "fetch",
				name,
				filename: remote.filename,
				record: remote,
			});
		}
	}
	return actions;
};

export const isEmptyPlan = (actions: ActionList) =>
	actions.deletions.length === 0 && actions.fetches.length === 0;
