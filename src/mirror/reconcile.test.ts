import { describe, expect, it } from "vitest";
import type { PackageRecord, PackageSet } from "#types/mirror";
import {
	classifyEntry,
	isEquivalent,
	mergePackageSets,
	summarizeEntries,
} from "./reconcile";

const set = (...records: PackageRecord[]): PackageSet =>
	new Map(records.map((record) => [record.name, record]));

describe("isEquivalent", () => {
	it("compares filenames only", () => {
		expect(
			isEquivalent(
				{ name: "a", filename: "a.ipk", size: 1, checksum: "00" },
				{ name: "a", filename: "a.ipk", size: 2, checksum: "ff" },
			),
		).toBe(true);
		expect(
			isEquivalent(
				{ name: "a", filename: "a_1.ipk" },
				{ name: "a", filename: "a_2.ipk" },
			),
		).toBe(false);
	});
});

describe("mergePackageSets", () => {
	it("lists local names first, then remote-only names", () => {
		const local = set(
			{ name: "keep", filename: "keep.ipk" },
			{ name: "gone", filename: "gone.ipk" },
		);
		const remote = set(
			{ name: "new", filename: "new.ipk" },
			{ name: "keep", filename: "keep.ipk" },
		);
		const merged = mergePackageSets(local, remote);
		expect(merged.map((entry) => entry.name)).toEqual(["keep", "gone", "new"]);
		expect(merged.map(classifyEntry)).toEqual(["unchanged", "removed", "added"]);
	});

	it("returns nothing for two empty sets", () => {
		expect(mergePackageSets(new Map(), new Map())).toEqual([]);
	});
});

describe("summarizeEntries", () => {
	it("counts every status", () => {
		const merged = mergePackageSets(
			set(
				{ name: "a", filename: "a.ipk" },
				{ name: "b", filename: "b_1.ipk" },
				{ name: "c", filename: "c.ipk" },
			),
			set(
				{ name: "a", filename: "a.ipk" },
				{ name: "b", filename: "b_2.ipk" },
				{ name: "d", filename: "d.ipk" },
				{ name: "e", filename: "e.ipk" },
			),
		);
		expect(summarizeEntries(merged)).toEqual({
			unchanged: 1,
			changed: 1,
			removed: 1,
			added: 2,
		});
	});
});
