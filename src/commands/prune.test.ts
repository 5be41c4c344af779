import { existsSync } from "node:fs";
import { rm } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { makeTempDir, packageStanza, writeFiles } from "#core/testing/fixtures";
import { pruneMirror } from "./prune";

describe("pruneMirror", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await makeTempDir();
		await writeFiles(dir, {
			Packages:
				packageStanza("a", "a.ipk", "aaa") +
				packageStanza("b", "sub/b.ipk", "bbb"),
			"a.ipk": "aaa",
			"sub/b.ipk": "bbb",
			"stale.ipk": "old",
			"sub/old.ipk": "old",
			"a.ipk.part": "half",
			".hidden": "keep",
		});
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("lists unreferenced files on a dry run without removing them", async () => {
		const report = await pruneMirror({ downloadDir: dir, cwd: dir, dryRun: true });
		expect(report).toEqual({
			downloadDir: dir,
			dryRun: true,
			removed: ["a.ipk.part", "stale.ipk", "sub/old.ipk"],
		});
		expect(existsSync(path.join(dir, "stale.ipk"))).toBe(true);
	});

	it("removes unreferenced files and keeps the rest", async () => {
		await pruneMirror({ downloadDir: dir, cwd: dir, dryRun: false });
		expect(existsSync(path.join(dir, "stale.ipk"))).toBe(false);
		expect(existsSync(path.join(dir, "sub", "old.ipk"))).toBe(false);
		expect(existsSync(path.join(dir, "a.ipk.part"))).toBe(false);
		expect(existsSync(path.join(dir, "a.ipk"))).toBe(true);
		expect(existsSync(path.join(dir, "sub", "b.ipk"))).toBe(true);
		expect(existsSync(path.join(dir, "Packages"))).toBe(true);
		expect(existsSync(path.join(dir, ".hidden"))).toBe(true);
	});

	it("never removes the config file inside the mirror", async () => {
		await writeFiles(dir, {
			"pkgmirror.config.json": JSON.stringify({
				url: "https://feed.test/repo/Packages",
			}),
		});
		const report = await pruneMirror({ cwd: dir, dryRun: true });
		expect(report.removed).toEqual(["a.ipk.part", "stale.ipk", "sub/old.ipk"]);
	});

	it("refuses to run without a local manifest", async () => {
		await rm(path.join(dir, "Packages"));
		await expect(
			pruneMirror({ downloadDir: dir, cwd: dir, dryRun: true }),
		).rejects.toThrow("Run `pkgmirror sync` first.");
	});
});
