import { existsSync } from "node:fs";
import { readFile, rm } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type FakeResponse, createFakeTransport } from "#core/testing/fake-transport";
import { makeTempDir, packageStanza, writeFiles } from "#core/testing/fixtures";
import { runSync } from "./sync";

const FEED = "https://feed.test/repo";
const MANIFEST_URL = `${FEED}/Packages`;

const STANZA_A = packageStanza("a", "a.ipk", "aaa");
const STANZA_B = packageStanza("b", "b.ipk", "bbbb");

describe("runSync", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await makeTempDir();
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	const sync = (
		routes: Record<string, FakeResponse | FakeResponse[]>,
		options: { dryRun?: boolean; failFast?: boolean } = {},
	) => {
		const transport = createFakeTransport(routes);
		const result = runSync(
			{
				url: MANIFEST_URL,
				downloadDir: dir,
				cwd: dir,
				retries: 0,
				dryRun: options.dryRun ?? false,
				failFast: options.failFast,
			},
			{ transport, retryDelayMs: 0 },
		);
		return { transport, result };
	};

	const feed = {
		[MANIFEST_URL]: { body: STANZA_A + STANZA_B },
		[`${FEED}/a.ipk`]: { body: "aaa" },
		[`${FEED}/b.ipk`]: { body: "bbbb" },
	};

	it("mirrors an empty directory and writes the remote manifest verbatim", async () => {
		const { result } = sync(feed);
		const outcome = await result;
		expect(outcome.ok).toBe(true);
		if (!outcome.ok) return;
		expect(outcome.value.summary).toEqual({
			unchanged: 0,
			added: 2,
			removed: 0,
			changed: 0,
		});
		expect(outcome.value.commit).toBe("full");
		expect(await readFile(path.join(dir, "a.ipk"), "utf8")).toBe("aaa");
		expect(await readFile(path.join(dir, "b.ipk"), "utf8")).toBe("bbbb");
		expect(await readFile(path.join(dir, "Packages"), "utf8")).toBe(
			STANZA_A + STANZA_B,
		);
	});

	it("downloads nothing on a second run", async () => {
		expect((await sync(feed).result).ok).toBe(true);
		const { transport, result } = sync(feed);
		const outcome = await result;
		expect(outcome.ok).toBe(true);
		if (!outcome.ok) return;
		expect(outcome.value.actions).toEqual({ deletions: [], fetches: [] });
		expect(outcome.value.summary.unchanged).toBe(2);
		expect(transport.requests).toEqual([MANIFEST_URL]);
	});

	it("deletes packages the feed dropped", async () => {
		await writeFiles(dir, {
			Packages: STANZA_A + packageStanza("old", "old.ipk", "old"),
			"a.ipk": "aaa",
			"old.ipk": "old",
		});
		const outcome = await sync({
			[MANIFEST_URL]: { body: STANZA_A },
		}).result;
		expect(outcome.ok).toBe(true);
		if (!outcome.ok) return;
		expect(outcome.value.execution?.deleted).toEqual(["old.ipk"]);
		expect(existsSync(path.join(dir, "old.ipk"))).toBe(false);
		expect(await readFile(path.join(dir, "Packages"), "utf8")).toBe(STANZA_A);
	});

	it("fetches a cached package again when its file is corrupt", async () => {
		await writeFiles(dir, {
			Packages: STANZA_A + STANZA_B,
			"a.ipk": "aaa",
			"b.ipk": "xxxx",
		});
		const { transport, result } = sync(feed);
		const outcome = await result;
		expect(outcome.ok).toBe(true);
		if (!outcome.ok) return;
		expect(outcome.value.rejectedLocal).toEqual([
			{ name: "b", filename: "b.ipk", reason: "checksum-mismatch" },
		]);
		expect(transport.requests).toEqual([MANIFEST_URL, `${FEED}/b.ipk`]);
		expect(await readFile(path.join(dir, "b.ipk"), "utf8")).toBe("bbbb");
	});

	it("aborts on a missing package file and commits nothing", async () => {
		const outcome = await sync({
			[MANIFEST_URL]: { body: STANZA_A + STANZA_B },
			[`${FEED}/a.ipk`]: { body: "aaa" },
		}).result;
		expect(outcome).toMatchObject({
			ok: false,
			error: { type: "transport", status: 404, url: `${FEED}/b.ipk` },
		});
		expect(existsSync(path.join(dir, "Packages"))).toBe(false);
	});

	it("fails when the remote manifest cannot be fetched", async () => {
		const outcome = await sync({
			[MANIFEST_URL]: { status: 500 },
		}).result;
		expect(outcome).toMatchObject({
			ok: false,
			error: { type: "transport", status: 500 },
		});
	});

	it("writes a partial manifest without failed packages when fail-fast is off", async () => {
		const outcome = await sync(
			{
				[MANIFEST_URL]: { body: STANZA_A + STANZA_B },
				[`${FEED}/a.ipk`]: { body: "aaa" },
			},
			{ failFast: false },
		).result;
		expect(outcome.ok).toBe(true);
		if (!outcome.ok) return;
		expect(outcome.value.commit).toBe("partial");
		expect(outcome.value.execution?.failed.map((item) => item.name)).toEqual([
			"b",
		]);
		expect(await readFile(path.join(dir, "Packages"), "utf8")).toBe(STANZA_A);
	});

	it("plans without touching the directory on a dry run", async () => {
		const { transport, result } = sync(feed, { dryRun: true });
		const outcome = await result;
		expect(outcome.ok).toBe(true);
		if (!outcome.ok) return;
		expect(outcome.value.commit).toBe("none");
		expect(outcome.value.execution).toBeNull();
		expect(outcome.value.actions.fetches.map((action) => action.filename)).toEqual([
			"a.ipk",
			"b.ipk",
		]);
		expect(transport.requests).toEqual([MANIFEST_URL]);
		expect(existsSync(path.join(dir, "Packages"))).toBe(false);
	});

	it("skips remote packages whose filename leaves the repository", async () => {
		const evil = packageStanza("evil", "../evil.ipk", "evil");
		const outcome = await sync({
			[MANIFEST_URL]: { body: STANZA_A + evil },
			[`${FEED}/a.ipk`]: { body: "aaa" },
		}).result;
		expect(outcome.ok).toBe(true);
		if (!outcome.ok) return;
		expect(outcome.value.skippedRemote).toEqual([
			{ name: "evil", filename: "../evil.ipk", reason: "unsafe-path" },
		]);
		expect(outcome.value.actions.fetches.map((action) => action.name)).toEqual([
			"a",
		]);
	});
});
