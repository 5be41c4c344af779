import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { hashBuffer } from "#mirror/checksum";

export const makeTempDir = () => mkdtemp(path.join(tmpdir(), "pkgmirror-"));

export const writeFiles = async (
	root: string,
	files: Record<string, string | Uint8Array>,
) => {
	for (const [name, content] of Object.entries(files)) {
		const target = path.join(root, name);
		await mkdir(path.dirname(target), { recursive: true });
		await writeFile(target, content);
	}
};

/**
 * One manifest stanza with its blank-line terminator.
 */
export const stanza = (fields: Record<string, string | number>) =>
	`${Object.entries(fields)
		.map(([key, value]) => `${key}: ${value}\n`)
		.join("")}\n`;

/**
 * Stanza for a package whose file holds `content`, with matching size and
 * MD5 fields.
 */
export const packageStanza = (name: string, filename: string, content: string) =>
	stanza({
		Package: name,
		Version: "1.0",
		Filename: filename,
		Size: Buffer.byteLength(content),
		MD5Sum: hashBuffer(content),
	});
