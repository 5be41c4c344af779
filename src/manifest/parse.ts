import { createReadStream } from "node:fs";
import type { PackageRecord, PackageSet } from "#types/mirror";

const RECOGNIZED_KEYS = ["package", "filename", "size", "md5sum"] as const;
type RecognizedKey = (typeof RECOGNIZED_KEYS)[number];

export type StanzaFields = Partial<Record<RecognizedKey, string>>;

export type Stanza = {
	fields: StanzaFields;
	/** Raw lines of the stanza, terminators included, blank separator excluded. */
	lines: Buffer[];
};

const NEWLINE = 0x0a;
const SIZE_PATTERN = /^\d+$/;

const RECOGNIZED = new Set<string>(RECOGNIZED_KEYS);

const isRecognizedKey = (key: string): key is RecognizedKey =>
	RECOGNIZED.has(key);

const isAsciiWhitespace = (byte: number) =>
	byte === 0x20 || (byte >= 0x09 && byte <= 0x0d);

const trimLine = (raw: Buffer) => {
	let start = 0;
	let end = raw.length;
	while (start < end && isAsciiWhitespace(raw[start])) start += 1;
	while (end > start && isAsciiWhitespace(raw[end - 1])) end -= 1;
	return raw.subarray(start, end);
};

/**
 * Trimmed ASCII text of a manifest line, or null when the line carries
 * bytes outside 7-bit ASCII.
 */
export const decodeLine = (raw: Buffer): string | null => {
	const trimmed = trimLine(raw);
	for (const byte of trimmed) {
		if (byte > 0x7f) {
			return null;
		}
	}
	return trimmed.toString("latin1");
};

export const splitLines = function* (input: Uint8Array): Generator<Buffer> {
	const buffer = Buffer.from(input.buffer, input.byteOffset, input.byteLength);
	let start = 0;
	while (start < buffer.length) {
		const end = buffer.indexOf(NEWLINE, start);
		if (end === -1) {
			yield buffer.subarray(start);
			return;
		}
		yield buffer.subarray(start, end + 1);
		start = end + 1;
	}
};

export const readLines = async function* (
	source: AsyncIterable<Uint8Array>,
): AsyncGenerator<Buffer> {
	let pending: Buffer[] = [];
	for await (const chunk of source) {
		const data = Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
		let start = 0;
		let end = data.indexOf(NEWLINE, start);
		while (end !== -1) {
			pending.push(data.subarray(start, end + 1));
			yield Buffer.concat(pending);
			pending = [];
			start = end + 1;
			end = data.indexOf(NEWLINE, start);
		}
		if (start < data.length) {
			pending.push(Buffer.from(data.subarray(start)));
		}
	}
	if (pending.length > 0) {
		yield Buffer.concat(pending);
	}
};

/**
 * Feeds manifest lines through the stanza state machine. `onStanza` is
 * called for every blank-line terminated stanza that holds at least one
 * recognized field; a trailing stanza without a blank line is never
 * reported.
 */
export const createStanzaReader = (onStanza: (stanza: Stanza) => void) => {
	let fields: StanzaFields | null = null;
	let lines: Buffer[] = [];
	return (raw: Buffer) => {
		const text = decodeLine(raw);
		if (text === null) {
			lines.push(raw);
			return;
		}
		if (text === "") {
			if (fields !== null) {
				onStanza({ fields, lines });
			}
			fields = null;
			lines = [];
			return;
		}
		lines.push(raw);
		const separator = text.indexOf(": ");
		const key = (separator === -1 ? text : text.slice(0, separator))
			.trim()
			.toLowerCase();
		const value = separator === -1 ? "" : text.slice(separator + 2).trim();
		if (value === "" || !isRecognizedKey(key)) {
			return;
		}
		fields ??= {};
		fields[key] = value;
	};
};

export const toPackageRecord = (fields: StanzaFields): PackageRecord | null => {
	const name = fields.package;
	if (!name) {
		return null;
	}
	const record: PackageRecord = { name, filename: fields.filename ?? "" };
	if (fields.size !== undefined && SIZE_PATTERN.test(fields.size)) {
		record.size = Number(fields.size);
	}
	if (fields.md5sum) {
		record.checksum = fields.md5sum.toLowerCase();
	}
	return record;
};

const createCollector = () => {
	const packages: PackageSet = new Map();
	const push = createStanzaReader(({ fields }) => {
		const record = toPackageRecord(fields);
		if (record) {
			packages.set(record.name, record);
		}
	});
	return { packages, push };
};

export const parseManifest = (input: Uint8Array): PackageSet => {
	const { packages, push } = createCollector();
	for (const line of splitLines(input)) {
		push(line);
	}
	return packages;
};

export const streamManifest = async (
	source: AsyncIterable<Uint8Array>,
): Promise<PackageSet> => {
	const { packages, push } = createCollector();
	for await (const line of readLines(source)) {
		push(line);
	}
	return packages;
};

export const readManifestFile = async (manifestPath: string) => {
	const stream = createReadStream(manifestPath);
	try {
		return await streamManifest(stream);
	} finally {
		stream.destroy();
	}
};
