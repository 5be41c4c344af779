import { createStanzaReader, splitLines, toPackageRecord } from "./parse";

const LINE_BREAK = Buffer.from("\n");

/**
 * Rebuilds a manifest from the verbatim stanzas of the packages in `keep`.
 * Each emitted stanza is followed by a single blank line. When a package
 * appears more than once the last stanza wins, as it does when parsing.
 */
export const filterManifest = (
	input: Uint8Array,
	keep: ReadonlySet<string>,
): Buffer => {
	const stanzas = new Map<string, Buffer[]>();
	const push = createStanzaReader(({ fields, lines }) => {
		const record = toPackageRecord(fields);
		if (!record || !keep.has(record.name)) {
			return;
		}
		// every line of a terminated stanza still carries its line break
		stanzas.delete(record.name);
		stanzas.set(record.name, [...lines, LINE_BREAK]);
	});
	for (const line of splitLines(input)) {
		push(line);
	}
	return Buffer.concat(Array.from(stanzas.values()).flat());
};
