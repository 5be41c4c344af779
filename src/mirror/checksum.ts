import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

export const MANIFEST_DIGEST = "md5";

/**
 * Hex digest of a file, read incrementally.
 */
export const hashFile = async (
	filePath: string,
	algorithm: string = MANIFEST_DIGEST,
): Promise<string> => {
	const hash = createHash(algorithm);
	const stream = createReadStream(filePath, { highWaterMark: 64 * 1024 });
	try {
		for await (const chunk of stream) {
			hash.update(chunk);
		}
	} finally {
		stream.destroy();
	}
	return hash.digest("hex");
};

export const hashBuffer = (
	data: Uint8Array | string,
	algorithm: string = MANIFEST_DIGEST,
) => createHash(algorithm).update(data).digest("hex");
