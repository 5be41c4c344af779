import { type TransportError, fail, ok } from "#core/errors";
import { isRetryableStatus } from "#transport/http";
import type { Transport } from "#transport/types";

export type FakeResponse =
	| { status?: number; body?: string | Uint8Array; streamError?: string }
	| { networkError: string };

type FakeTransport = Transport & {
	requests: string[];
};

const toChunks = async function* (
	body: string | Uint8Array,
	streamError?: string,
): AsyncGenerator<Uint8Array> {
	yield Buffer.from(body);
	if (streamError) {
		throw new Error(streamError);
	}
};

/**
 * In-process transport keyed by URL. A list of responses is served in
 * order, the last one repeating; unknown URLs answer 404.
 */
export const createFakeTransport = (
	routes: Record<string, FakeResponse | FakeResponse[]>,
): FakeTransport => {
	const queues = new Map<string, FakeResponse[]>(
		Object.entries(routes).map(([url, value]) => [
			url,
			Array.isArray(value) ? [...value] : [value],
		]),
	);
	const requests: string[] = [];
	return {
		requests,
		async get(url: URL) {
			const href = url.toString();
			requests.push(href);
			const queue = queues.get(href) ?? [];
			const response = queue.length > 1 ? queue.shift() : queue[0];
			if (!response) {
				return fail<TransportError>({
					type: "transport",
					message: `GET ${href} returned 404`,
					url: href,
					status: 404,
					retryable: false,
				});
			}
			if ("networkError" in response) {
				return fail<TransportError>({
					type: "transport",
					message: `GET ${href} failed: ${response.networkError}`,
					url: href,
					retryable: true,
				});
			}
			const status = response.status ?? 200;
			if (status < 200 || status > 299) {
				return fail<TransportError>({
					type: "transport",
					message: `GET ${href} returned ${status}`,
					url: href,
					status,
					retryable: isRetryableStatus(status),
				});
			}
			return ok({
				url: href,
				status,
				body: toChunks(response.body ?? "", response.streamError),
			});
		},
	};
};
