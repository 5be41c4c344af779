import { Readable } from "node:stream";
import {
	type TransportError,
	fail,
	getErrorMessage,
	ok,
} from "#core/errors";
import type { GetOptions, Transport } from "./types";

export const DEFAULT_TIMEOUT_MS = 120000; // 120 seconds (2 minutes)
const USER_AGENT = "pkgmirror";
const RETRYABLE_STATUS = new Set([408, 429]);

export const isRetryableStatus = (status: number) =>
	status >= 500 || RETRYABLE_STATUS.has(status);

type HttpTransportOptions = {
	fetch?: typeof fetch;
	userAgent?: string;
};

/**
 * Plain HTTP(S) GET on the runtime `fetch`. The timeout covers the wait for
 * response headers; the body is streamed without a deadline.
 */
export const createHttpTransport = (
	options: HttpTransportOptions = {},
): Transport => ({
	async get(url: URL, getOptions: GetOptions = {}) {
		const href = url.toString();
		const request = options.fetch ?? fetch;
		const timeoutMs = getOptions.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		const controller = new AbortController();
		const timer = setTimeout(() => {
			controller.abort(new Error(`timed out after ${timeoutMs} ms`));
		}, timeoutMs);
		let response: Response;
		try {
			response = await request(href, {
				headers: { "user-agent": options.userAgent ?? USER_AGENT },
				redirect: "follow",
				signal: controller.signal,
			});
		} catch (error) {
			return fail<TransportError>({
				type: "transport",
				message: `GET ${href} failed: ${getErrorMessage(error)}`,
				url: href,
				retryable: true,
				...(error instanceof Error ? { rawError: error } : {}),
			});
		} finally {
			clearTimeout(timer);
		}
		if (!response.ok) {
			await response.body?.cancel();
			const statusText = response.statusText ? ` ${response.statusText}` : "";
			return fail<TransportError>({
				type: "transport",
				message: `GET ${href} returned ${response.status}${statusText}`,
				url: href,
				status: response.status,
				retryable: isRetryableStatus(response.status),
			});
		}
		return ok({
			url: href,
			status: response.status,
			body: response.body ? Readable.fromWeb(response.body) : Readable.from([]),
		});
	},
});
