import type { Result, TransportError } from "#core/errors";

export type TransportResponse = {
	url: string;
	status: number;
	body: AsyncIterable<Uint8Array>;
};

export type GetOptions = {
	timeoutMs?: number;
};

/**
 * Retrieves raw bytes for a URL. Implementations report failures as
 * `TransportError` values rather than throwing.
 */
export interface Transport {
	get(
		url: URL,
		options?: GetOptions,
	): Promise<Result<TransportResponse, TransportError>>;
}
