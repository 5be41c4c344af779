export type ErrnoException = NodeJS.ErrnoException;

export const isErrnoException = (error: unknown): error is ErrnoException =>
	error instanceof Error && "code" in error;

export const getErrnoCode = (error: unknown): string | undefined =>
	isErrnoException(error) && typeof error.code === "string"
		? error.code
		: undefined;

export const getErrorMessage = (error: unknown) =>
	error instanceof Error ? error.message : String(error);

export interface BaseError {
	type: string;
	message: string;
	cause?: BaseError;
	rawError?: Error;
}

export type TransportError = BaseError & {
	type: "transport";
	url: string;
	status?: number;
	retryable: boolean;
};

export type FilesystemError = BaseError & {
	type: "filesystem";
	path: string;
	operation: string;
};

export type IntegrityError = BaseError & {
	type: "integrity";
	path: string;
	field: "size" | "checksum";
	expected: string;
	actual: string;
};

export type MirrorError = TransportError | FilesystemError | IntegrityError;

export type Result<T, E extends BaseError = MirrorError> =
	| { ok: true; value: T }
	| { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({
	ok: true,
	value,
});

export const fail = <E extends BaseError>(error: E): { ok: false; error: E } => ({
	ok: false,
	error,
});

export const filesystemError = (
	error: unknown,
	path: string,
	operation: string,
): FilesystemError => ({
	type: "filesystem",
	message: `Failed to ${operation} ${path}: ${getErrorMessage(error)}`,
	path,
	operation,
	...(error instanceof Error ? { rawError: error } : {}),
});

export const formatMirrorError = (error: MirrorError): string => {
	const cause = error.cause ? ` (${error.cause.message})` : "";
	return `${error.message}${cause}`;
};
