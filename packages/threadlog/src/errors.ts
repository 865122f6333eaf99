export type ThreadlogErrorCode = "E_INTEGRITY" | "E_CYCLE" | "E_NOT_FOUND";

export class ThreadlogError extends Error {
	readonly code: ThreadlogErrorCode;
	readonly file?: string;

	constructor(code: ThreadlogErrorCode, message: string, file?: string) {
		super(message);
		this.name = "ThreadlogError";
		this.code = code;
		this.file = file;
	}
}

/** Duplicate ids or a dangling in-file parent: the file cannot be trusted. */
export class IntegrityError extends ThreadlogError {
	readonly entryId: string;

	constructor(message: string, file: string, entryId: string) {
		super("E_INTEGRITY", message, file);
		this.name = "IntegrityError";
		this.entryId = entryId;
	}
}

/** The parent chain revisits an entry. */
export class UnresolvableRootError extends ThreadlogError {
	readonly chain: string[];

	constructor(message: string, chain: string[], file?: string) {
		super("E_CYCLE", message, file);
		this.name = "UnresolvableRootError";
		this.chain = chain;
	}
}

export function isThreadlogError(err: unknown): err is ThreadlogError {
	return err instanceof ThreadlogError;
}

export function errorToPayload(err: unknown): { code: string; message: string; file?: string } {
	if (isThreadlogError(err)) {
		return { code: err.code, message: err.message, file: err.file };
	}
	if (err instanceof Error) {
		return { code: "E_INTERNAL", message: err.message };
	}
	return { code: "E_INTERNAL", message: "Unknown error" };
}
