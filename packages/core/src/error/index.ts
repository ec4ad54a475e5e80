import { TRACKER_ERROR_CODES, type TrackerErrorCode } from "./codes.js";

export {
	isTrackerErrorCode,
	type RawErrorCode,
	TRACKER_ERROR_CODES,
	type TrackerErrorCode,
} from "./codes.js";

export interface TrackerErrorOptions {
	cause?: unknown;
	status?: number;
	details?: Record<string, unknown>;
}

export class TrackerError extends Error {
	readonly code: TrackerErrorCode;
	/**
	 * Whether the call was skipped on purpose (`FILTERED`, `DISABLED`).
	 *
	 * Expected errors mean no request was made and nothing is wrong; callers
	 * that only care about delivery failures can ignore them.
	 */
	readonly expected: boolean;
	readonly status?: number;
	readonly details?: Record<string, unknown>;

	constructor(code: TrackerErrorCode, message?: string, options?: TrackerErrorOptions) {
		const raw = TRACKER_ERROR_CODES[code];
		super(message ?? raw.message, { cause: options?.cause });
		this.name = "TrackerError";
		this.code = code;
		this.expected = raw.expected;
		this.status = options?.status ?? ("status" in raw ? raw.status : undefined);
		this.details = options?.details;
	}

	/** Create a TrackerError using the registry's default message. */
	static fromCode(
		code: TrackerErrorCode,
		options?: TrackerErrorOptions & { message?: string },
	): TrackerError {
		return new TrackerError(code, options?.message, options);
	}

	// --- Expected outcomes ---

	static disabled(message?: string) {
		return new TrackerError("DISABLED", message);
	}

	static filtered(message?: string) {
		return new TrackerError("FILTERED", message);
	}

	// --- Local failures ---

	static configuration(message?: string, cause?: unknown) {
		return new TrackerError("CONFIGURATION", message, { cause });
	}

	static header(message?: string, cause?: unknown) {
		return new TrackerError("HEADER", message, { cause });
	}

	static serialization(message?: string, cause?: unknown) {
		return new TrackerError("SERIALIZATION", message, { cause });
	}

	static request(message?: string, cause?: unknown) {
		return new TrackerError("REQUEST", message, { cause });
	}
}

/** Narrow an unknown value to a TrackerError, optionally of a given code. */
export function isTrackerError(value: unknown, code?: TrackerErrorCode): value is TrackerError {
	if (!(value instanceof TrackerError)) return false;
	return code === undefined || value.code === code;
}
