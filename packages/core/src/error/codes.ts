// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of every failure the tracker can surface, with a default message.
// Status-derived codes are only produced by the opt-in response helpers.

export type RawErrorCode = {
	message: string;
	/**
	 * Whether the error is an expected outcome of a call rather than a fault.
	 *
	 * - `true`: the call was deliberately skipped (filtered, tracker disabled).
	 *   Callers usually treat these as no-ops.
	 * - `false` (default): something went wrong and the event was not delivered.
	 */
	expected?: boolean;
	/** HTTP status the code was derived from, where there is one. */
	status?: number;
};

export const TRACKER_ERROR_CODES = Object.freeze({
	// Caller-side vetoes: nothing was sent.
	DISABLED: { message: "Tracker is disabled", expected: true },
	FILTERED: { message: "Event filtered", expected: true },

	// Local failures, raised before or while talking to the collector.
	CONFIGURATION: { message: "Missing or invalid tracker configuration", expected: false },
	HEADER: { message: "Invalid header name or value", expected: false },
	SERIALIZATION: { message: "Error serializing payload", expected: false },
	REQUEST: { message: "Request failed", expected: false },

	// Collector responses, mapped by the response helpers.
	NOT_AUTHORIZED: { message: "Not authorized", expected: false, status: 401 },
	TOO_MANY_REQUESTS: { message: "Too many requests", expected: false, status: 429 },
	INTERNAL: { message: "Internal error", expected: false, status: 500 },
	UNEXPECTED_STATUS: { message: "Unexpected response status", expected: false },
} as const satisfies Record<string, RawErrorCode>);

export type TrackerErrorCode = keyof typeof TRACKER_ERROR_CODES;

export function isTrackerErrorCode(value: string): value is TrackerErrorCode {
	return Object.hasOwn(TRACKER_ERROR_CODES, value);
}
