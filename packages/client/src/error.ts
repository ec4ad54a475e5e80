// =============================================================================
// RESPONSE ERRORS — Opt-in mapping of collector status codes
// =============================================================================
// The tracker hands back raw responses; callers who want failures as errors
// pass them through `ensureOk`.

import { TrackerError, type TrackerErrorCode } from "@trackline/core";

function codeForStatus(status: number): TrackerErrorCode {
	if (status === 401 || status === 403) return "NOT_AUTHORIZED";
	if (status === 429) return "TOO_MANY_REQUESTS";
	if (status >= 500) return "INTERNAL";
	return "UNEXPECTED_STATUS";
}

/** Map a non-2xx response to a TrackerError. Returns null for 2xx. */
export function errorFromResponse(response: Response): TrackerError | null {
	if (response.ok) return null;

	const code = codeForStatus(response.status);
	return TrackerError.fromCode(code, {
		status: response.status,
		message: code === "UNEXPECTED_STATUS" ? `Unexpected response status ${response.status}` : undefined,
	});
}

/**
 * Resolve with the response when it is 2xx, otherwise reject with the mapped error.
 *
 * @example
 * ```ts
 * await ensureOk(await tracker.track("signup"));
 * ```
 */
export async function ensureOk(response: Response): Promise<Response> {
	const error = errorFromResponse(response);
	if (error) throw error;
	return response;
}
