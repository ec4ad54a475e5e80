// =============================================================================
// HEADERS — Derive and override the outgoing header set
// =============================================================================

import { type TrackerConfig, TrackerError } from "@trackline/core";

export const CLIENT_ID_HEADER = "trackline-client-id";
export const CLIENT_SECRET_HEADER = "trackline-client-secret";

// RFC 9110 field-name token and field-value octets (HTAB, visible ASCII, obs-text)
const HEADER_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const HEADER_VALUE = /^[\t\x20-\x7e\x80-\xff]*$/;

/**
 * Return a copy of `headers` with `name` set to `value`.
 * Names compare case-insensitively, so a later write replaces an earlier one.
 *
 * Leading and trailing whitespace is stripped from `value` when stored.
 * Control characters other than HTAB fail with `HEADER`.
 */
export function setHeader(headers: Headers, name: string, value: string): Headers {
	if (!HEADER_NAME.test(name)) {
		throw TrackerError.header(`Invalid header name "${name}"`);
	}
	if (!HEADER_VALUE.test(value)) {
		throw TrackerError.header(`Invalid value for header "${name}"`);
	}

	const next = new Headers(headers);
	try {
		next.set(name, value);
	} catch (error) {
		throw TrackerError.header(`Invalid header "${name}"`, error);
	}
	return next;
}

/** Content type plus the client credential pair. */
export function withDefaultHeaders(headers: Headers, config: TrackerConfig): Headers {
	let next = setHeader(headers, "Content-Type", "application/json");
	next = setHeader(next, CLIENT_ID_HEADER, config.clientId);
	next = setHeader(next, CLIENT_SECRET_HEADER, config.clientSecret);
	return next;
}

export function headersToObject(headers: Headers): Record<string, string> {
	const result: Record<string, string> = {};
	headers.forEach((value, name) => {
		result[name] = value;
	});
	return result;
}
