// =============================================================================
// REDACTION — Keep credentials and profile data out of log output
// =============================================================================

const REDACTED = "[REDACTED]";

// Nested payloads deeper than this are logged as-is
const MAX_DEPTH = 6;

/**
 * Keys redacted by default, compared case-insensitively: client credentials
 * (also in header form) and the personal fields an identify call carries.
 */
const DEFAULT_REDACT_KEYS = [
	"clientSecret",
	"trackline-client-secret",
	"secret",
	"token",
	"password",
	"email",
	"phone",
	"firstName",
	"lastName",
];

function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null) return false;
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

function redactValue(value: unknown, keys: ReadonlySet<string>, depth: number): unknown {
	if (depth > MAX_DEPTH) return value;

	if (Array.isArray(value)) {
		let changed = false;
		const items = value.map((item: unknown) => {
			const next = redactValue(item, keys, depth + 1);
			if (next !== item) changed = true;
			return next;
		});
		return changed ? items : value;
	}

	if (isPlainObject(value)) {
		return redactRecord(value, keys, depth);
	}

	return value;
}

function redactRecord(
	record: Record<string, unknown>,
	keys: ReadonlySet<string>,
	depth: number,
): Record<string, unknown> {
	let redacted: Record<string, unknown> | undefined;
	for (const [key, value] of Object.entries(record)) {
		const next = keys.has(key.toLowerCase()) ? REDACTED : redactValue(value, keys, depth + 1);
		if (next !== value) {
			if (!redacted) redacted = { ...record };
			redacted[key] = next;
		}
	}
	return redacted ?? record;
}

/**
 * Redact matching keys at any depth of plain objects and arrays.
 * `keys` holds lower-cased names (see `buildRedactKeys`). The input is never
 * modified; branches without a match are returned by reference.
 */
export function redactData(
	data: Record<string, unknown> | undefined,
	keys: ReadonlySet<string>,
): Record<string, unknown> | undefined {
	if (!data || keys.size === 0) return data;
	return redactRecord(data, keys, 0);
}

export function buildRedactKeys(userKeys?: string[]): Set<string> {
	return new Set((userKeys ?? DEFAULT_REDACT_KEYS).map((key) => key.toLowerCase()));
}
